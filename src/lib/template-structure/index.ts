export { extractTemplateStructure } from "./extractor";
export {
  defaultOutputPath,
  saveTemplateStructure,
  serializeTemplateStructure,
} from "./serializer";
export { DocxPackage, DOCUMENT_PART_PATH } from "./package-reader";
export {
  parseRelationships,
  readDocumentRelationships,
  resolveRelationshipTarget,
} from "./relationships";
export { extractPageLayout } from "./page-metadata";
export { extractParagraph, extractRun } from "./paragraph";
export { extractImage, detectContentType, parseDrawingElement } from "./image";
export { extractTable } from "./table";
export { walkBody, hasPageBreak } from "./body-walker";
export { countPages, estimatePagesFromParagraphs } from "./page-count";
export {
  PackageError,
  PartMissingError,
  MalformedAttributeError,
} from "./errors";
export type * from "@/lib/schemas";
