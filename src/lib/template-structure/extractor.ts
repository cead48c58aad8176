/**
 * DOCX → TemplateStructure.
 * Opens the package, resolves relationships, partitions the body into pages
 * and reads page layout and page count from the first section.
 */

import { basename } from "path";
import {
  ExtractorOptionsSchema,
  type ExtractorOptionsInput,
  type TemplateStructure,
} from "@/lib/schemas";
import { walkBody } from "./body-walker";
import { countPages } from "./page-count";
import { extractPageLayout } from "./page-metadata";
import { DocxPackage } from "./package-reader";
import { readDocumentRelationships } from "./relationships";

const DEFAULT_BUFFER_FILENAME = "document.docx";

export async function extractTemplateStructure(
  source: string | Buffer,
  rawOptions: ExtractorOptionsInput = {}
): Promise<TemplateStructure> {
  const options = ExtractorOptionsSchema.parse(rawOptions);
  const filename =
    options.filename ??
    (typeof source === "string" ? basename(source) : DEFAULT_BUFFER_FILENAME);

  const pkg = await DocxPackage.open(source, filename);
  const { xml, doc } = await pkg.readDocumentXml();
  const relationships = await readDocumentRelationships(pkg);

  const pages = walkBody(doc, {
    relationships,
    hasPart: (partPath) => pkg.hasPart(partPath),
  });
  const { pageSize, margins } = extractPageLayout(doc, options);

  return {
    metadata: {
      filename,
      extractedAt: new Date().toISOString(),
      pageSize,
      margins,
      totalPages: countPages(xml, options.paragraphsPerPage),
    },
    pages,
  };
}
