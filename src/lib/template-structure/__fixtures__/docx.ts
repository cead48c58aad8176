/**
 * Builders for in-memory .docx packages and WordprocessingML fragments used
 * by the template-structure tests.
 */

import JSZip from "jszip";
import { childElements, parseXml } from "../xml";

export const NAMESPACE_DECLARATIONS = [
  'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"',
  'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"',
  'xmlns:wp="http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing"',
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main"',
  'xmlns:pic="http://schemas.openxmlformats.org/drawingml/2006/picture"',
].join(" ");

const IMAGE_REL_TYPE =
  "http://schemas.openxmlformats.org/officeDocument/2006/relationships/image";

export function documentXml(bodyXml: string): string {
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    `<w:document ${NAMESPACE_DECLARATIONS}><w:body>${bodyXml}</w:body></w:document>`
  );
}

export function relsXml(rels: Record<string, string>): string {
  const entries = Object.entries(rels)
    .map(
      ([id, target]) =>
        `<Relationship Id="${id}" Type="${IMAGE_REL_TYPE}" Target="${target}"/>`
    )
    .join("");
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    `<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">${entries}</Relationships>`
  );
}

// ─── Markup snippets ──────────────────────────────────────────────────────────

export function run(text: string, rPr = ""): string {
  return `<w:r>${rPr ? `<w:rPr>${rPr}</w:rPr>` : ""}<w:t xml:space="preserve">${text}</w:t></w:r>`;
}

export function paragraph(content: string, pPr = ""): string {
  return `<w:p>${pPr ? `<w:pPr>${pPr}</w:pPr>` : ""}${content}</w:p>`;
}

export const PAGE_BREAK_RUN = '<w:r><w:br w:type="page"/></w:r>';

export function inlineDrawing(rId: string, cx = 914400, cy = 457200): string {
  return (
    "<w:r><w:drawing><wp:inline>" +
    `<wp:extent cx="${cx}" cy="${cy}"/>` +
    '<a:graphic><a:graphicData uri="http://schemas.openxmlformats.org/drawingml/2006/picture">' +
    `<pic:pic><pic:blipFill><a:blip r:embed="${rId}"/></pic:blipFill></pic:pic>` +
    "</a:graphicData></a:graphic></wp:inline></w:drawing></w:r>"
  );
}

/** Parse `xml` inside a root that declares the usual prefixes. */
export function fragment(xml: string): Element {
  const root = parseXml(`<root ${NAMESPACE_DECLARATIONS}>${xml}</root>`).documentElement;
  const el = root ? childElements(root)[0] : undefined;
  if (!el) throw new Error("fragment has no element");
  return el;
}

export function parseDocument(bodyXml: string): Document {
  return parseXml(documentXml(bodyXml));
}

// ─── Packages ────────────────────────────────────────────────────────────────

export interface DocxFixture {
  body?: string;
  /** Replaces the generated word/document.xml when set. */
  document?: string | null;
  rels?: Record<string, string>;
  parts?: Record<string, string | Uint8Array>;
}

export async function buildDocx(fixture: DocxFixture = {}): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    "[Content_Types].xml",
    '<?xml version="1.0" encoding="UTF-8"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>'
  );

  if (fixture.document !== null) {
    zip.file("word/document.xml", fixture.document ?? documentXml(fixture.body ?? ""));
  }
  if (fixture.rels) {
    zip.file("word/_rels/document.xml.rels", relsXml(fixture.rels));
  }
  for (const [partPath, content] of Object.entries(fixture.parts ?? {})) {
    zip.file(partPath, content);
  }

  return zip.generateAsync({ type: "nodebuffer" });
}
