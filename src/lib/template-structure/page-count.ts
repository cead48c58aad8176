import { NS, descendants, parseXml } from "./xml";

const DEFAULT_W_PREFIX = "w";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const W_PREFIX_DECLARATION = new RegExp(
  `xmlns:([A-Za-z_][\\w.-]*)\\s*=\\s*["']${escapeRegExp(NS.w)}["']`
);

/**
 * Prefix bound to the WordprocessingML namespace in raw XML. Falls back to
 * "w" when no declaration is found, e.g. in truncated input.
 */
export function wordprocessingPrefix(documentXml: string): string {
  return W_PREFIX_DECLARATION.exec(documentXml)?.[1] ?? DEFAULT_W_PREFIX;
}

/**
 * Estimate the rendered page count of word/document.xml.
 *
 * Counts w:lastRenderedPageBreak markers and w:sectPr elements, plus one.
 * If the XML cannot be parsed, falls back to one page per
 * `paragraphsPerPage` paragraphs (at least one page).
 *
 * This is independent of the pages produced by walkBody.
 */
export function countPages(documentXml: string, paragraphsPerPage = 30): number {
  try {
    const doc = parseXml(documentXml);
    const renderedBreaks = descendants(doc, NS.w, "lastRenderedPageBreak").length;
    const sectionBreaks = descendants(doc, NS.w, "sectPr").length;
    return renderedBreaks + sectionBreaks + 1;
  } catch (err) {
    console.warn(
      "[template-structure/page-count] Falling back to paragraph estimate:",
      err instanceof Error ? err.message : err
    );
    return estimatePagesFromParagraphs(documentXml, paragraphsPerPage);
  }
}

/**
 * Raw-text estimate: counts paragraph start tags using the prefix declared
 * for the WordprocessingML namespace. A document that makes that namespace the
 * default one (unprefixed `<p>`) is counted under "w" and yields one page.
 */
export function estimatePagesFromParagraphs(
  documentXml: string,
  paragraphsPerPage = 30
): number {
  const prefix = escapeRegExp(wordprocessingPrefix(documentXml));
  const paragraphOpenTag = new RegExp(`<${prefix}:p[\\s>/]`, "g");
  const paragraphCount = documentXml.match(paragraphOpenTag)?.length ?? 0;
  return Math.max(1, Math.floor(paragraphCount / paragraphsPerPage));
}
