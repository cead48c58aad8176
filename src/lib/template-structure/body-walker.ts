import type { Page, PageElement } from "@/lib/schemas";
import { extractParagraphImages, type ImageContext } from "./image";
import { extractParagraph, paragraphRuns } from "./paragraph";
import { extractTable } from "./table";
import { NS, attr, childElements, descendants, firstDescendant } from "./xml";

/**
 * A paragraph ends a page when it holds an explicit page break or carries
 * section properties (a section break always starts a new page here).
 */
export function hasPageBreak(paragraph: Element): boolean {
  const pageBreak = descendants(paragraph, NS.w, "br").some(
    (br) => attr(br, "type", NS.w) === "page"
  );
  return pageBreak || firstDescendant(paragraph, NS.w, "sectPr") !== undefined;
}

export function findBody(doc: Document): Element | undefined {
  return firstDescendant(doc, NS.w, "body");
}

/**
 * Walk the body's top-level paragraphs and tables in order and partition them
 * into pages.
 *
 * The break check runs before the paragraph is appended, so a paragraph that
 * carries a break opens the next page. Images follow their paragraph as
 * sibling elements. A trailing non-empty buffer becomes the last page.
 */
export function walkBody(doc: Document, images: ImageContext): Page[] {
  const body = findBody(doc);
  if (!body) return [];

  const pages: Page[] = [];
  let pageNumber = 1;
  let buffer: PageElement[] = [];

  for (const el of childElements(body)) {
    if (el.namespaceURI !== NS.w) continue;

    if (el.localName === "p") {
      if (hasPageBreak(el)) {
        pages.push({ pageNumber, elements: buffer });
        pageNumber++;
        buffer = [];
      }
      buffer.push(extractParagraph(el));
      buffer.push(...extractParagraphImages(paragraphRuns(el), images));
    } else if (el.localName === "tbl") {
      buffer.push(extractTable(el));
    }
  }

  if (buffer.length > 0) {
    pages.push({ pageNumber, elements: buffer });
  }

  return pages;
}
