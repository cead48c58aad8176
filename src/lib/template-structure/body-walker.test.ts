import { afterEach, describe, expect, it, vi } from "vitest";
import type { PageElement } from "@/lib/schemas";
import {
  PAGE_BREAK_RUN,
  inlineDrawing,
  paragraph,
  parseDocument,
  run,
} from "./__fixtures__/docx";
import { hasPageBreak, walkBody } from "./body-walker";
import type { ImageContext } from "./image";

const images: ImageContext = {
  relationships: new Map([["rId1", "media/image1.png"]]),
  hasPart: (partPath) => partPath === "word/media/image1.png",
};

function describeElement(el: PageElement): string {
  switch (el.type) {
    case "paragraph":
      return `p:${el.text}`;
    case "image":
      return `img:${el.path}`;
    case "table":
      return `tbl:${el.rows.length}`;
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("hasPageBreak", () => {
  it("detects explicit page breaks and section properties only", () => {
    const doc = parseDocument(
      paragraph(run("a") + PAGE_BREAK_RUN) +
        paragraph(run("b"), '<w:sectPr><w:pgSz w:w="12240" w:h="15840"/></w:sectPr>') +
        paragraph("<w:r><w:br/></w:r>") +
        paragraph('<w:r><w:br w:type="column"/></w:r>')
    );
    const paragraphs = doc.getElementsByTagNameNS(
      "http://schemas.openxmlformats.org/wordprocessingml/2006/main",
      "p"
    );

    const flags: boolean[] = [];
    for (let i = 0; i < paragraphs.length; i++) {
      const p = paragraphs.item(i);
      if (p) flags.push(hasPageBreak(p));
    }
    expect(flags).toEqual([true, true, false, false]);
  });
});

describe("walkBody", () => {
  it("partitions elements into pages in document order", () => {
    const doc = parseDocument(
      paragraph(run("One")) +
        paragraph(PAGE_BREAK_RUN + run("Two")) +
        "<w:tbl><w:tr><w:tc><w:p/></w:tc></w:tr></w:tbl>" +
        paragraph(run("Three") + inlineDrawing("rId1")) +
        paragraph(run("Four"), "<w:sectPr/>") +
        paragraph(run("Five")) +
        "<w:sectPr/>"
    );

    const pages = walkBody(doc, images);

    expect(pages.map((page) => page.pageNumber)).toEqual([1, 2, 3]);
    expect(pages.map((page) => page.elements.map(describeElement))).toEqual([
      ["p:One"],
      ["p:Two", "tbl:1", "p:Three", "img:word/media/image1.png"],
      ["p:Four", "p:Five"],
    ]);
  });

  it("seals an empty first page when the first paragraph breaks", () => {
    const pages = walkBody(parseDocument(paragraph(PAGE_BREAK_RUN + run("A"))), images);

    expect(pages).toEqual([
      { pageNumber: 1, elements: [] },
      {
        pageNumber: 2,
        elements: [
          { type: "paragraph", style: {}, textRuns: [{ text: "A", style: {} }], text: "A" },
        ],
      },
    ]);
  });

  it("returns no pages for an empty body", () => {
    expect(walkBody(parseDocument(""), images)).toEqual([]);
  });

  it("keeps the paragraph when its image cannot be resolved", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const pages = walkBody(
      parseDocument(paragraph(run("Caption") + inlineDrawing("rId9"))),
      images
    );

    expect(pages).toHaveLength(1);
    expect(pages[0].elements.map(describeElement)).toEqual(["p:Caption"]);
  });
});
