import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import {
  PAGE_BREAK_RUN,
  buildDocx,
  inlineDrawing,
  paragraph,
  run,
} from "./__fixtures__/docx";
import { PackageError } from "./errors";
import { extractTemplateStructure } from "./extractor";

const body =
  paragraph(run("Quarterly report", '<w:b/><w:sz w:val="32"/>'), '<w:pStyle w:val="Title"/>') +
  paragraph(run("Logo:") + inlineDrawing("rId4", 1828800, 914400)) +
  paragraph(PAGE_BREAK_RUN + "<w:r><w:lastRenderedPageBreak/><w:t>Summary</w:t></w:r>") +
  '<w:tbl><w:tblPr><w:tblW w:w="5000" w:type="pct"/></w:tblPr>' +
  "<w:tr><w:tc><w:p><w:r><w:t>Revenue</w:t></w:r></w:p></w:tc></w:tr></w:tbl>" +
  '<w:sectPr><w:pgSz w:w="11906" w:h="16838"/>' +
  '<w:pgMar w:top="1134" w:right="850" w:bottom="1134" w:left="1701"/></w:sectPr>';

let dir: string;
let docxPath: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "template-structure-extract-"));
  docxPath = join(dir, "report.docx");
  await writeFile(
    docxPath,
    await buildDocx({
      body,
      rels: { rId4: "media/image4.gif" },
      parts: { "word/media/image4.gif": new Uint8Array([0x47, 0x49, 0x46]) },
    })
  );
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("extractTemplateStructure", () => {
  it("builds the structure of a document on disk", async () => {
    const structure = await extractTemplateStructure(docxPath);

    expect(structure.metadata).toEqual({
      filename: "report.docx",
      extractedAt: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
      pageSize: { width: "8.27in", height: "11.69in" },
      margins: { top: "0.79in", right: "0.59in", bottom: "0.79in", left: "1.18in" },
      totalPages: 3,
    });

    expect(structure.pages).toEqual([
      {
        pageNumber: 1,
        elements: [
          {
            type: "paragraph",
            style: { styleName: "Title" },
            textRuns: [
              { text: "Quarterly report", style: { bold: true, size: "16pt" } },
            ],
            text: "Quarterly report",
          },
          {
            type: "paragraph",
            style: {},
            textRuns: [{ text: "Logo:", style: {} }],
            text: "Logo:",
          },
          {
            type: "image",
            width: "2.00in",
            height: "1.00in",
            positioning: {},
            contentType: "image/gif",
            path: "word/media/image4.gif",
          },
        ],
      },
      {
        pageNumber: 2,
        elements: [
          {
            type: "paragraph",
            style: {},
            textRuns: [{ text: "Summary", style: {} }],
            text: "Summary",
          },
          {
            type: "table",
            properties: { width: "100.00%" },
            rows: [
              {
                cells: [
                  {
                    content: [
                      {
                        type: "paragraph",
                        style: {},
                        textRuns: [{ text: "Revenue", style: {} }],
                        text: "Revenue",
                      },
                    ],
                    properties: {},
                  },
                ],
              },
            ],
          },
        ],
      },
    ]);
  });

  it("names buffer input after the filename option", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const buffer = await buildDocx({ body: paragraph(run("x")) });

    const named = await extractTemplateStructure(buffer, { filename: "upload.docx" });
    const unnamed = await extractTemplateStructure(buffer);

    expect(named.metadata.filename).toBe("upload.docx");
    expect(unnamed.metadata.filename).toBe("document.docx");
    expect(unnamed.metadata.pageSize).toEqual({ width: "8.50in", height: "11.00in" });
    expect(unnamed.metadata.totalPages).toBe(1);
  });

  it("fails with PackageError for a missing file", async () => {
    await expect(
      extractTemplateStructure(join(dir, "nope.docx"))
    ).rejects.toBeInstanceOf(PackageError);
  });

  it("validates options before reading anything", async () => {
    await expect(
      extractTemplateStructure(join(dir, "nope.docx"), { paragraphsPerPage: 0 })
    ).rejects.toBeInstanceOf(ZodError);
  });
});
