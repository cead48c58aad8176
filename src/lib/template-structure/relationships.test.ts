import { afterEach, describe, expect, it, vi } from "vitest";
import { buildDocx, relsXml } from "./__fixtures__/docx";
import { DocxPackage } from "./package-reader";
import {
  DOCUMENT_RELS_PATH,
  parseRelationships,
  readDocumentRelationships,
  resolveRelationshipTarget,
} from "./relationships";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseRelationships", () => {
  it("maps ids to targets", () => {
    const map = parseRelationships(
      relsXml({ rId1: "media/image1.png", rId2: "styles.xml" })
    );
    expect(Object.fromEntries(map)).toEqual({
      rId1: "media/image1.png",
      rId2: "styles.xml",
    });
  });

  it("keeps the first target for a duplicated id", () => {
    const xml =
      '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" Target="media/a.png"/>' +
      '<Relationship Id="rId1" Target="media/b.png"/>' +
      "</Relationships>";
    expect(parseRelationships(xml).get("rId1")).toBe("media/a.png");
  });
});

describe("readDocumentRelationships", () => {
  it("returns an empty map when the part is missing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const pkg = await DocxPackage.open(await buildDocx({ body: "" }));

    const map = await readDocumentRelationships(pkg);

    expect(map.size).toBe(0);
    expect(warn).toHaveBeenCalledWith(
      `[template-structure/relationships] Package part not found: ${DOCUMENT_RELS_PATH}`
    );
  });

  it("returns an empty map when the part is malformed", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const pkg = await DocxPackage.open(
      await buildDocx({ parts: { [DOCUMENT_RELS_PATH]: "" } })
    );
    expect((await readDocumentRelationships(pkg)).size).toBe(0);
  });

  it("reads the relationships part", async () => {
    const pkg = await DocxPackage.open(
      await buildDocx({ rels: { rId7: "media/logo.gif" } })
    );
    expect((await readDocumentRelationships(pkg)).get("rId7")).toBe(
      "media/logo.gif"
    );
  });
});

describe("resolveRelationshipTarget", () => {
  it.each([
    ["media/image1.png", "word/media/image1.png"],
    ["./media/image1.png", "word/media/image1.png"],
    ["/word/media/image1.png", "word/media/image1.png"],
    ["word/media/image1.png", "word/media/image1.png"],
  ])("resolves %s", (target, expected) => {
    expect(resolveRelationshipTarget(target)).toBe(expected);
  });
});
