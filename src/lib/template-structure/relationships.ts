import { PartMissingError } from "./errors";
import type { DocxPackage } from "./package-reader";
import { attr, childElements, parseXml } from "./xml";

export const DOCUMENT_RELS_PATH = "word/_rels/document.xml.rels";

export type RelationshipMap = ReadonlyMap<string, string>;

/** Map each relationship Id to its Target. The first Id wins. */
export function parseRelationships(relsXml: string): Map<string, string> {
  const map = new Map<string, string>();
  const root = parseXml(relsXml).documentElement;
  if (!root) return map;

  for (const rel of childElements(root)) {
    if (rel.localName !== "Relationship") continue;
    const id = attr(rel, "Id");
    const target = attr(rel, "Target");
    if (id && target !== undefined && !map.has(id)) {
      map.set(id, target);
    }
  }
  return map;
}

/**
 * Relationships of the main body part. A package without the part simply has
 * no relationships; images that need one are skipped later.
 */
export async function readDocumentRelationships(
  pkg: DocxPackage
): Promise<RelationshipMap> {
  let relsXml: string;
  try {
    relsXml = await pkg.readText(DOCUMENT_RELS_PATH);
  } catch (err) {
    if (err instanceof PartMissingError) {
      console.warn(`[template-structure/relationships] ${err.message}`);
      return new Map();
    }
    throw err;
  }

  try {
    return parseRelationships(relsXml);
  } catch (err) {
    console.warn(
      `[template-structure/relationships] Ignoring malformed ${DOCUMENT_RELS_PATH}:`,
      err
    );
    return new Map();
  }
}

/**
 * Turn a relationship target of word/document.xml into a package path.
 * "media/image1.png" → "word/media/image1.png", "/word/x.png" → "word/x.png".
 */
export function resolveRelationshipTarget(target: string): string {
  const clean = target.replace(/^\.\//, "");
  if (clean.startsWith("/")) return clean.replace(/^\/+/, "");
  if (clean.startsWith("word/")) return clean;
  return `word/${clean}`.replace(/\/+/g, "/");
}
