/**
 * Resolves <w:drawing> elements to image parts and reads their size and
 * horizontal position.
 */

import type { ImageElement, ImagePositioning } from "@/lib/schemas";
import { recoverMalformed } from "./errors";
import {
  resolveRelationshipTarget,
  type RelationshipMap,
} from "./relationships";
import { emuToInches } from "./units";
import {
  NS,
  attr,
  descendants,
  firstDescendant,
  numberAttr,
  parseNumber,
  textOf,
} from "./xml";

export const UNKNOWN_DIMENSION = "unknown";

export interface ImageContext {
  relationships: RelationshipMap;
  /** Whether the package contains a part at this path. */
  hasPart(partPath: string): boolean;
}

export interface ParsedDrawing {
  rId: string | null;
  width: string;
  height: string;
  positioning: ImagePositioning;
}

/**
 * Parse a <w:drawing> element into its blip relationship ID, extent and
 * positioning. Sizes convert from EMU; unreadable sizes become "unknown".
 */
export function parseDrawingElement(drawing: Element): ParsedDrawing {
  const blip = firstDescendant(drawing, NS.a, "blip");
  const rId = blip ? attr(blip, "embed", NS.r) ?? null : null;

  const extent = firstDescendant(drawing, NS.wp, "extent");
  const dimension = (name: "cx" | "cy") =>
    extent
      ? recoverMalformed(
          "image",
          () => {
            const emu = numberAttr(extent, name);
            return emu === undefined ? UNKNOWN_DIMENSION : emuToInches(emu);
          },
          UNKNOWN_DIMENSION
        )
      : UNKNOWN_DIMENSION;

  return {
    rId,
    width: dimension("cx"),
    height: dimension("cy"),
    positioning: parsePositioning(drawing),
  };
}

/**
 * Horizontal position of a floating drawing: wp:positionH when present,
 * otherwise the first bare wp:posOffset. Inline drawings yield {}.
 */
function parsePositioning(drawing: Element): ImagePositioning {
  const positioning: ImagePositioning = {};
  const positionH = firstDescendant(drawing, NS.wp, "positionH");

  let offsetEl: Element | undefined;
  if (positionH) {
    const relativeFrom = attr(positionH, "relativeFrom");
    if (relativeFrom) positioning.relativeFrom = relativeFrom;
    offsetEl = firstDescendant(positionH, NS.wp, "posOffset");
  } else {
    offsetEl = firstDescendant(drawing, NS.wp, "posOffset");
  }

  const raw = offsetEl ? textOf(offsetEl).trim() : "";
  if (raw) {
    const offset = recoverMalformed<string | undefined>(
      "image",
      () => emuToInches(parseNumber(raw, "wp:posOffset", "#text")),
      undefined
    );
    if (offset !== undefined) positioning.offset = offset;
  }

  return positioning;
}

/** MIME type from the part's extension; anything unrecognised is JPEG. */
export function detectContentType(partPath: string): string {
  const lower = partPath.toLowerCase();
  if (lower.endsWith(".png")) return "image/png";
  if (lower.endsWith(".gif")) return "image/gif";
  return "image/jpeg";
}

/**
 * Build an ImageElement for a drawing. Returns null when the drawing has no
 * blip, its relationship is unknown, or the target part is absent.
 */
export function extractImage(
  drawing: Element,
  context: ImageContext
): ImageElement | null {
  const parsed = parseDrawingElement(drawing);
  if (!parsed.rId) return null;

  const target = context.relationships.get(parsed.rId);
  if (target === undefined) {
    console.warn(
      `[template-structure/image] Skipping drawing with unknown relationship ${parsed.rId}`
    );
    return null;
  }

  const path = resolveRelationshipTarget(target);
  if (!context.hasPart(path)) {
    console.warn(`[template-structure/image] Skipping drawing, part not found: ${path}`);
    return null;
  }

  return {
    type: "image",
    width: parsed.width,
    height: parsed.height,
    positioning: parsed.positioning,
    contentType: detectContentType(path),
    path,
  };
}

/** Images of a paragraph, one per run that holds a drawing, in run order. */
export function extractParagraphImages(
  runs: Element[],
  context: ImageContext
): ImageElement[] {
  const images: ImageElement[] = [];
  for (const run of runs) {
    const drawing = descendants(run, NS.w, "drawing")[0];
    if (!drawing) continue;
    const image = extractImage(drawing, context);
    if (image) images.push(image);
  }
  return images;
}
