/**
 * Read paragraph (<w:pPr>) and run (<w:rPr>) properties into the style
 * records of the template structure. Only direct formatting is read;
 * styles.xml inheritance is not resolved.
 */

import type { ParagraphStyle, RunStyle } from "@/lib/schemas";
import { recoverMalformed } from "./errors";
import { DEFAULT_FONT_SIZE_HALF_POINTS, halfPointsToPoints } from "./units";
import { NS, attr, firstChild, numberAttr } from "./xml";

/**
 * Parse paragraph properties into ParagraphStyle. Keys are present only when
 * the markup carries the corresponding element.
 */
export function parseParagraphStyle(pPr: Element | undefined): ParagraphStyle {
  if (!pPr) return {};

  const style: ParagraphStyle = {};

  const pStyle = firstChild(pPr, NS.w, "pStyle");
  const styleName = pStyle ? attr(pStyle, "val", NS.w) : undefined;
  if (styleName !== undefined) style.styleName = styleName;

  const jc = firstChild(pPr, NS.w, "jc");
  const alignment = jc ? attr(jc, "val", NS.w) : undefined;
  if (alignment) style.alignment = alignment;

  const ind = firstChild(pPr, NS.w, "ind");
  if (ind) {
    style.indentation = {
      left: attr(ind, "left", NS.w) ?? "0",
      right: attr(ind, "right", NS.w) ?? "0",
      firstLine: attr(ind, "firstLine", NS.w) ?? "0",
      hanging: attr(ind, "hanging", NS.w) ?? "0",
    };
  }

  const spacing = firstChild(pPr, NS.w, "spacing");
  if (spacing) {
    style.spacing = {
      before: attr(spacing, "before", NS.w) ?? "0",
      after: attr(spacing, "after", NS.w) ?? "0",
      line: attr(spacing, "line", NS.w) ?? "240", // single spacing
      lineRule: attr(spacing, "lineRule", NS.w) ?? "auto",
    };
  }

  return style;
}

/**
 * Parse run properties into RunStyle.
 * Bold, italic and underline are switched on by the element's presence;
 * an explicit w:val="false" is not inspected.
 */
export function parseRunStyle(rPr: Element | undefined): RunStyle {
  if (!rPr) return {};

  const style: RunStyle = {};

  if (firstChild(rPr, NS.w, "b")) style.bold = true;
  if (firstChild(rPr, NS.w, "i")) style.italic = true;
  if (firstChild(rPr, NS.w, "u")) style.underline = true;

  const rFonts = firstChild(rPr, NS.w, "rFonts");
  if (rFonts) {
    const font = attr(rFonts, "ascii", NS.w) ?? attr(rFonts, "hAnsi", NS.w);
    if (font) style.font = font;
  }

  const sz = firstChild(rPr, NS.w, "sz");
  if (sz) {
    const halfPoints = recoverMalformed(
      "style-resolver",
      () => numberAttr(sz, "val", NS.w) ?? DEFAULT_FONT_SIZE_HALF_POINTS,
      DEFAULT_FONT_SIZE_HALF_POINTS
    );
    style.size = halfPointsToPoints(halfPoints);
  }

  const color = firstChild(rPr, NS.w, "color");
  const colorVal = color ? attr(color, "val", NS.w) : undefined;
  if (colorVal !== undefined) style.color = colorVal;

  const highlight = firstChild(rPr, NS.w, "highlight");
  const highlightVal = highlight ? attr(highlight, "val", NS.w) : undefined;
  if (highlightVal !== undefined) style.highlight = highlightVal;

  return style;
}
