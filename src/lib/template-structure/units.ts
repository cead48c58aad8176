/**
 * Conversions from OOXML's integer units to the inch strings used in the
 * extracted structure.
 * 1 inch = 914400 EMU (drawings) = 1440 twips (page, margins, tables).
 */

export const EMU_PER_INCH = 914400;
export const TWIPS_PER_INCH = 1440;
/** w:tblW type="pct" is expressed in fiftieths of a percent. */
export const PCT_UNITS_PER_PERCENT = 50;
/** w:sz is expressed in half-points. */
export const DEFAULT_FONT_SIZE_HALF_POINTS = 24;

/** Format an inch value as "8.50in". */
export function formatInches(inches: number): string {
  return `${inches.toFixed(2)}in`;
}

/** Convert EMU to an inch string */
export function emuToInches(emu: number): string {
  return formatInches(emu / EMU_PER_INCH);
}

/** Convert twips to an inch string (for w:pgSz, w:pgMar, w:tblW dxa) */
export function twipsToInches(twips: number): string {
  return formatInches(twips / TWIPS_PER_INCH);
}

/** Convert a w:tblW pct value to a percentage string */
export function pctToPercent(value: number): string {
  return `${(value / PCT_UNITS_PER_PERCENT).toFixed(2)}%`;
}

/** Convert w:sz half-points to a point string, e.g. 21 → "10.5pt" */
export function halfPointsToPoints(halfPoints: number): string {
  return `${halfPoints / 2}pt`;
}
