import type {
  TableCell,
  TableElement,
  TableRow,
  VerticalMerge,
} from "@/lib/schemas";
import { recoverMalformed } from "./errors";
import { extractParagraph } from "./paragraph";
import { pctToPercent, twipsToInches } from "./units";
import { NS, attr, firstChild, numberAttr, ownDescendants } from "./xml";

// ─── Table properties ────────────────────────────────────────────────────────

function parseTableProperties(tbl: Element): TableElement["properties"] {
  const properties: TableElement["properties"] = {};
  const tblPr = firstChild(tbl, NS.w, "tblPr");
  if (!tblPr) return properties;

  const tblW = firstChild(tblPr, NS.w, "tblW");
  if (tblW) {
    const width = recoverMalformed<string | undefined>(
      "table",
      () => parseTableWidth(tblW),
      undefined
    );
    if (width !== undefined) properties.width = width;
  }

  const jc = firstChild(tblPr, NS.w, "jc");
  const alignment = jc ? attr(jc, "val", NS.w) : undefined;
  if (alignment !== undefined) properties.alignment = alignment;

  return properties;
}

/** pct widths are fiftieths of a percent, dxa widths are twips. */
function parseTableWidth(tblW: Element): string | undefined {
  const type = attr(tblW, "type", NS.w);
  if (type !== "pct" && type !== "dxa") return undefined;

  const value = numberAttr(tblW, "w", NS.w);
  if (value === undefined) return undefined;
  return type === "pct" ? pctToPercent(value) : twipsToInches(value);
}

// ─── Cells ───────────────────────────────────────────────────────────────────

function parseCellProperties(tc: Element): TableCell["properties"] {
  const properties: TableCell["properties"] = {};
  const tcPr = firstChild(tc, NS.w, "tcPr");
  if (!tcPr) return properties;

  const gridSpan = firstChild(tcPr, NS.w, "gridSpan");
  if (gridSpan) {
    const span = recoverMalformed<number | undefined>(
      "table",
      () => numberAttr(gridSpan, "val", NS.w),
      undefined
    );
    if (span !== undefined && Number.isInteger(span) && span > 0) {
      properties.gridSpan = span;
    }
  }

  const vMerge = firstChild(tcPr, NS.w, "vMerge");
  if (vMerge) properties.verticalMerge = toVerticalMerge(attr(vMerge, "val", NS.w));

  return properties;
}

/** A w:vMerge without w:val continues the merge above it. */
function toVerticalMerge(val: string | undefined): VerticalMerge {
  return val === "restart" ? "restart" : "continue";
}

function extractCell(tc: Element): TableCell {
  return {
    content: ownDescendants(tc, NS.w, "p", "tbl").map(extractParagraph),
    properties: parseCellProperties(tc),
  };
}

// ─── Table ───────────────────────────────────────────────────────────────────

/**
 * Rows, cells and cell paragraphs are found through content-control wrappers;
 * a table nested in a cell is not part of that cell's content.
 */
export function extractTable(tbl: Element): TableElement {
  const rows: TableRow[] = ownDescendants(tbl, NS.w, "tr", "tbl").map((tr) => ({
    cells: ownDescendants(tr, NS.w, "tc", "tbl").map(extractCell),
  }));

  return {
    type: "table",
    properties: parseTableProperties(tbl),
    rows,
  };
}
