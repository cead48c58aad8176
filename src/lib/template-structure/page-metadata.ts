import type {
  ExtractorOptions,
  Margins,
  PageSize,
} from "@/lib/schemas";
import { recoverMalformed } from "./errors";
import { formatInches, twipsToInches } from "./units";
import { NS, descendants, firstChild, numberAttr } from "./xml";

export interface PageLayout {
  pageSize: PageSize;
  margins: Margins;
}

type PageDefaults = Pick<ExtractorOptions, "defaultPageSize" | "defaultMargins">;

// ─── Section lookup ──────────────────────────────────────────────────────────

/** Every w:sectPr in document order. */
export function findSections(doc: Document): Element[] {
  return descendants(doc, NS.w, "sectPr");
}

// ─── Page size / margins ─────────────────────────────────────────────────────

/**
 * Page size and margins from the first section. Missing sections, elements
 * or attributes fall back to the configured defaults field by field.
 */
export function extractPageLayout(
  doc: Document,
  defaults: PageDefaults
): PageLayout {
  const section = findSections(doc)[0];
  const pgSz = section ? firstChild(section, NS.w, "pgSz") : undefined;
  const pgMar = section ? firstChild(section, NS.w, "pgMar") : undefined;

  const dim = (el: Element | undefined, name: string, fallback: number) =>
    el ? readTwips(el, name, fallback) : formatInches(fallback);

  return {
    pageSize: {
      width: dim(pgSz, "w", defaults.defaultPageSize.width),
      height: dim(pgSz, "h", defaults.defaultPageSize.height),
    },
    margins: {
      top: dim(pgMar, "top", defaults.defaultMargins.top),
      right: dim(pgMar, "right", defaults.defaultMargins.right),
      bottom: dim(pgMar, "bottom", defaults.defaultMargins.bottom),
      left: dim(pgMar, "left", defaults.defaultMargins.left),
    },
  };
}

function readTwips(el: Element, name: string, fallbackInches: number): string {
  return recoverMalformed(
    "page-metadata",
    () => {
      const twips = numberAttr(el, name, NS.w);
      return twips === undefined
        ? formatInches(fallbackInches)
        : twipsToInches(twips);
    },
    formatInches(fallbackInches)
  );
}
