import type { ParagraphElement, TextRun } from "@/lib/schemas";
import { parseParagraphStyle, parseRunStyle } from "./style-resolver";
import { NS, descendants, firstChild, textOf } from "./xml";

// ─── Run builder ──────────────────────────────────────────────────────────────

/** A run's text is every w:t below it, joined; a run may split its text. */
export function extractRun(run: Element): TextRun {
  const text = descendants(run, NS.w, "t").map(textOf).join("");
  return {
    text,
    style: parseRunStyle(firstChild(run, NS.w, "rPr")),
  };
}

/** Runs of a paragraph in document order, including runs inside hyperlinks. */
export function paragraphRuns(paragraph: Element): Element[] {
  return descendants(paragraph, NS.w, "r");
}

// ─── Paragraph builder ────────────────────────────────────────────────────────

export function extractParagraph(paragraph: Element): ParagraphElement {
  const textRuns = paragraphRuns(paragraph)
    .map(extractRun)
    .filter((run) => run.text !== "");

  return {
    type: "paragraph",
    style: parseParagraphStyle(firstChild(paragraph, NS.w, "pPr")),
    textRuns,
    text: textRuns.map((run) => run.text).join(""),
  };
}
