import { z } from "zod";

// ─── Style schemas ───────────────────────────────────────────────────────────

export const RunStyleSchema = z.object({
  bold: z.literal(true).optional(),
  italic: z.literal(true).optional(),
  underline: z.literal(true).optional(),
  font: z.string().optional(), // w:rFonts ascii, else hAnsi
  size: z.string().optional(), // points, e.g. "12pt"
  color: z.string().optional(),
  highlight: z.string().optional(),
});

// Raw twip strings, copied from the attribute values
export const IndentationSchema = z.object({
  left: z.string(),
  right: z.string(),
  firstLine: z.string(),
  hanging: z.string(),
});

export const SpacingSchema = z.object({
  before: z.string(),
  after: z.string(),
  line: z.string(),
  lineRule: z.string(),
});

export const ParagraphStyleSchema = z.object({
  styleName: z.string().optional(), // w:pStyle, e.g. "Heading1"
  alignment: z.string().optional(), // w:jc value as written
  indentation: IndentationSchema.optional(),
  spacing: SpacingSchema.optional(),
});

// ─── Content elements ────────────────────────────────────────────────────────

export const TextRunSchema = z.object({
  text: z.string(),
  style: RunStyleSchema,
});

export const ParagraphElementSchema = z.object({
  type: z.literal("paragraph"),
  style: ParagraphStyleSchema,
  textRuns: z.array(TextRunSchema),
  text: z.string(),
});

export const ImagePositioningSchema = z.object({
  relativeFrom: z.string().optional(),
  offset: z.string().optional(), // inches
});

export const ImageElementSchema = z.object({
  type: z.literal("image"),
  width: z.string(), // "1.00in" or "unknown"
  height: z.string(),
  positioning: ImagePositioningSchema,
  contentType: z.string(),
  path: z.string(), // package path, e.g. "word/media/image1.png"
});

export const VerticalMergeSchema = z.enum(["restart", "continue"]);

export const TableCellSchema = z.object({
  content: z.array(ParagraphElementSchema),
  properties: z.object({
    gridSpan: z.number().int().positive().optional(),
    verticalMerge: VerticalMergeSchema.optional(),
  }),
});

export const TableRowSchema = z.object({
  cells: z.array(TableCellSchema),
});

export const TableElementSchema = z.object({
  type: z.literal("table"),
  properties: z.object({
    width: z.string().optional(), // "50.00%" or "6.50in"
    alignment: z.string().optional(),
  }),
  rows: z.array(TableRowSchema),
});

export const PageElementSchema = z.discriminatedUnion("type", [
  ParagraphElementSchema,
  ImageElementSchema,
  TableElementSchema,
]);

// ─── Page & document ─────────────────────────────────────────────────────────

export const PageSchema = z.object({
  pageNumber: z.number().int().positive(),
  elements: z.array(PageElementSchema),
});

export const PageSizeSchema = z.object({
  width: z.string(),
  height: z.string(),
});

export const MarginsSchema = z.object({
  top: z.string(),
  right: z.string(),
  bottom: z.string(),
  left: z.string(),
});

export const TemplateMetadataSchema = z.object({
  filename: z.string(),
  extractedAt: z.string().datetime(),
  pageSize: PageSizeSchema,
  margins: MarginsSchema,
  totalPages: z.number().int().min(1),
});

export const TemplateStructureSchema = z.object({
  metadata: TemplateMetadataSchema,
  pages: z.array(PageSchema),
});

// ─── Extractor options ───────────────────────────────────────────────────────

const InchesSchema = z.number().positive();

export const ExtractorOptionsSchema = z.object({
  /** Overrides the reported filename; used for Buffer input. */
  filename: z.string().min(1).optional(),
  defaultPageSize: z
    .object({ width: InchesSchema, height: InchesSchema })
    .default({ width: 8.5, height: 11 }),
  defaultMargins: z
    .object({
      top: z.number().nonnegative(),
      right: z.number().nonnegative(),
      bottom: z.number().nonnegative(),
      left: z.number().nonnegative(),
    })
    .default({ top: 1, right: 1, bottom: 1, left: 1 }),
  /** Divisor for the paragraph-based page estimate. */
  paragraphsPerPage: z.number().int().positive().default(30),
});

// ─── TypeScript types ─────────────────────────────────────────────────────────

export type RunStyle = z.infer<typeof RunStyleSchema>;
export type Indentation = z.infer<typeof IndentationSchema>;
export type Spacing = z.infer<typeof SpacingSchema>;
export type ParagraphStyle = z.infer<typeof ParagraphStyleSchema>;
export type TextRun = z.infer<typeof TextRunSchema>;
export type ParagraphElement = z.infer<typeof ParagraphElementSchema>;
export type ImagePositioning = z.infer<typeof ImagePositioningSchema>;
export type ImageElement = z.infer<typeof ImageElementSchema>;
export type VerticalMerge = z.infer<typeof VerticalMergeSchema>;
export type TableCell = z.infer<typeof TableCellSchema>;
export type TableRow = z.infer<typeof TableRowSchema>;
export type TableElement = z.infer<typeof TableElementSchema>;
export type PageElement = z.infer<typeof PageElementSchema>;
export type Page = z.infer<typeof PageSchema>;
export type PageSize = z.infer<typeof PageSizeSchema>;
export type Margins = z.infer<typeof MarginsSchema>;
export type TemplateMetadata = z.infer<typeof TemplateMetadataSchema>;
export type TemplateStructure = z.infer<typeof TemplateStructureSchema>;
export type ExtractorOptionsInput = z.input<typeof ExtractorOptionsSchema>;
export type ExtractorOptions = z.output<typeof ExtractorOptionsSchema>;
