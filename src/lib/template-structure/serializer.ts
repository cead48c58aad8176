import { writeFile } from "fs/promises";
import { TemplateStructureSchema, type TemplateStructure } from "@/lib/schemas";

/**
 * Render the structure as 2-space indented JSON. The schema pass fixes key
 * order and drops anything outside the model; the input is not modified.
 */
export function serializeTemplateStructure(structure: TemplateStructure): string {
  return JSON.stringify(TemplateStructureSchema.parse(structure), null, 2);
}

/** "template_structure_20241031154502.json" for the given local time. */
export function defaultOutputPath(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `template_structure_${stamp}.json`;
}

/** Write the structure as UTF-8 JSON and return the path written. */
export async function saveTemplateStructure(
  structure: TemplateStructure,
  outputPath?: string
): Promise<string> {
  const target = outputPath ?? defaultOutputPath();
  await writeFile(target, serializeTemplateStructure(structure), "utf8");
  return target;
}
