#!/usr/bin/env node

import { Command } from "commander";
import {
  extractTemplateStructure,
  saveTemplateStructure,
} from "@/lib/template-structure";

const program = new Command();

program
  .name("extract")
  .description("Extract the page structure of a .docx template as JSON")
  .version("0.1.0")
  .argument("<docx>", "Path to the .docx file")
  .argument(
    "[output]",
    "Output JSON path (default: template_structure_<timestamp>.json)"
  )
  .action(async (docxPath: string, outputPath: string | undefined) => {
    try {
      console.log(`Extracting template structure from ${docxPath}...`);
      const structure = await extractTemplateStructure(docxPath);
      const jsonPath = await saveTemplateStructure(structure, outputPath);
      console.log(`Template structure saved to ${jsonPath}`);
    } catch (error) {
      console.error(
        `Error: ${error instanceof Error ? error.message : String(error)}`
      );
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
