#!/usr/bin/env -S node --import tsx

import { Command } from "commander";
import { loadConfig } from "./config.ts";
import { convertTexDocument } from "./convert-tex.ts";
import { preprocessLatexFile } from "./latex-preprocess.ts";
import { runFilterOnStreams } from "./run-filter.ts";

interface FilterOptions {
  acronyms?: string;
  resourcePath?: string;
  rasterWidth?: string;
}

interface ConvertOptions extends FilterOptions {
  bibliography?: string;
  referenceDoc?: string;
  astJson?: string;
}

const program = new Command();

program
  .name("texpandoc")
  .description("Prepare LaTeX papers for pandoc and post-process its document tree")
  .showHelpAfterError();

program
  .command("preprocess")
  .description("Rewrite custom macros and author/affiliation declarations for pandoc")
  .argument("<texPath>", "Path to input LaTeX file")
  .argument("<outputTexPath>", "Path to output LaTeX file")
  .action(async (texPath: string, outputTexPath: string) => {
    const result = await preprocessLatexFile({ inputTexPath: texPath, outputTexPath });

    console.log(`Wrote ${result.lineCount} line(s) to ${result.outputTexPath}`);
  });

program.action(() => {
  program.outputHelp();
});

program
  .command("filter")
  .description("Run as a pandoc JSON filter, reading the AST on stdin and writing it to stdout")
  .argument("[targetFormat]", "Output format passed by pandoc (unused)")
  .option("--acronyms <path>", "Path to the \\newacronym definitions file")
  .option("--resource-path <dir>", "Directory that image paths are relative to")
  .option("--raster-width <pixels>", "Width of rasterized PDF images")
  .action(async (_targetFormat: string | undefined, options: FilterOptions) => {
    await runFilterOnStreams({
      config: loadConfig({
        acronymsPath: options.acronyms,
        resourceDir: options.resourcePath,
        rasterWidth: options.rasterWidth,
      }),
      input: process.stdin,
      output: process.stdout,
    });
  });

program
  .command("convert")
  .description("Convert a LaTeX paper to another format (e.g. .docx) through pandoc")
  .argument("<texPath>", "Path to input LaTeX file")
  .argument("<outputPath>", "Path to output document")
  .option("--bibliography <path>", "BibTeX file for citeproc")
  .option("--reference-doc <path>", "Reference document for styles")
  .option("--acronyms <path>", "Path to the \\newacronym definitions file")
  .option("--resource-path <dir>", "Directory that image paths are relative to")
  .option("--raster-width <pixels>", "Width of rasterized PDF images")
  .option("--ast-json <path>", "Also write the source document's pretty-printed pandoc AST")
  .action(async (texPath: string, outputPath: string, options: ConvertOptions) => {
    const conversion = await convertTexDocument({
      inputTexPath: texPath,
      outputPath,
      bibliographyPath: options.bibliography,
      referenceDocPath: options.referenceDoc,
      astJsonPath: options.astJson,
      config: loadConfig({
        acronymsPath: options.acronyms,
        resourceDir: options.resourcePath,
        rasterWidth: options.rasterWidth,
      }),
    });

    console.log(`Generated ${conversion.outputPath}`);
  });

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
