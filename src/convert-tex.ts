import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, parse, resolve } from "node:path";
import type { TexPandocConfig } from "./config.ts";
import { preprocessLatexFile } from "./latex-preprocess.ts";
import { filterPandocJson, loadFilterContext, parsePandocDocument } from "./pandoc-filter.ts";
import type { FilterContext } from "./pandoc-filter.ts";
import { buildPandocFromJsonArgs, buildPandocToJsonArgs, runPandoc } from "./pandoc-run.ts";

const AST_JSON_INDENT = 4;

interface ConvertTexInput {
  inputTexPath: string;
  outputPath: string;
  config: TexPandocConfig;
  bibliographyPath?: string;
  referenceDocPath?: string;
  astJsonPath?: string;
}

interface ConvertTexResult {
  outputPath: string;
  preprocessedTexPath: string;
  filteredJsonPath: string;
  astJsonPath?: string;
}

interface ConvertTexDependencies {
  preprocess: (input: { inputTexPath: string; outputTexPath: string }) => Promise<unknown>;
  runPandoc: (args: string[]) => Promise<string>;
  writeTextFile: (filePath: string, content: string) => Promise<void>;
  loadFilterContext: (config: TexPandocConfig) => Promise<FilterContext>;
}

export function getIntermediatePaths(
  inputTexPath: string,
  outputPath: string,
): { preprocessedTexPath: string; filteredJsonPath: string } {
  const outputDirPath = dirname(outputPath);
  const stem = parse(inputTexPath).name;
  return {
    preprocessedTexPath: join(outputDirPath, `${stem}_pandoc.tex`),
    filteredJsonPath: join(outputDirPath, `${stem}_pandoc.json`),
  };
}

/**
 * preprocess → pandoc (LaTeX to JSON AST, with citeproc) → filter →
 * pandoc (JSON AST to the output format). Intermediate files are kept
 * beside the output for inspection.
 */
export async function convertTexDocument(
  input: ConvertTexInput,
  dependencies?: ConvertTexDependencies,
): Promise<ConvertTexResult> {
  const resolvedDependencies = dependencies ?? createDefaultDependencies(input.config);
  const { config } = input;

  const resolvedInputTexPath = resolve(input.inputTexPath);
  const resolvedOutputPath = resolve(input.outputPath);
  const { preprocessedTexPath, filteredJsonPath } = getIntermediatePaths(
    resolvedInputTexPath,
    resolvedOutputPath,
  );

  await resolvedDependencies.preprocess({
    inputTexPath: resolvedInputTexPath,
    outputTexPath: preprocessedTexPath,
  });

  const astJson = await resolvedDependencies.runPandoc(
    buildPandocToJsonArgs({
      inputTexPath: preprocessedTexPath,
      resourceDir: config.resourceDir,
      bibliographyPath: input.bibliographyPath,
    }),
  );

  const context = await resolvedDependencies.loadFilterContext(config);
  await resolvedDependencies.writeTextFile(
    filteredJsonPath,
    await filterPandocJson(astJson, context),
  );

  await resolvedDependencies.runPandoc(
    buildPandocFromJsonArgs({
      inputJsonPath: filteredJsonPath,
      outputPath: resolvedOutputPath,
      resourceDir: config.resourceDir,
      referenceDocPath: input.referenceDocPath,
    }),
  );

  const result: ConvertTexResult = {
    outputPath: resolvedOutputPath,
    preprocessedTexPath,
    filteredJsonPath,
  };

  if (input.astJsonPath !== undefined) {
    result.astJsonPath = resolve(input.astJsonPath);
    await dumpSourceAst(input, resolvedInputTexPath, result.astJsonPath, resolvedDependencies);
  }

  return result;
}

// The unprocessed source's AST, pretty-printed, for writing new filters.
async function dumpSourceAst(
  input: ConvertTexInput,
  resolvedInputTexPath: string,
  resolvedAstJsonPath: string,
  dependencies: ConvertTexDependencies,
): Promise<void> {
  const sourceAst = await dependencies.runPandoc(
    buildPandocToJsonArgs({
      inputTexPath: resolvedInputTexPath,
      resourceDir: input.config.resourceDir,
      bibliographyPath: input.bibliographyPath,
    }),
  );
  await dependencies.writeTextFile(
    resolvedAstJsonPath,
    `${JSON.stringify(parsePandocDocument(sourceAst), null, AST_JSON_INDENT)}\n`,
  );
}

function createDefaultDependencies(config: TexPandocConfig): ConvertTexDependencies {
  return {
    preprocess: preprocessLatexFile,
    runPandoc: (args: string[]) => runPandoc(config.pandocPath, args),
    writeTextFile: async (filePath: string, content: string) => {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, "utf8");
    },
    loadFilterContext,
  };
}
