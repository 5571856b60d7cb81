import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { createCommandError } from "./command-error.ts";

const execFileAsync = promisify(execFile);
const PANDOC_MAX_BUFFER_BYTES = 256 * 1024 * 1024;
const LATEX_INPUT_FORMAT = "latex+raw_tex";

interface PandocToJsonOptions {
  inputTexPath: string;
  resourceDir: string;
  bibliographyPath?: string;
}

interface PandocFromJsonOptions {
  inputJsonPath: string;
  outputPath: string;
  resourceDir: string;
  referenceDocPath?: string;
}

// Citations are processed here so the filter sees rendered citation text
// and the generated `refs` bibliography div.
export function buildPandocToJsonArgs({
  inputTexPath,
  resourceDir,
  bibliographyPath,
}: PandocToJsonOptions): string[] {
  return [
    "-s",
    inputTexPath,
    "-f",
    LATEX_INPUT_FORMAT,
    "--citeproc",
    ...(bibliographyPath === undefined ? [] : ["--bibliography", bibliographyPath]),
    "--resource-path",
    resourceDir,
    "-t",
    "json",
  ];
}

export function buildPandocFromJsonArgs({
  inputJsonPath,
  outputPath,
  resourceDir,
  referenceDocPath,
}: PandocFromJsonOptions): string[] {
  return [
    "-s",
    inputJsonPath,
    "-f",
    "json",
    "--resource-path",
    resourceDir,
    ...(referenceDocPath === undefined ? [] : ["--reference-doc", referenceDocPath]),
    "-o",
    outputPath,
  ];
}

export async function runPandoc(pandocPath: string, args: string[]): Promise<string> {
  try {
    const { stdout } = await execFileAsync(pandocPath, args, {
      encoding: "utf8",
      maxBuffer: PANDOC_MAX_BUFFER_BYTES,
    });
    return stdout;
  } catch (error: unknown) {
    throw createCommandError(error, {
      command: pandocPath,
      installHint: "Install pandoc or set PANDOC_PATH.",
      failurePrefix: "pandoc failed",
    });
  }
}
