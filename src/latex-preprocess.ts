import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { assertReadableFile } from "./file-access.ts";
import { applySubstitutionRules, MACRO_SUBSTITUTION_RULES } from "./macro-rules.ts";
import type { SubstitutionRule } from "./macro-rules.ts";

const AUTHOR_DECLARATION_PATTERN = /\\author\[(.*)\]\{(.*)\}/u;
const AFFILIATION_DECLARATION_PATTERN = /\\affil\[(.*)\]\{(.*)\}/u;
const TITLE_MARKER = "\\maketitle";

interface PreprocessLatexFileInput {
  inputTexPath: string;
  outputTexPath: string;
}

interface PreprocessLatexFileResult {
  outputTexPath: string;
  lineCount: number;
}

interface Byline {
  authors: string[];
  affiliations: string[];
}

export async function preprocessLatexFile(
  input: PreprocessLatexFileInput,
): Promise<PreprocessLatexFileResult> {
  const resolvedInputTexPath = resolve(input.inputTexPath);
  const resolvedOutputTexPath = resolve(input.outputTexPath);

  await assertReadableFile(resolvedInputTexPath);

  const source = await readFile(resolvedInputTexPath, "utf8");
  const rewritten = rewriteLatexSource(source);

  await mkdir(dirname(resolvedOutputTexPath), { recursive: true });
  await writeFile(resolvedOutputTexPath, rewritten, "utf8");

  return {
    outputTexPath: resolvedOutputTexPath,
    lineCount: countLines(rewritten),
  };
}

export function rewriteLatexSource(
  source: string,
  rules: readonly SubstitutionRule[] = MACRO_SUBSTITUTION_RULES,
): string {
  const byline: Byline = { authors: [], affiliations: [] };
  const output: string[] = [];

  for (const line of splitSourceLines(source)) {
    const author = AUTHOR_DECLARATION_PATTERN.exec(line);
    if (author) {
      byline.authors.push(`${author[2]}$^{${author[1]}}$`);
      continue;
    }

    const affiliation = AFFILIATION_DECLARATION_PATTERN.exec(line);
    if (affiliation) {
      byline.affiliations.push(`$^{${affiliation[1]}}$${affiliation[2]}`);
      continue;
    }

    if (line.trim() === TITLE_MARKER) {
      output.push(renderByline(byline));
    }

    output.push(`${applySubstitutionRules(line, rules).trim()}\n`);
  }

  return output.join("");
}

export function renderByline({ authors, affiliations }: Byline): string {
  return [
    // Authors share the first line, comma-separated; affiliations get a line each.
    `\\author{${authors.join(", ")}\\\\\n`,
    `${affiliations.join("\\\\\n")}}\n`,
  ].join("");
}

function splitSourceLines(source: string): string[] {
  if (source.length === 0) return [];
  const lines = source.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function countLines(text: string): number {
  return text.split("\n").length - 1;
}
