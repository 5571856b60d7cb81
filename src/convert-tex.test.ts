import { dirname, join, resolve } from "node:path";
import { describe, expect, it, vi } from "vitest";

import type { TexPandocConfig } from "./config.ts";
import { convertTexDocument, getIntermediatePaths } from "./convert-tex.ts";
import { createFilterContext } from "./pandoc-filter.ts";

type Dependencies = NonNullable<Parameters<typeof convertTexDocument>[1]>;

const CONFIG: TexPandocConfig = {
  resourceDir: "paper",
  acronymsPath: "paper/acronyms.tex",
  rasterWidth: 1024,
  pandocPath: "pandoc",
};

const SOURCE_DOCUMENT = {
  "pandoc-api-version": [1, 23, 1],
  meta: {},
  blocks: [
    {
      t: "Para",
      c: [
        {
          t: "Span",
          c: [["", [], [["acronym-label", "TIL"], ["acronym-form", "singular+short"]]], [{ t: "Str", c: "TIL" }]],
        },
      ],
    },
  ],
};

const INPUT_TEX_PATH = resolve("/tmp/work/paper.tex");
const OUTPUT_PATH = resolve("/tmp/out/paper.docx");
const PREPROCESSED_TEX_PATH = join(dirname(OUTPUT_PATH), "paper_pandoc.tex");
const FILTERED_JSON_PATH = join(dirname(OUTPUT_PATH), "paper_pandoc.json");

describe("getIntermediatePaths", () => {
  it("places intermediate files beside the output", () => {
    expect(getIntermediatePaths(INPUT_TEX_PATH, OUTPUT_PATH)).toEqual({
      preprocessedTexPath: PREPROCESSED_TEX_PATH,
      filteredJsonPath: FILTERED_JSON_PATH,
    });
  });
});

describe("convertTexDocument", () => {
  it("preprocesses, converts to JSON, filters and writes the output", async () => {
    const dependencies = createDependencies();

    const result = await convertTexDocument(
      {
        inputTexPath: INPUT_TEX_PATH,
        outputPath: OUTPUT_PATH,
        config: CONFIG,
        bibliographyPath: "refs.bib",
        referenceDocPath: "template.docx",
      },
      dependencies,
    );

    expect(result).toEqual({
      outputPath: OUTPUT_PATH,
      preprocessedTexPath: PREPROCESSED_TEX_PATH,
      filteredJsonPath: FILTERED_JSON_PATH,
    });
    expect(dependencies.preprocess).toHaveBeenCalledWith({
      inputTexPath: INPUT_TEX_PATH,
      outputTexPath: PREPROCESSED_TEX_PATH,
    });
    expect(vi.mocked(dependencies.runPandoc).mock.calls).toEqual([
      [
        [
          "-s",
          PREPROCESSED_TEX_PATH,
          "-f",
          "latex+raw_tex",
          "--citeproc",
          "--bibliography",
          "refs.bib",
          "--resource-path",
          "paper",
          "-t",
          "json",
        ],
      ],
      [
        [
          "-s",
          FILTERED_JSON_PATH,
          "-f",
          "json",
          "--resource-path",
          "paper",
          "--reference-doc",
          "template.docx",
          "-o",
          OUTPUT_PATH,
        ],
      ],
    ]);
    expect(dependencies.loadFilterContext).toHaveBeenCalledWith(CONFIG);

    const [writtenPath, writtenJson] = vi.mocked(dependencies.writeTextFile).mock.calls[0] ?? [];
    expect(writtenPath).toBe(FILTERED_JSON_PATH);
    expect(JSON.parse(writtenJson ?? "")).toEqual({
      ...SOURCE_DOCUMENT,
      blocks: [
        {
          t: "Para",
          c: [{ t: "Span", c: [["", [], []], [{ t: "Str", c: "test input label (TIL)" }]] }],
        },
      ],
    });
  });

  it("dumps the pretty-printed source AST when requested", async () => {
    const dependencies = createDependencies();
    const astJsonPath = resolve("/tmp/out/paper.ast.json");

    const result = await convertTexDocument(
      { inputTexPath: INPUT_TEX_PATH, outputPath: OUTPUT_PATH, config: CONFIG, astJsonPath },
      dependencies,
    );

    expect(result.astJsonPath).toBe(astJsonPath);
    expect(vi.mocked(dependencies.runPandoc).mock.calls[2]).toEqual([
      [
        "-s",
        INPUT_TEX_PATH,
        "-f",
        "latex+raw_tex",
        "--citeproc",
        "--resource-path",
        "paper",
        "-t",
        "json",
      ],
    ]);
    expect(dependencies.writeTextFile).toHaveBeenLastCalledWith(
      astJsonPath,
      `${JSON.stringify(SOURCE_DOCUMENT, null, 4)}\n`,
    );
  });

  it("stops when pandoc fails", async () => {
    const dependencies = createDependencies({
      runPandoc: vi.fn(async () => {
        throw new Error("pandoc failed: Error at \"source\" (line 3, column 1)");
      }),
    });

    await expect(
      convertTexDocument(
        { inputTexPath: INPUT_TEX_PATH, outputPath: OUTPUT_PATH, config: CONFIG },
        dependencies,
      ),
    ).rejects.toThrow("pandoc failed: Error at \"source\" (line 3, column 1)");
    expect(dependencies.writeTextFile).not.toHaveBeenCalled();
  });
});

function createDependencies(overrides: Partial<Dependencies> = {}): Dependencies {
  return {
    preprocess: vi.fn(async () => undefined),
    runPandoc: vi.fn(async (args: string[]) =>
      args[args.length - 1] === "json" ? JSON.stringify(SOURCE_DOCUMENT) : "",
    ),
    writeTextFile: vi.fn(async () => {}),
    loadFilterContext: vi.fn(async () =>
      createFilterContext({
        acronymDefinitions: new Map([["TIL", "test input label"]]),
        resourceDir: CONFIG.resourceDir,
        rasterizer: {
          fileExists: vi.fn(async () => true),
          runPdftoppm: vi.fn(async () => {}),
          log: vi.fn(),
        },
        warn: vi.fn(),
      }),
    ),
    ...overrides,
  };
}
