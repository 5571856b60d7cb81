import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";

import { runFilterOnStreams } from "./run-filter.ts";

describe("runFilterOnStreams", () => {
  it("reads the AST from the input stream and writes the filtered AST", async () => {
    const document = {
      "pandoc-api-version": [1, 23, 1],
      meta: {},
      blocks: [
        {
          t: "Para",
          c: [
            {
              t: "Span",
              c: [["", [], [["acronym-label", "MEG"], ["acronym-form", "singular+short"]]], [{ t: "Str", c: "MEG" }]],
            },
          ],
        },
      ],
    };
    const json = JSON.stringify(document);
    const written: string[] = [];

    await runFilterOnStreams({
      config: {
        acronymsPath: "data/acronyms.tex",
        resourceDir: "data",
        rasterWidth: 1024,
        pandocPath: "pandoc",
      },
      input: Readable.from([Buffer.from(json.slice(0, 20)), json.slice(20)]),
      output: { write: (chunk: string) => written.push(chunk) },
    });

    expect(written).toHaveLength(1);
    expect(JSON.parse(written[0] ?? "")).toEqual({
      "pandoc-api-version": [1, 23, 1],
      meta: {},
      blocks: [
        {
          t: "Para",
          c: [{ t: "Span", c: [["", [], []], [{ t: "Str", c: "magneto-encephalography (MEG)" }]] }],
        },
      ],
    });
  });

  it("fails when the acronym definitions are missing", async () => {
    await expect(
      runFilterOnStreams({
        config: {
          acronymsPath: "data/none.tex",
          resourceDir: "data",
          rasterWidth: 1024,
          pandocPath: "pandoc",
        },
        input: Readable.from(['{"pandoc-api-version":[1,23,1],"meta":{},"blocks":[]}']),
        output: { write: () => undefined },
      }),
    ).rejects.toThrow(/^Cannot read acronym definitions: /);
  });
});
