import { describe, expect, it } from "vitest";

import {
  createFloatRegistry,
  lookupAutoref,
  numberFloats,
  resolveAutorefs,
} from "./float-numbering.ts";
import type { Block, Figure, Inline, PandocDocument, Table } from "./pandoc-types.ts";
import { emptyAttr, str } from "./pandoc-walk.ts";

function figure(identifier: string, caption: Inline[]): Figure {
  return { t: "Figure", c: [emptyAttr(identifier), [null, [{ t: "Plain", c: caption }]], []] };
}

function table(caption: Inline[]): Table {
  return {
    t: "Table",
    c: [emptyAttr(), [null, [{ t: "Plain", c: caption }]], [], [emptyAttr(), []], [], [emptyAttr(), []]],
  };
}

function autoref(target: string): Inline {
  return { t: "RawInline", c: ["latex", `\\autoref{${target}}`] };
}

function createDocument(blocks: Block[]): PandocDocument {
  return { "pandoc-api-version": [1, 23, 1], meta: {}, blocks };
}

function captionText(node: Block | undefined): string | undefined {
  if (node === undefined || (node.t !== "Figure" && node.t !== "Table")) return undefined;
  const [block] = node.c[1][1];
  if (block === undefined || block.t !== "Plain") return undefined;
  return block.c.map((inline) => (inline.t === "Str" ? inline.c : " ")).join("");
}

describe("numberFloats", () => {
  it("numbers figures and tables independently in document order", () => {
    const registry = createFloatRegistry();
    const doc = createDocument([
      figure("fig:first", [str("First")]),
      { t: "Div", c: [emptyAttr("tab:results"), [table([str("Results")])]] },
      figure("fig:second", [str("My"), { t: "Space" }, str("Plot")]),
    ]);

    numberFloats(doc, registry);

    expect(captionText(doc.blocks[0])).toBe("Figure 1: First");
    expect(captionText(doc.blocks[2])).toBe("Figure 2: My Plot");
    const wrapper = doc.blocks[1];
    expect(wrapper?.t === "Div" ? captionText(wrapper.c[1][0]) : undefined).toBe(
      "Table 1: Results",
    );
    expect([...registry.figures]).toEqual([
      ["fig:first", "Figure 1"],
      ["fig:second", "Figure 2"],
    ]);
    expect([...registry.tables]).toEqual([["tab:results", "Table 1"]]);
  });

  it("takes table identifiers from the parent block only", () => {
    const registry = createFloatRegistry();
    const ownIdentifier = table([str("Own")]);
    ownIdentifier.c[0] = emptyAttr("tab:own");

    numberFloats(createDocument([ownIdentifier, table([str("Second")])]), registry);

    expect(registry.tableCount).toBe(2);
    expect(registry.tables.size).toBe(0);
    expect(captionText(ownIdentifier)).toBe("Table 1: Own");
  });

  it("keeps the first number of a repeated identifier", () => {
    const registry = createFloatRegistry();

    numberFloats(
      createDocument([figure("fig:same", [str("A")]), figure("fig:same", [str("B")])]),
      registry,
    );

    expect(registry.figures.get("fig:same")).toBe("Figure 1");
    expect(registry.figureCount).toBe(2);
  });

  it("numbers figures without caption text", () => {
    const registry = createFloatRegistry();
    const empty = figure("fig:empty", []);

    numberFloats(createDocument([empty]), registry);

    expect(captionText(empty)).toBe("");
    expect(registry.figures.get("fig:empty")).toBe("Figure 1");
  });

  it("only prefixes the first text of a caption", () => {
    const registry = createFloatRegistry();
    const emphasized = figure("fig:emph", [
      { t: "Emph", c: [str("Noisy")] },
      { t: "Space" },
      str("data"),
    ]);

    numberFloats(createDocument([emphasized]), registry);

    expect(emphasized.c[1][1]).toEqual([
      {
        t: "Plain",
        c: [{ t: "Emph", c: [str("Figure 1: Noisy")] }, { t: "Space" }, str("data")],
      },
    ]);
  });
});

describe("resolveAutorefs", () => {
  it("replaces references to numbered floats, including forward references", () => {
    const registry = createFloatRegistry();
    const doc = createDocument([
      { t: "Para", c: [autoref("fig:later"), { t: "Space" }, autoref("tab:data")] },
      figure("fig:later", [str("Later")]),
      { t: "Div", c: [emptyAttr("tab:data"), [table([str("Data")])]] },
    ]);

    resolveAutorefs(numberFloats(doc, registry), registry);

    expect(doc.blocks[0]).toEqual({
      t: "Para",
      c: [str("Figure 1"), { t: "Space" }, str("Table 1")],
    });
  });

  it("leaves unresolved references as raw LaTeX", () => {
    const registry = createFloatRegistry();
    const doc = createDocument([
      { t: "Para", c: [autoref("fig:abc"), autoref("eq:energy"), autoref("sec:intro")] },
    ]);

    resolveAutorefs(doc, registry);

    expect(doc.blocks[0]).toEqual({
      t: "Para",
      c: [autoref("fig:abc"), autoref("eq:energy"), autoref("sec:intro")],
    });
  });
});

describe("lookupAutoref", () => {
  it("looks identifiers up by their float kind", () => {
    const registry = createFloatRegistry();
    registry.figures.set("fig:abc", "Figure 3");
    registry.tables.set("tab:abc", "Table 2");

    expect(lookupAutoref("\\autoref{fig:abc}", registry)).toBe("Figure 3");
    expect(lookupAutoref("\\autoref{tab:abc}", registry)).toBe("Table 2");
    expect(lookupAutoref("\\autoref{tab:missing}", registry)).toBeUndefined();
    expect(lookupAutoref("\\ref{fig:abc}", registry)).toBeUndefined();
  });
});
