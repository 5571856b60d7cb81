import type { Caption, PandocDocument } from "./pandoc-types.ts";
import { findFirstStr, identifierOf, str, walkDocument } from "./pandoc-walk.ts";

const AUTOREF_PATTERN = /^\\autoref\{(...):(.*)\}/u;

export interface FloatRegistry {
  figures: Map<string, string>;
  tables: Map<string, string>;
  figureCount: number;
  tableCount: number;
}

export function createFloatRegistry(): FloatRegistry {
  return { figures: new Map(), tables: new Map(), figureCount: 0, tableCount: 0 };
}

/**
 * Numbers figures and tables in document order and prefixes their
 * captions. A labelled LaTeX table reaches the AST as a `Div` carrying
 * the label around the `Table`, so table identifiers are read from the
 * parent node.
 */
export function numberFloats(doc: PandocDocument, registry: FloatRegistry): PandocDocument {
  return walkDocument(doc, {
    block: (node, parent) => {
      if (node.t === "Figure") {
        registry.figureCount += 1;
        const label = `Figure ${registry.figureCount}`;
        registerFloat(registry.figures, node.c[0][0], label);
        prefixCaption(node.c[1], label);
      } else if (node.t === "Table") {
        registry.tableCount += 1;
        const label = `Table ${registry.tableCount}`;
        registerFloat(registry.tables, identifierOf(parent) ?? "", label);
        prefixCaption(node.c[1], label);
      }
      return undefined;
    },
  });
}

export function resolveAutorefs(doc: PandocDocument, registry: FloatRegistry): PandocDocument {
  return walkDocument(doc, {
    inline: (node) => {
      if (node.t !== "RawInline") return undefined;
      const label = lookupAutoref(node.c[1], registry);
      return label === undefined ? undefined : str(label);
    },
  });
}

export function lookupAutoref(rawText: string, registry: FloatRegistry): string | undefined {
  const match = AUTOREF_PATTERN.exec(rawText);
  if (!match) return undefined;
  const floatType = match[1];
  const identifier = `${floatType}:${match[2]}`;
  if (floatType === "fig") return registry.figures.get(identifier);
  if (floatType === "tab") return registry.tables.get(identifier);
  return undefined;
}

function registerFloat(floats: Map<string, string>, identifier: string, label: string): void {
  if (identifier.length === 0 || floats.has(identifier)) return;
  floats.set(identifier, label);
}

function prefixCaption(caption: Caption, label: string): void {
  const first = findFirstStr(caption[1]);
  if (first !== undefined) {
    first.c = `${label}: ${first.c}`;
  }
}
