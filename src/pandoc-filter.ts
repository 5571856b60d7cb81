import { createAcronymState, loadAcronyms, resolveAcronyms } from "./acronyms.ts";
import type { AcronymState } from "./acronyms.ts";
import { addCitationSpacing } from "./citation-spacing.ts";
import type { TexPandocConfig } from "./config.ts";
import { createFloatRegistry, numberFloats, resolveAutorefs } from "./float-numbering.ts";
import type { FloatRegistry } from "./float-numbering.ts";
import type { PandocDocument } from "./pandoc-types.ts";
import { rasterizeImages } from "./rasterize-images.ts";
import type { RasterizeImagesDependencies, RasterizeImagesOptions } from "./rasterize-images.ts";
import { addReferencesHeading } from "./references-heading.ts";
import { fixSiRanges } from "./si-range.ts";

/** State for one conversion run; every transform reads and updates it. */
export interface FilterContext {
  acronyms: AcronymState;
  floats: FloatRegistry;
  images: RasterizeImagesOptions;
  rasterizer?: RasterizeImagesDependencies;
}

export interface CreateFilterContextInput {
  acronymDefinitions: ReadonlyMap<string, string>;
  resourceDir: string;
  rasterWidth?: number;
  rasterizer?: RasterizeImagesDependencies;
  warn?: (message: string) => void;
}

type FilterStep = (doc: PandocDocument, context: FilterContext) => Promise<PandocDocument> | PandocDocument;

// Each step walks the whole tree before the next starts, so every float is
// numbered before any \autoref is resolved.
const FILTER_STEPS: readonly FilterStep[] = [
  (doc, context) => resolveAcronyms(doc, context.acronyms),
  (doc) => addCitationSpacing(doc),
  (doc, context) => numberFloats(doc, context.floats),
  (doc, context) => resolveAutorefs(doc, context.floats),
  (doc, context) => rasterizeImages(doc, context.images, context.rasterizer),
  (doc) => fixSiRanges(doc),
  (doc) => addReferencesHeading(doc),
];

export function createFilterContext(input: CreateFilterContextInput): FilterContext {
  return {
    acronyms: createAcronymState(input.acronymDefinitions, input.warn),
    floats: createFloatRegistry(),
    images: { resourceDir: input.resourceDir, rasterWidth: input.rasterWidth },
    rasterizer: input.rasterizer,
  };
}

export async function loadFilterContext(
  config: Pick<TexPandocConfig, "acronymsPath" | "resourceDir" | "rasterWidth">,
): Promise<FilterContext> {
  return createFilterContext({
    acronymDefinitions: await loadAcronyms(config.acronymsPath),
    resourceDir: config.resourceDir,
    rasterWidth: config.rasterWidth,
  });
}

export async function runPandocFilter(
  doc: PandocDocument,
  context: FilterContext,
): Promise<PandocDocument> {
  let current = doc;
  for (const step of FILTER_STEPS) {
    current = await step(current, context);
  }
  return current;
}

export async function filterPandocJson(json: string, context: FilterContext): Promise<string> {
  const filtered = await runPandocFilter(parsePandocDocument(json), context);
  return JSON.stringify(filtered);
}

export function parsePandocDocument(json: string): PandocDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new Error(`Invalid pandoc JSON: ${message}`);
  }

  if (!isPandocDocument(parsed)) {
    throw new Error("Invalid pandoc JSON: expected pandoc-api-version, meta and blocks.");
  }
  return parsed;
}

function isPandocDocument(value: unknown): value is PandocDocument {
  if (typeof value !== "object" || value === null) return false;
  if (!("pandoc-api-version" in value) || !Array.isArray(value["pandoc-api-version"])) {
    return false;
  }
  if (!("meta" in value) || typeof value.meta !== "object" || value.meta === null) return false;
  return "blocks" in value && Array.isArray(value.blocks);
}
