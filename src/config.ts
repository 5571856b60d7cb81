import { join } from "node:path";
import { DEFAULT_RASTER_WIDTH } from "./rasterize-images.ts";

const DEFAULT_RESOURCE_DIR = "paper";
const DEFAULT_ACRONYMS_FILE_NAME = "acronyms.tex";
const DEFAULT_PANDOC_PATH = "pandoc";

export interface TexPandocConfig {
  resourceDir: string;
  acronymsPath: string;
  rasterWidth: number;
  pandocPath: string;
}

export interface TexPandocConfigOverrides {
  resourceDir?: string;
  acronymsPath?: string;
  rasterWidth?: string;
}

/** Command-line values win over `TEXPANDOC_*` environment variables. */
export function loadConfig(
  overrides: TexPandocConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): TexPandocConfig {
  const resourceDir = overrides.resourceDir ?? env.TEXPANDOC_RESOURCE_PATH ?? DEFAULT_RESOURCE_DIR;
  const acronymsPath =
    overrides.acronymsPath ??
    env.TEXPANDOC_ACRONYMS ??
    join(resourceDir, DEFAULT_ACRONYMS_FILE_NAME);

  return {
    resourceDir,
    acronymsPath,
    rasterWidth: parseRasterWidth(overrides.rasterWidth ?? env.TEXPANDOC_RASTER_WIDTH),
    pandocPath: env.PANDOC_PATH ?? DEFAULT_PANDOC_PATH,
  };
}

export function parseRasterWidth(value: string | undefined): number {
  if (value === undefined || value.trim().length === 0) return DEFAULT_RASTER_WIDTH;
  const width = Number(value);
  if (!Number.isInteger(width) || width <= 0) {
    throw new Error("Raster width must be a positive integer.");
  }
  return width;
}
