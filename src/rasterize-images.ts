import { execFile } from "node:child_process";
import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import { createCommandError } from "./command-error.ts";
import type { Image, PandocDocument } from "./pandoc-types.ts";
import { walkDocument } from "./pandoc-walk.ts";

const execFileAsync = promisify(execFile);
const VECTOR_IMAGE_EXTENSION = ".pdf";
const RASTER_IMAGE_EXTENSION = ".png";
const WIDTH_ATTRIBUTE = "width";
export const DEFAULT_RASTER_WIDTH = 1024;

export interface RasterizeImagesOptions {
  resourceDir: string;
  rasterWidth?: number;
}

export interface RasterizeImagesDependencies {
  fileExists: (filePath: string) => Promise<boolean>;
  runPdftoppm: (args: string[]) => Promise<void>;
  log: (message: string) => void;
}

export function rasterUrlFor(url: string): string {
  return `${url.slice(0, -VECTOR_IMAGE_EXTENSION.length)}${RASTER_IMAGE_EXTENSION}`;
}

export function buildPdftoppmArgs(
  inputPdfPath: string,
  outputPrefixPath: string,
  rasterWidth = DEFAULT_RASTER_WIDTH,
): string[] {
  return ["-scale-to", `${rasterWidth}`, "-png", "-singlefile", inputPdfPath, outputPrefixPath];
}

export function collectImages(doc: PandocDocument): Image[] {
  const images: Image[] = [];
  walkDocument(doc, {
    inline: (node) => {
      if (node.t === "Image") images.push(node);
      return undefined;
    },
  });
  return images;
}

/**
 * Points every PDF image at a PNG rendering beside it, creating the PNG
 * with pdftoppm when it does not exist yet, and drops explicit widths so
 * images fill the page width.
 */
export async function rasterizeImages(
  doc: PandocDocument,
  { resourceDir, rasterWidth = DEFAULT_RASTER_WIDTH }: RasterizeImagesOptions,
  dependencies?: RasterizeImagesDependencies,
): Promise<PandocDocument> {
  if (!Number.isInteger(rasterWidth) || rasterWidth <= 0) {
    throw new Error("Raster width must be a positive integer.");
  }

  const resolvedDependencies = dependencies ?? createDefaultDependencies();

  for (const image of collectImages(doc)) {
    const [attributes, , target] = image.c;
    const url = target[0];
    resolvedDependencies.log(`Rasterizing ${url}`);

    if (url.endsWith(VECTOR_IMAGE_EXTENSION)) {
      const rasterUrl = rasterUrlFor(url);
      if (!(await resolvedDependencies.fileExists(join(resourceDir, rasterUrl)))) {
        try {
          await resolvedDependencies.runPdftoppm(
            buildPdftoppmArgs(
              join(resourceDir, url),
              join(resourceDir, url.slice(0, -VECTOR_IMAGE_EXTENSION.length)),
              rasterWidth,
            ),
          );
        } catch (error: unknown) {
          throw createCommandError(error, {
            command: "pdftoppm",
            installHint: "Install poppler to enable PDF image rasterization.",
            failurePrefix: `Failed to rasterize ${url}`,
          });
        }
      }
      target[0] = rasterUrl;
    }

    attributes[2] = attributes[2].filter(([key]) => key !== WIDTH_ATTRIBUTE);
  }

  return doc;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

function createDefaultDependencies(): RasterizeImagesDependencies {
  return {
    fileExists,
    runPdftoppm: async (args: string[]) => {
      await execFileAsync("pdftoppm", args);
    },
    log: (message: string) => console.error(message),
  };
}
