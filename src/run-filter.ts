import type { TexPandocConfig } from "./config.ts";
import { filterPandocJson, loadFilterContext } from "./pandoc-filter.ts";

interface FilterStreamsInput {
  config: TexPandocConfig;
  input: AsyncIterable<string | Buffer>;
  output: { write: (chunk: string) => unknown };
}

/** Runs the filter as pandoc calls it: AST JSON on stdin, AST JSON on stdout. */
export async function runFilterOnStreams({ config, input, output }: FilterStreamsInput): Promise<void> {
  const json = await readAll(input);
  const context = await loadFilterContext(config);
  output.write(await filterPandocJson(json, context));
}

async function readAll(input: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}
