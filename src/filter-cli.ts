#!/usr/bin/env -S node --import tsx

// Entry point for `pandoc --filter texpandoc-filter`: pandoc passes the
// target format as the only argument, so configuration comes from the
// TEXPANDOC_* environment variables.
import { loadConfig } from "./config.ts";
import { runFilterOnStreams } from "./run-filter.ts";

async function main(): Promise<void> {
  await runFilterOnStreams({
    config: loadConfig(),
    input: process.stdin,
    output: process.stdout,
  });
}

void main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
