#!/usr/bin/env node
// src/cli.ts
import "dotenv/config";
import { loadConfig } from "./config.js";
import { errorDetails } from "./errors.js";
import { createPipelineDeps, runPipeline } from "./graph.js";
import { createLogger } from "./logger.js";

async function main() {
  // fails fast on missing credentials, before any stage runs
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const done = await runPipeline(createPipelineDeps(config, logger), { signal: controller.signal });
  process.stdout.write(`${done.report}\n`);
}

main().catch((e: unknown) => {
  createLogger().error("cli:error", errorDetails(e));
  process.exitCode = 1;
});
