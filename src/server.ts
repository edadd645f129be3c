// src/server.ts
import "dotenv/config";
import { createApp, createReportHandler } from "./app.js";
import { loadConfig } from "./config.js";
import { errorDetails } from "./errors.js";
import { createPipelineDeps, runPipeline } from "./graph.js";
import { createLogger } from "./logger.js";

try {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const deps = createPipelineDeps(config, logger);

  const app = createApp(createReportHandler(() => runPipeline(deps), logger));
  app.listen(config.port, () => {
    logger.info("server:ready", { port: config.port });
  });
} catch (e) {
  createLogger().error("server:error", errorDetails(e));
  process.exit(1);
}
