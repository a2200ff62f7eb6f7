#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";

const cfg = loadConfig();
const logger = createLogger({ level: cfg.logLevel, pretty: cfg.logPretty });

createProgram(cfg, logger)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error: ${message}`);
    process.exit(1);
  });
