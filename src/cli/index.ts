#!/usr/bin/env node

import { logger } from "../logging/logger.js";
import { runCli } from "./main.js";

const controller = new AbortController();
const SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

for (const signal of SIGNALS) {
  process.once(signal, () => {
    logger.warn(`Received ${signal}; stopping in-flight operations.`);
    controller.abort();
  });
}

const exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
process.exit(exitCode);
