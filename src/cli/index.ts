#!/usr/bin/env node
import { flush, run } from "@oclif/core";

import { createLoggerFacade } from "../shared/logging/logger.js";

const cliLogger = createLoggerFacade("cli", { command: process.argv.slice(2) });
cliLogger.info("cli invoked");

await run(undefined, import.meta.url);
await flush();
