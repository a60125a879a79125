#!/usr/bin/env node
import { argv } from "node:process";
import { main } from "./cli.js";
import { getLogger } from "./utils/logger.js";

process.on("unhandledRejection", (reason: unknown) => {
  const logger = getLogger();
  logger.logError("Unhandled Promise Rejection", {
    reason: String(reason),
  });
  process.exit(1);
});

process.on("uncaughtException", (error: Error) => {
  const logger = getLogger();
  logger.logError("Uncaught Exception", {
    error: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

process.exitCode = await main(argv);
