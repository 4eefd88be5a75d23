#!/usr/bin/env tsx
/**
 * @tollgate/cli — Entry point.
 *
 * Loads `.env` and config, builds the root logger and runs the
 * reconciliation. Exits non-zero when any call failed or mismatched.
 */

import "dotenv/config";
import pino from "pino";
import { loadConfig } from "./config.js";
import { runCli } from "./run.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  logger.info(
    { sandbox: config.SANDBOX, calls: config.CALL_PARAMS.length },
    "Tollgate run started",
  );
  const exitCode = await runCli({ config, logger });
  logger.info({ exitCode }, "Tollgate run finished");
  return exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    process.exit(1);
  },
);
