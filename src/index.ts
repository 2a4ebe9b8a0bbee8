#!/usr/bin/env node
/**
 * Entry Point — shopee-cli
 *
 * Parses the command line and runs one command. Known client errors
 * (no session, expired session, anti-bot block, failed login) print their
 * message and exit with status 1.
 */
import { createProgram } from "./cli";
import { logger } from "./monitoring/logger";
import { ClientError } from "./shared/errors/client.errors";

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

process.on("SIGINT", () => {
  logger.info({ signal: "SIGINT" }, "Interrupted");
  process.exit(130);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

main().catch((error: unknown) => {
  if (error instanceof ClientError) {
    process.stderr.write(`Error: ${error.message}\n`);
    process.exit(1);
  }
  logger.fatal({ error: (error as Error).message }, "Command failed");
  process.exit(1);
});
