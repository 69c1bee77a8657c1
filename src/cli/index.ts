#!/usr/bin/env node

/**
 * hookscan CLI
 *
 * `hookscan scan -i <plugins>` writes .hookscan/hooks.json under the output
 * folder. Exit code 1 means the scan failed, 2 means it was asked for
 * something it cannot do (bad mode, missing config or target folder).
 */

import { Command } from "commander";
import chalk from "chalk";
import { scanCommand } from "./commands/scan.js";
import { createLogger } from "../utils/logger.js";
import { ConfigurationError, isHookScanError } from "../core/errors.js";

const logger = createLogger("cli");

function buildProgram(): Command {
  const program = new Command()
    .name("hookscan")
    .description("Extract hook dispatch call sites from game-framework plugin modules")
    .version("0.1.0")
    .configureOutput({
      writeErr: (str) => process.stderr.write(chalk.red(str)),
    });

  program
    .command("scan", { isDefault: true })
    .description("Scan a folder of plugin modules and write hooks.json")
    .requiredOption("-i, --input <dir>", "folder with the plugin modules and framework .d.ts files")
    .option("-o, --output <dir>", "folder to save results (default: ./output)")
    .option("-m, --mode <mode>", "full or update-only (default: full)")
    .option("-c, --config <file>", "path to a hookscan.config.json file")
    .action(scanCommand);

  return program;
}

function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? 2 : 1;
}

function handleError(error: unknown): never {
  if (isHookScanError(error)) {
    logger.error({ err: error, code: error.code }, "Scan aborted");
    console.error(chalk.red(`\nError: [${error.code}] ${error.message}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "Unexpected error");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG) console.error(chalk.dim(error.stack));
  } else {
    logger.error({ error }, "Unexpected non-error rejection");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(exitCodeFor(error));
}

process.on("unhandledRejection", handleError);
process.on("uncaughtException", handleError);

buildProgram().parseAsync(process.argv).catch(handleError);
