/**
 * scan command - Extract hook call sites from a folder of plugin modules
 */

import * as path from "node:path";
import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/index.js";
import { GeneratorModeSchema, type GeneratorMode } from "../../utils/validation.js";
import { ConfigurationError, ErrorCode, ScanError } from "../../core/errors.js";
import { loadConfigFile } from "../../core/config/scan-config.js";
import { FileSystemModuleProvider } from "../../core/modules/index.js";
import { HookScanner, type HookScanResult } from "../../core/hooks/index.js";
import { copyModules, prepareOutputDirectory, writeHookCatalog } from "../../core/output/index.js";

const logger = createLogger("scan");

export interface ScanCommandOptions {
  input: string;
  output?: string;
  mode?: string;
  config?: string;
}

/**
 * Format duration in human readable format
 */
function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds % 60).toFixed(0)}s`;
}

function parseMode(value: string | undefined): GeneratorMode | undefined {
  if (value === undefined) return undefined;
  const parsed = GeneratorModeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Unknown mode "${value}". Expected one of: ${GeneratorModeSchema.options.join(", ")}`,
      ErrorCode.INVALID_ARGUMENT
    );
  }
  return parsed.data;
}

/**
 * Scan modules, write the hook catalog, print a summary
 */
export async function scanCommand(options: ScanCommandOptions): Promise<void> {
  logger.info({ options }, "Starting scan");

  const inputDir = path.resolve(options.input);
  const fileConfig = await loadConfigFile(inputDir, options.config);
  const mode = parseMode(options.mode) ?? fileConfig.mode ?? "full";
  const outputDir = path.resolve(options.output ?? fileConfig.output ?? "output");

  console.log();
  console.log(chalk.cyan.bold("Scanning Plugin Modules"));
  console.log(chalk.dim("─".repeat(40)));
  console.log();

  const spinner = ora("Loading modules...").start();

  try {
    const moduleSet = await new FileSystemModuleProvider(inputDir).load();
    if (moduleSet.modules.length === 0) {
      throw new ScanError(`No modules found in folder: ${inputDir}`, ErrorCode.SCAN_NO_MODULES);
    }

    spinner.text = "Preparing output directory...";
    const layout = await prepareOutputDirectory(outputDir, mode, inputDir);

    const scanner = new HookScanner({
      config: fileConfig,
      onModuleScanned: (moduleName, index, total) => {
        spinner.text = `Processing modules (${index + 1}/${total}) - ${moduleName}`;
      },
    });
    const result = scanner.scan(moduleSet);

    spinner.text = "Writing results...";
    await writeHookCatalog(result.hooks, layout.analysisDir);

    if (mode === "full") {
      await copyModules(
        moduleSet.modules.map((module) => module.fileName),
        layout
      );
    }

    if (result.failures.length > 0) {
      spinner.warn(chalk.yellow("Scan completed with warnings"));
    } else {
      spinner.succeed(chalk.green("Processing completed!"));
    }

    printSummary(result, outputDir, mode);
    logger.info({ hooks: result.hooks.length, failures: result.failures.length }, "Scan complete");
  } catch (error) {
    spinner.fail(chalk.red("Scan failed"));
    logger.error({ err: error }, "Scan failed");
    throw error;
  }
}

function printSummary(result: HookScanResult, outputDir: string, mode: GeneratorMode): void {
  for (const failure of result.failures) {
    console.log(
      chalk.yellow(`Warning while processing ${failure.moduleName}: [${failure.code}] ${failure.message}`)
    );
  }

  console.log();
  console.log(`Results saved in: ${outputDir}`);
  console.log(chalk.blue(`Hooks found: ${result.hooks.length}`));
  console.log(chalk.blue(`Mode: ${mode}`));
  console.log(chalk.dim(`Duration: ${formatDuration(result.durationMs)}`));

  if (result.hooksPerClass.size === 0) return;

  const width = Math.max(5, ...[...result.hooksPerClass.keys()].map((name) => name.length));
  console.log();
  console.log(chalk.white.bold(`  ${"Class".padEnd(width)}  Hooks`));
  console.log(chalk.dim(`  ${"─".repeat(width + 7)}`));
  for (const [className, count] of result.hooksPerClass) {
    console.log(`  ${chalk.cyan(className.padEnd(width))}  ${count}`);
  }
}
