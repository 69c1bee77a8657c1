/**
 * Output Workspace
 *
 * Prepares the output directory for a generator mode and places the
 * scanned modules next to the analysis files.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { GeneratorMode } from "../../utils/validation.js";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { copyFilesInto, ensureDirectory, isDirectory, removeDirectory } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("output-workspace");

export const ANALYSIS_DIR = ".hookscan";
export const MODULES_DIR = "modules";

export interface OutputLayout {
  outputDir: string;
  analysisDir: string;
  modulesDir: string;
}

export function getOutputLayout(outputDir: string): OutputLayout {
  return {
    outputDir,
    analysisDir: path.join(outputDir, ANALYSIS_DIR),
    modulesDir: path.join(outputDir, MODULES_DIR),
  };
}

/**
 * True when `target` is `dir` itself or lies below it.
 */
export function isWithinDirectory(target: string, dir: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(target));
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * `full` starts from an empty output directory; `update-only` requires the
 * directory to exist and leaves its contents alone. In `full` mode the input
 * directory must not lie inside the output directory, which is about to be
 * removed.
 *
 * @throws ConfigurationError in update-only mode when the directory is missing,
 * or in full mode when the output directory contains the input
 */
export async function prepareOutputDirectory(
  outputDir: string,
  mode: GeneratorMode,
  inputDir?: string
): Promise<OutputLayout> {
  const layout = getOutputLayout(outputDir);

  if (mode === "full" && inputDir !== undefined && isWithinDirectory(inputDir, outputDir)) {
    throw new ConfigurationError(
      `Input folder ${inputDir} is inside the output folder ${outputDir}, which full mode removes. ` +
        "Choose another output folder or use update-only mode.",
      ErrorCode.OUTPUT_CONTAINS_INPUT,
      { inputDir, outputDir }
    );
  }

  if (mode === "update-only") {
    if (!(await isDirectory(outputDir))) {
      throw new ConfigurationError(
        `Target directory not found: ${outputDir}. Use full mode to create a new project.`,
        ErrorCode.OUTPUT_DIRECTORY_MISSING,
        { outputDir }
      );
    }
  } else if (await isDirectory(outputDir)) {
    const entries = await fs.readdir(outputDir);
    if (entries.length > 0) {
      logger.info({ outputDir }, "Cleaning existing directory");
      await removeDirectory(outputDir);
    }
  }

  await ensureDirectory(layout.analysisDir);
  return layout;
}

/**
 * Replaces the output's module folder with copies of the scanned modules.
 */
export async function copyModules(files: string[], layout: OutputLayout): Promise<void> {
  await removeDirectory(layout.modulesDir);
  await copyFilesInto(files, layout.modulesDir);
  logger.debug({ modulesDir: layout.modulesDir, count: files.length }, "Modules copied");
}
