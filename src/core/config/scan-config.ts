/**
 * Scan Configuration Loader
 *
 * @module
 */

import * as path from "node:path";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { CONFIG_FILE } from "../../utils/index.js";
import { pathExists, readTextFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import {
  ConfigFileSchema,
  formatZodError,
  safeValidate,
  type ConfigFile,
} from "../../utils/validation.js";

const logger = createLogger("config");

/**
 * Loads the configuration file: the explicit path if given, otherwise
 * `hookscan.config.json` in the input directory when present. Defaults
 * apply for anything the file leaves out.
 *
 * @throws ConfigurationError if an explicit file is missing, or a file is not valid
 */
export async function loadConfigFile(
  inputDir: string,
  explicitPath?: string
): Promise<ConfigFile> {
  const configPath = explicitPath ?? path.join(inputDir, CONFIG_FILE);

  if (!(await pathExists(configPath))) {
    if (explicitPath) {
      throw new ConfigurationError(`Config file not found: ${explicitPath}`, ErrorCode.CONFIGURATION_ERROR, {
        configPath,
      });
    }
    return ConfigFileSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readTextFile(configPath));
  } catch (error) {
    throw new ConfigurationError(
      `Config file is not valid JSON: ${configPath}`,
      ErrorCode.CONFIGURATION_ERROR,
      { configPath, cause: error instanceof Error ? error.message : String(error) }
    );
  }

  const result = safeValidate(ConfigFileSchema, raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.CONFIGURATION_ERROR,
      { configPath }
    );
  }

  logger.debug({ configPath }, "Config file loaded");
  return result.data;
}
