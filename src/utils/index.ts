/**
 * Shared utilities
 */

export * from "./logger.js";

export * from "./fs.js";

/** Configuration file looked up in the input directory */
export const CONFIG_FILE = "hookscan.config.json";
