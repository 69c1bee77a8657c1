/**
 * Core module - hook extraction engine and its collaborators
 */

export * from "./errors.js";

export * from "./interfaces/index.js";
export * from "./semantic/index.js";
export * from "./hooks/index.js";
export * from "./modules/index.js";
export * from "./output/index.js";
export { loadConfigFile } from "./config/scan-config.js";

export * from "../types/result.js";
