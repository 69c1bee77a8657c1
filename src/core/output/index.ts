/**
 * Output Module
 *
 * @module
 */

export {
  serializeHookRecord,
  writeHookCatalog,
  HOOKS_FILE,
  DEPRECATED_HOOKS_FILE,
  STRING_POOL_FILE,
} from "./hook-writer.js";

export {
  prepareOutputDirectory,
  copyModules,
  getOutputLayout,
  isWithinDirectory,
  ANALYSIS_DIR,
  MODULES_DIR,
  type OutputLayout,
} from "./output-workspace.js";
