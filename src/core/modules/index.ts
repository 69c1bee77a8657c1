/**
 * Module Providers
 *
 * @module
 */

export {
  FileSystemModuleProvider,
  MODULE_PATTERNS,
  DECLARATION_PATTERNS,
} from "./fs-module-provider.js";
