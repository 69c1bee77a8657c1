/**
 * Hook Extraction Module
 *
 * @module
 */

export * from "./types.js";
export { detectHookCall, isRecognizedType } from "./call-detector.js";
export { resolveArguments, buildSignature } from "./argument-resolver.js";
export {
  normalizeParameterName,
  UNKNOWN_TYPE,
  FALLBACK_PARAMETER_NAME,
} from "./parameter-naming.js";
export {
  locateEnclosingContext,
  describeDeclaredParameters,
  isLocalFunction,
  isNamedFunction,
  type NamedFunction,
} from "./enclosing-context.js";
export { ModuleHookCollector, type ModuleCollectorOptions } from "./module-collector.js";
export { HookCatalog, recordKey, countHooksPerClass } from "./catalog.js";
export { HookScanner, createHookScanner, type HookScannerOptions } from "./scanner.js";
