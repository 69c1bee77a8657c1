/**
 * Semantic Analysis Module
 *
 * Binds modules with the TypeScript Compiler API.
 *
 * @module
 */

export {
  ModuleProgramFactory,
  MODULE_COMPILER_OPTIONS,
  getStartLine,
  type ModuleProgram,
} from "./ts-program.js";

export {
  TypeScriptHookBinder,
  TypeScriptBoundType,
  createModuleBinder,
} from "./hook-binder.js";
