/**
 * Core Interfaces Module
 *
 * Contracts between the extraction engine and its collaborators.
 *
 * @module
 */

// Semantic binder interface
export type { IHookBinder, BoundType } from "./IHookBinder.js";

// Module provider interface
export type { IModuleProvider, ModuleSource, ModuleSet } from "./IModuleProvider.js";
