/**
 * Hook Extraction Types
 *
 * Records and intermediate values produced while scanning modules for hook
 * dispatch call sites.
 *
 * @module
 */

import type * as ts from "typescript";
import type { ErrorCode } from "../errors.js";

// =============================================================================
// Records
// =============================================================================

/**
 * A `type name` pair. Used for call-argument descriptors and for the
 * declared parameters of the enclosing function.
 */
export interface ParameterDescriptor {
  readonly type: string;
  readonly name: string;
}

/**
 * One extracted hook dispatch call site.
 */
export interface HookRecord {
  /** Literal hook name passed as the first argument */
  readonly hookName: string;
  /** `hookName(type name, ...)`; the per-module dedup key */
  readonly hookSignature: string;
  /** Effective enclosing function name (`Outer.local` for local functions) */
  readonly methodName: string;
  /** `methodName(type name, ...)` built from methodParameters */
  readonly methodSignature: string;
  /** Declared parameters of the enclosing function */
  readonly methodParameters: readonly ParameterDescriptor[];
  /** Source text of the enclosing function, leading comments and indentation included */
  readonly methodSourceCode: string;
  /** Nearest enclosing class */
  readonly methodClassName: string;
  /** 1-based line of the call within the enclosing function */
  readonly hookLineInvoke: number;
}

// =============================================================================
// Detection
// =============================================================================

/**
 * Accepted hook dispatch call.
 */
export interface DetectedHookCall {
  hookName: string;
  /** Call arguments after the hook name */
  remainingArguments: readonly ts.Expression[];
}

/**
 * Why a call expression is not a hook dispatch. Rejections are expected
 * and never reported to the user.
 */
export type RejectionReason =
  | "unresolved-receiver"
  | "unrecognized-type"
  | "not-a-call-alias"
  | "hook-name-not-literal"
  | "empty-hook-name";

/**
 * Sets the detector matches against.
 */
export interface HookDetectionOptions {
  /** Fully qualified names of recognized framework types */
  recognizedTypes: ReadonlySet<string>;
  /** Member names that dispatch a hook */
  callAliases: ReadonlySet<string>;
}

// =============================================================================
// Enclosing Context
// =============================================================================

/**
 * Function and class a hook call is attributed to.
 */
export interface EnclosingContext {
  methodName: string;
  methodSourceCode: string;
  methodClassName: string;
  methodParameters: ParameterDescriptor[];
  hookLineInvoke: number;
}

// =============================================================================
// Scan Results
// =============================================================================

/**
 * Records extracted from one module, in first-seen order.
 */
export interface ModuleScanResult {
  moduleName: string;
  records: HookRecord[];
  /** Number of call expressions visited */
  callsVisited: number;
}

/**
 * A module that could not be scanned.
 */
export interface ModuleFailure {
  moduleName: string;
  code: ErrorCode;
  message: string;
}

/**
 * Outcome of scanning a module set.
 */
export interface HookScanResult {
  /** Finalized catalog, deduplicated across modules */
  hooks: readonly HookRecord[];
  /** Per-module results in processing order */
  modules: ModuleScanResult[];
  failures: ModuleFailure[];
  /** Per-module records per enclosing class, counted before cross-module deduplication */
  hooksPerClass: Map<string, number>;
  durationMs: number;
}
