/**
 * Module Hook Collector
 *
 * Walks one module in document order and keeps the first record seen for
 * each distinct hook signature.
 *
 * @module
 */

import * as ts from "typescript";
import type { IHookBinder } from "../interfaces/IHookBinder.js";
import { createChildLogger, createLogger, type Logger } from "../../utils/logger.js";
import { resolveArguments, buildSignature } from "./argument-resolver.js";
import { detectHookCall } from "./call-detector.js";
import { locateEnclosingContext } from "./enclosing-context.js";
import type { HookDetectionOptions, HookRecord, ModuleScanResult } from "./types.js";

const logger = createLogger("hook-collector");

export interface ModuleCollectorOptions extends HookDetectionOptions {
  placeholderClassName: string;
}

/**
 * Collects hook records from one module.
 *
 * @example
 * ```typescript
 * const collector = new ModuleHookCollector("Kits", binder, options);
 * const { records } = collector.collect();
 * ```
 */
export class ModuleHookCollector {
  private readonly records = new Map<string, HookRecord>();
  private callsVisited = 0;
  private readonly log: Logger;

  constructor(
    private readonly moduleName: string,
    private readonly binder: IHookBinder,
    private readonly options: ModuleCollectorOptions
  ) {
    this.log = createChildLogger(logger, { module: moduleName });
  }

  /**
   * Visits every call expression in pre-order. Safe to call once.
   */
  collect(): ModuleScanResult {
    const visit = (node: ts.Node): void => {
      if (ts.isCallExpression(node)) {
        this.visitCall(node);
      }
      ts.forEachChild(node, visit);
    };
    visit(this.binder.sourceFile);

    return {
      moduleName: this.moduleName,
      records: [...this.records.values()],
      callsVisited: this.callsVisited,
    };
  }

  private visitCall(call: ts.CallExpression): void {
    this.callsVisited++;

    try {
      const detected = detectHookCall(call, this.binder, this.options);
      if (!detected.ok) {
        this.log.trace({ reason: detected.error }, "Call skipped");
        return;
      }

      const { hookName, remainingArguments } = detected.value;
      const hookSignature = buildSignature(hookName, resolveArguments(remainingArguments, this.binder));
      if (this.records.has(hookSignature)) return;

      const context = locateEnclosingContext(call, this.binder, this.options.placeholderClassName);
      if (!context) {
        this.log.trace({ hookSignature }, "Hook call outside any function");
        return;
      }

      this.records.set(hookSignature, {
        hookName,
        hookSignature,
        methodName: context.methodName,
        methodSignature: buildSignature(context.methodName, context.methodParameters),
        methodParameters: context.methodParameters,
        methodSourceCode: context.methodSourceCode,
        methodClassName: context.methodClassName,
        hookLineInvoke: context.hookLineInvoke,
      });
    } catch (error) {
      this.log.trace({ err: error }, "Call site resolution failed");
    }
  }
}
