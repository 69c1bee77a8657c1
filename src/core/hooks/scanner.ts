/**
 * Hook Scanner
 *
 * Scans a module set: each module is parsed, bound and walked to
 * completion before the next begins. A module that fails is reported and
 * skipped; the catalog keeps what the other modules produced.
 *
 * @module
 */

import type { ModuleSet, ModuleSource } from "../interfaces/IModuleProvider.js";
import { ModuleProgramFactory } from "../semantic/ts-program.js";
import { TypeScriptHookBinder } from "../semantic/hook-binder.js";
import { ScanConfigSchema, type ScanConfig } from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";
import { ErrorCode, toHookScanError } from "../errors.js";
import { HookCatalog, countHooksPerClass } from "./catalog.js";
import { ModuleHookCollector, type ModuleCollectorOptions } from "./module-collector.js";
import type { HookScanResult, ModuleFailure, ModuleScanResult } from "./types.js";

const logger = createLogger("hook-scanner");

export interface HookScannerOptions {
  config?: Partial<ScanConfig>;
  /** Called after each module, whether it succeeded or not */
  onModuleScanned?: (moduleName: string, index: number, total: number) => void;
}

/**
 * @example
 * ```typescript
 * const scanner = new HookScanner();
 * const result = scanner.scan({ modules, declarations });
 * console.log(`${result.hooks.length} hooks`);
 * ```
 */
export class HookScanner {
  private readonly collectorOptions: ModuleCollectorOptions;

  constructor(private readonly options: HookScannerOptions = {}) {
    const config = ScanConfigSchema.parse(options.config ?? {});
    this.collectorOptions = {
      recognizedTypes: new Set(config.recognizedTypes),
      callAliases: new Set(config.callAliases),
      placeholderClassName: config.placeholderClassName,
    };
  }

  /**
   * Scans all modules, then merges their records into one catalog.
   */
  scan(moduleSet: ModuleSet): HookScanResult {
    const startTime = Date.now();
    const factory = new ModuleProgramFactory(moduleSet.declarations);
    const modules: ModuleScanResult[] = [];
    const failures: ModuleFailure[] = [];
    const total = moduleSet.modules.length;

    moduleSet.modules.forEach((module, index) => {
      try {
        modules.push(this.scanModule(module, factory));
      } catch (error) {
        const failure = toHookScanError(error, ErrorCode.SCAN_MODULE_FAILED);
        logger.warn({ module: module.name, code: failure.code, err: error }, "Failed to scan module");
        failures.push({ moduleName: module.name, code: failure.code, message: failure.message });
      }
      this.options.onModuleScanned?.(module.name, index, total);
    });

    // All module results are in; only now merge across modules
    const catalog = new HookCatalog();
    for (const result of modules) {
      catalog.append(result.records);
    }
    const hooks = catalog.finalize();

    logger.info(
      { modules: modules.length, failed: failures.length, hooks: hooks.length },
      "Scan complete"
    );

    return {
      hooks,
      modules,
      failures,
      hooksPerClass: countHooksPerClass(modules.flatMap((result) => result.records)),
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Scans one module.
   *
   * @throws ParsingError if the module cannot be parsed
   */
  scanModule(
    module: ModuleSource,
    factory: ModuleProgramFactory = new ModuleProgramFactory()
  ): ModuleScanResult {
    const { typeChecker, sourceFile } = factory.createProgram(module);
    const binder = new TypeScriptHookBinder(typeChecker, sourceFile);
    const result = new ModuleHookCollector(module.name, binder, this.collectorOptions).collect();

    logger.debug(
      { module: module.name, calls: result.callsVisited, hooks: result.records.length },
      "Module scanned"
    );
    return result;
  }
}

export function createHookScanner(options?: HookScannerOptions): HookScanner {
  return new HookScanner(options);
}
