import * as fs from "node:fs";
import type { ModuleSource } from "../../interfaces/IModuleProvider.js";
import { createModuleBinder, type TypeScriptHookBinder } from "../../semantic/hook-binder.js";
import { DEFAULT_CALL_ALIASES, DEFAULT_RECOGNIZED_TYPES } from "../../../utils/validation.js";
import type { ModuleCollectorOptions } from "../module-collector.js";

export const FRAMEWORK: ModuleSource = {
  name: "framework.d.ts",
  fileName: "framework.d.ts",
  text: fs.readFileSync(new URL("./fixtures/framework.d.ts", import.meta.url), "utf-8"),
};

export const OPTIONS: ModuleCollectorOptions = {
  recognizedTypes: new Set(DEFAULT_RECOGNIZED_TYPES),
  callAliases: new Set(DEFAULT_CALL_ALIASES),
  placeholderClassName: "UnknownClass",
};

export function moduleOf(name: string, text: string): ModuleSource {
  return { name, fileName: `${name}.ts`, text };
}

export function bind(text: string, name = "Plugin"): TypeScriptHookBinder {
  return createModuleBinder(moduleOf(name, text), [FRAMEWORK]);
}
