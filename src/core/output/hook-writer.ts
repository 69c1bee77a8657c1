/**
 * Hook Catalog Writer
 *
 * Serializes the finalized catalog into the analysis files read by the
 * plugin template's tooling.
 *
 * @module
 */

import * as path from "node:path";
import type { HookRecord } from "../hooks/types.js";
import { ErrorCode, OutputError } from "../errors.js";
import { writeTextFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import {
  SerializedHookRecordSchema,
  formatZodError,
  safeValidate,
  type SerializedHookRecord,
} from "../../utils/validation.js";

const logger = createLogger("hook-writer");

export const HOOKS_FILE = "hooks.json";
export const DEPRECATED_HOOKS_FILE = "deprecatedHooks.json";
export const STRING_POOL_FILE = "stringPool.json";

/**
 * Maps a record onto the hooks.json entry shape.
 *
 * @throws OutputError if the record does not fit the schema
 */
export function serializeHookRecord(record: HookRecord): SerializedHookRecord {
  const result = safeValidate(SerializedHookRecordSchema, {
    HookSignature: record.hookSignature,
    MethodSignature: record.methodSignature,
    MethodParameters: record.methodParameters.map((p) => ({ Type: p.type, Name: p.name })),
    MethodSourceCode: record.methodSourceCode,
    ClassName: record.methodClassName,
    HookLineInvoke: record.hookLineInvoke,
  });

  if (!result.success) {
    throw new OutputError(
      `Invalid hook record ${record.hookSignature}: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.OUTPUT_RECORD_INVALID
    );
  }
  return result.data;
}

/**
 * Writes hooks.json and resets the deprecated-hook and string-pool files.
 *
 * @returns Path of the written hooks.json
 */
export async function writeHookCatalog(
  hooks: readonly HookRecord[],
  analysisDir: string
): Promise<string> {
  const hooksPath = path.join(analysisDir, HOOKS_FILE);
  const serialized = hooks.map(serializeHookRecord);

  try {
    await writeTextFile(hooksPath, JSON.stringify(serialized, null, 2));
    await writeTextFile(path.join(analysisDir, DEPRECATED_HOOKS_FILE), "[]");
    await writeTextFile(path.join(analysisDir, STRING_POOL_FILE), "[]");
  } catch (error) {
    throw new OutputError(
      `Failed to write analysis files: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.OUTPUT_WRITE_FAILED,
      { filePath: hooksPath }
    );
  }

  logger.info({ hooksPath, hooks: serialized.length }, "Hook catalog written");
  return hooksPath;
}
