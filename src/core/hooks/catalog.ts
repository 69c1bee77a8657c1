/**
 * Hook Catalog
 *
 * Ordered collection of hook records across modules. Module results are
 * appended in processing order; finalize() then keeps the first occurrence
 * of each fully equal record.
 *
 * Within a module, records are already unique by hookSignature. The catalog
 * compares every field instead, so two modules that dispatch the same hook
 * from different classes both stay listed.
 *
 * @module
 */

import { ErrorCode, ScanError } from "../errors.js";
import type { HookRecord } from "./types.js";

export class HookCatalog {
  private readonly candidates: HookRecord[] = [];
  private finalized: readonly HookRecord[] | null = null;

  /**
   * Appends one module's records, keeping their order.
   *
   * @throws ScanError once the catalog is finalized
   */
  append(records: readonly HookRecord[]): void {
    if (this.finalized) {
      throw new ScanError("Catalog is finalized", ErrorCode.CATALOG_FINALIZED);
    }
    this.candidates.push(...records);
  }

  /**
   * Deduplicates by whole-record equality and freezes the catalog.
   * Repeated calls return the same list.
   */
  finalize(): readonly HookRecord[] {
    if (this.finalized) return this.finalized;

    const seen = new Set<string>();
    const unique: HookRecord[] = [];
    for (const record of this.candidates) {
      const key = recordKey(record);
      if (seen.has(key)) continue;
      seen.add(key);
      unique.push(record);
    }

    this.finalized = Object.freeze(unique);
    return this.finalized;
  }

  get isFinalized(): boolean {
    return this.finalized !== null;
  }

  /** Records appended so far, before cross-module deduplication */
  get candidateCount(): number {
    return this.candidates.length;
  }
}

/**
 * Structural identity of a record over every field.
 */
export function recordKey(record: HookRecord): string {
  return JSON.stringify([
    record.hookName,
    record.hookSignature,
    record.methodName,
    record.methodSignature,
    record.methodParameters.map((p) => [p.type, p.name]),
    record.methodSourceCode,
    record.methodClassName,
    record.hookLineInvoke,
  ]);
}

/**
 * Counts records per enclosing class, in first-seen order.
 */
export function countHooksPerClass(records: readonly HookRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.methodClassName, (counts.get(record.methodClassName) ?? 0) + 1);
  }
  return counts;
}
