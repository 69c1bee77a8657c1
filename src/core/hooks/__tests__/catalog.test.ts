import { describe, it, expect } from "vitest";
import { HookCatalog, countHooksPerClass, recordKey } from "../catalog.js";
import { ErrorCode, ScanError } from "../../errors.js";
import type { HookRecord } from "../types.js";

function record(overrides: Partial<HookRecord> = {}): HookRecord {
  return {
    hookName: "OnGive",
    hookSignature: "OnGive(BasePlayer player)",
    methodName: "Give",
    methodSignature: "Give(BasePlayer player)",
    methodParameters: [{ type: "BasePlayer", name: "player" }],
    methodSourceCode: "Give(player: BasePlayer) { this.CallHook(\"OnGive\", player); }",
    methodClassName: "Kits",
    hookLineInvoke: 1,
    ...overrides,
  };
}

describe("HookCatalog", () => {
  it("collapses records that are equal in every field", () => {
    const catalog = new HookCatalog();
    catalog.append([record()]);
    catalog.append([{ ...record(), methodParameters: [{ type: "BasePlayer", name: "player" }] }]);

    expect(catalog.candidateCount).toBe(2);
    expect(catalog.finalize()).toHaveLength(1);
  });

  it("keeps records that share a signature but differ elsewhere", () => {
    const catalog = new HookCatalog();
    catalog.append([record()]);
    catalog.append([record({ methodClassName: "Shop" })]);

    expect(catalog.finalize().map((r) => r.methodClassName)).toEqual(["Kits", "Shop"]);
  });

  it("keeps append order", () => {
    const catalog = new HookCatalog();
    catalog.append([record({ hookName: "B" }), record({ hookName: "A" })]);
    catalog.append([record({ hookName: "C" })]);

    expect(catalog.finalize().map((r) => r.hookName)).toEqual(["B", "A", "C"]);
  });

  it("rejects appends after finalize", () => {
    const catalog = new HookCatalog();
    catalog.finalize();

    expect(catalog.isFinalized).toBe(true);
    expect(() => catalog.append([record()])).toThrow(ScanError);
    try {
      catalog.append([record()]);
    } catch (error) {
      expect(error instanceof ScanError && error.code).toBe(ErrorCode.CATALOG_FINALIZED);
    }
  });

  it("returns the same list from repeated finalize calls", () => {
    const catalog = new HookCatalog();
    catalog.append([record()]);
    const first = catalog.finalize();

    expect(catalog.finalize()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe("recordKey", () => {
  it("distinguishes parameter lists", () => {
    const a = record();
    const b = record({ methodParameters: [{ type: "BasePlayer", name: "target" }] });
    expect(recordKey(a)).not.toBe(recordKey(b));
  });
});

describe("countHooksPerClass", () => {
  it("counts in first-seen order", () => {
    const counts = countHooksPerClass([
      record({ methodClassName: "Shop" }),
      record({ methodClassName: "Kits" }),
      record({ methodClassName: "Shop" }),
    ]);
    expect([...counts.entries()]).toEqual([
      ["Shop", 2],
      ["Kits", 1],
    ]);
  });
});
