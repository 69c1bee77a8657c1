import { describe, it, expect } from "vitest";
import { ModuleHookCollector } from "../module-collector.js";
import { bind, OPTIONS } from "./helpers.js";

const SOURCE = `class Kits extends Oxide.Plugins.RustPlugin {
  private ready = this.CallHook("OnReady", 1);

  First(player: BasePlayer) {
    this.CallHook("OnGive", player);
    this.CallHook("OnReady", 1);
  }

  Second(player: BasePlayer) {
    this.CallHook("OnGive", player);
    this.CallHook("OnOuter", this.CallHook("OnInner"));
    this.Puts("OnIgnored");
  }
}
`;

describe("ModuleHookCollector", () => {
  const result = new ModuleHookCollector("Kits", bind(SOURCE, "Kits"), OPTIONS).collect();

  it("keeps records in first-seen order, unique by hook signature", () => {
    expect(result.records.map((r) => r.hookSignature)).toEqual([
      "OnGive(BasePlayer player)",
      "OnReady(number 1)",
      "OnOuter(unknown callHook)",
      "OnInner()",
    ]);
  });

  it("keeps the first occurrence of a repeated signature", () => {
    const give = result.records.find((r) => r.hookName === "OnGive");
    expect(give?.methodName).toBe("First");
    expect(give?.methodSignature).toBe("First(BasePlayer player)");
    expect(give?.hookLineInvoke).toBe(2);
  });

  it("does not let a call outside any function claim its signature", () => {
    const ready = result.records.find((r) => r.hookName === "OnReady");
    expect(ready?.methodName).toBe("First");
    expect(ready?.hookLineInvoke).toBe(3);
  });

  it("visits calls nested in the arguments of another call", () => {
    const inner = result.records.find((r) => r.hookName === "OnInner");
    expect(inner?.methodName).toBe("Second");
    expect(inner?.methodClassName).toBe("Kits");
    expect(inner?.hookLineInvoke).toBe(3);
  });

  it("counts every call expression it visits", () => {
    expect(result.moduleName).toBe("Kits");
    expect(result.callsVisited).toBe(7);
  });

  it("returns no records for a module without hook calls", () => {
    const empty = new ModuleHookCollector(
      "Empty",
      bind(`class Empty { Run() { console.log("x"); } }`, "Empty"),
      OPTIONS
    ).collect();
    expect(empty.records).toEqual([]);
    expect(empty.callsVisited).toBe(1);
  });
});
