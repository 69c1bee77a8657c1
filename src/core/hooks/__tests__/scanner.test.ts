import { describe, it, expect, vi } from "vitest";
import { HookScanner } from "../scanner.js";
import { ErrorCode } from "../../errors.js";
import { FRAMEWORK, moduleOf } from "./helpers.js";

const KITS = `class Kits extends Oxide.Plugins.RustPlugin {
  Give(player: BasePlayer) {
    this.CallHook("OnGive", player);
  }
}
`;

const SHOP = `class Shop extends Oxide.Plugins.RustPlugin {
  Give(player: BasePlayer) {
    this.CallHook("OnGive", player);
  }

  Sell(item: Item) {
    Interface.CallHook("OnSell", item);
  }
}

declare const Interface: typeof Oxide.Core.Interface;
`;

describe("HookScanner", () => {
  it("merges modules and collapses identical records", () => {
    const scanner = new HookScanner();
    const result = scanner.scan({
      modules: [moduleOf("Kits", KITS), moduleOf("KitsCopy", KITS), moduleOf("Shop", SHOP)],
      declarations: [FRAMEWORK],
    });

    expect(result.modules.map((m) => m.records.length)).toEqual([1, 1, 2]);
    expect(result.failures).toEqual([]);
    expect(result.hooks.map((h) => `${h.methodClassName}:${h.hookSignature}`)).toEqual([
      "Kits:OnGive(BasePlayer player)",
      "Shop:OnGive(BasePlayer player)",
      "Shop:OnSell(Item item)",
    ]);
  });

  it("counts hooks per class before cross-module deduplication", () => {
    const result = new HookScanner().scan({
      modules: [moduleOf("Kits", KITS), moduleOf("KitsCopy", KITS), moduleOf("Shop", SHOP)],
      declarations: [FRAMEWORK],
    });

    expect(result.hooks).toHaveLength(3);
    expect([...result.hooksPerClass.entries()]).toEqual([
      ["Kits", 2],
      ["Shop", 2],
    ]);
  });

  it("reports a failing module and keeps the others", () => {
    const scanner = new HookScanner();
    vi.spyOn(scanner, "scanModule").mockImplementationOnce(() => {
      throw new Error("boom");
    });

    const result = scanner.scan({
      modules: [moduleOf("Broken", KITS), moduleOf("Shop", SHOP)],
      declarations: [FRAMEWORK],
    });

    expect(result.failures).toEqual([
      { moduleName: "Broken", code: ErrorCode.SCAN_MODULE_FAILED, message: "boom" },
    ]);
    expect(result.modules.map((m) => m.moduleName)).toEqual(["Shop"]);
    expect(result.hooks).toHaveLength(2);
  });

  it("reports progress after every module", () => {
    const onModuleScanned = vi.fn();
    const scanner = new HookScanner({ onModuleScanned });
    scanner.scan({
      modules: [moduleOf("Kits", KITS), moduleOf("Shop", SHOP)],
      declarations: [FRAMEWORK],
    });

    expect(onModuleScanned.mock.calls).toEqual([
      ["Kits", 0, 2],
      ["Shop", 1, 2],
    ]);
  });

  it("honours configured call aliases", () => {
    const scanner = new HookScanner({ config: { callAliases: ["Call"] } });
    const result = scanner.scan({
      modules: [moduleOf("Kits", KITS)],
      declarations: [FRAMEWORK],
    });

    expect(result.hooks).toEqual([]);
  });

  it("uses the configured placeholder class name", () => {
    const scanner = new HookScanner({ config: { placeholderClassName: "Orphan" } });
    const result = scanner.scan({
      modules: [
        moduleOf(
          "Relay",
          `function relay(plugin: Oxide.Core.Plugins.Plugin) {
  plugin.Call("OnRelay");
}
`
        ),
      ],
      declarations: [FRAMEWORK],
    });

    expect(result.hooks.map((h) => h.methodClassName)).toEqual(["Orphan"]);
  });
});
