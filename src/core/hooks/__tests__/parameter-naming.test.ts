import { describe, it, expect } from "vitest";
import { normalizeParameterName } from "../parameter-naming.js";

describe("normalizeParameterName", () => {
  it("names a self reference after its type", () => {
    expect(normalizeParameterName("this", "Player")).toBe("player");
  });

  it("keeps a self reference whose type is unknown", () => {
    expect(normalizeParameterName("this", "unknown")).toBe("this");
  });

  it("collapses a member call to its method name", () => {
    expect(normalizeParameterName("obj.GetTarget()", "BaseEntity")).toBe("getTarget");
  });

  it("collapses a bare call", () => {
    expect(normalizeParameterName("GetTarget(1, 2)", "BaseEntity")).toBe("getTarget");
  });

  it("collapses chained calls to the last method", () => {
    expect(normalizeParameterName("player.GetItem().GetName()", "string")).toBe("getName");
  });

  it("collapses calls nested in arguments from the right", () => {
    expect(normalizeParameterName("Format(a.GetX(), b)", "string")).toBe("format");
  });

  it("joins member access in camel case", () => {
    expect(normalizeParameterName("a.b", "string")).toBe("aB");
    expect(normalizeParameterName("item.info.shortname", "string")).toBe("itemInfoShortname");
  });

  it("treats optional chaining like member access", () => {
    expect(normalizeParameterName("player?.displayName", "string")).toBe("playerDisplayName");
    expect(normalizeParameterName("player?.GetItem()?.info", "ItemDefinition")).toBe("getItemInfo");
  });

  it("removes ToString", () => {
    expect(normalizeParameterName("item.info.ToString", "string")).toBe("itemInfo");
  });

  it("falls back to param", () => {
    expect(normalizeParameterName("", "string")).toBe("param");
    expect(normalizeParameterName("ToString", "string")).toBe("param");
  });

  it("leaves text without call shape alone", () => {
    expect(normalizeParameterName("(a)", "number")).toBe("(a)");
    expect(normalizeParameterName("player", "BasePlayer")).toBe("player");
  });
});
