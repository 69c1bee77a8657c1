/**
 * FileSystemModuleProvider Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { FileSystemModuleProvider } from "../fs-module-provider.js";
import { ErrorCode, ParsingError } from "../../errors.js";

describe("FileSystemModuleProvider", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "module-provider-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("loads top-level modules sorted by name and keeps declarations apart", async () => {
    await fs.writeFile(path.join(tempDir, "Shop.ts"), "class Shop {}");
    await fs.writeFile(path.join(tempDir, "Kits.ts"), "class Kits {}");
    await fs.writeFile(path.join(tempDir, "Legacy.js"), "class Legacy {}");
    await fs.writeFile(path.join(tempDir, "framework.d.ts"), "declare class Base {}");
    await fs.writeFile(path.join(tempDir, "notes.md"), "# notes");
    await fs.mkdir(path.join(tempDir, "nested"));
    await fs.writeFile(path.join(tempDir, "nested", "Deep.ts"), "class Deep {}");

    const { modules, declarations } = await new FileSystemModuleProvider(tempDir).load();

    expect(modules.map((m) => m.name)).toEqual(["Kits.ts", "Legacy.js", "Shop.ts"]);
    expect(modules[0]?.text).toBe("class Kits {}");
    expect(declarations.map((d) => d.name)).toEqual(["framework.d.ts"]);
    expect(declarations[0]?.text).toBe("declare class Base {}");
  });

  it("returns empty lists for an empty directory", async () => {
    const result = await new FileSystemModuleProvider(tempDir).load();
    expect(result).toEqual({ modules: [], declarations: [] });
  });

  it("fails for a missing directory", async () => {
    const provider = new FileSystemModuleProvider(path.join(tempDir, "missing"));
    await expect(provider.load()).rejects.toBeInstanceOf(ParsingError);
    await expect(provider.load()).rejects.toMatchObject({
      code: ErrorCode.PARSE_MODULE_NOT_FOUND,
    });
  });
});
