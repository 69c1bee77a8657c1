/**
 * File System Module Provider
 *
 * Reads plugin modules and framework declarations from one directory.
 *
 * @module
 */

import * as path from "node:path";
import type { IModuleProvider, ModuleSet, ModuleSource } from "../interfaces/IModuleProvider.js";
import { ErrorCode, ParsingError } from "../errors.js";
import { listFiles, isDirectory, readTextFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("module-provider");

export const MODULE_PATTERNS = ["*.ts", "*.tsx", "*.js"];
export const DECLARATION_PATTERNS = ["*.d.ts"];

/**
 * Lists modules at the top level of a directory, sorted by file name.
 * Every `.d.ts` file in the directory is a shared declaration.
 *
 * @example
 * ```typescript
 * const provider = new FileSystemModuleProvider("/plugins");
 * const { modules, declarations } = await provider.load();
 * ```
 */
export class FileSystemModuleProvider implements IModuleProvider {
  constructor(private readonly inputDir: string) {}

  async load(): Promise<ModuleSet> {
    if (!(await isDirectory(this.inputDir))) {
      throw new ParsingError(
        `Folder not found: ${this.inputDir}`,
        ErrorCode.PARSE_MODULE_NOT_FOUND,
        { inputDir: this.inputDir }
      );
    }

    const declarationPaths = await listFiles({
      patterns: DECLARATION_PATTERNS,
      cwd: this.inputDir,
      deep: 1,
    });
    const modulePaths = await listFiles({
      patterns: MODULE_PATTERNS,
      ignore: DECLARATION_PATTERNS,
      cwd: this.inputDir,
      deep: 1,
    });

    const declarations = await Promise.all(declarationPaths.map(readModule));
    const modules = await Promise.all(modulePaths.map(readModule));

    logger.debug(
      { inputDir: this.inputDir, modules: modules.length, declarations: declarations.length },
      "Modules loaded"
    );

    return { modules, declarations };
  }
}

async function readModule(filePath: string): Promise<ModuleSource> {
  return {
    name: path.basename(filePath),
    fileName: filePath,
    text: await readTextFile(filePath),
  };
}
