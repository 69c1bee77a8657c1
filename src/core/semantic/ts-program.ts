/**
 * Module Program Factory
 *
 * Builds a TypeScript Program and TypeChecker over one in-memory module plus
 * the shared framework declarations. Library files are read from the
 * installed TypeScript package and parsed once per factory.
 *
 * @module
 */

import * as ts from "typescript";
import * as path from "node:path";
import type { ModuleSource } from "../interfaces/IModuleProvider.js";
import { ErrorCode, ParsingError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("ts-program");

// =============================================================================
// Types
// =============================================================================

/**
 * Result of building a program for one module.
 */
export interface ModuleProgram {
  program: ts.Program;
  typeChecker: ts.TypeChecker;
  sourceFile: ts.SourceFile;
}

const VIRTUAL_ROOT = "/__hookscan__";

/**
 * Compiler options used for every module. Decompiled plugins are checked
 * loosely: the engine only needs types, not a clean compile.
 */
export const MODULE_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  lib: ["lib.es2022.d.ts"],
  allowJs: true,
  checkJs: false,
  noEmit: true,
  noResolve: true,
  skipLibCheck: true,
  experimentalDecorators: true,
  strict: false,
  types: [],
};

// =============================================================================
// Module Program Factory
// =============================================================================

/**
 * Creates programs for individual modules. Holds a cache of parsed library
 * files, so one factory should serve a whole scan.
 *
 * @example
 * ```typescript
 * const factory = new ModuleProgramFactory(declarations);
 * for (const module of modules) {
 *   const { typeChecker, sourceFile } = factory.createProgram(module);
 * }
 * ```
 */
export class ModuleProgramFactory {
  private readonly libraryCache = new Map<string, ts.SourceFile>();
  private readonly declarationFiles: Map<string, string>;

  constructor(
    declarations: ModuleSource[] = [],
    private readonly compilerOptions: ts.CompilerOptions = MODULE_COMPILER_OPTIONS
  ) {
    this.declarationFiles = new Map(
      declarations.map((declaration, index) => [
        toVirtualPath(`declarations/${index}/${path.basename(declaration.fileName)}`),
        declaration.text,
      ])
    );
  }

  /**
   * Parses and binds one module.
   *
   * @throws ParsingError if the module's source file is missing from the program
   */
  createProgram(module: ModuleSource): ModuleProgram {
    const moduleFileName = toVirtualPath(`modules/${path.basename(module.fileName)}`);
    const virtualFiles = new Map(this.declarationFiles);
    virtualFiles.set(moduleFileName, module.text);

    const host = this.createHost(virtualFiles);
    const program = ts.createProgram({
      rootNames: [...virtualFiles.keys()],
      options: this.compilerOptions,
      host,
    });

    const sourceFile = program.getSourceFile(moduleFileName);
    if (!sourceFile) {
      throw new ParsingError("Module did not produce a source file", ErrorCode.PARSE_FAILED, {
        moduleName: module.name,
      });
    }

    logger.debug(
      { module: module.name, declarationCount: this.declarationFiles.size },
      "Module program created"
    );

    return { program, typeChecker: program.getTypeChecker(), sourceFile };
  }

  private createHost(virtualFiles: Map<string, string>): ts.CompilerHost {
    const host = ts.createCompilerHost(this.compilerOptions, true);
    const readFromDisk = host.getSourceFile.bind(host);

    return {
      ...host,
      fileExists: (fileName) => virtualFiles.has(fileName) || host.fileExists(fileName),
      readFile: (fileName) => virtualFiles.get(fileName) ?? host.readFile(fileName),
      getSourceFile: (fileName, languageVersion, onError, shouldCreate) => {
        const text = virtualFiles.get(fileName);
        if (text !== undefined) {
          return ts.createSourceFile(fileName, text, languageVersion, true, scriptKindOf(fileName));
        }

        const cached = this.libraryCache.get(fileName);
        if (cached) return cached;

        const sourceFile = readFromDisk(fileName, languageVersion, onError, shouldCreate);
        if (sourceFile) this.libraryCache.set(fileName, sourceFile);
        return sourceFile;
      },
    };
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

function toVirtualPath(relative: string): string {
  return path.posix.join(VIRTUAL_ROOT, relative.replace(/\\/g, "/"));
}

function scriptKindOf(fileName: string): ts.ScriptKind {
  const extension = path.extname(fileName).toLowerCase();
  switch (extension) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    case ".jsx":
      return ts.ScriptKind.JSX;
    default:
      return ts.ScriptKind.TS;
  }
}

/**
 * Zero-based line of a node's first token.
 */
export function getStartLine(node: ts.Node, sourceFile: ts.SourceFile): number {
  return sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line;
}
