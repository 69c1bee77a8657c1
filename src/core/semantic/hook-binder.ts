/**
 * TypeScript Hook Binder
 *
 * Answers the engine's type questions with the TypeScript Compiler API.
 *
 * @module
 */

import * as ts from "typescript";
import type { BoundType, IHookBinder } from "../interfaces/IHookBinder.js";
import type { ModuleSource } from "../interfaces/IModuleProvider.js";
import { ModuleProgramFactory } from "./ts-program.js";

// =============================================================================
// Bound Type
// =============================================================================

/**
 * BoundType backed by a checker type.
 */
export class TypeScriptBoundType implements BoundType {
  constructor(
    readonly type: ts.Type,
    readonly qualifiedName: string,
    readonly displayName: string
  ) {}
}

// =============================================================================
// Binder
// =============================================================================

/**
 * Resolves expression, class and parameter types for one module.
 *
 * @example
 * ```typescript
 * const binder = new TypeScriptHookBinder(typeChecker, sourceFile);
 * const type = binder.getExpressionType(expression);
 * console.log(type?.displayName ?? "unknown");
 * ```
 */
export class TypeScriptHookBinder implements IHookBinder {
  constructor(
    private readonly typeChecker: ts.TypeChecker,
    readonly sourceFile: ts.SourceFile
  ) {}

  getExpressionType(expression: ts.Expression): BoundType | null {
    const type = this.typeChecker.getTypeAtLocation(expression);
    return this.bind(this.typeChecker.getBaseTypeOfLiteralType(this.unwrapTypeParameter(type)));
  }

  getElementType(expression: ts.Expression): BoundType | null {
    const type = this.unwrapTypeParameter(this.typeChecker.getTypeAtLocation(expression));
    const element = this.typeChecker.getIndexTypeOfType(type, ts.IndexKind.Number);
    return element ? this.bind(this.typeChecker.getBaseTypeOfLiteralType(element)) : null;
  }

  getClassType(declaration: ts.ClassDeclaration): BoundType | null {
    if (!declaration.name) return null;
    const symbol = this.typeChecker.getSymbolAtLocation(declaration.name);
    if (!symbol) return null;
    return this.bind(this.typeChecker.getDeclaredTypeOfSymbol(symbol));
  }

  getBaseType(type: BoundType): BoundType | null {
    if (!(type instanceof TypeScriptBoundType)) return null;

    const symbol = type.type.getSymbol();
    if (!symbol) return null;

    // Instantiated generics resolve through their declared (target) type
    const declared = this.typeChecker.getDeclaredTypeOfSymbol(symbol);
    if (!declared.isClassOrInterface()) return null;

    const [base] = this.typeChecker.getBaseTypes(declared);
    return base ? this.bind(base) : null;
  }

  getParameterType(parameter: ts.ParameterDeclaration): string | null {
    if (parameter.type) {
      return parameter.type.getText(this.sourceFile);
    }
    const inferred = this.bind(this.typeChecker.getTypeAtLocation(parameter));
    return inferred?.displayName ?? null;
  }

  /**
   * `this` and generic parameters resolve to their constraint.
   */
  private unwrapTypeParameter(type: ts.Type): ts.Type {
    if (type.flags & ts.TypeFlags.TypeParameter) {
      return this.typeChecker.getBaseConstraintOfType(type) ?? type;
    }
    return type;
  }

  private bind(type: ts.Type): TypeScriptBoundType | null {
    if (type.flags & (ts.TypeFlags.Any | ts.TypeFlags.Unknown)) return null;

    const displayName = this.typeChecker.typeToString(type);
    const symbol = type.getSymbol();
    const qualifiedName = symbol ? this.typeChecker.getFullyQualifiedName(symbol) : displayName;
    return new TypeScriptBoundType(type, qualifiedName, displayName);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Binds a single module against the given framework declarations. Prefer
 * reusing a {@link ModuleProgramFactory} when binding many modules.
 */
export function createModuleBinder(
  module: ModuleSource,
  declarations: ModuleSource[] = [],
  factory: ModuleProgramFactory = new ModuleProgramFactory(declarations)
): TypeScriptHookBinder {
  const { typeChecker, sourceFile } = factory.createProgram(module);
  return new TypeScriptHookBinder(typeChecker, sourceFile);
}
