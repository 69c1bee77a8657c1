/**
 * IHookBinder - Semantic queries the hook extraction engine needs
 *
 * The engine walks TypeScript syntax trees directly and asks the binder only
 * for resolved types. A binder is bound to exactly one module.
 *
 * @module
 */

import type * as ts from "typescript";

/**
 * A type resolved by the binder.
 */
export interface BoundType {
  /** Fully qualified name, matched against the recognized type set */
  readonly qualifiedName: string;
  /** Display name used in hook signatures and parameter names */
  readonly displayName: string;
}

/**
 * Semantic binder over one parsed module.
 *
 * @example
 * ```typescript
 * const binder = createModuleBinder(module, declarations);
 * const receiverType = binder.getExpressionType(call.expression.expression);
 * for (let t = receiverType; t; t = binder.getBaseType(t)) {
 *   console.log(t.qualifiedName);
 * }
 * ```
 */
export interface IHookBinder {
  /** The module's syntax tree */
  readonly sourceFile: ts.SourceFile;

  /**
   * Static type of an expression, or null when it cannot be resolved.
   * Literal types are widened (`"a"` resolves to `string`).
   */
  getExpressionType(expression: ts.Expression): BoundType | null;

  /**
   * Element type of an array-like expression, as spread with `...expression`,
   * or null when it has none or cannot be resolved.
   */
  getElementType(expression: ts.Expression): BoundType | null;

  /**
   * Instance type declared by a class declaration.
   */
  getClassType(declaration: ts.ClassDeclaration): BoundType | null;

  /**
   * Declared base type of a type, or null at the root of the chain.
   */
  getBaseType(type: BoundType): BoundType | null;

  /**
   * Display name of a declared parameter's type, or null when unresolvable.
   */
  getParameterType(parameter: ts.ParameterDeclaration): string | null;
}
