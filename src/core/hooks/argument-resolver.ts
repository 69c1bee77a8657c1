/**
 * Argument Resolver
 *
 * Converts the arguments that follow the hook name into ordered parameter
 * descriptors for the hook signature.
 *
 * @module
 */

import * as ts from "typescript";
import type { IHookBinder } from "../interfaces/IHookBinder.js";
import { normalizeParameterName, UNKNOWN_TYPE } from "./parameter-naming.js";
import type { ParameterDescriptor } from "./types.js";

/**
 * Resolves call arguments into descriptors.
 *
 * `null` arguments are skipped; an inline array literal contributes one
 * descriptor per non-null element instead of one for the array. A spread
 * (`...items`) is described by its element type and the spread operand.
 */
export function resolveArguments(
  args: readonly ts.Expression[],
  binder: IHookBinder
): ParameterDescriptor[] {
  const descriptors: ParameterDescriptor[] = [];

  for (const arg of args) {
    if (isNullLiteral(arg)) continue;

    if (ts.isArrayLiteralExpression(arg)) {
      for (const element of arg.elements) {
        if (isNullLiteral(element) || ts.isOmittedExpression(element)) continue;
        descriptors.push(describeExpression(element, binder));
      }
      continue;
    }

    descriptors.push(describeExpression(arg, binder));
  }

  return descriptors;
}

/**
 * Builds the canonical `hookName(type name, ...)` key.
 */
export function buildSignature(name: string, parameters: readonly ParameterDescriptor[]): string {
  return `${name}(${parameters.map((p) => `${p.type} ${p.name}`).join(", ")})`;
}

function describeExpression(expression: ts.Expression, binder: IHookBinder): ParameterDescriptor {
  if (ts.isSpreadElement(expression)) {
    const operand = expression.expression;
    const type = binder.getElementType(operand)?.displayName ?? UNKNOWN_TYPE;
    return { type, name: normalizeParameterName(operand.getText(binder.sourceFile), type) };
  }

  const type = binder.getExpressionType(expression)?.displayName ?? UNKNOWN_TYPE;
  const name = normalizeParameterName(expression.getText(binder.sourceFile), type);
  return { type, name };
}

function isNullLiteral(expression: ts.Expression): boolean {
  return expression.kind === ts.SyntaxKind.NullKeyword;
}
