/**
 * Hook Call Detector
 *
 * Decides whether a call expression dispatches a hook by a literal name
 * through a recognized framework type.
 *
 * @module
 */

import * as ts from "typescript";
import type { BoundType, IHookBinder } from "../interfaces/IHookBinder.js";
import { err, ok, type Result } from "../../types/result.js";
import type { DetectedHookCall, HookDetectionOptions, RejectionReason } from "./types.js";

/**
 * Checks one call expression.
 *
 * Member calls (`receiver.Name(...)`) are checked against the receiver's
 * static type; bare calls (`Name(...)`) against the nearest enclosing class.
 */
export function detectHookCall(
  call: ts.CallExpression,
  binder: IHookBinder,
  options: HookDetectionOptions
): Result<DetectedHookCall, RejectionReason> {
  const callee = call.expression;

  let receiverType: BoundType | null = null;
  if (ts.isPropertyAccessExpression(callee)) {
    receiverType = binder.getExpressionType(callee.expression);
  } else {
    const enclosingClass = ts.findAncestor(call, ts.isClassDeclaration);
    receiverType = enclosingClass ? binder.getClassType(enclosingClass) : null;
  }

  if (!receiverType) return err("unresolved-receiver");
  if (!isRecognizedType(receiverType, binder, options.recognizedTypes)) {
    return err("unrecognized-type");
  }

  const memberName = getInvokedName(callee);
  if (memberName === null || !options.callAliases.has(memberName)) {
    return err("not-a-call-alias");
  }

  const [first, ...rest] = call.arguments;
  if (!first || !isStringLiteral(first)) return err("hook-name-not-literal");
  if (first.text.length === 0) return err("empty-hook-name");

  return ok({ hookName: first.text, remainingArguments: rest });
}

/**
 * Walks the type and its declared base types, looking for a recognized one.
 */
export function isRecognizedType(
  type: BoundType,
  binder: IHookBinder,
  recognizedTypes: ReadonlySet<string>
): boolean {
  const seen = new Set<string>();
  let current: BoundType | null = type;

  while (current) {
    if (recognizedTypes.has(current.qualifiedName)) return true;
    // Circular heritage in broken source
    if (seen.has(current.qualifiedName)) return false;
    seen.add(current.qualifiedName);
    current = binder.getBaseType(current);
  }

  return false;
}

function getInvokedName(callee: ts.LeftHandSideExpression): string | null {
  if (ts.isPropertyAccessExpression(callee)) return callee.name.text;
  if (ts.isIdentifier(callee)) return callee.text;
  return null;
}

function isStringLiteral(
  node: ts.Expression
): node is ts.StringLiteral | ts.NoSubstitutionTemplateLiteral {
  return ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node);
}
