/**
 * Enclosing Context Locator
 *
 * Attributes a hook call to the function and class that contain it.
 *
 * @module
 */

import * as ts from "typescript";
import type { IHookBinder } from "../interfaces/IHookBinder.js";
import { getStartLine } from "../semantic/ts-program.js";
import type { EnclosingContext, ParameterDescriptor } from "./types.js";

/**
 * Members and module-level functions that carry a name of their own.
 */
export type NamedFunction =
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration
  | ts.FunctionDeclaration;

/**
 * Locates the call's enclosing function and class.
 *
 * The ancestor walk keeps the nearest local function and the nearest named
 * function, and stops at the nearest class. Returns null when the call sits
 * in no function at all.
 */
export function locateEnclosingContext(
  call: ts.CallExpression,
  binder: IHookBinder,
  placeholderClassName: string
): EnclosingContext | null {
  const { sourceFile } = binder;

  let localFunction: ts.FunctionDeclaration | undefined;
  let namedFunction: NamedFunction | undefined;
  let enclosingClass: ts.ClassDeclaration | undefined;

  for (let node: ts.Node | undefined = call.parent; node !== undefined; node = node.parent) {
    if (isLocalFunction(node)) {
      localFunction ??= node;
    } else if (isNamedFunction(node)) {
      namedFunction ??= node;
    } else if (ts.isClassDeclaration(node)) {
      enclosingClass = node;
      break;
    }
  }

  const effective = localFunction ?? namedFunction;
  if (!effective) return null;

  enclosingClass ??= findFirstClass(sourceFile);
  const methodClassName = enclosingClass?.name?.text ?? placeholderClassName;

  const localName = localFunction ? functionName(localFunction) : undefined;
  const outerName = namedFunction ? functionName(namedFunction) : undefined;
  const methodName =
    localName !== undefined
      ? outerName !== undefined
        ? `${outerName}.${localName}`
        : localName
      : (outerName ?? "");

  return {
    methodName,
    methodSourceCode: effective.getFullText(sourceFile),
    methodClassName,
    methodParameters: describeDeclaredParameters(effective, binder),
    hookLineInvoke: getStartLine(call, sourceFile) - getStartLine(effective, sourceFile) + 1,
  };
}

/**
 * Declared parameters with a resolvable type; the rest are dropped.
 */
export function describeDeclaredParameters(
  fn: ts.SignatureDeclarationBase,
  binder: IHookBinder
): ParameterDescriptor[] {
  const parameters: ParameterDescriptor[] = [];
  for (const parameter of fn.parameters) {
    const type = binder.getParameterType(parameter);
    if (type === null) continue;
    parameters.push({ type, name: parameter.name.getText(binder.sourceFile) });
  }
  return parameters;
}

/**
 * A function declaration nested in a block.
 */
export function isLocalFunction(node: ts.Node): node is ts.FunctionDeclaration {
  return ts.isFunctionDeclaration(node) && node.name !== undefined && ts.isBlock(node.parent);
}

export function isNamedFunction(node: ts.Node): node is NamedFunction {
  return (
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node) ||
    (ts.isFunctionDeclaration(node) &&
      node.name !== undefined &&
      (ts.isSourceFile(node.parent) || ts.isModuleBlock(node.parent)))
  );
}

function functionName(fn: NamedFunction): string {
  if (ts.isConstructorDeclaration(fn)) return "constructor";
  return fn.name?.getText() ?? "";
}

function findFirstClass(sourceFile: ts.SourceFile): ts.ClassDeclaration | undefined {
  let found: ts.ClassDeclaration | undefined;
  const visit = (node: ts.Node): void => {
    if (found) return;
    if (ts.isClassDeclaration(node)) {
      found = node;
      return;
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  return found;
}
