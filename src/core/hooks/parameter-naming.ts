/**
 * Parameter Naming
 *
 * Turns the source text of a call argument into a readable parameter name.
 * The scheme is lossy and collisions are acceptable: names only document
 * the hook for a human reader.
 *
 * @module
 */

export const UNKNOWN_TYPE = "unknown";
export const FALLBACK_PARAMETER_NAME = "param";

const SELF_REFERENCE = "this";
const TRAILING_IDENTIFIER = /[A-Za-z0-9_$]+$/;
const RECEIVER_CHAR = /[A-Za-z0-9_$.?]/;

/**
 * Derives a parameter name from an argument's source text.
 *
 * @example
 * ```typescript
 * normalizeParameterName("this", "Player");         // "player"
 * normalizeParameterName("obj.GetTarget()", "Obj"); // "getTarget"
 * normalizeParameterName("a.b", "string");          // "aB"
 * ```
 */
export function normalizeParameterName(text: string, type: string): string {
  if (text.length === 0) return FALLBACK_PARAMETER_NAME;

  if (text === SELF_REFERENCE && type !== UNKNOWN_TYPE) {
    return lowerFirst(type);
  }

  let name = text;
  while (name.includes("(") && name.includes(")")) {
    const collapsed = collapseRightmostCall(name);
    if (collapsed === null) break;
    name = collapsed;
  }

  name = name.replaceAll("?.", ".");
  if (name.includes(".")) {
    const [base = "", ...segments] = name.split(".");
    name = base + segments.filter((segment) => segment.length > 0).map(upperFirst).join("");
  }

  name = name.replaceAll("ToString", "");
  return name.length > 0 ? name : FALLBACK_PARAMETER_NAME;
}

/**
 * Replaces the rightmost `receiver.Name(args)` (or `Name(args)`) with `name`.
 * Returns null when the text has no call shape left to collapse.
 */
function collapseRightmostCall(text: string): string | null {
  const open = text.lastIndexOf("(");
  if (open <= 0) return null;

  const close = text.indexOf(")", open);
  if (close === -1) return null;

  const match = TRAILING_IDENTIFIER.exec(text.slice(0, open));
  if (!match) return null;

  const methodName = match[0];
  let spanStart = open - methodName.length;
  if (text[spanStart - 1] === ".") {
    spanStart = findReceiverStart(text, spanStart - 1);
  }

  return text.slice(0, spanStart) + lowerFirst(methodName) + text.slice(close + 1);
}

/**
 * Start index of the member-access chain ending just before `dotIndex`,
 * stepping over bracketed groups such as earlier call arguments.
 */
function findReceiverStart(text: string, dotIndex: number): number {
  let i = dotIndex - 1;
  while (i >= 0) {
    const char = text.charAt(i);
    if (char === ")" || char === "]") {
      const opening = findOpening(text, i);
      if (opening < 0) break;
      i = opening - 1;
    } else if (RECEIVER_CHAR.test(char)) {
      i--;
    } else {
      break;
    }
  }
  return i + 1;
}

function findOpening(text: string, closeIndex: number): number {
  const close = text.charAt(closeIndex);
  const open = close === ")" ? "(" : "[";
  let depth = 0;
  for (let i = closeIndex; i >= 0; i--) {
    const char = text.charAt(i);
    if (char === close) depth++;
    else if (char === open && --depth === 0) return i;
  }
  return -1;
}

function lowerFirst(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

function upperFirst(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
