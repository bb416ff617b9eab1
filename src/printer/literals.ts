/**
 * Python spellings of constant values.
 */

import type { ConstantValue, NumberKind } from "../python-ast";

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\b": "\\b",
  "\f": "\\f",
};

function hex(code: number, width: number): string {
  return code.toString(16).padStart(width, "0");
}

/**
 * Escape a string for a double-quoted Python literal (quotes not included).
 * Output is pure printable ASCII.
 */
export function escapeString(value: string): string {
  let result = "";
  for (const ch of value) {
    const simple = SIMPLE_ESCAPES[ch];
    if (simple !== undefined) {
      result += simple;
      continue;
    }

    const code = ch.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f) {
      result += `\\x${hex(code, 2)}`;
    } else if (code < 0x7f) {
      result += ch;
    } else if (code <= 0xffff) {
      result += `\\u${hex(code, 4)}`;
    } else {
      result += `\\U${hex(code, 8)}`;
    }
  }
  return result;
}

function isFloatKind(kind: NumberKind): boolean {
  return kind === "float32" || kind === "float64";
}

function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'float("nan")';
  if (value === Infinity) return 'float("inf")';
  if (value === -Infinity) return 'float("-inf")';
  if (Object.is(value, -0)) return "-0.0";

  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

export function formatNumber(value: number, kind: NumberKind): string {
  return isFloatKind(kind) ? formatFloat(value) : String(value);
}

export function formatConstant(value: ConstantValue): string {
  switch (value.type) {
    case "string":
      return `"${escapeString(value.value)}"`;
    case "bool":
      return value.value ? "True" : "False";
    case "number":
      return formatNumber(value.value, value.numberKind);
    case "none":
      return "None";
    default: {
      const _exhaustive: never = value;
      throw new Error(`Unknown constant: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/** Negative numbers would bind wrongly as an operand (`-1 ** 2`) */
export function isNegativeNumber(value: ConstantValue): boolean {
  return value.type === "number" && (value.value < 0 || Object.is(value.value, -0));
}
