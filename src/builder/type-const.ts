/**
 * Literal construction directed by the semantic type of the literal.
 *
 * Python has no fixed-width integers, no single-precision floats and no
 * 64-bit-safe number type shared with the runtime library, so several literal
 * types turn into constructor calls rather than plain constants.
 */

import {
  type Expression,
  type NumberKind,
  type SourceLocation,
  bool,
  call,
  list,
  name,
  none,
  num,
  str,
} from "../python-ast";
import type { ExtendedNumberKind, LiteralValue, SemanticType, SmallIntArray } from "../semantic-types";
import { formatType } from "../semantic-types";
import { DiagnosticCodes, reportFailure } from "../diagnostics";
import type { BuilderContext } from "./context";
import { makeDecimalConst, makeFloat32, makeLongInt } from "./helpers";

const INT_RANGES: Record<Exclude<NumberKind, "float32" | "float64">, [number, number]> = {
  int8: [-0x80, 0x7f],
  uint8: [0, 0xff],
  int16: [-0x8000, 0x7fff],
  uint16: [0, 0xffff],
  int32: [-0x80000000, 0x7fffffff],
  uint32: [0, 0xffffffff],
};

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Build the expression for a literal `value` of semantic type `type`.
 *
 * An unrecognized (type, value) pairing goes through the context's failure
 * policy; under "recover" the result is `None`.
 */
export function makeTypeConst(
  ctx: BuilderContext,
  type: SemanticType,
  value: LiteralValue,
  loc?: SourceLocation
): Expression {
  const result = tryMakeTypeConst(ctx, type, value, loc);
  if (result !== undefined) {
    return result;
  }
  return literalMismatch(ctx, `Unexpected type ${formatType(type)}, literal ${describeValue(value)}`, loc);
}

function tryMakeTypeConst(
  ctx: BuilderContext,
  type: SemanticType,
  value: LiteralValue,
  loc: SourceLocation | undefined
): Expression | undefined {
  switch (type.kind) {
    case "extendedNumber":
      return makeExtendedNumber(ctx, type.numberKind, value, loc);

    case "number":
      if (typeof value !== "number") return undefined;
      if (type.numberKind === "float32") return makeFloat32(value, ctx.runtime, loc);
      if (type.numberKind === "float64") return num(value, "float64", loc);
      return isInRange(type.numberKind, value) ? num(value, type.numberKind, loc) : undefined;

    case "boolean":
      return typeof value === "boolean" ? bool(value, loc) : undefined;

    case "string":
      return typeof value === "string" ? str(value, loc) : undefined;

    case "char":
      return typeof value === "string" && [...value].length === 1 ? str(value, loc) : undefined;

    case "enum":
      if (typeof value === "bigint") {
        return literalMismatch(ctx, "int64 enums are not supported", loc);
      }
      if (typeof value !== "number" || !Number.isInteger(value)) return undefined;
      return call(name(type.name), [num(value, type.numberKind)], [], loc);

    case "unit":
      return none(loc);

    case "array":
      if (type.element.kind !== "number" || !isSmallIntArray(value)) return undefined;
      return makeNumberArray(value, type.element.numberKind, loc);

    case "any":
    case "regex":
    case "function":
    case "tuple":
    case "list":
    case "option":
    case "genericParam":
    case "erasedUnion":
    case "declared":
      return undefined;
  }
}

function makeExtendedNumber(
  ctx: BuilderContext,
  numberKind: ExtendedNumberKind,
  value: LiteralValue,
  loc: SourceLocation | undefined
): Expression | undefined {
  switch (numberKind) {
    case "int64": {
      const big = toBigInt(value);
      if (big === undefined || big < INT64_MIN || big > INT64_MAX) return undefined;
      return makeLongInt(big, false, ctx.runtime, loc);
    }
    case "uint64": {
      const big = toBigInt(value);
      if (big === undefined || big < 0n || big > UINT64_MAX) return undefined;
      return makeLongInt(big, true, ctx.runtime, loc);
    }
    case "decimal": {
      const parsed = parseDecimal(value);
      return parsed === undefined ? undefined : makeDecimalConst(parsed, loc);
    }
    case "bigint":
      return undefined;
  }
}

// Whole numbers within double precision stand for the same 64-bit value
function toBigInt(value: LiteralValue): bigint | undefined {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  return undefined;
}

/**
 * Byte and short arrays reach us as raw buffers rather than as array
 * construction nodes; spell them out element by element.
 */
function makeNumberArray(values: SmallIntArray, kind: NumberKind, loc: SourceLocation | undefined): Expression {
  return list(Array.from(values, (v) => num(v, kind)), loc);
}

function literalMismatch(ctx: BuilderContext, message: string, loc: SourceLocation | undefined): Expression {
  reportFailure(
    ctx.failurePolicy,
    ctx.diagnostics,
    "builder",
    DiagnosticCodes.LiteralMismatch,
    message,
    loc,
    ctx.fileName
  );
  return none(loc);
}

function isInRange(kind: Exclude<NumberKind, "float32" | "float64">, value: number): boolean {
  const [min, max] = INT_RANGES[kind];
  return Number.isInteger(value) && value >= min && value <= max;
}

function isSmallIntArray(value: LiteralValue): value is SmallIntArray {
  return (
    value instanceof Uint8Array ||
    value instanceof Int8Array ||
    value instanceof Uint16Array ||
    value instanceof Int16Array
  );
}

function parseDecimal(value: LiteralValue): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && DECIMAL_PATTERN.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function describeValue(value: LiteralValue): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return `${value.constructor.name}(${value.length})`;
}
