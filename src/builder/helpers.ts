/**
 * Small expression builders shared by makeTypeConst and makeTypeTest.
 */

import {
  type Expression,
  type ComparisonOperator,
  type Operator,
  type SourceLocation,
  type UnaryOperator,
  attribute,
  binOp,
  bool,
  call,
  compare,
  int,
  name,
  num,
  str,
  unaryOp,
} from "../python-ast";
import type { RuntimeNames } from "./context";

const UINT32_MASK = 0xffffffffn;

export const makeBoolConst = (value: boolean): Expression => bool(value);
export const makeStrConst = (value: string): Expression => str(value);
export const makeIntConst = (value: number): Expression => int(value);
export const makeNumConst = (value: number): Expression => num(value, "float64");

/** Decimals are emitted as doubles; precision beyond a double is dropped. */
export const makeDecimalConst = (value: number, loc?: SourceLocation): Expression =>
  num(value, "float64", loc);

/**
 * Reference to a runtime helper: `module` or `module.member`.
 */
export function makeCoreRef(module: string, member?: string): Expression {
  return member === undefined ? name(module) : attribute(name(module), member);
}

export function makeCall(
  callee: Expression,
  args: Expression[],
  loc?: SourceLocation
): Expression {
  return call(callee, args, [], loc);
}

export function makeBinOp(left: Expression, op: Operator, right: Expression, loc?: SourceLocation): Expression {
  return binOp(left, op, right, loc);
}

export function makeUnOp(op: UnaryOperator, operand: Expression, loc?: SourceLocation): Expression {
  return unaryOp(op, operand, loc);
}

export function makeEqOp(
  left: Expression,
  right: Expression,
  op: ComparisonOperator = "eq",
  loc?: SourceLocation
): Expression {
  return compare(left, [op], [right], loc);
}

/**
 * A 64-bit integer as `Long.from_bits(low, high, unsigned)`.
 *
 * Both limbs are taken from the two's complement bit pattern, so a negative
 * signed value has an all-ones high limb.
 */
export function makeLongInt(
  value: bigint,
  unsigned: boolean,
  runtime: RuntimeNames,
  loc?: SourceLocation
): Expression {
  const bits = BigInt.asUintN(64, value);
  const low = Number(bits & UINT32_MASK);
  const high = Number(bits >> 32n);
  return makeCall(makeCoreRef(runtime.long, runtime.longFromBits), [
    makeNumConst(low),
    makeNumConst(high),
    makeBoolConst(unsigned),
  ], loc);
}

/** `fround(x)`: rounds to single precision at run time */
export function makeFloat32(value: number, runtime: RuntimeNames, loc?: SourceLocation): Expression {
  return makeCall(makeCoreRef(runtime.fround), [num(value, "float32")], loc);
}
