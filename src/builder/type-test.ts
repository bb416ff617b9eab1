/**
 * Runtime type tests.
 *
 * Best effort: primitives are checked through the runtime's `type_of`, boxed
 * numeric types through `isinstance`, and collections through `is_array`.
 * Declared types (records, unions, classes, interfaces) have no cheap
 * structural test, so they are reported and replaced with `None`.
 */

import { type Expression, type SourceLocation, bool, call, compare, name, none, str } from "../python-ast";
import type { ExtendedNumberKind, SemanticType } from "../semantic-types";
import { formatType } from "../semantic-types";
import { DiagnosticCodes } from "../diagnostics";
import type { BuilderContext } from "./context";
import { makeEqOp } from "./helpers";

/**
 * Build a boolean expression testing whether `expr` holds a value of `type`.
 */
export function makeTypeTest(
  ctx: BuilderContext,
  type: SemanticType,
  expr: Expression,
  loc?: SourceLocation
): Expression {
  const typeOf = (primitive: string): Expression =>
    compare(call(name(ctx.runtime.typeOf), [expr]), ["eq"], [str(primitive)], loc);

  const isInstance = (className: string): Expression =>
    call(name("isinstance"), [expr, name(className)], [], loc);

  switch (type.kind) {
    case "any":
      return bool(true, loc);
    case "unit":
      return makeEqOp(expr, none(), "eq", loc);
    case "boolean":
      return typeOf("boolean");
    case "char":
    case "string":
      return typeOf("string");
    case "regex":
      return isInstance(ctx.runtime.regex);
    case "number":
    case "enum":
      return typeOf("number");
    case "extendedNumber":
      return isInstance(boxedNumberClass(ctx, type.numberKind));
    case "function":
      return typeOf("function");
    case "array":
    case "tuple":
    case "list":
      return call(name(ctx.runtime.isArray), [expr], [], loc);
    case "declared":
      return unsupported(ctx, `Cannot type test declared type ${formatType(type)}: records, unions, interfaces and classes have no runtime test`, loc);
    case "option":
    case "genericParam":
    case "erasedUnion":
      return unsupported(ctx, `Cannot type test ${formatType(type)}: options, generic parameters and erased unions have no runtime test`, loc);
  }
}

function boxedNumberClass(ctx: BuilderContext, numberKind: ExtendedNumberKind): string {
  switch (numberKind) {
    case "int64":
    case "uint64":
      return ctx.runtime.long;
    case "decimal":
      return ctx.runtime.decimal;
    case "bigint":
      return ctx.runtime.bigInt;
  }
}

function unsupported(ctx: BuilderContext, message: string, loc: SourceLocation | undefined): Expression {
  ctx.diagnostics.error(DiagnosticCodes.UnsupportedTypeTest, message, loc, ctx.fileName);
  return none(loc);
}
