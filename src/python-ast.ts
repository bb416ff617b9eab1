/**
 * Python AST Types
 *
 * The target-language tree handed to the printer. The front end builds it once,
 * the printer walks it once, and nothing mutates it in between.
 *
 * Every union here is closed: the printer switches over each one exhaustively,
 * so adding a variant is a compile error until every printer case handles it.
 */

import type { LiteralValue, SemanticType } from "./semantic-types";

// ============================================================================
// Source Locations
// ============================================================================

export interface Position {
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
  /** Original identifier, forwarded to the source map as the mapping name */
  identifierName?: string;
}

// ============================================================================
// Operators
// ============================================================================

export type Operator =
  | "add"
  | "sub"
  | "mult"
  | "div"
  | "floorDiv"
  | "mod"
  | "pow"
  | "lShift"
  | "rShift"
  | "bitOr"
  | "bitXor"
  | "bitAnd"
  | "matMult";

export type BoolOperator = "and" | "or";

export type ComparisonOperator =
  | "eq"
  | "notEq"
  | "lt"
  | "ltE"
  | "gt"
  | "gtE"
  | "is"
  | "isNot"
  | "in"
  | "notIn";

export type UnaryOperator = "invert" | "not" | "uAdd" | "uSub";

// ============================================================================
// Constants
// ============================================================================

export type NumberKind =
  | "int8"
  | "uint8"
  | "int16"
  | "uint16"
  | "int32"
  | "uint32"
  | "float32"
  | "float64";

export type ConstantValue =
  | { type: "bool"; value: boolean }
  | { type: "string"; value: string }
  | { type: "number"; value: number; numberKind: NumberKind }
  | { type: "none" };

// ============================================================================
// Expressions
// ============================================================================

export type Expression =
  | Name
  | Constant
  | Call
  | Attribute
  | Subscript
  | BinOp
  | UnaryOp
  | BoolOp
  | Compare
  | IfExp
  | Lambda
  | Tuple
  | List
  | PySet
  | Dict
  | NamedExpr
  | Starred
  | Emit
  | TypedLiteral
  | TypeTest
  | Yield
  | YieldFrom
  | FormattedValue;

interface Node {
  loc?: SourceLocation;
}

/** Identifier reference */
export interface Name extends Node {
  kind: "name";
  id: string;
}

export interface Constant extends Node {
  kind: "constant";
  value: ConstantValue;
}

/** func(args, keywords) */
export interface Call extends Node {
  kind: "call";
  func: Expression;
  args: readonly Expression[];
  keywords: readonly Keyword[];
}

/** value.attr */
export interface Attribute extends Node {
  kind: "attribute";
  value: Expression;
  attr: string;
}

/** value[slice] */
export interface Subscript extends Node {
  kind: "subscript";
  value: Expression;
  slice: Expression;
}

export interface BinOp extends Node {
  kind: "binOp";
  left: Expression;
  op: Operator;
  right: Expression;
}

export interface UnaryOp extends Node {
  kind: "unaryOp";
  op: UnaryOperator;
  operand: Expression;
}

/** v0 and v1 and ... */
export interface BoolOp extends Node {
  kind: "boolOp";
  op: BoolOperator;
  values: readonly Expression[];
}

/** left op0 c0 op1 c1 ... */
export interface Compare extends Node {
  kind: "compare";
  left: Expression;
  ops: readonly ComparisonOperator[];
  comparators: readonly Expression[];
}

/** body if test else orElse */
export interface IfExp extends Node {
  kind: "ifExp";
  test: Expression;
  body: Expression;
  orElse: Expression;
}

export interface Lambda extends Node {
  kind: "lambda";
  args: Arguments;
  body: Expression;
}

export interface Tuple extends Node {
  kind: "tuple";
  elements: readonly Expression[];
}

export interface List extends Node {
  kind: "list";
  elements: readonly Expression[];
}

export interface PySet extends Node {
  kind: "set";
  elements: readonly Expression[];
}

/** keys[i] pairs with values[i] */
export interface Dict extends Node {
  kind: "dict";
  keys: readonly Expression[];
  values: readonly Expression[];
}

/** target := value */
export interface NamedExpr extends Node {
  kind: "namedExpr";
  target: Expression;
  value: Expression;
}

/** *value */
export interface Starred extends Node {
  kind: "starred";
  value: Expression;
}

/**
 * Raw Python snippet with `$0`, `$1`, ... placeholders filled from `args`.
 * See printer/emit-template.ts for the macro forms.
 */
export interface Emit extends Node {
  kind: "emit";
  value: string;
  args: readonly Expression[];
}

/** Literal whose rendering depends on its semantic type (see builder/type-const.ts) */
export interface TypedLiteral extends Node {
  kind: "typedLiteral";
  type: SemanticType;
  value: LiteralValue;
}

/** Runtime test that `value` holds a `type` (see builder/type-test.ts) */
export interface TypeTest extends Node {
  kind: "typeTest";
  type: SemanticType;
  value: Expression;
}

export interface Yield extends Node {
  kind: "yield";
  value?: Expression;
}

export interface YieldFrom extends Node {
  kind: "yieldFrom";
  value: Expression;
}

/** A replacement field of an f-string */
export interface FormattedValue extends Node {
  kind: "formattedValue";
  value: Expression;
  formatSpec?: Expression;
}

// ============================================================================
// Auxiliary nodes
// ============================================================================

export interface Arg {
  arg: string;
  annotation?: Expression;
}

/** Function parameters. `defaults` align with the tail of `args`. */
export interface Arguments {
  posOnlyArgs: readonly Arg[];
  args: readonly Arg[];
  varArg?: Arg;
  defaults: readonly Expression[];
}

/** name=value in a call */
export interface Keyword {
  arg: string;
  value: Expression;
}

/** name [as asName] in an import */
export interface Alias {
  name: string;
  asName?: string;
}

export interface ExceptHandler extends Node {
  type?: Expression;
  name?: string;
  body: readonly Statement[];
}

// ============================================================================
// Statements
// ============================================================================

export type Statement =
  | FunctionDef
  | AsyncFunctionDef
  | ClassDef
  | If
  | For
  | AsyncFor
  | While
  | Try
  | Import
  | ImportFrom
  | Assign
  | Return
  | Raise
  | ExprStmt
  | Pass
  | Break
  | Continue
  | Global
  | NonLocal;

interface FunctionShape extends Node {
  name: string;
  args: Arguments;
  body: readonly Statement[];
  decoratorList: readonly Expression[];
  returns?: Expression;
}

export interface FunctionDef extends FunctionShape {
  kind: "functionDef";
}

export interface AsyncFunctionDef extends FunctionShape {
  kind: "asyncFunctionDef";
}

export interface ClassDef extends Node {
  kind: "classDef";
  name: string;
  bases: readonly Expression[];
  body: readonly Statement[];
  decoratorList: readonly Expression[];
}

/** if test: body, with orElse holding `else` (or a lone nested If for `elif`) */
export interface If extends Node {
  kind: "if";
  test: Expression;
  body: readonly Statement[];
  orElse: readonly Statement[];
}

export interface For extends Node {
  kind: "for";
  target: Expression;
  iter: Expression;
  body: readonly Statement[];
}

export interface AsyncFor extends Node {
  kind: "asyncFor";
  target: Expression;
  iter: Expression;
  body: readonly Statement[];
}

export interface While extends Node {
  kind: "while";
  test: Expression;
  body: readonly Statement[];
}

export interface Try extends Node {
  kind: "try";
  body: readonly Statement[];
  handlers: readonly ExceptHandler[];
  orElse: readonly Statement[];
  finalBody: readonly Statement[];
}

/** import a, b */
export interface Import extends Node {
  kind: "import";
  names: readonly Alias[];
}

/** from module import a, b. A missing module means the current package. */
export interface ImportFrom extends Node {
  kind: "importFrom";
  module?: string;
  names: readonly Alias[];
}

/** t0 = t1 = ... = value */
export interface Assign extends Node {
  kind: "assign";
  targets: readonly Expression[];
  value: Expression;
}

export interface Return extends Node {
  kind: "return";
  value?: Expression;
}

export interface Raise extends Node {
  kind: "raise";
  exception: Expression;
}

/** Expression statement */
export interface ExprStmt extends Node {
  kind: "expr";
  value: Expression;
}

export interface Pass extends Node {
  kind: "pass";
}

export interface Break extends Node {
  kind: "break";
}

export interface Continue extends Node {
  kind: "continue";
}

export interface Global extends Node {
  kind: "global";
  names: readonly string[];
}

export interface NonLocal extends Node {
  kind: "nonlocal";
  names: readonly string[];
}

export interface Module {
  body: readonly Statement[];
}

// ============================================================================
// Expression constructors
// ============================================================================

export const name = (id: string, loc?: SourceLocation): Name => ({
  kind: "name",
  id,
  loc,
});

export const constant = (value: ConstantValue, loc?: SourceLocation): Constant => ({
  kind: "constant",
  value,
  loc,
});

export const str = (value: string, loc?: SourceLocation): Constant =>
  constant({ type: "string", value }, loc);

export const bool = (value: boolean, loc?: SourceLocation): Constant =>
  constant({ type: "bool", value }, loc);

export const num = (value: number, numberKind: NumberKind = "float64", loc?: SourceLocation): Constant =>
  constant({ type: "number", value, numberKind }, loc);

export const int = (value: number, loc?: SourceLocation): Constant =>
  num(value, "int32", loc);

export const none = (loc?: SourceLocation): Constant => constant({ type: "none" }, loc);

export const call = (
  func: Expression,
  args: readonly Expression[] = [],
  keywords: readonly Keyword[] = [],
  loc?: SourceLocation
): Call => ({
  kind: "call",
  func,
  args,
  keywords,
  loc,
});

export const attribute = (value: Expression, attr: string, loc?: SourceLocation): Attribute => ({
  kind: "attribute",
  value,
  attr,
  loc,
});

export const subscript = (value: Expression, slice: Expression, loc?: SourceLocation): Subscript => ({
  kind: "subscript",
  value,
  slice,
  loc,
});

export const binOp = (left: Expression, op: Operator, right: Expression, loc?: SourceLocation): BinOp => ({
  kind: "binOp",
  left,
  op,
  right,
  loc,
});

export const unaryOp = (op: UnaryOperator, operand: Expression, loc?: SourceLocation): UnaryOp => ({
  kind: "unaryOp",
  op,
  operand,
  loc,
});

export const boolOp = (op: BoolOperator, values: readonly Expression[], loc?: SourceLocation): BoolOp => ({
  kind: "boolOp",
  op,
  values,
  loc,
});

export const compare = (
  left: Expression,
  ops: readonly ComparisonOperator[],
  comparators: readonly Expression[],
  loc?: SourceLocation
): Compare => ({
  kind: "compare",
  left,
  ops,
  comparators,
  loc,
});

export const ifExp = (test: Expression, body: Expression, orElse: Expression, loc?: SourceLocation): IfExp => ({
  kind: "ifExp",
  test,
  body,
  orElse,
  loc,
});

export const lambda = (args: Arguments, body: Expression, loc?: SourceLocation): Lambda => ({
  kind: "lambda",
  args,
  body,
  loc,
});

export const tuple = (elements: readonly Expression[], loc?: SourceLocation): Tuple => ({
  kind: "tuple",
  elements,
  loc,
});

export const list = (elements: readonly Expression[], loc?: SourceLocation): List => ({
  kind: "list",
  elements,
  loc,
});

export const set = (elements: readonly Expression[], loc?: SourceLocation): PySet => ({
  kind: "set",
  elements,
  loc,
});

export const dict = (entries: readonly [Expression, Expression][], loc?: SourceLocation): Dict => ({
  kind: "dict",
  keys: entries.map(([key]) => key),
  values: entries.map(([, value]) => value),
  loc,
});

export const namedExpr = (target: Expression, value: Expression, loc?: SourceLocation): NamedExpr => ({
  kind: "namedExpr",
  target,
  value,
  loc,
});

export const starred = (value: Expression, loc?: SourceLocation): Starred => ({
  kind: "starred",
  value,
  loc,
});

export const emit = (value: string, args: readonly Expression[] = [], loc?: SourceLocation): Emit => ({
  kind: "emit",
  value,
  args,
  loc,
});

export const typedLiteral = (type: SemanticType, value: LiteralValue, loc?: SourceLocation): TypedLiteral => ({
  kind: "typedLiteral",
  type,
  value,
  loc,
});

export const typeTest = (type: SemanticType, value: Expression, loc?: SourceLocation): TypeTest => ({
  kind: "typeTest",
  type,
  value,
  loc,
});

export const keyword = (arg: string, value: Expression): Keyword => ({ arg, value });

export const alias = (aliasName: string, asName?: string): Alias => ({ name: aliasName, asName });

export const arg = (argName: string, annotation?: Expression): Arg => ({ arg: argName, annotation });

export const args = (
  positional: readonly Arg[] = [],
  extra: Partial<Omit<Arguments, "args">> = {}
): Arguments => ({
  posOnlyArgs: extra.posOnlyArgs ?? [],
  args: positional,
  varArg: extra.varArg,
  defaults: extra.defaults ?? [],
});

// ============================================================================
// Statement constructors
// ============================================================================

export const functionDef = (
  fnName: string,
  fnArgs: Arguments,
  body: readonly Statement[],
  extra: { decoratorList?: readonly Expression[]; returns?: Expression; loc?: SourceLocation } = {}
): FunctionDef => ({
  kind: "functionDef",
  name: fnName,
  args: fnArgs,
  body,
  decoratorList: extra.decoratorList ?? [],
  returns: extra.returns,
  loc: extra.loc,
});

export const classDef = (
  className: string,
  bases: readonly Expression[],
  body: readonly Statement[],
  extra: { decoratorList?: readonly Expression[]; loc?: SourceLocation } = {}
): ClassDef => ({
  kind: "classDef",
  name: className,
  bases,
  body,
  decoratorList: extra.decoratorList ?? [],
  loc: extra.loc,
});

export const ifStmt = (
  test: Expression,
  body: readonly Statement[],
  orElse: readonly Statement[] = [],
  loc?: SourceLocation
): If => ({
  kind: "if",
  test,
  body,
  orElse,
  loc,
});

export const forStmt = (
  target: Expression,
  iter: Expression,
  body: readonly Statement[],
  loc?: SourceLocation
): For => ({
  kind: "for",
  target,
  iter,
  body,
  loc,
});

export const whileStmt = (test: Expression, body: readonly Statement[], loc?: SourceLocation): While => ({
  kind: "while",
  test,
  body,
  loc,
});

export const tryStmt = (
  body: readonly Statement[],
  handlers: readonly ExceptHandler[],
  orElse: readonly Statement[] = [],
  finalBody: readonly Statement[] = [],
  loc?: SourceLocation
): Try => ({
  kind: "try",
  body,
  handlers,
  orElse,
  finalBody,
  loc,
});

export const exceptHandler = (
  body: readonly Statement[],
  type?: Expression,
  handlerName?: string,
  loc?: SourceLocation
): ExceptHandler => ({
  type,
  name: handlerName,
  body,
  loc,
});

export const importStmt = (names: readonly Alias[], loc?: SourceLocation): Import => ({
  kind: "import",
  names,
  loc,
});

export const importFrom = (module: string | undefined, names: readonly Alias[], loc?: SourceLocation): ImportFrom => ({
  kind: "importFrom",
  module,
  names,
  loc,
});

export const assign = (targets: readonly Expression[], value: Expression, loc?: SourceLocation): Assign => ({
  kind: "assign",
  targets,
  value,
  loc,
});

export const returnStmt = (value?: Expression, loc?: SourceLocation): Return => ({
  kind: "return",
  value,
  loc,
});

export const raise = (exception: Expression, loc?: SourceLocation): Raise => ({
  kind: "raise",
  exception,
  loc,
});

export const exprStmt = (value: Expression, loc?: SourceLocation): ExprStmt => ({
  kind: "expr",
  value,
  loc,
});

export const pass: Pass = { kind: "pass" };

export const breakStmt: Break = { kind: "break" };

export const continueStmt: Continue = { kind: "continue" };

export const global = (names: readonly string[]): Global => ({ kind: "global", names });

export const nonlocal = (names: readonly string[]): NonLocal => ({ kind: "nonlocal", names });

export const module = (body: readonly Statement[]): Module => ({ body });

// ============================================================================
// Helpers
// ============================================================================

/** Attach a location to a node */
export function located<T extends { loc?: SourceLocation }>(node: T, loc: SourceLocation): T {
  return { ...node, loc };
}

/** Location of a single span on one line */
export function span(line: number, column: number, endColumn: number = column, identifierName?: string): SourceLocation {
  return {
    start: { line, column },
    end: { line, column: endColumn },
    identifierName,
  };
}
