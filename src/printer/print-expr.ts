/**
 * Expression printing.
 *
 * Every expression goes through `printExpression`, which records the node's
 * source location at the position of its first character and then switches
 * over the node kind. Typed literals and type tests are expanded through the
 * builder first, so the rest of the dispatch only sees plain Python nodes.
 */

import type {
  Arguments,
  Arg,
  Expression,
  Keyword,
  SourceLocation,
  TypedLiteral,
  TypeTest,
} from "../python-ast";
import { makeTypeConst, makeTypeTest, type BuilderContext } from "../builder";
import { DiagnosticCodes, reportFailure } from "../diagnostics";
import type { Printer } from "./printer";
import { boolOperatorText, comparisonOperatorText, operatorText, unaryOperatorText } from "./operators";
import { formatConstant, isNegativeNumber } from "./literals";
import { expandTemplate } from "./emit-template";

// ============================================================================
// Context
// ============================================================================

/**
 * State of one printing pass: the printer plus everything the builder needs
 * to expand typed literals and type tests.
 */
export type PrintContext = BuilderContext & {
  printer: Printer;
};

/** Expressions that print directly, with no builder expansion */
export type PrintableExpression = Exclude<Expression, TypedLiteral | TypeTest>;

// ============================================================================
// Main Entry Points
// ============================================================================

export function printExpression(ctx: PrintContext, expr: Expression): void {
  printExpanded(ctx, expand(ctx, expr));
}

/**
 * Print an operand of an operator or an emit placeholder. Anything that is
 * not a name or a non-negative constant is wrapped in parentheses.
 */
export function printOperand(ctx: PrintContext, expr: Expression): void {
  const expanded = expand(ctx, expr);
  if (isAtomic(expanded)) {
    printExpanded(ctx, expanded);
  } else {
    printWithParens(ctx, expanded);
  }
}

/**
 * Report a construct the printer cannot render yet. Throws under the fatal
 * policy; otherwise the caller prints a placeholder.
 */
export function notImplemented(ctx: PrintContext, what: string, loc: SourceLocation | undefined): void {
  reportFailure(
    ctx.failurePolicy,
    ctx.diagnostics,
    "print",
    DiagnosticCodes.UnimplementedNode,
    `${what} is not supported yet`,
    loc,
    ctx.fileName
  );
}

/**
 * Print `items` separated by ", ".
 */
export function printCommaSeparated<T>(
  ctx: PrintContext,
  items: readonly T[],
  printItem: (item: T) => void
): void {
  items.forEach((item, i) => {
    if (i > 0) {
      ctx.printer.print(", ");
    }
    printItem(item);
  });
}

// ============================================================================
// Dispatch
// ============================================================================

function expand(ctx: PrintContext, expr: Expression): PrintableExpression {
  switch (expr.kind) {
    case "typedLiteral":
      return expand(ctx, makeTypeConst(ctx, expr.type, expr.value, expr.loc));
    case "typeTest":
      return expand(ctx, makeTypeTest(ctx, expr.type, expr.value, expr.loc));
    default:
      return expr;
  }
}

function printExpanded(ctx: PrintContext, expr: PrintableExpression): void {
  const { printer } = ctx;
  printer.addLocation(expr.loc);

  switch (expr.kind) {
    case "name":
      printer.print(expr.id);
      return;

    case "constant":
      printer.print(formatConstant(expr.value));
      return;

    case "call":
      printPrimary(ctx, expr.func);
      printer.print("(");
      printCommaSeparated(ctx, expr.args, (a) => printExpression(ctx, a));
      if (expr.args.length > 0 && expr.keywords.length > 0) {
        printer.print(", ");
      }
      printCommaSeparated(ctx, expr.keywords, (k) => printKeyword(ctx, k));
      printer.print(")");
      return;

    case "attribute":
      printPrimary(ctx, expr.value);
      printer.print(".");
      printer.print(expr.attr);
      return;

    case "subscript":
      printPrimary(ctx, expr.value);
      printer.print("[");
      printExpression(ctx, expr.slice);
      printer.print("]");
      return;

    case "binOp":
      printOperand(ctx, expr.left);
      printer.print(operatorText(expr.op));
      printOperand(ctx, expr.right);
      return;

    case "unaryOp":
      printer.print(unaryOperatorText(expr.op));
      printOperand(ctx, expr.operand);
      return;

    case "boolOp":
      expr.values.forEach((value, i) => {
        if (i > 0) {
          printer.print(boolOperatorText(expr.op));
        }
        printOperand(ctx, value);
      });
      return;

    case "compare": {
      printOperand(ctx, expr.left);
      const count = Math.min(expr.ops.length, expr.comparators.length);
      for (let i = 0; i < count; i++) {
        printer.print(comparisonOperatorText(expr.ops[i]));
        printOperand(ctx, expr.comparators[i]);
      }
      return;
    }

    case "ifExp":
      printConditionalBody(ctx, expr.body);
      printer.print(" if ");
      printWithParens(ctx, expand(ctx, expr.test));
      printer.print(" else ");
      printWithParens(ctx, expand(ctx, expr.orElse));
      return;

    case "lambda":
      printer.print("lambda");
      if (hasParameters(expr.args)) {
        printer.print(" ");
      }
      printArguments(ctx, expr.args, { annotations: false });
      printer.print(": ");
      printExpression(ctx, expr.body);
      return;

    case "tuple":
      printer.print("(");
      printCommaSeparated(ctx, expr.elements, (e) => printExpression(ctx, e));
      if (expr.elements.length === 1) {
        printer.print(",");
      }
      printer.print(")");
      return;

    case "list":
      printer.print("[");
      printCommaSeparated(ctx, expr.elements, (e) => printExpression(ctx, e));
      printer.print("]");
      return;

    case "set":
      if (expr.elements.length === 0) {
        printer.print("set()");
        return;
      }
      printer.print("{");
      printCommaSeparated(ctx, expr.elements, (e) => printExpression(ctx, e));
      printer.print("}");
      return;

    case "dict":
      printDict(ctx, expr.keys, expr.values);
      return;

    case "namedExpr":
      printer.print("(");
      printExpression(ctx, expr.target);
      printer.print(" := ");
      printExpression(ctx, expr.value);
      printer.print(")");
      return;

    case "starred":
      printer.print("*");
      printPrimary(ctx, expr.value);
      return;

    case "emit":
      printEmit(ctx, expr.value, expr.args);
      return;

    case "yield":
      notImplemented(ctx, "yield", expr.loc);
      printer.print("None");
      return;

    case "yieldFrom":
      notImplemented(ctx, "yield from", expr.loc);
      printer.print("None");
      return;

    case "formattedValue":
      notImplemented(ctx, "Formatted value", expr.loc);
      printer.print("None");
      return;

    default: {
      const _exhaustive: never = expr;
      throw new Error(`Unknown expression: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

// ============================================================================
// Parenthesization
// ============================================================================

function isAtomic(expr: PrintableExpression): boolean {
  switch (expr.kind) {
    case "name":
      return true;
    case "constant":
      return !isNegativeNumber(expr.value);
    default:
      return false;
  }
}

/**
 * Nodes that can be called, indexed or dotted into without parentheses.
 * Numbers are excluded: `1.real` does not parse.
 */
function isPrimary(expr: PrintableExpression): boolean {
  switch (expr.kind) {
    case "name":
    case "attribute":
    case "subscript":
    case "call":
    case "list":
    case "tuple":
    case "dict":
    case "set":
      return true;
    case "constant":
      return expr.value.type !== "number";
    default:
      return false;
  }
}

function printPrimary(ctx: PrintContext, expr: Expression): void {
  const expanded = expand(ctx, expr);
  if (isPrimary(expanded)) {
    printExpanded(ctx, expanded);
  } else {
    printWithParens(ctx, expanded);
  }
}

function printWithParens(ctx: PrintContext, expr: PrintableExpression): void {
  ctx.printer.print("(");
  printExpanded(ctx, expr);
  ctx.printer.print(")");
}

// A nested conditional or lambda in the body position would swallow the
// outer `if ... else ...`.
function printConditionalBody(ctx: PrintContext, expr: Expression): void {
  const expanded = expand(ctx, expr);
  if (expanded.kind === "ifExp" || expanded.kind === "lambda") {
    printWithParens(ctx, expanded);
  } else {
    printExpanded(ctx, expanded);
  }
}

// ============================================================================
// Compound Expressions
// ============================================================================

function printKeyword(ctx: PrintContext, kw: Keyword): void {
  ctx.printer.print(kw.arg);
  ctx.printer.print("=");
  printExpression(ctx, kw.value);
}

function printDict(ctx: PrintContext, keys: readonly Expression[], values: readonly Expression[]): void {
  const { printer } = ctx;
  const count = Math.min(keys.length, values.length);
  if (count === 0) {
    printer.print("{}");
    return;
  }

  printer.print("{");
  printer.newline();
  printer.pushIndent();
  for (let i = 0; i < count; i++) {
    printExpression(ctx, keys[i]);
    printer.print(": ");
    printExpression(ctx, values[i]);
    if (i < count - 1) {
      printer.print(",");
      printer.newline();
    }
  }
  printer.newline();
  printer.popIndent();
  printer.print("}");
}

function hasParameters(args: Arguments): boolean {
  return args.posOnlyArgs.length > 0 || args.args.length > 0 || args.varArg !== undefined;
}

/**
 * Print a parameter list (without the surrounding parentheses).
 *
 *   a, b, /, c, d=1, *rest
 *
 * Defaults line up with the tail of the regular parameters.
 */
export function printArguments(
  ctx: PrintContext,
  args: Arguments,
  options: { annotations: boolean } = { annotations: true }
): void {
  const { printer } = ctx;
  let first = true;
  const separate = () => {
    if (!first) {
      printer.print(", ");
    }
    first = false;
  };

  const printArg = (a: Arg): boolean => {
    printer.print(a.arg);
    if (options.annotations && a.annotation) {
      printer.print(": ");
      printExpression(ctx, a.annotation);
      return true;
    }
    return false;
  };

  for (const a of args.posOnlyArgs) {
    separate();
    printArg(a);
  }
  if (args.posOnlyArgs.length > 0) {
    separate();
    printer.print("/");
  }

  const firstDefault = args.args.length - args.defaults.length;
  args.args.forEach((a, i) => {
    separate();
    const annotated = printArg(a);
    if (i >= firstDefault) {
      printer.print(annotated ? " = " : "=");
      printExpression(ctx, args.defaults[i - firstDefault]);
    }
  });

  if (args.varArg) {
    separate();
    printer.print("*");
    printArg(args.varArg);
  }
}

// ============================================================================
// Emit
// ============================================================================

/**
 * Print an emit template with its arguments substituted.
 *
 * Literal text is printed line by line: leading whitespace is dropped at the
 * start of a line (the printer supplies the indentation), and empty lines
 * are skipped.
 */
export function printEmit(ctx: PrintContext, template: string, args: readonly Expression[]): void {
  // Each argument is expanded at most once, and only when the template uses it
  const expanded = new Map<number, PrintableExpression>();
  const expandArgument = (index: number): PrintableExpression => {
    const cached = expanded.get(index);
    if (cached) return cached;
    const result = expand(ctx, args[index]);
    expanded.set(index, result);
    return result;
  };
  const isConstant = (index: number) => index < args.length && expandArgument(index).kind === "constant";

  for (const part of expandTemplate(template, args, isConstant)) {
    if (part.kind === "text") {
      printEmitText(ctx.printer, part.value);
    } else if (part.index < args.length) {
      printOperand(ctx, expandArgument(part.index));
    } else {
      ctx.printer.print("None");
    }
  }
}

function printEmitText(printer: Printer, text: string): void {
  const lines = text.split(/\r?\n/);
  lines.forEach((line, i) => {
    const piece = printer.atLineStart ? line.trimStart() : line;
    if (piece.length > 0) {
      printer.print(piece);
      if (i < lines.length - 1) {
        printer.newline();
      }
    }
  });
}
