/**
 * Statement printing and block layout.
 */

import type { Alias, ExceptHandler, Expression, Statement } from "../python-ast";
import { pass } from "../python-ast";
import {
  type PrintContext,
  notImplemented,
  printArguments,
  printCommaSeparated,
  printExpression,
} from "./print-expr";

// ============================================================================
// Sequences and Blocks
// ============================================================================

/**
 * End the current statement, unless nothing has been printed on its line.
 */
export function printStatementSeparator(ctx: PrintContext): void {
  if (ctx.printer.column > 0) {
    ctx.printer.newline();
  }
}

export function printStatements(ctx: PrintContext, statements: readonly Statement[]): void {
  for (const stmt of statements) {
    printStatement(ctx, stmt);
    printStatementSeparator(ctx);
  }
}

/**
 * Print an indented suite after a header that ends in ":".
 *
 * The block ends with an empty line unless `skipNewlineAtEnd` is set.
 * An empty suite prints `pass`.
 */
export function printBlock(
  ctx: PrintContext,
  statements: readonly Statement[],
  skipNewlineAtEnd: boolean = false
): void {
  const { printer } = ctx;
  printer.print("");
  printer.newline();
  printer.pushIndent();
  printStatements(ctx, statements.length > 0 ? statements : [pass]);
  printer.popIndent();
  if (!skipNewlineAtEnd) {
    printer.newline();
  }
}

// Header-and-suite without the trailing blank line (class, for, while)
function printSuite(ctx: PrintContext, statements: readonly Statement[]): void {
  const { printer } = ctx;
  printer.newline();
  printer.pushIndent();
  printStatements(ctx, statements.length > 0 ? statements : [pass]);
  printer.popIndent();
}

// ============================================================================
// Statement Dispatch
// ============================================================================

export function printStatement(ctx: PrintContext, stmt: Statement): void {
  const { printer } = ctx;
  printer.addLocation(stmt.loc);

  switch (stmt.kind) {
    case "functionDef":
      printDecorators(ctx, stmt.decoratorList);
      printer.print("def ");
      printer.print(stmt.name);
      printer.print("(");
      printArguments(ctx, stmt.args);
      printer.print(")");
      if (stmt.returns) {
        printer.print(" -> ");
        printExpression(ctx, stmt.returns);
      }
      printer.print(":");
      printBlock(ctx, stmt.body, true);
      printer.newline();
      return;

    case "classDef":
      printDecorators(ctx, stmt.decoratorList);
      printer.print("class ");
      printer.print(stmt.name);
      if (stmt.bases.length > 0) {
        printer.print("(");
        printCommaSeparated(ctx, stmt.bases, (b) => printExpression(ctx, b));
        printer.print(")");
      }
      printer.print(":");
      printSuite(ctx, stmt.body);
      return;

    case "if":
      printer.print("if ");
      printExpression(ctx, stmt.test);
      printer.print(":");
      printBlock(ctx, stmt.body);
      printElse(ctx, stmt.orElse);
      return;

    case "for":
      printer.print("for ");
      printExpression(ctx, stmt.target);
      printer.print(" in ");
      printExpression(ctx, stmt.iter);
      printer.print(":");
      printSuite(ctx, stmt.body);
      return;

    case "while":
      printer.print("while ");
      printExpression(ctx, stmt.test);
      printer.print(":");
      printSuite(ctx, stmt.body);
      return;

    case "try":
      printer.print("try:");
      printBlock(ctx, stmt.body);
      for (const handler of stmt.handlers) {
        printExceptHandler(ctx, handler);
      }
      if (stmt.orElse.length > 0) {
        printer.print("else:");
        printBlock(ctx, stmt.orElse);
      }
      if (stmt.finalBody.length > 0) {
        printer.print("finally:");
        printBlock(ctx, stmt.finalBody);
      }
      return;

    case "import":
      if (stmt.names.length > 0) {
        printer.print("import ");
        printAliases(ctx, stmt.names);
      }
      return;

    case "importFrom":
      if (stmt.names.length > 0) {
        printer.print("from ");
        printer.print(printer.makeImportPath(stmt.module ?? "."));
        printer.print(" import ");
        printAliases(ctx, stmt.names);
      }
      return;

    case "assign":
      for (const target of stmt.targets) {
        printExpression(ctx, target);
        printer.print(" = ");
      }
      printExpression(ctx, stmt.value);
      return;

    case "return":
      printer.print("return");
      if (stmt.value) {
        printer.print(" ");
        printExpression(ctx, stmt.value);
      }
      return;

    case "raise":
      printer.print("raise ");
      printExpression(ctx, stmt.exception);
      return;

    case "expr":
      printExpression(ctx, stmt.value);
      return;

    case "pass":
      printer.print("pass");
      return;

    case "break":
      printer.print("break");
      return;

    case "continue":
      printer.print("continue");
      return;

    case "global":
    case "nonlocal":
      if (stmt.names.length > 0) {
        printer.print(stmt.kind === "global" ? "global " : "nonlocal ");
        printer.print(stmt.names.join(", "));
      }
      return;

    case "asyncFunctionDef":
      notImplemented(ctx, "Async function definition", stmt.loc);
      printer.print("pass");
      return;

    case "asyncFor":
      notImplemented(ctx, "Async for", stmt.loc);
      printer.print("pass");
      return;

    default: {
      const _exhaustive: never = stmt;
      throw new Error(`Unknown statement: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

// ============================================================================
// Statement Parts
// ============================================================================

/**
 * The `else` branch of an if statement. A branch holding nothing but `pass`
 * is dropped, and a branch holding a single if statement becomes `elif`.
 */
function printElse(ctx: PrintContext, orElse: readonly Statement[]): void {
  const { printer } = ctx;
  if (orElse.length === 0) return;

  const [only] = orElse;
  if (orElse.length === 1 && only.kind === "pass") return;

  if (orElse.length === 1 && only.kind === "if") {
    printer.addLocation(only.loc);
    printer.print("elif ");
    printExpression(ctx, only.test);
    printer.print(":");
    printBlock(ctx, only.body);
    printElse(ctx, only.orElse);
    return;
  }

  printer.print("else:");
  printBlock(ctx, orElse);
}

function printExceptHandler(ctx: PrintContext, handler: ExceptHandler): void {
  const { printer } = ctx;
  printer.print("except", handler.loc);
  if (handler.type) {
    printer.print(" ");
    printExpression(ctx, handler.type);
  }
  if (handler.name !== undefined) {
    printer.print(" as ");
    printer.print(handler.name);
  }
  printer.print(":");
  printBlock(ctx, handler.body);
}

function printDecorators(ctx: PrintContext, decorators: readonly Expression[]): void {
  for (const decorator of decorators) {
    ctx.printer.print("@");
    printExpression(ctx, decorator);
    ctx.printer.newline();
  }
}

/**
 * `a`, or `(a, b as c)` for more than one name. An alias equal to the name
 * is not printed.
 */
function printAliases(ctx: PrintContext, names: readonly Alias[]): void {
  const { printer } = ctx;
  const grouped = names.length > 1;
  if (grouped) printer.print("(");
  printCommaSeparated(ctx, names, (a) => {
    printer.print(a.name);
    if (a.asName !== undefined && a.asName !== a.name) {
      printer.print(" as ");
      printer.print(a.asName);
    }
  });
  if (grouped) printer.print(")");
}
