/**
 * Printer - public exports and string conveniences.
 */

import type { Expression, Statement } from "../python-ast";
import { createBuilderContext, type BuilderOptions } from "../builder";
import { StringWriter, type WriterOptions } from "../writer";
import { type SourceMapGenerator, noSourceMap } from "../source-map";
import { Printer, type PrinterOptions } from "./printer";
import { type PrintContext, printExpression } from "./print-expr";
import { printStatements } from "./print-stmt";

export { Printer, defaultPrinterOptions } from "./printer";
export type { PrinterOptions } from "./printer";
export { printExpression, printOperand, printArguments, printEmit } from "./print-expr";
export type { PrintContext, PrintableExpression } from "./print-expr";
export { printStatement, printStatements, printBlock, printStatementSeparator } from "./print-stmt";
export { escapeString, formatConstant, formatNumber } from "./literals";
export {
  expandTemplate,
  rewriteMacros,
  parseTemplate,
  clearTemplateCache,
  templateCacheSize,
  TEMPLATE_CACHE_LIMIT,
} from "./emit-template";
export type { TemplatePart, ConstantArgumentTest } from "./emit-template";

export type PrintStringOptions = PrinterOptions &
  BuilderOptions &
  WriterOptions & {
    sourceMap?: SourceMapGenerator;
  };

export function createPrintContext(printer: Printer, options: BuilderOptions = {}): PrintContext {
  return { ...createBuilderContext(options), printer };
}

function stringContext(options: PrintStringOptions): PrintContext {
  const printer = new Printer(new StringWriter(options), options.sourceMap ?? noSourceMap, options);
  return createPrintContext(printer, options);
}

/**
 * Print a single expression to a string.
 */
export function expressionToString(expr: Expression, options: PrintStringOptions = {}): string {
  const ctx = stringContext(options);
  printExpression(ctx, expr);
  return ctx.printer.pendingText;
}

/**
 * Print statements to a string, each terminated the way a block terminates them.
 */
export function statementsToString(statements: readonly Statement[], options: PrintStringOptions = {}): string {
  const ctx = stringContext(options);
  printStatements(ctx, statements);
  return ctx.printer.pendingText;
}
