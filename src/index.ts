/**
 * Python back end: prints a Python syntax tree to source text and a source map.
 */

// AST model and constructors
export * from "./python-ast";

// Semantic types consumed by the builder
export * from "./semantic-types";

// Diagnostics
export {
  DiagnosticCollector,
  DiagnosticCodes,
  CompileError,
  formatDiagnostic,
  reportFailure,
} from "./diagnostics";
export type {
  Diagnostic,
  Severity,
  FailurePolicy,
  CompileErrorStage,
  CompilerNote,
} from "./diagnostics";

// Type-directed expression builder
export * from "./builder";

// Printer
export {
  Printer,
  defaultPrinterOptions,
  createPrintContext,
  expressionToString,
  statementsToString,
  printExpression,
  printStatement,
  printStatements,
  escapeString,
  formatConstant,
  expandTemplate,
  TEMPLATE_CACHE_LIMIT,
} from "./printer";
export type {
  PrinterOptions,
  PrintContext,
  PrintStringOptions,
  TemplatePart,
  ConstantArgumentTest,
} from "./printer";

// Driver
export { printModule, printModuleToString, splitImports, defaultLogger } from "./driver";
export type { DriverOptions, Logger, PrintResult, PrintToStringOptions, PrintToStringResult } from "./driver";

// Output sinks
export { StringWriter, FileWriter, defaultImportPath } from "./writer";
export type { Writer, WriterOptions, ImportPathResolver } from "./writer";
export { MappingCollector, V3SourceMap, noSourceMap } from "./source-map";
export type { SourceMapGenerator, SourceMapping } from "./source-map";
