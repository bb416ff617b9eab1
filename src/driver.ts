/**
 * Driver - prints a whole module, one chunk per top-level declaration.
 *
 * Leading imports are printed together as the first chunk, followed by a
 * blank line. Each remaining declaration is printed, followed by a blank
 * line, and flushed before the next one starts, so a cancelled pass leaves
 * only complete declarations in the sink. The writer is closed on every
 * exit path, and errors reported during the pass are logged even when it
 * aborts.
 */

import type { Module, Statement } from "./python-ast";
import type { BuilderOptions } from "./builder";
import { type DiagnosticCollector, CompileError, formatDiagnostic } from "./diagnostics";
import { type Writer, type WriterOptions, StringWriter } from "./writer";
import { type SourceMapGenerator, type SourceMapping, MappingCollector, noSourceMap } from "./source-map";
import { Printer, type PrinterOptions } from "./printer/printer";
import { createPrintContext } from "./printer";
import { printStatement, printStatementSeparator } from "./printer/print-stmt";

// ============================================================================
// Options
// ============================================================================

export type Logger = Pick<Console, "debug" | "info" | "warn">;

export const defaultLogger: Logger = {
  debug: () => {},
  info: (...data: unknown[]) => console.info(...data),
  warn: (...data: unknown[]) => console.warn(...data),
};

export interface DriverOptions extends PrinterOptions, BuilderOptions {
  /** Checked between top-level declarations */
  signal?: AbortSignal;
  logger?: Logger;
}

export type PrintResult = {
  diagnostics: DiagnosticCollector;
  /** True when the signal stopped the pass before the last declaration */
  cancelled: boolean;
  /** Number of non-import declarations printed */
  declarations: number;
};

// ============================================================================
// Main Entry Points
// ============================================================================

/**
 * Print `module` to `writer`, forwarding source locations to `sourceMap`.
 */
export async function printModule(
  module: Module,
  writer: Writer,
  sourceMap: SourceMapGenerator = noSourceMap,
  options: DriverOptions = {}
): Promise<PrintResult> {
  const logger = options.logger ?? defaultLogger;
  const printer = new Printer(writer, sourceMap, options);
  const ctx = createPrintContext(printer, options);
  const reportedBefore = ctx.diagnostics.count();

  const { imports, declarations } = splitImports(module.body);
  let printed = 0;
  let cancelled = false;

  const flush = async () => {
    const size = printer.pendingText.length;
    await printer.flush();
    logger.debug(`pyemit: flushed ${size} characters, next line ${printer.line}`);
  };

  let failed = false;
  try {
    if (options.signal?.aborted) {
      cancelled = true;
    } else {
      for (const stmt of imports) {
        printStatement(ctx, stmt);
        printStatementSeparator(ctx);
      }
      printer.newline();
      await flush();

      for (const decl of declarations) {
        if (options.signal?.aborted) {
          cancelled = true;
          break;
        }
        try {
          printStatement(ctx, decl);
        } catch (err) {
          if (err instanceof CompileError) {
            err.addNote(`while printing ${describeDeclaration(decl)}`, decl.loc);
          }
          throw err;
        }
        printStatementSeparator(ctx);
        printer.newline();
        await flush();
        printed++;
      }
    }
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    for (const d of ctx.diagnostics.getAll().slice(reportedBefore)) {
      if (d.severity === "error") {
        logger.warn(formatDiagnostic(d));
      }
    }
    await closeWriter(writer, failed, logger);
  }

  if (cancelled) {
    logger.info(`pyemit: cancelled after ${printed} of ${declarations.length} declarations`);
  }

  return { diagnostics: ctx.diagnostics, cancelled, declarations: printed };
}

// A close failure is rethrown unless another error is already propagating
async function closeWriter(writer: Writer, failed: boolean, logger: Logger): Promise<void> {
  try {
    await writer.close();
  } catch (err) {
    if (!failed) throw err;
    logger.warn(`pyemit: closing the writer failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function describeDeclaration(decl: Statement): string {
  switch (decl.kind) {
    case "functionDef":
    case "asyncFunctionDef":
      return `function ${decl.name}`;
    case "classDef":
      return `class ${decl.name}`;
    default:
      return `${decl.kind} statement`;
  }
}

export type PrintToStringOptions = DriverOptions & WriterOptions;

export type PrintToStringResult = {
  code: string;
  mappings: SourceMapping[];
  diagnostics: DiagnosticCollector;
  cancelled: boolean;
};

/**
 * Print a module in memory, collecting the mappings alongside the code.
 */
export async function printModuleToString(
  module: Module,
  options: PrintToStringOptions = {}
): Promise<PrintToStringResult> {
  const writer = new StringWriter(options);
  const mappings = new MappingCollector();
  const result = await printModule(module, writer, mappings, options);
  return {
    code: writer.toString(),
    mappings: mappings.getMappings(),
    diagnostics: result.diagnostics,
    cancelled: result.cancelled,
  };
}

/**
 * Split off the run of import statements that opens the module.
 */
export function splitImports(body: readonly Statement[]): {
  imports: readonly Statement[];
  declarations: readonly Statement[];
} {
  const firstDeclaration = body.findIndex((s) => s.kind !== "import" && s.kind !== "importFrom");
  const split = firstDeclaration === -1 ? body.length : firstDeclaration;
  return { imports: body.slice(0, split), declarations: body.slice(split) };
}
