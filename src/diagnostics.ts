/**
 * Diagnostics and compiler errors.
 *
 * Recoverable problems go to a DiagnosticCollector, one per compilation unit,
 * which the caller drains after the printing pass. Fatal problems throw a
 * CompileError.
 */

import type { SourceLocation } from "./python-ast";

// ============================================================================
// Diagnostics
// ============================================================================

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  severity: Severity;
  code: string;
  message: string;
  loc?: SourceLocation;
  fileName?: string;
}

/**
 * How literal mismatches and unimplemented AST shapes are handled.
 *
 * - "fatal": throw a CompileError and abort the pass
 * - "recover": report an error diagnostic and continue with a placeholder
 */
export type FailurePolicy = "fatal" | "recover";

export const DiagnosticCodes = {
  UnsupportedTypeTest: "PY001",
  LiteralMismatch: "PY002",
  UnimplementedNode: "PY003",
} as const;

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  add(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  error(code: string, message: string, loc?: SourceLocation, fileName?: string): void {
    this.add({ severity: "error", code, message, loc, fileName });
  }

  warning(code: string, message: string, loc?: SourceLocation, fileName?: string): void {
    this.add({ severity: "warning", code, message, loc, fileName });
  }

  info(code: string, message: string, loc?: SourceLocation, fileName?: string): void {
    this.add({ severity: "info", code, message, loc, fileName });
  }

  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getBySeverity(severity: Severity): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === severity);
  }

  getErrors(): Diagnostic[] {
    return this.getBySeverity("error");
  }

  getWarnings(): Diagnostic[] {
    return this.getBySeverity("warning");
  }

  hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === "error");
  }

  count(): number {
    return this.diagnostics.length;
  }

  clear(): void {
    this.diagnostics = [];
  }

  /**
   * Diagnostics ordered by file, then line, then column. Diagnostics without a
   * location keep their relative order after the located ones.
   */
  sorted(): Diagnostic[] {
    return [...this.diagnostics].sort((a, b) => {
      const fileCompare = (a.fileName ?? "").localeCompare(b.fileName ?? "");
      if (fileCompare !== 0) return fileCompare;

      if (!a.loc || !b.loc) {
        return (a.loc ? 0 : 1) - (b.loc ? 0 : 1);
      }
      if (a.loc.start.line !== b.loc.start.line) {
        return a.loc.start.line - b.loc.start.line;
      }
      return a.loc.start.column - b.loc.start.column;
    });
  }

  merge(other: DiagnosticCollector): void {
    for (const d of other.getAll()) {
      this.add(d);
    }
  }
}

/**
 * Render a diagnostic as `file:line:col: severity CODE: message`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const file = d.fileName ?? "<unknown>";
  const position = d.loc ? `${d.loc.start.line}:${d.loc.start.column}` : "0:0";
  return `${file}:${position}: ${d.severity} ${d.code}: ${d.message}`;
}

// ============================================================================
// Compiler Errors
// ============================================================================

export type CompileErrorStage = "builder" | "print";

export type CompilerNote = {
  message: string;
  loc?: SourceLocation;
};

export class CompileError extends Error {
  stage: CompileErrorStage;
  loc?: SourceLocation;
  notes: CompilerNote[];

  constructor(message: string, stage: CompileErrorStage = "print", loc?: SourceLocation) {
    super(message);
    this.name = "CompileError";
    this.stage = stage;
    this.loc = loc;
    this.notes = [];
  }

  addNote(message: string, loc?: SourceLocation): this {
    this.notes.push({ message, loc });
    return this;
  }
}

/**
 * Route a failure through the configured policy: throw when fatal, otherwise
 * record an error diagnostic and return so the caller can substitute a placeholder.
 */
export function reportFailure(
  policy: FailurePolicy,
  diagnostics: DiagnosticCollector,
  stage: CompileErrorStage,
  code: string,
  message: string,
  loc?: SourceLocation,
  fileName?: string
): void {
  if (policy === "fatal") {
    throw new CompileError(message, stage, loc);
  }
  diagnostics.error(code, message, loc, fileName);
}
