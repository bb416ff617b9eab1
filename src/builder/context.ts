/**
 * Shared state threaded through the builder: where failures go and which
 * runtime helpers the generated code refers to.
 */

import { DiagnosticCollector, type FailurePolicy } from "../diagnostics";

/**
 * Names of the runtime helpers that generated code calls.
 * Override any of them to match the runtime library shipped with the output.
 */
export type RuntimeNames = {
  /** 64-bit integer class */
  long: string;
  /** Static constructor on the long class taking (low, high, unsigned) */
  longFromBits: string;
  /** Rounds a double to single precision */
  fround: string;
  /** Returns "number", "string", "boolean" or "function" for a value */
  typeOf: string;
  /** Array-like predicate */
  isArray: string;
  regex: string;
  decimal: string;
  bigInt: string;
};

export const defaultRuntimeNames: RuntimeNames = {
  long: "Long",
  longFromBits: "from_bits",
  fround: "fround",
  typeOf: "type_of",
  isArray: "is_array",
  regex: "RegExp",
  decimal: "Decimal",
  bigInt: "BigInt",
};

export type BuilderContext = {
  diagnostics: DiagnosticCollector;
  failurePolicy: FailurePolicy;
  runtime: RuntimeNames;
  /** Reported with every diagnostic */
  fileName?: string;
};

export type BuilderOptions = {
  diagnostics?: DiagnosticCollector;
  failurePolicy?: FailurePolicy;
  runtime?: Partial<RuntimeNames>;
  fileName?: string;
};

export function createBuilderContext(options: BuilderOptions = {}): BuilderContext {
  return {
    diagnostics: options.diagnostics ?? new DiagnosticCollector(),
    failurePolicy: options.failurePolicy ?? "fatal",
    runtime: { ...defaultRuntimeNames, ...options.runtime },
    fileName: options.fileName,
  };
}
