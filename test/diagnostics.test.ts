/**
 * Tests for the diagnostics collector and compile errors.
 */

import { describe, it, expect } from "vitest";
import {
  DiagnosticCollector,
  CompileError,
  formatDiagnostic,
  reportFailure,
  formatType,
  functionType,
  tupleType,
  declaredType,
  arrayType,
  stringType,
  numberType,
  span,
} from "../src/index";

describe("DiagnosticCollector", () => {
  it("filters by severity", () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.error("PY001", "bad");
    diagnostics.warning("PY100", "odd");
    diagnostics.info("PY200", "note");
    expect(diagnostics.count()).toBe(3);
    expect(diagnostics.hasErrors()).toBe(true);
    expect(diagnostics.getErrors().map((d) => d.message)).toEqual(["bad"]);
    expect(diagnostics.getWarnings().map((d) => d.message)).toEqual(["odd"]);
    expect(diagnostics.getBySeverity("info").map((d) => d.code)).toEqual(["PY200"]);
  });

  it("sorts by file, then position, with unlocated diagnostics last", () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.error("E", "b-late", span(9, 0), "b.src");
    diagnostics.error("E", "a-none", undefined, "a.src");
    diagnostics.error("E", "a-late", span(5, 3), "a.src");
    diagnostics.error("E", "a-early", span(5, 1), "a.src");
    expect(diagnostics.sorted().map((d) => d.message)).toEqual(["a-early", "a-late", "a-none", "b-late"]);
  });

  it("merges and clears", () => {
    const first = new DiagnosticCollector();
    const second = new DiagnosticCollector();
    second.warning("W", "w");
    first.merge(second);
    expect(first.count()).toBe(1);
    first.clear();
    expect(first.hasErrors()).toBe(false);
    expect(first.count()).toBe(0);
  });
});

describe("formatDiagnostic", () => {
  it("renders the location, severity and code", () => {
    expect(
      formatDiagnostic({ severity: "warning", code: "PY100", message: "odd", loc: span(2, 7), fileName: "m.src" })
    ).toBe("m.src:2:7: warning PY100: odd");
  });

  it("uses placeholders for a missing file and location", () => {
    expect(formatDiagnostic({ severity: "error", code: "PY002", message: "bad" })).toBe(
      "<unknown>:0:0: error PY002: bad"
    );
  });
});

describe("reportFailure", () => {
  it("throws under the fatal policy without recording", () => {
    const diagnostics = new DiagnosticCollector();
    expect(() => reportFailure("fatal", diagnostics, "print", "PY003", "boom")).toThrow(CompileError);
    expect(diagnostics.count()).toBe(0);
  });

  it("records an error under the recover policy", () => {
    const diagnostics = new DiagnosticCollector();
    reportFailure("recover", diagnostics, "print", "PY003", "boom", span(1, 1), "m.src");
    expect(diagnostics.getErrors()).toEqual([
      { severity: "error", code: "PY003", message: "boom", loc: span(1, 1), fileName: "m.src" },
    ]);
  });
});

describe("CompileError", () => {
  it("carries a stage and notes", () => {
    const error = new CompileError("failed", "builder", span(3, 0)).addNote("while printing f", span(1, 0));
    expect(error.name).toBe("CompileError");
    expect(error.stage).toBe("builder");
    expect(error.notes).toEqual([{ message: "while printing f", loc: span(1, 0) }]);
  });

  it("defaults to the print stage", () => {
    expect(new CompileError("failed").stage).toBe("print");
  });
});

describe("formatType", () => {
  it("renders compound types", () => {
    expect(formatType(functionType([stringType, numberType("int32")], arrayType(stringType)))).toBe(
      "(string, int32) -> string[]"
    );
    expect(formatType(tupleType([stringType, numberType("float64")]))).toBe("(string * float64)");
    expect(formatType(declaredType("Map", [stringType, numberType("int32")]))).toBe("Map<string, int32>");
  });
});
