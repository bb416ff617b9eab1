/**
 * Tests for the module driver.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  printModule,
  printModuleToString,
  splitImports,
  StringWriter,
  CompileError,
  module,
  importStmt,
  importFrom,
  alias,
  assign,
  functionDef,
  returnStmt,
  exprStmt,
  typeTest,
  declaredType,
  args,
  name,
  int,
  span,
  type Logger,
  type Writer,
  type Statement,
} from "../src/index";

const setVar = (id: string, value: number): Statement => assign([name(id)], int(value));

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
}

/** Records chunks and runs a callback after each write */
class RecordingWriter implements Writer {
  chunks: string[] = [];
  closed = 0;

  constructor(private readonly onWrite: (count: number) => void = () => {}) {}

  async write(chunk: string): Promise<void> {
    this.chunks.push(chunk);
    this.onWrite(this.chunks.length);
  }

  makeImportPath(path: string): string {
    return path;
  }

  close(): void {
    this.closed++;
  }
}

const sample = module([
  importStmt([alias("os")]),
  importFrom("./lib/util.py", [alias("helper")]),
  setVar("x", 1),
  functionDef("f", args(), [returnStmt(name("x"))]),
]);

describe("printModule", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints imports first, then each declaration followed by a blank line", async () => {
    const { code } = await printModuleToString(sample, { logger: silentLogger() });
    expect(code).toBe(
      "import os\nfrom .lib.util import helper\n\nx = 1\n\ndef f():\n    return x\n\n\n"
    );
  });

  it("flushes the imports and each declaration separately", async () => {
    const writer = new StringWriter();
    await printModule(sample, writer, undefined, { logger: silentLogger() });
    expect(writer.getChunks()).toEqual([
      "import os\nfrom .lib.util import helper\n\n",
      "x = 1\n\n",
      "def f():\n    return x\n\n\n",
    ]);
  });

  it("writes a single newline when there are no imports", async () => {
    const writer = new StringWriter();
    await printModule(module([setVar("x", 1)]), writer, undefined, { logger: silentLogger() });
    expect(writer.getChunks()).toEqual(["\n", "x = 1\n\n"]);
  });

  it("treats imports after the first declaration as declarations", async () => {
    const body = [setVar("x", 1), importStmt([alias("os")])];
    expect(splitImports(body)).toEqual({ imports: [], declarations: body });
  });

  it("closes the writer after a successful pass", async () => {
    const writer = new StringWriter();
    await printModule(sample, writer, undefined, { logger: silentLogger() });
    expect(writer.isClosed).toBe(true);
  });

  it("closes the writer when printing fails", async () => {
    const writer = new StringWriter();
    const broken = module([exprStmt({ kind: "yieldFrom", value: name("gen") })]);
    await expect(printModule(broken, writer, undefined, { logger: silentLogger() })).rejects.toThrow(CompileError);
    expect(writer.isClosed).toBe(true);
    expect(writer.toString()).toBe("\n");
  });

  it("notes the declaration that failed", async () => {
    const broken = module([
      setVar("x", 1),
      functionDef("g", args(), [exprStmt({ kind: "yieldFrom", value: name("gen") })], { loc: span(5, 0) }),
    ]);
    const error = await printModule(broken, new StringWriter(), undefined, { logger: silentLogger() }).catch(
      (err: unknown) => err
    );
    if (!(error instanceof CompileError)) throw new Error("expected a CompileError");
    expect(error.message).toBe("yield from is not supported yet");
    expect(error.notes).toEqual([{ message: "while printing function g", loc: span(5, 0) }]);
  });

  it("keeps the printing error when closing the writer also fails", async () => {
    const logger = silentLogger();
    const writer: Writer = {
      write: async () => {},
      makeImportPath: (p) => p,
      close: () => {
        throw new Error("disk gone");
      },
    };
    const broken = module([exprStmt({ kind: "yieldFrom", value: name("gen") })]);
    await expect(printModule(broken, writer, undefined, { logger })).rejects.toThrow(
      "yield from is not supported yet"
    );
    expect(logger.warn).toHaveBeenCalledWith("pyemit: closing the writer failed: disk gone");
  });

  it("rejects with the close error after a successful pass", async () => {
    const writer: Writer = {
      write: async () => {},
      makeImportPath: (p) => p,
      close: async () => {
        throw new Error("disk gone");
      },
    };
    await expect(printModule(sample, writer, undefined, { logger: silentLogger() })).rejects.toThrow("disk gone");
  });

  it("stops between declarations when cancelled", async () => {
    const controller = new AbortController();
    const writer = new RecordingWriter((count) => {
      if (count === 2) controller.abort();
    });
    const logger = silentLogger();
    const result = await printModule(
      module([setVar("a", 1), setVar("b", 2), setVar("c", 3)]),
      writer,
      undefined,
      { signal: controller.signal, logger }
    );

    expect(result.cancelled).toBe(true);
    expect(result.declarations).toBe(1);
    expect(writer.chunks).toEqual(["\n", "a = 1\n\n"]);
    expect(writer.closed).toBe(1);
    expect(logger.info).toHaveBeenCalledWith("pyemit: cancelled after 1 of 3 declarations");
  });

  it("writes nothing when cancelled before starting", async () => {
    const controller = new AbortController();
    controller.abort();
    const writer = new RecordingWriter();
    const result = await printModule(sample, writer, undefined, { signal: controller.signal, logger: silentLogger() });
    expect(result).toMatchObject({ cancelled: true, declarations: 0 });
    expect(writer.chunks).toEqual([]);
    expect(writer.closed).toBe(1);
  });

  it("is idempotent", async () => {
    const first = await printModuleToString(sample, { logger: silentLogger() });
    const second = await printModuleToString(sample, { logger: silentLogger() });
    expect(second.code).toBe(first.code);
    expect(second.mappings).toEqual(first.mappings);
  });

  it("records mappings at the first character of each node", async () => {
    const program = module([
      assign([name("x", span(1, 0, 1, "x"))], int(1), span(1, 0)),
      functionDef("f", args(), [returnStmt(name("x"), span(5, 4))], { loc: span(4, 0) }),
    ]);
    const { mappings } = await printModuleToString(program, { logger: silentLogger() });
    expect(mappings).toEqual([
      { generated: { line: 2, column: 0 }, original: { line: 1, column: 0 }, name: null },
      { generated: { line: 2, column: 0 }, original: { line: 1, column: 0 }, name: "x" },
      { generated: { line: 4, column: 0 }, original: { line: 4, column: 0 }, name: null },
      { generated: { line: 5, column: 4 }, original: { line: 5, column: 4 }, name: null },
    ]);
  });

  describe("logging", () => {
    it("logs each flush at debug level", async () => {
      const logger = silentLogger();
      await printModule(module([setVar("x", 1)]), new StringWriter(), undefined, { logger });
      expect(logger.debug).toHaveBeenNthCalledWith(1, "pyemit: flushed 1 characters, next line 2");
      expect(logger.debug).toHaveBeenNthCalledWith(2, "pyemit: flushed 7 characters, next line 4");
    });

    it("warns once per error reported during the pass", async () => {
      const logger = silentLogger();
      const program = module([exprStmt(typeTest(declaredType("Shape"), name("s"), span(3, 4)))]);
      const result = await printModuleToString(program, { logger, fileName: "app/main.src" });

      expect(result.code).toBe("\nNone\n\n");
      expect(result.diagnostics.count()).toBe(1);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "app/main.src:3:4: error PY001: Cannot type test declared type Shape: records, unions, interfaces and classes have no runtime test"
      );
    });

    it("still warns about earlier errors when the pass aborts", async () => {
      const logger = silentLogger();
      const program = module([
        exprStmt(typeTest(declaredType("Shape"), name("s"), span(3, 4))),
        exprStmt({ kind: "yieldFrom", value: name("gen") }),
      ]);
      await expect(printModuleToString(program, { logger, fileName: "app/main.src" })).rejects.toThrow(CompileError);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "app/main.src:3:4: error PY001: Cannot type test declared type Shape: records, unions, interfaces and classes have no runtime test"
      );
    });

    it("logs to the console by default", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const program = module([exprStmt(typeTest(declaredType("Shape"), name("s")))]);
      await printModuleToString(program);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });
});
