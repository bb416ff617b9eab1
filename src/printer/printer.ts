/**
 * Printer - line/column bookkeeping over a buffered, chunked sink.
 *
 * Text is appended to a pending buffer; indentation is applied lazily the
 * first time something is printed on a line. `flush()` hands the buffer to
 * the writer. The printer never rewinds: once text is printed, it is final.
 */

import type { SourceLocation } from "../python-ast";
import type { Writer } from "../writer";
import { type SourceMapGenerator, noSourceMap } from "../source-map";

export interface PrinterOptions {
  /** Indentation unit (default: four spaces) */
  indent?: string;
}

export const defaultPrinterOptions: Required<PrinterOptions> = {
  indent: "    ",
};

export class Printer {
  private parts: string[] = [];
  private indentLevel: number = 0;
  private indentStr: string;
  private currentLine: number = 1;
  private currentColumn: number = 0;
  private lineHasText: boolean = false;

  constructor(
    private readonly writer: Writer,
    private readonly sourceMap: SourceMapGenerator = noSourceMap,
    options: PrinterOptions = {}
  ) {
    this.indentStr = options.indent ?? defaultPrinterOptions.indent;
  }

  /** 1-based line of the next character */
  get line(): number {
    return this.currentLine;
  }

  /** 0-based column of the next character */
  get column(): number {
    return this.currentColumn;
  }

  /** True until something other than indentation is printed on the current line */
  get atLineStart(): boolean {
    return !this.lineHasText;
  }

  get indentDepth(): number {
    return this.indentLevel;
  }

  /** Text printed since the last flush */
  get pendingText(): string {
    return this.parts.join("");
  }

  /**
   * Append text. At the start of a line the indentation is emitted first,
   * even when `text` is empty, and the mapping for `loc` points past it.
   */
  print(text: string, loc?: SourceLocation): void {
    if (this.currentColumn === 0) {
      const indent = this.indentStr.repeat(this.indentLevel);
      this.parts.push(indent);
      this.currentColumn = indent.length;
    }

    if (loc) {
      this.addMapping(loc);
    }

    this.parts.push(text);
    this.currentColumn += text.length;
    if (text.length > 0) {
      this.lineHasText = true;
    }
  }

  newline(): void {
    this.parts.push("\n");
    this.currentLine++;
    this.currentColumn = 0;
    this.lineHasText = false;
  }

  pushIndent(): void {
    this.indentLevel++;
  }

  popIndent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  /**
   * Record a zero-width mapping at the current position.
   */
  addLocation(loc: SourceLocation | undefined): void {
    if (loc) {
      this.print("", loc);
    }
  }

  /**
   * Write everything printed so far to the writer and clear the buffer.
   */
  async flush(): Promise<void> {
    const chunk = this.parts.join("");
    this.parts = [];
    if (chunk.length > 0) {
      await this.writer.write(chunk);
    }
  }

  makeImportPath(path: string): string {
    return this.writer.makeImportPath(path);
  }

  private addMapping(loc: SourceLocation): void {
    this.sourceMap.addMapping(
      loc.start.line,
      loc.start.column,
      this.currentLine,
      this.currentColumn,
      loc.identifierName
    );
  }
}
