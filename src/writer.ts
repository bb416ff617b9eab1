/**
 * Output sinks for the printer.
 *
 * A writer receives ordered chunks of Python source, one per flush, and owns
 * the hook that turns logical module references into Python import paths.
 */

import * as fs from "fs";

export interface Writer {
  write(chunk: string): Promise<void>;
  /** Translate a logical module reference into the path printed after `from` */
  makeImportPath(path: string): string;
  /** Release the sink. Called once, on every exit path of a printing pass. */
  close(): Promise<void> | void;
}

export type ImportPathResolver = (path: string) => string;

export type WriterOptions = {
  makeImportPath?: ImportPathResolver;
};

const EXTENSION = /\.[A-Za-z0-9]+$/;

/**
 * Map a file-style module reference to a dotted Python module path.
 *
 *   "./util/seq.py"  -> ".util.seq"
 *   "../lib/long"    -> "..lib.long"
 *   "runtime_lib/list.py" -> "runtime_lib.list"
 *
 * References without a slash are taken to be module paths already.
 */
export function defaultImportPath(path: string): string {
  if (!path.includes("/")) {
    return path;
  }

  const segments = path.split("/").filter((segment) => segment.length > 0);
  let level = 0;
  while (segments.length > 0 && (segments[0] === "." || segments[0] === "..")) {
    const segment = segments.shift();
    level += segment === "." ? 1 : level === 0 ? 2 : 1;
  }

  const last = segments.length - 1;
  const parts = segments.map((segment, i) =>
    (i === last ? segment.replace(EXTENSION, "") : segment).replace(/-/g, "_")
  );

  return ".".repeat(level) + parts.join(".");
}

/**
 * Collects chunks in memory.
 */
export class StringWriter implements Writer {
  private chunks: string[] = [];
  private closed = false;
  private readonly resolveImport: ImportPathResolver;

  constructor(options: WriterOptions = {}) {
    this.resolveImport = options.makeImportPath ?? defaultImportPath;
  }

  async write(chunk: string): Promise<void> {
    if (this.closed) {
      throw new Error("StringWriter: write after close");
    }
    this.chunks.push(chunk);
  }

  makeImportPath(path: string): string {
    return this.resolveImport(path);
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Chunks in the order they were written */
  getChunks(): string[] {
    return [...this.chunks];
  }

  toString(): string {
    return this.chunks.join("");
  }
}

/**
 * Streams chunks to a file.
 *
 * Stream errors, including a failure to open the file, are kept and
 * returned from the next `write` or `close`.
 */
export class FileWriter implements Writer {
  private readonly stream: fs.WriteStream;
  private readonly resolveImport: ImportPathResolver;
  private readonly opened: Promise<void>;
  private failure: Error | undefined;

  constructor(filePath: string, options: WriterOptions = {}) {
    this.stream = fs.createWriteStream(filePath, { encoding: "utf8" });
    this.resolveImport = options.makeImportPath ?? defaultImportPath;
    this.opened = new Promise((resolve) => {
      this.stream.once("ready", () => resolve());
      this.stream.on("error", (err) => {
        this.failure ??= err;
        resolve();
      });
    });
  }

  /** The first error the stream reported, if any */
  get error(): Error | undefined {
    return this.failure;
  }

  async write(chunk: string): Promise<void> {
    await this.opened;
    if (this.failure) throw this.failure;
    return new Promise((resolve, reject) => {
      this.stream.write(chunk, (err) => {
        const failure = this.failure ?? err;
        if (failure) reject(failure);
        else resolve();
      });
    });
  }

  makeImportPath(path: string): string {
    return this.resolveImport(path);
  }

  async close(): Promise<void> {
    await this.opened;
    if (this.failure) throw this.failure;
    return new Promise((resolve, reject) => {
      this.stream.end((err?: Error | null) => {
        const failure = this.failure ?? err;
        if (failure) reject(failure);
        else resolve();
      });
    });
  }
}
