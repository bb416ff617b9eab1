/**
 * Source-map collaborators.
 *
 * The printer only ever pushes mappings; it never reads them back.
 */

import { SourceMapGenerator as V3Generator, type RawSourceMap } from "source-map";

export interface SourceMapGenerator {
  addMapping(
    originalLine: number,
    originalColumn: number,
    generatedLine: number,
    generatedColumn: number,
    name?: string
  ): void;
}

/**
 * A single mapping entry. Lines are 1-based, columns 0-based.
 */
export interface SourceMapping {
  generated: { line: number; column: number };
  original: { line: number; column: number };
  name: string | null;
}

/** Drops every mapping */
export const noSourceMap: SourceMapGenerator = {
  addMapping() {},
};

/**
 * Keeps mappings in memory, in the order they were added.
 */
export class MappingCollector implements SourceMapGenerator {
  private mappings: SourceMapping[] = [];

  addMapping(
    originalLine: number,
    originalColumn: number,
    generatedLine: number,
    generatedColumn: number,
    name?: string
  ): void {
    this.mappings.push({
      generated: { line: generatedLine, column: generatedColumn },
      original: { line: originalLine, column: originalColumn },
      name: name ?? null,
    });
  }

  getMappings(): SourceMapping[] {
    return [...this.mappings];
  }
}

/**
 * Builds a standard v3 source map through the `source-map` package.
 */
export class V3SourceMap implements SourceMapGenerator {
  private readonly generator: V3Generator;
  private readonly source: string;

  /**
   * @param file - name of the generated Python file
   * @param source - path of the original source file
   */
  constructor(file: string, source: string) {
    this.generator = new V3Generator({ file });
    this.source = source;
  }

  addMapping(
    originalLine: number,
    originalColumn: number,
    generatedLine: number,
    generatedColumn: number,
    name?: string
  ): void {
    this.generator.addMapping({
      source: this.source,
      original: { line: originalLine, column: originalColumn },
      generated: { line: generatedLine, column: generatedColumn },
      name,
    });
  }

  toJSON(): RawSourceMap {
    return this.generator.toJSON();
  }

  toString(): string {
    return this.generator.toString();
  }
}
