/**
 * Emit macro expansion.
 *
 * An emit template is a raw Python snippet with argument placeholders:
 *
 *   $i            argument i
 *   $i...         arguments i..N-1, comma separated
 *   {{ $i ? A : B }}   A when argument i is a constant, otherwise B
 *   {{ ... $i ... }}   the inner text when argument i exists, otherwise nothing
 *
 * The macro forms depend on the arguments and are rewritten per node. The
 * rewritten text is then split into literal text and `$i` references once
 * per distinct text, keeping at most `TEMPLATE_CACHE_LIMIT` texts.
 */

import type { Expression } from "../python-ast";

export type TemplatePart =
  | { kind: "text"; value: string }
  | { kind: "arg"; index: number };

const SPREAD = /\$(\d+)\.\.\./g;
const CONDITIONAL = /\{\{\s*\$(\d+)\s*\?(.*?):(.*?)\}\}/g;
const OPTIONAL = /\{\{([^}]*\$(\d+).*?)\}\}/g;
const PLACEHOLDER = /\$\d+/g;

export const TEMPLATE_CACHE_LIMIT = 512;

const partsCache = new Map<string, readonly TemplatePart[]>();

/** Decides the `{{ $i ? A : B }}` branch for argument i */
export type ConstantArgumentTest = (index: number) => boolean;

/**
 * Apply the macro rewrites to `template` for the given arguments.
 *
 * By default an argument counts as constant when it is a `constant` node as
 * given; printers pass a test that looks at the argument after expansion.
 */
export function rewriteMacros(
  template: string,
  args: readonly Expression[],
  isConstant: ConstantArgumentTest = (i) => args[i]?.kind === "constant"
): string {
  return template
    .replace(SPREAD, (_match, start: string) => {
      const refs: string[] = [];
      for (let i = Number(start); i < args.length; i++) {
        refs.push(`$${i}`);
      }
      return refs.join(", ");
    })
    .replace(CONDITIONAL, (_match, index: string, whenConstant: string, otherwise: string) =>
      isConstant(Number(index)) ? whenConstant : otherwise
    )
    .replace(OPTIONAL, (_match, inner: string, index: string) =>
      Number(index) < args.length ? inner : ""
    );
}

/**
 * Split rewritten template text into literal text and argument references.
 * Empty text between adjacent references is dropped.
 */
export function parseTemplate(text: string): readonly TemplatePart[] {
  const cached = partsCache.get(text);
  if (cached) return cached;

  const parts: TemplatePart[] = [];
  let last = 0;
  for (const match of text.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0;
    if (start > last) {
      parts.push({ kind: "text", value: text.slice(last, start) });
    }
    parts.push({ kind: "arg", index: Number(match[0].slice(1)) });
    last = start + match[0].length;
  }
  if (last < text.length) {
    parts.push({ kind: "text", value: text.slice(last) });
  }

  // Oldest entry first in insertion order
  if (partsCache.size >= TEMPLATE_CACHE_LIMIT) {
    const oldest = partsCache.keys().next();
    if (!oldest.done) partsCache.delete(oldest.value);
  }
  partsCache.set(text, parts);
  return parts;
}

export function expandTemplate(
  template: string,
  args: readonly Expression[],
  isConstant?: ConstantArgumentTest
): readonly TemplatePart[] {
  return parseTemplate(rewriteMacros(template, args, isConstant));
}

/** Number of distinct template texts parsed so far */
export function templateCacheSize(): number {
  return partsCache.size;
}

export function clearTemplateCache(): void {
  partsCache.clear();
}
