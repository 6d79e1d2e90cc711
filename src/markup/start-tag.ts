/**
 * Minimal start-tag scanner working on raw source offsets.
 *
 * The DOM gives us where an element starts; edits need the exact byte ranges of
 * its attributes so everything outside the rewritten attribute stays untouched.
 */

export interface AttributeSpan {
  readonly name: string;
  /** Offset of the first character of the attribute name. */
  readonly start: number;
  /** Offset just past the attribute (past the closing quote, if quoted). */
  readonly end: number;
  /** Offsets of the value without quotes; null for a bare attribute. */
  readonly valueStart: number | null;
  readonly valueEnd: number | null;
  readonly quote: '"' | "'" | null;
}

export interface StartTagSpan {
  readonly start: number;
  /** Offset just past the tag name. */
  readonly nameEnd: number;
  /** Offset of the closing `>` (or of `/` in `/>`). */
  readonly close: number;
  readonly attributes: readonly AttributeSpan[];
}

const WHITESPACE = /\s/;

function isSpace(ch: string | undefined): boolean {
  return ch !== undefined && WHITESPACE.test(ch);
}

export function scanStartTag(source: string, start: number): StartTagSpan | null {
  if (source[start] !== '<') return null;

  let i = start + 1;
  while (i < source.length && !isSpace(source[i]) && source[i] !== '>' && source[i] !== '/') i++;
  const nameEnd = i;
  if (nameEnd === start + 1) return null;

  const attributes: AttributeSpan[] = [];

  while (i < source.length) {
    while (isSpace(source[i])) i++;
    const ch = source[i];
    if (ch === undefined) return null;
    if (ch === '>') return { start, nameEnd, close: i, attributes };
    if (ch === '/') {
      if (source[i + 1] === '>') return { start, nameEnd, close: i, attributes };
      i++;
      continue;
    }

    const attrStart = i;
    while (i < source.length && !isSpace(source[i]) && !'=>'.includes(source[i] ?? '') && !isSelfClose(source, i)) i++;
    const name = source.slice(attrStart, i).toLowerCase();

    let j = i;
    while (isSpace(source[j])) j++;
    if (source[j] !== '=') {
      attributes.push({ name, start: attrStart, end: i, valueStart: null, valueEnd: null, quote: null });
      continue;
    }

    j++;
    while (isSpace(source[j])) j++;
    const q = source[j];
    if (q === '"' || q === "'") {
      const closeQuote = source.indexOf(q, j + 1);
      if (closeQuote === -1) return null;
      attributes.push({ name, start: attrStart, end: closeQuote + 1, valueStart: j + 1, valueEnd: closeQuote, quote: q });
      i = closeQuote + 1;
    } else {
      const valueStart = j;
      while (j < source.length && !isSpace(source[j]) && source[j] !== '>') j++;
      attributes.push({ name, start: attrStart, end: j, valueStart, valueEnd: j, quote: null });
      i = j;
    }
  }

  return null;
}

function isSelfClose(source: string, i: number): boolean {
  return source[i] === '/' && source[i + 1] === '>';
}

export interface TextEdit {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/**
 * Edit that sets the class attribute of the scanned tag to `classes`.
 * An empty list removes the attribute together with the whitespace before it.
 */
export function classAttributeEdit(source: string, tag: StartTagSpan, classes: readonly string[]): TextEdit | null {
  const value = classes.join(' ');
  const attr = tag.attributes.find((a) => a.name === 'class');

  if (!attr) {
    if (classes.length === 0) return null;
    return { start: tag.nameEnd, end: tag.nameEnd, text: ` class="${value}"` };
  }

  if (classes.length === 0) {
    let from = attr.start;
    while (from > tag.nameEnd && isSpace(source[from - 1])) from--;
    return { start: from, end: attr.end, text: '' };
  }

  if (attr.quote !== null && attr.valueStart !== null && attr.valueEnd !== null) {
    return { start: attr.valueStart, end: attr.valueEnd, text: value };
  }

  return { start: attr.start, end: attr.end, text: `class="${value}"` };
}

/** Applies non-overlapping edits; order of the input does not matter. */
export function applyTextEdits(source: string, edits: readonly TextEdit[]): string {
  const sorted = [...edits].sort((a, b) => b.start - a.start);
  let out = source;
  for (const edit of sorted) {
    out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
  }
  return out;
}
