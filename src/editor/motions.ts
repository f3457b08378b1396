import {
  advanceCodePoints,
  codePointAt,
  codePointBefore,
  codePointLength,
  nextBoundary,
  prevBoundary,
} from "./buffer.js";

// Motions are pure: they take the document text and an offset on a code-point
// boundary and return another such offset (or a span of them).

export type Span = { start: number; end: number };

export type LineSpan = Span & {
  /** Offset of the line terminator, or the document length on the last line. */
  contentEnd: number;
  terminated: boolean;
};

const WHITESPACE = /^\s$/u;
const WORD_CHAR = /^[\p{Alphabetic}\p{N}_]$/u;

export function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && WHITESPACE.test(ch);
}

export function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR.test(ch);
}

export function lineStart(text: string, offset: number): number {
  if (offset <= 0) return 0;
  return text.lastIndexOf("\n", offset - 1) + 1;
}

export function lineEnd(text: string, offset: number): number {
  const nl = text.indexOf("\n", offset);
  return nl === -1 ? text.length : nl;
}

export function lineSpan(text: string, offset: number): LineSpan {
  const start = lineStart(text, offset);
  const contentEnd = lineEnd(text, offset);
  const terminated = contentEnd < text.length;
  return {
    start,
    contentEnd,
    end: terminated ? contentEnd + 1 : contentEnd,
    terminated,
  };
}

/** Zero-based line index: the number of terminators before `offset`. */
export function lineIndex(text: string, offset: number): number {
  let count = 0;
  let nl = text.indexOf("\n");
  while (nl !== -1 && nl < offset) {
    count++;
    nl = text.indexOf("\n", nl + 1);
  }
  return count;
}

/** Code points between the start of the line and `offset`. */
export function columnOf(text: string, offset: number): number {
  return codePointLength(text.slice(lineStart(text, offset), offset));
}

/**
 * Skip the run of non-whitespace at `offset`, then the whitespace after it.
 * Used both as the `w` motion and as the end of a `dw`/`yw`/`cw` span.
 */
export function wordForward(text: string, offset: number): number {
  let pos = offset;
  while (pos < text.length && !isWhitespace(codePointAt(text, pos))) {
    pos = nextBoundary(text, pos);
  }
  while (pos < text.length && isWhitespace(codePointAt(text, pos))) {
    pos = nextBoundary(text, pos);
  }
  return pos;
}

export function wordBackward(text: string, offset: number): number {
  let pos = offset;
  while (pos > 0 && isWhitespace(codePointBefore(text, pos))) {
    pos = prevBoundary(text, pos);
  }
  while (pos > 0 && !isWhitespace(codePointBefore(text, pos))) {
    pos = prevBoundary(text, pos);
  }
  return pos;
}

/**
 * The maximal run of word characters around `offset`; a single code point when
 * `offset` is on a non-word character. Null at end of document.
 */
export function innerWord(text: string, offset: number): Span | null {
  if (offset >= text.length) return null;
  if (!isWordChar(codePointAt(text, offset))) {
    return { start: offset, end: nextBoundary(text, offset) };
  }
  let start = offset;
  while (start > 0 && isWordChar(codePointBefore(text, start))) {
    start = prevBoundary(text, start);
  }
  let end = offset;
  while (end < text.length && isWordChar(codePointAt(text, end))) {
    end = nextBoundary(text, end);
  }
  return { start, end };
}

/** Position on the next line at `targetColumn`, clamped to its length. */
export function lineBelow(
  text: string,
  offset: number,
  targetColumn: number,
): number | null {
  const nl = text.indexOf("\n", offset);
  if (nl === -1) return null;
  const start = nl + 1;
  return advanceCodePoints(text, start, targetColumn, lineEnd(text, start));
}

/** Position on the previous line at `targetColumn`, clamped to its length. */
export function lineAbove(
  text: string,
  offset: number,
  targetColumn: number,
): number | null {
  const start = lineStart(text, offset);
  if (start === 0) return null;
  const prevStart = lineStart(text, start - 1);
  return advanceCodePoints(text, prevStart, targetColumn, start - 1);
}
