// Offsets are UTF-16 code-unit indices. A boundary is any index that does not
// split a surrogate pair.

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Clamp `offset` into `[0, text.length]` and move it back off a split pair. */
export function snapToBoundary(text: string, offset: number): number {
  const clamped = Math.max(0, Math.min(Math.trunc(offset), text.length));
  if (
    clamped > 0 &&
    clamped < text.length &&
    isLowSurrogate(text.charCodeAt(clamped)) &&
    isHighSurrogate(text.charCodeAt(clamped - 1))
  ) {
    return clamped - 1;
  }
  return clamped;
}

/** Offset just past the code point starting at `offset`. */
export function nextBoundary(text: string, offset: number): number {
  if (offset >= text.length) return text.length;
  const cp = text.codePointAt(offset) ?? 0;
  return offset + (cp > 0xffff ? 2 : 1);
}

/** Offset of the code point ending at `offset`. */
export function prevBoundary(text: string, offset: number): number {
  if (offset <= 0) return 0;
  if (
    offset >= 2 &&
    isLowSurrogate(text.charCodeAt(offset - 1)) &&
    isHighSurrogate(text.charCodeAt(offset - 2))
  ) {
    return offset - 2;
  }
  return offset - 1;
}

/** The whole code point at `offset`, or undefined at end of text. */
export function codePointAt(text: string, offset: number): string | undefined {
  if (offset < 0 || offset >= text.length) return undefined;
  return text.slice(offset, nextBoundary(text, offset));
}

/** The code point ending at `offset`, or undefined at offset 0. */
export function codePointBefore(
  text: string,
  offset: number,
): string | undefined {
  if (offset <= 0) return undefined;
  return text.slice(prevBoundary(text, offset), offset);
}

export function codePointLength(text: string): number {
  return [...text].length;
}

/**
 * Offset reached by walking `count` code points forward from `from`,
 * stopping at `limit`.
 */
export function advanceCodePoints(
  text: string,
  from: number,
  count: number,
  limit = text.length,
): number {
  let pos = from;
  for (let i = 0; i < count && pos < limit; i++) {
    pos = nextBoundary(text, pos);
  }
  return Math.min(pos, limit);
}

export class TextBuffer {
  private content = "";

  constructor(initial = "") {
    this.content = initial;
  }

  get text(): string {
    return this.content;
  }

  get length(): number {
    return this.content.length;
  }

  isEmpty(): boolean {
    return this.content.length === 0;
  }

  load(text: string) {
    this.content = text;
  }

  insert(offset: number, str: string): number {
    const at = snapToBoundary(this.content, offset);
    this.content = this.content.slice(0, at) + str + this.content.slice(at);
    return at + str.length;
  }

  /** Remove `[start, end)` and return the removed text. */
  remove(start: number, end: number): string {
    const from = snapToBoundary(this.content, start);
    const to = snapToBoundary(this.content, end);
    if (to <= from) return "";
    const removed = this.content.slice(from, to);
    this.content = this.content.slice(0, from) + this.content.slice(to);
    return removed;
  }

  snap(offset: number): number {
    return snapToBoundary(this.content, offset);
  }

  next(offset: number): number {
    return nextBoundary(this.content, offset);
  }

  prev(offset: number): number {
    return prevBoundary(this.content, offset);
  }
}
