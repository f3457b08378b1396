import type { TextBuffer } from "./buffer.js";
import { columnOf, lineIndex } from "./motions.js";

/**
 * Cursor over a TextBuffer. Only the offset is stored; line and column are
 * derived from the buffer on read. `desiredColumn` is the sticky target for
 * runs of vertical motion.
 */
export class CursorState {
  private position = 0;
  desiredColumn = 0;

  constructor(private readonly buffer: TextBuffer) {}

  get offset(): number {
    return this.position;
  }

  get line(): number {
    return lineIndex(this.buffer.text, this.position);
  }

  get column(): number {
    return columnOf(this.buffer.text, this.position);
  }

  moveTo(offset: number) {
    this.position = this.buffer.snap(offset);
  }

  /** Re-clamp after the buffer shrank underneath the cursor. */
  clamp() {
    this.position = this.buffer.snap(this.position);
  }

  syncDesiredColumn() {
    this.desiredColumn = this.column;
  }

  reset() {
    this.position = 0;
    this.desiredColumn = 0;
  }
}
