import { TextBuffer } from "./buffer.js";
import { CommandLine, parseCommandLine } from "./commandline.js";
import { CursorState } from "./cursor.js";
import {
  innerWord,
  lineAbove,
  lineBelow,
  lineEnd,
  lineSpan,
  lineStart,
  wordBackward,
  wordForward,
  type Span,
} from "./motions.js";
import {
  operatorForKey,
  PendingOperator,
  type Operator,
  type OperatorMotion,
  type OperatorState,
} from "./operator.js";
import { Register } from "./register.js";
import type {
  DispatchResult,
  KeyEvent,
  Mode,
  Position,
  TextInputEvent,
} from "./state.js";

const consumed: DispatchResult = { consumed: true };
const unconsumed: DispatchResult = { consumed: false };

function normalizeKey(event: KeyEvent): KeyEvent {
  const { key, modifiers } = event;
  if (key.length === 1 && key !== key.toLowerCase()) {
    return { key: key.toLowerCase(), modifiers: { ...modifiers, shift: true } };
  }
  return event;
}

/** The character a key event would also deliver as text, if any. */
function typedText(event: KeyEvent): string | null {
  if ([...event.key].length !== 1) return null;
  return event.modifiers.shift ? event.key.toUpperCase() : event.key;
}

function isInsertable(ch: string): boolean {
  return ch >= " " || ch === "\n" || ch === "\t";
}

/**
 * Modal editing engine. The host feeds it one key or text-input event at a
 * time and reads back whether the event was consumed and, from Command mode,
 * an action to perform. The engine never touches storage or the screen.
 */
export class ModalEditor {
  private readonly buffer = new TextBuffer();
  private readonly cursor = new CursorState(this.buffer);
  private readonly register = new Register();
  private readonly pending = new PendingOperator();
  private readonly commandLine = new CommandLine();
  private currentMode: Mode = "NORMAL";
  // One-shot: the text the last mode-switching key will also produce.
  private suppressText: string | null = null;
  private verticalMotion = false;

  constructor(initialText = "") {
    this.buffer.load(initialText);
  }

  get mode(): Mode {
    return this.currentMode;
  }

  get text(): string {
    return this.buffer.text;
  }

  get offset(): number {
    return this.cursor.offset;
  }

  get position(): Position {
    return { line: this.cursor.line, column: this.cursor.column };
  }

  get desiredColumn(): number {
    return this.cursor.desiredColumn;
  }

  get registerContent(): string {
    return this.register.content;
  }

  get operatorState(): Readonly<OperatorState> {
    return this.pending.current;
  }

  get commandBuffer(): string {
    return this.commandLine.text;
  }

  /** "NORMAL", "NORMAL (d)", "INSERT" or the live `:` line. */
  get modeLabel(): string {
    switch (this.currentMode) {
      case "NORMAL":
        return this.pending.isPending()
          ? `NORMAL (${this.pending.label})`
          : "NORMAL";
      case "INSERT":
        return "INSERT";
      case "COMMAND":
        return this.commandLine.text;
    }
  }

  /** Replace the document. The cursor returns to 0; the register is kept. */
  load(text: string) {
    this.buffer.load(text);
    this.cursor.reset();
    this.pending.reset();
    this.suppressText = null;
  }

  setMode(mode: Mode) {
    this.pending.reset();
    this.suppressText = null;
    this.switchMode(mode);
  }

  moveTo(offset: number) {
    this.cursor.moveTo(offset);
    this.cursor.syncDesiredColumn();
  }

  /** Cursor to the start or end of the document, in Insert mode. */
  openForEditing(placement: "start" | "end") {
    this.moveTo(placement === "start" ? 0 : this.buffer.length);
    this.setMode("INSERT");
  }

  handleKey(event: KeyEvent): DispatchResult {
    this.suppressText = null;
    const normalized = normalizeKey(event);
    const before = this.currentMode;

    const result = this.dispatchKey(before, normalized);
    if (before === "NORMAL" && this.currentMode !== "NORMAL") {
      this.suppressText = typedText(normalized);
    }
    this.finishEvent();
    return result;
  }

  handleText(event: TextInputEvent): DispatchResult {
    const token = this.suppressText;
    this.suppressText = null;
    if (token !== null && event.text === token) {
      return consumed;
    }

    let result: DispatchResult = unconsumed;
    switch (this.currentMode) {
      case "INSERT": {
        const chars = [...event.text].filter(isInsertable);
        if (chars.length > 0) {
          const end = this.buffer.insert(this.cursor.offset, chars.join(""));
          this.cursor.moveTo(end);
          result = consumed;
        }
        break;
      }
      case "COMMAND": {
        const chars = [...event.text].filter((ch) => ch >= " ");
        if (chars.length > 0) {
          this.commandLine.append(chars.join(""));
          result = consumed;
        }
        break;
      }
      case "NORMAL":
        break;
    }
    // Ignored text (Normal mode) must not disturb a run of vertical motion.
    if (result.consumed) this.finishEvent();
    return result;
  }

  private dispatchKey(mode: Mode, event: KeyEvent): DispatchResult {
    switch (mode) {
      case "NORMAL":
        return this.normalKey(event);
      case "INSERT":
        return this.insertKey(event);
      case "COMMAND":
        return this.commandKey(event);
    }
  }

  private finishEvent() {
    if (!this.verticalMotion) this.cursor.syncDesiredColumn();
    this.verticalMotion = false;
  }

  private switchMode(mode: Mode) {
    if (mode === "COMMAND" && this.currentMode !== "COMMAND") {
      this.commandLine.open();
    }
    if (mode !== "COMMAND") this.commandLine.close();
    this.currentMode = mode;
  }

  private normalKey(event: KeyEvent): DispatchResult {
    const { key, modifiers } = event;
    const chord = modifiers.ctrl || modifiers.alt;

    if (this.pending.isPending()) {
      const step = this.pending.step(chord ? "" : key);
      if (step.kind === "await") return consumed;
      if (step.kind === "complete") {
        this.applyOperator(step.operator, step.motion);
        return consumed;
      }
      // Abandoned: handle the key as if nothing was pending.
    }

    if (chord) return unconsumed;

    const operator = operatorForKey(key);
    if (operator) {
      this.pending.begin(operator);
      return consumed;
    }

    const text = this.buffer.text;
    const offset = this.cursor.offset;

    switch (key) {
      case "h":
      case "left":
        this.cursor.moveTo(this.buffer.prev(offset));
        return consumed;
      case "l":
      case "right":
        this.cursor.moveTo(this.buffer.next(offset));
        return consumed;
      case "k":
      case "up":
        this.moveVertical("up");
        return consumed;
      case "j":
      case "down":
        this.moveVertical("down");
        return consumed;
      case "w":
        this.cursor.moveTo(wordForward(text, offset));
        return consumed;
      case "b":
        this.cursor.moveTo(wordBackward(text, offset));
        return consumed;
      case "0":
      case "home":
        this.cursor.moveTo(lineStart(text, offset));
        return consumed;
      case "$":
      case "end":
        this.cursor.moveTo(lineEnd(text, offset));
        return consumed;
      case "x":
        this.buffer.remove(offset, this.buffer.next(offset));
        this.cursor.clamp();
        return consumed;
      case "p":
        this.paste(modifiers.shift ? "before" : "after");
        return consumed;
      case "i":
        if (modifiers.shift) this.cursor.moveTo(lineStart(text, offset));
        this.switchMode("INSERT");
        return consumed;
      case "a":
        this.cursor.moveTo(
          modifiers.shift ? lineEnd(text, offset) : this.buffer.next(offset),
        );
        this.switchMode("INSERT");
        return consumed;
      case "o":
        this.openLine(modifiers.shift ? "above" : "below");
        return consumed;
      case ":":
        this.switchMode("COMMAND");
        return consumed;
      default:
        return unconsumed;
    }
  }

  private insertKey(event: KeyEvent): DispatchResult {
    const offset = this.cursor.offset;
    switch (event.key) {
      case "escape":
        this.switchMode("NORMAL");
        if (offset > 0 && !this.buffer.isEmpty()) {
          this.cursor.moveTo(this.buffer.prev(offset));
        }
        return consumed;
      case "enter":
        this.cursor.moveTo(this.buffer.insert(offset, "\n"));
        return consumed;
      case "backspace":
        if (offset > 0) {
          const start = this.buffer.prev(offset);
          this.buffer.remove(start, offset);
          this.cursor.moveTo(start);
        }
        return consumed;
      case "delete":
        this.buffer.remove(offset, this.buffer.next(offset));
        this.cursor.clamp();
        return consumed;
      case "left":
        this.cursor.moveTo(this.buffer.prev(offset));
        return consumed;
      case "right":
        this.cursor.moveTo(this.buffer.next(offset));
        return consumed;
      case "up":
        this.moveVertical("up");
        return consumed;
      case "down":
        this.moveVertical("down");
        return consumed;
      case "home":
        this.cursor.moveTo(lineStart(this.buffer.text, offset));
        return consumed;
      case "end":
        this.cursor.moveTo(lineEnd(this.buffer.text, offset));
        return consumed;
      default:
        return unconsumed;
    }
  }

  private commandKey(event: KeyEvent): DispatchResult {
    switch (event.key) {
      case "escape":
        this.switchMode("NORMAL");
        return consumed;
      case "enter": {
        const action = parseCommandLine(this.commandLine.text);
        this.switchMode("NORMAL");
        return action ? { consumed: true, action } : consumed;
      }
      case "backspace":
        this.commandLine.backspace();
        return consumed;
      default:
        return unconsumed;
    }
  }

  private moveVertical(direction: "up" | "down") {
    const desired = this.cursor.desiredColumn;
    const target = Math.max(desired, this.cursor.column);
    const text = this.buffer.text;
    const offset = this.cursor.offset;
    const next =
      direction === "down"
        ? lineBelow(text, offset, target)
        : lineAbove(text, offset, target);
    if (next !== null) this.cursor.moveTo(next);
    this.cursor.desiredColumn = desired;
    this.verticalMotion = true;
  }

  private openLine(where: "above" | "below") {
    const text = this.buffer.text;
    const offset = this.cursor.offset;
    if (where === "above") {
      const start = lineStart(text, offset);
      this.buffer.insert(start, "\n");
      this.cursor.moveTo(start);
    } else {
      this.cursor.moveTo(this.buffer.insert(lineEnd(text, offset), "\n"));
    }
    this.switchMode("INSERT");
  }

  private paste(where: "before" | "after") {
    if (this.register.isEmpty()) return;
    const content = this.register.content;
    const text = this.buffer.text;
    const offset = this.cursor.offset;

    let end: number;
    if (this.register.isLinewise()) {
      const line = lineSpan(text, offset);
      if (where === "before") {
        end = this.buffer.insert(line.start, content);
      } else if (line.terminated) {
        end = this.buffer.insert(line.end, content);
      } else {
        // Last line has no terminator: open one and drop the copy's own.
        const body = content.endsWith("\n") ? content.slice(0, -1) : content;
        end = this.buffer.insert(line.end, "\n" + body);
      }
    } else {
      const at = where === "before" ? offset : this.buffer.next(offset);
      end = this.buffer.insert(at, content);
    }
    this.cursor.moveTo(end);
  }

  private applyOperator(operator: Operator, motion: OperatorMotion) {
    if (motion === "line") {
      this.applyLinewise(operator);
      return;
    }

    const text = this.buffer.text;
    const offset = this.cursor.offset;
    const span: Span | null =
      motion === "word"
        ? { start: offset, end: wordForward(text, offset) }
        : innerWord(text, offset);

    if (span && span.end > span.start) {
      this.register.store(text.slice(span.start, span.end));
      if (operator !== "yank") {
        this.buffer.remove(span.start, span.end);
        this.cursor.moveTo(span.start);
      }
    }
    if (operator === "change") this.switchMode("INSERT");
  }

  private applyLinewise(operator: Operator) {
    const text = this.buffer.text;
    const line = lineSpan(text, this.cursor.offset);
    const wholeLine =
      text.slice(line.start, line.end) + (line.terminated ? "" : "\n");

    switch (operator) {
      case "yank":
        this.register.store(wholeLine);
        return;
      case "change": {
        const content = text.slice(line.start, line.contentEnd);
        if (content.length > 0) this.register.store(content);
        this.buffer.remove(line.start, line.contentEnd);
        this.cursor.moveTo(line.start);
        this.switchMode("INSERT");
        return;
      }
      case "delete": {
        if (this.buffer.isEmpty()) return;
        this.register.store(wholeLine);
        // On the last line take the preceding terminator as well.
        const from =
          !line.terminated && line.start > 0 ? line.start - 1 : line.start;
        this.buffer.remove(from, line.end);
        const at = Math.min(line.start, this.buffer.length);
        this.cursor.moveTo(lineStart(this.buffer.text, at));
        return;
      }
    }
  }
}
