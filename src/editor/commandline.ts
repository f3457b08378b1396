import type { HostAction } from "./state.js";

// Complete buffers only; there is no abbreviation or argument parsing.
const exCommands: Record<string, HostAction> = {
  ":w": "save",
  ":q": "quit",
  ":wq": "save_quit",
};

export function parseCommandLine(buffer: string): HostAction | undefined {
  return Object.hasOwn(exCommands, buffer) ? exCommands[buffer] : undefined;
}

/** The `:` line. The leading colon stays while the line is open. */
export class CommandLine {
  private buffer = "";

  get text(): string {
    return this.buffer;
  }

  open() {
    this.buffer = ":";
  }

  append(text: string) {
    this.buffer += text;
  }

  backspace() {
    if (this.buffer.length <= 1) return;
    const chars = [...this.buffer];
    chars.pop();
    this.buffer = chars.join("");
  }

  close() {
    this.buffer = "";
  }
}
