// Presentation helpers for the terminal host. Tab expansion lives only here;
// the engine counts columns in code points.

export const TAB_WIDTH = 4;
export const GUTTER_WIDTH = 6;

export function expandTabs(line: string, tabWidth = TAB_WIDTH): string {
  let out = "";
  let width = 0;
  for (const ch of line) {
    if (ch === "\t") {
      const pad = tabWidth - (width % tabWidth);
      out += " ".repeat(pad);
      width += pad;
    } else {
      out += ch;
      width += 1;
    }
  }
  return out;
}

/** Screen column of the `column`-th code point of `line`. */
export function visualColumn(
  line: string,
  column: number,
  tabWidth = TAB_WIDTH,
): number {
  let width = 0;
  let i = 0;
  for (const ch of line) {
    if (i >= column) break;
    width += ch === "\t" ? tabWidth - (width % tabWidth) : 1;
    i++;
  }
  return width;
}

/** First visible row that keeps `cursorRow` inside a window of `height`. */
export function scrollFor(
  cursorRow: number,
  scrollTop: number,
  height: number,
): number {
  let top = scrollTop;
  if (cursorRow < top) top = cursorRow;
  if (cursorRow >= top + height) top = cursorRow - height + 1;
  return Math.max(0, top);
}

/**
 * Visible rows with a relative-number gutter; the cursor row shows its
 * absolute number. Rows past the end of the document show "~".
 */
export function renderRows(
  lines: string[],
  cursorRow: number,
  scrollTop: number,
  height: number,
  width: number,
): string[] {
  const out: string[] = [];
  const room = Math.max(0, width - GUTTER_WIDTH);
  for (let i = 0; i < height; i++) {
    const row = scrollTop + i;
    const line = lines[row];
    if (line === undefined) {
      out.push("~");
      continue;
    }
    const rel = row === cursorRow ? row + 1 : Math.abs(row - cursorRow);
    const gutter = String(rel).padStart(GUTTER_WIDTH - 1, " ") + " ";
    const shown = [...expandTabs(line)].slice(0, room).join("");
    out.push(gutter + shown);
  }
  return out;
}

export type StatusInfo = {
  mode: string;
  fileName: string | null;
  dirty: boolean;
  line: number;
  column: number;
  message: string;
};

export function statusLine(info: StatusInfo): string {
  const file = info.fileName ?? "[No File]";
  const dirty = info.dirty ? "*" : "";
  const pos = `${info.line + 1}:${info.column + 1}`;
  const msg = info.message ? ` | ${info.message}` : "";
  return ` ${info.mode}  ${file}${dirty}  ${pos}${msg}`;
}
