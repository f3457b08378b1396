import type { KeyEvent } from "./state.js";

// The part of a neo-blessed keypress descriptor the editor reads.
export type Keypress = {
  name?: string;
  shift?: boolean;
  ctrl?: boolean;
  meta?: boolean;
};

export type EngineInput = {
  key: KeyEvent | null;
  text: string | null;
};

// blessed reports Enter twice, as "return" and then "enter"; only "enter"
// is bound.
const namedKeys = new Map<string, string>([
  ["escape", "escape"],
  ["enter", "enter"],
  ["backspace", "backspace"],
  ["delete", "delete"],
  ["tab", "tab"],
  ["left", "left"],
  ["right", "right"],
  ["up", "up"],
  ["down", "down"],
  ["home", "home"],
  ["end", "end"],
  ["space", " "],
]);

function isPrintable(text: string): boolean {
  if (text.length === 0) return false;
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (ch !== "\t" && (cp < 0x20 || cp === 0x7f)) return false;
  }
  return true;
}

function singleCodePoint(text: string | undefined): text is string {
  return text !== undefined && [...text].length === 1;
}

/**
 * Split one terminal keypress into the key event and the text-input event the
 * engine expects, in that order. Either may be absent.
 */
export function translateKeypress(
  ch: string | undefined,
  press: Keypress | undefined,
): EngineInput {
  const modifiers = {
    shift: press?.shift ?? false,
    ctrl: press?.ctrl ?? false,
    alt: press?.meta ?? false,
  };
  const name = press?.name;

  let key: KeyEvent | null = null;
  const named = name === undefined ? undefined : namedKeys.get(name);
  if (named !== undefined) {
    key = { key: named, modifiers };
  } else if (singleCodePoint(name)) {
    key = { key: name, modifiers };
  } else if (name === undefined && singleCodePoint(ch) && isPrintable(ch)) {
    key = { key: ch, modifiers };
  }

  const plain = !modifiers.ctrl && !modifiers.alt;
  const text = plain && ch !== undefined && isPrintable(ch) ? ch : null;

  return { key, text };
}
