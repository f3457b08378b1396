export type Mode = "NORMAL" | "INSERT" | "COMMAND";

export type Modifiers = { shift: boolean; ctrl: boolean; alt: boolean };

/**
 * A control-key event. `key` is a named key ("escape", "enter", "backspace",
 * "delete", "tab", "left", "right", "up", "down", "home", "end") or a single
 * printable character; letters are lowercase and `shift` selects the
 * uppercase command.
 */
export type KeyEvent = { key: string; modifiers: Modifiers };

/** One or more code points of typed text, delivered apart from key events. */
export type TextInputEvent = { text: string };

export type HostAction = "save" | "quit" | "save_quit";

export type DispatchResult = {
  consumed: boolean;
  action?: HostAction;
};

export type Position = { line: number; column: number };

export const noModifiers: Modifiers = { shift: false, ctrl: false, alt: false };

export function key(
  name: string,
  modifiers: Partial<Modifiers> = {},
): KeyEvent {
  return { key: name, modifiers: { ...noModifiers, ...modifiers } };
}
