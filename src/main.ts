#!/usr/bin/env node
import blessed from "neo-blessed";
import type { Widgets } from "blessed";
import path from "node:path";
import chalk from "chalk";

import { ModalEditor } from "./editor/engine.js";
import { translateKeypress } from "./editor/keymap.js";
import type { HostAction } from "./editor/state.js";
import {
  buildProgram,
  ConfigError,
  resolveConfig,
  type AppConfig,
  type CLIOptions,
} from "./config.js";
import { configureLog, log } from "./log.js";
import { readDocument, StorageError, writeDocument } from "./storage.js";
import {
  GUTTER_WIDTH,
  renderRows,
  scrollFor,
  statusLine,
  visualColumn,
} from "./view.js";

type HostState = {
  filePath: string | null;
  savedText: string;
  scrollTop: number;
  statusMessage: string;
};

function loadConfig(): AppConfig {
  const program = buildProgram();
  program.parse(process.argv);
  try {
    const cli = { ...program.opts<CLIOptions>(), file: program.args[0] };
    return resolveConfig(cli, process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      process.exit(2);
    }
    throw error;
  }
}

const config = loadConfig();
configureLog({ file: config.logFile, debug: config.debug });
log.info("starting", { file: config.filePath, startMode: config.startMode });

const editor = new ModalEditor();
const state: HostState = {
  filePath: config.filePath,
  savedText: "",
  scrollTop: 0,
  statusMessage: "",
};

const screen = blessed.screen({
  smartCSR: true,
  title: "vimpad",
  fullUnicode: true,
});

const root = blessed.box({ top: 0, left: 0, width: "100%", height: "100%" });
screen.append(root);

const editorBox = blessed.box({
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-1",
  tags: false,
});
root.append(editorBox);

const status = blessed.box({
  bottom: 0,
  left: 0,
  width: "100%",
  height: 1,
});
root.append(status);

function isDirty(): boolean {
  return editor.text !== state.savedText;
}

function openDocument(filePath: string) {
  try {
    const doc = readDocument(filePath);
    editor.load(doc.content);
    state.savedText = doc.content;
    state.statusMessage = doc.isNew ? "New file." : "Opened.";
    log.info(doc.isNew ? "new document" : "opened", filePath);
  } catch (error) {
    if (!(error instanceof StorageError)) throw error;
    editor.load("");
    state.savedText = "";
    state.statusMessage = error.message;
    log.error(error.message);
  }
  state.scrollTop = 0;
}

function save(): boolean {
  if (!state.filePath) {
    state.statusMessage = "No file path. Start vimpad with a file name.";
    return false;
  }
  try {
    writeDocument(state.filePath, editor.text);
  } catch (error) {
    if (!(error instanceof StorageError)) throw error;
    state.statusMessage = error.message;
    log.error(error.message);
    return false;
  }
  state.savedText = editor.text;
  state.statusMessage = "Saved.";
  log.info("saved", state.filePath);
  return true;
}

function quit(force: boolean) {
  if (!force && isDirty()) {
    state.statusMessage = "Unsaved changes (use :wq)";
    return;
  }
  log.info("quit");
  screen.destroy();
  process.exit(0);
}

function runAction(action: HostAction) {
  log.debug("host action", action);
  switch (action) {
    case "save":
      save();
      return;
    case "quit":
      quit(false);
      return;
    case "save_quit":
      if (save()) quit(true);
      return;
  }
}

function render() {
  const width = typeof screen.width === "number" ? screen.width : 80;
  const screenHeight = typeof screen.height === "number" ? screen.height : 24;
  const height = Math.max(1, screenHeight - 1);
  const lines = editor.text.split("\n");
  const { line, column } = editor.position;

  state.scrollTop = scrollFor(line, state.scrollTop, height);
  const rows = renderRows(lines, line, state.scrollTop, height, width);
  editorBox.setContent(rows.join("\n"));

  status.setContent(
    statusLine({
      mode: editor.modeLabel,
      fileName: state.filePath ? path.basename(state.filePath) : null,
      dirty: isDirty(),
      line,
      column,
      message: state.statusMessage,
    }),
  );

  screen.render();

  const cursorX = GUTTER_WIDTH + visualColumn(lines[line] ?? "", column);
  screen.program.cup(line - state.scrollTop, Math.min(cursorX, width - 1));
  screen.program.showCursor();
}

screen.key(["C-c"], () => {
  log.info("interrupted");
  screen.destroy();
  process.exit(0);
});

screen.on("resize", () => render());

function handleKeypress(
  ch: string | undefined,
  press: Widgets.Events.IKeyEventArg | undefined,
) {
  const input = translateKeypress(ch, press);
  let consumed = false;

  if (input.key) {
    const result = editor.handleKey(input.key);
    consumed = result.consumed;
    if (result.action) runAction(result.action);
  }
  if (input.text !== null) {
    consumed = editor.handleText({ text: input.text }).consumed || consumed;
  }

  if (!consumed && input.key) {
    const { key, modifiers } = input.key;
    if (modifiers.ctrl && key === "s") save();
    else if (key === "escape") state.statusMessage = "";
  }

  render();
}

screen.on("keypress", handleKeypress);

if (state.filePath) openDocument(state.filePath);
if (config.startMode === "insert") editor.openForEditing("start");
else if (config.startMode === "append") editor.openForEditing("end");

editorBox.focus();
render();
