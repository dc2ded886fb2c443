import type { EditCommand, EditorState, NavigationAction } from "./types";
import type { YankRegister } from "./yank-register";
import { insertText, pasteRegister, yankLines } from "./edit-text";
import { lastColumn } from "./motions";
import { deleteCharAtCursor } from "./normal-actions";

export const createInsertActions = <
  TState extends EditorState = EditorState,
>(
  register: YankRegister,
): Map<NavigationAction, EditCommand<TState>> => {
  const keymap = new Map<NavigationAction, EditCommand<TState>>();

  const leave: EditCommand<TState> = (state) => {
    state.mode = "normal";
    const { row, col } = state.cursor.getPosition();
    state.cursor.setPosition(row, Math.min(col, lastColumn(state, row)), state.buffer);
  };
  keymap.set("Cancel", leave);
  keymap.set("EnterNormalMode", leave);

  keymap.set("InsertChar", (state, text) => {
    if (text === null) return;
    const { row, col } = state.cursor.getPosition();
    insertText(state, row, col, text);
  });

  keymap.set("DeleteCharBefore", (state) => {
    const { row, col } = state.cursor.getPosition();
    const lineText = state.buffer.getLineText(row);
    if (col > 0) {
      const updated = lineText.slice(0, col - 1) + lineText.slice(col);
      state.buffer.setLineText(row, updated);
      state.cursor.setPosition(row, col - 1, state.buffer);
    } else if (row > 0) {
      const prevLineText = state.buffer.getLineText(row - 1);
      state.buffer.setLineText(row - 1, prevLineText + lineText);
      state.buffer.removeLine(row);
      state.cursor.setPosition(row - 1, prevLineText.length, state.buffer);
    }
  });

  keymap.set("DeleteChar", deleteCharAtCursor);

  keymap.set("InsertNewline", (state) => {
    const { row, col } = state.cursor.getPosition();
    const text = state.buffer.getLineText(row);
    state.buffer.setLineText(row, text.slice(0, col));
    state.buffer.insertLineAfter(row, text.slice(col));
    state.cursor.setPosition(row + 1, 0, state.buffer);
  });

  keymap.set("Paste", (state) => {
    pasteRegister(state, register);
  });

  const yankRow: EditCommand<TState> = (state) => {
    const { row } = state.cursor.getPosition();
    yankLines(state, register, row, row);
  };
  keymap.set("Copy", yankRow);
  keymap.set("CopyRow", yankRow);

  return keymap;
};

export const createCommandLineActions = <
  TState extends EditorState = EditorState,
>(): Map<NavigationAction, EditCommand<TState>> => {
  const keymap = new Map<NavigationAction, EditCommand<TState>>();

  const leave: EditCommand<TState> = (state) => {
    state.commandLine = "";
    state.mode = "normal";
  };
  keymap.set("Cancel", leave);
  keymap.set("EnterNormalMode", leave);

  keymap.set("InsertChar", (state, text) => {
    if (text === null) return;
    state.commandLine += text;
  });

  keymap.set("DeleteCharBefore", (state) => {
    if (state.commandLine === "") {
      state.mode = "normal";
      return;
    }
    state.commandLine = state.commandLine.slice(0, -1);
  });

  keymap.set("Confirm", (state) => {
    state.executedCommand = state.commandLine;
    leave(state, null);
  });

  return keymap;
};
