import type { EditCommand, EditorState, NavigationAction } from "./types";
import type { UndoManager } from "./undo-manager";
import type { YankRegister } from "./yank-register";
import {
  deleteLines,
  deleteRange,
  extractRange,
  getSelectionRange,
  lineRange,
  pasteRegister,
  yankLines,
} from "./edit-text";
import { nextWordCol } from "./motions";

export const deleteCharAtCursor: EditCommand = (state) => {
  const { row, col } = state.cursor.getPosition();
  const text = state.buffer.getLineText(row);
  if (col < text.length) {
    state.buffer.setLineText(row, text.slice(0, col) + text.slice(col + 1));
  } else if (row < state.buffer.lineCount() - 1) {
    state.buffer.setLineText(row, text + state.buffer.getLineText(row + 1));
    state.buffer.removeLine(row + 1);
  }
};

export const createNormalActions = <TState extends EditorState = EditorState>(
  register: YankRegister,
  undoManager: UndoManager<TState>,
): {
  normalCommands: Map<NavigationAction, EditCommand<TState>>;
  undoCommand: EditCommand<TState>;
  redoCommand: EditCommand<TState>;
} => {
  const normalCommands = new Map<NavigationAction, EditCommand<TState>>();

  normalCommands.set("EnterInsertMode", (state) => {
    state.mode = "insert";
  });

  normalCommands.set("EnterAppendMode", (state) => {
    const { row, col } = state.cursor.getPosition();
    state.mode = "insert";
    state.cursor.setPosition(row, col + 1, state.buffer);
  });

  normalCommands.set("OpenLineBelow", (state) => {
    const { row } = state.cursor.getPosition();
    state.buffer.insertLineAfter(row, "");
    state.mode = "insert";
    state.cursor.setPosition(row + 1, 0, state.buffer);
  });

  normalCommands.set("OpenLineAbove", (state) => {
    const { row } = state.cursor.getPosition();
    state.buffer.insertLineAfter(row - 1, "");
    state.mode = "insert";
    state.cursor.setPosition(row, 0, state.buffer);
  });

  normalCommands.set("EnterVisualMode", (state) => {
    state.anchor = state.cursor.getPosition();
    state.mode = "visual";
  });

  normalCommands.set("EnterCommandMode", (state) => {
    state.commandLine = "";
    state.mode = "command";
  });

  normalCommands.set("DeleteChar", deleteCharAtCursor);

  normalCommands.set("ReplaceChar", (state, text) => {
    if (text === null) {
      state.awaitingChar = true;
      return;
    }
    state.awaitingChar = false;
    const { row, col } = state.cursor.getPosition();
    const line = state.buffer.getLineText(row);
    if (col >= line.length) return;
    state.buffer.setLineText(row, line.slice(0, col) + text + line.slice(col + 1));
  });

  normalCommands.set("DeleteOperator", (state) => {
    state.pendingOperator = "delete";
  });

  normalCommands.set("YankOperator", (state) => {
    state.pendingOperator = "yank";
  });

  normalCommands.set("DeleteLine", (state) => {
    const { row } = state.cursor.getPosition();
    deleteLines(state, row, row);
  });

  const yankRow: EditCommand<TState> = (state) => {
    const { row } = state.cursor.getPosition();
    yankLines(state, register, row, row);
  };
  normalCommands.set("Copy", yankRow);
  normalCommands.set("CopyRow", yankRow);

  const yankSlice = (state: TState, start: number, end: number): void => {
    const { row } = state.cursor.getPosition();
    const text = state.buffer.getLineText(row).slice(start, end);
    if (text !== "") register.set(text);
  };

  normalCommands.set("YankWord", (state) => {
    const { row, col } = state.cursor.getPosition();
    yankSlice(state, col, nextWordCol(state.buffer.getLineText(row), col));
  });

  normalCommands.set("YankToLineEnd", (state) => {
    const { row, col } = state.cursor.getPosition();
    yankSlice(state, col, state.buffer.getLineLength(row));
  });

  normalCommands.set("YankToLineStart", (state) => {
    const { row, col } = state.cursor.getPosition();
    yankSlice(state, 0, col);
    state.cursor.setPosition(row, 0, state.buffer);
  });

  normalCommands.set("Cut", (state) => {
    const { row } = state.cursor.getPosition();
    yankLines(state, register, row, row);
    deleteLines(state, row, row);
  });

  normalCommands.set("Paste", (state) => {
    pasteRegister(state, register, true);
  });

  const undoCommand: EditCommand<TState> = (state) => {
    if (undoManager.undo(state)) {
      state.mode = "normal";
    }
  };

  const redoCommand: EditCommand<TState> = (state) => {
    if (undoManager.redo(state)) {
      state.mode = "normal";
    }
  };

  return { normalCommands, undoCommand, redoCommand };
};

export const createVisualActions = <
  TState extends EditorState = EditorState,
>(
  register: YankRegister,
): Map<NavigationAction, EditCommand<TState>> => {
  const visualCommands = new Map<NavigationAction, EditCommand<TState>>();

  const leave = (state: TState, row: number, col: number): void => {
    state.anchor = null;
    state.mode = "normal";
    state.cursor.setPosition(row, col, state.buffer);
  };

  const exit: EditCommand<TState> = (state) => {
    const { row, col } = state.cursor.getPosition();
    leave(state, row, col);
  };
  visualCommands.set("EnterVisualMode", exit);
  visualCommands.set("EnterNormalMode", exit);
  visualCommands.set("Cancel", exit);

  visualCommands.set("Copy", (state) => {
    const range = getSelectionRange(state);
    if (!range) return;
    register.set(extractRange(state, range));
    leave(state, range.startRow, range.startCol);
  });

  visualCommands.set("CopyRow", (state) => {
    const { startRow, endRow } = lineRange(state);
    yankLines(state, register, startRow, endRow);
    leave(state, startRow, 0);
  });

  const cut: EditCommand<TState> = (state) => {
    const range = getSelectionRange(state);
    if (!range) return;
    register.set(extractRange(state, range));
    deleteRange(state, range);
    leave(state, range.startRow, range.startCol);
  };
  visualCommands.set("Cut", cut);
  visualCommands.set("DeleteChar", cut);

  return visualCommands;
};
