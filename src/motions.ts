import type { EditorState, MotionDefinition, NavigationAction } from "./types";
import { clampNumber } from "./utils";

const isWordChar = (char: string): boolean => /[A-Za-z0-9_]/.test(char);

export const nextWordCol = (line: string, col: number): number => {
  let index = col;
  if (index < line.length && isWordChar(line[index])) {
    while (index < line.length && isWordChar(line[index])) index += 1;
  } else if (index < line.length) {
    index += 1;
  }
  while (index < line.length && line[index] === " ") index += 1;
  return index;
};

const previousWordCol = (line: string, col: number): number => {
  let index = Math.min(col, line.length);
  while (index > 0 && line[index - 1] === " ") index -= 1;
  if (index > 0 && isWordChar(line[index - 1])) {
    while (index > 0 && isWordChar(line[index - 1])) index -= 1;
  } else if (index > 0) {
    index -= 1;
  }
  return index;
};

/** Insert mode may sit after the last character; other modes stop on it. */
export const lastColumn = (state: EditorState, row: number): number => {
  const lineLength = state.buffer.getLineLength(row);
  return state.mode === "insert" ? lineLength : Math.max(0, lineLength - 1);
};

export const createMotions = <TState extends EditorState = EditorState>(): Map<
  NavigationAction,
  MotionDefinition<TState>
> => {
  const motions = new Map<NavigationAction, MotionDefinition<TState>>();
  const define = (
    action: NavigationAction,
    move: (state: TState) => void,
  ): void => {
    motions.set(action, { action, move });
  };

  define("CursorLeft", (state) => {
    const { row, col } = state.cursor.getPosition();
    state.cursor.setPosition(row, Math.max(0, col - 1), state.buffer);
  });

  define("CursorRight", (state) => {
    const { row, col } = state.cursor.getPosition();
    state.cursor.setPosition(
      row,
      Math.min(lastColumn(state, row), col + 1),
      state.buffer,
    );
  });

  define("CursorDown", (state) => {
    const { row, col } = state.cursor.getPosition();
    const targetRow = clampNumber(row + 1, 0, state.buffer.lineCount() - 1);
    state.cursor.setPosition(targetRow, col, state.buffer);
  });

  define("CursorUp", (state) => {
    const { row, col } = state.cursor.getPosition();
    const targetRow = clampNumber(row - 1, 0, state.buffer.lineCount() - 1);
    state.cursor.setPosition(targetRow, col, state.buffer);
  });

  define("CursorLineStart", (state) => {
    const { row } = state.cursor.getPosition();
    state.cursor.setPosition(row, 0, state.buffer);
  });

  define("CursorLineEnd", (state) => {
    const { row } = state.cursor.getPosition();
    state.cursor.setPosition(row, lastColumn(state, row), state.buffer);
  });

  define("CursorNextWord", (state) => {
    const { row, col } = state.cursor.getPosition();
    const line = state.buffer.getLineText(row);
    const target = nextWordCol(line, col);
    if (target >= line.length && row < state.buffer.lineCount() - 1) {
      state.cursor.setPosition(row + 1, 0, state.buffer);
      return;
    }
    state.cursor.setPosition(row, target, state.buffer);
  });

  define("CursorPreviousWord", (state) => {
    const { row, col } = state.cursor.getPosition();
    if (col === 0 && row > 0) {
      const previous = state.buffer.getLineText(row - 1);
      state.cursor.setPosition(
        row - 1,
        previousWordCol(previous, previous.length),
        state.buffer,
      );
      return;
    }
    const line = state.buffer.getLineText(row);
    state.cursor.setPosition(row, previousWordCol(line, col), state.buffer);
  });

  define("CursorFirstLine", (state) => {
    state.cursor.setPosition(0, 0, state.buffer);
  });

  define("CursorLastLine", (state) => {
    state.cursor.setPosition(state.buffer.lineCount() - 1, 0, state.buffer);
  });

  return motions;
};
