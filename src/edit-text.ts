import type { CharacterRange, CursorPosition, EditorState } from "./types";
import type { YankRegister } from "./yank-register";
import { clampNumber } from "./utils";

export const getSelectionRange = (state: EditorState): CharacterRange | null => {
  if (!state.anchor) return null;
  const lastRow = state.buffer.lineCount() - 1;
  const clamp = (position: CursorPosition): CursorPosition => {
    const row = clampNumber(position.row, 0, lastRow);
    return {
      row,
      col: clampNumber(position.col, 0, state.buffer.getLineLength(row)),
    };
  };
  const anchor = clamp(state.anchor);
  const head = clamp(state.cursor.getPosition());
  const anchorIsTop =
    anchor.row < head.row || (anchor.row === head.row && anchor.col <= head.col);
  const start = anchorIsTop ? anchor : head;
  const end = anchorIsTop ? head : anchor;
  return {
    startRow: start.row,
    startCol: start.col,
    endRow: end.row,
    endCol: Math.min(end.col + 1, state.buffer.getLineLength(end.row)),
  };
};

export const extractRange = (state: EditorState, range: CharacterRange): string => {
  if (range.startRow === range.endRow) {
    return state.buffer
      .getLineText(range.startRow)
      .slice(range.startCol, range.endCol);
  }
  const parts: string[] = [];
  parts.push(state.buffer.getLineText(range.startRow).slice(range.startCol));
  for (let row = range.startRow + 1; row < range.endRow; row += 1) {
    parts.push(state.buffer.getLineText(row));
  }
  parts.push(state.buffer.getLineText(range.endRow).slice(0, range.endCol));
  return parts.join("\n");
};

export const deleteRange = (state: EditorState, range: CharacterRange): void => {
  const startLine = state.buffer.getLineText(range.startRow);
  const endLine = state.buffer.getLineText(range.endRow);
  state.buffer.setLineText(
    range.startRow,
    startLine.slice(0, range.startCol) + endLine.slice(range.endCol),
  );
  for (let row = range.startRow + 1; row <= range.endRow; row += 1) {
    state.buffer.removeLine(range.startRow + 1);
  }
  state.cursor.setPosition(range.startRow, range.startCol, state.buffer);
};

export const lineRange = (state: EditorState): { startRow: number; endRow: number } => {
  const { row } = state.cursor.getPosition();
  if (!state.anchor) return { startRow: row, endRow: row };
  return {
    startRow: Math.min(row, state.anchor.row),
    endRow: Math.max(row, state.anchor.row),
  };
};

export const yankLines = (
  state: EditorState,
  register: YankRegister,
  startRow: number,
  endRow: number,
): void => {
  const lines: string[] = [];
  for (let row = startRow; row <= endRow; row += 1) {
    lines.push(state.buffer.getLineText(row));
  }
  register.set(`${lines.join("\n")}\n`);
};

export const deleteLines = (
  state: EditorState,
  startRow: number,
  endRow: number,
): void => {
  const end = clampNumber(endRow, startRow, state.buffer.lineCount() - 1);
  for (let row = startRow; row <= end; row += 1) {
    state.buffer.removeLine(startRow);
  }
  const targetRow = clampNumber(startRow, 0, state.buffer.lineCount() - 1);
  state.cursor.setPosition(targetRow, 0, state.buffer);
};

export const insertText = (
  state: EditorState,
  row: number,
  col: number,
  text: string,
): void => {
  const lines = text.split("\n");
  const original = state.buffer.getLineText(row);
  const clampedCol = clampNumber(col, 0, original.length);
  if (lines.length === 1) {
    state.buffer.setLineText(
      row,
      original.slice(0, clampedCol) + text + original.slice(clampedCol),
    );
    state.cursor.setPosition(row, clampedCol + text.length, state.buffer);
    return;
  }

  const lastLine = lines[lines.length - 1];
  state.buffer.setLineText(row, original.slice(0, clampedCol) + lines[0]);
  for (let i = 1; i < lines.length - 1; i += 1) {
    state.buffer.insertLineAfter(row + i - 1, lines[i]);
  }
  state.buffer.insertLineAfter(
    row + lines.length - 2,
    lastLine + original.slice(clampedCol),
  );
  state.cursor.setPosition(row + lines.length - 1, lastLine.length, state.buffer);
};

/**
 * Puts the register into the buffer. Linewise text goes below the current
 * line; other text goes at the cursor, or just after it with `after`.
 */
export const pasteRegister = (
  state: EditorState,
  register: YankRegister,
  after = false,
): void => {
  if (register.isEmpty()) return;
  const { row, col } = state.cursor.getPosition();
  const text = register.get();

  if (register.isLinewise()) {
    const lines = text.slice(0, -1).split("\n");
    let current = row;
    for (const line of lines) {
      state.buffer.insertLineAfter(current, line);
      current += 1;
    }
    state.cursor.setPosition(row + 1, 0, state.buffer);
    return;
  }

  insertText(state, row, after ? col + 1 : col, text);
};
