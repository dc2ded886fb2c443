import type { BufferAdapter, CursorPosition } from "./types";
import { clampNumber } from "./utils";

export class CursorState {
  private row = 0;
  private col = 0;

  public getPosition(): CursorPosition {
    return { row: this.row, col: this.col };
  }

  public getOffset(buffer: BufferAdapter): number {
    let offset = this.col;
    for (let row = 0; row < this.row; row += 1) {
      offset += buffer.getLineLength(row) + 1;
    }
    return offset;
  }

  public setPosition(row: number, col: number, buffer: BufferAdapter): void {
    this.row = clampNumber(row, 0, Math.max(0, buffer.lineCount() - 1));
    this.col = clampNumber(col, 0, buffer.getLineLength(this.row));
  }

  public moveTo(position: CursorPosition, buffer: BufferAdapter): void {
    this.setPosition(position.row, position.col, buffer);
  }
}
