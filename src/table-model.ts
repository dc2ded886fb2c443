import { clampNumber } from "./utils";

export interface CellRef {
  table: string | null;
  column: string;
  row: number;
  value: string;
}

export interface TableData {
  table: string | null;
  columns: string[];
  rows: string[][];
}

export class TableModel {
  private table: string | null = null;
  private columns: string[] = [];
  private rows: string[][] = [];
  private cursorRow = 0;
  private cursorCol = 0;

  constructor(data?: TableData) {
    if (data) this.setData(data);
  }

  public setData(data: TableData): void {
    this.table = data.table;
    this.columns = [...data.columns];
    this.rows = data.rows.map((row) => [...row]);
    this.cursorRow = 0;
    this.cursorCol = 0;
  }

  public getColumns(): readonly string[] {
    return this.columns;
  }

  public getCursor(): { row: number; col: number } {
    return { row: this.cursorRow, col: this.cursorCol };
  }

  public setCursor(row: number, col: number): void {
    this.cursorRow = clampNumber(row, 0, Math.max(0, this.rows.length - 1));
    this.cursorCol = clampNumber(col, 0, Math.max(0, this.columns.length - 1));
  }

  public moveBy(rowDelta: number, colDelta: number): void {
    this.setCursor(this.cursorRow + rowDelta, this.cursorCol + colDelta);
  }

  public moveToFirstRow(): void {
    this.setCursor(0, this.cursorCol);
  }

  public moveToLastRow(): void {
    this.setCursor(this.rows.length - 1, this.cursorCol);
  }

  public moveToFirstColumn(): void {
    this.setCursor(this.cursorRow, 0);
  }

  public moveToLastColumn(): void {
    this.setCursor(this.cursorRow, this.columns.length - 1);
  }

  public cellText(): string {
    return this.rows[this.cursorRow]?.[this.cursorCol] ?? "";
  }

  public setCellText(value: string): void {
    const row = this.rows[this.cursorRow];
    if (!row || this.cursorCol >= this.columns.length) return;
    row[this.cursorCol] = value;
  }

  public rowText(): string {
    return (this.rows[this.cursorRow] ?? []).join("\t");
  }

  public currentColumn(): string | null {
    return this.columns[this.cursorCol] ?? null;
  }

  public cellRef(): CellRef | null {
    const column = this.currentColumn();
    if (column === null || this.rows.length === 0) return null;
    return {
      table: this.table,
      column,
      row: this.cursorRow,
      value: this.cellText(),
    };
  }
}
