import type { BufferAdapter } from "./types";

export class TextBuffer implements BufferAdapter {
  private lines: string[];

  constructor(content = "") {
    this.lines = content.split("\n");
  }

  public extractContent(): string {
    return this.lines.join("\n");
  }

  public replaceContent(content: string): void {
    this.lines = content.split("\n");
  }

  public lineCount(): number {
    return this.lines.length;
  }

  public getLineText(row: number): string {
    return this.lines[row] ?? "";
  }

  public getLineLength(row: number): number {
    return this.getLineText(row).length;
  }

  public setLineText(row: number, text: string): void {
    if (row < 0 || row >= this.lines.length) return;
    this.lines[row] = text;
  }

  public insertLineAfter(row: number, text: string): void {
    this.lines.splice(row + 1, 0, text);
  }

  public removeLine(row: number): void {
    if (row < 0 || row >= this.lines.length) return;
    this.lines.splice(row, 1);
    if (this.lines.length === 0) {
      this.lines.push("");
    }
  }

  public length(): number {
    return this.extractContent().length;
  }
}
