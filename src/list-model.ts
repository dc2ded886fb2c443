import { clampNumber } from "./utils";

export interface ListItem {
  id: string;
  label: string;
}

export class ListModel {
  private items: ListItem[];
  private selected = 0;

  constructor(items: ListItem[] = []) {
    this.items = [...items];
  }

  public getItems(): readonly ListItem[] {
    return this.items;
  }

  public setItems(items: ListItem[]): void {
    this.items = [...items];
    this.selected = 0;
  }

  public getSelectedIndex(): number {
    return this.selected;
  }

  public getSelected(): ListItem | null {
    return this.items[this.selected] ?? null;
  }

  public select(index: number): void {
    this.selected = clampNumber(index, 0, Math.max(0, this.items.length - 1));
  }

  public moveBy(delta: number): boolean {
    const previous = this.selected;
    this.select(this.selected + delta);
    return previous !== this.selected;
  }
}
