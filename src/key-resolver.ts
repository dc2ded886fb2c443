import type { KeyMapping, KeyTable } from "./key-mapping";
import type {
  KeyInput,
  NavigationAction,
  ResolveContext,
  ResolvedAction,
} from "./types";
import {
  clampNumber,
  isDigit,
  isPureModifier,
  makeChord,
  printableText,
} from "./utils";

export const MAX_COUNT = 9999;

export class KeyResolver {
  private countBuffer = "";

  constructor(private mapping: KeyMapping) {}

  public getPendingCount(): string {
    return this.countBuffer;
  }

  public reset(): void {
    this.countBuffer = "";
  }

  public resolve(
    event: KeyInput,
    context: ResolveContext,
  ): ResolvedAction | null {
    if (isPureModifier(event.key)) return null;

    const text = printableText(event);

    if (context.awaitingChar && text !== null) {
      return this.emit("ReplaceChar", text);
    }

    if (this.isCountContext(context) && isDigit(text)) {
      if (!this.shouldTreatZeroAsMotion(text)) {
        this.countBuffer = String(Math.min(Number(this.countBuffer + text), MAX_COUNT));
        return null;
      }
    }

    if (context.vimMode === "visual" && isDigit(text)) {
      return this.emit("InsertChar", text);
    }

    const chord = makeChord(event);
    const modeTable = this.modeTable(context);

    if (this.isTextEntry(context)) {
      const modeAction = chord === null ? undefined : modeTable.get(chord);
      if (modeAction) return this.emit(modeAction, null);
      if (text !== null) return this.emit("InsertChar", text);
    }

    if (chord !== null) {
      const tables = [
        modeTable,
        this.mapping.panes[context.pane],
        this.mapping.global,
        this.mapping.composed,
      ];
      for (const table of tables) {
        const action = table.get(chord);
        if (action) return this.emit(action, null);
      }
    }

    this.countBuffer = "";
    return null;
  }

  private emit(action: NavigationAction, text: string | null): ResolvedAction {
    return { action, count: this.consumeCountOrOne(), text };
  }

  private modeTable(context: ResolveContext): KeyTable {
    if (context.editingMode === "cursor") {
      return context.viewMode ? this.mapping.cursor.view : this.mapping.cursor.edit;
    }
    return this.mapping.vim[context.vimMode ?? "normal"];
  }

  private isCountContext(context: ResolveContext): boolean {
    return context.editingMode === "vim" && context.vimMode === "normal";
  }

  private isTextEntry(context: ResolveContext): boolean {
    if (context.editingMode === "cursor") return !context.viewMode;
    return context.vimMode === "insert" || context.vimMode === "command";
  }

  private shouldTreatZeroAsMotion(key: string): boolean {
    if (key !== "0") return false;
    return this.countBuffer === "";
  }

  private consumeCountOrOne(): number {
    const parsed = this.countBuffer === "" ? 1 : Number(this.countBuffer);
    this.countBuffer = "";
    return clampNumber(parsed, 1, MAX_COUNT);
  }
}
