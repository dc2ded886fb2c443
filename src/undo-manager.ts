import type { EditorSnapshot, EditorState } from "./types";

export class UndoManager<TState extends EditorState = EditorState> {
  private past: EditorSnapshot[] = [];
  private future: EditorSnapshot[] = [];
  private sessionStart: EditorSnapshot | null = null;

  constructor(private capacity = 200) {}

  public createSnapshot(state: TState): EditorSnapshot {
    const { mode, anchor } = state;
    return {
      content: state.buffer.extractContent(),
      cursor: state.cursor.getPosition(),
      mode,
      anchor: anchor ? { ...anchor } : null,
    };
  }

  public recordChange(before: EditorSnapshot, state: TState): void {
    if (before.content === state.buffer.extractContent()) return;
    this.past.push(before);
    if (this.past.length > this.capacity) {
      this.past.splice(0, this.past.length - this.capacity);
    }
    this.future = [];
  }

  public beginCompound(state: TState): void {
    if (this.sessionStart === null) {
      this.sessionStart = this.createSnapshot(state);
    }
  }

  public commitCompoundIfChanged(state: TState): void {
    const start = this.sessionStart;
    if (start === null) return;
    this.sessionStart = null;
    this.recordChange(start, state);
  }

  public hasPendingCompound(): boolean {
    return this.sessionStart !== null;
  }

  public clear(): void {
    this.past = [];
    this.future = [];
    this.sessionStart = null;
  }

  public undo(state: TState): boolean {
    return this.travel(state, this.past, this.future);
  }

  public redo(state: TState): boolean {
    return this.travel(state, this.future, this.past);
  }

  private travel(
    state: TState,
    from: EditorSnapshot[],
    to: EditorSnapshot[],
  ): boolean {
    const target = from.pop();
    if (!target) return false;
    to.push(this.createSnapshot(state));
    state.buffer.replaceContent(target.content);
    state.mode = target.mode;
    state.anchor = target.anchor ? { ...target.anchor } : null;
    state.cursor.moveTo(target.cursor, state.buffer);
    return true;
  }
}
