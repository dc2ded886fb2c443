/**
 * The yank register shared by every editor in a session. Text ending in a
 * newline is linewise.
 */
export class YankRegister {
  private text = "";

  public get(): string {
    return this.text;
  }

  public set(text: string): void {
    this.text = text;
  }

  public isEmpty(): boolean {
    return this.text === "";
  }

  public isLinewise(): boolean {
    return this.text.endsWith("\n");
  }
}
