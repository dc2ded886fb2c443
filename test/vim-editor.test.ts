import { expect, test } from "vitest";
import type { NavigationAction } from "../src/types";
import { VimEditor } from "../src/vim-editor";
import { YankRegister } from "../src/yank-register";

function makeEditor(content = "", register = new YankRegister()): VimEditor {
  return new VimEditor({ register, initialContent: content });
}

function run(editor: VimEditor, actions: NavigationAction[]) {
  return actions.map((action) => editor.apply(action, null));
}

function typeText(editor: VimEditor, text: string) {
  for (const char of text) editor.apply("InsertChar", char);
}

test("typed text, visual copy and paste at the end round-trip", () => {
  const editor = makeEditor();
  run(editor, ["EnterInsertMode"]);
  typeText(editor, "abc");
  run(editor, ["Cancel", "CursorLineStart", "EnterVisualMode", "CursorLineEnd"]);
  expect(editor.getSelectedText()).toBe("abc");

  run(editor, ["Copy"]);
  expect(editor.getMode()).toBe("normal");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 0 });

  run(editor, ["CursorLineEnd", "Paste"]);
  expect(editor.getContent()).toBe("abcabc");
  expect(editor.getMode()).toBe("normal");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 5 });
});

test("normal paste puts text after the cursor", () => {
  const register = new YankRegister();
  register.set("b");
  const editor = makeEditor("ac", register);
  expect(run(editor, ["Paste"])).toEqual([{ kind: "buffer" }]);
  expect(editor.getContent()).toBe("abc");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 2 });
});

test("normal paste into an empty line starts at column zero", () => {
  const register = new YankRegister();
  register.set("xy");
  const editor = makeEditor("", register);
  run(editor, ["Paste"]);
  expect(editor.getContent()).toBe("xy");
});

test("insert paste puts text at the cursor", () => {
  const register = new YankRegister();
  register.set("b");
  const editor = makeEditor("ac", register);
  run(editor, ["EnterInsertMode", "CursorRight", "Paste"]);
  expect(editor.getContent()).toBe("abc");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 2 });
});

test("append steps past the last character", () => {
  const editor = makeEditor("ab");
  run(editor, ["CursorLineEnd", "EnterAppendMode"]);
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 2 });
  typeText(editor, "c");
  expect(editor.getContent()).toBe("abc");
});

test("opening a line below enters insert mode on it", () => {
  const editor = makeEditor("one\ntwo");
  expect(run(editor, ["OpenLineBelow"])).toEqual([{ kind: "mode", mode: "insert" }]);
  expect(editor.getContent()).toBe("one\n\ntwo");
  expect(editor.getCursorPosition()).toEqual({ row: 1, col: 0 });

  typeText(editor, "x");
  run(editor, ["Cancel"]);
  expect(editor.getContent()).toBe("one\nx\ntwo");
  run(editor, ["Undo"]);
  expect(editor.getContent()).toBe("one\ntwo");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 0 });
});

test("opening a line above works on the first line too", () => {
  const editor = makeEditor("one\ntwo");
  run(editor, ["CursorDown", "OpenLineAbove"]);
  expect(editor.getContent()).toBe("one\n\ntwo");
  expect(editor.getCursorPosition()).toEqual({ row: 1, col: 0 });
  expect(editor.getMode()).toBe("insert");

  const first = makeEditor("one");
  run(first, ["OpenLineAbove"]);
  expect(first.getContent()).toBe("\none");
  expect(first.getCursorPosition()).toEqual({ row: 0, col: 0 });
});

test("a doubled delete operator cuts the line", () => {
  const register = new YankRegister();
  const editor = makeEditor("one\ntwo\nthree", register);
  run(editor, ["CursorDown"]);
  expect(run(editor, ["DeleteOperator"])).toEqual([{ kind: "unchanged" }]);
  expect(editor.getPendingOperator()).toBe("delete");

  expect(run(editor, ["DeleteOperator"])).toEqual([{ kind: "buffer" }]);
  expect(editor.getContent()).toBe("one\nthree");
  expect(register.get()).toBe("two\n");
  expect(editor.getCursorPosition()).toEqual({ row: 1, col: 0 });
  expect(editor.getPendingOperator()).toBeNull();
});

test("a doubled yank operator yanks the line", () => {
  const register = new YankRegister();
  const editor = makeEditor("one\ntwo", register);
  run(editor, ["YankOperator", "YankOperator"]);
  expect(register.get()).toBe("one\n");
  expect(editor.getContent()).toBe("one\ntwo");
});

test("yank operator with a motion yanks a word or part of the line", () => {
  const register = new YankRegister();
  const editor = makeEditor("select name from t", register);

  run(editor, ["YankOperator", "CursorNextWord"]);
  expect(register.get()).toBe("select ");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 0 });

  run(editor, ["CursorNextWord", "YankOperator", "CursorLineEnd"]);
  expect(register.get()).toBe("name from t");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 7 });

  run(editor, ["YankOperator", "CursorLineStart"]);
  expect(register.get()).toBe("select ");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 0 });
});

test("yank word, to line end and to line start are actions of their own", () => {
  const register = new YankRegister();
  const editor = makeEditor("ab cd", register);
  run(editor, ["CursorRight", "YankWord"]);
  expect(register.get()).toBe("b ");
  run(editor, ["YankToLineEnd"]);
  expect(register.get()).toBe("b cd");
  run(editor, ["YankToLineStart"]);
  expect(register.get()).toBe("a");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 0 });
});

test("cancel or an unrelated action drops a pending operator", () => {
  const register = new YankRegister();
  register.set("kept");
  const editor = makeEditor("one\ntwo", register);

  expect(run(editor, ["YankOperator", "Cancel"])).toEqual([
    { kind: "unchanged" },
    { kind: "unchanged" },
  ]);
  expect(editor.getPendingOperator()).toBeNull();

  expect(run(editor, ["DeleteOperator", "CursorDown"])).toEqual([
    { kind: "unchanged" },
    { kind: "unchanged" },
  ]);
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 0 });
  expect(run(editor, ["CursorDown"])).toEqual([{ kind: "cursor" }]);
  expect(editor.getContent()).toBe("one\ntwo");
  expect(register.get()).toBe("kept");
});

test("leaving insert mode steps back onto the last character", () => {
  const editor = makeEditor();
  run(editor, ["EnterInsertMode"]);
  typeText(editor, "abc");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 3 });
  run(editor, ["Cancel"]);
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 2 });
});

test("one insert session is one undo step", () => {
  const editor = makeEditor("Hello");
  run(editor, ["EnterInsertMode"]);
  typeText(editor, "!");
  run(editor, ["Cancel"]);
  expect(editor.getContent()).toBe("!Hello");

  expect(run(editor, ["Undo"])).toEqual([{ kind: "buffer" }]);
  expect(editor.getContent()).toBe("Hello");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 0 });

  run(editor, ["Redo"]);
  expect(editor.getContent()).toBe("!Hello");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 1 });
});

test("undo with an empty history changes nothing", () => {
  const editor = makeEditor("same");
  expect(run(editor, ["Undo"])).toEqual([{ kind: "unchanged" }]);
  expect(editor.getContent()).toBe("same");
});

test("delete char on an empty line joins the next line", () => {
  const editor = makeEditor("\ncd");
  run(editor, ["DeleteChar"]);
  expect(editor.getContent()).toBe("cd");
});

test("backspace at column zero joins with the previous line", () => {
  const editor = makeEditor("ab\ncd");
  run(editor, ["CursorDown", "EnterInsertMode", "DeleteCharBefore"]);
  expect(editor.getContent()).toBe("abcd");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 2 });
});

test("visual cut removes the inclusive range across lines", () => {
  const register = new YankRegister();
  const editor = makeEditor("abc\ndef", register);
  run(editor, ["CursorRight", "EnterVisualMode", "CursorDown", "Cut"]);
  expect(editor.getContent()).toBe("af");
  expect(register.get()).toBe("bc\nde");
  expect(editor.getMode()).toBe("normal");
  expect(editor.getCursorPosition()).toEqual({ row: 0, col: 1 });
});

test("linewise yanks paste below the current line", () => {
  const register = new YankRegister();
  const editor = makeEditor("one\ntwo", register);
  run(editor, ["CopyRow"]);
  expect(register.isLinewise()).toBe(true);
  run(editor, ["Paste"]);
  expect(editor.getContent()).toBe("one\none\ntwo");
  expect(editor.getCursorPosition()).toEqual({ row: 1, col: 0 });
});

test("cut in normal mode moves the line into the register", () => {
  const register = new YankRegister();
  const editor = makeEditor("one\ntwo", register);
  run(editor, ["Cut"]);
  expect(editor.getContent()).toBe("two");
  expect(register.get()).toBe("one\n");
});

test("replace char arms first and then replaces", () => {
  const editor = makeEditor("cat");
  expect(editor.apply("ReplaceChar", null)).toEqual({ kind: "unchanged" });
  expect(editor.isAwaitingChar()).toBe(true);
  expect(editor.apply("ReplaceChar", "b")).toEqual({ kind: "buffer" });
  expect(editor.getContent()).toBe("bat");
  expect(editor.isAwaitingChar()).toBe(false);
});

test("command mode edits its own line and returns it on confirm", () => {
  const editor = makeEditor("text");
  run(editor, ["EnterCommandMode"]);
  typeText(editor, "wq");
  run(editor, ["DeleteCharBefore", "CursorLeft"]);
  expect(editor.getCommandLine()).toBe("w");
  expect(editor.apply("Confirm", null)).toEqual({ kind: "command", command: "w" });
  expect(editor.getMode()).toBe("normal");
  expect(editor.getCommandLine()).toBe("");
  expect(editor.getContent()).toBe("text");
});

test("backspace on an empty command line leaves command mode", () => {
  const editor = makeEditor();
  run(editor, ["EnterCommandMode"]);
  expect(run(editor, ["DeleteCharBefore"])).toEqual([{ kind: "mode", mode: "normal" }]);
});

test("digits typed in visual mode are ignored", () => {
  const editor = makeEditor("abc");
  run(editor, ["EnterVisualMode"]);
  expect(editor.apply("InsertChar", "4")).toEqual({ kind: "ignored" });
  expect(editor.getContent()).toBe("abc");
});

test("cursor offset stays within the buffer under arbitrary sequences", () => {
  const actions: NavigationAction[] = [
    "CursorLeft",
    "CursorRight",
    "CursorUp",
    "CursorDown",
    "CursorLineStart",
    "CursorLineEnd",
    "CursorNextWord",
    "CursorPreviousWord",
    "CursorFirstLine",
    "CursorLastLine",
    "EnterInsertMode",
    "EnterAppendMode",
    "OpenLineBelow",
    "OpenLineAbove",
    "InsertChar",
    "InsertNewline",
    "DeleteCharBefore",
    "DeleteChar",
    "DeleteLine",
    "DeleteOperator",
    "YankOperator",
    "YankWord",
    "Cancel",
    "EnterVisualMode",
    "Copy",
    "Cut",
    "Paste",
    "Undo",
    "Redo",
  ];

  for (let seed = 1; seed <= 25; seed += 1) {
    let state = seed;
    const next = () => {
      state = (state * 48271) % 2147483647;
      return state;
    };
    const editor = makeEditor("alpha beta\n\ngamma  delta epsilon\nz");
    for (let step = 0; step < 300; step += 1) {
      const action = actions[next() % actions.length];
      editor.apply(action, action === "InsertChar" ? "x" : null);
      const offset = editor.getCursorOffset();
      expect(offset).toBeGreaterThanOrEqual(0);
      expect(offset).toBeLessThanOrEqual(editor.getBufferLength());
    }
  }
});
