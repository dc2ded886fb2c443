import { expect, test } from "vitest";
import { makeChord, parseChord, printableText } from "../src/utils";

test("letters typed with shift become Shift+<lowercase>", () => {
  expect(makeChord({ key: "L" })).toBe("Shift+l");
  expect(makeChord({ key: "l", shift: true })).toBe("Shift+l");
  expect(makeChord({ key: "L", shift: true })).toBe("Shift+l");
});

test("shift is dropped for other printable characters", () => {
  expect(makeChord({ key: "$", shift: true })).toBe("$");
  expect(makeChord({ key: ":", shift: true })).toBe(":");
});

test("modifiers are ordered Ctrl, Alt, Shift", () => {
  expect(makeChord({ key: "x", shift: true, alt: true, ctrl: true })).toBe(
    "Ctrl+Alt+Shift+x",
  );
  expect(makeChord({ key: "q", ctrl: true })).toBe("Ctrl+q");
});

test("named keys and browser aliases share one spelling", () => {
  expect(makeChord({ key: "Escape" })).toBe("Esc");
  expect(makeChord({ key: "ArrowLeft" })).toBe("Left");
  expect(makeChord({ key: " " })).toBe("Space");
  expect(makeChord({ key: "f5" })).toBe("F5");
  expect(makeChord({ key: "Tab", shift: true })).toBe("BackTab");
  expect(makeChord({ key: "Unidentified" })).toBeNull();
});

test("parseChord normalizes hand-written chords", () => {
  expect(parseChord("ctrl+shift+L")).toBe("Ctrl+Shift+l");
  expect(parseChord("G")).toBe("Shift+g");
  expect(parseChord("shift+tab")).toBe("BackTab");
  expect(parseChord("Ctrl++")).toBe("Ctrl++");
  expect(parseChord("+")).toBe("+");
});

test("parseChord rejects malformed chords", () => {
  expect(parseChord("")).toBeNull();
  expect(parseChord("Ctrl+")).toBeNull();
  expect(parseChord("Hyper+x")).toBeNull();
});

test("printableText only reports characters a key types", () => {
  expect(printableText({ key: "a", shift: true })).toBe("A");
  expect(printableText({ key: "a", ctrl: true })).toBeNull();
  expect(printableText({ key: "Enter" })).toBeNull();
  expect(printableText({ key: " " })).toBe(" ");
});
