import type { KeyInput } from "./types";

export const clampNumber = (
  value: number,
  min: number,
  max: number,
): number => {
  return Math.min(Math.max(value, min), max);
};

const KEY_ALIASES: Record<string, string> = {
  escape: "Esc",
  esc: "Esc",
  enter: "Enter",
  return: "Enter",
  backspace: "Backspace",
  delete: "Delete",
  del: "Delete",
  tab: "Tab",
  backtab: "BackTab",
  left: "Left",
  arrowleft: "Left",
  right: "Right",
  arrowright: "Right",
  up: "Up",
  arrowup: "Up",
  down: "Down",
  arrowdown: "Down",
  home: "Home",
  end: "End",
  pageup: "PageUp",
  pagedown: "PageDown",
  insert: "Insert",
  space: "Space",
  " ": "Space",
};

const MODIFIER_KEYS = new Set(["Shift", "Control", "Ctrl", "Alt", "Meta"]);

const isLetter = (char: string): boolean => /^[a-z]$/i.test(char);

const normalizeKeyName = (key: string): string | null => {
  if (key.length === 1 && key !== " ") return key;
  const alias = KEY_ALIASES[key.toLowerCase()];
  if (alias) return alias;
  const fn = /^f([1-9]|1[0-2])$/i.exec(key);
  if (fn) return `F${fn[1]}`;
  return null;
};

const buildChord = (
  key: string,
  ctrl: boolean,
  alt: boolean,
  shift: boolean,
): string | null => {
  let name = normalizeKeyName(key);
  if (name === null) return null;
  let withShift = shift;

  if (name.length === 1) {
    if (isLetter(name)) {
      // terminals report Shift+l as "L", sometimes without the flag
      withShift = withShift || name !== name.toLowerCase();
      name = name.toLowerCase();
    } else {
      withShift = false;
    }
  } else if (name === "Tab" && withShift) {
    name = "BackTab";
    withShift = false;
  } else if (name === "BackTab") {
    withShift = false;
  }

  const modifiers: string[] = [];
  if (ctrl) modifiers.push("Ctrl");
  if (alt) modifiers.push("Alt");
  if (withShift) modifiers.push("Shift");
  modifiers.push(name);
  return modifiers.join("+");
};

export const isPureModifier = (key: string): boolean => MODIFIER_KEYS.has(key);

export const makeChord = (event: KeyInput): string | null => {
  return buildChord(
    event.key,
    event.ctrl ?? false,
    event.alt ?? false,
    event.shift ?? false,
  );
};

export const parseChord = (text: string): string | null => {
  if (text === "") return null;
  if (text === "+") return "+";
  const endsWithPlus = text.endsWith("++");
  const body = endsWithPlus ? text.slice(0, -2) : text;
  const parts = body.split("+");
  const key = endsWithPlus ? "+" : parts.pop();
  if (key === undefined || key === "") return null;

  let ctrl = false;
  let alt = false;
  let shift = false;
  for (const part of parts) {
    switch (part.toLowerCase()) {
      case "ctrl":
      case "control":
        ctrl = true;
        break;
      case "alt":
        alt = true;
        break;
      case "shift":
        shift = true;
        break;
      default:
        return null;
    }
  }
  return buildChord(key, ctrl, alt, shift);
};

export const printableText = (event: KeyInput): string | null => {
  if (event.ctrl || event.alt) return null;
  if (event.key === " " || event.key.toLowerCase() === "space") return " ";
  if (event.key.length !== 1) return null;
  if (event.shift && isLetter(event.key)) return event.key.toUpperCase();
  return event.key;
};

export const isDigit = (text: string | null): text is string => {
  return text !== null && /^[0-9]$/.test(text);
};
