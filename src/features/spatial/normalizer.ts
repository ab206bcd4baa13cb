// src/features/spatial/normalizer.ts
import { readFileSync } from "fs";
import { TextSourceError } from "./errors.js";

const LETTER_RE = /\p{L}/u;
const WHITESPACE_RE = /\s/u;
/** Typographic apostrophe / single quotes become a word break. */
const APOSTROPHE_RE = /[\u2018\u2019]/u;

/**
 * Reduce text to letters, single spaces and hyphens.
 * Whitespace of any kind (newlines included) becomes a space; typographic
 * apostrophes become a space; digits and other punctuation are dropped.
 */
export function normalizeText(raw: string): string {
  let out = "";
  let pendingSpace = false;
  for (const ch of raw) {
    if (LETTER_RE.test(ch) || ch === "-") {
      if (pendingSpace && out.length > 0) out += " ";
      pendingSpace = false;
      out += ch;
    } else if (ch === " " || WHITESPACE_RE.test(ch) || APOSTROPHE_RE.test(ch)) {
      pendingSpace = true;
    }
  }
  return out;
}

/** Whole file as UTF-8, one read. */
export function readTextSource(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (e) {
    throw new TextSourceError(path, e);
  }
}

export function readNormalizedText(path: string): string {
  return normalizeText(readTextSource(path));
}
