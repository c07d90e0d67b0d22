/**
 * Vetting Bot — src/lib/normalize.ts
 * WHAT: Canonicalizes untrusted display strings before substring matching.
 * WHY: Group and role names are user-controlled; lookalike characters must not
 *      slip past the "intelligence" flag.
 * FLOWS: NFKD → strip zero-width code points → fold homoglyphs to ASCII → NFKD
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

const INVISIBLE_CHARS = /[\u200B\u200C\u200D\u2060\uFEFF]/g;

/**
 * Lookalike → ASCII. Applied after NFKD, so precomposed accents (í, ï, ī) have
 * usually been split already; the entries stay for inputs that arrive decomposed
 * differently. Every value is plain ASCII, which keeps normalize() idempotent.
 */
export const HOMOGLYPHS: Readonly<Record<string, string>> = {
  // Cyrillic
  "а": "a", "А": "A", "е": "e", "Е": "E", "о": "o", "О": "O",
  "с": "c", "С": "C", "р": "p", "Р": "P", "у": "y", "У": "Y",
  "х": "x", "Х": "X", "і": "i", "І": "I", "ї": "i", "Ї": "I",
  "ј": "j", "Ј": "J", "Ь": "b", "ь": "b", "ӏ": "l", "Ӏ": "I",
  // Accented and dotless Latin
  "í": "i", "ì": "i", "ï": "i", "ī": "i", "ĭ": "i", "Ɩ": "I", "ı": "i",
  // Subscripts
  "ᵢ": "i", "ᵣ": "r", "ₑ": "e", "ₒ": "o", "ₓ": "x",
};

// Combining marks left behind by NFKD (the accent half of "é") are dropped too,
// otherwise "intélligence" would never match.
const COMBINING_MARKS = /[\u0300-\u036F]/g;

const HOMOGLYPH_RE = new RegExp(`[${Object.keys(HOMOGLYPHS).join("")}]`, "g");

export function normalize(text: string): string {
  return text
    .normalize("NFKD")
    .replace(INVISIBLE_CHARS, "")
    .replace(COMBINING_MARKS, "")
    .replace(HOMOGLYPH_RE, (ch) => HOMOGLYPHS[ch] ?? ch)
    // Stripping can leave combining marks out of canonical order; reorder them.
    .normalize("NFKD");
}

/**
 * Case-insensitive containment on normalized text.
 */
export function containsNormalized(haystack: string, needle: string): boolean {
  return normalize(haystack).toLowerCase().includes(normalize(needle).toLowerCase());
}
