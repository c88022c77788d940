/**
 * Reduce arbitrary Unicode to what the standard PDF fonts can draw.
 *
 * Known typographic characters are mapped to ASCII first; whatever is left
 * above Latin-1 becomes "?" (letters and numbers), a space (whitespace) or
 * nothing. Lossy on purpose; total and idempotent.
 */

const REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ["\u2022", "* "], // bullet
  ["\u2013", "-"], // en dash
  ["\u2014", "-"], // em dash
  ["\u2018", "'"],
  ["\u2019", "'"],
  ["\u201c", '"'],
  ["\u201d", '"'],
  ["\u2026", "..."],
  ["\u00a0", " "], // non-breaking space
  ["\u2212", "-"], // minus sign
  ["\u00b7", "* "], // middle dot
  ["\u25cf", "* "],
  ["\u25cb", "* "],
  ["\u25a0", "* "],
  ["\u25a1", "* "],
  ["\u2192", "->"],
  ["\u2190", "<-"],
  ["\u00ae", "(R)"],
  ["\u00a9", "(C)"],
  ["\u2122", "(TM)"],
  ["\u2500", "-"], // box drawing horizontal
  ["\u2502", "|"], // box drawing vertical
  ["\u2605", "*"],
  ["\u2606", "*"],
];

const LETTER_OR_NUMBER = /^[\p{L}\p{N}]$/u;
const WHITESPACE = /^\p{White_Space}$/u;

export function sanitize(text: string): string {
  let replaced = text;
  for (const [from, to] of REPLACEMENTS) {
    replaced = replaced.split(from).join(to);
  }

  let out = "";
  // for..of walks code points, so astral characters count once
  for (const ch of replaced) {
    const code = ch.codePointAt(0) ?? 0;
    if (code < 256) {
      out += ch;
    } else if (LETTER_OR_NUMBER.test(ch)) {
      out += "?";
    } else if (WHITESPACE.test(ch)) {
      out += " ";
    }
  }
  return out;
}
