/**
 * ANSI colour helpers.
 *
 * `toDisplay` expands `&<code>` markers into control sequences for terminal output;
 * `toPlain` removes control sequences so the same text can be written to a file.
 * @module
 */

const ESC = "\x1b[";

export const Ansi = {
  BLACK: `${ESC}0;30m`,
  RED: `${ESC}0;31m`,
  GREEN: `${ESC}0;32m`,
  YELLOW: `${ESC}0;33m`,
  BLUE: `${ESC}0;34m`,
  PURPLE: `${ESC}0;35m`,
  CYAN: `${ESC}0;36m`,
  WHITE: `${ESC}0;37m`,

  BOLD_RED: `${ESC}1;31m`,
  BOLD_GREEN: `${ESC}1;32m`,
  BOLD_YELLOW: `${ESC}1;33m`,
  BOLD_BLUE: `${ESC}1;34m`,
  BOLD_PURPLE: `${ESC}1;35m`,
  BOLD_CYAN: `${ESC}1;36m`,

  BRIGHT_BLACK: `${ESC}0;90m`,
  BRIGHT_RED: `${ESC}0;91m`,
  BRIGHT_GREEN: `${ESC}0;92m`,
  BRIGHT_YELLOW: `${ESC}0;93m`,
  BRIGHT_BLUE: `${ESC}0;94m`,
  BRIGHT_PURPLE: `${ESC}0;95m`,
  BRIGHT_CYAN: `${ESC}0;96m`,
  BRIGHT_WHITE: `${ESC}0;97m`,

  RESET: `${ESC}0m`,
  BOLD: `${ESC}1m`,
  ITALIC: `${ESC}3m`,
  UNDERLINE: `${ESC}4m`,
} as const;

export type AnsiColor = (typeof Ansi)[keyof typeof Ansi];

export const MARKER = "&";
const ESCAPE = "\\";

/** Marker code letter → control sequence. Upper-case letters are folded before lookup. */
export const MARKER_CODES: Readonly<Record<string, string>> = {
  "0": Ansi.BLACK,
  "1": Ansi.BLUE,
  "2": Ansi.GREEN,
  "3": Ansi.CYAN,
  "4": Ansi.RED,
  "5": Ansi.PURPLE,
  "6": Ansi.YELLOW,
  "7": Ansi.WHITE,
  "8": Ansi.BRIGHT_BLACK,
  "9": Ansi.BRIGHT_BLUE,
  a: Ansi.BRIGHT_GREEN,
  b: Ansi.BRIGHT_CYAN,
  c: Ansi.BRIGHT_RED,
  d: Ansi.BRIGHT_PURPLE,
  e: Ansi.BRIGHT_YELLOW,
  f: Ansi.BRIGHT_WHITE,
  g: Ansi.YELLOW,
  r: Ansi.RESET,
};

// CSI: ESC [ parameter bytes, intermediate bytes, final byte
const CSI_PATTERN = /\x1b\[[0-?]*[ -/]*[@-~]/g;

/**
 * Replace `&<code>` markers with their control sequence.
 * `\&` yields a literal `&`; unknown codes and a trailing `&` are kept verbatim.
 */
export function toDisplay(text: string): string {
  if (!text.includes(MARKER) && !text.includes(ESCAPE)) return text;

  let result = "";
  let lastPos = 0;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (char === ESCAPE && text[i + 1] === MARKER) {
      result += text.slice(lastPos, i) + MARKER;
      i += 2;
      lastPos = i;
      continue;
    }

    if (char === MARKER && i + 1 < text.length) {
      const code = MARKER_CODES[text.charAt(i + 1).toLowerCase()];
      if (code !== undefined) {
        result += text.slice(lastPos, i) + code;
        i += 2;
        lastPos = i;
        continue;
      }
    }

    i++;
  }

  return result + text.slice(lastPos);
}

/** Remove every CSI control sequence. */
export function toPlain(text: string): string {
  return text.replace(CSI_PATTERN, "");
}
