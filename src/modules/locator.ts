/**
 * Locator Module
 * Finds the initial spindle-speed command near the start of a program
 */

import type { LocatorConfig, TokenMatch } from "../types";

// Letter immediately followed by an unsigned integer or decimal literal
const WORD_PATTERN = /([A-Za-z])(\d+(?:\.\d*)?|\.\d+)/g;
const LINE_BREAK = /\r\n|\n|\r/g;

interface Line {
  text: string;
  offset: number; // Offset of the first character in the whole text
}

interface Word {
  letter: string; // Uppercased
  literal: string;
  start: number; // Column of the literal (after the letter)
}

/**
 * Split text into lines without their terminators, keeping offsets
 */
function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  let offset = 0;

  for (const match of text.matchAll(LINE_BREAK)) {
    const index = match.index ?? 0;
    lines.push({ text: text.slice(offset, index), offset });
    offset = index + match[0].length;
  }

  if (offset < text.length) {
    lines.push({ text: text.slice(offset), offset });
  }

  return lines;
}

/**
 * Blank out comments so their contents never match, keeping columns intact.
 * Handles parenthesised comments and everything after a semicolon.
 */
function maskComments(line: string): string {
  let masked = "";
  let inParens = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inParens) {
      masked += " ";
      if (char === ")") inParens = false;
    } else if (char === "(") {
      masked += " ";
      inParens = true;
    } else if (char === ";") {
      return masked + " ".repeat(line.length - i);
    } else {
      masked += char;
    }
  }

  return masked;
}

function parseWords(line: string): Word[] {
  const words: Word[] = [];

  for (const match of maskComments(line).matchAll(WORD_PATTERN)) {
    const index = match.index ?? 0;
    words.push({
      letter: match[1].toUpperCase(),
      literal: match[2],
      start: index + 1,
    });
  }

  return words;
}

/**
 * Search the start of a file for the spindle-speed command
 *
 * The window ends after `searchWindow` lines or, when `stopAtMotion` is set,
 * after the first line holding a motion command, whichever comes first.
 * Only the first match counts; later speed changes are ignored.
 */
export function locateSpeedToken(
  filePath: string,
  text: string,
  options: LocatorConfig,
): TokenMatch | null {
  const command = options.command.toUpperCase();
  const lines = splitLines(text).slice(0, options.searchWindow);

  for (const [lineIndex, line] of lines.entries()) {
    let motion = false;

    for (const word of parseWords(line.text)) {
      if (word.letter === command) {
        const end = word.start + word.literal.length;
        return {
          filePath,
          lineIndex,
          column: { start: word.start, end },
          offset: { start: line.offset + word.start, end: line.offset + end },
          literal: word.literal,
          currentSpeed: Number(word.literal),
        };
      }

      if (
        word.letter === "G" &&
        options.motionCodes.includes(Number(word.literal))
      ) {
        motion = true;
      }
    }

    if (motion && options.stopAtMotion) {
      break;
    }
  }

  return null;
}
