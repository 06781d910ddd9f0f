import {
  isBlank,
  isBlockBegin,
  isBlockEnd,
  isComment,
  isDrawerClose,
  isDrawerOpen,
  isHeadline,
  isKeywordLine,
  isListItem,
  isPropertyLine,
  isQuoteLine,
  isTableRow,
} from './classify.js';

/**
 * Paragraph unwrapping: merge hard-wrapped physical lines back into logical
 * lines without crossing structural boundaries.
 *
 * Independent of the outline parser; it only uses the line predicates.
 */

// Indented lines that start like a bullet or a number are not continuations
const BULLET_OR_DIGIT_START = /^\s*[-+*\d]/;
const INDENTED = /^\s+\S/;

/**
 * Lines that belong to a property drawer or a `: ` fixed-width run.
 */
function isDrawerLine(line: string): boolean {
  return isDrawerOpen(line) || isDrawerClose(line) || isPropertyLine(line) || isQuoteLine(line);
}

/**
 * Lines that are never merged with anything.
 */
function isStructural(line: string): boolean {
  return isBlank(line)
    || isComment(line)
    || isHeadline(line)
    || isKeywordLine(line)
    || isDrawerLine(line);
}

/**
 * Indented text that continues the previous line.
 */
export function isContinuationLine(line: string): boolean {
  return INDENTED.test(line) && !isListItem(line) && !BULLET_OR_DIGIT_START.test(line);
}

/**
 * Decide whether `next` is merged into `current`. The first rule that
 * applies wins.
 */
export function shouldMerge(current: string, next: string, insideFencedBlock = false): boolean {
  if (insideFencedBlock) return false;
  if (isStructural(current) || isStructural(next)) return false;
  if (isTableRow(current) || isTableRow(next)) return false;
  if (isBlockBegin(next)) return false;
  if (isListItem(current) && isListItem(next)) return false;
  if (isListItem(current) && isContinuationLine(next)) return true;
  if (INDENTED.test(next) && !isContinuationLine(next)) return false;
  return true;
}

/**
 * Append `next` to `current` with a single joining space.
 */
export function mergeLines(current: string, next: string): string {
  const trimmed = next.trim();
  const normalized = isListItem(current) ? trimmed.replace(/\s+/g, ' ') : trimmed;
  return `${current} ${normalized}`;
}

/**
 * Unwrap a whole document. Line order and blank lines are preserved.
 */
export function unwrapText(text: string): string {
  const lines = text.split(/\r?\n/);
  const result: string[] = [];
  let insideFencedBlock = false;

  let i = 0;
  while (i < lines.length) {
    let current = lines[i];
    i++;

    if (isBlockBegin(current)) {
      insideFencedBlock = true;
      result.push(current);
      continue;
    }
    if (isBlockEnd(current)) {
      insideFencedBlock = false;
      result.push(current);
      continue;
    }

    while (i < lines.length && shouldMerge(current, lines[i], insideFencedBlock)) {
      current = mergeLines(current, lines[i]);
      i++;
    }
    result.push(current);
  }

  return result.join('\n');
}
