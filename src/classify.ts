/**
 * Line predicates for the org-style outline format.
 *
 * Every predicate looks at a single line and nothing else. A line can satisfy
 * several of them at once; `classifyLine` applies the precedence used by the
 * parser and the block renderer.
 */

// Headline: one or more stars at column 0, then whitespace
// Group 1: the stars (level), Group 2: the title
const HEADLINE_PATTERN = /^(\*+)\s+(.*)$/;

// "- item", "+ item", "* item" with optional indentation
const UNORDERED_ITEM_PATTERN = /^\s*([-+*])\s+(.*)$/;

// "1. item" or "1) item" with optional indentation
const ORDERED_ITEM_PATTERN = /^\s*(\d+)([.)])\s+(.*)$/;

// ":key: value", ":key:value" or bare ":key:"
// Group 1: key, Group 2: value (may be undefined)
const PROPERTY_PATTERN = /^\s*:([\w-]+):(?:\s*(.*?))?\s*$/;

// "#+BEGIN_SRC python" -> name "SRC", rest "python"
// "#+BEGIN: clocktable" -> dynamic block, no name
const BLOCK_BEGIN_PATTERN = /^\s*#\+begin(?:_(\w+))?:?(?:\s+(.*))?$/i;
const BLOCK_END_PATTERN = /^\s*#\+end(?:_\w*|:)?(?:\s|$)/i;

const DYNAMIC_BLOCK = 'DYNAMIC';

const KEYWORD_PATTERN = /^\s*#\+/;
const COMMENT_PATTERN = /^\s*#(?!\+)/;
const QUOTE_PATTERN = /^\s*: \S/;
const TABLE_SEPARATOR_PATTERN = /^\|[-+|:\s]*\|$/;

const DRAWER_OPEN = ':PROPERTIES:';
const DRAWER_CLOSE = ':END:';

export type LineKind =
  | 'blank'
  | 'drawer-open'
  | 'drawer-close'
  | 'headline'
  | 'block-begin'
  | 'block-end'
  | 'keyword'
  | 'comment'
  | 'property'
  | 'table-separator'
  | 'table-row'
  | 'quote'
  | 'list-item'
  | 'text';

export interface ClassifyOptions {
  /** Property lines only exist inside an open drawer */
  inDrawer?: boolean;
}

export interface PropertyEntry {
  key: string;
  value: string;
}

export interface BlockBegin {
  /** Upper-cased block name, e.g. SRC, QUOTE, EXAMPLE; DYNAMIC for `#+BEGIN:` */
  name: string;
  /** Language token of a source block */
  language?: string;
}

export interface ListMarker {
  ordered: boolean;
  /** The bullet character or the number followed by its delimiter */
  marker: string;
  /** Item text after the marker */
  text: string;
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

export function isHeadline(line: string): boolean {
  return HEADLINE_PATTERN.test(line);
}

/**
 * Number of leading stars, or 0 when the line is not a headline.
 */
export function headlineLevel(line: string): number {
  const match = line.match(HEADLINE_PATTERN);
  return match ? match[1].length : 0;
}

export function headlineTitle(line: string): string {
  const match = line.match(HEADLINE_PATTERN);
  return match ? match[2].trim() : '';
}

/**
 * `# note` style comment. `#+` lines are keywords, not comments.
 */
export function isComment(line: string): boolean {
  return COMMENT_PATTERN.test(line);
}

export function isKeywordLine(line: string): boolean {
  return KEYWORD_PATTERN.test(line);
}

export function isUnorderedListItem(line: string): boolean {
  return UNORDERED_ITEM_PATTERN.test(line);
}

export function isOrderedListItem(line: string): boolean {
  return ORDERED_ITEM_PATTERN.test(line);
}

export function isListItem(line: string): boolean {
  return isUnorderedListItem(line) || isOrderedListItem(line);
}

/**
 * Split a list item into its marker and text.
 */
export function parseListItem(line: string): ListMarker | null {
  const ordered = line.match(ORDERED_ITEM_PATTERN);
  if (ordered) {
    return { ordered: true, marker: `${ordered[1]}${ordered[2]}`, text: ordered[3] };
  }
  const unordered = line.match(UNORDERED_ITEM_PATTERN);
  if (unordered) {
    return { ordered: false, marker: unordered[1], text: unordered[2] };
  }
  return null;
}

export function isDrawerOpen(line: string): boolean {
  return line.trim().toUpperCase() === DRAWER_OPEN;
}

export function isDrawerClose(line: string): boolean {
  return line.trim().toUpperCase() === DRAWER_CLOSE;
}

export function isPropertyLine(line: string): boolean {
  return parsePropertyLine(line) !== null;
}

/**
 * Parse a `:key: value` line. Drawer sentinels are not properties.
 */
export function parsePropertyLine(line: string): PropertyEntry | null {
  const match = line.match(PROPERTY_PATTERN);
  if (!match) return null;

  const key = match[1].toLowerCase();
  if (key === 'properties' || key === 'end') return null;

  return { key, value: (match[2] ?? '').trim() };
}

export function isTableRow(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length >= 2 && trimmed.startsWith('|') && trimmed.endsWith('|');
}

/**
 * `|---+---|` style rule between table rows.
 */
export function isTableSeparator(line: string): boolean {
  const trimmed = line.trim();
  return isTableRow(trimmed) && TABLE_SEPARATOR_PATTERN.test(trimmed) && trimmed.includes('-');
}

export function isBlockBegin(line: string): boolean {
  return BLOCK_BEGIN_PATTERN.test(line);
}

export function isBlockEnd(line: string): boolean {
  return BLOCK_END_PATTERN.test(line);
}

export function parseBlockBegin(line: string): BlockBegin | null {
  const match = line.match(BLOCK_BEGIN_PATTERN);
  if (!match) return null;

  const name = match[1] ? match[1].toUpperCase() : DYNAMIC_BLOCK;
  if (name !== 'SRC') return { name };

  const language = (match[2] ?? '').trim().split(/\s+/)[0];
  return language ? { name, language } : { name };
}

/**
 * `: text` line (colon, exactly one space, then text).
 */
export function isQuoteLine(line: string): boolean {
  return QUOTE_PATTERN.test(line);
}

/**
 * Classify a line using the shared precedence:
 * blank > drawer sentinels > headline > block begin/end > keyword > comment >
 * property (inside a drawer only) > table > quote > list item > text.
 */
export function classifyLine(line: string, options: ClassifyOptions = {}): LineKind {
  if (isBlank(line)) return 'blank';
  if (isDrawerOpen(line)) return 'drawer-open';
  if (isDrawerClose(line)) return 'drawer-close';
  if (isHeadline(line)) return 'headline';
  if (isBlockBegin(line)) return 'block-begin';
  if (isBlockEnd(line)) return 'block-end';
  if (isKeywordLine(line)) return 'keyword';
  if (isComment(line)) return 'comment';
  if (options.inDrawer && isPropertyLine(line)) return 'property';
  if (isTableSeparator(line)) return 'table-separator';
  if (isTableRow(line)) return 'table-row';
  if (isQuoteLine(line)) return 'quote';
  if (isListItem(line)) return 'list-item';
  return 'text';
}
