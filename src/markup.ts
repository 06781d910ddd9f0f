import type { MarkupMode } from './types.js';

/**
 * Inline markup conversion: links and single-character emphasis.
 *
 * Both target modes share one pipeline:
 *   1. links are swapped for placeholder tokens
 *   2. emphasis rules run in a fixed order
 *   3. placeholders are restored
 *
 * Placeholders are built from private-use characters and digits, so no
 * emphasis delimiter can match inside one. The tokens an emphasis rule emits
 * are stored as placeholders too, which keeps `</strong>` away from the
 * italic rule and `~~` away from the code rule.
 *
 * Nested spans using the same delimiter and overlapping spans are not
 * supported: each rule is a single regex pass and the first match wins.
 */

/**
 * A bracketed link found in the text.
 */
export interface Link {
  fullMatch: string;
  url: string;
  label: string;
}

type EmphasisName = 'bold' | 'italic' | 'underline' | 'strikethrough' | 'code' | 'verbatim';

interface EmphasisRule {
  name: EmphasisName;
  pattern: RegExp;
}

interface Wrap {
  open: string;
  close: string;
}

type SubstitutionTable = Record<EmphasisName, Wrap>;

// Private-use code point; never produced by the emphasis rules
const SENTINEL_CHAR = '\uE000';

// [[url][label]] or [[url]]
const LINK_PATTERN = /\[\[([^\]]+)\]\[([^\]]+)\]\]|\[\[([^\]]+)\]\]/g;

const EMPHASIS_RULES: EmphasisRule[] = [
  { name: 'bold', pattern: /\*([^*]+)\*/g },
  { name: 'italic', pattern: /\/([^/]+)\//g },
  { name: 'underline', pattern: /_([^_]+)_/g },
  { name: 'strikethrough', pattern: /\+([^+]+)\+/g },
  { name: 'code', pattern: /~([^~]+)~/g },
  { name: 'verbatim', pattern: /=([^=]+)=/g },
];

const HTML_TABLE: SubstitutionTable = {
  bold: { open: '<strong>', close: '</strong>' },
  italic: { open: '<em>', close: '</em>' },
  underline: { open: '<u>', close: '</u>' },
  strikethrough: { open: '<del>', close: '</del>' },
  code: { open: '<code>', close: '</code>' },
  verbatim: { open: '<code>', close: '</code>' },
};

const MARKDOWN_TABLE: SubstitutionTable = {
  bold: { open: '**', close: '**' },
  italic: { open: '*', close: '*' },
  underline: { open: '_', close: '_' },
  strikethrough: { open: '~~', close: '~~' },
  code: { open: '`', close: '`' },
  verbatim: { open: '`', close: '`' },
};

const TABLES: Record<MarkupMode, SubstitutionTable> = {
  html: HTML_TABLE,
  markdown: MARKDOWN_TABLE,
};

const LINK_RENDERERS: Record<MarkupMode, (link: Link) => string> = {
  html: link => `<a href="${link.url}">${link.label}</a>`,
  markdown: link => `[${link.label}](${link.url})`,
};

/**
 * Extract every bracketed link in order of appearance.
 */
export function extractLinks(text: string): Link[] {
  const links: Link[] = [];
  for (const match of text.matchAll(LINK_PATTERN)) {
    if (match[2] !== undefined) {
      links.push({ fullMatch: match[0], url: match[1], label: match[2] });
    } else {
      links.push({ fullMatch: match[0], url: match[3], label: match[3] });
    }
  }
  return links;
}

/**
 * Pick a sentinel character run that does not occur in the text.
 */
function chooseSentinel(text: string): string {
  let sentinel = SENTINEL_CHAR;
  while (text.includes(sentinel)) {
    sentinel += SENTINEL_CHAR;
  }
  return sentinel;
}

/**
 * Holds the replacement strings behind placeholder tokens.
 */
class PlaceholderTable {
  private readonly values: string[] = [];
  private readonly tokenPattern: RegExp;

  constructor(private readonly sentinel: string) {
    this.tokenPattern = new RegExp(`${sentinel}(\\d+)${sentinel}`, 'g');
  }

  protect(value: string): string {
    const index = this.values.length;
    this.values.push(value);
    return `${this.sentinel}${index}${this.sentinel}`;
  }

  restore(text: string): string {
    return text.replace(this.tokenPattern, (token, index: string) => {
      const value = this.values[Number(index)];
      return value ?? token;
    });
  }
}

/**
 * Convert inline markup to the target mode. Never throws.
 */
export function renderMarkup(text: string, mode: MarkupMode): string {
  const placeholders = new PlaceholderTable(chooseSentinel(text));
  const renderLink = LINK_RENDERERS[mode];
  const table = TABLES[mode];

  let result = text.replace(LINK_PATTERN, (fullMatch, url: string | undefined, label: string | undefined, bare: string | undefined) => {
    const link: Link = label !== undefined && url !== undefined
      ? { fullMatch, url, label }
      : { fullMatch, url: bare ?? '', label: bare ?? '' };
    return placeholders.protect(renderLink(link));
  });

  for (const rule of EMPHASIS_RULES) {
    const wrap = table[rule.name];
    result = result.replace(rule.pattern, (_match, inner: string) => (
      `${placeholders.protect(wrap.open)}${inner}${placeholders.protect(wrap.close)}`
    ));
  }

  return placeholders.restore(result);
}
