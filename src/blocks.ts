import {
  classifyLine,
  isBlank,
  isBlockEnd,
  isListItem,
  isOrderedListItem,
  isQuoteLine,
  isTableRow,
  isTableSeparator,
  parseBlockBegin,
  parseListItem,
} from './classify.js';
import { renderMarkup } from './markup.js';
import type { MarkupMode } from './types.js';

/**
 * Block-level rendering of a headline's content lines.
 *
 * A cursor walks the lines once. At each position the line is classified and
 * the matching handler consumes a greedy run of lines:
 * fenced block > table > quote > list > paragraph.
 */

interface Consumed {
  /** Rendered output; empty strings are dropped by the caller */
  output: string;
  /** Index of the first line after the run */
  next: number;
}

const BLOCK_SEPARATORS: Record<MarkupMode, string> = {
  html: '\n',
  markdown: '\n\n',
};

const QUOTE_PREFIX_PATTERN = /^\s*: /;

/**
 * Escape the characters that would otherwise open markup in a code block.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Split a table row into trimmed cells, dropping the outer pipes.
 */
export function splitTableCells(row: string): string[] {
  const trimmed = row.trim();
  return trimmed.slice(1, -1).split('|').map(cell => cell.trim());
}

function renderQuoteLines(texts: string[], mode: MarkupMode): string {
  const rendered = texts.filter(text => !isBlank(text)).map(text => renderMarkup(text.trim(), mode));
  if (mode === 'markdown') {
    return rendered.map(text => `> ${text}`).join('\n');
  }
  return ['<blockquote>', ...rendered.map(text => `<p>${text}</p>`), '</blockquote>'].join('\n');
}

function consumeFencedBlock(lines: string[], start: number, mode: MarkupMode): Consumed {
  const begin = parseBlockBegin(lines[start]);
  let end = start + 1;
  while (end < lines.length && !isBlockEnd(lines[end])) {
    end++;
  }
  const body = lines.slice(start + 1, end);
  // Unterminated blocks run to the end of the content
  const next = Math.min(end + 1, lines.length);

  if (begin?.name === 'QUOTE') {
    return { output: renderQuoteLines(body, mode), next };
  }

  const language = begin?.language ?? '';
  const code = body.join('\n');
  if (mode === 'markdown') {
    return { output: `\`\`\`${language}\n${code}\n\`\`\``, next };
  }
  const classAttr = language ? ` class="language-${language}"` : '';
  return { output: `<pre><code${classAttr}>${escapeHtml(code)}</code></pre>`, next };
}

function renderHtmlTable(header: string[] | null, body: string[][]): string {
  const out: string[] = ['<table>'];
  if (header) {
    out.push('<thead>');
    out.push(`<tr>${header.map(cell => `<th>${renderMarkup(cell, 'html')}</th>`).join('')}</tr>`);
    out.push('</thead>');
  }
  out.push('<tbody>');
  for (const row of body) {
    out.push(`<tr>${row.map(cell => `<td>${renderMarkup(cell, 'html')}</td>`).join('')}</tr>`);
  }
  out.push('</tbody>');
  out.push('</table>');
  return out.join('\n');
}

function renderMarkdownTable(rows: string[][]): string {
  if (rows.length === 0) {
    return '';
  }
  const rendered = rows.map(row => row.map(cell => renderMarkup(cell, 'markdown')));

  const widths: number[] = [];
  for (const row of rendered) {
    row.forEach((cell, column) => {
      widths[column] = Math.max(widths[column] ?? 1, cell.length);
    });
  }

  const formatRow = (row: string[]): string =>
    `| ${row.map((cell, column) => cell.padEnd(widths[column])).join(' | ')} |`;

  const [header, ...body] = rendered;
  return [
    formatRow(header),
    `| ${widths.map(width => '-'.repeat(width)).join(' | ')} |`,
    ...body.map(formatRow),
  ].join('\n');
}

function consumeTable(lines: string[], start: number, mode: MarkupMode): Consumed {
  let next = start;
  while (next < lines.length && isTableRow(lines[next])) {
    next++;
  }
  const rows = lines.slice(start, next);
  const hasHeader = rows.length > 1 && isTableSeparator(rows[1]);
  const dataRows = rows.filter(row => !isTableSeparator(row)).map(splitTableCells);

  if (mode === 'markdown') {
    return { output: renderMarkdownTable(dataRows), next };
  }
  if (hasHeader) {
    const [header, ...body] = dataRows;
    return { output: renderHtmlTable(header, body), next };
  }
  return { output: renderHtmlTable(null, dataRows), next };
}

function consumeQuote(lines: string[], start: number, mode: MarkupMode): Consumed {
  let next = start;
  while (next < lines.length && isQuoteLine(lines[next])) {
    next++;
  }
  const texts = lines.slice(start, next).map(line => line.replace(QUOTE_PREFIX_PATTERN, ''));
  return { output: renderQuoteLines(texts, mode), next };
}

function consumeList(lines: string[], start: number, mode: MarkupMode): Consumed {
  const ordered = isOrderedListItem(lines[start]);
  const items: { marker: string; text: string }[] = [];

  let next = start;
  while (next < lines.length) {
    const item = parseListItem(lines[next]);
    if (!item || item.ordered !== ordered) break;
    items.push({ marker: item.marker, text: item.text.replace(/\s+/g, ' ').trim() });
    next++;
  }

  if (mode === 'markdown') {
    return {
      output: items.map(item => `${item.marker} ${renderMarkup(item.text, mode)}`).join('\n'),
      next,
    };
  }

  const tag = ordered ? 'ol' : 'ul';
  return {
    output: [`<${tag}>`, ...items.map(item => `<li>${renderMarkup(item.text, mode)}</li>`), `</${tag}>`].join('\n'),
    next,
  };
}

function consumeParagraph(lines: string[], start: number, mode: MarkupMode): Consumed {
  const text = renderMarkup(lines[start].trim(), mode);
  return {
    output: mode === 'html' ? `<p>${text}</p>` : text,
    next: start + 1,
  };
}

/**
 * Render content lines as HTML or Markdown. Never throws.
 */
export function renderBlocks(lines: string[], mode: MarkupMode): string {
  const blocks: string[] = [];
  let cursor = 0;

  while (cursor < lines.length) {
    const line = lines[cursor];
    const kind = classifyLine(line);
    let consumed: Consumed;

    if (kind === 'blank') {
      cursor++;
      continue;
    } else if (kind === 'block-begin') {
      consumed = consumeFencedBlock(lines, cursor, mode);
    } else if (kind === 'table-row' || kind === 'table-separator') {
      consumed = consumeTable(lines, cursor, mode);
    } else if (kind === 'quote') {
      consumed = consumeQuote(lines, cursor, mode);
    } else if (kind === 'list-item' || (kind === 'headline' && isListItem(line))) {
      // Content holds no headlines: "* item" is a star bullet whose indent was trimmed
      consumed = consumeList(lines, cursor, mode);
    } else {
      consumed = consumeParagraph(lines, cursor, mode);
    }

    if (consumed.output) {
      blocks.push(consumed.output);
    }
    cursor = consumed.next;
  }

  return blocks.join(BLOCK_SEPARATORS[mode]);
}
