import { stringify } from 'yaml';
import type { OutputFormat } from './config.js';
import type { Headline } from './types.js';

/**
 * Headline record as written to output files.
 */
export interface OutputRecord {
  level?: number;
  title: string;
  content: string[];
  properties: Record<string, string>;
  path: string[];
}

export interface OutputOptions {
  /** Keep the `level` field (dropped by default) */
  includeLevel?: boolean;
}

export function prepareForOutput(headlines: Headline[], options: OutputOptions = {}): OutputRecord[] {
  return headlines.map(h => {
    const record: OutputRecord = {
      title: h.title,
      content: h.content,
      properties: h.properties,
      path: h.path,
    };
    return options.includeLevel ? { level: h.level, ...record } : record;
  });
}

export function serialize(records: OutputRecord[], format: OutputFormat): string {
  if (format === 'yaml') {
    return stringify(records);
  }
  return `${JSON.stringify(records, null, 2)}\n`;
}

/**
 * `notes.org` -> `notes.json`; other names get the extension appended.
 */
export function outputPathFor(inputPath: string, format: OutputFormat): string {
  if (/\.org$/i.test(inputPath)) {
    return inputPath.replace(/\.org$/i, `.${format}`);
  }
  return `${inputPath}.${format}`;
}
