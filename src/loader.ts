import * as fs from 'node:fs';
import * as path from 'node:path';
import { isListItem } from './classify.js';
import { parseOutline } from './parser.js';
import type { Headline, ParseResult } from './types.js';

/**
 * Options for loading outline files
 */
export interface LoadOptions {
  /** Directory to scan for .org files */
  contentDir: string;
}

/**
 * Parse result for one document
 */
export interface DocumentParseResult extends ParseResult {
  /** The document filename */
  documentId: string;
}

/**
 * Result of loading all outline files
 */
export interface LoadResult {
  /** All parse results, ordered by document name */
  parseResults: DocumentParseResult[];
  /** Quick lookup of parse results by document ID */
  parseResultMap: Map<string, DocumentParseResult>;
  /** Raw content of all files */
  corpus: Map<string, string>;
  /** Any errors or parser warnings encountered during loading */
  errors: string[];
}

/**
 * Find all outline files in a directory (non-recursive)
 */
function findOrgFiles(dir: string, errors: string[]): string[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true })
      .filter(entry => entry.isFile() && entry.name.endsWith('.org'))
      .map(entry => path.join(dir, entry.name))
      .sort();
  } catch (err) {
    errors.push(`Failed to read directory ${dir}: ${err}`);
    return [];
  }
}

/**
 * Load and parse all outline files from a directory
 */
export function loadContent(options: LoadOptions): LoadResult {
  const { contentDir } = options;

  const parseResults: DocumentParseResult[] = [];
  const parseResultMap = new Map<string, DocumentParseResult>();
  const corpus = new Map<string, string>();
  const errors: string[] = [];

  for (const filePath of findOrgFiles(contentDir, errors)) {
    const documentId = path.basename(filePath);

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      corpus.set(documentId, content);

      const result: DocumentParseResult = { documentId, ...parseOutline(content) };
      parseResults.push(result);
      parseResultMap.set(documentId, result);

      for (const warning of result.warnings) {
        errors.push(`${documentId}: ${warning}`);
      }
    } catch (err) {
      errors.push(`Failed to read ${documentId}: ${err}`);
    }
  }

  return {
    parseResults,
    parseResultMap,
    corpus,
    errors
  };
}


/**
 * Text search options
 */
export interface SearchOptions {
  /** Maximum number of results to return */
  limit?: number;
}

/**
 * A search result with context
 */
export interface SearchResult {
  documentId: string;
  /** The headline containing the match */
  headline: Headline;
  /** The matching text snippet */
  snippet: string;
  /** Relevance score (lower = better match) */
  score: number;
  /** Where the match was found */
  matchType: 'title' | 'property' | 'list-item' | 'text';
}

function clip(text: string): string {
  return text.length > 100 ? `${text.slice(0, 100)}...` : text;
}

function matchHeadline(headline: Headline, queryLower: string): Omit<SearchResult, 'documentId' | 'headline'> | null {
  if (headline.rawTitle.toLowerCase().includes(queryLower)) {
    return { snippet: headline.rawTitle, score: 0, matchType: 'title' };
  }

  for (const [key, value] of Object.entries(headline.properties)) {
    if (key.includes(queryLower) || value.toLowerCase().includes(queryLower)) {
      return { snippet: clip(`${key}: ${value}`), score: 1, matchType: 'property' };
    }
  }

  for (const line of headline.content) {
    if (line.toLowerCase().includes(queryLower)) {
      const bullet = isListItem(line);
      return {
        snippet: clip(line),
        score: bullet ? 1 : 2,
        matchType: bullet ? 'list-item' : 'text'
      };
    }
  }

  return null;
}

/**
 * Search headlines across documents.
 * Results are sorted by: title matches, then properties and list items, then text
 */
export function searchHeadlines(
  query: string,
  parseResults: DocumentParseResult[],
  options: SearchOptions = {}
): SearchResult[] {
  const { limit } = options;
  const queryLower = query.toLowerCase();
  const results: SearchResult[] = [];

  for (const { documentId, headlines } of parseResults) {
    for (const headline of headlines) {
      const match = matchHeadline(headline, queryLower);
      if (match) {
        results.push({ documentId, headline, ...match });
      }
    }
  }

  // Stable sort: document order holds within a score
  results.sort((a, b) => a.score - b.score);

  if (limit && results.length > limit) {
    return results.slice(0, limit);
  }

  return results;
}
