/**
 * Source location information for a headline.
 */
export interface HeadlineSource {
  /** Line number of the headline marker (1-based) */
  startLine: number;

  /** Last line belonging to the headline's section (1-based, inclusive) */
  endLine: number;
}

/**
 * One node of the outline, finalized by the parser.
 */
export interface Headline {
  /** Number of leading `*` markers */
  level: number;

  /** Title, rendered when a render mode is active */
  title: string;

  /** Title exactly as written, used for section lookups */
  rawTitle: string;

  /** Trimmed content lines, or the rendered output split into lines */
  content: string[];

  /** Property drawer entries; keys are lower-cased, blank values dropped */
  properties: Record<string, string>;

  /** Unrendered ancestor titles, root first. Skipped levels appear as '' */
  path: string[];

  /** Where the headline came from */
  source: HeadlineSource;
}

/**
 * How titles and content are emitted.
 */
export type RenderMode = 'plain' | 'html' | 'markdown';

/**
 * Render modes that actually transform markup.
 */
export type MarkupMode = Exclude<RenderMode, 'plain'>;

/**
 * Result of parsing an outline document.
 */
export interface ParseResult {
  /** Headlines in document order */
  headlines: Headline[];

  /** Structural problems that were resolved by a fallback */
  warnings: string[];
}
