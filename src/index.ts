export type { Headline, HeadlineSource, MarkupMode, ParseResult, RenderMode } from './types.js';
export * from './classify.js';
export { extractLinks, renderMarkup } from './markup.js';
export type { Link } from './markup.js';
export { escapeHtml, renderBlocks, splitTableCells } from './blocks.js';
export {
  finalizeHeadline,
  finish,
  INITIAL_CONTEXT,
  parseOutline,
  splitLines,
  step,
  updatePathStack,
} from './parser.js';
export type { HeadlineDraft, ParseOptions, ParserContext, ParserState, StepResult } from './parser.js';
export { isContinuationLine, mergeLines, shouldMerge, unwrapText } from './unwrap.js';
export * from './filters.js';
export * from './output.js';
export * from './config.js';
export * from './errors.js';
