import {
  classifyLine,
  headlineLevel,
  headlineTitle,
  isBlank,
  isBlockEnd,
  isComment,
  isHeadline,
  parsePropertyLine,
} from './classify.js';
import { renderBlocks } from './blocks.js';
import { renderMarkup } from './markup.js';
import type { Headline, ParseResult, RenderMode } from './types.js';

/**
 * Outline parser.
 *
 * One forward pass over the lines, driven by an explicit state machine:
 *
 *   no-open-headline --headline--> headline-open
 *   headline-open    --:PROPERTIES:--> inside-drawer --:END:--> headline-open
 *   headline-open    --#+BEGIN_x--> inside-block --#+END_x--> headline-open
 *   any state        --headline--> headline-open (previous headline finalized)
 *
 * `step` is a pure function of the current state and one line. The parser
 * owns the open draft and the section path stack; finalized headlines are
 * never touched again.
 */

export interface ParseOptions {
  /** Render titles and content (default: plain) */
  mode?: RenderMode;
}

/**
 * A headline that is still receiving lines.
 */
export interface HeadlineDraft {
  level: number;
  title: string;
  rawTitle: string;
  path: readonly string[];
  startLine: number;
  content: readonly string[];
  properties: ReadonlyMap<string, string>;
}

export type ParserState =
  | { kind: 'no-open-headline' }
  | { kind: 'headline-open'; draft: HeadlineDraft }
  | { kind: 'inside-drawer'; draft: HeadlineDraft; openedAt: number }
  | { kind: 'inside-block'; draft: HeadlineDraft; openedAt: number };

/**
 * Everything the parser carries between lines.
 */
export interface ParserContext {
  state: ParserState;
  /** Raw titles of the current chain, including the open headline */
  pathStack: readonly string[];
}

export interface StepResult extends ParserContext {
  /** Headline closed by this line */
  finalized?: Headline;
  /** Fallback that had to be applied */
  warning?: string;
}

export const INITIAL_CONTEXT: ParserContext = {
  state: { kind: 'no-open-headline' },
  pathStack: [],
};

/**
 * Apply a headline at `level` to the section path stack.
 *
 * Deeper levels pad skipped levels with '' so the stack length always equals
 * the level; same or shallower levels truncate to `level - 1` first.
 */
export function updatePathStack(stack: readonly string[], level: number, title: string): string[] {
  if (level > stack.length) {
    const padded = [...stack];
    while (padded.length < level - 1) {
      padded.push('');
    }
    padded.push(title);
    return padded;
  }
  return [...stack.slice(0, level - 1), title];
}

function renderTitle(rawTitle: string, mode: RenderMode): string {
  return mode === 'plain' ? rawTitle : renderMarkup(rawTitle, mode);
}

/**
 * Turn a draft into an immutable headline record.
 */
export function finalizeHeadline(draft: HeadlineDraft, endLine: number, mode: RenderMode): Headline {
  const properties: Record<string, string> = Object.fromEntries(
    [...draft.properties].filter(([, value]) => value.trim().length > 0)
  );

  let content: string[];
  if (mode === 'plain') {
    // Block lines are held verbatim for the renderers only
    content = draft.content.map(line => line.trim()).filter(line => !isBlank(line) && !isComment(line));
  } else {
    const rendered = renderBlocks([...draft.content], mode);
    content = rendered ? rendered.split('\n') : [];
  }

  return {
    level: draft.level,
    title: draft.title,
    rawTitle: draft.rawTitle,
    content,
    properties,
    path: [...draft.path],
    source: { startLine: draft.startLine, endLine },
  };
}

function unterminatedWarning(state: ParserState): string | undefined {
  if (state.kind === 'inside-drawer') {
    return `Unterminated property drawer in "${state.draft.rawTitle}" (opened at line ${state.openedAt})`;
  }
  if (state.kind === 'inside-block') {
    return `Unterminated block in "${state.draft.rawTitle}" (opened at line ${state.openedAt})`;
  }
  return undefined;
}

function openDraft(state: ParserState): HeadlineDraft | undefined {
  return state.kind === 'no-open-headline' ? undefined : state.draft;
}

function appendLine(draft: HeadlineDraft, line: string): HeadlineDraft {
  return { ...draft, content: [...draft.content, line] };
}

/**
 * Advance the parser by one line. `lineNumber` is 1-based.
 */
export function step(context: ParserContext, line: string, lineNumber: number, mode: RenderMode = 'plain'): StepResult {
  const { state, pathStack } = context;

  if (isHeadline(line)) {
    const previous = openDraft(state);
    const level = headlineLevel(line);
    const rawTitle = headlineTitle(line);
    const nextStack = updatePathStack(pathStack, level, rawTitle);
    const draft: HeadlineDraft = {
      level,
      title: renderTitle(rawTitle, mode),
      rawTitle,
      path: nextStack.slice(0, -1),
      startLine: lineNumber,
      content: [],
      properties: new Map(),
    };
    return {
      state: { kind: 'headline-open', draft },
      pathStack: nextStack,
      finalized: previous ? finalizeHeadline(previous, lineNumber - 1, mode) : undefined,
      warning: unterminatedWarning(state),
    };
  }

  switch (state.kind) {
    case 'no-open-headline':
      return { state, pathStack };

    case 'inside-drawer': {
      const kind = classifyLine(line, { inDrawer: true });
      if (kind === 'drawer-close') {
        return { state: { kind: 'headline-open', draft: state.draft }, pathStack };
      }
      const property = kind === 'property' ? parsePropertyLine(line) : null;
      if (!property) {
        // Drawers tolerate foreign lines
        return { state, pathStack };
      }
      const properties = new Map(state.draft.properties).set(property.key, property.value);
      return { state: { ...state, draft: { ...state.draft, properties } }, pathStack };
    }

    case 'inside-block': {
      if (isBlockEnd(line)) {
        return { state: { kind: 'headline-open', draft: appendLine(state.draft, line.trim()) }, pathStack };
      }
      return { state: { ...state, draft: appendLine(state.draft, line.trimEnd()) }, pathStack };
    }

    case 'headline-open': {
      const kind = classifyLine(line);
      switch (kind) {
        case 'drawer-open':
          return { state: { kind: 'inside-drawer', draft: state.draft, openedAt: lineNumber }, pathStack };
        case 'block-begin':
          return {
            state: { kind: 'inside-block', draft: appendLine(state.draft, line.trim()), openedAt: lineNumber },
            pathStack,
          };
        case 'blank':
        case 'comment':
        case 'keyword':
        case 'block-end':
        case 'drawer-close':
          return { state, pathStack };
        default:
          return { state: { kind: 'headline-open', draft: appendLine(state.draft, line.trim()) }, pathStack };
      }
    }
  }
}

/**
 * Close the pass at end of input.
 */
export function finish(context: ParserContext, lastLine: number, mode: RenderMode = 'plain'): Omit<StepResult, keyof ParserContext> {
  const draft = openDraft(context.state);
  return {
    finalized: draft ? finalizeHeadline(draft, lastLine, mode) : undefined,
    warning: unterminatedWarning(context.state),
  };
}

/**
 * Split text into lines, tolerating CRLF and a trailing newline.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parse an outline document into headline records.
 */
export function parseOutline(text: string, options: ParseOptions = {}): ParseResult {
  const mode = options.mode ?? 'plain';
  const lines = splitLines(text);
  const headlines: Headline[] = [];
  const warnings: string[] = [];

  let context: ParserContext = INITIAL_CONTEXT;
  for (let i = 0; i < lines.length; i++) {
    const result = step(context, lines[i], i + 1, mode);
    if (result.finalized) headlines.push(result.finalized);
    if (result.warning) warnings.push(result.warning);
    context = { state: result.state, pathStack: result.pathStack };
  }

  const last = finish(context, lines.length, mode);
  if (last.finalized) headlines.push(last.finalized);
  if (last.warning) warnings.push(last.warning);

  return { headlines, warnings };
}
