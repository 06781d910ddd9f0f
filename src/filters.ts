import type { Headline } from './types.js';

/**
 * Headline selection. Each criterion is optional and a missing one passes
 * everything through; the ones present compose by intersection.
 */
export interface FilterCriteria {
  /** Inclusive lower bound on level */
  minLevel?: number;
  /** Inclusive upper bound on level */
  maxLevel?: number;
  /** Matched against the (possibly rendered) title */
  title?: RegExp;
  /** Matched against the `custom_id` property */
  customId?: RegExp;
  /** Matched against any ancestor title */
  sectionTitle?: RegExp;
  /** Matched against the `custom_id` of any ancestor */
  sectionCustomId?: RegExp;
}

export function filterByLevel(headlines: Headline[], minLevel?: number, maxLevel?: number): Headline[] {
  return headlines.filter(h =>
    (minLevel === undefined || h.level >= minLevel) &&
    (maxLevel === undefined || h.level <= maxLevel)
  );
}

export function filterByTitle(headlines: Headline[], pattern?: RegExp): Headline[] {
  if (!pattern) return headlines;
  return headlines.filter(h => pattern.test(h.title));
}

export function filterByCustomId(headlines: Headline[], pattern?: RegExp): Headline[] {
  if (!pattern) return headlines;
  return headlines.filter(h => {
    const customId = h.properties['custom_id'];
    return customId !== undefined && pattern.test(customId);
  });
}

export function filterBySectionTitle(headlines: Headline[], pattern?: RegExp): Headline[] {
  if (!pattern) return headlines;
  // '' entries stand for skipped levels and never match
  return headlines.filter(h => h.path.some(title => title !== '' && pattern.test(title)));
}

/**
 * Resolve a section title to the custom id of the first headline in the
 * document carrying that title.
 *
 * Titles are not unique: when two sections share one, every path entry with
 * that title resolves to the first of them.
 */
export function resolveSectionCustomId(document: Headline[], sectionTitle: string): string | undefined {
  const section = document.find(h => h.rawTitle === sectionTitle);
  return section?.properties['custom_id'];
}

export function filterBySectionCustomId(
  headlines: Headline[],
  document: Headline[],
  pattern?: RegExp
): Headline[] {
  if (!pattern) return headlines;
  return headlines.filter(h => h.path.some(title => {
    if (title === '') return false;
    const customId = resolveSectionCustomId(document, title);
    return customId !== undefined && pattern.test(customId);
  }));
}

/**
 * Apply every criterion: level, title, custom id, section title, section
 * custom id. Section custom ids are looked up in the full document.
 */
export function filterHeadlines(headlines: Headline[], criteria: FilterCriteria): Headline[] {
  let result = filterByLevel(headlines, criteria.minLevel, criteria.maxLevel);
  result = filterByTitle(result, criteria.title);
  result = filterByCustomId(result, criteria.customId);
  result = filterBySectionTitle(result, criteria.sectionTitle);
  result = filterBySectionCustomId(result, headlines, criteria.sectionCustomId);
  return result;
}
