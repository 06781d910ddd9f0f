import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  filterByLevel,
  filterBySectionTitle,
  filterHeadlines,
  resolveSectionCustomId,
} from '../filters.js';
import { parseOutline } from '../parser.js';
import type { Headline } from '../types.js';

const { describe, it } = test;

const DOCUMENT = `* Intro
:PROPERTIES:
:CUSTOM_ID: intro
:END:
** Setup
:PROPERTIES:
:CUSTOM_ID: setup-1
:END:
*** Install
* Chapter
:PROPERTIES:
:CUSTOM_ID: chapter2
:END:
** Setup
*** Configure
`;

const headlines = parseOutline(DOCUMENT).headlines;

function titlesWithPaths(result: Headline[]): string[] {
  return result.map(h => [...h.path, h.title].join(' / '));
}

describe('filterByLevel', () => {

  it('should keep levels inside the inclusive bounds', () => {
    assert.deepStrictEqual(titlesWithPaths(filterByLevel(headlines, 2, 2)), [
      'Intro / Setup',
      'Chapter / Setup',
    ]);
  });

  it('should pass everything through without bounds', () => {
    assert.strictEqual(filterByLevel(headlines).length, 6);
  });
});

describe('filterHeadlines', () => {

  it('should return every headline for empty criteria', () => {
    assert.deepStrictEqual(filterHeadlines(headlines, {}), headlines);
  });

  it('should filter by title', () => {
    assert.deepStrictEqual(titlesWithPaths(filterHeadlines(headlines, { title: /^Set/ })), [
      'Intro / Setup',
      'Chapter / Setup',
    ]);
  });

  it('should filter by custom id and skip headlines without one', () => {
    assert.deepStrictEqual(titlesWithPaths(filterHeadlines(headlines, { customId: /^setup/ })), [
      'Intro / Setup',
    ]);
  });

  it('should filter by ancestor title', () => {
    assert.deepStrictEqual(titlesWithPaths(filterHeadlines(headlines, { sectionTitle: /^Chapter$/ })), [
      'Chapter / Setup',
      'Chapter / Setup / Configure',
    ]);
  });

  it('should filter by ancestor custom id', () => {
    assert.deepStrictEqual(titlesWithPaths(filterHeadlines(headlines, { sectionCustomId: /^chapter/ })), [
      'Chapter / Setup',
      'Chapter / Setup / Configure',
    ]);
  });

  it('should resolve repeated section titles to the first match', () => {
    // Both "Setup" sections resolve to the custom id of the first one
    assert.deepStrictEqual(titlesWithPaths(filterHeadlines(headlines, { sectionCustomId: /^setup-1$/ })), [
      'Intro / Setup / Install',
      'Chapter / Setup / Configure',
    ]);
  });

  it('should compose criteria by intersection', () => {
    const result = filterHeadlines(headlines, { minLevel: 3, sectionTitle: /Intro/ });
    assert.deepStrictEqual(titlesWithPaths(result), ['Intro / Setup / Install']);
  });

  it('should look up section custom ids in the unfiltered document', () => {
    const result = filterHeadlines(headlines, { minLevel: 3, maxLevel: 3, sectionCustomId: /^chapter2$/ });
    assert.deepStrictEqual(titlesWithPaths(result), ['Chapter / Setup / Configure']);
  });
});

describe('filterBySectionTitle', () => {

  it('should ignore placeholders for skipped levels', () => {
    const jumped = parseOutline('* A\n*** C\n').headlines;

    assert.deepStrictEqual(filterBySectionTitle(jumped, /^$/), []);
    assert.deepStrictEqual(filterBySectionTitle(jumped, /.*/).map(h => h.title), ['C']);
  });
});

describe('resolveSectionCustomId', () => {

  it('should return the custom id of the first headline with the title', () => {
    assert.strictEqual(resolveSectionCustomId(headlines, 'Setup'), 'setup-1');
    assert.strictEqual(resolveSectionCustomId(headlines, 'Chapter'), 'chapter2');
    assert.strictEqual(resolveSectionCustomId(headlines, 'Missing'), undefined);
  });
});
