import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import { INITIAL_CONTEXT, parseOutline, splitLines, step, updatePathStack } from '../parser.js';

const { describe, it } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

const sample = fs.readFileSync(path.join(__dirname, 'fixtures', 'sample.org'), 'utf-8');

describe('parseOutline', () => {

  it('should produce one record per headline line', () => {
    const { headlines, warnings } = parseOutline(sample);

    const headlineLines = sample.split('\n').filter(line => /^\*+\s/.test(line));
    assert.strictEqual(headlines.length, headlineLines.length);
    assert.deepStrictEqual(headlines.map(h => h.title), [
      'Projects',
      'Website redesign',
      'Garden',
      'Reading',
      'Deep note',
      'Fiction',
    ]);
    assert.deepStrictEqual(warnings, []);
  });

  it('should keep level equal to path length plus one across level jumps', () => {
    const { headlines } = parseOutline(sample);

    for (const headline of headlines) {
      assert.strictEqual(headline.level, headline.path.length + 1, headline.title);
    }
    const deep = headlines[4];
    assert.strictEqual(deep.level, 4);
    assert.deepStrictEqual(deep.path, ['Reading', '', '']);
    assert.deepStrictEqual(headlines[5].path, ['Reading']);
  });

  it('should collect properties with lower-cased keys and drop blank values', () => {
    const { headlines } = parseOutline(sample);

    assert.deepStrictEqual(headlines[0].properties, { custom_id: 'projects' });
    assert.deepStrictEqual(headlines[1].properties, { custom_id: 'website', status: 'active' });
    assert.deepStrictEqual(headlines[2].properties, {});
  });

  it('should drop blank, comment and keyword lines from content', () => {
    const { headlines } = parseOutline(sample);

    assert.deepStrictEqual(headlines[0].content, ['Active work lives here.']);
    assert.deepStrictEqual(headlines[3].content, []);
  });

  it('should trim fenced block lines and drop blank and comment lines in plain mode', () => {
    const { headlines } = parseOutline(sample);

    assert.deepStrictEqual(headlines[5].content, [
      '#+BEGIN_SRC python',
      'print("hi")',
      '#+END_SRC',
    ]);
  });

  it('should clean indented and blank block lines in plain mode', () => {
    const { headlines } = parseOutline('* A\n#+BEGIN_SRC python\n  x = 1\n\n# note\n#+END_SRC\n');
    assert.deepStrictEqual(headlines[0].content, ['#+BEGIN_SRC python', 'x = 1', '#+END_SRC']);
  });

  it('should keep property-shaped lines outside a drawer as content', () => {
    const { headlines } = parseOutline('* A\n:ID: 42\nsome text\n');

    assert.deepStrictEqual(headlines[0].content, [':ID: 42', 'some text']);
    assert.deepStrictEqual(headlines[0].properties, {});
  });

  it('should read properties written without a space after the key', () => {
    const { headlines } = parseOutline('* A\n:PROPERTIES:\n:ID:abc\n:END:\n');
    assert.deepStrictEqual(headlines[0].properties, { id: 'abc' });
  });

  it('should record source line ranges', () => {
    const { headlines } = parseOutline(sample);

    assert.deepStrictEqual(headlines.map(h => h.source), [
      { startLine: 4, endLine: 10 },
      { startLine: 11, endLine: 17 },
      { startLine: 18, endLine: 19 },
      { startLine: 20, endLine: 20 },
      { startLine: 21, endLine: 24 },
      { startLine: 25, endLine: 29 },
    ]);
  });

  it('should ignore text before the first headline', () => {
    const { headlines } = parseOutline('#+TITLE: x\nintro\n');
    assert.deepStrictEqual(headlines, []);
  });

  it('should return nothing for an empty document', () => {
    assert.deepStrictEqual(parseOutline(''), { headlines: [], warnings: [] });
  });

  it('should trim indented content lines', () => {
    const { headlines } = parseOutline('* A\n   indented text  \n');
    assert.deepStrictEqual(headlines[0].content, ['indented text']);
  });

  it('should drop stray drawer and block terminators', () => {
    const { headlines } = parseOutline('* A\n:END:\n#+END_SRC\n#+CAPTION: x\ntext\n');
    assert.deepStrictEqual(headlines[0].content, ['text']);
  });

  it('should accept lower-case drawers and ignore foreign lines inside them', () => {
    const text = '* A\n:properties:\n:Id: 1\nnot a property\n:ID: 2\n:end:\nbody\n';
    const { headlines } = parseOutline(text);

    assert.deepStrictEqual(headlines[0].properties, { id: '2' });
    assert.deepStrictEqual(headlines[0].content, ['body']);
  });

  it('should handle CRLF line endings', () => {
    const { headlines } = parseOutline('* A\r\nText\r\n** B\r\n');
    assert.deepStrictEqual(headlines[0].content, ['Text']);
    assert.deepStrictEqual(headlines[1].path, ['A']);
  });
});

describe('parseOutline fallbacks', () => {

  it('should close an unterminated drawer at the next headline', () => {
    const { headlines, warnings } = parseOutline('* A\n:PROPERTIES:\n:ID: 1\n* B\ntext\n');

    assert.deepStrictEqual(headlines[0].properties, { id: '1' });
    assert.deepStrictEqual(headlines[1].content, ['text']);
    assert.deepStrictEqual(warnings, ['Unterminated property drawer in "A" (opened at line 2)']);
  });

  it('should close an unterminated block at the next headline', () => {
    const { headlines, warnings } = parseOutline('* A\n#+BEGIN_SRC\ncode\n* B\n');

    assert.deepStrictEqual(headlines[0].content, ['#+BEGIN_SRC', 'code']);
    assert.strictEqual(headlines.length, 2);
    assert.deepStrictEqual(warnings, ['Unterminated block in "A" (opened at line 2)']);
  });

  it('should warn about a block left open at end of input', () => {
    const { headlines, warnings } = parseOutline('* A\n#+BEGIN_EXAMPLE\nx\n');

    assert.deepStrictEqual(headlines[0].source, { startLine: 1, endLine: 3 });
    assert.deepStrictEqual(warnings, ['Unterminated block in "A" (opened at line 2)']);
  });
});

describe('parseOutline render modes', () => {

  it('should render titles but keep raw titles and paths', () => {
    const { headlines } = parseOutline('* *Bold* title\n** Child\n', { mode: 'html' });

    assert.strictEqual(headlines[0].title, '<strong>Bold</strong> title');
    assert.strictEqual(headlines[0].rawTitle, '*Bold* title');
    assert.deepStrictEqual(headlines[1].path, ['*Bold* title']);
  });

  it('should render list content to Markdown', () => {
    const { headlines } = parseOutline(sample, { mode: 'markdown' });

    assert.deepStrictEqual(headlines[1].content, [
      '- Draft the **layout**',
      '- Review with [the team](https://example.test)',
    ]);
  });

  it('should render paragraphs and tables to HTML', () => {
    const { headlines } = parseOutline(sample, { mode: 'html' });

    assert.deepStrictEqual(headlines[2].content, ['<p>Plant the <em>tomatoes</em> early.</p>']);
    assert.deepStrictEqual(headlines[4].content, [
      '<table>',
      '<thead>',
      '<tr><th>Book</th><th>Pages</th></tr>',
      '</thead>',
      '<tbody>',
      '<tr><td>Dune</td><td>412</td></tr>',
      '</tbody>',
      '</table>',
    ]);
    assert.deepStrictEqual(headlines[3].content, []);
  });

  it('should hand verbatim block lines to the renderer', () => {
    const { headlines } = parseOutline('* A\n#+BEGIN_SRC python\n  x = 1\n\n# note\n#+END_SRC\n', { mode: 'markdown' });
    assert.deepStrictEqual(headlines[0].content, ['```python', '  x = 1', '', '# note', '```']);
  });

  it('should render source blocks as fenced code in Markdown', () => {
    const { headlines } = parseOutline(sample, { mode: 'markdown' });

    assert.deepStrictEqual(headlines[5].content, [
      '```python',
      '# kept inside the block',
      'print("hi")',
      '```',
    ]);
  });
});

describe('step', () => {

  it('should not modify the context it is given', () => {
    const result = step(INITIAL_CONTEXT, '* X', 1);

    assert.strictEqual(INITIAL_CONTEXT.state.kind, 'no-open-headline');
    assert.deepStrictEqual(INITIAL_CONTEXT.pathStack, []);
    assert.strictEqual(result.state.kind, 'headline-open');
    assert.deepStrictEqual(result.pathStack, ['X']);
    assert.strictEqual(result.finalized, undefined);
  });

  it('should finalize the open headline when the next one starts', () => {
    const first = step(INITIAL_CONTEXT, '* X', 1);
    const second = step(first, 'body', 2);
    const third = step(second, '* Y', 3);

    assert.strictEqual(third.finalized?.title, 'X');
    assert.deepStrictEqual(third.finalized?.content, ['body']);
    assert.deepStrictEqual(third.finalized?.source, { startLine: 1, endLine: 2 });
  });
});

describe('updatePathStack', () => {

  it('should push deeper levels and pad skipped ones', () => {
    assert.deepStrictEqual(updatePathStack([], 1, 'A'), ['A']);
    assert.deepStrictEqual(updatePathStack(['A'], 2, 'B'), ['A', 'B']);
    assert.deepStrictEqual(updatePathStack(['A'], 3, 'C'), ['A', '', 'C']);
  });

  it('should truncate on same or shallower levels', () => {
    assert.deepStrictEqual(updatePathStack(['A', 'B', 'C'], 2, 'X'), ['A', 'X']);
    assert.deepStrictEqual(updatePathStack(['A', 'B'], 2, 'C'), ['A', 'C']);
  });
});

describe('splitLines', () => {

  it('should drop only the final empty line', () => {
    assert.deepStrictEqual(splitLines('a\n\nb\n'), ['a', '', 'b']);
    assert.deepStrictEqual(splitLines(''), []);
  });
});
