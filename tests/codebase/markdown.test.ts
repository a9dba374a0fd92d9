import { describe, it, expect } from '@jest/globals';
import { analyzeMarkdownFile, analyzeMarkdownLines } from '../../src/codebase/analyzers/markdown.js';

const FENCE = '```';

const README = [
  '# Title',
  'Some [link](http://a.example) and ![img](pic.png).',
  '',
  '## Section',
  '| a | b |',
  '|---|---|',
  '| 1 | 2 |',
  '',
  `${FENCE}js`,
  '// [not a link](x)',
  '# not a heading',
  FENCE,
  '### Sub',
];

describe('Markdown analyzer', () => {
  it('should count markdown constructs outside code fences', () => {
    expect(analyzeMarkdownLines(README)).toEqual({
      kind: 'markdown',
      headingsByLevel: { 1: 1, 2: 1, 3: 1, 4: 0, 5: 0, 6: 0 },
      headingCount: 3,
      linkCount: 1,
      imageCount: 1,
      codeBlockCount: 1,
      tableCount: 1,
    });
  });

  it('should report markdown files without comments', () => {
    const stats = analyzeMarkdownFile('README.md', {
      text: README.join('\n'),
      lines: README,
      encoding: 'utf-8',
    });
    expect(stats.language).toBe('Markdown');
    expect(stats.totalLines).toBe(13);
    expect(stats.blankLines).toBe(2);
    expect(stats.commentLines).toBe(0);
    expect(stats.codeLines).toBe(11);
  });

  it('should require a space after heading hashes', () => {
    const meta = analyzeMarkdownLines(['#hashtag', '####### seven', '###### six']);
    expect(meta.headingCount).toBe(1);
    expect(meta.headingsByLevel[6]).toBe(1);
  });

  it('should count several links and images on one line', () => {
    const meta = analyzeMarkdownLines(['[a](1) [b](2) ![c](3) ![d](4) ![e](5)']);
    expect(meta.linkCount).toBe(2);
    expect(meta.imageCount).toBe(3);
  });

  it('should count an unterminated fence once and skip the rest', () => {
    const meta = analyzeMarkdownLines([FENCE, '# hidden', '[x](y)']);
    expect(meta.codeBlockCount).toBe(1);
    expect(meta.headingCount).toBe(0);
    expect(meta.linkCount).toBe(0);
  });

  it('should need a divider row right after a table header', () => {
    expect(analyzeMarkdownLines(['| a | b |', '', '|---|---|']).tableCount).toBe(0);
    expect(analyzeMarkdownLines(['a | b', ':--- | ---:']).tableCount).toBe(1);
  });
});
