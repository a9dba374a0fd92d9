import { describe, it, expect } from '@jest/globals';
import {
  analyzeGenericFile,
  countBlankLines,
  countCommentLines,
} from '../../src/codebase/analyzers/line-classifier.js';
import { createLanguageRegistry } from '../../src/codebase/languages/registry.js';

describe('Line classifier', () => {
  const registry = createLanguageRegistry();
  const cStyle = registry.commentSyntax('C');

  it('should classify a hash-comment file', () => {
    const stats = analyzeGenericFile('script.rb', 'Ruby', ['# a', '', 'x = 1'], registry);
    expect(stats.totalLines).toBe(3);
    expect(stats.blankLines).toBe(1);
    expect(stats.commentLines).toBe(1);
    expect(stats.codeLines).toBe(1);
  });

  it('should count every line of a multi-line comment', () => {
    const stats = analyzeGenericFile('main.c', 'C', ['/* start', 'still comment */', 'int x;'], registry);
    expect(stats.totalLines).toBe(3);
    expect(stats.blankLines).toBe(0);
    expect(stats.commentLines).toBe(2);
    expect(stats.codeLines).toBe(1);
  });

  it('should count a same-line comment once', () => {
    const stats = analyzeGenericFile('main.c', 'C', ['/* one line */', 'code();'], registry);
    expect(stats.commentLines).toBe(1);
    expect(stats.codeLines).toBe(1);
  });

  it('should run an unterminated comment to the end of the file', () => {
    expect(countCommentLines(['int a;', '/* open', 'x', '', 'y'], cStyle)).toBe(3);
  });

  it('should not nest comments', () => {
    expect(countCommentLines(['/* outer', '/* inner */', 'code();', '*/'], cStyle)).toBe(2);
  });

  it('should only test single-line markers at the start of a line', () => {
    expect(countCommentLines(['x = 1; // trailing', '  // indented'], cStyle)).toBe(1);
  });

  it('should leave blank lines inside comments to the blank count', () => {
    const lines = ['/*', '', '*/'];
    expect(countCommentLines(lines, cStyle)).toBe(2);
    expect(countBlankLines(lines)).toBe(1);
  });

  it('should never count comments for languages without markers', () => {
    const stats = analyzeGenericFile('data.json', 'JSON', ['{', '  // no', '}'], registry);
    expect(stats.commentLines).toBe(0);
    expect(stats.codeLines).toBe(3);
  });

  it('should handle markup comments', () => {
    const html = registry.commentSyntax('HTML');
    expect(countCommentLines(['<!-- a', 'b -->', '<p>hi</p>'], html)).toBe(2);
  });

  it('should be idempotent', () => {
    const lines = ['-- header', 'SELECT 1;', ''];
    const first = analyzeGenericFile('q.sql', 'SQL', lines, registry);
    const second = analyzeGenericFile('q.sql', 'SQL', lines, registry);
    expect(second).toEqual(first);
  });
});
