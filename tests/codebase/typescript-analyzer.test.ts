import { describe, it, expect } from '@jest/globals';
import { splitLines, SourceText } from '../../src/core/fileio.js';
import {
  analyzeScriptFile,
  countLineCommentsSimple,
  isScriptFile,
  scriptLanguage,
} from '../../src/codebase/analyzers/typescript.js';

function source(lines: string[]): SourceText {
  const text = lines.join('\n') + '\n';
  return { text, lines: splitLines(text, 'script'), encoding: 'utf-8' };
}

describe('TypeScript analyzer', () => {
  it('should recognise script files', () => {
    expect(isScriptFile('index.MTS')).toBe(true);
    expect(isScriptFile('style.css')).toBe(false);
    expect(scriptLanguage('app.jsx')).toBe('JavaScript');
    expect(scriptLanguage('lib.cts')).toBe('TypeScript');
  });

  it('should count structure and precise comment lines', () => {
    const stats = analyzeScriptFile(
      'module.ts',
      source([
        '/**',
        ' * Module doc.',
        ' */',
        '',
        "import x from 'y';",
        '// comment',
        'const url = "http://example.com"; // trailing',
        'class A {',
        '  method() {}',
        '}',
        'const f = () => 1;',
      ]),
    );

    expect(stats.language).toBe('TypeScript');
    expect(stats.totalLines).toBe(11);
    expect(stats.blankLines).toBe(1);
    expect(stats.commentLines).toBe(5);
    expect(stats.codeLines).toBe(5);
    expect(stats.metadata).toEqual({
      kind: 'script',
      hasModuleDoc: true,
      classCount: 1,
      functionCount: 2,
    });
  });

  it('should ignore comment markers inside strings, templates and regexes', () => {
    const stats = analyzeScriptFile(
      'literals.js',
      source(['const s = "// no";', 'const t = `/* no */`;', 'const r = /\\/\\/ x/;']),
    );
    expect(stats.commentLines).toBe(0);
    expect(stats.codeLines).toBe(3);
  });

  it('should count functions in every scope', () => {
    const stats = analyzeScriptFile(
      'nested.ts',
      source([
        'export function outer() {',
        '  function inner() {}',
        '  const handler = () => inner();',
        '  return [1].map((n) => n);',
        '}',
        'const Widget = class {',
        '  constructor() {}',
        '  get size() { return 1; }',
        '  set size(value: number) {}',
        '};',
        'const api = { load: function () {}, save: () => {} };',
      ]),
    );
    expect(stats.metadata).toEqual({
      kind: 'script',
      hasModuleDoc: false,
      classCount: 1,
      functionCount: 8,
    });
  });

  it('should treat a doc comment that documents the first statement as not a module doc', () => {
    const stats = analyzeScriptFile(
      'add.ts',
      source(['/** Adds numbers. */', 'export function add(a: number, b: number): number {', '  return a + b;', '}']),
    );
    expect(stats.metadata).toEqual({
      kind: 'script',
      hasModuleDoc: false,
      classCount: 0,
      functionCount: 1,
    });
    expect(stats.commentLines).toBe(1);
  });

  it('should accept a tagged module doc next to the first statement', () => {
    const stats = analyzeScriptFile(
      'tagged.ts',
      source(['/** @packageDocumentation Helpers. */', 'export const one = 1;']),
    );
    expect(stats.metadata?.kind === 'script' && stats.metadata.hasModuleDoc).toBe(true);
  });

  it('should count the shebang as a comment line', () => {
    const stats = analyzeScriptFile('cli.js', source(['#!/usr/bin/env node', "console.log('hi');"]));
    expect(stats.language).toBe('JavaScript');
    expect(stats.commentLines).toBe(1);
    expect(stats.codeLines).toBe(1);
  });

  it('should zero the structure but keep precise comments on syntax errors', () => {
    const stats = analyzeScriptFile('broken.ts', source(['// note', 'const a = ;', '/* block */']));
    expect(stats.metadata).toEqual({
      kind: 'script',
      hasModuleDoc: false,
      classCount: 0,
      functionCount: 0,
    });
    expect(stats.commentLines).toBe(2);
    expect(stats.codeLines).toBe(1);
  });

  it('should fall back to the line heuristic on lexical errors', () => {
    const stats = analyzeScriptFile(
      'unterminated.ts',
      source(['// header', 'const s = "oops', 'function f() {}']),
    );
    expect(stats.metadata).toEqual({
      kind: 'script',
      hasModuleDoc: false,
      classCount: 0,
      functionCount: 0,
    });
    expect(stats.commentLines).toBe(1);
    expect(stats.codeLines).toBe(2);
  });

  it('should not count JSX text as comments', () => {
    const stats = analyzeScriptFile(
      'App.tsx',
      source(['const App = () => (', '  <div>', '    // not a comment', '  </div>', ');']),
    );
    expect(stats.commentLines).toBe(0);
    expect(stats.metadata).toEqual({
      kind: 'script',
      hasModuleDoc: false,
      classCount: 0,
      functionCount: 1,
    });
  });

  it('should analyze empty files', () => {
    const stats = analyzeScriptFile('empty.ts', { text: '', lines: [], encoding: null });
    expect(stats.totalLines).toBe(0);
    expect(stats.codePercentage).toBe(0);
  });

  it('should count trimmed // lines in the simple heuristic', () => {
    expect(countLineCommentsSimple(['  // a', 'x // b', '//c'])).toBe(2);
  });
});
