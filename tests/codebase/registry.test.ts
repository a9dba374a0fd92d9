import { describe, it, expect } from '@jest/globals';
import {
  createLanguageRegistry,
  extensionOf,
  UNKNOWN_LANGUAGE,
} from '../../src/codebase/languages/registry.js';

describe('Language registry', () => {
  const registry = createLanguageRegistry();

  it('should map extensions case-insensitively', () => {
    expect(registry.languageForExtension('.ts')).toBe('TypeScript');
    expect(registry.languageForExtension('.PY')).toBe('Python');
    expect(registry.languageForFile('Main.JAVA')).toBe('Java');
    expect(registry.languageForExtension('.xyz')).toBe(UNKNOWN_LANGUAGE);
  });

  it('should map the web family and nothing beyond it', () => {
    for (const extension of ['.html', '.htm', '.css', '.scss', '.sass', '.less']) {
      expect(registry.languageForExtension(extension)).not.toBe(UNKNOWN_LANGUAGE);
    }
    expect(registry.languageForExtension('.vue')).toBe(UNKNOWN_LANGUAGE);
    expect(registry.languageForExtension('.svelte')).toBe(UNKNOWN_LANGUAGE);
  });

  it('should expose comment syntax per language', () => {
    expect(registry.commentSyntax('Go')).toEqual({
      singleLine: ['//'],
      multiLine: [{ start: '/*', end: '*/' }],
    });
    expect(registry.commentSyntax('SQL').singleLine).toEqual(['--']);
    expect(registry.commentSyntax('HTML').multiLine).toEqual([{ start: '<!--', end: '-->' }]);
    expect(registry.supportsSingleLine('Python')).toBe(true);
    expect(registry.supportsMultiLine('Python')).toBe(false);
    expect(registry.supportsSingleLine('CSS')).toBe(false);
  });

  it('should give unknown languages no comment markers', () => {
    expect(registry.commentSyntax(UNKNOWN_LANGUAGE)).toEqual({ singleLine: [], multiLine: [] });
    expect(registry.commentSyntax('JSON')).toEqual({ singleLine: [], multiLine: [] });
  });

  it('should list supported extensions sorted', () => {
    const extensions = registry.supportedExtensions();
    expect(extensions).toEqual([...extensions].sort());
    expect(extensions).toContain('.md');
    expect(extensions).toHaveLength(66);
  });

  it('should build isolated registries from custom tables', () => {
    const custom = createLanguageRegistry({ '.FOO': 'Foo' }, [
      { name: 'semicolon', languages: ['Foo'], singleLine: [';', ';'], multiLine: [] },
    ]);
    expect(custom.languageForExtension('.foo')).toBe('Foo');
    expect(custom.commentSyntax('Foo').singleLine).toEqual([';']);
    expect(custom.languageForExtension('.ts')).toBe(UNKNOWN_LANGUAGE);
    expect(Object.isFrozen(custom)).toBe(true);
  });

  it('should take the final extension only', () => {
    expect(extensionOf('archive.tar.GZ')).toBe('.gz');
    expect(extensionOf('.bashrc')).toBe('');
    expect(extensionOf('Makefile')).toBe('');
  });
});
