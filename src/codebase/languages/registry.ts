/**
 * Language registry: file extension → language, language → comment syntax
 */

import * as path from 'path';
import languageData from './languages.json';

export const UNKNOWN_LANGUAGE = 'Unknown';

export interface MarkerPair {
  start: string;
  end: string;
}

export interface CommentSyntax {
  singleLine: readonly string[];
  multiLine: readonly MarkerPair[];
}

export interface CommentStyle extends CommentSyntax {
  name: string;
  languages: readonly string[];
}

export interface LanguageRegistry {
  languageForExtension(extension: string): string;
  languageForFile(fileName: string): string;
  commentSyntax(language: string): CommentSyntax;
  supportsSingleLine(language: string): boolean;
  supportsMultiLine(language: string): boolean;
  supportedExtensions(): string[];
}

interface LanguageData {
  extensions: Record<string, string>;
  commentStyles: Record<
    string,
    { languages: string[]; singleLine: string[]; multiLine: string[][] }
  >;
}

const data: LanguageData = languageData;

const NO_COMMENTS: CommentSyntax = Object.freeze({ singleLine: [], multiLine: [] });

export const LANGUAGE_MAP: Readonly<Record<string, string>> = Object.freeze({
  ...data.extensions,
});

function toMarkerPair(pair: readonly string[], styleName: string): MarkerPair {
  const [start, end] = pair;
  if (pair.length !== 2 || !start || !end) {
    throw new Error(`Invalid multi-line marker pair in comment style "${styleName}"`);
  }
  return { start, end };
}

export const COMMENT_STYLES: readonly CommentStyle[] = Object.entries(data.commentStyles).map(
  ([name, style]) => ({
    name,
    languages: style.languages,
    singleLine: style.singleLine,
    multiLine: style.multiLine.map((pair) => toMarkerPair(pair, name)),
  }),
);

/**
 * Lowercase final extension of a file name, dot included ("" when there is none).
 * Dotfiles such as ".bashrc" have no extension.
 */
export function extensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

/**
 * Build the registry. The language → syntax index is computed here once and
 * never changes afterwards, so one registry can be shared by every scan.
 */
export function createLanguageRegistry(
  extensions: Readonly<Record<string, string>> = LANGUAGE_MAP,
  styles: readonly CommentStyle[] = COMMENT_STYLES,
): LanguageRegistry {
  const byExtension = new Map<string, string>();
  for (const [extension, language] of Object.entries(extensions)) {
    byExtension.set(extension.toLowerCase(), language);
  }

  const byLanguage = new Map<string, CommentSyntax>();
  for (const style of styles) {
    const syntax: CommentSyntax = Object.freeze({
      singleLine: [...new Set(style.singleLine)],
      multiLine: style.multiLine.map((pair) => ({ ...pair })),
    });
    for (const language of style.languages) {
      byLanguage.set(language, syntax);
    }
  }

  const registry: LanguageRegistry = {
    languageForExtension(extension: string): string {
      return byExtension.get(extension.toLowerCase()) ?? UNKNOWN_LANGUAGE;
    },

    languageForFile(fileName: string): string {
      return registry.languageForExtension(extensionOf(fileName));
    },

    commentSyntax(language: string): CommentSyntax {
      return byLanguage.get(language) ?? NO_COMMENTS;
    },

    supportsSingleLine(language: string): boolean {
      return registry.commentSyntax(language).singleLine.length > 0;
    },

    supportsMultiLine(language: string): boolean {
      return registry.commentSyntax(language).multiLine.length > 0;
    },

    supportedExtensions(): string[] {
      return [...byExtension.keys()].sort();
    },
  };

  return Object.freeze(registry);
}
