import { analyzableExtensions } from '../analyzers/index.js';
import type { LanguageRegistry } from '../languages/registry.js';

const EXTENSION_GROUPS: ReadonlyArray<[string, readonly string[]]> = [
  ['TypeScript / JavaScript', ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs']],
  ['Python', ['.py', '.pyw', '.pyi']],
  ['Web', ['.html', '.htm', '.css', '.scss', '.sass', '.less']],
  ['C / C++', ['.c', '.h', '.cpp', '.cc', '.cxx', '.hpp', '.hh', '.hxx']],
  ['Java / JVM', ['.java', '.kt', '.kts', '.scala', '.groovy']],
  ['Markdown', ['.md', '.markdown']],
];

const COLUMNS = 6;

/** Supported extensions grouped by family, then the rest six to a row. */
export function renderExtensionList(registry: LanguageRegistry): string {
  const extensions = analyzableExtensions(registry);
  const grouped = new Set<string>();
  const lines = ['📋 Supported extensions', '═'.repeat(40)];

  for (const [group, members] of EXTENSION_GROUPS) {
    const matching = extensions.filter((extension) => members.includes(extension));
    if (matching.length === 0) continue;
    lines.push('', `${group}:`, `  ${matching.join(', ')}`);
    matching.forEach((extension) => grouped.add(extension));
  }

  const others = extensions.filter((extension) => !grouped.has(extension));
  if (others.length > 0) {
    lines.push('', 'Other languages:');
    for (let i = 0; i < others.length; i += COLUMNS) {
      lines.push(`  ${others.slice(i, i + COLUMNS).join(', ')}`);
    }
  }

  lines.push('', `Total: ${extensions.length} supported extensions`, '═'.repeat(40));
  return lines.join('\n');
}
