import { dependentsOf } from '../indexer/import-resolver.js';
import { scanLines } from './text-scan.js';
import type { LineMatch, ToolContext, ToolDefinition, ToolOutcome } from './types.js';

export const findUsagesDefinition: ToolDefinition = {
  name: 'find_usages',
  description: `Find where a symbol defined in the project is referenced.

Whole-word text matches, with files that import the defining module listed
first. Definition lines are left out (use search_symbol for those). Returns
{file, line, text} entries; an empty list when the name is not defined in the
project.`,
  inputSchema: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Symbol name to look for' },
    },
    required: ['name'],
  },
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Files to scan, most relevant first: importers of a defining file, then the
 * defining files themselves, then everything else. Sorted within each group.
 */
export function usageSearchOrder(context: ToolContext, definingFiles: string[]): string[] {
  const importers = new Set<string>();
  for (const file of definingFiles) {
    for (const dependent of dependentsOf(context.index, file)) importers.add(dependent);
  }
  const defining = new Set(definingFiles);

  const first = [...importers].filter(file => !defining.has(file)).sort();
  const second = [...defining].sort();
  const seen = new Set([...first, ...second]);
  const rest = Object.keys(context.index.files).filter(file => !seen.has(file));
  return [...first, ...second, ...rest];
}

export async function collectUsages(context: ToolContext, name: string): Promise<LineMatch[]> {
  const definitions = Object.hasOwn(context.index.symbols, name) ? context.index.symbols[name] : [];
  if (definitions.length === 0) return [];

  const definitionSites = new Set(definitions.map(entry => `${entry.file}:${entry.line}`));
  const pattern = new RegExp(`(?<![\\w$])${escapeRegExp(name)}(?![\\w$])`);
  const files = usageSearchOrder(context, [...new Set(definitions.map(entry => entry.file))]);

  return scanLines(context, files, pattern, match => !definitionSites.has(`${match.file}:${match.line}`));
}

export async function findUsages(context: ToolContext, args: { name: string }): Promise<ToolOutcome> {
  const usages = await collectUsages(context, args.name);
  return { output: JSON.stringify(usages, null, 2), data: usages };
}
