import { buildFileTree, renderFileTree } from '../indexer/file-tree.js';
import { normalizeChangedPath } from '../indexer/index.js';
import { testsFor } from '../indexer/test-mapper.js';
import { formatTimeAgo } from '../session/record.js';
import { navigationTools } from '../tools/index.js';
import type { Index } from '../indexer/types.js';
import type { ReviewMode } from './types.js';
import type { SymbolEntry } from '../parsers/base.js';

export const REVIEWER_SYSTEM_PROMPT = [
  'You are an expert code reviewer. The first message says how much to report under',
  '"Review Focus". Unless it says otherwise, concentrate on bugs and logic errors, missing or',
  'meaningless tests for functional changes, exploitable security problems and data-integrity',
  'risks with real consequences.',
  '',
  'You do not have the whole repository. Use the navigation tools to read the changed',
  'files, follow their symbols and usages, and check the tests that exercise them.',
  '',
  'For each issue write:',
  'FILE: path/to/file.ext',
  'LINE: <line number>',
  'ISSUE: <what is wrong>',
  'FIX: <specific change>',
].join('\n');

export const SUMMARIZE_PROMPT =
  'The exploration budget for this review is used up. Do not request more tools. '
  + 'Summarize what you have found so far in the usual issue format.';

const CRITICAL_ONLY = [
  'Report only issues that must be fixed before merging. Leave out everything else,',
  'including security hardening, style and refactoring ideas.',
];

const AI_GENERATED_FOCUS = [
  'The changes were written by an AI assistant. Look in particular for:',
  '- calls to functions, methods or modules that do not exist in this project',
  '- duplicated logic that an existing helper already covers',
  '- tests that assert nothing meaningful or only restate the implementation',
  '- inconsistent naming and conventions compared with the surrounding code',
  '- unnecessary complexity or speculative abstractions',
];

const PROTOTYPE_FOCUS = [
  'This is a prototype. Judge the changes at that scale:',
  '- report bugs that break the core functionality and data loss',
  '- skip missing tests, scalability, hardening and polish',
  '- keep the list short and concrete',
];

const REVIEW_FOCUS: Record<ReviewMode, string[]> = {
  default: CRITICAL_ONLY,
  full: [
    'Report all useful feedback, grouped by priority:',
    'HIGH (must fix): design-document violations, missing tests, exploitable security flaws,',
    'bugs, performance problems worth fixing, data-integrity risks.',
    'MEDIUM (should consider): maintainability, error handling for likely failures,',
    'documentation of complex logic.',
    'DEFER (note for later): security hardening, theoretical risks, style, minor optimizations,',
    'refactoring opportunities.',
    'Weigh each finding by the value of fixing it against the effort.',
  ],
  ai_generated: [...AI_GENERATED_FOCUS, '', ...CRITICAL_ONLY],
  prototype: PROTOTYPE_FOCUS,
  ai_prototype: [...PROTOTYPE_FOCUS, '', ...AI_GENERATED_FOCUS],
};

/** Longest file-tree listing placed in the seed; the engine can ask for the rest. */
const MAX_TREE_LINES = 300;

export interface ContinuationInfo {
  /** Iteration this review will become. */
  iteration: number;
  lastUpdated: string;
  lastIssuesCount: number | null;
}

export interface SeedInput {
  index: Index;
  changedFiles: string[];
  instructions?: string;
  diffs?: Record<string, string>;
  continuation?: ContinuationInfo;
  mode?: ReviewMode;
  designDoc?: string;
  story?: string;
  now?: Date;
}

/** Changed paths in project-relative form, deduplicated and sorted. */
export function normalizeChangedFiles(root: string, changedFiles: string[]): string[] {
  const paths = new Set<string>();
  for (const changed of changedFiles) {
    const path = normalizeChangedPath(root, changed);
    if (path !== null) paths.add(path);
  }
  return [...paths].sort();
}

function describeSymbol(symbol: SymbolEntry): string {
  const name = symbol.parent ? `${symbol.parent}.${symbol.name}` : symbol.name;
  return `${symbol.kind} ${name} (line ${symbol.line})`;
}

function treeSection(index: Index): string[] {
  const lines = renderFileTree(buildFileTree(index)).split('\n');
  if (lines.length <= MAX_TREE_LINES) return lines;
  return [
    ...lines.slice(0, MAX_TREE_LINES),
    `... ${lines.length - MAX_TREE_LINES} more entries (call get_file_tree for the full listing)`,
  ];
}

function symbolSection(index: Index, changed: string[]): string[] {
  const lines: string[] = [];
  for (const path of changed) {
    const entry = index.files[path];
    if (!entry) {
      lines.push(`${path}: not in the index (deleted or ignored)`);
      continue;
    }
    if (index.unparsed.includes(path)) {
      lines.push(`${path}: could not be parsed`);
      continue;
    }
    if (entry.symbols.length === 0) {
      lines.push(`${path}: no symbols`);
      continue;
    }
    lines.push(`${path}:`);
    for (const symbol of entry.symbols) lines.push(`  - ${describeSymbol(symbol)}`);
  }
  return lines;
}

function importSection(index: Index, changed: string[]): string[] {
  const lines: string[] = [];
  for (const path of changed) {
    const imports = index.files[path]?.imports ?? [];
    if (imports.length === 0) continue;
    lines.push(`${path}:`);
    for (const edge of imports) {
      lines.push(`  - ${edge.specifier}${edge.resolved ? ` -> ${edge.resolved}` : ' (external)'}`);
    }
  }
  return lines;
}

/**
 * First user message of a review: a map of the project around the changed
 * files, so the engine can start navigating without listing everything.
 */
export function buildSeed(input: SeedInput): string {
  const { index, changedFiles, continuation } = input;
  const parts: string[] = [];

  if (continuation) {
    parts.push(`Continuing review session (iteration ${continuation.iteration})`);
    parts.push(`Last reviewed: ${formatTimeAgo(continuation.lastUpdated, input.now)}`);
    if (continuation.lastIssuesCount) {
      parts.push(`The previous review reported ${continuation.lastIssuesCount} issues. Check what has changed since then.`);
    }
    parts.push('');
  }

  parts.push('## Changed Files');
  if (changedFiles.length === 0) {
    parts.push('(none supplied: review the project as a whole)');
  } else {
    for (const path of changedFiles) parts.push(`- ${path}`);
  }
  parts.push('');

  parts.push('## Project Structure', ...treeSection(index), '');

  if (changedFiles.length > 0) {
    parts.push('## Symbols in Changed Files', ...symbolSection(index, changedFiles), '');

    const imports = importSection(index, changedFiles);
    if (imports.length > 0) parts.push('## Imports of Changed Files', ...imports, '');

    const tests = testsFor(index.testMapping, changedFiles);
    parts.push('## Related Tests');
    if (tests.length === 0) {
      parts.push('(no test files map to the changed files)');
    } else {
      for (const test of tests) parts.push(`- ${test}`);
    }
    parts.push('');
  }

  const diffs = Object.entries(input.diffs ?? {}).sort(([a], [b]) => a.localeCompare(b));
  if (diffs.length > 0) {
    parts.push('## Diffs');
    for (const [path, diff] of diffs) {
      parts.push(`### ${path}`, '```diff', diff.trimEnd(), '```');
    }
    parts.push('');
  }

  if (input.designDoc?.trim()) {
    parts.push(
      '## Project Design Document (mandatory compliance)',
      input.designDoc.trim(),
      '',
      'Any violation of this document is a high-priority issue.',
      '',
    );
  }

  if (input.story?.trim()) {
    parts.push(
      '## Story/Change Context',
      input.story.trim(),
      '',
      'This describes what the changes are meant to do. Use it to tell intentional choices',
      'from real issues, and do not suggest changes that contradict the stated purpose.',
      '',
    );
  }

  parts.push('## Review Focus', ...REVIEW_FOCUS[input.mode ?? 'default'], '');

  if (input.instructions?.trim()) {
    parts.push('## Instructions', input.instructions.trim(), '');
  }

  parts.push('## Available Tools');
  for (const tool of navigationTools) {
    parts.push(`- ${tool.name}: ${tool.description.split('\n')[0]}`);
  }

  return parts.join('\n');
}
