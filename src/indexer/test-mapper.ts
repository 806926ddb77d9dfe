import { posix } from 'node:path';
import type { FileEntry } from './types.js';

const TEST_DIRECTORIES = new Set(['test', 'tests', '__tests__', 'spec', 'specs']);

/** `test_parser.py` → `parser`, `parser.test.ts` → `parser`, `ParserTests.cs` → `Parser` */
export function testSubjectStem(path: string): string | null {
  const base = posix.basename(path);
  const dot = base.indexOf('.');
  const stem = dot > 0 ? base.slice(0, dot) : base;
  const rest = dot > 0 ? base.slice(dot) : '';

  if (/^\.(test|spec)\./.test(rest)) return stem;
  if (stem.startsWith('test_')) return stem.slice('test_'.length);
  if (stem.endsWith('_test') || stem.endsWith('_spec')) return stem.slice(0, -'_test'.length);
  if (/^[A-Z]\w*Tests?$/.test(stem) && stem.length > 4) return stem.replace(/Tests?$/, '');
  return null;
}

export function isTestFile(path: string): boolean {
  if (testSubjectStem(path) !== null) return true;
  const segments = path.split('/').slice(0, -1);
  return segments.some(segment => TEST_DIRECTORIES.has(segment.toLowerCase()));
}

function sourceStem(path: string): string {
  const base = posix.basename(path);
  const dot = base.indexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

/**
 * Map each test file to the source files it most likely exercises: files
 * whose name matches the test's subject, plus non-test files the test
 * imports. Only parsed (language-bearing) files take part.
 */
export function buildTestMapping(files: Record<string, FileEntry>): Record<string, string[]> {
  const sources = new Map<string, string[]>();
  const tests: string[] = [];

  for (const [path, entry] of Object.entries(files)) {
    if (!entry.language) continue;
    if (isTestFile(path)) {
      tests.push(path);
    } else {
      const stem = sourceStem(path).toLowerCase();
      const bucket = sources.get(stem);
      if (bucket) bucket.push(path);
      else sources.set(stem, [path]);
    }
  }

  const mapping: Record<string, string[]> = {};
  for (const test of tests.sort()) {
    const targets = new Set<string>();
    const subject = testSubjectStem(test);
    if (subject) {
      for (const source of sources.get(subject.toLowerCase()) ?? []) {
        targets.add(source);
      }
    }
    for (const edge of files[test].imports) {
      if (edge.resolved && !isTestFile(edge.resolved)) {
        targets.add(edge.resolved);
      }
    }
    if (targets.size > 0) {
      mapping[test] = [...targets].sort();
    }
  }
  return mapping;
}

/** Test files mapped to any of the given source paths. */
export function testsFor(testMapping: Record<string, string[]>, sourcePaths: string[]): string[] {
  const wanted = new Set(sourcePaths);
  return Object.entries(testMapping)
    .filter(([, targets]) => targets.some(target => wanted.has(target)))
    .map(([test]) => test)
    .sort();
}
