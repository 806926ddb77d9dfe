import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { build } from '../indexer/index.js';
import { NavigationSession, canonicalArguments, parseNavigationCall, truncateContent } from '../tools/index.js';
import { InvalidArgumentError } from '../errors.js';
import type { Index } from '../indexer/types.js';
import { createProject, type TempProject } from './helpers.js';

const LIMITS = { maxReadBytes: 20, maxSearchResults: 100 };

describe('NavigationSession', () => {
  let project: TempProject;
  let index: Index;

  beforeAll(async () => {
    project = await createProject({
      'src/service.py': 'class UserService:\n    def load(self):\n        return 1\n',
      'src/api.py': 'from .service import UserService\n\nsvc = UserService()\n',
      'src/other.py': '# mentions UserServiceFactory only\n',
      'docs/notes.md': 'UserService notes\n',
      'big.txt': 'x'.repeat(50),
    });
    ({ index } = await build(project.root));
  });

  afterAll(async () => {
    await project.cleanup();
  });

  it('reads files and truncates past the byte ceiling', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('read_file', { path: 'big.txt' });
    expect(result.ok).toBe(true);
    expect(result.output).toBe(`${'x'.repeat(20)}\n[truncated: showing 20 of 50 bytes]`);
  });

  it('refuses paths outside the project', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('read_file', { path: '../../etc/passwd' });
    expect(result.ok).toBe(false);
    expect(result.error?.code).toBe('OutsideSandbox');
    expect(result.output.startsWith('Error (OutsideSandbox): ')).toBe(true);
  });

  it('reports unknown operations as invalid arguments', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('delete_file', { path: 'big.txt' });
    expect(result.ok).toBe(false);
    expect(result.error?.code).toBe('InvalidArgument');
    expect(session.getTrace()).toEqual([]);
  });

  it('finds symbol definitions with their parent', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('search_symbol', { name: 'load' });
    expect(result.data).toEqual([{ name: 'load', kind: 'method', file: 'src/service.py', line: 2, parent: 'UserService' }]);
  });

  it('finds usages with importers first and definitions left out', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('find_usages', { name: 'UserService' });
    expect(result.data).toEqual([
      { file: 'src/api.py', line: 1, text: 'from .service import UserService' },
      { file: 'src/api.py', line: 3, text: 'svc = UserService()' },
      { file: 'docs/notes.md', line: 1, text: 'UserService notes' },
    ]);
  });

  it('returns no usages for a name the project does not define', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('find_usages', { name: 'notDefinedAnywhere' });
    expect(result.ok).toBe(true);
    expect(result.output).toBe('[]');
  });

  it('lists imports with resolved targets', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('get_imports', { path: 'src/api.py' });
    expect(result.data).toEqual([{ specifier: '.service', resolved: 'src/service.py' }]);
    const missing = await session.execute('get_imports', { path: 'docs/missing.md' });
    expect(missing.error?.code).toBe('NotFound');
  });

  it('searches text within a glob or directory scope', async () => {
    const session = new NavigationSession(index, LIMITS);
    const expected = [{ file: 'src/service.py', line: 3, text: 'return 1' }];
    expect((await session.execute('search_text', { pattern: 'return', scope: '*.py' })).data).toEqual(expected);
    expect((await session.execute('search_text', { pattern: 'return', scope: 'src' })).data).toEqual(expected);
    expect((await session.execute('search_text', { pattern: 'return', scope: 'docs' })).data).toEqual([]);
  });

  it('rejects an invalid regular expression', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('search_text', { pattern: '(' });
    expect(result.error?.code).toBe('InvalidArgument');
  });

  it('serves repeated calls from the cache and traces them', async () => {
    const session = new NavigationSession(index, LIMITS);
    const first = await session.execute('search_symbol', { name: 'UserService' });
    const second = await session.execute('search_symbol', { name: 'UserService' });
    expect(second.output).toBe(first.output);
    expect(session.getTrace().map(entry => entry.reason)).toEqual(['fresh', 'cached']);
    expect(session.summary().cachedCalls).toBe(1);
  });

  it('tracks distinct files read', async () => {
    const session = new NavigationSession(index, LIMITS);
    expect(await session.wouldReadNewFile('read_file', { path: 'big.txt' })).toBe(true);
    await session.execute('read_file', { path: 'big.txt' });
    expect(await session.wouldReadNewFile('read_file', { path: './big.txt' })).toBe(false);
    expect(await session.wouldReadNewFile('search_symbol', { name: 'x' })).toBe(false);
    expect(await session.wouldReadNewFile('read_file', { path: 'src/missing.py' })).toBe(false);
    expect(await session.wouldReadNewFile('read_file', { path: 'docs' })).toBe(false);
    expect(session.getFilesRead()).toEqual(['big.txt']);
  });

  it('renders the file tree', async () => {
    const session = new NavigationSession(index, LIMITS);
    const result = await session.execute('get_file_tree', {});
    expect(result.output.split('\n').slice(1)).toEqual([
      '├── docs/',
      '│   └── notes.md',
      '├── src/',
      '│   ├── api.py',
      '│   ├── other.py',
      '│   └── service.py',
      '└── big.txt',
    ]);
  });
});

describe('navigation arguments', () => {
  it('rejects blank paths', () => {
    expect(() => parseNavigationCall('read_file', { path: '  ' })).toThrow(InvalidArgumentError);
  });

  it('drops an empty search scope', () => {
    expect(parseNavigationCall('search_text', { pattern: 'x', scope: null })).toEqual({ op: 'search_text', args: { pattern: 'x' } });
  });

  it('serializes arguments with sorted keys', () => {
    expect(canonicalArguments({ b: 1, a: 2, c: undefined })).toBe('{"a":2,"b":1}');
  });

  it('leaves content under the ceiling untouched', () => {
    expect(truncateContent('short', 10)).toEqual({ content: 'short', truncated: false, totalBytes: 5 });
  });
});
