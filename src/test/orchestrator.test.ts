import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EngineUnreachableError, NotFoundError, SessionBusyError } from '../errors.js';
import { build } from '../indexer/index.js';
import { SUMMARIZE_PROMPT, buildSeed, normalizeChangedFiles } from '../orchestrator/context.js';
import { ReviewOrchestrator, trimHistory } from '../orchestrator/loop.js';
import { RateLimiter } from '../ratelimit/rate-limiter.js';
import { RedisSessionStore } from '../session/redis-store.js';
import { SessionRegistry } from '../session/registry.js';
import { IndexCache } from '../service/index-cache.js';
import type { ChatMessage } from '../engine/types.js';
import type { Config } from '../config.js';
import { MemoryBackend, ScriptedEngine, answer, createProject, testConfig, toolCall, type TempProject } from './helpers.js';

const APP = 'def main():\n    return helper()\n\ndef helper():\n    return 1\n';

function orchestrator(engine: ScriptedEngine, config: Config = testConfig(), now?: () => number) {
  const store = new RedisSessionStore(new MemoryBackend(), 'test');
  const registry = new SessionRegistry(store, { lockWaitMs: 0, lockTtlMs: 60_000 });
  const indexes = new IndexCache(config);
  return {
    store,
    registry,
    indexes,
    review: new ReviewOrchestrator({
      engine,
      rateLimiter: new RateLimiter(config.rateLimits),
      registry,
      indexes,
      bounds: config.exploration,
      navigation: config.navigation,
      now,
    }),
  };
}

describe('ReviewOrchestrator', () => {
  let project: TempProject;

  beforeEach(async () => {
    project = await createProject({
      'src/app.py': APP,
      'tests/test_app.py': 'from src.app import main\n',
    });
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it('runs tool calls until the engine answers and persists the session', async () => {
    const engine = new ScriptedEngine([
      toolCall('c1', 'read_file', { path: 'src/app.py' }),
      answer('FILE: src/app.py\nLINE: 2\nISSUE: helper is defined after use\nFIX: move it'),
    ]);
    const { review, store } = orchestrator(engine);

    const result = await review.review({ projectRoot: project.root, changedFiles: ['src/app.py'] });

    expect(result.state).toBe('TERMINATED_NORMAL');
    expect(result.sessionName).toBe('default');
    expect(result.iteration).toBe(1);
    expect(result.continued).toBe(false);
    expect(result.answer).toBe('FILE: src/app.py\nLINE: 2\nISSUE: helper is defined after use\nFIX: move it');
    expect(result.trace).toEqual([{ tool: 'read_file', arguments: { path: 'src/app.py' }, resultSize: APP.length, reason: 'fresh' }]);
    expect(result.stats).toMatchObject({ toolCalls: 1, cachedCalls: 0, distinctFilesRead: 1, engineRequests: 2 });

    expect(engine.requests[0].toolChoice).toBe('auto');
    expect(engine.requests[0].tools.map(tool => tool.name)).toEqual([
      'read_file', 'search_symbol', 'find_usages', 'get_imports', 'get_file_tree', 'search_text',
    ]);
    const second = engine.requests[1].messages;
    expect(second.map(message => message.role)).toEqual(['system', 'user', 'assistant', 'tool']);
    expect(second[3]).toEqual({ role: 'tool', toolCallId: 'c1', name: 'read_file', content: APP });

    const saved = await store.load('default', project.root);
    expect(saved.iterationCount).toBe(1);
    expect(saved.lastIssuesCount).toBe(1);
    expect(saved.messageHistory).toHaveLength(4);
    expect(saved.navigationState).toEqual(result.trace);
    expect(saved.cumulativeTokenEstimate).toBe(result.stats.tokenEstimate);
  });

  it('stops dispatching at the tool-call bound and asks for a summary', async () => {
    const engine = new ScriptedEngine([
      toolCall('c1', 'read_file', { path: 'src/app.py' }),
      toolCall('c2', 'search_symbol', { name: 'main' }),
      toolCall('c3', 'get_file_tree', {}),
      toolCall('c4', 'find_usages', { name: 'helper' }),
      answer('Summary of findings'),
    ]);
    const config = testConfig({ exploration: { maxToolCalls: 3 } });
    const { review } = orchestrator(engine, config);

    const result = await review.review({ projectRoot: project.root });

    expect(result.state).toBe('TERMINATED_BOUND');
    expect(result.answer).toBe('Summary of findings');
    expect(result.stats.toolCalls).toBe(3);
    expect(result.stats.boundReason).toBe('maxToolCalls');
    expect(result.stats.engineRequests).toBe(5);
    expect(result.trace.map(entry => entry.tool)).toEqual(['read_file', 'search_symbol', 'get_file_tree']);

    const last = engine.requests[4];
    expect(last.toolChoice).toBe('none');
    const tail = last.messages.slice(-2);
    expect(tail[0]).toMatchObject({ role: 'tool', toolCallId: 'c4', name: 'find_usages' });
    expect(tail[0].content.startsWith('Not executed')).toBe(true);
    expect(tail[1]).toEqual({ role: 'user', content: SUMMARIZE_PROMPT });
  });

  it('stops before reading one file more than allowed', async () => {
    const engine = new ScriptedEngine([
      toolCall('c1', 'read_file', { path: 'src/app.py' }),
      toolCall('c2', 'read_file', { path: 'src/app.py' }),
      toolCall('c3', 'read_file', { path: 'tests/test_app.py' }),
      answer('done'),
    ]);
    const { review } = orchestrator(engine, testConfig({ exploration: { maxDistinctFiles: 1 } }));

    const result = await review.review({ projectRoot: project.root });

    expect(result.state).toBe('TERMINATED_BOUND');
    expect(result.stats).toMatchObject({ toolCalls: 2, cachedCalls: 1, distinctFilesRead: 1, boundReason: 'maxDistinctFiles' });
    expect(result.trace.map(entry => entry.reason)).toEqual(['fresh', 'cached']);
  });

  it('reports a missing file at the distinct-files bound instead of stopping', async () => {
    const engine = new ScriptedEngine([
      toolCall('c1', 'read_file', { path: 'src/app.py' }),
      toolCall('c2', 'read_file', { path: 'src/missing.py' }),
      answer('done'),
    ]);
    const { review } = orchestrator(engine, testConfig({ exploration: { maxDistinctFiles: 1 } }));

    const result = await review.review({ projectRoot: project.root });

    expect(result.state).toBe('TERMINATED_NORMAL');
    expect(result.stats).toMatchObject({ toolCalls: 2, distinctFilesRead: 1 });
    const reply = engine.requests[2].messages.at(-1);
    expect(reply).toMatchObject({ role: 'tool', toolCallId: 'c2' });
    expect(reply?.content.startsWith('Error (NotFound): ')).toBe(true);
  });

  it('stops once the review has run longer than allowed', async () => {
    let clock = 0;
    const engine = new ScriptedEngine([
      () => {
        clock += 5000;
        return toolCall('c1', 'read_file', { path: 'src/app.py' });
      },
      () => {
        clock += 5000;
        return answer('partial findings');
      },
    ]);
    const config = testConfig({ exploration: { maxDurationMs: 3000 } });
    const { review, store } = orchestrator(engine, config, () => clock);

    const result = await review.review({ projectRoot: project.root });

    expect(result.state).toBe('TERMINATED_BOUND');
    expect(result.answer).toBe('partial findings');
    expect(result.trace).toEqual([]);
    expect(result.stats).toMatchObject({ toolCalls: 0, engineRequests: 2, durationMs: 10_000, boundReason: 'maxDurationMs' });
    expect(engine.requests[1].toolChoice).toBe('none');
    expect((await store.load('default', project.root)).lastUpdated).toBe(new Date(10_000).toISOString());
  });

  it('continues a session with its history on the next review', async () => {
    const engine = new ScriptedEngine([answer('ISSUE: a\nISSUE: b'), answer('LGTM')]);
    const { review, store } = orchestrator(engine);

    const first = await review.review({ projectRoot: project.root, sessionName: 'feature' });
    const second = await review.review({ projectRoot: project.root, sessionName: 'feature' });

    expect(first.iteration).toBe(1);
    expect(second.iteration).toBe(2);
    expect(second.continued).toBe(true);

    const messages = engine.requests[1].messages;
    expect(messages.map(message => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messages[1].content).toBe(engine.requests[0].messages[1].content);
    expect(messages[2].content).toBe('ISSUE: a\nISSUE: b');
    expect(messages[3].content.split('\n').slice(0, 3)).toEqual([
      'Continuing review session (iteration 2)',
      'Last reviewed: just now',
      'The previous review reported 2 issues. Check what has changed since then.',
    ]);

    const saved = await store.load('feature', project.root);
    expect(saved.iterationCount).toBe(2);
    expect(saved.messageHistory).toHaveLength(4);
    expect(saved.lastIssuesCount).toBe(0);
  });

  it('resubmits only the most recent history', async () => {
    const engine = new ScriptedEngine([answer('first'), answer('second')]);
    const { review } = orchestrator(engine, testConfig({ exploration: { maxHistoryMessages: 1 } }));

    await review.review({ projectRoot: project.root });
    await review.review({ projectRoot: project.root });

    const messages = engine.requests[1].messages;
    expect(messages.map(message => message.role)).toEqual(['system', 'assistant', 'user']);
    expect(messages[1].content).toBe('first');
  });

  it('feeds tool failures back to the engine', async () => {
    const engine = new ScriptedEngine([toolCall('c1', 'drop_table', {}), answer('ok')]);
    const { review } = orchestrator(engine);

    const result = await review.review({ projectRoot: project.root });

    expect(result.state).toBe('TERMINATED_NORMAL');
    expect(result.stats.toolCalls).toBe(1);
    expect(result.trace).toEqual([]);
    const toolMessage = engine.requests[1].messages[3];
    expect(toolMessage.content.startsWith("Error (InvalidArgument): Unknown operation 'drop_table'")).toBe(true);
  });

  it('ends in error when the rate limit would wait too long, keeping the session', async () => {
    const engine = new ScriptedEngine([toolCall('c1', 'get_file_tree', {}), answer('never sent')]);
    const config = testConfig({ rateLimits: { maxWaitMs: 0, default: { requestsPerMinute: 1, burst: 1 } } });
    const { review, store } = orchestrator(engine, config);

    const result = await review.review({ projectRoot: project.root });

    expect(result.state).toBe('TERMINATED_ERROR');
    expect(result.error?.code).toBe('RateLimitExceeded');
    expect(engine.requests).toHaveLength(1);
    expect((await store.load('default', project.root)).iterationCount).toBe(1);
  });

  it('persists a cancelled review', async () => {
    const controller = new AbortController();
    const engine = new ScriptedEngine([
      () => {
        controller.abort();
        return toolCall('c1', 'get_file_tree', {});
      },
    ]);
    const { review, store } = orchestrator(engine);

    const result = await review.review({ projectRoot: project.root }, controller.signal);

    expect(result.state).toBe('TERMINATED_ERROR');
    expect(result.error?.code).toBe('Cancelled');
    const saved = await store.load('default', project.root);
    expect(saved.iterationCount).toBe(1);
    expect(saved.messageHistory.map(message => message.role)).toEqual(['user']);
  });

  it('reports engine failures as an error result', async () => {
    const engine = new ScriptedEngine([new EngineUnreachableError('connection refused')]);
    const { review, store } = orchestrator(engine);

    const result = await review.review({ projectRoot: project.root });

    expect(result.state).toBe('TERMINATED_ERROR');
    expect(result.error).toEqual({ code: 'EngineUnreachable', message: 'connection refused' });
    expect(result.answer).toBeUndefined();
    expect((await store.load('default', project.root)).lastIssuesCount).toBeNull();
  });

  it('does not persist when the project cannot be indexed', async () => {
    const engine = new ScriptedEngine([]);
    const { review, store } = orchestrator(engine);
    const missing = `${project.root}/missing`;

    const result = await review.review({ projectRoot: missing });

    expect(result.state).toBe('TERMINATED_ERROR');
    expect(result.iteration).toBe(0);
    expect(result.error?.code).toBe('InvalidArgument');
    expect(engine.requests).toHaveLength(0);
    await expect(store.load('default', missing)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('refuses a session that is already under review', async () => {
    const engine = new ScriptedEngine([]);
    const { review, registry } = orchestrator(engine);
    let release = (): void => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const held = registry.withSession('default', project.root, () => gate);

    await expect(review.review({ projectRoot: project.root })).rejects.toBeInstanceOf(SessionBusyError);
    release();
    await held;
  });

  it('picks up edits between reviews through the changed files', async () => {
    const engine = new ScriptedEngine([
      answer('first'),
      toolCall('c1', 'search_symbol', { name: 'added' }),
      answer('second'),
    ]);
    const { review, indexes } = orchestrator(engine);

    await review.review({ projectRoot: project.root });
    await project.write('src/app.py', `${APP}\ndef added():\n    return 2\n`);
    await review.review({ projectRoot: project.root, changedFiles: ['src/app.py'] });

    const toolMessage = engine.requests[2].messages.at(-1);
    expect(toolMessage?.content).toBe(JSON.stringify([{ name: 'added', kind: 'function', file: 'src/app.py', line: 7 }], null, 2));
    await indexes.close();
  });
});

describe('trimHistory', () => {
  const history: ChatMessage[] = [
    { role: 'user', content: 'seed' },
    { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'get_file_tree', arguments: {} }] },
    { role: 'tool', content: 'tree', toolCallId: 'c1' },
    { role: 'assistant', content: 'answer' },
  ];

  it('keeps the newest messages without a dangling tool result', () => {
    expect(trimHistory(history, 2)).toEqual([{ role: 'assistant', content: 'answer' }]);
    expect(trimHistory(history, 3)).toEqual(history.slice(1));
    expect(trimHistory(history, 10)).toEqual(history);
    expect(trimHistory(history, 0)).toEqual([]);
  });
});

describe('review seed', () => {
  let project: TempProject;

  beforeEach(async () => {
    project = await createProject({
      'src/app.py': APP,
      'tests/test_app.py': 'from src.app import main\n',
    });
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it('normalizes changed files to sorted project paths', () => {
    expect(normalizeChangedFiles(project.root, ['src/b.ts', `${project.root}/src/a.ts`, 'src/b.ts', '/elsewhere/x.ts']))
      .toEqual(['src/a.ts', 'src/b.ts']);
  });

  it('maps the changed files, their symbols and their tests', async () => {
    const { index } = await build(project.root);
    const seed = buildSeed({
      index,
      changedFiles: ['gone.py', 'src/app.py'],
      instructions: '  Focus on error handling  ',
      diffs: { 'src/app.py': '+def helper():\n' },
    });
    const lines = seed.split('\n');

    expect(lines.slice(0, 4)).toEqual(['## Changed Files', '- gone.py', '- src/app.py', '']);
    expect(seed).toContain([
      '## Symbols in Changed Files',
      'gone.py: not in the index (deleted or ignored)',
      'src/app.py:',
      '  - function main (line 1)',
      '  - function helper (line 4)',
      '',
    ].join('\n'));
    expect(seed).not.toContain('## Imports of Changed Files');
    expect(seed).toContain('## Related Tests\n- tests/test_app.py\n');
    expect(seed).toContain('## Diffs\n### src/app.py\n```diff\n+def helper():\n```\n');
    expect(seed).toContain('## Instructions\nFocus on error handling\n');
    expect(lines.at(-6)).toBe('- read_file: Read a file from the project.');
    expect(lines.at(-1)).toBe('- search_text: Search file contents with a regular expression, line by line.');
  });

  it('describes the whole project when nothing changed', async () => {
    const { index } = await build(project.root);
    const seed = buildSeed({ index, changedFiles: [] });
    expect(seed.startsWith('## Changed Files\n(none supplied: review the project as a whole)\n')).toBe(true);
    expect(seed).not.toContain('## Related Tests');
  });

  it('asks for critical issues only unless a mode says otherwise', async () => {
    const { index } = await build(project.root);
    const seed = buildSeed({ index, changedFiles: [] });
    expect(seed).toContain([
      '## Review Focus',
      'Report only issues that must be fixed before merging. Leave out everything else,',
      'including security hardening, style and refactoring ideas.',
      '',
      '## Available Tools',
    ].join('\n'));
    expect(seed).not.toContain('## Project Design Document');
    expect(seed).not.toContain('## Story/Change Context');
  });

  it('changes the review focus with the mode', async () => {
    const { index } = await build(project.root);
    const focus = (mode: 'full' | 'ai_generated' | 'prototype' | 'ai_prototype') => {
      const seed = buildSeed({ index, changedFiles: [], mode });
      return seed.slice(seed.indexOf('## Review Focus'), seed.indexOf('## Available Tools'));
    };

    expect(focus('full')).toContain('HIGH (must fix): design-document violations');
    expect(focus('full')).not.toContain('Report only issues that must be fixed');
    expect(focus('ai_generated')).toContain('The changes were written by an AI assistant.');
    expect(focus('ai_generated')).toContain('Report only issues that must be fixed before merging.');
    expect(focus('prototype')).toContain('This is a prototype. Judge the changes at that scale:');
    expect(focus('prototype')).not.toContain('AI assistant');
    expect(focus('ai_prototype')).toContain('This is a prototype.');
    expect(focus('ai_prototype')).toContain('The changes were written by an AI assistant.');
  });

  it('places the design document and the story ahead of the review focus', async () => {
    const { index } = await build(project.root);
    const seed = buildSeed({
      index,
      changedFiles: ['src/app.py'],
      designDoc: '  Every handler returns a Result.  ',
      story: 'Add a helper for the main entry point.\n',
      instructions: 'Be brief',
    });

    expect(seed).toContain([
      '## Project Design Document (mandatory compliance)',
      'Every handler returns a Result.',
      '',
      'Any violation of this document is a high-priority issue.',
      '',
      '## Story/Change Context',
      'Add a helper for the main entry point.',
      '',
    ].join('\n'));
    const order = ['## Diffs', '## Project Design Document', '## Story/Change Context', '## Review Focus', '## Instructions']
      .map(heading => seed.indexOf(heading));
    expect(order[0]).toBe(-1);
    expect(order.slice(1)).toEqual([...order.slice(1)].sort((a, b) => a - b));
    expect(order[1]).toBeGreaterThan(seed.indexOf('## Related Tests'));
  });

  it('passes the mode, design document and story of a request into the seed', async () => {
    const engine = new ScriptedEngine([answer('Looks fine.')]);
    const { review, indexes } = orchestrator(engine);
    await review.review({ projectRoot: project.root, mode: 'prototype', designDoc: 'Keep it flat.', story: 'Spike for the demo.' });

    const seed = engine.requests[0].messages[1].content;
    expect(seed).toContain('## Project Design Document (mandatory compliance)\nKeep it flat.\n');
    expect(seed).toContain('## Story/Change Context\nSpike for the demo.\n');
    expect(seed).toContain('## Review Focus\nThis is a prototype. Judge the changes at that scale:\n');
    await indexes.close();
  });
});
