import {
  CancelledError,
  NotFoundError,
  describeError,
  toErrorDescriptor,
  type ErrorDescriptor,
} from '../errors.js';
import { countIssueMarkers } from '../session/record.js';
import { NavigationSession, navigationTools } from '../tools/index.js';
import { logger } from '../utils/logger.js';
import {
  REVIEWER_SYSTEM_PROMPT,
  SUMMARIZE_PROMPT,
  buildSeed,
  normalizeChangedFiles,
} from './context.js';
import type { ExplorationBounds, NavigationConfig } from '../config.js';
import type {
  ChatMessage,
  EngineResponse,
  EngineToolDefinition,
  EngineUsage,
  ReasoningEngine,
} from '../engine/types.js';
import type { RateLimiter } from '../ratelimit/rate-limiter.js';
import type { SessionRegistry } from '../session/registry.js';
import type { Session } from '../session/types.js';
import type {
  BoundReason,
  IndexProvider,
  ReviewRequest,
  ReviewResult,
  ReviewState,
  TerminalState,
} from './types.js';

const log = logger.child('review');

export const DEFAULT_SESSION_NAME = 'default';

const SKIPPED_CALL_OUTPUT = 'Not executed: the exploration budget for this review is used up.';

export interface ReviewOrchestratorDeps {
  engine: ReasoningEngine;
  rateLimiter: RateLimiter;
  registry: SessionRegistry;
  indexes: IndexProvider;
  bounds: ExplorationBounds;
  navigation: NavigationConfig;
  /** Wall clock in milliseconds; injectable for tests. */
  now?: () => number;
}

const engineTools: EngineToolDefinition[] = navigationTools.map(tool => ({
  name: tool.name,
  description: tool.description,
  inputSchema: tool.inputSchema,
}));

/**
 * Prior conversation to resubmit: at most `limit` messages, never starting
 * with a tool result whose request was cut off.
 */
export function trimHistory(history: ChatMessage[], limit: number): ChatMessage[] {
  if (limit <= 0) return [];
  const recent = history.slice(-limit);
  let start = 0;
  while (start < recent.length && recent[start].role === 'tool') start++;
  return recent.slice(start);
}

function addUsage(total: EngineUsage | undefined, usage: EngineUsage | undefined): EngineUsage | undefined {
  if (!usage) return total;
  const sum = (a?: number, b?: number): number | undefined =>
    a === undefined && b === undefined ? undefined : (a ?? 0) + (b ?? 0);
  return {
    inputTokens: sum(total?.inputTokens, usage.inputTokens),
    outputTokens: sum(total?.outputTokens, usage.outputTokens),
    totalTokens: sum(total?.totalTokens, usage.totalTokens),
  };
}

function estimateTokens(messages: ChatMessage[]): number {
  const chars = messages.reduce((sum, message) => sum + message.content.length, 0);
  return Math.ceil(chars / 4);
}

/**
 * Mutable state of one review run, from the seed to the terminal state.
 */
class ReviewRun {
  state: ReviewState = 'INIT';
  readonly messages: ChatMessage[] = [];
  toolCalls = 0;
  engineRequests = 0;
  usage: EngineUsage | undefined;
  boundReason: BoundReason | undefined;
  answer: string | undefined;
  error: ErrorDescriptor | undefined;

  constructor(
    readonly startedAt: number,
    readonly history: ChatMessage[],
    readonly navigation: NavigationSession,
  ) {}
}

/**
 * Drives one review: lock the session, seed the engine, dispatch its tool
 * calls within the exploration bounds and persist the outcome.
 *
 * INIT → SEEDED → EXPLORING → TERMINATED_NORMAL | TERMINATED_BOUND | TERMINATED_ERROR
 */
export class ReviewOrchestrator {
  private readonly now: () => number;

  constructor(private readonly deps: ReviewOrchestratorDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run a review. Throws only when the session cannot be acquired
   * (SessionBusy, registry closed); every other outcome is a result.
   */
  review(request: ReviewRequest, signal?: AbortSignal): Promise<ReviewResult> {
    const sessionName = request.sessionName ?? DEFAULT_SESSION_NAME;
    return this.deps.registry.withSession(sessionName, request.projectRoot, () =>
      this.runLocked(request, sessionName, signal));
  }

  private async runLocked(request: ReviewRequest, sessionName: string, signal?: AbortSignal): Promise<ReviewResult> {
    const startedAt = this.now();

    try {
      const session = await this.loadOrCreate(sessionName, request.projectRoot);
      const index = await this.deps.indexes.indexFor(request.projectRoot, request.changedFiles ?? []);
      const changed = normalizeChangedFiles(index.root, request.changedFiles ?? []);
      const navigation = new NavigationSession(index, this.deps.navigation);

      const continued = session.iterationCount > 0;
      const seed = buildSeed({
        index,
        changedFiles: changed,
        instructions: request.instructions,
        diffs: request.diffs,
        mode: request.mode,
        designDoc: request.designDoc,
        story: request.story,
        continuation: continued
          ? {
            iteration: session.iterationCount + 1,
            lastUpdated: session.lastUpdated,
            lastIssuesCount: session.lastIssuesCount,
          }
          : undefined,
        now: new Date(this.now()),
      });

      const run = new ReviewRun(startedAt, trimHistory(session.messageHistory, this.deps.bounds.maxHistoryMessages), navigation);
      run.messages.push({ role: 'user', content: seed });
      run.state = 'SEEDED';
      log.info(`Reviewing ${request.projectRoot} as '${sessionName}' (iteration ${session.iterationCount + 1}, ${changed.length} changed files)`);

      await this.explore(run, signal);
      return await this.finish(session, run, continued);
    } catch (error) {
      // the engine was never reached, so the session is left as it was
      log.error(`Review setup failed for '${sessionName}': ${describeError(error)}`);
      return {
        state: 'TERMINATED_ERROR',
        sessionName,
        iteration: 0,
        continued: false,
        error: toErrorDescriptor(error),
        trace: [],
        stats: {
          toolCalls: 0,
          cachedCalls: 0,
          distinctFilesRead: 0,
          engineRequests: 0,
          durationMs: this.now() - startedAt,
          tokenEstimate: 0,
        },
      };
    }
  }

  private async loadOrCreate(name: string, projectRoot: string): Promise<Session> {
    try {
      return await this.deps.registry.store.load(name, projectRoot);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return this.deps.registry.store.create(name, projectRoot);
      }
      throw error;
    }
  }

  /**
   * SEEDED and EXPLORING. Leaves the run in a terminal state; engine,
   * rate-limit and cancellation failures are recorded rather than thrown.
   */
  private async explore(run: ReviewRun, signal?: AbortSignal): Promise<void> {
    try {
      let response = await this.submit(run, 'auto', signal);
      run.state = 'EXPLORING';

      for (;;) {
        if (response.type === 'answer') {
          run.answer = response.text;
          run.messages.push({ role: 'assistant', content: response.text });
          run.state = 'TERMINATED_NORMAL';
          return;
        }

        run.messages.push({ role: 'assistant', content: response.text ?? '', toolCalls: response.calls });
        for (const call of response.calls) {
          if (!run.boundReason) {
            run.boundReason = await this.exceededBound(run, call.name, call.arguments);
          }
          if (run.boundReason) {
            // every requested call still gets an answer so the history stays well-formed
            run.messages.push({ role: 'tool', toolCallId: call.id, name: call.name, content: SKIPPED_CALL_OUTPUT });
            continue;
          }

          run.toolCalls++;
          const result = await run.navigation.execute(call.name, call.arguments);
          const content = result.ok || !result.error
            ? result.output
            : `Error (${result.error.code}): ${result.error.message}`;
          run.messages.push({ role: 'tool', toolCallId: call.id, name: call.name, content });
        }

        if (run.boundReason) {
          log.info(`Exploration bound reached (${run.boundReason}) after ${run.toolCalls} tool calls`);
          run.state = 'TERMINATED_BOUND';
          run.messages.push({ role: 'user', content: SUMMARIZE_PROMPT });
          const summary = await this.submit(run, 'none', signal);
          run.answer = summary.type === 'answer' ? summary.text : (summary.text ?? '');
          run.messages.push({ role: 'assistant', content: run.answer });
          return;
        }

        response = await this.submit(run, 'auto', signal);
      }
    } catch (error) {
      run.state = 'TERMINATED_ERROR';
      run.error = toErrorDescriptor(error);
      if (error instanceof CancelledError) {
        log.info('Review cancelled');
      } else {
        log.error(`Review failed: ${describeError(error)}`);
      }
    }
  }

  private async exceededBound(run: ReviewRun, name: string, args: unknown): Promise<BoundReason | undefined> {
    const { maxToolCalls, maxDurationMs, maxDistinctFiles } = this.deps.bounds;
    if (run.toolCalls + 1 > maxToolCalls) return 'maxToolCalls';
    if (this.now() - run.startedAt > maxDurationMs) return 'maxDurationMs';
    if (
      run.navigation.getFilesRead().length >= maxDistinctFiles
      && await run.navigation.wouldReadNewFile(name, args)
    ) {
      return 'maxDistinctFiles';
    }
    return undefined;
  }

  /** One engine round-trip, gated by cancellation and the rate limiter. */
  private async submit(run: ReviewRun, toolChoice: 'auto' | 'none', signal?: AbortSignal): Promise<EngineResponse> {
    if (signal?.aborted) throw new CancelledError();
    await this.deps.rateLimiter.acquire(this.deps.engine.category, signal);

    run.engineRequests++;
    const response = await this.deps.engine.respond(
      {
        messages: [{ role: 'system', content: REVIEWER_SYSTEM_PROMPT }, ...run.history, ...run.messages],
        tools: engineTools,
        toolChoice,
      },
      signal,
    );
    if (signal?.aborted) throw new CancelledError();

    run.usage = addUsage(run.usage, response.usage);
    return response;
  }

  /** Fold the run into the session and persist it, whatever the terminal state. */
  private async finish(session: Session, run: ReviewRun, continued: boolean): Promise<ReviewResult> {
    const state: TerminalState = run.state === 'TERMINATED_NORMAL' || run.state === 'TERMINATED_BOUND'
      ? run.state
      : 'TERMINATED_ERROR';
    const summary = run.navigation.summary();
    const tokenEstimate = run.usage?.totalTokens ?? estimateTokens(run.messages);

    const updated: Session = {
      ...session,
      lastUpdated: new Date(this.now()).toISOString(),
      messageHistory: [...session.messageHistory, ...run.messages],
      navigationState: run.navigation.getTrace(),
      iterationCount: session.iterationCount + 1,
      cumulativeTokenEstimate: session.cumulativeTokenEstimate + tokenEstimate,
      lastIssuesCount: run.answer !== undefined ? countIssueMarkers(run.answer) : session.lastIssuesCount,
    };

    let error = run.error;
    let finalState = state;
    try {
      await this.deps.registry.store.save(updated);
    } catch (saveError) {
      log.error(`Failed to persist session '${session.name}': ${describeError(saveError)}`);
      finalState = 'TERMINATED_ERROR';
      error = error ?? toErrorDescriptor(saveError);
    }

    return {
      state: finalState,
      sessionName: session.name,
      iteration: updated.iterationCount,
      continued,
      ...(run.answer !== undefined ? { answer: run.answer } : {}),
      ...(error ? { error } : {}),
      trace: updated.navigationState,
      stats: {
        toolCalls: run.toolCalls,
        cachedCalls: summary.cachedCalls,
        distinctFilesRead: summary.filesRead.length,
        engineRequests: run.engineRequests,
        durationMs: this.now() - run.startedAt,
        tokenEstimate,
        ...(run.boundReason ? { boundReason: run.boundReason } : {}),
        ...(run.usage ? { usage: run.usage } : {}),
      },
    };
  }
}
