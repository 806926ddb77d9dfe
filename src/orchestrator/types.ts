import type { ErrorDescriptor } from '../errors.js';
import type { EngineUsage } from '../engine/types.js';
import type { Index } from '../indexer/types.js';
import type { NavigationTraceEntry } from '../tools/types.js';

export type ReviewState =
  | 'INIT'
  | 'SEEDED'
  | 'EXPLORING'
  | 'TERMINATED_NORMAL'
  | 'TERMINATED_BOUND'
  | 'TERMINATED_ERROR';

export type TerminalState = Extract<ReviewState, `TERMINATED_${string}`>;

export type BoundReason = 'maxToolCalls' | 'maxDurationMs' | 'maxDistinctFiles';

export const REVIEW_MODES = ['default', 'full', 'ai_generated', 'prototype', 'ai_prototype'] as const;

/** How much the engine should report; `default` is critical issues only. */
export type ReviewMode = typeof REVIEW_MODES[number];

export interface ReviewRequest {
  projectRoot: string;
  /** Project-relative or absolute paths inside the root. */
  changedFiles?: string[];
  /** Defaults to `default`. */
  sessionName?: string;
  instructions?: string;
  /** Unified diff per changed file, shown to the engine verbatim. */
  diffs?: Record<string, string>;
  mode?: ReviewMode;
  /** Project design document the changes must comply with. */
  designDoc?: string;
  /** What the change is for: ticket text, user story or PR description. */
  story?: string;
}

export interface ReviewStats {
  toolCalls: number;
  cachedCalls: number;
  distinctFilesRead: number;
  engineRequests: number;
  durationMs: number;
  tokenEstimate: number;
  boundReason?: BoundReason;
  usage?: EngineUsage;
}

export interface ReviewResult {
  state: TerminalState;
  sessionName: string;
  /** Session iteration this review produced; 0 when the session was never loaded. */
  iteration: number;
  continued: boolean;
  answer?: string;
  error?: ErrorDescriptor;
  trace: NavigationTraceEntry[];
  stats: ReviewStats;
}

/**
 * Source of the index a review runs against. The service keeps one per
 * project and folds in watcher changes; tests can simply build afresh.
 */
export interface IndexProvider {
  indexFor(projectRoot: string, changedFiles: string[]): Promise<Index>;
}
