import { createHash, randomUUID } from 'node:crypto';
import { z } from 'zod';
import { SessionVersionError } from '../errors.js';
import type { ListSessionsOptions, Session, SessionSortKey, SessionSummary } from './types.js';

/** Bump when the persisted shape changes; older readers then refuse the record. */
export const SESSION_RECORD_VERSION = 1;

export const DEFAULT_LIST_LIMIT = 20;

const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.unknown(),
}).transform(call => ({ id: call.id, name: call.name, arguments: call.arguments }));

const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
  toolCalls: z.array(ToolCallSchema).optional(),
  toolCallId: z.string().optional(),
  name: z.string().optional(),
});

const TraceEntrySchema = z.object({
  tool: z.enum(['read_file', 'search_symbol', 'find_usages', 'get_imports', 'get_file_tree', 'search_text']),
  arguments: z.record(z.unknown()),
  resultSize: z.number().int().nonnegative(),
  reason: z.enum(['fresh', 'cached']),
});

const SessionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  projectRoot: z.string().min(1),
  createdAt: z.string(),
  lastUpdated: z.string(),
  messageHistory: z.array(ChatMessageSchema),
  navigationState: z.array(TraceEntrySchema),
  iterationCount: z.number().int().nonnegative(),
  cumulativeTokenEstimate: z.number().nonnegative(),
  lastIssuesCount: z.number().int().nonnegative().nullable(),
});

const RecordEnvelopeSchema = z.object({
  version: z.unknown(),
  session: z.unknown(),
});

export function createSession(name: string, projectRoot: string, now: Date = new Date()): Session {
  const timestamp = now.toISOString();
  return {
    id: randomUUID(),
    name,
    projectRoot,
    createdAt: timestamp,
    lastUpdated: timestamp,
    messageHistory: [],
    navigationState: [],
    iterationCount: 0,
    cumulativeTokenEstimate: 0,
    lastIssuesCount: null,
  };
}

/** Stable identifier for a project root, usable in file names and keys. */
export function projectKey(projectRoot: string): string {
  return createHash('sha256').update(projectRoot).digest('hex').slice(0, 16);
}

export function sessionKey(name: string, projectRoot: string): string {
  return `${projectRoot}:${name}`;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, child] of entries) {
      if (child !== undefined) sorted[key] = canonicalize(child);
    }
    return sorted;
  }
  return value;
}

/**
 * Persisted form: a versioned envelope with every object's keys sorted, so
 * serializing an unchanged session always yields the same bytes.
 */
export function serializeSession(session: Session): string {
  return `${JSON.stringify(canonicalize({ version: SESSION_RECORD_VERSION, session }), null, 2)}\n`;
}

/**
 * Parse a persisted record. Records written by any other format version are
 * refused rather than guessed at.
 */
export function deserializeSession(text: string): Session {
  const envelope = RecordEnvelopeSchema.parse(JSON.parse(text));
  if (envelope.version !== SESSION_RECORD_VERSION) {
    throw new SessionVersionError(envelope.version, SESSION_RECORD_VERSION);
  }
  return SessionSchema.parse(envelope.session);
}

export function summarize(session: Session, now: Date = new Date()): SessionSummary {
  return {
    name: session.name,
    projectRoot: session.projectRoot,
    createdAt: session.createdAt,
    lastUpdated: session.lastUpdated,
    iterationCount: session.iterationCount,
    messageCount: session.messageHistory.length,
    cumulativeTokenEstimate: session.cumulativeTokenEstimate,
    lastReviewedAgo: formatTimeAgo(session.lastUpdated, now),
  };
}

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const SORTERS: Record<SessionSortKey, (a: SessionSummary, b: SessionSummary) => number> = {
  created: (a, b) => compareText(a.createdAt, b.createdAt),
  last_reviewed: (a, b) => compareText(b.lastUpdated, a.lastUpdated),
  name: (a, b) => compareText(a.name, b.name),
  iterations: (a, b) => b.iterationCount - a.iterationCount,
};

/** Filter, sort and cut a list of summaries the same way for every backend. */
export function selectSummaries(summaries: SessionSummary[], options: ListSessionsOptions = {}): SessionSummary[] {
  const sortBy = options.sortBy ?? 'last_reviewed';
  const limit = options.limit ?? DEFAULT_LIST_LIMIT;
  const filtered = options.projectRoot === undefined
    ? summaries
    : summaries.filter(summary => summary.projectRoot === options.projectRoot);

  // ties fall back to name then root so the order never depends on storage order
  return [...filtered]
    .sort((a, b) => SORTERS[sortBy](a, b) || compareText(a.name, b.name) || compareText(a.projectRoot, b.projectRoot))
    .slice(0, Math.max(0, limit));
}

export function formatTimeAgo(iso: string, now: Date = new Date()): string {
  const then = Date.parse(iso);
  if (Number.isNaN(then)) return 'unknown';
  const seconds = Math.max(0, (now.getTime() - then) / 1000);
  if (seconds < 60) return 'just now';
  const plural = (n: number, unit: string): string => `${n} ${unit}${n === 1 ? '' : 's'} ago`;
  if (seconds < 3600) return plural(Math.floor(seconds / 60), 'minute');
  if (seconds < 86400) return plural(Math.floor(seconds / 3600), 'hour');
  return plural(Math.floor(seconds / 86400), 'day');
}

/** Markers a review answer uses to flag findings. */
export function countIssueMarkers(text: string): number {
  const markers = ['ISSUE:', 'ERROR:', 'WARNING:'];
  return markers.reduce((count, marker) => count + text.split(marker).length - 1, 0);
}
