export { ReviewOrchestrator, DEFAULT_SESSION_NAME, trimHistory, type ReviewOrchestratorDeps } from './loop.js';
export { REVIEWER_SYSTEM_PROMPT, SUMMARIZE_PROMPT, buildSeed, normalizeChangedFiles } from './context.js';
export { REVIEW_MODES } from './types.js';
export type {
  BoundReason,
  IndexProvider,
  ReviewMode,
  ReviewRequest,
  ReviewResult,
  ReviewState,
  ReviewStats,
  TerminalState,
} from './types.js';
