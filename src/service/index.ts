export { ReviewService, createEngine, createSessionStore, type ReviewServiceOverrides } from './review-service.js';
export { IndexCache, canonicalProjectRoot } from './index-cache.js';
export { createHttpServer, startHttpServer, statusForError, type RunningHttpServer } from './http.js';
