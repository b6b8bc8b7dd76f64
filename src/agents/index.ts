/**
 * agents/index.ts — Barrel export for the session layer.
 *
 * `middleware/` holds the stateless transport; `agents/` holds what keeps
 * state across requests and runs: the session manager and its store.
 */

export { SessionManager, cookieHeaderFrom } from './sessionManager';
export { FileStateStore } from './sessionStore';
export type { StateStore } from './sessionStore';
