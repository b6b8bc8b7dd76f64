/**
 * sessionStore.ts — Persistence of the session cookie and the scratch page.
 *
 * Both files are process-wide singletons shared by every plugin run.  Two
 * runs racing on the cookie file is an accepted limitation: the loser simply
 * re-authenticates on its next fetch.
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { Logger } from '../core/logger';
import type { FetchedPage, Session } from '../core/types';

const logger = new Logger('SessionStore');

export interface StateStore {
  /** The persisted session, or null when none exists or it cannot be read. */
  loadSession(): Promise<Session | null>;
  saveSession(session: Session): Promise<void>;
  /** Keep a copy of the most recently fetched page. */
  savePage(page: FetchedPage): Promise<void>;
}

function isSession(value: unknown): value is Session {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'token' in value &&
    typeof value.token === 'string' &&
    value.token.length > 0 &&
    'acquiredAt' in value &&
    typeof value.acquiredAt === 'string'
  );
}

export class FileStateStore implements StateStore {
  constructor(
    private readonly cookieFile: string,
    private readonly pageFile: string | null,
  ) {}

  async loadSession(): Promise<Session | null> {
    if (!existsSync(this.cookieFile)) {
      return null;
    }

    try {
      const raw = await readFile(this.cookieFile, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      if (!isSession(parsed)) {
        logger.warn(`Ignoring malformed session file ${this.cookieFile}`);
        return null;
      }
      return parsed;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Failed to read session file ${this.cookieFile}: ${reason}`);
      return null;
    }
  }

  async saveSession(session: Session): Promise<void> {
    try {
      await mkdir(dirname(this.cookieFile), { recursive: true });
      await writeFile(this.cookieFile, JSON.stringify(session, null, 2), {
        mode: 0o600,
      });
      logger.info(`Saved session cookie to ${this.cookieFile}`);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Failed to save session cookie: ${reason}`);
    }
  }

  async savePage(page: FetchedPage): Promise<void> {
    if (this.pageFile === null) return;

    try {
      await mkdir(dirname(this.pageFile), { recursive: true });
      await writeFile(this.pageFile, page.body);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Failed to write scratch page ${this.pageFile}: ${reason}`);
    }
  }
}
