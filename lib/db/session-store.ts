/**
 * Session store - one row of JSON state per chat session, plus the chat turns
 * replayed to the agent as history. State is read and written wholesale; the
 * last write wins.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { Config } from '../config';
import { Logger, errorMessage } from '../utils';
import { openDatabase } from './sqlite';
import { SessionStateSchema, type SessionState } from '../schemas';
import type { ChatTurn, SessionRecord } from '../types';

export function createInitialSessionState(): SessionState {
  return SessionStateSchema.parse({});
}

/**
 * Parse stored state, filling defaults for missing keys
 */
export function parseSessionState(raw: string): SessionState {
  try {
    const result = SessionStateSchema.safeParse(JSON.parse(raw));
    if (result.success) {
      return result.data;
    }
    Logger.warn('Stored session state failed validation, resetting', {
      issues: result.error.issues.length,
    });
  } catch (error) {
    Logger.warn('Stored session state is not valid JSON, resetting', {
      error: errorMessage(error),
    });
  }
  return createInitialSessionState();
}

const SessionRowSchema = z.object({
  session_id: z.string(),
  state: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const ChatTurnRowSchema = z.object({
  user_message: z.string(),
  response: z.string(),
  created_at: z.string(),
});

export interface SessionSummary {
  session_id: string;
  title: string | null;
  stage: SessionState['stage'];
  updated_at: string;
}

export class SessionStore {
  private db: Database.Database;

  constructor(dbPath: string = Config.SESSION_DB_PATH) {
    this.db = openDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS chat_runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        user_message TEXT NOT NULL,
        response TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_chat_runs_session ON chat_runs(session_id, id);
    `);
  }

  getSession(sessionId: string): SessionRecord {
    const row = this.db
      .prepare('SELECT session_id, state, created_at, updated_at FROM sessions WHERE session_id = ?')
      .get(sessionId);

    if (row === undefined) {
      return {
        session_id: sessionId,
        state: createInitialSessionState(),
        created_at: null,
        updated_at: null,
      };
    }

    const parsed = SessionRowSchema.parse(row);
    return {
      session_id: parsed.session_id,
      state: parseSessionState(parsed.state),
      created_at: parsed.created_at,
      updated_at: parsed.updated_at,
    };
  }

  getState(sessionId: string): SessionState {
    return this.getSession(sessionId).state;
  }

  saveSession(sessionId: string, state: SessionState): void {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO sessions (session_id, state, created_at, updated_at)
         VALUES (@sessionId, @state, @now, @now)
         ON CONFLICT(session_id) DO UPDATE SET state = excluded.state, updated_at = excluded.updated_at`
      )
      .run({ sessionId, state: JSON.stringify(state), now });
  }

  /**
   * Load, mutate and save in one step; returns what `mutate` returns
   */
  updateState<T>(sessionId: string, mutate: (state: SessionState) => T): T {
    const state = this.getState(sessionId);
    const result = mutate(state);
    this.saveSession(sessionId, state);
    return result;
  }

  appendRun(sessionId: string, userMessage: string, response: string): void {
    this.db
      .prepare(
        `INSERT INTO chat_runs (session_id, user_message, response, created_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(sessionId, userMessage, response, new Date().toISOString());
  }

  /**
   * The most recent `limit` turns, oldest first
   */
  getRecentRuns(sessionId: string, limit: number = Config.CHAT_HISTORY_RUNS): ChatTurn[] {
    const rows = this.db
      .prepare(
        `SELECT user_message, response, created_at FROM (
           SELECT id, user_message, response, created_at FROM chat_runs
           WHERE session_id = ? ORDER BY id DESC LIMIT ?
         ) ORDER BY id ASC`
      )
      .all(sessionId, limit);
    return z.array(ChatTurnRowSchema).parse(rows);
  }

  listSessions(limit = 50): SessionSummary[] {
    const rows = this.db
      .prepare(
        'SELECT session_id, state, created_at, updated_at FROM sessions ORDER BY updated_at DESC LIMIT ?'
      )
      .all(limit);

    return z.array(SessionRowSchema).parse(rows).map(row => {
      const state = parseSessionState(row.state);
      return {
        session_id: row.session_id,
        title: state.title,
        stage: state.stage,
        updated_at: row.updated_at,
      };
    });
  }

  deleteSession(sessionId: string): boolean {
    const removeRuns = this.db.prepare('DELETE FROM chat_runs WHERE session_id = ?');
    const removeSession = this.db.prepare('DELETE FROM sessions WHERE session_id = ?');
    const remove = this.db.transaction((id: string) => {
      removeRuns.run(id);
      return removeSession.run(id).changes > 0;
    });
    return remove(sessionId);
  }

  close(): void {
    this.db.close();
  }
}

let sessionStore: SessionStore | null = null;

export function getSessionStore(): SessionStore {
  if (!sessionStore) {
    sessionStore = new SessionStore();
  }
  return sessionStore;
}
