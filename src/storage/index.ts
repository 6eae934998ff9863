import Database from 'better-sqlite3';
import { dirname, join } from 'node:path';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';

import {
  type AssessmentSession,
  type SessionStatus,
  AssessmentSessionSchema,
} from '../types/index.js';
import { logger } from '../utils/logger.js';

const IN_MEMORY = ':memory:';

/**
 * Listing entry; enough to pick a session without loading every document
 */
export interface SessionSummary {
  id: string;
  name: string;
  organization: string;
  sector: string;
  status: SessionStatus;
  answered: number;
  createdAt: string;
  lastUpdated: string;
}

export function defaultDbPath(): string {
  return join(homedir(), '.self-assessment', 'assessment.db');
}

/**
 * `backup_YYYYMMDD_HHMMSS.json` in UTC
 */
export function backupFileName(date: Date): string {
  const stamp = date.toISOString().slice(0, 19).replace(/-/g, '').replace(/:/g, '').replace('T', '_');
  return `backup_${stamp}.json`;
}

/**
 * Session persistence
 *
 * Uses SQLite, one JSON document per session. Saving overwrites the whole
 * document. Failures are logged and reported through return values.
 */
export class Storage {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? defaultDbPath();
    this.ensureDirectory(path);
    this.db = new Database(path);
    this.initialize();
  }

  private ensureDirectory(dbPath: string): void {
    if (dbPath === IN_MEMORY) {
      return;
    }
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private initialize(): void {
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_updated ON sessions(updated_at DESC);
    `);
  }

  private parseDocument(data: string, id: string): AssessmentSession | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      logger.error('Failed to parse session from database', error, { id });
      return undefined;
    }

    const parsed = AssessmentSessionSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error('Failed to validate session from database', parsed.error, { id });
      return undefined;
    }
    return parsed.data;
  }

  /**
   * Stamp `lastUpdated` and overwrite the stored document
   *
   * @returns false if the write failed
   */
  saveSession(session: AssessmentSession): boolean {
    try {
      const stamped: AssessmentSession = { ...session, lastUpdated: new Date().toISOString() };
      const stmt = this.db.prepare<[string, string, string, string, string]>(`
        INSERT OR REPLACE INTO sessions (id, status, data, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?)
      `);
      stmt.run(
        stamped.id,
        stamped.status,
        JSON.stringify(stamped),
        stamped.createdAt,
        stamped.lastUpdated
      );
      // the caller's copy only reflects what was written
      session.lastUpdated = stamped.lastUpdated;
      return true;
    } catch (error) {
      logger.error('Failed to save session', error, { id: session.id });
      return false;
    }
  }

  loadSession(id: string): AssessmentSession | undefined {
    try {
      const stmt = this.db.prepare<[string], { data: string }>('SELECT data FROM sessions WHERE id = ?');
      const row = stmt.get(id);
      if (!row) return undefined;
      return this.parseDocument(row.data, id);
    } catch (error) {
      logger.error('Failed to load session', error, { id });
      return undefined;
    }
  }

  /**
   * All readable sessions, most recently updated first
   */
  listSessions(): SessionSummary[] {
    try {
      const stmt = this.db.prepare<[], { id: string; data: string }>(
        'SELECT id, data FROM sessions ORDER BY updated_at DESC'
      );
      const summaries: SessionSummary[] = [];
      for (const row of stmt.all()) {
        const session = this.parseDocument(row.data, row.id);
        if (!session) continue;
        summaries.push({
          id: session.id,
          name: session.userInfo.name,
          organization: session.userInfo.organization,
          sector: session.userInfo.sector,
          status: session.status,
          answered: Object.keys(session.responses).length,
          createdAt: session.createdAt,
          lastUpdated: session.lastUpdated,
        });
      }
      return summaries;
    } catch (error) {
      logger.error('Failed to list sessions', error);
      return [];
    }
  }

  /**
   * @returns false if nothing was deleted or the delete failed
   */
  deleteSession(id: string): boolean {
    try {
      const stmt = this.db.prepare<[string]>('DELETE FROM sessions WHERE id = ?');
      const result = stmt.run(id);
      return result.changes > 0;
    } catch (error) {
      logger.error('Failed to delete session', error, { id });
      return false;
    }
  }

  /**
   * Write every readable session, keyed by id, into one timestamped JSON file
   *
   * @returns the file path, or null if the backup failed
   */
  backup(directory: string): string | null {
    try {
      const stmt = this.db.prepare<[], { id: string; data: string }>('SELECT id, data FROM sessions ORDER BY created_at');
      const documents: Record<string, AssessmentSession> = {};
      for (const row of stmt.all()) {
        const session = this.parseDocument(row.data, row.id);
        if (session) {
          documents[row.id] = session;
        }
      }

      if (!existsSync(directory)) {
        mkdirSync(directory, { recursive: true });
      }
      const file = join(directory, backupFileName(new Date()));
      writeFileSync(file, JSON.stringify(documents, null, 2), 'utf-8');

      logger.info('Sessions backed up', { file, count: Object.keys(documents).length });
      return file;
    } catch (error) {
      logger.error('Failed to back up sessions', error, { directory });
      return null;
    }
  }

  /**
   * Round trip to the database; throws when it is unusable
   */
  ping(): void {
    this.db.prepare('SELECT 1').get();
  }

  close(): void {
    this.db.close();
  }
}
