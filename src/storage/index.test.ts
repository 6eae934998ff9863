import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { AssessmentSession } from '../types/index.js';
import { backupFileName, Storage } from './index.js';

function session(id: string, overrides: Partial<AssessmentSession> = {}): AssessmentSession {
  return {
    id,
    userInfo: {
      name: 'Ada Rossi',
      organization: 'Example University',
      role: 'Technology transfer officer',
      sector: 'University',
    },
    responses: { q_0: { kind: 'likert', value: 5 } },
    comments: { q_0: 'Funding is scarce' },
    status: 'in-progress',
    currentQuestionIndex: 1,
    createdAt: '2024-05-01T10:00:00.000Z',
    lastUpdated: '2024-05-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('backupFileName', () => {
  it('stamps the UTC date and time', () => {
    expect(backupFileName(new Date('2024-03-07T09:05:03.123Z'))).toBe('backup_20240307_090503.json');
  });
});

describe('Storage', () => {
  let storage: Storage;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    storage = new Storage(':memory:');
  });

  afterEach(() => {
    storage.close();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('sessions', () => {
    it('saves and loads a session document', () => {
      const original = session('session-1');
      expect(storage.saveSession(original)).toBe(true);

      expect(storage.loadSession('session-1')).toEqual(original);
    });

    it('stamps lastUpdated on save', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-01T08:00:00.000Z'));

      const saved = session('session-1');
      storage.saveSession(saved);

      expect(saved.lastUpdated).toBe('2024-06-01T08:00:00.000Z');
      expect(storage.loadSession('session-1')?.lastUpdated).toBe('2024-06-01T08:00:00.000Z');
    });

    it('overwrites the whole document on save', () => {
      storage.saveSession(session('session-1'));
      storage.saveSession(session('session-1', { responses: {}, comments: {}, status: 'completed' }));

      const loaded = storage.loadSession('session-1');
      expect(loaded?.responses).toEqual({});
      expect(loaded?.status).toBe('completed');
    });

    it('returns undefined for an unknown session', () => {
      expect(storage.loadSession('session-missing')).toBeUndefined();
    });

    it('deletes a session', () => {
      storage.saveSession(session('session-1'));

      expect(storage.deleteSession('session-1')).toBe(true);
      expect(storage.loadSession('session-1')).toBeUndefined();
      expect(storage.deleteSession('session-1')).toBe(false);
    });

    it('lists summaries most recently updated first', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-01T08:00:00.000Z'));
      storage.saveSession(session('session-old'));
      vi.setSystemTime(new Date('2024-06-02T08:00:00.000Z'));
      storage.saveSession(session('session-new', { status: 'completed', responses: {} }));

      expect(storage.listSessions()).toEqual([
        {
          id: 'session-new',
          name: 'Ada Rossi',
          organization: 'Example University',
          sector: 'University',
          status: 'completed',
          answered: 0,
          createdAt: '2024-05-01T10:00:00.000Z',
          lastUpdated: '2024-06-02T08:00:00.000Z',
        },
        {
          id: 'session-old',
          name: 'Ada Rossi',
          organization: 'Example University',
          sector: 'University',
          status: 'in-progress',
          answered: 1,
          createdAt: '2024-05-01T10:00:00.000Z',
          lastUpdated: '2024-06-01T08:00:00.000Z',
        },
      ]);
    });

    it('reports a failed save after close', () => {
      storage.close();
      expect(storage.saveSession(session('session-1'))).toBe(false);
      expect(storage.loadSession('session-1')).toBeUndefined();
      expect(storage.listSessions()).toEqual([]);
      expect(() => storage.ping()).toThrow();
      storage = new Storage(':memory:');
    });

    it('leaves lastUpdated alone when the save fails', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-01T08:00:00.000Z'));
      storage.close();

      const unsaved = session('session-1');
      expect(storage.saveSession(unsaved)).toBe(false);
      expect(unsaved.lastUpdated).toBe('2024-05-01T10:00:00.000Z');
      storage = new Storage(':memory:');
    });
  });

  describe('file database', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'storage-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('creates missing parent directories and keeps data across instances', () => {
      const dbPath = join(tempDir, 'nested', 'assessment.db');
      const first = new Storage(dbPath);
      first.saveSession(session('session-1'));
      first.close();

      const second = new Storage(dbPath);
      expect(second.loadSession('session-1')?.id).toBe('session-1');
      second.close();
    });

    it('backs up every session into one timestamped file', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-01T08:30:15.000Z'));
      storage.saveSession(session('session-2', { createdAt: '2024-05-02T10:00:00.000Z' }));
      storage.saveSession(session('session-1'));

      const directory = join(tempDir, 'backups');
      const file = storage.backup(directory);

      expect(file).toBe(join(directory, 'backup_20240601_083015.json'));
      expect(file !== null && existsSync(file)).toBe(true);

      const content: unknown = JSON.parse(readFileSync(join(directory, 'backup_20240601_083015.json'), 'utf-8'));
      // Ordered by creation time
      expect(Object.keys(content ?? {})).toEqual(['session-1', 'session-2']);
    });

    it('returns null when the backup cannot be written', () => {
      const blocker = join(tempDir, 'not-a-directory');
      writeFileSync(blocker, 'x');

      expect(storage.backup(join(blocker, 'inner'))).toBeNull();
    });
  });
});
