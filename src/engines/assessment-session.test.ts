import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { ZodError } from 'zod';

import { UserInfoSchema, type UserInfo } from '../types/index.js';
import { SessionLockedError, ValidationError } from '../utils/errors.js';
import { getFallbackQuestions } from './question-loader.js';
import {
  advance,
  allComments,
  commentsFor,
  completeSession,
  createSession,
  firstUnansweredIndex,
  nextUnanswered,
  recordAnswer,
} from './assessment-session.js';

const USER: UserInfo = {
  name: 'Ada Rossi',
  organization: 'Example University',
  role: 'Technology transfer officer',
  sector: 'University',
};

const questions = getFallbackQuestions();

function question(index: number) {
  const found = questions[index];
  if (!found) {
    throw new Error(`No fallback question at ${index}`);
  }
  return found;
}

describe('assessment session', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T10:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('createSession', () => {
    it('opens an empty in-progress session', () => {
      const session = createSession(USER);

      expect(session.id).toMatch(/^session-[a-z0-9]+-[A-Za-z0-9_-]{12}$/);
      expect(session.userInfo).toEqual(USER);
      expect(session.responses).toEqual({});
      expect(session.comments).toEqual({});
      expect(session.status).toBe('in-progress');
      expect(session.currentQuestionIndex).toBe(0);
      expect(session.createdAt).toBe('2024-05-01T10:00:00.000Z');
      expect(session.lastUpdated).toBe('2024-05-01T10:00:00.000Z');
      expect(session.completedAt).toBeUndefined();
    });

    it('trims user info fields', () => {
      const session = createSession({ ...USER, name: '  Ada Rossi  ' });
      expect(session.userInfo.name).toBe('Ada Rossi');
    });

    it('rejects blank fields', () => {
      const result = UserInfoSchema.safeParse({ ...USER, role: '   ' });
      expect(result.success ? [] : result.error.issues.map((issue) => issue.message)).toEqual(['role is required']);
      expect(() => createSession({ ...USER, role: '   ' })).toThrow(ZodError);
    });
  });

  describe('recordAnswer', () => {
    it('stores Likert and yes/no answers as typed variants', () => {
      const session = createSession(USER);
      recordAnswer(session, question(0), { value: 6 });
      recordAnswer(session, question(1), { value: 'yes' });

      expect(session.responses).toEqual({
        q_0: { kind: 'likert', value: 6 },
        q_1: { kind: 'yesno', value: true },
      });
    });

    it('replaces an earlier answer', () => {
      const session = createSession(USER);
      recordAnswer(session, question(0), { value: 2 });
      recordAnswer(session, question(0), { value: '5' });
      expect(session.responses['q_0']).toEqual({ kind: 'likert', value: 5 });
    });

    it('rejects values outside the scale', () => {
      const session = createSession(USER);
      expect(() => recordAnswer(session, question(0), { value: 8 })).toThrow(ValidationError);
      expect(() => recordAnswer(session, question(0), { value: 'maybe' })).toThrow(
        'Invalid answer for q_0: expected an integer 1-7 or Yes/No'
      );
      expect(session.responses).toEqual({});
    });

    it('clears an answer', () => {
      const session = createSession(USER);
      recordAnswer(session, question(0), { value: 3 });
      recordAnswer(session, question(0), { clear: true });
      expect(session.responses).toEqual({});
    });

    it('stores trimmed comments and removes them when emptied', () => {
      const session = createSession(USER);
      recordAnswer(session, question(0), { comment: '  Funding is scarce  ' });
      expect(session.comments).toEqual({ q_0: 'Funding is scarce' });

      recordAnswer(session, question(0), { value: 4 });
      expect(session.comments).toEqual({ q_0: 'Funding is scarce' });

      recordAnswer(session, question(0), { comment: '   ' });
      expect(session.comments).toEqual({});
    });

    it('updates lastUpdated', () => {
      const session = createSession(USER);
      vi.setSystemTime(new Date('2024-05-01T10:05:00.000Z'));
      recordAnswer(session, question(0), { value: 4 });
      expect(session.lastUpdated).toBe('2024-05-01T10:05:00.000Z');
      expect(session.createdAt).toBe('2024-05-01T10:00:00.000Z');
    });

    it('refuses to change a completed session', () => {
      const session = completeSession(createSession(USER));
      expect(() => recordAnswer(session, question(0), { value: 4 })).toThrow(SessionLockedError);
    });
  });

  describe('completeSession', () => {
    it('marks the session completed once', () => {
      const session = createSession(USER);
      vi.setSystemTime(new Date('2024-05-01T11:00:00.000Z'));
      completeSession(session);

      expect(session.status).toBe('completed');
      expect(session.completedAt).toBe('2024-05-01T11:00:00.000Z');

      vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
      completeSession(session);
      expect(session.completedAt).toBe('2024-05-01T11:00:00.000Z');
    });
  });

  describe('navigation', () => {
    it('finds the first unanswered question', () => {
      const session = createSession(USER);
      recordAnswer(session, question(0), { value: 4 });
      recordAnswer(session, question(2), { value: 4 });

      expect(firstUnansweredIndex(session, questions)).toBe(1);
      expect(advance(session, questions).currentQuestionIndex).toBe(1);
      expect(nextUnanswered(session, questions, 2).map((q) => q.id)).toEqual(['q_1', 'q_3']);
    });

    it('points past the end when everything is answered', () => {
      const session = createSession(USER);
      for (const entry of questions) {
        recordAnswer(session, entry, { value: entry.type === 'likert' ? 5 : 'No' });
      }

      expect(firstUnansweredIndex(session, questions)).toBe(questions.length);
      expect(nextUnanswered(session, questions)).toEqual([]);
    });

    it('does not move a completed session', () => {
      const session = completeSession(createSession(USER));
      expect(() => advance(session, questions)).toThrow(SessionLockedError);
    });
  });

  describe('comments', () => {
    it('returns comments for the given questions in the given order', () => {
      const session = createSession(USER);
      recordAnswer(session, question(0), { comment: 'First' });
      recordAnswer(session, question(3), { comment: 'Second' });

      expect(commentsFor(session, ['q_3', 'q_1', 'q_0'])).toEqual(['Second', 'First']);
      expect(allComments(session)).toEqual(['First', 'Second']);
    });
  });
});
