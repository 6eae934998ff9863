/**
 * Assessment session state.
 *
 * A session is a plain document passed explicitly to every operation; these
 * functions mutate it in place while it is in progress and refuse to once it
 * is completed.
 */

import type {
  AnswerInput,
  AssessmentSession,
  Question,
  UserInfo,
} from '../types/index.js';
import { UserInfoSchema } from '../types/index.js';
import { SessionLockedError, ValidationError } from '../utils/errors.js';
import { generateId } from '../utils/id.js';
import { parseAnswer } from './response-normalizer.js';

export type AnswerUpdate = Omit<AnswerInput, 'questionId'>;

/**
 * @throws {ZodError} If any user info field is missing or the sector is unknown
 */
export function createSession(userInfo: UserInfo): AssessmentSession {
  const info = UserInfoSchema.parse(userInfo);
  const now = new Date().toISOString();
  return {
    id: generateId('session'),
    userInfo: info,
    responses: {},
    comments: {},
    status: 'in-progress',
    currentQuestionIndex: 0,
    createdAt: now,
    lastUpdated: now,
  };
}

export function isCompleted(session: AssessmentSession): boolean {
  return session.status === 'completed';
}

function assertWritable(session: AssessmentSession): void {
  if (isCompleted(session)) {
    throw new SessionLockedError(session.id);
  }
}

/**
 * Record, replace or clear the answer and comment for one question.
 *
 * An empty comment removes the stored one; an omitted comment leaves it alone.
 *
 * @throws {SessionLockedError} If the session is completed
 * @throws {ValidationError} If the value is not a valid answer
 */
export function recordAnswer(session: AssessmentSession, question: Question, update: AnswerUpdate): AssessmentSession {
  assertWritable(session);

  if (update.clear) {
    delete session.responses[question.id];
  } else if (update.value !== undefined && update.value !== null) {
    const response = parseAnswer(update.value);
    if (!response) {
      throw new ValidationError(
        `Invalid answer for ${question.id}: expected an integer 1-7 or Yes/No`,
        [{ path: 'value', message: `Unsupported answer: ${String(update.value)}` }]
      );
    }
    session.responses[question.id] = response;
  }

  if (update.comment !== undefined) {
    const comment = update.comment.trim();
    if (comment.length > 0) {
      session.comments[question.id] = comment;
    } else {
      delete session.comments[question.id];
    }
  }

  session.lastUpdated = new Date().toISOString();
  return session;
}

/**
 * Mark the session completed. Completing twice keeps the first completion time.
 */
export function completeSession(session: AssessmentSession): AssessmentSession {
  if (isCompleted(session)) {
    return session;
  }
  const now = new Date().toISOString();
  session.status = 'completed';
  session.completedAt = now;
  session.lastUpdated = now;
  return session;
}

/**
 * Index of the first unanswered question, or questions.length when all are answered
 */
export function firstUnansweredIndex(session: AssessmentSession, questions: readonly Question[]): number {
  const index = questions.findIndex((question) => session.responses[question.id] === undefined);
  return index === -1 ? questions.length : index;
}

/**
 * Move the resume position to the first unanswered question
 */
export function advance(session: AssessmentSession, questions: readonly Question[]): AssessmentSession {
  assertWritable(session);
  session.currentQuestionIndex = firstUnansweredIndex(session, questions);
  return session;
}

export function nextUnanswered(
  session: AssessmentSession,
  questions: readonly Question[],
  limit = 10
): Question[] {
  return questions.filter((question) => session.responses[question.id] === undefined).slice(0, Math.max(0, limit));
}

/**
 * Stored comments for the given questions, in question order
 */
export function commentsFor(session: AssessmentSession, questionIds: readonly string[]): string[] {
  const comments: string[] = [];
  for (const id of questionIds) {
    const comment = session.comments[id];
    if (comment) {
      comments.push(comment);
    }
  }
  return comments;
}

export function allComments(session: AssessmentSession): string[] {
  return Object.values(session.comments).filter((comment) => comment.trim().length > 0);
}
