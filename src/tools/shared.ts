import { z } from 'zod';

import type { Storage } from '../storage/index.js';
import type { AssessmentSession, Question } from '../types/index.js';
import { formatResponse } from '../engines/response-normalizer.js';
import { NotFoundError } from '../utils/errors.js';
import { isSafeId } from '../utils/id.js';

export const SessionIdSchema = z.string().min(1).refine(isSafeId, {
  message: 'sessionId may only contain letters, digits, "-" and "_"',
});

/**
 * Load a session or fail with NOT_FOUND
 */
export function requireSession(storage: Storage, sessionId: string): AssessmentSession {
  const session = storage.loadSession(sessionId);
  if (!session) {
    throw new NotFoundError('Session', sessionId);
  }
  return session;
}

export function requireQuestion(byId: ReadonlyMap<string, Question>, questionId: string): Question {
  const question = byId.get(questionId);
  if (!question) {
    throw new NotFoundError('Question', questionId);
  }
  return question;
}

/**
 * Question as shown to a client, with the session's answer when there is one
 */
export interface QuestionView {
  id: string;
  question: string;
  type: Question['type'];
  category: string | null;
  subfactor: string | null;
  actor: string | null;
  options: Array<string | number>;
  answer?: number | 'Yes' | 'No';
  comment?: string;
}

export function questionView(question: Question, session?: AssessmentSession): QuestionView {
  const view: QuestionView = {
    id: question.id,
    question: question.question,
    type: question.type,
    category: question.category,
    subfactor: question.subfactor,
    actor: question.actor,
    options: question.type === 'likert' ? [...question.scale] : [...question.options],
  };

  const response = session?.responses[question.id];
  if (response) {
    view.answer = formatResponse(response);
  }
  const comment = session?.comments[question.id];
  if (comment) {
    view.comment = comment;
  }
  return view;
}
