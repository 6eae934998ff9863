import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { Services } from '../services/index.js';
import { AnswerInputSchema, type CompletionStats, type Question } from '../types/index.js';
import { advance, nextUnanswered, recordAnswer } from '../engines/assessment-session.js';
import { computeCompletion } from '../engines/score-aggregator.js';
import { logger } from '../utils/logger.js';
import {
  questionView,
  requireQuestion,
  requireSession,
  SessionIdSchema,
  type QuestionView,
} from './shared.js';

const NEXT_BATCH_SIZE = 5;

/**
 * assessment_answer - Record answers and comments for a session
 */
export const answerTool: Tool = {
  name: 'assessment_answer',
  description: `Record one or more answers in an assessment session.

Likert questions take an integer 1-7 (1 = strongly disagree, 7 = strongly agree).
Yes/no questions take "Yes", "No" or a boolean. A comment may accompany any
answer; an empty comment removes the stored one. Set "clear" to withdraw an answer.

The batch is applied as a whole: if any entry is invalid nothing is recorded.

## Example

\`\`\`json
{
  "sessionId": "session-xxx",
  "answers": [
    { "questionId": "q_0", "value": 6, "comment": "Joint labs with two industrial partners" },
    { "questionId": "q_1", "value": "Yes" }
  ]
}
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      sessionId: { type: 'string', description: 'Session ID from assessment_start' },
      answers: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            questionId: { type: 'string' },
            value: {
              description: 'Integer 1-7, "Yes"/"No" or a boolean',
              oneOf: [{ type: 'number' }, { type: 'string' }, { type: 'boolean' }, { type: 'null' }],
            },
            comment: { type: 'string', description: 'Optional free-text comment' },
            clear: { type: 'boolean', description: 'Withdraw the recorded answer' },
          },
          required: ['questionId'],
        },
        minItems: 1,
      },
    },
    required: ['sessionId', 'answers'],
  },
};

const AnswerToolInputSchema = z.object({
  sessionId: SessionIdSchema,
  answers: z.array(AnswerInputSchema).min(1),
});

export interface AnswerResult {
  sessionId: string;
  recorded: number;
  persisted: boolean;
  completion: CompletionStats;
  nextQuestions: QuestionView[];
  nextStep: string;
}

export function handleAnswer(
  args: Record<string, unknown>,
  services: Services
): AnswerResult {
  const input = AnswerToolInputSchema.parse(args);
  const { storage, questionBank } = services;

  const stored = requireSession(storage, input.sessionId);
  const byId = new Map<string, Question>(questionBank.questions.map((question) => [question.id, question]));

  // Applied to a copy so a bad entry leaves the stored session untouched
  const session = structuredClone(stored);
  for (const { questionId, ...update } of input.answers) {
    recordAnswer(session, requireQuestion(byId, questionId), update);
  }
  advance(session, questionBank.questions);

  const persisted = storage.saveSession(session);
  const completion = computeCompletion(questionBank.questions, session.responses);

  logger.info('Answers recorded', {
    recorded: input.answers.length,
    answered: completion.answered,
    total: completion.total,
    persisted,
  });

  let nextStep: string;
  if (!persisted) {
    nextStep = 'The answers could not be saved; retry the same call.';
  } else if (completion.answered === completion.total) {
    nextStep = 'All questions are answered. Call assessment_complete to finish the assessment.';
  } else {
    nextStep = 'Ask the next questions, or call assessment_complete to finish early.';
  }

  return {
    sessionId: session.id,
    recorded: input.answers.length,
    persisted,
    completion,
    nextQuestions: nextUnanswered(session, questionBank.questions, NEXT_BATCH_SIZE).map((question) =>
      questionView(question, session)
    ),
    nextStep,
  };
}
