import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { Services } from '../services/index.js';
import { UserInfoSchema } from '../types/index.js';
import { createSession, nextUnanswered } from '../engines/assessment-session.js';
import { logger } from '../utils/logger.js';
import { questionView, type QuestionView } from './shared.js';

const FIRST_BATCH_SIZE = 5;

/**
 * assessment_start - Register a respondent and open a session
 */
export const startTool: Tool = {
  name: 'assessment_start',
  description: `Start a knowledge valorisation self-assessment.

Records who is answering and opens a session. All four fields are required.

## Example

\`\`\`json
{
  "name": "Ada Rossi",
  "organization": "Example University",
  "role": "Technology transfer officer",
  "sector": "University"
}
\`\`\`

## What You Get Back

- **sessionId** for every later call
- **questionnaire** - categories and sub-factors with question counts
- **nextQuestions** - the first questions to put to the respondent
- **nextStep** - what to do next`,

  inputSchema: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Respondent name' },
      organization: { type: 'string', description: 'Organization name' },
      role: { type: 'string', description: 'Role within the organization' },
      sector: {
        type: 'string',
        enum: ['University', 'Research Centre', 'Private Company', 'Public Body', 'Other'],
        description: 'Organization sector',
      },
    },
    required: ['name', 'organization', 'role', 'sector'],
  },
};

const StartInputSchema = UserInfoSchema;

export type StartInput = z.infer<typeof StartInputSchema>;

export interface StartResult {
  sessionId: string;
  status: 'in-progress';
  persisted: boolean;
  questionnaire: {
    source: 'file' | 'fallback';
    totalQuestions: number;
    categories: Record<string, Record<string, number>>;
  };
  nextQuestions: QuestionView[];
  nextStep: string;
}

export function handleStart(
  args: Record<string, unknown>,
  services: Services
): StartResult {
  const input = StartInputSchema.parse(args);
  const { storage, questionBank } = services;

  const session = createSession(input);
  logger.updateContext({ sessionId: session.id });

  const persisted = storage.saveSession(session);
  if (!persisted) {
    logger.warn('New session could not be saved', undefined, { sessionId: session.id });
  }

  logger.info('Assessment session started', {
    sector: session.userInfo.sector,
    questionSource: questionBank.source,
    totalQuestions: questionBank.questions.length,
  });

  return {
    sessionId: session.id,
    status: 'in-progress',
    persisted,
    questionnaire: {
      source: questionBank.source,
      totalQuestions: questionBank.questions.length,
      categories: questionBank.organizer.summary(),
    },
    nextQuestions: nextUnanswered(session, questionBank.questions, FIRST_BATCH_SIZE).map((question) =>
      questionView(question)
    ),
    nextStep: persisted
      ? 'Ask the respondent the next questions and record answers with assessment_answer.'
      : 'The session could not be saved; check storage with assessment_health before continuing.',
  };
}
