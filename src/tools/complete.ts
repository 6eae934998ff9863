import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { Services } from '../services/index.js';
import type { CompletionStats, MaturityTier } from '../types/index.js';
import { completeSession } from '../engines/assessment-session.js';
import { maturityTier } from '../engines/performance-insights.js';
import { computeScores } from '../engines/score-aggregator.js';
import { logger } from '../utils/logger.js';
import { requireSession, SessionIdSchema } from './shared.js';

/**
 * assessment_complete - Close a session for further answers
 */
export const completeTool: Tool = {
  name: 'assessment_complete',
  description: `Complete an assessment session.

After completion the session is read-only: further answers are rejected.
Unanswered questions are left out of the scores; a sub-factor with no answers
scores the neutral 4. Completing twice is harmless.

## Example

\`\`\`json
{ "sessionId": "session-xxx" }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      sessionId: { type: 'string', description: 'Session ID from assessment_start' },
    },
    required: ['sessionId'],
  },
};

const CompleteInputSchema = z.object({
  sessionId: SessionIdSchema,
});

export interface CompleteResult {
  sessionId: string;
  status: 'completed';
  completedAt: string | undefined;
  persisted: boolean;
  overall: number;
  maturityTier: MaturityTier;
  completion: CompletionStats;
  nextStep: string;
}

export function handleComplete(
  args: Record<string, unknown>,
  services: Services
): CompleteResult {
  const input = CompleteInputSchema.parse(args);
  const { storage, questionBank } = services;

  const session = requireSession(storage, input.sessionId);
  const alreadyCompleted = session.status === 'completed';
  completeSession(session);

  const persisted = alreadyCompleted ? true : storage.saveSession(session);
  const scores = computeScores(questionBank.questions, questionBank.organizer, session.responses);

  logger.info('Assessment completed', {
    alreadyCompleted,
    overall: scores.overall,
    answered: scores.completion.answered,
    persisted,
  });

  return {
    sessionId: session.id,
    status: 'completed',
    completedAt: session.completedAt,
    persisted,
    overall: scores.overall,
    maturityTier: maturityTier(scores.overall),
    completion: scores.completion,
    nextStep: persisted
      ? 'Call assessment_results for scores, insights and narratives.'
      : 'The completed session could not be saved; retry assessment_complete.',
  };
}
