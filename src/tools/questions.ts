import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { Services } from '../services/index.js';
import type { AssessmentSession, CompletionStats } from '../types/index.js';
import { computeCompletion } from '../engines/score-aggregator.js';
import { questionView, requireSession, SessionIdSchema, type QuestionView } from './shared.js';

/**
 * assessment_questions - Browse the questionnaire, optionally against a session
 */
export const questionsTool: Tool = {
  name: 'assessment_questions',
  description: `List assessment questions grouped by category and sub-factor.

Without a session this is the bare questionnaire. With a sessionId each
question carries the recorded answer and comment, and completion is reported.

## Examples

Whole questionnaire:
\`\`\`json
{}
\`\`\`

Unanswered questions of one category:
\`\`\`json
{ "sessionId": "session-xxx", "category": "n.1 Academia-Industry joint research & mobility", "unansweredOnly": true }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      sessionId: {
        type: 'string',
        description: 'Include answers from this session',
      },
      category: {
        type: 'string',
        description: 'Only this category (label as listed)',
      },
      unansweredOnly: {
        type: 'boolean',
        description: 'Skip answered questions (requires sessionId)',
        default: false,
      },
    },
  },
};

const QuestionsInputSchema = z.object({
  sessionId: SessionIdSchema.optional(),
  category: z.string().min(1).optional(),
  unansweredOnly: z.boolean().optional(),
});

interface SubfactorView {
  code: string;
  name: string;
  questions: QuestionView[];
}

interface CategoryView {
  label: string;
  name: string;
  subfactors: SubfactorView[];
}

export interface QuestionsResult {
  source: 'file' | 'fallback';
  categories: CategoryView[];
  questionCount: number;
  completion?: CompletionStats;
}

export function handleQuestions(
  args: Record<string, unknown>,
  services: Services
): QuestionsResult {
  const input = QuestionsInputSchema.parse(args);
  const { questionBank, storage } = services;

  const session: AssessmentSession | undefined =
    input.sessionId !== undefined ? requireSession(storage, input.sessionId) : undefined;
  const skipAnswered = input.unansweredOnly === true;
  const isAnswered = (questionId: string): boolean => session?.responses[questionId] !== undefined;

  const categories: CategoryView[] = [];
  let questionCount = 0;

  for (const category of questionBank.organizer.organized()) {
    if (input.category !== undefined && category.label !== input.category) {
      continue;
    }

    const subfactors: SubfactorView[] = [];
    for (const group of category.subfactors) {
      const questions = group.questions
        .filter((question) => !(skipAnswered && isAnswered(question.id)))
        .map((question) => questionView(question, session));
      if (questions.length > 0) {
        subfactors.push({ code: group.code, name: group.name, questions });
        questionCount += questions.length;
      }
    }

    if (subfactors.length > 0) {
      categories.push({ label: category.label, name: category.name, subfactors });
    }
  }

  return {
    source: questionBank.source,
    categories,
    questionCount,
    ...(session && { completion: computeCompletion(questionBank.questions, session.responses) }),
  };
}
