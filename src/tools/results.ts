import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { Services } from '../services/index.js';
import type { Narrative } from '../types/index.js';
import { commentsFor, allComments } from '../engines/assessment-session.js';
import { buildReport, type AssessmentReport } from '../engines/report.js';
import { logger } from '../utils/logger.js';
import { requireSession, SessionIdSchema } from './shared.js';

/**
 * assessment_results - Scores, insights and narratives for a session
 */
export const resultsTool: Tool = {
  name: 'assessment_results',
  description: `Compute the results of an assessment session.

Works on in-progress sessions too; scores reflect the answers recorded so far.

## What You Get Back

- **scores** - per sub-factor, per category and overall (1-7 scale) plus completion
- **insights** - maturity tier, strengths (> 6), weaknesses (< 5), benchmark comparison
- **sentiment** and **themes** drawn from the comments
- **narratives** - one per category and an executive summary, written by the
  configured text generator or from templates (see each narrative's "strategy")

## Example

\`\`\`json
{ "sessionId": "session-xxx", "narratives": true }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      sessionId: { type: 'string', description: 'Session ID from assessment_start' },
      narratives: {
        type: 'boolean',
        description: 'Generate narratives (default true)',
        default: true,
      },
    },
    required: ['sessionId'],
  },
};

const ResultsInputSchema = z.object({
  sessionId: SessionIdSchema,
  narratives: z.boolean().default(true),
});

export interface ResultsNarratives {
  categories: Array<{ category: string; narrative: Narrative }>;
  executiveSummary: Narrative;
}

export interface ResultsResult extends AssessmentReport {
  narratives?: ResultsNarratives;
}

export async function handleResults(
  args: Record<string, unknown>,
  services: Services
): Promise<ResultsResult> {
  const input = ResultsInputSchema.parse(args);
  const { storage, questionBank, benchmark, summarizer } = services;

  const session = requireSession(storage, input.sessionId);
  const report = buildReport(session, questionBank, benchmark);

  if (!input.narratives) {
    return report;
  }

  const categories: ResultsNarratives['categories'] = [];
  for (const category of report.scores.categories) {
    const group = questionBank.organizer.getCategory(category.label);
    const questionIds = group
      ? group.subfactors.flatMap((subfactor) => subfactor.questions.map((question) => question.id))
      : [];
    const narrative = await summarizer.summarizeCategory(category, commentsFor(session, questionIds));
    categories.push({ category: category.name, narrative });
  }

  const executiveSummary = await summarizer.summarizeAssessment(report.scores, allComments(session), report.insights);

  logger.info('Results computed', {
    overall: report.scores.overall,
    categories: categories.length,
    summaryStrategy: executiveSummary.strategy,
  });

  return {
    ...report,
    narratives: { categories, executiveSummary },
  };
}
