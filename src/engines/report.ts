/**
 * Assessment report: everything derived from one session, plus the JSON and
 * CSV export formats.
 */

import type {
  AssessmentScores,
  AssessmentSession,
  PerformanceInsights,
  Question,
  SentimentSummary,
  SessionStatus,
  UserInfo,
} from '../types/index.js';
import { toCsv } from '../utils/csv.js';
import { allComments } from './assessment-session.js';
import { performanceInsights, type Benchmark } from './performance-insights.js';
import type { QuestionOrganizer } from './question-organizer.js';
import { formatResponse } from './response-normalizer.js';
import { computeScores, scoreRows } from './score-aggregator.js';
import { analyzeSentiment, extractThemes } from './sentiment.js';

export interface AssessmentReport {
  sessionId: string;
  userInfo: UserInfo;
  status: SessionStatus;
  scores: AssessmentScores;
  insights: PerformanceInsights;
  sentiment: SentimentSummary;
  themes: string[];
}

export interface ReportInput {
  questions: readonly Question[];
  organizer: QuestionOrganizer;
}

export const RESPONSE_CSV_HEADER = ['question_id', 'response', 'comment', 'timestamp'] as const;

export const SCORE_CSV_HEADER = [
  'category',
  'category_name',
  'subfactor',
  'subfactor_name',
  'subfactor_score',
  'category_score',
  'overall_score',
] as const;

export function buildReport(session: AssessmentSession, bank: ReportInput, benchmark: Benchmark): AssessmentReport {
  const scores = computeScores(bank.questions, bank.organizer, session.responses);
  const comments = allComments(session);
  return {
    sessionId: session.id,
    userInfo: session.userInfo,
    status: session.status,
    scores,
    insights: performanceInsights(scores, benchmark),
    sentiment: analyzeSentiment(comments),
    themes: extractThemes(comments),
  };
}

/**
 * Full session dump: user info, scores, responses, comments and export time
 */
export function exportJson(session: AssessmentSession, scores: AssessmentScores, exportedAt: string): string {
  const responses: Record<string, number | 'Yes' | 'No'> = {};
  for (const [id, response] of Object.entries(session.responses)) {
    responses[id] = formatResponse(response);
  }

  return JSON.stringify(
    {
      sessionId: session.id,
      userInfo: session.userInfo,
      status: session.status,
      scores,
      responses,
      comments: session.comments,
      createdAt: session.createdAt,
      lastUpdated: session.lastUpdated,
      ...(session.completedAt !== undefined && { completedAt: session.completedAt }),
      exportedAt,
    },
    null,
    2
  );
}

/**
 * One row per answered question, in question order
 */
export function responsesToCsv(
  session: AssessmentSession,
  questions: readonly Question[],
  exportedAt: string
): string {
  const rows = questions.flatMap((question) => {
    const response = session.responses[question.id];
    if (!response) {
      return [];
    }
    return [[question.id, formatResponse(response), session.comments[question.id] ?? '', exportedAt]];
  });
  return toCsv(RESPONSE_CSV_HEADER, rows);
}

export function scoresToCsv(scores: AssessmentScores): string {
  const rows = scoreRows(scores).map((row) => [
    row.category,
    row.categoryName,
    row.subfactor,
    row.subfactorName,
    row.subfactorScore.toFixed(2),
    row.categoryScore.toFixed(2),
    row.overallScore.toFixed(2),
  ]);
  return toCsv(SCORE_CSV_HEADER, rows);
}
