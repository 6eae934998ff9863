/**
 * Score Aggregator
 *
 * Pure functions from (questions, grouping, responses) to scores:
 * - sub-factor: mean of answered, normalized responses (neutral if none answered)
 * - category: unweighted mean of its sub-factor scores
 * - overall: unweighted mean of category scores
 *
 * Category and overall means ignore how many questions were answered in each
 * group, so a sub-factor with one answer weighs as much as one with ten.
 */

import type {
  AssessmentScores,
  CategoryScore,
  CompletionStats,
  Question,
  ResponseValue,
  ScoreRow,
  SubfactorScore,
} from '../types/index.js';
import type { OrganizedSubfactor, QuestionOrganizer } from './question-organizer.js';
import { NEUTRAL_SCORE, normalizeResponse } from './response-normalizer.js';

export type ResponseMap = Readonly<Record<string, ResponseValue | null | undefined>>;

export function mean(values: readonly number[], fallback: number = NEUTRAL_SCORE): number {
  if (values.length === 0) {
    return fallback;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

function hasResponse(responses: ResponseMap, questionId: string): boolean {
  const response = responses[questionId];
  return response !== null && response !== undefined;
}

export function scoreSubfactor(group: OrganizedSubfactor, responses: ResponseMap): SubfactorScore {
  const values: number[] = [];
  for (const question of group.questions) {
    if (hasResponse(responses, question.id)) {
      values.push(normalizeResponse(question, responses[question.id]));
    }
  }

  return {
    code: group.code,
    name: group.name,
    score: mean(values),
    answered: values.length,
    total: group.questions.length,
  };
}

/**
 * Answered questions (comments do not count) over the full question set
 */
export function computeCompletion(questions: readonly Question[], responses: ResponseMap): CompletionStats {
  const answered = questions.filter((question) => hasResponse(responses, question.id)).length;
  const total = questions.length;
  return {
    answered,
    total,
    ratio: total > 0 ? answered / total : 0,
  };
}

export function computeScores(
  questions: readonly Question[],
  organizer: QuestionOrganizer,
  responses: ResponseMap
): AssessmentScores {
  const categories: CategoryScore[] = organizer.organized().map((category) => {
    const subfactors = category.subfactors.map((group) => scoreSubfactor(group, responses));
    return {
      label: category.label,
      name: category.name,
      score: mean(subfactors.map((entry) => entry.score)),
      subfactors,
    };
  });

  const byCode = new Map<string, number[]>();
  for (const category of categories) {
    for (const subfactor of category.subfactors) {
      const scores = byCode.get(subfactor.code) ?? [];
      scores.push(subfactor.score);
      byCode.set(subfactor.code, scores);
    }
  }
  const subfactorSummary: Record<string, number> = {};
  for (const [code, scores] of byCode) {
    subfactorSummary[code] = mean(scores);
  }

  return {
    categories,
    subfactorSummary,
    overall: mean(categories.map((category) => category.score)),
    completion: computeCompletion(questions, responses),
  };
}

/**
 * One row per (category, sub-factor) for tabular export
 */
export function scoreRows(scores: AssessmentScores): ScoreRow[] {
  return scores.categories.flatMap((category) =>
    category.subfactors.map((subfactor) => ({
      category: category.label,
      categoryName: category.name,
      subfactor: subfactor.code,
      subfactorName: subfactor.name,
      subfactorScore: subfactor.score,
      categoryScore: category.score,
      overallScore: scores.overall,
    }))
  );
}
