/**
 * Insight Summarizer
 *
 * Turns scores and comments into narrative text. Two strategies:
 * - template: deterministic, always available
 * - generated: an external text generator, chosen per call when one is
 *   configured and reports itself available
 *
 * A failed or empty generation is logged and answered with the template.
 */

import type {
  AssessmentScores,
  CategoryScore,
  MaturityTier,
  Narrative,
  PerformanceInsights,
  SentimentLabel,
  SentimentSummary,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { GenerateOptions, NarrativeGenerator } from './llm-client.js';
import {
  maturityTier,
  strongest,
  strongestSubfactor,
  weakest,
  weakestSubfactor,
} from './performance-insights.js';
import { analyzeSentiment } from './sentiment.js';

const TIER_DESCRIPTIONS: Readonly<Record<MaturityTier, string>> = {
  initial: 'is at an initial stage of maturity',
  basic: 'shows a basic level of maturity',
  intermediate: 'shows an intermediate level of maturity',
  advanced: 'shows an advanced level of maturity',
};

const SENTIMENT_DESCRIPTIONS: Readonly<Record<SentimentLabel, string>> = {
  positive: 'a positive attitude',
  negative: 'some concerns',
  neutral: 'a balanced view',
};

const CATEGORY_SYSTEM_PROMPT =
  'You are an expert in knowledge valorisation and industry-academia collaboration. ' +
  'Write professional insights grounded in self-assessment data.';

const SUMMARY_SYSTEM_PROMPT =
  'You are a senior consultant specialising in knowledge valorisation. ' +
  'Write strategic, actionable executive summaries.';

const CATEGORY_GENERATION: GenerateOptions = {
  maxTokens: 500,
  temperature: 0.7,
  systemPrompt: CATEGORY_SYSTEM_PROMPT,
};

const SUMMARY_GENERATION: GenerateOptions = {
  maxTokens: 600,
  temperature: 0.7,
  systemPrompt: SUMMARY_SYSTEM_PROMPT,
};

function fmt(score: number): string {
  return score.toFixed(2);
}

function performanceLevel(score: number): string {
  if (score >= 6) return 'shows excellent performance';
  if (score >= 5) return 'shows good performance';
  if (score >= 4) return 'shows average performance';
  return 'has significant room for improvement';
}

function joinComments(comments: readonly string[]): string {
  const nonEmpty = comments.map((comment) => comment.trim()).filter((comment) => comment.length > 0);
  return nonEmpty.length > 0 ? nonEmpty.join('; ') : 'No comments provided';
}

/**
 * Deterministic narrative for one category
 */
export function templateCategoryNarrative(category: CategoryScore, sentiment: SentimentSummary): string {
  const lines = [
    `Current situation: ${category.name} ${performanceLevel(category.score)} with a score of ${fmt(category.score)}/7. ` +
      `Comments reflect ${SENTIMENT_DESCRIPTIONS[sentiment.overall]} towards this area.`,
  ];

  const best = strongestSubfactor(category);
  const worst = weakestSubfactor(category);
  if (best && worst) {
    lines.push(
      `Strengths: the ${best.name.toLowerCase()} factor stands out (${fmt(best.score)}/7).`,
      `Areas for improvement: the ${worst.name.toLowerCase()} factor offers the most room to develop (${fmt(worst.score)}/7).`,
      `Recommendations: strengthen ${worst.name.toLowerCase()} aspects while sustaining ${best.name.toLowerCase()} ones.`
    );
  }

  return lines.join('\n\n');
}

/**
 * Deterministic executive summary for a whole assessment
 */
export function templateExecutiveSummary(
  scores: AssessmentScores,
  sentiment: SentimentSummary,
  insights: PerformanceInsights
): string {
  const tier = maturityTier(scores.overall);
  const lines = [
    `Overall assessment: the organization ${TIER_DESCRIPTIONS[tier]} in knowledge valorisation, ` +
      `with an overall score of ${fmt(scores.overall)}/7.`,
  ];

  const best = strongest(scores.categories);
  const worst = weakest(scores.categories);
  if (best && worst) {
    lines.push(
      `Main strength: ${best.name} (${fmt(best.score)}/7).`,
      `Priority for improvement: ${worst.name} (${fmt(worst.score)}/7).`
    );
  }

  lines.push(`Comments reflect ${SENTIMENT_DESCRIPTIONS[sentiment.overall]} towards collaboration.`);

  const { benchmark } = insights;
  const relation =
    benchmark.performance === 'equal' ? 'in line with' : `${fmt(Math.abs(benchmark.difference))} points ${benchmark.performance}`;
  lines.push(`Benchmark: ${relation} the ${benchmark.benchmarkName} (${fmt(benchmark.benchmarkScore)}/7).`);

  return lines.join('\n\n');
}

export function buildCategoryPrompt(
  category: CategoryScore,
  sentiment: SentimentSummary,
  comments: readonly string[]
): string {
  const subfactorLines = category.subfactors.map((subfactor) => `- ${subfactor.name}: ${fmt(subfactor.score)}/7`);

  return [
    `Self-assessment results for the category "${category.name}":`,
    '',
    `Category score: ${fmt(category.score)}/7`,
    'Sub-factor scores:',
    ...subfactorLines,
    `Overall sentiment: ${sentiment.overall}`,
    `Polarity: ${fmt(sentiment.polarity)}`,
    `Comments: ${joinComments(comments)}`,
    '',
    'Write a professional narrative insight covering:',
    '1. The current situation',
    '2. Specific strengths',
    '3. Challenges and barriers',
    '4. Concrete improvement opportunities',
    '5. Specific, actionable recommendations',
    '',
    'Length: 150-200 words.',
  ].join('\n');
}

export function buildSummaryPrompt(
  scores: AssessmentScores,
  sentiment: SentimentSummary,
  insights: PerformanceInsights,
  comments: readonly string[]
): string {
  const categoryLines = scores.categories.map((category) => `- ${category.name}: ${fmt(category.score)}/7`);
  const best = strongest(scores.categories);
  const worst = weakest(scores.categories);

  return [
    'Write an executive summary for a knowledge valorisation self-assessment with these results:',
    '',
    `Overall score: ${fmt(scores.overall)}/7 (${insights.maturityTier} maturity)`,
    'Category scores:',
    ...categoryLines,
    ...(best ? [`Strongest category: ${best.name}`] : []),
    ...(worst ? [`Category to improve: ${worst.name}`] : []),
    `Overall sentiment: ${sentiment.overall}`,
    `Polarity: ${fmt(sentiment.polarity)}`,
    `Performance vs ${insights.benchmark.benchmarkName}: ${insights.benchmark.performance}`,
    `Comments: ${joinComments(comments)}`,
    '',
    'Include:',
    '1. An overall assessment of the maturity level',
    '2. The top three strengths',
    '3. The top three areas for improvement',
    '4. Concrete strategic recommendations',
    '',
    'Length: 200-250 words.',
  ].join('\n');
}

export class InsightSummarizer {
  constructor(private readonly generator?: NarrativeGenerator) {}

  /** Whether the next call would try external generation */
  get generationAvailable(): boolean {
    return this.generator?.isAvailable() ?? false;
  }

  async summarizeCategory(category: CategoryScore, comments: readonly string[] = []): Promise<Narrative> {
    const sentiment = analyzeSentiment(comments);
    const template = (): string => templateCategoryNarrative(category, sentiment);

    return this.narrate(
      () => buildCategoryPrompt(category, sentiment, comments),
      CATEGORY_GENERATION,
      template,
      { category: category.name }
    );
  }

  async summarizeAssessment(
    scores: AssessmentScores,
    comments: readonly string[],
    insights: PerformanceInsights
  ): Promise<Narrative> {
    const sentiment = analyzeSentiment(comments);
    const template = (): string => templateExecutiveSummary(scores, sentiment, insights);

    return this.narrate(
      () => buildSummaryPrompt(scores, sentiment, insights, comments),
      SUMMARY_GENERATION,
      template,
      { overall: scores.overall }
    );
  }

  private async narrate(
    prompt: () => string,
    options: GenerateOptions,
    template: () => string,
    context: Record<string, unknown>
  ): Promise<Narrative> {
    const generator = this.generator;
    if (!generator || !generator.isAvailable()) {
      return { text: template(), strategy: 'template' };
    }

    try {
      const response = await generator.generate(prompt(), options);
      const text = response.content.trim();
      if (text.length > 0) {
        return { text, strategy: 'generated' };
      }
      logger.warn('Narrative generation returned no text, using template', undefined, context);
    } catch (error) {
      logger.warn('Narrative generation failed, using template', error, context);
    }

    return { text: template(), strategy: 'template' };
  }
}
