/**
 * Lexical sentiment and theme extraction over free-text comments.
 *
 * Advisory only: the results colour narrative text and never touch scores.
 */

import Sentiment from 'sentiment';

import type { SentimentLabel, SentimentSummary } from '../types/index.js';
import themeKeywords from '../../data/theme-keywords.json' with { type: 'json' };

/** Polarity above this is positive, below its negation negative */
export const POLARITY_THRESHOLD = 0.1;

/** AFINN valences run from -5 to +5 */
const MAX_VALENCE = 5;

const MAX_THEMES = 10;

const analyzer = new Sentiment();

/**
 * Polarity of one text in [-1, 1]: the mean valence of the words that carry
 * one, scaled by the lexicon maximum. Text without such words scores 0.
 */
export function scorePolarity(text: string): number {
  const result = analyzer.analyze(text);
  const matched = result.calculation.length;
  if (matched === 0) {
    return 0;
  }
  const polarity = result.score / (matched * MAX_VALENCE);
  return Math.max(-1, Math.min(1, polarity));
}

export function classifyPolarity(polarity: number): SentimentLabel {
  if (polarity > POLARITY_THRESHOLD) return 'positive';
  if (polarity < -POLARITY_THRESHOLD) return 'negative';
  return 'neutral';
}

export function analyzeSentiment(texts: readonly string[]): SentimentSummary {
  const comments = texts.map((text) => text.trim()).filter((text) => text.length > 0);
  if (comments.length === 0) {
    return {
      overall: 'neutral',
      polarity: 0,
      positiveCount: 0,
      negativeCount: 0,
      neutralCount: 0,
      total: 0,
    };
  }

  const counts: Record<SentimentLabel, number> = { positive: 0, negative: 0, neutral: 0 };
  let sum = 0;
  for (const comment of comments) {
    const polarity = scorePolarity(comment);
    counts[classifyPolarity(polarity)] += 1;
    sum += polarity;
  }

  const polarity = sum / comments.length;
  return {
    overall: classifyPolarity(polarity),
    polarity,
    positiveCount: counts.positive,
    negativeCount: counts.negative,
    neutralCount: counts.neutral,
    total: comments.length,
  };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function titleCase(text: string): string {
  return text.replace(/[a-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

/**
 * Domain keywords mentioned in the comments, in keyword-list order
 */
export function extractThemes(texts: readonly string[], keywords: readonly string[] = themeKeywords): string[] {
  const combined = texts.join(' ').toLowerCase();
  if (combined.trim().length === 0) {
    return [];
  }

  return keywords
    .filter((keyword) => new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}\\b`).test(combined))
    .slice(0, MAX_THEMES)
    .map(titleCase);
}
