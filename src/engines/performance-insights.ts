/**
 * Qualitative labels derived from scores: maturity tier, strongest and
 * weakest areas, and the comparison with a fixed external benchmark.
 */

import { z } from 'zod';

import type {
  AssessmentScores,
  BenchmarkComparison,
  CategoryHighlight,
  CategoryScore,
  MaturityTier,
  PerformanceInsights,
  SubfactorScore,
} from '../types/index.js';
import defaultBenchmarkData from '../../data/benchmark.json' with { type: 'json' };

/** Category scores above this are strengths */
export const STRENGTH_THRESHOLD = 6;
/** Category scores below this are weaknesses */
export const WEAKNESS_THRESHOLD = 5;

export const BenchmarkSchema = z.object({
  name: z.string().min(1),
  overall: z.number().min(1).max(7),
  /** Keyed by category display name */
  categories: z.record(z.number().min(1).max(7)).default({}),
});

export type Benchmark = z.infer<typeof BenchmarkSchema>;

export const DEFAULT_BENCHMARK: Benchmark = BenchmarkSchema.parse(defaultBenchmarkData);

/**
 * < 4 initial, < 5 basic, < 6 intermediate, otherwise advanced
 */
export function maturityTier(score: number): MaturityTier {
  if (score < 4) return 'initial';
  if (score < 5) return 'basic';
  if (score < 6) return 'intermediate';
  return 'advanced';
}

/**
 * Highest-scoring entry; the first one wins ties
 */
export function strongest<T extends { score: number }>(entries: readonly T[]): T | undefined {
  let best: T | undefined;
  for (const entry of entries) {
    if (best === undefined || entry.score > best.score) {
      best = entry;
    }
  }
  return best;
}

/**
 * Lowest-scoring entry; the first one wins ties
 */
export function weakest<T extends { score: number }>(entries: readonly T[]): T | undefined {
  let worst: T | undefined;
  for (const entry of entries) {
    if (worst === undefined || entry.score < worst.score) {
      worst = entry;
    }
  }
  return worst;
}

export function strongestSubfactor(category: CategoryScore): SubfactorScore | undefined {
  return strongest(category.subfactors);
}

export function weakestSubfactor(category: CategoryScore): SubfactorScore | undefined {
  return weakest(category.subfactors);
}

export function compareWithBenchmark(scores: AssessmentScores, benchmark: Benchmark): BenchmarkComparison {
  const difference = scores.overall - benchmark.overall;
  const categories: BenchmarkComparison['categories'] = [];
  for (const category of scores.categories) {
    const benchmarkScore = benchmark.categories[category.name];
    if (benchmarkScore !== undefined) {
      categories.push({
        category: category.name,
        score: category.score,
        benchmarkScore,
        difference: category.score - benchmarkScore,
      });
    }
  }

  return {
    benchmarkName: benchmark.name,
    benchmarkScore: benchmark.overall,
    difference,
    performance: difference > 0 ? 'above' : difference < 0 ? 'below' : 'equal',
    categories,
  };
}

export function performanceInsights(
  scores: AssessmentScores,
  benchmark: Benchmark = DEFAULT_BENCHMARK
): PerformanceInsights {
  const strengths: CategoryHighlight[] = scores.categories
    .filter((category) => category.score > STRENGTH_THRESHOLD)
    .map((category) => ({
      category: category.name,
      score: category.score,
      description: `Excellent performance in ${category.name}`,
    }));

  const weaknesses: CategoryHighlight[] = scores.categories
    .filter((category) => category.score < WEAKNESS_THRESHOLD)
    .map((category) => ({
      category: category.name,
      score: category.score,
      description: `Room for improvement in ${category.name}`,
    }));

  return {
    maturityTier: maturityTier(scores.overall),
    strengths,
    weaknesses,
    benchmark: compareWithBenchmark(scores, benchmark),
  };
}
