/**
 * Score types. Scores are derived on demand from a session's responses
 * and are never persisted.
 */

export interface SubfactorScore {
  code: string;
  name: string;
  /** Mean of answered, normalized responses; neutral when nothing is answered */
  score: number;
  answered: number;
  total: number;
}

export interface CategoryScore {
  /** Category label as found in the source */
  label: string;
  /** Display name with the ordinal prefix removed */
  name: string;
  /** Unweighted mean of the sub-factor scores */
  score: number;
  subfactors: SubfactorScore[];
}

export interface CompletionStats {
  answered: number;
  total: number;
  /** 0..1 */
  ratio: number;
}

export interface AssessmentScores {
  categories: CategoryScore[];
  /** Mean score per sub-factor code across categories */
  subfactorSummary: Record<string, number>;
  /** Unweighted mean of the category scores */
  overall: number;
  completion: CompletionStats;
}

/**
 * Flat score row for tabular export
 */
export interface ScoreRow {
  category: string;
  categoryName: string;
  subfactor: string;
  subfactorName: string;
  subfactorScore: number;
  categoryScore: number;
  overallScore: number;
}

export type MaturityTier = 'initial' | 'basic' | 'intermediate' | 'advanced';

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

export interface SentimentSummary {
  overall: SentimentLabel;
  /** Mean polarity in [-1, 1] */
  polarity: number;
  positiveCount: number;
  negativeCount: number;
  neutralCount: number;
  total: number;
}

export interface CategoryHighlight {
  category: string;
  score: number;
  description: string;
}

export interface BenchmarkComparison {
  benchmarkName: string;
  benchmarkScore: number;
  difference: number;
  performance: 'above' | 'below' | 'equal';
  categories: Array<{
    category: string;
    score: number;
    benchmarkScore: number;
    difference: number;
  }>;
}

export interface PerformanceInsights {
  maturityTier: MaturityTier;
  strengths: CategoryHighlight[];
  weaknesses: CategoryHighlight[];
  benchmark: BenchmarkComparison;
}

export type NarrativeStrategy = 'template' | 'generated';

export interface Narrative {
  text: string;
  strategy: NarrativeStrategy;
}
