/**
 * Central export for all types used across the server.
 */

export {
  type Question,
  type QuestionKind,
  type LikertQuestion,
  type YesNoQuestion,
  type LikertValue,
  type YesNoOption,
  type KnownSubfactor,
  type QuestionContext,
  QuestionSchema,
  QuestionKindSchema,
  LikertQuestionSchema,
  YesNoQuestionSchema,
  LikertValueSchema,
  KNOWN_SUBFACTORS,
  LIKERT_SCALE,
  LIKERT_LABELS,
  YES_NO_OPTIONS,
  createLikertQuestion,
  createYesNoQuestion,
} from './question.js';

export {
  type ResponseValue,
  type UserInfo,
  type Sector,
  type SessionStatus,
  type AssessmentSession,
  type RawAnswer,
  type AnswerInput,
  ResponseValueSchema,
  UserInfoSchema,
  SectorSchema,
  SessionStatusSchema,
  AssessmentSessionSchema,
  RawAnswerSchema,
  AnswerInputSchema,
  SECTORS,
} from './session.js';

export type {
  SubfactorScore,
  CategoryScore,
  CompletionStats,
  AssessmentScores,
  ScoreRow,
  MaturityTier,
  SentimentLabel,
  SentimentSummary,
  CategoryHighlight,
  BenchmarkComparison,
  PerformanceInsights,
  NarrativeStrategy,
  Narrative,
} from './scores.js';
