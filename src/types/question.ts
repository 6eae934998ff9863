import { z } from 'zod';

/**
 * Question kinds offered by the questionnaire
 */
export const QuestionKindSchema = z.enum(['likert', 'yesno']);

export type QuestionKind = z.infer<typeof QuestionKindSchema>;

/**
 * The three lenses cutting across every category.
 * Codes outside this set are accepted and displayed as-is.
 */
export const KNOWN_SUBFACTORS = ['env', 'org', 'ind'] as const;

export type KnownSubfactor = (typeof KNOWN_SUBFACTORS)[number];

export const LIKERT_SCALE = [1, 2, 3, 4, 5, 6, 7] as const;

export type LikertValue = (typeof LIKERT_SCALE)[number];

export const LikertValueSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
  z.literal(7),
]);

export const LIKERT_LABELS: Readonly<Record<LikertValue, string>> = {
  1: 'Strongly disagree',
  2: 'Disagree',
  3: 'Somewhat disagree',
  4: 'Neutral',
  5: 'Somewhat agree',
  6: 'Agree',
  7: 'Strongly agree',
};

export const YES_NO_OPTIONS = ['Yes', 'No'] as const;

export type YesNoOption = (typeof YES_NO_OPTIONS)[number];

const QuestionBaseSchema = z.object({
  id: z.string().min(1),
  question: z.string().min(1),

  // Context carried forward from the source sheet; null before the first labelled row
  category: z.string().nullable(),
  subfactor: z.string().nullable(),
  actor: z.string().nullable(),
});

export const LikertQuestionSchema = QuestionBaseSchema.extend({
  type: z.literal('likert'),
  scale: z.array(LikertValueSchema),
  scaleLabels: z.record(z.string()),
});

export const YesNoQuestionSchema = QuestionBaseSchema.extend({
  type: z.literal('yesno'),
  options: z.array(z.string()),
});

export const QuestionSchema = z.discriminatedUnion('type', [
  LikertQuestionSchema,
  YesNoQuestionSchema,
]);

export type LikertQuestion = z.infer<typeof LikertQuestionSchema>;
export type YesNoQuestion = z.infer<typeof YesNoQuestionSchema>;
export type Question = z.infer<typeof QuestionSchema>;

/**
 * Context shared by both question constructors
 */
export interface QuestionContext {
  category: string | null;
  subfactor: string | null;
  actor: string | null;
}

export function createLikertQuestion(id: string, text: string, context: QuestionContext): LikertQuestion {
  return {
    id,
    question: text,
    type: 'likert',
    ...context,
    scale: [...LIKERT_SCALE],
    scaleLabels: { ...LIKERT_LABELS },
  };
}

export function createYesNoQuestion(id: string, text: string, context: QuestionContext): YesNoQuestion {
  return {
    id,
    question: text,
    type: 'yesno',
    ...context,
    options: [...YES_NO_OPTIONS],
  };
}
