import { z } from 'zod';
import { LikertValueSchema } from './question.js';

/**
 * A recorded answer. The variant is fixed when the answer is captured,
 * so scoring never compares loosely-typed values.
 */
export const ResponseValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('likert'), value: LikertValueSchema }),
  z.object({ kind: z.literal('yesno'), value: z.boolean() }),
]);

export type ResponseValue = z.infer<typeof ResponseValueSchema>;

export const SECTORS = [
  'University',
  'Research Centre',
  'Private Company',
  'Public Body',
  'Other',
] as const;

export const SectorSchema = z.enum(SECTORS);

export type Sector = z.infer<typeof SectorSchema>;

/**
 * Respondent metadata collected before the questionnaire starts
 */
export const UserInfoSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  organization: z.string().trim().min(1, 'organization is required'),
  role: z.string().trim().min(1, 'role is required'),
  sector: SectorSchema,
});

export type UserInfo = z.infer<typeof UserInfoSchema>;

export const SessionStatusSchema = z.enum(['in-progress', 'completed']);

export type SessionStatus = z.infer<typeof SessionStatusSchema>;

/**
 * One respondent's assessment. Passed explicitly to every operation;
 * read-only once `status` is 'completed'.
 */
export const AssessmentSessionSchema = z.object({
  id: z.string(),
  userInfo: UserInfoSchema,
  responses: z.record(ResponseValueSchema),
  comments: z.record(z.string()),
  status: SessionStatusSchema,
  currentQuestionIndex: z.number().int().min(0),
  createdAt: z.string().datetime(),
  lastUpdated: z.string().datetime(),
  completedAt: z.string().datetime().optional(),
});

export type AssessmentSession = z.infer<typeof AssessmentSessionSchema>;

/**
 * Raw answer as a client submits it: a Likert integer, 'Yes'/'No' or a boolean
 */
export const RawAnswerSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
]);

export type RawAnswer = z.infer<typeof RawAnswerSchema>;

export const AnswerInputSchema = z.object({
  questionId: z.string().min(1),
  value: RawAnswerSchema.nullable().optional(),
  comment: z.string().max(5000).optional(),
  /** Remove a previously recorded answer */
  clear: z.boolean().optional(),
});

export type AnswerInput = z.infer<typeof AnswerInputSchema>;
