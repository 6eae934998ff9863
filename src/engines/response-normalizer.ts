/**
 * Response Normalizer
 *
 * Maps answers onto the shared 1–7 scale. Yes/no answers sit at the scale
 * extremes; missing or mismatched answers read as the neutral midpoint.
 */

import type { Question, RawAnswer, ResponseValue } from '../types/index.js';
import { LIKERT_SCALE, type LikertValue } from '../types/index.js';

export const NEUTRAL_SCORE = 4;
export const YES_SCORE = 7;
export const NO_SCORE = 1;

function isLikertValue(value: number): value is LikertValue {
  return LIKERT_SCALE.some((step) => step === value);
}

/**
 * Convert a raw submitted answer into a response variant.
 *
 * Accepts an integer 1–7, 'Yes'/'No' (any case) or a boolean.
 * Returns undefined for anything else.
 */
export function parseAnswer(raw: RawAnswer | null | undefined): ResponseValue | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }
  if (typeof raw === 'boolean') {
    return { kind: 'yesno', value: raw };
  }
  if (typeof raw === 'number') {
    return isLikertValue(raw) ? { kind: 'likert', value: raw } : undefined;
  }

  const text = raw.trim().toLowerCase();
  if (text === 'yes') return { kind: 'yesno', value: true };
  if (text === 'no') return { kind: 'yesno', value: false };

  const numeric = Number(text);
  if (text !== '' && isLikertValue(numeric)) {
    return { kind: 'likert', value: numeric };
  }
  return undefined;
}

/**
 * Numeric value of one answer for its question, always within [1, 7]
 */
export function normalizeResponse(question: Question, response: ResponseValue | null | undefined): number {
  if (!response) {
    return NEUTRAL_SCORE;
  }

  switch (question.type) {
    case 'likert':
      return response.kind === 'likert' ? response.value : NEUTRAL_SCORE;
    case 'yesno':
      if (response.kind !== 'yesno') {
        return NEUTRAL_SCORE;
      }
      return response.value ? YES_SCORE : NO_SCORE;
  }
}

/**
 * Display form of a response: the Likert integer, or 'Yes'/'No'
 */
export function formatResponse(response: ResponseValue): number | 'Yes' | 'No' {
  if (response.kind === 'likert') {
    return response.value;
  }
  return response.value ? 'Yes' : 'No';
}
