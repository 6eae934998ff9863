import { describe, it, expect } from 'vitest';

import { createLikertQuestion, createYesNoQuestion, LIKERT_SCALE } from '../types/index.js';
import { formatResponse, normalizeResponse, parseAnswer } from './response-normalizer.js';

const context = { category: 'n.1 A', subfactor: 'env', actor: null };
const likertQuestion = createLikertQuestion('q_0', 'Policy frameworks support co-creation.', context);
const yesNoQuestion = createYesNoQuestion('q_1', 'Are there joint research agreements?', context);

describe('parseAnswer', () => {
  it('accepts Likert integers', () => {
    expect(parseAnswer(1)).toEqual({ kind: 'likert', value: 1 });
    expect(parseAnswer(7)).toEqual({ kind: 'likert', value: 7 });
  });

  it('rejects numbers off the scale', () => {
    expect(parseAnswer(0)).toBeUndefined();
    expect(parseAnswer(8)).toBeUndefined();
    expect(parseAnswer(4.5)).toBeUndefined();
    expect(parseAnswer(Number.NaN)).toBeUndefined();
  });

  it('accepts Yes/No in any case', () => {
    expect(parseAnswer('Yes')).toEqual({ kind: 'yesno', value: true });
    expect(parseAnswer(' NO ')).toEqual({ kind: 'yesno', value: false });
  });

  it('accepts booleans', () => {
    expect(parseAnswer(true)).toEqual({ kind: 'yesno', value: true });
    expect(parseAnswer(false)).toEqual({ kind: 'yesno', value: false });
  });

  it('accepts numeric strings on the scale', () => {
    expect(parseAnswer('5')).toEqual({ kind: 'likert', value: 5 });
    expect(parseAnswer('9')).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(parseAnswer('maybe')).toBeUndefined();
    expect(parseAnswer('')).toBeUndefined();
    expect(parseAnswer(null)).toBeUndefined();
    expect(parseAnswer(undefined)).toBeUndefined();
  });
});

describe('normalizeResponse', () => {
  it('returns the Likert value itself', () => {
    for (const value of LIKERT_SCALE) {
      expect(normalizeResponse(likertQuestion, { kind: 'likert', value })).toBe(value);
    }
  });

  it('maps Yes to 7 and No to 1', () => {
    expect(normalizeResponse(yesNoQuestion, { kind: 'yesno', value: true })).toBe(7);
    expect(normalizeResponse(yesNoQuestion, { kind: 'yesno', value: false })).toBe(1);
  });

  it('treats a missing answer as neutral', () => {
    expect(normalizeResponse(likertQuestion, undefined)).toBe(4);
    expect(normalizeResponse(yesNoQuestion, null)).toBe(4);
  });

  it('treats an answer of the wrong kind as neutral', () => {
    expect(normalizeResponse(likertQuestion, { kind: 'yesno', value: true })).toBe(4);
    expect(normalizeResponse(yesNoQuestion, { kind: 'likert', value: 7 })).toBe(4);
  });
});

describe('formatResponse', () => {
  it('shows Likert values as numbers and yes/no as words', () => {
    expect(formatResponse({ kind: 'likert', value: 3 })).toBe(3);
    expect(formatResponse({ kind: 'yesno', value: true })).toBe('Yes');
    expect(formatResponse({ kind: 'yesno', value: false })).toBe('No');
  });
});
