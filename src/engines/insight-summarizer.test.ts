import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { AssessmentScores, CategoryScore } from '../types/index.js';
import type { GenerateOptions, LLMResponse, NarrativeGenerator } from './llm-client.js';
import { InsightSummarizer, buildCategoryPrompt, buildSummaryPrompt } from './insight-summarizer.js';
import { performanceInsights } from './performance-insights.js';
import { analyzeSentiment } from './sentiment.js';

class FakeGenerator implements NarrativeGenerator {
  available = true;
  readonly generate = vi.fn(
    async (_prompt: string, _options?: GenerateOptions): Promise<LLMResponse> => ({
      content: '  Generated narrative.  ',
      model: 'test-model',
    })
  );

  isAvailable(): boolean {
    return this.available;
  }
}

const JOINT_RESEARCH: CategoryScore = {
  label: 'n.1 Joint research',
  name: 'Joint research',
  score: 5,
  subfactors: [
    { code: 'env', name: 'Environmental', score: 6, answered: 2, total: 2 },
    { code: 'org', name: 'Organizational', score: 4, answered: 0, total: 1 },
  ],
};

const CATEGORY_TEMPLATE = [
  'Current situation: Joint research shows good performance with a score of 5.00/7. Comments reflect a balanced view towards this area.',
  'Strengths: the environmental factor stands out (6.00/7).',
  'Areas for improvement: the organizational factor offers the most room to develop (4.00/7).',
  'Recommendations: strengthen organizational aspects while sustaining environmental ones.',
].join('\n\n');

const SCORES: AssessmentScores = {
  categories: [
    { label: 'n.1 A', name: 'A', score: 6.5, subfactors: [] },
    { label: 'n.2 B', name: 'B', score: 4.5, subfactors: [] },
  ],
  subfactorSummary: {},
  overall: 5.5,
  completion: { answered: 2, total: 2, ratio: 1 },
};

const INSIGHTS = performanceInsights(SCORES, { name: 'Regional study', overall: 5, categories: {} });

const PRAISE = ['This collaboration is excellent and very productive'];

const SUMMARY_TEMPLATE = [
  'Overall assessment: the organization shows an intermediate level of maturity in knowledge valorisation, with an overall score of 5.50/7.',
  'Main strength: A (6.50/7).',
  'Priority for improvement: B (4.50/7).',
  'Comments reflect a positive attitude towards collaboration.',
  'Benchmark: 0.50 points above the Regional study (5.00/7).',
].join('\n\n');

describe('InsightSummarizer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('without a generator', () => {
    const summarizer = new InsightSummarizer();

    it('reports generation unavailable', () => {
      expect(summarizer.generationAvailable).toBe(false);
    });

    it('writes the category template', async () => {
      expect(await summarizer.summarizeCategory(JOINT_RESEARCH)).toEqual({
        text: CATEGORY_TEMPLATE,
        strategy: 'template',
      });
    });

    it('writes the executive summary template', async () => {
      expect(await summarizer.summarizeAssessment(SCORES, PRAISE, INSIGHTS)).toEqual({
        text: SUMMARY_TEMPLATE,
        strategy: 'template',
      });
    });

    it('describes the benchmark as in line when scores match', async () => {
      const level = performanceInsights({ ...SCORES, overall: 5 }, { name: 'Regional study', overall: 5, categories: {} });
      const narrative = await summarizer.summarizeAssessment({ ...SCORES, overall: 5 }, [], level);
      expect(narrative.text.split('\n\n').at(-1)).toBe('Benchmark: in line with the Regional study (5.00/7).');
    });

    it('keeps only the situation line for a category without sub-factors', async () => {
      const narrative = await summarizer.summarizeCategory({ ...JOINT_RESEARCH, score: 3, subfactors: [] });
      expect(narrative.text).toBe(
        'Current situation: Joint research has significant room for improvement with a score of 3.00/7. ' +
          'Comments reflect a balanced view towards this area.'
      );
    });
  });

  describe('with a generator', () => {
    let generator: FakeGenerator;
    let summarizer: InsightSummarizer;

    beforeEach(() => {
      generator = new FakeGenerator();
      summarizer = new InsightSummarizer(generator);
    });

    it('returns trimmed generated text', async () => {
      const narrative = await summarizer.summarizeCategory(JOINT_RESEARCH, ['Funding is scarce']);

      expect(narrative).toEqual({ text: 'Generated narrative.', strategy: 'generated' });
      expect(generator.generate).toHaveBeenCalledTimes(1);
      const [prompt, options] = generator.generate.mock.calls[0] ?? [];
      expect(prompt).toContain('Self-assessment results for the category "Joint research":');
      expect(prompt).toContain('Comments: Funding is scarce');
      expect(options?.maxTokens).toBe(500);
      expect(options?.temperature).toBe(0.7);
    });

    it('asks for a longer executive summary', async () => {
      await summarizer.summarizeAssessment(SCORES, PRAISE, INSIGHTS);
      const [prompt, options] = generator.generate.mock.calls[0] ?? [];
      expect(prompt?.split('\n').at(-1)).toBe('Length: 200-250 words.');
      expect(options?.maxTokens).toBe(600);
    });

    it('falls back to the template when generation fails', async () => {
      generator.generate.mockRejectedValueOnce(new Error('upstream unavailable'));

      expect(await summarizer.summarizeCategory(JOINT_RESEARCH)).toEqual({
        text: CATEGORY_TEMPLATE,
        strategy: 'template',
      });
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Narrative generation failed, using template'));
    });

    it('falls back to the template when generation returns blank text', async () => {
      generator.generate.mockResolvedValueOnce({ content: '   ', model: 'test-model' });

      const narrative = await summarizer.summarizeAssessment(SCORES, PRAISE, INSIGHTS);
      expect(narrative).toEqual({ text: SUMMARY_TEMPLATE, strategy: 'template' });
    });

    it('checks availability on every call', async () => {
      generator.available = false;
      expect(summarizer.generationAvailable).toBe(false);
      expect((await summarizer.summarizeCategory(JOINT_RESEARCH)).strategy).toBe('template');

      generator.available = true;
      expect((await summarizer.summarizeCategory(JOINT_RESEARCH)).strategy).toBe('generated');
      expect(generator.generate).toHaveBeenCalledTimes(1);
    });
  });
});

describe('prompt builders', () => {
  it('lists sub-factor scores and comments in the category prompt', () => {
    const prompt = buildCategoryPrompt(JOINT_RESEARCH, analyzeSentiment([]), []);
    const lines = prompt.split('\n');

    expect(lines).toContain('Category score: 5.00/7');
    expect(lines).toContain('- Environmental: 6.00/7');
    expect(lines).toContain('- Organizational: 4.00/7');
    expect(lines).toContain('Comments: No comments provided');
    expect(lines.at(-1)).toBe('Length: 150-200 words.');
  });

  it('names the strongest and weakest categories in the summary prompt', () => {
    const prompt = buildSummaryPrompt(SCORES, analyzeSentiment(PRAISE), INSIGHTS, PRAISE);
    const lines = prompt.split('\n');

    expect(lines).toContain('Overall score: 5.50/7 (intermediate maturity)');
    expect(lines).toContain('Strongest category: A');
    expect(lines).toContain('Category to improve: B');
    expect(lines).toContain('Overall sentiment: positive');
    expect(lines).toContain('Performance vs Regional study: above');
  });
});
