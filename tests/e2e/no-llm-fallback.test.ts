/**
 * End-to-end test: narratives without a working text generator.
 *
 * Covers a server with no API key, a generator that fails on every call and
 * one that only returns blank text. Results must stay complete in each case.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createContainer } from '../../src/services/index.js';
import type { Services } from '../../src/services/index.js';
import { handleToolCall } from '../../src/tools/index.js';
import type { AppConfig } from '../../src/utils/config.js';
import { createTestServices, FakeGenerator, parseResult, stringField, TEST_USER } from '../helpers/services.js';

const CATEGORY_NAME = 'Academia-Industry joint research & mobility';

async function answeredSession(services: Services): Promise<string> {
  const sessionId = stringField(
    parseResult(await handleToolCall('assessment_start', { ...TEST_USER }, services)),
    'sessionId'
  );
  await handleToolCall(
    'assessment_answer',
    {
      sessionId,
      answers: [
        { questionId: 'q_0', value: 7, comment: 'Excellent partnership with local industry' },
        { questionId: 'q_3', value: 'Yes' },
      ],
    },
    services
  );
  return sessionId;
}

describe('No-LLM Fallback E2E', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes template narratives when no API key is configured', async () => {
    const config: AppConfig = {
      questionsPath: join(tmpdir(), 'no-such-questions.xlsx'),
      dbPath: ':memory:',
      backupDir: join(tmpdir(), 'assessment-test-backups'),
      model: 'test-model',
      llmTimeoutMs: 1000,
    };
    const container = createContainer(config);
    const services = await container.getAll();

    const sessionId = await answeredSession(services);
    const results = parseResult(await handleToolCall('assessment_results', { sessionId }, services));

    // env 7, org 7, ind 4 → 6
    expect(results).toMatchObject({
      scores: { overall: 6 },
      narratives: {
        categories: [{ category: CATEGORY_NAME, narrative: { strategy: 'template' } }],
        executiveSummary: { strategy: 'template' },
      },
    });

    const health = parseResult(await handleToolCall('assessment_health', {}, services));
    expect(health).toMatchObject({
      status: 'degraded',
      checks: { questions: { source: 'fallback' }, narratives: { strategy: 'template' } },
    });

    container.clear();
  });

  it('keeps results complete when every generation fails', async () => {
    const generator = new FakeGenerator();
    generator.generate.mockRejectedValue(new Error('upstream unavailable'));
    const services = createTestServices({ generator });

    const sessionId = await answeredSession(services);
    const results = parseResult(await handleToolCall('assessment_results', { sessionId }, services));

    expect(generator.generate).toHaveBeenCalledTimes(2);
    expect(results).toMatchObject({
      scores: { overall: 6 },
      insights: { maturityTier: 'advanced' },
      narratives: {
        categories: [{ narrative: { strategy: 'template' } }],
        executiveSummary: { strategy: 'template' },
      },
    });
    expect(results).not.toHaveProperty('error');

    services.storage.close();
  });

  it('falls back when generation returns blank text', async () => {
    const generator = new FakeGenerator();
    generator.generate.mockResolvedValue({ content: '  ', model: 'test-model' });
    const services = createTestServices({ generator });

    const sessionId = await answeredSession(services);
    const results = parseResult(await handleToolCall('assessment_results', { sessionId }, services));

    expect(results).toMatchObject({ narratives: { executiveSummary: { strategy: 'template' } } });
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Narrative generation returned no text, using template')
    );

    services.storage.close();
  });
});
