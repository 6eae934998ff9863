import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { handleHealth, healthTool } from '../../src/tools/health.js';
import { handleComplete } from '../../src/tools/complete.js';
import { handleStart } from '../../src/tools/start.js';
import type { Services } from '../../src/services/index.js';
import { getFallbackQuestions } from '../../src/engines/question-loader.js';
import { SERVER_VERSION } from '../../src/version.js';
import { createTestServices, FakeGenerator, TEST_USER } from '../helpers/services.js';

describe('health tool', () => {
  let services: Services;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    services = createTestServices({ questions: getFallbackQuestions() });
  });

  afterEach(() => {
    services.storage.close();
    vi.restoreAllMocks();
  });

  it('is named assessment_health', () => {
    expect(healthTool.name).toBe('assessment_health');
  });

  it('is healthy with working storage and a question file', () => {
    const result = handleHealth({}, services);

    expect(result.status).toBe('healthy');
    expect(result.version).toBe(SERVER_VERSION);
    expect(result.checks.storage.status).toBe('healthy');
    expect(result.checks.storage.message).toBe('Storage is operational');
    expect(result.checks.storage.latencyMs).toBeGreaterThanOrEqual(0);
    expect(result.checks.questions).toEqual({ status: 'healthy', source: 'file', count: 6 });
    expect(result.checks.narratives.strategy).toBe('template');
    expect(result.metrics).toBeUndefined();
  });

  it('is degraded on the embedded questionnaire', () => {
    const fallback = createTestServices();
    const result = handleHealth({}, fallback);

    expect(result.status).toBe('degraded');
    expect(result.checks.questions.status).toBe('degraded');
    expect(result.checks.questions.source).toBe('fallback');
    expect(result.checks.questions.reason).toMatch(/^Question source not found: /);
    fallback.storage.close();
  });

  it('reports generated narratives when a generator is available', () => {
    const generating = createTestServices({ questions: getFallbackQuestions(), generator: new FakeGenerator() });
    expect(handleHealth({}, generating).checks.narratives.strategy).toBe('generated');
    generating.storage.close();
  });

  it('is unhealthy when storage fails', () => {
    services.storage.close();
    const result = handleHealth({ verbose: true }, services);

    expect(result.status).toBe('unhealthy');
    expect(result.checks.storage.status).toBe('unhealthy');
    expect(result.checks.storage.message).toMatch(/^Storage error: /);
    expect(result.metrics).toBeUndefined();
    services = createTestServices();
  });

  it('counts sessions when verbose', () => {
    handleStart({ ...TEST_USER }, services);
    const done = handleStart({ ...TEST_USER }, services).sessionId;
    handleComplete({ sessionId: done }, services);

    const result = handleHealth({ verbose: true }, services);

    expect(result.metrics).toEqual({ sessions: { total: 2, inProgress: 1, completed: 1 } });
  });
});
