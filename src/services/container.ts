/**
 * Dependency injection container for the assessment services.
 *
 * Services are built lazily from the configuration; any factory can be
 * replaced, which is how tests swap in in-memory storage, fixed question
 * banks and fake generators.
 */

import type { Storage } from '../storage/index.js';
import type { NarrativeGenerator } from '../engines/llm-client.js';
import type { QuestionOrganizer } from '../engines/question-organizer.js';
import { InsightSummarizer } from '../engines/insight-summarizer.js';
import type { Benchmark } from '../engines/performance-insights.js';
import type { Question } from '../types/index.js';
import { loadBenchmark, loadConfig, type AppConfig } from '../utils/config.js';
import type { Logger } from '../utils/logger.js';

/**
 * The loaded question set and its grouping
 */
export interface QuestionBank {
  questions: Question[];
  organizer: QuestionOrganizer;
  source: 'file' | 'fallback';
  reason?: string;
}

export interface Services {
  config: AppConfig;
  storage: Storage;
  llmClient: NarrativeGenerator;
  questionBank: QuestionBank;
  summarizer: InsightSummarizer;
  benchmark: Benchmark;
  logger: Logger;
}

export interface ServiceFactories {
  createStorage: (config: AppConfig) => Storage;
  createLLMClient: (config: AppConfig) => NarrativeGenerator;
  loadQuestionBank: (config: AppConfig) => Promise<QuestionBank>;
  getLogger: () => Logger;
}

let defaultFactories: ServiceFactories | null = null;

/**
 * Get default factories (lazy loaded to keep startup light)
 */
async function getDefaultFactories(): Promise<ServiceFactories> {
  if (!defaultFactories) {
    const [{ Storage }, { createClient }, { loadQuestions }, { QuestionOrganizer }, { logger }] = await Promise.all([
      import('../storage/index.js'),
      import('../engines/llm-client.js'),
      import('../engines/question-loader.js'),
      import('../engines/question-organizer.js'),
      import('../utils/logger.js'),
    ]);

    defaultFactories = {
      createStorage: (config) => new Storage(config.dbPath),
      createLLMClient: (config) =>
        createClient({
          anthropicApiKey: config.anthropicApiKey,
          model: config.model,
          timeoutMs: config.llmTimeoutMs,
        }),
      loadQuestionBank: async (config) => {
        const result = await loadQuestions(
          config.questionsPath,
          config.sheetName !== undefined ? { sheetName: config.sheetName } : {}
        );
        return {
          questions: result.questions,
          organizer: new QuestionOrganizer(result.questions),
          source: result.source,
          ...(result.reason !== undefined && { reason: result.reason }),
        };
      },
      getLogger: () => logger,
    };
  }
  return defaultFactories;
}

export class ServiceContainer {
  private services: Partial<Services> = {};
  private config: AppConfig;
  private factories: ServiceFactories | null = null;
  private customFactories: Partial<ServiceFactories> = {};
  private pendingQuestionBank: Promise<QuestionBank> | null = null;
  /** Bumped by clear(); loads started before it are not cached */
  private generation = 0;

  constructor(config?: AppConfig) {
    this.config = config ?? loadConfig();
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /**
   * Override a factory for testing
   */
  setFactory<K extends keyof ServiceFactories>(
    key: K,
    factory: ServiceFactories[K]
  ): this {
    this.customFactories[key] = factory;
    this.factories = null;
    return this;
  }

  async getStorage(): Promise<Storage> {
    let storage = this.services.storage;
    if (!storage) {
      const factories = await this.getFactories();
      storage = factories.createStorage(this.config);
      this.services.storage = storage;
    }
    return storage;
  }

  async getLLMClient(): Promise<NarrativeGenerator> {
    let llmClient = this.services.llmClient;
    if (!llmClient) {
      const factories = await this.getFactories();
      llmClient = factories.createLLMClient(this.config);
      this.services.llmClient = llmClient;
    }
    return llmClient;
  }

  /**
   * Loaded once; concurrent first calls share the same load
   */
  async getQuestionBank(): Promise<QuestionBank> {
    const loaded = this.services.questionBank;
    if (loaded) {
      return loaded;
    }
    if (!this.pendingQuestionBank) {
      const generation = this.generation;
      const config = this.config;
      const pending: Promise<QuestionBank> = this.getFactories()
        .then((factories) => factories.loadQuestionBank(config))
        .then((bank) => {
          if (generation === this.generation) {
            this.services.questionBank = bank;
          }
          return bank;
        })
        .finally(() => {
          if (this.pendingQuestionBank === pending) {
            this.pendingQuestionBank = null;
          }
        });
      this.pendingQuestionBank = pending;
      return pending;
    }
    return this.pendingQuestionBank;
  }

  async getSummarizer(): Promise<InsightSummarizer> {
    let summarizer = this.services.summarizer;
    if (!summarizer) {
      summarizer = new InsightSummarizer(await this.getLLMClient());
      this.services.summarizer = summarizer;
    }
    return summarizer;
  }

  getBenchmark(): Benchmark {
    let benchmark = this.services.benchmark;
    if (!benchmark) {
      benchmark = loadBenchmark(this.config.benchmarkPath);
      this.services.benchmark = benchmark;
    }
    return benchmark;
  }

  async getLogger(): Promise<Logger> {
    let logger = this.services.logger;
    if (!logger) {
      const factories = await this.getFactories();
      logger = factories.getLogger();
      this.services.logger = logger;
    }
    return logger;
  }

  /**
   * Get all services (for tool handlers)
   */
  async getAll(): Promise<Services> {
    const [storage, llmClient, questionBank, summarizer, logger] = await Promise.all([
      this.getStorage(),
      this.getLLMClient(),
      this.getQuestionBank(),
      this.getSummarizer(),
      this.getLogger(),
    ]);
    return {
      config: this.config,
      storage,
      llmClient,
      questionBank,
      summarizer,
      benchmark: this.getBenchmark(),
      logger,
    };
  }

  /**
   * Close open resources and forget every service
   */
  clear(): void {
    this.services.storage?.close();
    this.services = {};
    this.pendingQuestionBank = null;
    this.generation++;
  }

  /**
   * Update configuration; services are recreated on next use
   */
  configure(config: Partial<AppConfig>): this {
    this.config = { ...this.config, ...config };
    this.clear();
    return this;
  }

  private async getFactories(): Promise<ServiceFactories> {
    if (!this.factories) {
      const defaults = await getDefaultFactories();
      this.factories = {
        ...defaults,
        ...this.customFactories,
      };
    }
    return this.factories;
  }
}

let globalContainer: ServiceContainer | null = null;

export function getContainer(): ServiceContainer {
  if (!globalContainer) {
    globalContainer = new ServiceContainer();
  }
  return globalContainer;
}

/**
 * Create a new container (useful for testing)
 */
export function createContainer(config?: AppConfig): ServiceContainer {
  return new ServiceContainer(config);
}

export function resetContainer(): void {
  if (globalContainer) {
    globalContainer.clear();
  }
  globalContainer = null;
}
