/**
 * Dependency injection container for planner services.
 *
 * Provides:
 * - Resolved configuration (overrides, env, planner.config.json)
 * - Lazy initialization of storage and the LLM client
 * - Factory overrides so tests can inject stubs
 */

import type { Storage } from '../storage/index.js';
import type { LlmService } from '../engines/llm-client.js';
import type { SearchService } from '../engines/research-agent.js';
import type { PipelineDeps } from '../engines/pipeline.js';
import { resolveConfig } from '../utils/config.js';
import type { ResolvedConfig, ServiceConfig } from '../utils/config.js';

export type { ServiceConfig } from '../utils/config.js';

/**
 * Service container interface for dependency injection
 */
export interface Services {
  storage: Storage;
  llm: LlmService;
  search?: SearchService | undefined;
  config: ResolvedConfig;
}

/**
 * Service factory functions for lazy initialization
 */
export interface ServiceFactories {
  createStorage: (config: ResolvedConfig) => Storage;
  createLlm: (config: ResolvedConfig) => LlmService;
  createSearch: (config: ResolvedConfig) => SearchService | undefined;
}

let defaultFactories: ServiceFactories | null = null;

/**
 * Get default factories (lazy loaded so importing the container opens nothing)
 */
async function getDefaultFactories(): Promise<ServiceFactories> {
  if (!defaultFactories) {
    const [{ Storage }, { createClient }] = await Promise.all([
      import('../storage/index.js'),
      import('../engines/llm-client.js'),
    ]);

    defaultFactories = {
      createStorage: (config) => new Storage(config.dbPath),
      createLlm: (config) =>
        createClient(config.anthropicApiKey !== undefined ? { anthropicApiKey: config.anthropicApiKey } : {}),
      // No search backend ships by default; research runs on model knowledge alone
      createSearch: () => undefined,
    };
  }
  return defaultFactories;
}

/**
 * Service container that manages service lifecycles
 */
export class ServiceContainer {
  private services: Partial<Services> = {};
  private overrides: ServiceConfig;
  private resolved: ResolvedConfig | null = null;
  private factories: ServiceFactories | null = null;
  private customFactories: Partial<ServiceFactories> = {};

  constructor(config: ServiceConfig = {}) {
    this.overrides = config;
  }

  /**
   * Override a factory for testing
   */
  setFactory<K extends keyof ServiceFactories>(key: K, factory: ServiceFactories[K]): this {
    this.customFactories[key] = factory;
    this.factories = null;
    return this;
  }

  getConfig(): ResolvedConfig {
    this.resolved ??= resolveConfig(this.overrides);
    return this.resolved;
  }

  async getStorage(): Promise<Storage> {
    if (!this.services.storage) {
      const factories = await this.getFactories();
      this.services.storage = factories.createStorage(this.getConfig());
    }
    return this.services.storage;
  }

  async getLlm(): Promise<LlmService> {
    if (!this.services.llm) {
      const factories = await this.getFactories();
      this.services.llm = factories.createLlm(this.getConfig());
    }
    return this.services.llm;
  }

  async getSearch(): Promise<SearchService | undefined> {
    if (!('search' in this.services)) {
      const factories = await this.getFactories();
      this.services.search = factories.createSearch(this.getConfig());
    }
    return this.services.search;
  }

  /**
   * Get all services (for tool handlers)
   */
  async getAll(): Promise<Services> {
    const [storage, llm, search] = await Promise.all([this.getStorage(), this.getLlm(), this.getSearch()]);
    return { storage, llm, search, config: this.getConfig() };
  }

  /**
   * Everything the plan pipeline needs, wired to storage for cache, ledger and tasks.
   */
  async getPipelineDeps(): Promise<PipelineDeps> {
    const { storage, llm, search, config } = await this.getAll();
    return {
      llm,
      cacheStore: storage,
      ledger: storage,
      repository: storage,
      search,
      budgetUsd: config.llmBudgetUsd,
    };
  }

  /**
   * Close storage and forget every service
   */
  clear(): void {
    this.services.storage?.close();
    this.services = {};
  }

  /**
   * Update configuration; services are recreated with it on next use
   */
  configure(config: Partial<ServiceConfig>): this {
    this.overrides = { ...this.overrides, ...config };
    this.resolved = null;
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

/**
 * Get the global service container
 */
export function getContainer(): ServiceContainer {
  if (!globalContainer) {
    globalContainer = new ServiceContainer();
  }
  return globalContainer;
}

/**
 * Create a new container (useful for testing)
 */
export function createContainer(config?: ServiceConfig): ServiceContainer {
  return new ServiceContainer(config);
}

/**
 * Reset the global container (for testing)
 */
export function resetContainer(): void {
  globalContainer?.clear();
  globalContainer = null;
}
