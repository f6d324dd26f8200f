/**
 * Per-user LLM budget.
 *
 * `MeteredLlmService` wraps any LlmService: it prices each completion, writes
 * it to the cost ledger, and reports itself unavailable once the user's
 * recorded spend reaches the limit so LLM-backed generators are skipped.
 */

import type { CostLedger } from '../storage/index.js';
import { BudgetExceededError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { calculateCostUsd, modelKeyFor } from './llm-client.js';
import type { LlmCompletion, LlmRequest, LlmService } from './llm-client.js';

/** Fraction of the budget at which a warning is logged */
export const BUDGET_WARNING_RATIO = 0.8;

export interface MeteredLlmOptions {
  userId: string;
  limitUsd: number;
}

/**
 * In-memory ledger for callers without storage.
 */
export class MemoryCostLedger implements CostLedger {
  private readonly spend = new Map<string, number>();

  recordCost(entry: { userId: string; costUsd: number }): void {
    this.spend.set(entry.userId, (this.spend.get(entry.userId) ?? 0) + entry.costUsd);
  }

  getUserSpend(userId: string): number {
    return Math.round((this.spend.get(userId) ?? 0) * 10_000) / 10_000;
  }
}

export class MeteredLlmService implements LlmService {
  private runCostUsd = 0;
  private warned = false;

  constructor(
    private readonly inner: LlmService,
    private readonly ledger: CostLedger,
    private readonly options: MeteredLlmOptions
  ) {}

  /** Dollars spent through this instance */
  get spentUsd(): number {
    return Math.round(this.runCostUsd * 10_000) / 10_000;
  }

  isExhausted(): boolean {
    return this.ledger.getUserSpend(this.options.userId) >= this.options.limitUsd;
  }

  isAvailable(): boolean {
    return this.inner.isAvailable() && !this.isExhausted();
  }

  /**
   * @throws {BudgetExceededError} When the user's spend has reached the limit
   */
  async complete(request: LlmRequest): Promise<LlmCompletion> {
    const { userId, limitUsd } = this.options;
    const before = this.ledger.getUserSpend(userId);
    if (before >= limitUsd) {
      throw new BudgetExceededError(userId, before, limitUsd);
    }

    const completion = await this.inner.complete(request);
    const costUsd = calculateCostUsd(completion.usage, modelKeyFor(completion.model));
    this.runCostUsd += costUsd;
    this.ledger.recordCost({
      userId,
      operation: request.operation ?? 'completion',
      model: completion.model,
      costUsd,
      ...(completion.usage && {
        inputTokens: completion.usage.inputTokens,
        outputTokens: completion.usage.outputTokens,
      }),
    });

    const after = before + costUsd;
    if (!this.warned && after >= limitUsd * BUDGET_WARNING_RATIO) {
      this.warned = true;
      logger.warn('LLM budget nearly exhausted', undefined, {
        userId,
        spentUsd: Math.round(after * 10_000) / 10_000,
        limitUsd,
      });
    }
    return completion;
  }
}
