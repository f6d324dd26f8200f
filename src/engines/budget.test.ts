import { describe, it, expect } from 'vitest';
import { MemoryCostLedger, MeteredLlmService } from './budget.js';
import { BudgetExceededError } from '../utils/errors.js';
import { StubLlm } from '../../tests/helpers/stub-llm.js';

const request = { system: 'sys', user: 'hello', operation: 'generate_unique' };

describe('MeteredLlmService', () => {
  it('should record each completion in the ledger', async () => {
    const ledger = new MemoryCostLedger();
    const llm = new MeteredLlmService(new StubLlm({ generate_unique: '{}' }), ledger, {
      userId: 'user-1',
      limitUsd: 5,
    });

    await llm.complete(request);
    await llm.complete(request);

    expect(llm.spentUsd).toBeCloseTo(0.021, 4);
    expect(ledger.getUserSpend('user-1')).toBeCloseTo(0.021, 4);
    expect(ledger.getUserSpend('user-2')).toBe(0);
  });

  it('should become unavailable once spend reaches the limit', async () => {
    const ledger = new MemoryCostLedger();
    const llm = new MeteredLlmService(new StubLlm({ generate_unique: '{}' }), ledger, {
      userId: 'user-1',
      limitUsd: 0.02,
    });

    await llm.complete(request);
    expect(llm.isAvailable()).toBe(true);

    await llm.complete(request);
    expect(llm.isExhausted()).toBe(true);
    expect(llm.isAvailable()).toBe(false);
    await expect(llm.complete(request)).rejects.toBeInstanceOf(BudgetExceededError);
  });

  it('should count spend recorded by earlier runs', async () => {
    const ledger = new MemoryCostLedger();
    ledger.recordCost({ userId: 'user-1', costUsd: 1 });
    const stub = new StubLlm({ generate_unique: '{}' });
    const llm = new MeteredLlmService(stub, ledger, { userId: 'user-1', limitUsd: 1 });

    expect(llm.isAvailable()).toBe(false);
    await expect(llm.complete(request)).rejects.toBeInstanceOf(BudgetExceededError);
    expect(stub.calls).toHaveLength(0);
  });

  it('should follow the wrapped service availability', () => {
    const stub = new StubLlm();
    stub.available = false;
    const llm = new MeteredLlmService(stub, new MemoryCostLedger(), { userId: 'user-1', limitUsd: 5 });

    expect(llm.isAvailable()).toBe(false);
  });
});
