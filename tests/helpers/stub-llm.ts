import type { LlmCompletion, LlmRequest, LlmService } from '../../src/engines/llm-client.js';

type Reply = string | Error | ((request: LlmRequest) => string);

/**
 * Deterministic LlmService for tests. Replies are keyed by `operation`; an
 * array of replies is consumed one per call and the last one repeats.
 * Every call reports 1000 input and 500 output tokens (0.0105 USD on sonnet).
 */
export class StubLlm implements LlmService {
  public readonly calls: LlmRequest[] = [];
  public available = true;
  private readonly replies: Map<string, Reply[]>;

  constructor(replies: Record<string, Reply | Reply[]> = {}) {
    this.replies = new Map(
      Object.entries(replies).map(([operation, reply]) => [operation, Array.isArray(reply) ? [...reply] : [reply]])
    );
  }

  isAvailable(): boolean {
    return this.available;
  }

  callsFor(operation: string): LlmRequest[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  async complete(request: LlmRequest): Promise<LlmCompletion> {
    this.calls.push(request);
    const queue = this.replies.get(request.operation ?? '');
    const reply = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (reply === undefined) {
      throw new Error(`No stub reply for operation "${request.operation ?? ''}"`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    const text = typeof reply === 'function' ? reply(request) : reply;
    return { text, model: 'claude-sonnet-test', usage: { inputTokens: 1000, outputTokens: 500 } };
  }
}

/** JSON reply helper */
export function json(value: unknown): string {
  return JSON.stringify(value);
}
