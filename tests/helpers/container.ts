import { createContainer } from '../../src/services/index.js';
import type { ServiceConfig, ServiceContainer } from '../../src/services/index.js';
import { Storage } from '../../src/storage/index.js';
import type { TextContent } from '@modelcontextprotocol/sdk/types.js';
import { StubLlm } from './stub-llm.js';

export interface TestServices {
  container: ServiceContainer;
  storage: Storage;
  llm: StubLlm;
}

/**
 * Container wired to an in-memory database and a stub model. The stub is
 * offline unless `llm` is passed.
 */
export function makeTestContainer(config: ServiceConfig = {}, llm?: StubLlm): TestServices {
  const storage = new Storage(':memory:');
  const model = llm ?? new StubLlm();
  if (!llm) model.available = false;

  const container = createContainer(config)
    .setFactory('createStorage', () => storage)
    .setFactory('createLlm', () => model)
    .setFactory('createSearch', () => undefined);

  return { container, storage, llm: model };
}

/** Body of a single-text tool response */
export function responseBody(response: { content: TextContent[] }): unknown {
  const text = response.content[0]?.text ?? 'null';
  const body: unknown = JSON.parse(text);
  return body;
}
