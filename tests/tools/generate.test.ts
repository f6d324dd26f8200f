import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { generateTool, handleGenerate } from '../../src/tools/generate.js';
import { founderProfile, makeGoal } from '../helpers/fixtures.js';
import { makeTestContainer } from '../helpers/container.js';
import type { TestServices } from '../helpers/container.js';

describe('generate tool', () => {
  let services: TestServices;

  beforeEach(() => {
    services = makeTestContainer({ daysAhead: 7 });
  });

  afterEach(() => {
    services.container.clear();
  });

  it('should be named planner_generate and require a goal', () => {
    expect(generateTool.name).toBe('planner_generate');
    expect(generateTool.inputSchema).toMatchObject({ required: ['goal'] });
  });

  it('should build a plan on the template path without a model', async () => {
    const result = await handleGenerate(
      { profile: founderProfile, goal: makeGoal(), today: '2026-01-10' },
      services.container
    );

    expect(result.path).toBe('templates');
    expect(result.status).toBe('ok');
    expect(result.persisted).toBeUndefined();
  });

  it('should use the configured horizon when none is given', async () => {
    const result = await handleGenerate(
      { profile: founderProfile, goal: makeGoal(), today: '2026-01-10' },
      services.container
    );

    for (const task of result.tasks) {
      expect((task.scheduledDate ?? '') <= '2026-01-17').toBe(true);
    }
  });

  it('should persist the plan when asked', async () => {
    const result = await handleGenerate(
      { profile: founderProfile, goal: makeGoal(), today: '2026-01-10', persist: true },
      services.container
    );

    expect(result.persisted?.created).toBe(result.tasks.length);
    expect(services.storage.listTasksForUser('user-1')).toHaveLength(result.tasks.length);
  });

  it('should reject a goal without a title', async () => {
    await expect(
      handleGenerate({ goal: { id: 'g', userId: 'u', category: 'study' } }, services.container)
    ).rejects.toBeInstanceOf(ZodError);
  });

  it('should reject an unknown path', async () => {
    await expect(handleGenerate({ goal: makeGoal(), path: 'magic' }, services.container)).rejects.toBeInstanceOf(
      ZodError
    );
  });
});
