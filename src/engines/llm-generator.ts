/**
 * Full-LLM and Unique generators.
 *
 * Both make a single LLM call behind the task cache:
 * - unique: 2-3 tasks that only this user could do, layered on top of templates
 * - full_llm: a complete 12-18 task plan for scenarios templates do not cover
 */

import type { ProfileContext, TaskSource, UserStories } from '../types/index.js';
import { describeProfile, describeStories, TASK_JSON_SHAPE } from '../prompts/index.js';
import { extractList } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import { calculateCostUsd, modelKeyFor, requestJson } from './llm-client.js';
import type { LlmService } from './llm-client.js';
import type { CacheLookupResult, GeneratedSet, GenerationType, TaskCache } from './task-cache.js';
import { parseLlmTasks } from './task-builder.js';

export const MAX_UNIQUE_TASKS = 3;
export const MAX_FULL_LLM_TASKS = 18;

const UNIQUE_PROMPT = `You write the 2-3 tasks in a plan that only this particular person could do.

Templates already cover the standard steps for this goal. Your tasks must build on what is unusual about the user: their own work, results, contacts, or obstacles as told in their stories. A task that would fit anyone with the same goal is a failure.

Every task is one action of 10-180 minutes that starts with a verb and names a concrete person, website, or document. Where the user's own names belong in a title, write them out.

Return JSON:
${TASK_JSON_SHAPE}`;

const FULL_PROMPT = `You write a complete action plan for a goal that standard templates do not cover.

Write 12-18 tasks that take the user from where they are today to the goal. Cover research, preparation, outreach, and submission or delivery in a sensible order. Every task:
- is one action that starts with a verb
- takes 10-180 minutes
- names a concrete person, website, or document
- produces a deliverable
- uses the user's own background, achievements and contacts where they help

Return JSON:
${TASK_JSON_SHAPE}`;

export interface LlmGeneratorDeps {
  llm: LlmService;
  cache: TaskCache;
  stories: UserStories;
}

export interface LlmGenerationResult extends CacheLookupResult {
  generationType: GenerationType;
}

interface GeneratorSettings {
  generationType: GenerationType;
  source: TaskSource;
  system: string;
  maxTasks: number;
  maxTokens: number;
}

const GENERATORS: Record<GenerationType, GeneratorSettings> = {
  unique: {
    generationType: 'unique',
    source: 'unique_generator',
    system: UNIQUE_PROMPT,
    maxTasks: MAX_UNIQUE_TASKS,
    maxTokens: 2048,
  },
  full_llm: {
    generationType: 'full_llm',
    source: 'full_llm_generator',
    system: FULL_PROMPT,
    maxTasks: MAX_FULL_LLM_TASKS,
    maxTokens: 6144,
  },
};

async function callModel(
  llm: LlmService,
  context: ProfileContext,
  stories: UserStories,
  settings: GeneratorSettings
): Promise<GeneratedSet> {
  if (!llm.isAvailable()) {
    logger.info('LLM unavailable; skipping generator', { generationType: settings.generationType });
    return { tasks: [], costUsd: 0 };
  }

  try {
    const { data, completion } = await requestJson(llm, {
      system: settings.system,
      user: [
        `GOAL: ${context.goalTitle}`,
        `PROFILE\n${describeProfile(context)}`,
        `STORIES\n${describeStories(stories)}`,
      ].join('\n\n'),
      maxTokens: settings.maxTokens,
      temperature: 0.7,
      operation: `generate_${settings.generationType}`,
    });

    const tasks = parseLlmTasks(extractList(data, 'tasks'), { source: settings.source }).slice(0, settings.maxTasks);
    const costUsd = calculateCostUsd(completion.usage, modelKeyFor(completion.model));
    logger.info('LLM tasks generated', { generationType: settings.generationType, tasks: tasks.length, costUsd });
    return { tasks, costUsd };
  } catch (error) {
    logger.warn('LLM generation failed; generator yields no tasks', error, { generationType: settings.generationType });
    return { tasks: [], costUsd: 0 };
  }
}

async function generate(
  generationType: GenerationType,
  context: ProfileContext,
  deps: LlmGeneratorDeps
): Promise<LlmGenerationResult> {
  const settings = GENERATORS[generationType];
  const result = await deps.cache.getOrGenerate(context, generationType, () =>
    callModel(deps.llm, context, deps.stories, settings)
  );
  return { ...result, tasks: result.tasks.slice(0, settings.maxTasks), generationType };
}

/**
 * 2-3 tasks drawn from the user's stories. Source `unique_generator`.
 */
export function generateUniqueTasks(context: ProfileContext, deps: LlmGeneratorDeps): Promise<LlmGenerationResult> {
  return generate('unique', context, deps);
}

/**
 * A complete plan from one call. Source `full_llm_generator`.
 */
export function generateFullLlmTasks(context: ProfileContext, deps: LlmGeneratorDeps): Promise<LlmGenerationResult> {
  return generate('full_llm', context, deps);
}
