/**
 * Task cache for LLM-generated task sets.
 *
 * Users with the same ProfileFeatureHash share generated tasks. Tasks are
 * stored with the user's concrete names replaced by placeholders and are
 * personalized again for whoever reads them, so a cached row is never
 * returned as stored.
 */

import { createHash } from 'node:crypto';
import type { ProfileContext, Task } from '../types/index.js';
import type { TaskCacheStore } from '../storage/index.js';
import { logger } from '../utils/logger.js';
import { escapeRegExp, wholeWordPattern } from '../utils/text.js';
import { newTaskId } from './task-builder.js';

export const CACHE_TTL_DAYS = 30;

export type GenerationType = 'unique' | 'full_llm';

/**
 * The reduced, non-identifying view of a context that decides cache sharing.
 */
export function profileFeatures(context: ProfileContext): Record<string, unknown> {
  return {
    background: context.background,
    field: context.field.toLowerCase(),
    category: context.category,
    hasStartupBackground: context.hasStartupBackground,
    hasProfessionalExperience: context.hasProfessionalExperience,
    hasResearchExperience: context.hasResearchExperience,
    gpaNeedsCompensation: context.gpaNeedsCompensation,
    testPrepNeeded: context.testPrepNeeded,
  };
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, inner]) => inner !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, inner]) => `${JSON.stringify(key)}:${canonicalJson(inner)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * MD5 hex of the canonical (sorted-key) JSON of the profile features.
 */
export function profileFeatureHash(context: ProfileContext): string {
  return createHash('md5').update(canonicalJson(profileFeatures(context))).digest('hex');
}

const PLACEHOLDERS = ['[university name]', '[startup name]', '[field]'] as const;

type Placeholder = (typeof PLACEHOLDERS)[number];

const PLACEHOLDER_ALIASES: Record<Placeholder, readonly string[]> = {
  '[university name]': ['[university name]', '[your university]', '[target school]'],
  '[startup name]': ['[startup name]', '[your startup]'],
  '[field]': ['[field]', '[your field]'],
};

function usable(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 1 && !value.toLowerCase().startsWith('your ');
}

function placeholderValues(context: ProfileContext): Partial<Record<Placeholder, string>> {
  const university = context.study?.targetUniversities[0] ?? context.study?.universityName;
  const values: Partial<Record<Placeholder, string>> = {};
  if (usable(university)) values['[university name]'] = university;
  if (usable(context.startupName)) values['[startup name]'] = context.startupName;
  if (usable(context.field)) values['[field]'] = context.field;
  return values;
}

function mapText(task: Task, fn: (text: string) => string): Task {
  return {
    ...task,
    title: fn(task.title),
    description: fn(task.description),
    definitionOfDone: task.definitionOfDone.map((item) => ({ ...item, text: fn(item.text) })),
    ...(task.deliverable !== undefined && { deliverable: fn(task.deliverable) }),
    ...(task.specificResource !== undefined && { specificResource: fn(task.specificResource) }),
  };
}

/**
 * Replace this user's concrete names with placeholders before caching.
 */
export function genericizeTasks(tasks: readonly Task[], context: ProfileContext): Task[] {
  const values = placeholderValues(context);
  const universities = (context.study?.targetUniversities ?? []).filter(usable);

  const replacements: Array<[string, Placeholder]> = universities.map(
    (name): [string, Placeholder] => [name, '[university name]']
  );
  for (const placeholder of PLACEHOLDERS) {
    const value = values[placeholder];
    if (value !== undefined) replacements.push([value, placeholder]);
  }
  replacements.sort(([a], [b]) => b.length - a.length);

  const patterns = replacements.map(
    ([value, placeholder]) => [wholeWordPattern(value, 'gi'), placeholder] as const
  );

  return tasks.map((task) =>
    mapText(task, (text) => patterns.reduce((acc, [pattern, placeholder]) => acc.replace(pattern, placeholder), text))
  );
}

/**
 * Fill placeholders with this user's values. Each task gets a fresh id.
 * Placeholders without a value for this user are left as they are.
 */
export function personalizeTasks(tasks: readonly Task[], context: ProfileContext): Task[] {
  const values = placeholderValues(context);
  const patterns: Array<readonly [RegExp, string]> = [];
  for (const placeholder of PLACEHOLDERS) {
    const value = values[placeholder];
    if (value === undefined) continue;
    for (const alias of PLACEHOLDER_ALIASES[placeholder]) {
      patterns.push([new RegExp(escapeRegExp(alias), 'gi'), value]);
    }
  }

  return tasks.map((task) => ({
    ...mapText(task, (text) => patterns.reduce((acc, [pattern, value]) => acc.replace(pattern, value), text)),
    id: newTaskId(),
  }));
}

export interface GeneratedSet {
  tasks: Task[];
  costUsd: number;
}

export interface CacheLookupResult {
  tasks: Task[];
  cacheHit: boolean;
  costUsd: number;
}

/**
 * Cache-aside wrapper around an LLM generation.
 */
export class TaskCache {
  constructor(
    private readonly store: TaskCacheStore | undefined,
    private readonly ttlDays: number = CACHE_TTL_DAYS
  ) {}

  async getOrGenerate(
    context: ProfileContext,
    generationType: GenerationType,
    generate: () => Promise<GeneratedSet>
  ): Promise<CacheLookupResult> {
    const hash = profileFeatureHash(context);

    const cached = this.store?.getCachedTasks(hash, generationType);
    if (cached) {
      logger.info('Task cache hit', { generationType, hash, tasks: cached.tasks.length, savedUsd: cached.costUsd });
      return { tasks: personalizeTasks(cached.tasks, context), cacheHit: true, costUsd: 0 };
    }

    const generated = await generate();
    const generic = genericizeTasks(generated.tasks, context);
    if (this.store && generic.length > 0) {
      this.store.cacheTasks(hash, generationType, generic, generated.costUsd, this.ttlDays);
      logger.debug('Cached generated tasks', undefined, { generationType, hash, tasks: generic.length });
    }
    return { tasks: personalizeTasks(generic, context), cacheHit: false, costUsd: generated.costUsd };
  }
}
