/**
 * Atomicity Checker
 *
 * Rule checks for tasks coming out of the two-tier generator. A task is
 * atomic when it is one action, fits in a single sitting, names a concrete
 * resource, leaves something behind, and is not itself planning work.
 *
 * Failing tasks can be split by one LLM call into 2-4 smaller tasks.
 */

import { z } from 'zod';
import type { ProfileContext, Task } from '../types/index.js';
import { describeProfile, describeTask, TASK_JSON_SHAPE } from '../prompts/index.js';
import { lazy, loadDataFile } from '../utils/data.js';
import { extractList } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import { requestJson } from './llm-client.js';
import type { LlmService } from './llm-client.js';
import { parseLlmTasks } from './task-builder.js';
import { getActionVerbs } from './task-validator.js';

const AtomicityRulesSchema = z.object({
  metaPhrases: z.array(z.string()),
  sequencePatterns: z.array(z.string()),
  genericResources: z.array(z.string()),
  outputKeywords: z.array(z.string()),
});

const getRules = lazy(() => {
  const raw = loadDataFile('atomicity.yaml', AtomicityRulesSchema);
  return {
    ...raw,
    sequencePatterns: raw.sequencePatterns.map((pattern) => new RegExp(pattern, 'i')),
  };
});

export function getMetaPhrases(): readonly string[] {
  return getRules().metaPhrases;
}

export const ATOMIC_MIN_MINUTES = 10;
export const ATOMIC_MAX_MINUTES = 90;
export const ATOMICITY_PASS_SCORE = 60;
const POINTS_PER_CHECK = 20;
const MIN_DELIVERABLE_LENGTH = 10;
const MAX_BREAKDOWN_TASKS = 4;

const URL_OR_DOMAIN = /https?:\/\/|\b[a-z0-9-]+\.(?:com|org|edu|net|io|gov|ac\.uk|co\.uk)\b/i;
const CAPITALIZED_PAIR = /\b[A-Z][\w&'-]*\s+[A-Z][\w&'-]*/;

export type AtomicityCheck = 'singleAction' | 'timeboxInRange' | 'specificResource' | 'hasDeliverable' | 'noMeta';

const CHECK_NAMES: readonly AtomicityCheck[] = [
  'singleAction',
  'timeboxInRange',
  'specificResource',
  'hasDeliverable',
  'noMeta',
];

const CHECK_ISSUES: Record<AtomicityCheck, string> = {
  singleAction: 'Title combines several actions or steps',
  timeboxInRange: `Timebox must be between ${ATOMIC_MIN_MINUTES} and ${ATOMIC_MAX_MINUTES} minutes`,
  specificResource: 'Does not name a concrete person, website, or document',
  hasDeliverable: 'No clear output when the task is done',
  noMeta: 'Describes planning work instead of an action',
};

export interface AtomicityResult {
  score: number;
  valid: boolean;
  checks: Record<AtomicityCheck, boolean>;
  issues: string[];
}

export interface AtomicityBatchResult {
  total: number;
  atomic: number;
  nonAtomic: number;
  /** Mean score across the batch, 0-100 */
  atomicityScore: number;
  failedTasks: Array<{ title: string; score: number; issues: string[] }>;
}

function firstWord(text: string): string {
  return text.trim().toLowerCase().split(/\s+/)[0] ?? '';
}

export function isSingleAction(task: Task): boolean {
  const { sequencePatterns } = getRules();
  if (sequencePatterns.some((pattern) => pattern.test(task.title))) return false;

  const verbs = new Set(getActionVerbs());
  const clauses = task.title.split(/\s+and\s+/i);
  if (clauses.length < 2) return true;

  const verbLed = clauses.filter((clause) => verbs.has(firstWord(clause))).length;
  return verbLed < 2;
}

export function isTimeboxInRange(task: Task): boolean {
  return task.timeboxMinutes >= ATOMIC_MIN_MINUTES && task.timeboxMinutes <= ATOMIC_MAX_MINUTES;
}

export function hasSpecificResource(task: Task): boolean {
  const text = `${task.title} ${task.description} ${task.specificResource ?? ''}`.toLowerCase();
  if (getRules().genericResources.some((generic) => text.includes(generic))) return false;

  if (task.specificResource && task.specificResource.trim().length > 0) return true;
  if (URL_OR_DOMAIN.test(`${task.title} ${task.description}`)) return true;

  const titleRest = task.title.trim().split(/\s+/).slice(1).join(' ');
  return CAPITALIZED_PAIR.test(titleRest) || CAPITALIZED_PAIR.test(task.description);
}

export function hasDeliverable(task: Task): boolean {
  if ((task.deliverable?.trim().length ?? 0) > MIN_DELIVERABLE_LENGTH) return true;
  if (task.definitionOfDone.length > 0) return true;
  const description = task.description.toLowerCase();
  return getRules().outputKeywords.some((keyword) => description.includes(keyword));
}

export function hasNoMeta(task: Task): boolean {
  const text = `${task.title} ${task.description}`.toLowerCase();
  return !getRules().metaPhrases.some((phrase) => text.includes(phrase));
}

export function checkAtomicity(task: Task): AtomicityResult {
  const checks: Record<AtomicityCheck, boolean> = {
    singleAction: isSingleAction(task),
    timeboxInRange: isTimeboxInRange(task),
    specificResource: hasSpecificResource(task),
    hasDeliverable: hasDeliverable(task),
    noMeta: hasNoMeta(task),
  };
  const score = CHECK_NAMES.filter((name) => checks[name]).length * POINTS_PER_CHECK;

  return {
    score,
    valid: score >= ATOMICITY_PASS_SCORE,
    checks,
    issues: CHECK_NAMES.filter((name) => !checks[name]).map((name) => CHECK_ISSUES[name]),
  };
}

/**
 * Gate for tasks that keep the atomic source: the 60-point score alone lets
 * an out-of-range timebox through, so the timebox is required on its own.
 */
export function isAcceptedAsAtomic(task: Task): boolean {
  return isTimeboxInRange(task) && checkAtomicity(task).valid;
}

export function validateAtomicBatch(tasks: readonly Task[]): AtomicityBatchResult {
  const results = tasks.map((task) => ({ task, result: checkAtomicity(task) }));
  const failed = results.filter(({ result }) => !result.valid);
  const total = results.length;

  return {
    total,
    atomic: total - failed.length,
    nonAtomic: failed.length,
    atomicityScore: total > 0 ? Math.round(results.reduce((sum, { result }) => sum + result.score, 0) / total) : 0,
    failedTasks: failed.map(({ task, result }) => ({ title: task.title, score: result.score, issues: result.issues })),
  };
}

const BREAKDOWN_PROMPT = `You split a task that is too big into smaller atomic tasks.

An atomic task is one action, 10-90 minutes, names a concrete resource (a person, website, or document), and produces a clear deliverable. Never output planning tasks such as "develop a plan" or "create a strategy".

Split the task into 2-4 atomic tasks that together achieve the same result, in the order they should be done.

Return JSON:
${TASK_JSON_SHAPE}`;

/**
 * Split one non-atomic task. Only children that pass `isAcceptedAsAtomic`
 * are returned; [] when the model is unavailable, fails, or produces nothing
 * usable, in which case the caller drops the task.
 */
export async function breakdownTask(llm: LlmService, task: Task, context: ProfileContext): Promise<Task[]> {
  if (!llm.isAvailable()) return [];

  const issues = checkAtomicity(task).issues;
  try {
    const { data } = await requestJson(llm, {
      system: BREAKDOWN_PROMPT,
      user: [
        `PROFILE\n${describeProfile(context)}`,
        `TASK\n${describeTask(task)}`,
        `PROBLEMS\n${issues.map((issue) => `- ${issue}`).join('\n')}`,
      ].join('\n\n'),
      maxTokens: 2048,
      temperature: 0.4,
      operation: 'breakdown_task',
    });

    const children = parseLlmTasks(extractList(data, 'tasks'), {
      source: task.source,
      minPriority: task.priority,
      timeboxMinutes: Math.min(task.timeboxMinutes, ATOMIC_MAX_MINUTES),
    })
      .slice(0, MAX_BREAKDOWN_TASKS)
      .map((child) => ({
        ...child,
        ...(task.milestoneTitle !== undefined && { milestoneTitle: task.milestoneTitle }),
        ...(task.milestoneIndex !== undefined && { milestoneIndex: task.milestoneIndex }),
      }))
      .filter((child) => {
        if (isAcceptedAsAtomic(child)) return true;
        logger.debug('Breakdown child rejected', undefined, { title: child.title, timebox: child.timeboxMinutes });
        return false;
      });

    logger.debug('Task broken down', undefined, { title: task.title, children: children.length });
    return children;
  } catch (error) {
    logger.warn('Task breakdown failed; dropping task', error, { title: task.title });
    return [];
  }
}
