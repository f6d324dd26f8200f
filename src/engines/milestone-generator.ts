/**
 * Two-tier Milestone → Atomic Task Generator
 *
 * Tier 1 asks for five milestones covering the goal timeline. Tier 2 expands
 * each surviving milestone into 5-6 atomic tasks, one LLM call per milestone.
 *
 * The run is a small state machine:
 *
 *   start → milestones_requested → milestones_received
 *         → per_milestone_expansion → atomic_tasks_collected → done
 *
 * `failed` is reachable from every state. Each transition is logged and kept
 * in the history returned by `getHistory()`.
 */

import type { Milestone, ProfileContext, Task, UserStories } from '../types/index.js';
import { MilestoneSchema } from '../types/index.js';
import { describeMilestone, describeProfile, describeStories, TASK_JSON_SHAPE } from '../prompts/index.js';
import { DEFAULT_DAYS_AHEAD } from '../utils/config.js';
import { ErrorCode, PlannerError } from '../utils/errors.js';
import { extractList, isRecord } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import { ATOMIC_MAX_MINUTES, ATOMIC_MIN_MINUTES, getMetaPhrases } from './atomicity-checker.js';
import { requestJson } from './llm-client.js';
import type { LlmService } from './llm-client.js';
import { dod, inferDeliverableType, LlmTaskSchema, llmTimebox, taskFromLlm } from './task-builder.js';

export type GeneratorState =
  | 'start'
  | 'milestones_requested'
  | 'milestones_received'
  | 'per_milestone_expansion'
  | 'atomic_tasks_collected'
  | 'done'
  | 'failed';

const TRANSITIONS: Record<GeneratorState, readonly GeneratorState[]> = {
  start: ['milestones_requested'],
  milestones_requested: ['milestones_received'],
  milestones_received: ['per_milestone_expansion'],
  per_milestone_expansion: ['atomic_tasks_collected'],
  atomic_tasks_collected: ['done'],
  done: [],
  failed: [],
};

export const REQUESTED_MILESTONES = 5;
export const MIN_MILESTONES = 3;
export const MAX_MILESTONES = 7;
export const MIN_TIMELINE_WEEKS = 4;
export const MAX_ATOMIC_TITLE_LENGTH = 120;
const ATOMIC_MIN_PRIORITY = 2;

export interface StateTransition {
  from: GeneratorState;
  to: GeneratorState;
  at: string;
  reason?: string;
}

export interface TwoTierOptions {
  daysAhead?: number;
  stories: UserStories;
}

export interface TwoTierResult {
  milestones: Milestone[];
  tasks: Task[];
}

const MILESTONE_PROMPT = `You break a personal goal into milestones.

Return exactly ${REQUESTED_MILESTONES} milestones that together reach the goal within the timeline. Each milestone:
- title: at least 10 characters, outcome-focused
- description: one or two sentences
- duration_weeks: whole number from 1 to 8
- success_criteria: how the user knows the milestone is reached

Use the user's own background, achievements and contacts where they help.

Return JSON: {"milestones": [{"title": "...", "description": "...", "duration_weeks": 2, "success_criteria": "..."}]}`;

const ATOMIC_PROMPT = `You expand one milestone into atomic tasks.

Write 5-6 tasks. Every task:
- is ONE action that starts with a verb
- takes 10-90 minutes
- names a concrete resource: a person, a website, or a document
- produces a deliverable that exists when the task is done
- has a title under 120 characters
- is not planning work: never "develop a plan", "create a strategy", "research and ...", "build a framework", "prepare for ...", "design a system"

Order the tasks so they can be done one after another.

Return JSON:
${TASK_JSON_SHAPE}`;

/**
 * Convert a model-written milestone (snake or camel case) into a Milestone,
 * or null when it fails validation.
 */
export function parseMilestone(raw: unknown): Milestone | null {
  if (!isRecord(raw)) return null;
  const duration = raw.duration_weeks ?? raw.durationWeeks;
  const result = MilestoneSchema.safeParse({
    title: raw.title,
    description: raw.description,
    durationWeeks: typeof duration === 'string' ? Number(duration) : duration,
    successCriteria: raw.success_criteria ?? raw.successCriteria,
  });
  return result.success ? result.data : null;
}

/**
 * The reason a model-written atomic task is rejected, or null when it is kept.
 */
export function atomicRejectionReason(raw: unknown): string | null {
  const parsed = LlmTaskSchema.safeParse(raw);
  if (!parsed.success) return 'missing title';
  const task = parsed.data;
  if (!task.description?.trim()) return 'missing description';

  const timebox = llmTimebox(task);
  if (timebox === undefined || !Number.isFinite(timebox)) return 'missing timebox';
  if (timebox < ATOMIC_MIN_MINUTES || timebox > ATOMIC_MAX_MINUTES) return 'timebox out of range';
  if (task.title.length > MAX_ATOMIC_TITLE_LENGTH) return 'title too long';

  const title = task.title.toLowerCase();
  if (getMetaPhrases().some((phrase) => title.includes(phrase))) return 'meta task';
  return null;
}

/**
 * Normalize one surviving atomic task and stamp it with its milestone.
 */
export function toAtomicTask(raw: unknown, milestone: Milestone, milestoneIndex: number): Task | null {
  const parsed = LlmTaskSchema.safeParse(raw);
  if (!parsed.success) return null;

  const base = taskFromLlm(parsed.data, {
    source: 'atomic_task_generator',
    minPriority: ATOMIC_MIN_PRIORITY,
  });
  const deliverable = parsed.data.deliverable?.trim() || base.title;

  return {
    ...base,
    taskType: 'copilot',
    deliverable,
    deliverableType: inferDeliverableType(deliverable),
    definitionOfDone: dod([deliverable, 100]),
    milestoneTitle: milestone.title,
    milestoneIndex,
  };
}

export class TwoTierGenerator {
  private state: GeneratorState = 'start';
  private history: StateTransition[] = [];
  private milestones: Milestone[] = [];

  constructor(
    private readonly llm: LlmService,
    private readonly context: ProfileContext
  ) {}

  getState(): GeneratorState {
    return this.state;
  }

  getHistory(): readonly StateTransition[] {
    return this.history;
  }

  /** Ordered state names visited, starting with `start` */
  getStatePath(): string[] {
    return ['start', ...this.history.map((transition) => transition.to)];
  }

  getMilestones(): readonly Milestone[] {
    return this.milestones;
  }

  private transition(to: GeneratorState, reason?: string): void {
    const from = this.state;
    if (to !== 'failed' && !TRANSITIONS[from].includes(to)) {
      throw new PlannerError(`Invalid generator transition ${from} → ${to}`, ErrorCode.INTERNAL_ERROR, {
        details: { from, to },
      });
    }
    this.state = to;
    this.history.push({ from, to, at: new Date().toISOString(), ...(reason !== undefined && { reason }) });
    logger.info('Two-tier state transition', { from, to, ...(reason !== undefined && { reason }) });
  }

  private fail(reason: string): TwoTierResult {
    this.transition('failed', reason);
    return { milestones: this.milestones, tasks: [] };
  }

  /**
   * Run both tiers. Never throws for model or transport problems: tier 1
   * failing yields no tasks, a milestone failing yields no tasks for it.
   */
  async generate(options: TwoTierOptions): Promise<TwoTierResult> {
    this.state = 'start';
    this.history = [];
    this.milestones = [];

    if (!this.llm.isAvailable()) {
      return this.fail('llm unavailable');
    }

    const weeks = Math.max(MIN_TIMELINE_WEEKS, Math.floor((options.daysAhead ?? DEFAULT_DAYS_AHEAD) / 7));

    this.transition('milestones_requested');
    let rawMilestones: unknown[];
    try {
      const { data } = await requestJson(this.llm, {
        system: MILESTONE_PROMPT,
        user: [
          `GOAL: ${this.context.goalTitle}`,
          `TIMELINE: ${weeks} weeks`,
          `PROFILE\n${describeProfile(this.context)}`,
          `STORIES\n${describeStories(options.stories)}`,
        ].join('\n\n'),
        maxTokens: 2048,
        temperature: 0.5,
        operation: 'generate_milestones',
      });
      rawMilestones = extractList(data, 'milestones');
    } catch (error) {
      logger.warn('Milestone request failed', error);
      return this.fail('milestone request failed');
    }

    const milestones = rawMilestones
      .map(parseMilestone)
      .filter((milestone): milestone is Milestone => milestone !== null)
      .slice(0, MAX_MILESTONES);
    logger.info('Milestones parsed', { received: rawMilestones.length, kept: milestones.length });

    if (milestones.length < MIN_MILESTONES) {
      return this.fail(`only ${milestones.length} valid milestones`);
    }
    this.milestones = milestones;
    this.transition('milestones_received');

    this.transition('per_milestone_expansion');
    const tasks: Task[] = [];
    for (const [offset, milestone] of milestones.entries()) {
      tasks.push(...(await this.expandMilestone(milestone, offset + 1, options.stories)));
    }

    this.transition('atomic_tasks_collected');
    logger.info('Atomic tasks collected', { milestones: milestones.length, tasks: tasks.length });
    this.transition('done');
    return { milestones, tasks };
  }

  private async expandMilestone(milestone: Milestone, index: number, stories: UserStories): Promise<Task[]> {
    let items: unknown[];
    try {
      const { data } = await requestJson(this.llm, {
        system: ATOMIC_PROMPT,
        user: [
          describeMilestone(milestone, index),
          `PROFILE\n${describeProfile(this.context)}`,
          `STORIES\n${describeStories(stories)}`,
        ].join('\n\n'),
        maxTokens: 3072,
        temperature: 0.5,
        operation: 'generate_atomic_tasks',
      });
      items = extractList(data, 'tasks');
    } catch (error) {
      logger.warn('Atomic task request failed; milestone yields no tasks', error, { milestoneIndex: index });
      return [];
    }

    const tasks: Task[] = [];
    let rejected = 0;
    for (const item of items) {
      const reason = atomicRejectionReason(item);
      const task = reason === null ? toAtomicTask(item, milestone, index) : null;
      if (task) {
        tasks.push(task);
      } else {
        rejected++;
        logger.debug('Atomic task rejected', undefined, { milestoneIndex: index, reason });
      }
    }
    logger.info('Milestone expanded', { milestoneIndex: index, kept: tasks.length, rejected });
    return tasks;
  }
}
