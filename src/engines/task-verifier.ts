/**
 * LLM verify-and-fix.
 *
 * Per task: verify → (fails) fix once → rule checks → re-verify → keep or drop.
 * A verify call that fails in transport keeps the task; a fix call that
 * fails drops it. Repairs face the fast validator again, and the atomic
 * gate when they come from the two-tier generator. Only used on the
 * two-tier and full-LLM paths.
 */

import { z } from 'zod';
import type { ProfileContext, Task, UserStories } from '../types/index.js';
import { describeProfile, describeStories, describeTask, TASK_JSON_SHAPE } from '../prompts/index.js';
import { extractList, isRecord } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import { isAcceptedAsAtomic } from './atomicity-checker.js';
import { requestJson } from './llm-client.js';
import type { LlmService } from './llm-client.js';
import { parseLlmTasks } from './task-builder.js';
import { validateTask } from './task-validator.js';

const VERIFY_PROMPT = `You review one task from a personal action plan.

Answer four questions:
- isAtomic: is it one action, 10-90 minutes, with a single deliverable?
- isPersonalized: does it use this user's own situation rather than advice anyone could get?
- hasSpecificResource: does it name a concrete person, website, or document?
- passes: true only when all three are true

List every problem in "issues".

Return JSON: {"isAtomic": true, "isPersonalized": true, "hasSpecificResource": true, "passes": true, "issues": []}`;

const FIX_PROMPT = `You repair one task from a personal action plan so that it passes review.

Fix every listed issue. Keep the task's intent. The repaired task must be one action of 10-90 minutes, start with a verb, name a concrete person, website, or document, and use the user's own stories where they help.

Return JSON with exactly one task:
${TASK_JSON_SHAPE}`;

const VerificationSchema = z.object({
  isAtomic: z.boolean().default(false),
  isPersonalized: z.boolean().default(false),
  hasSpecificResource: z.boolean().default(false),
  passes: z.boolean(),
  issues: z.array(z.string()).default([]),
});

export type Verification = z.infer<typeof VerificationSchema>;

export type VerifyOutcome = 'passed' | 'fixed' | 'failed_open' | 'dropped';

export interface VerifiedTask {
  outcome: VerifyOutcome;
  task: Task | null;
}

export interface VerifyBatchResult {
  tasks: Task[];
  passed: number;
  fixed: number;
  failedOpen: number;
  dropped: number;
}

export class TaskVerifier {
  constructor(
    private readonly llm: LlmService,
    private readonly context: ProfileContext,
    private readonly stories: UserStories
  ) {}

  /**
   * @throws Whatever the transport raised; callers decide how to degrade
   */
  async verify(task: Task): Promise<Verification> {
    const { data } = await requestJson(this.llm, {
      system: VERIFY_PROMPT,
      user: [`PROFILE\n${describeProfile(this.context)}`, `TASK\n${describeTask(task)}`].join('\n\n'),
      maxTokens: 512,
      temperature: 0,
      operation: 'verify_task',
    });
    const parsed = VerificationSchema.safeParse(data);
    if (!parsed.success) {
      return {
        isAtomic: false,
        isPersonalized: false,
        hasSpecificResource: false,
        passes: false,
        issues: ['Verifier returned an unreadable answer'],
      };
    }
    return parsed.data;
  }

  /**
   * One repair call. The fixed task keeps the original's id, source, and
   * milestone stamp.
   *
   * @throws Whatever the transport raised
   */
  async fix(task: Task, issues: readonly string[]): Promise<Task | null> {
    const { data } = await requestJson(this.llm, {
      system: FIX_PROMPT,
      user: [
        `PROFILE\n${describeProfile(this.context)}`,
        `STORIES\n${describeStories(this.stories)}`,
        `TASK\n${describeTask(task)}`,
        `ISSUES\n${issues.map((issue) => `- ${issue}`).join('\n')}`,
      ].join('\n\n'),
      maxTokens: 1024,
      temperature: 0.3,
      operation: 'fix_task',
    });

    const items = isRecord(data) && !('tasks' in data) ? [data] : extractList(data, 'tasks');
    const [repaired] = parseLlmTasks(items, {
      source: task.source,
      taskType: task.taskType,
      minPriority: task.priority,
      timeboxMinutes: task.timeboxMinutes,
    });
    if (!repaired) return null;

    return {
      ...repaired,
      id: task.id,
      ...(task.milestoneTitle !== undefined && { milestoneTitle: task.milestoneTitle }),
      ...(task.milestoneIndex !== undefined && { milestoneIndex: task.milestoneIndex }),
    };
  }

  /**
   * Rule checks a repaired task must pass before it is re-verified. Returns
   * the task stamped with its new validation score, or null.
   */
  checkRepair(repaired: Task): Task | null {
    const validation = validateTask(repaired, this.context);
    if (!validation.valid) {
      logger.info('Repaired task failed validation; dropping', { title: repaired.title, issues: validation.issues });
      return null;
    }
    if (repaired.source === 'atomic_task_generator' && !isAcceptedAsAtomic(repaired)) {
      logger.info('Repaired task is not atomic; dropping', {
        title: repaired.title,
        timebox: repaired.timeboxMinutes,
      });
      return null;
    }
    return { ...repaired, validationScore: validation.score };
  }

  async verifyAndFix(task: Task): Promise<VerifiedTask> {
    let first: Verification;
    try {
      first = await this.verify(task);
    } catch (error) {
      logger.warn('Verification call failed; keeping task', error, { title: task.title });
      return { outcome: 'failed_open', task };
    }
    if (first.passes) return { outcome: 'passed', task };

    try {
      const fixed = await this.fix(task, first.issues);
      if (!fixed) {
        logger.info('Fix produced no task; dropping', { title: task.title });
        return { outcome: 'dropped', task: null };
      }
      const repaired = this.checkRepair(fixed);
      if (!repaired) return { outcome: 'dropped', task: null };

      const second = await this.verify(repaired);
      if (second.passes) {
        logger.debug('Task repaired', undefined, { before: task.title, after: repaired.title });
        return { outcome: 'fixed', task: repaired };
      }
      logger.info('Task failed re-verification; dropping', { title: repaired.title, issues: second.issues });
      return { outcome: 'dropped', task: null };
    } catch (error) {
      logger.warn('Task repair failed; dropping task', error, { title: task.title });
      return { outcome: 'dropped', task: null };
    }
  }

  async verifyBatch(tasks: readonly Task[]): Promise<VerifyBatchResult> {
    const result: VerifyBatchResult = { tasks: [], passed: 0, fixed: 0, failedOpen: 0, dropped: 0 };
    for (const task of tasks) {
      const { outcome, task: kept } = await this.verifyAndFix(task);
      if (outcome === 'passed') result.passed++;
      else if (outcome === 'fixed') result.fixed++;
      else if (outcome === 'failed_open') result.failedOpen++;
      else result.dropped++;
      if (kept) result.tasks.push(kept);
    }
    logger.info('Verification finished', {
      total: tasks.length,
      passed: result.passed,
      fixed: result.fixed,
      failedOpen: result.failedOpen,
      dropped: result.dropped,
    });
    return result;
  }
}
