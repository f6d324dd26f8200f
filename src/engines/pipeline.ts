/**
 * Plan pipeline
 *
 * generatePlan(profile, goal) runs every stage in order:
 *
 *   context → coverage → generators (by path) → enrich
 *     → atomicity + breakdown (two-tier) → fast validator
 *     → verify-and-fix (two-tier, full-LLM) → smart filter → dedup
 *     → schedule → rank → wire invariants → persist
 *
 * Generators never throw for model problems; when all of them come back
 * empty the result is `status: 'empty'`.
 */

import type {
  CoverageResult,
  Goal,
  PersistSummary,
  PlanOptions,
  PlanPath,
  PlanResult,
  PlanStats,
  ProfileContext,
  Task,
  TaskSource,
  UserProfile,
  UserStories,
} from '../types/index.js';
import { WireTaskSchema } from '../types/index.js';
import type { CostLedger, TaskCacheStore, TaskRepository } from '../storage/index.js';
import { DEFAULT_DAYS_AHEAD, DEFAULT_LLM_BUDGET_USD } from '../utils/config.js';
import { idempotencyKey } from '../utils/id.js';
import { logger } from '../utils/logger.js';
import { breakdownTask, isAcceptedAsAtomic } from './atomicity-checker.js';
import { MemoryCostLedger, MeteredLlmService } from './budget.js';
import { detectCoverage } from './coverage-detector.js';
import { generateCustomTasks } from './custom-generator.js';
import { deduplicateTasks } from './deduplicator.js';
import { enrichTasks } from './enricher.js';
import type { LlmService } from './llm-client.js';
import { generateFullLlmTasks, generateUniqueTasks } from './llm-generator.js';
import { TwoTierGenerator } from './milestone-generator.js';
import { extractContext } from './profile-extractor.js';
import { ResearchAgent } from './research-agent.js';
import type { SearchService } from './research-agent.js';
import { scheduleTasks, todayIso } from './scheduler.js';
import { rankTasks, smartFilter } from './scorer.js';
import { extractStories } from './story-extractor.js';
import { TaskCache } from './task-cache.js';
import { clampTimebox, dod, normalizeDod } from './task-builder.js';
import { validateTask } from './task-validator.js';
import { TaskVerifier } from './task-verifier.js';
import { generateFromTemplates } from './template-generator.js';

export const MAX_WIRE_TITLE_LENGTH = 150;

export interface PipelineDeps {
  llm: LlmService;
  cacheStore?: TaskCacheStore | undefined;
  ledger?: CostLedger | undefined;
  repository?: TaskRepository | undefined;
  search?: SearchService | undefined;
  /** Per-user LLM spend limit in dollars */
  budgetUsd?: number | undefined;
}

function emptyStats(): PlanStats {
  return {
    generated: {},
    enriched: 0,
    rejectedByValidator: 0,
    rejectedByAtomicity: 0,
    rejectedByVerifier: 0,
    removedByFilter: 0,
    removedAsDuplicates: 0,
    final: 0,
  };
}

function countBySource(tasks: readonly Task[]): Partial<Record<TaskSource, number>> {
  const counts: Partial<Record<TaskSource, number>> = {};
  for (const task of tasks) {
    counts[task.source] = (counts[task.source] ?? 0) + 1;
  }
  return counts;
}

/**
 * Enforce the outgoing shape: timebox within bounds, DoD weights summing to
 * 100, title at most 150 characters. Returns null when the task still does
 * not fit.
 */
export function finalizeTask(task: Task): Task | null {
  const title = task.title.trim();
  const finalized: Task = {
    ...task,
    title: title.length > MAX_WIRE_TITLE_LENGTH ? title.slice(0, MAX_WIRE_TITLE_LENGTH).trimEnd() : title,
    timeboxMinutes: clampTimebox(task.timeboxMinutes),
    definitionOfDone:
      task.definitionOfDone.length > 0 ? normalizeDod(task.definitionOfDone) : dod([task.deliverable ?? title, 100]),
  };
  const check = WireTaskSchema.safeParse(finalized);
  if (!check.success) {
    logger.warn('Task does not fit the outgoing shape; dropping', check.error, { title });
    return null;
  }
  return finalized;
}

export function choosePath(coverage: CoverageResult, requested?: PlanPath): PlanPath {
  return requested ?? coverage.strategy;
}

class PlanRun {
  readonly stats = emptyStats();
  readonly llm: MeteredLlmService;
  private readonly cache: TaskCache;
  private stories: UserStories | null = null;
  stateHistory: string[] | undefined;

  constructor(
    readonly context: ProfileContext,
    private readonly deps: PipelineDeps,
    private readonly options: PlanOptions
  ) {
    this.llm = new MeteredLlmService(deps.llm, deps.ledger ?? new MemoryCostLedger(), {
      userId: context.userId,
      limitUsd: deps.budgetUsd ?? DEFAULT_LLM_BUDGET_USD,
    });
    this.cache = new TaskCache(deps.cacheStore);
  }

  private async getStories(): Promise<UserStories> {
    this.stories ??= await extractStories(this.llm, this.context);
    return this.stories;
  }

  async generate(path: PlanPath): Promise<Task[]> {
    if (this.deps.llm.isAvailable() && this.llm.isExhausted()) {
      logger.warn('LLM budget exhausted; LLM generators will be skipped', undefined, { userId: this.context.userId });
    }

    switch (path) {
      case 'templates':
        return [...generateFromTemplates(this.context), ...generateCustomTasks(this.context)];
      case 'hybrid': {
        const templates = generateFromTemplates(this.context);
        const custom = generateCustomTasks(this.context);
        const unique = await generateUniqueTasks(this.context, {
          llm: this.llm,
          cache: this.cache,
          stories: await this.getStories(),
        });
        return [...templates, ...custom, ...unique.tasks];
      }
      case 'full_llm': {
        const full = await generateFullLlmTasks(this.context, {
          llm: this.llm,
          cache: this.cache,
          stories: await this.getStories(),
        });
        return [...generateCustomTasks(this.context), ...full.tasks];
      }
      case 'two_tier':
        return this.generateTwoTier();
    }
  }

  private async generateTwoTier(): Promise<Task[]> {
    const stories = await this.getStories();
    const generator = new TwoTierGenerator(this.llm, this.context);
    const { milestones, tasks } = await generator.generate({
      stories,
      daysAhead: this.options.daysAhead ?? DEFAULT_DAYS_AHEAD,
    });
    this.stateHistory = generator.getStatePath();

    if (!this.options.research || generator.getState() !== 'done') return tasks;

    const agent = new ResearchAgent({ llm: this.llm, search: this.deps.search });
    const researched: Task[] = [];
    for (const [offset, milestone] of milestones.entries()) {
      researched.push(...(await agent.researchMilestone(milestone, offset + 1, this.context)));
    }
    return [...tasks, ...researched];
  }

  async applyAtomicity(tasks: readonly Task[]): Promise<Task[]> {
    const kept: Task[] = [];
    for (const task of tasks) {
      if (isAcceptedAsAtomic(task)) {
        kept.push(task);
        continue;
      }
      const children = await breakdownTask(this.llm, task, this.context);
      if (children.length === 0) {
        this.stats.rejectedByAtomicity++;
        logger.debug('Non-atomic task dropped', undefined, { title: task.title });
      }
      kept.push(...children);
    }
    return kept;
  }

  applyValidator(tasks: readonly Task[]): Task[] {
    const kept: Task[] = [];
    for (const task of tasks) {
      const result = validateTask(task, this.context);
      if (result.valid) {
        kept.push({ ...task, validationScore: result.score });
      } else {
        this.stats.rejectedByValidator++;
        logger.debug('Task rejected by validator', undefined, {
          title: task.title,
          score: result.score,
          issues: result.issues,
        });
      }
    }
    return kept;
  }

  async applyVerifier(tasks: readonly Task[]): Promise<Task[]> {
    if (!this.llm.isAvailable() || tasks.length === 0) return [...tasks];
    const verifier = new TaskVerifier(this.llm, this.context, await this.getStories());
    const result = await verifier.verifyBatch(tasks);
    this.stats.rejectedByVerifier += result.dropped;
    return result.tasks;
  }

  persist(tasks: readonly Task[]): PersistSummary {
    const summary: PersistSummary = { created: 0, existing: 0 };
    const repository = this.deps.repository;
    if (!repository) return summary;

    for (const task of tasks) {
      const key = idempotencyKey(this.context.userId, task.scheduledDate ?? '', task.title);
      const outcome = repository.saveTask(task, this.context.userId, key);
      if (outcome === 'created') summary.created++;
      else summary.existing++;
    }
    logger.info('Tasks persisted', { created: summary.created, existing: summary.existing });
    return summary;
  }
}

/**
 * Build a scheduled, ranked plan for one goal.
 */
export async function generatePlan(
  profile: UserProfile,
  goal: Goal,
  options: PlanOptions,
  deps: PipelineDeps
): Promise<PlanResult> {
  const context = extractContext(profile, goal);
  const coverage = detectCoverage(context);
  const path = choosePath(coverage, options.path);
  const run = new PlanRun(context, deps, options);
  const { stats } = run;

  logger.updateContext({ path });
  logger.info('Plan generation started', { path, coverageScore: coverage.score, tier: coverage.tier });

  const generated = await logger.stage('generate', () => run.generate(path), (tasks) => ({ tasks: tasks.length }));
  stats.generated = countBySource(generated);

  const enriched = await logger.stage('enrich', () => enrichTasks(generated, context), (result) => ({
    enriched: result.enriched,
  }));
  stats.enriched = enriched.enriched;

  let tasks = enriched.tasks;
  if (path === 'two_tier') {
    tasks = await logger.stage('atomicity', () => run.applyAtomicity(tasks), (kept) => ({
      kept: kept.length,
      rejected: stats.rejectedByAtomicity,
    }));
  }
  tasks = await logger.stage('validate', () => run.applyValidator(tasks), (kept) => ({
    kept: kept.length,
    rejected: stats.rejectedByValidator,
  }));
  if (path === 'two_tier' || path === 'full_llm') {
    tasks = await logger.stage('verify', () => run.applyVerifier(tasks), (kept) => ({
      kept: kept.length,
      dropped: stats.rejectedByVerifier,
    }));
  }

  const filtered = smartFilter(tasks, context);
  stats.removedByFilter = tasks.length - filtered.length;

  const unique = deduplicateTasks(filtered);
  stats.removedAsDuplicates = filtered.length - unique.length;

  const scheduled = scheduleTasks(unique, {
    today: options.today ?? todayIso(),
    daysAhead: options.daysAhead ?? DEFAULT_DAYS_AHEAD,
    mode: path === 'two_tier' ? 'milestone' : 'template',
  });

  const final = rankTasks(scheduled, context)
    .map(finalizeTask)
    .filter((task): task is Task => task !== null);
  stats.final = final.length;

  const result: PlanResult = {
    status: final.length > 0 ? 'ok' : 'empty',
    path,
    coverage,
    tasks: final,
    stats,
    costUsd: run.llm.spentUsd,
    ...(run.stateHistory !== undefined && { stateHistory: run.stateHistory }),
  };

  if (options.persist) {
    result.persisted = run.persist(final);
  }

  logger.info('Plan generation finished', { path, status: result.status, tasks: final.length, costUsd: result.costUsd });
  return result;
}
