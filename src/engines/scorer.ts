/**
 * Personalization scorer, ranker, and smart filter.
 */

import type { ProfileContext, Task, TaskSource } from '../types/index.js';
import { logger } from '../utils/logger.js';

const LLM_SOURCES: ReadonlySet<TaskSource> = new Set([
  'unique_generator',
  'full_llm_generator',
  'atomic_task_generator',
  'research_agent',
]);

const FOUNDER_KEYWORDS = ['startup', 'founder', 'built', 'users'];
const GPA_KEYWORDS = ['gpa', 'optional essay', 'academic context'];
const ESSAY_KEYWORDS = ['essay', 'sop', 'statement', 'personal'];

export const SCORE_POINTS = {
  llmSource: 25,
  customSource: 20,
  founder: 15,
  gpa: 15,
  highPriority: 10,
  essay: 10,
  templateSource: 5,
} as const;

function mentions(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

/** Keyword bonuses look at the title only; descriptions are free to explain. */
export function personalizationScore(task: Task, context: ProfileContext): number {
  const text = task.title.toLowerCase();
  let score = 0;

  if (LLM_SOURCES.has(task.source)) score += SCORE_POINTS.llmSource;
  else if (task.source === 'custom_generator') score += SCORE_POINTS.customSource;

  if (context.hasStartupBackground && mentions(text, FOUNDER_KEYWORDS)) score += SCORE_POINTS.founder;
  if (context.gpaNeedsCompensation && mentions(text, GPA_KEYWORDS)) score += SCORE_POINTS.gpa;
  if (task.priority >= 4) score += SCORE_POINTS.highPriority;
  if (mentions(text, ESSAY_KEYWORDS)) score += SCORE_POINTS.essay;
  if (task.source === 'template_agent') score += SCORE_POINTS.templateSource;

  return score;
}

/**
 * Score every task and sort by (score desc, priority desc, date asc).
 * Array.prototype.sort is stable, so ties keep their input order.
 */
export function rankTasks(tasks: readonly Task[], context: ProfileContext): Task[] {
  return tasks
    .map((task) => ({ ...task, personalizationScore: personalizationScore(task, context) }))
    .sort(
      (a, b) =>
        b.personalizationScore - a.personalizationScore ||
        b.priority - a.priority ||
        (a.scheduledDate ?? '').localeCompare(b.scheduledDate ?? '')
    );
}

type TestName = keyof ProfileContext['testPrepNeeded'];

const TEST_PATTERNS: Array<[TestName, RegExp]> = [
  ['ielts', /\bielts\b/i],
  ['toefl', /\btoefl\b/i],
  ['gre', /\bgre\b/i],
];

/** Template ids use underscores, so no word boundaries here */
const PREP_PATTERN = /prep|practice|mock|study session/i;

function currentScore(context: ProfileContext, test: TestName): number | null {
  const study = context.study;
  if (!study) return null;
  switch (test) {
    case 'ielts':
      return study.currentIelts;
    case 'toefl':
      return study.currentToefl;
    case 'gre':
      return study.currentGre;
  }
}

/**
 * Prep work (not registration) for a test whose score on file already meets
 * the target. Without a score the need is undetermined and the task stays.
 */
function isUnneededTestPrep(task: Task, context: ProfileContext): boolean {
  const text = `${task.title} ${task.templateId ?? ''}`;
  if (!PREP_PATTERN.test(text)) return false;
  return TEST_PATTERNS.some(
    ([test, pattern]) =>
      pattern.test(text) && currentScore(context, test) !== null && !context.testPrepNeeded[test]
  );
}

function isLinkedIn(task: Task): boolean {
  return /linkedin/i.test(`${task.title} ${task.templateId ?? ''}`);
}

/**
 * Drop prep tasks for tests the user already passes, and the generic
 * LinkedIn template when a founder already has a custom LinkedIn task.
 */
export function smartFilter(tasks: readonly Task[], context: ProfileContext): Task[] {
  const hasCustomLinkedIn =
    context.hasStartupBackground && tasks.some((task) => task.source === 'custom_generator' && isLinkedIn(task));

  const kept = tasks.filter((task) => {
    if (isUnneededTestPrep(task, context)) return false;
    if (hasCustomLinkedIn && task.source === 'template_agent' && isLinkedIn(task)) return false;
    return true;
  });

  if (kept.length < tasks.length) {
    logger.info('Smart filter removed tasks', { before: tasks.length, after: kept.length });
  }
  return kept;
}
