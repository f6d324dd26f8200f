/**
 * Fast Task Validator
 *
 * Five equal-weight rule checks, no LLM. Runs on every task.
 * - score = floor(passed / 5 * 100)
 * - valid at 80 or more (at most one failed check)
 * - hard reject below 60
 */

import { z } from 'zod';
import type { ProfileContext, Task, TaskSource } from '../types/index.js';
import { lazy, loadDataFile } from '../utils/data.js';
import { wholeWordPattern } from '../utils/text.js';

const ValidatorRulesSchema = z.object({
  actionVerbs: z.array(z.string()).min(1),
  weakVerbs: z.array(z.string()),
  vaguePatterns: z.array(z.string()),
  genericPhrases: z.array(z.string()),
  bracketWhitelist: z.array(z.string()),
});

const getRules = lazy(() => {
  const raw = loadDataFile('validator.yaml', ValidatorRulesSchema);
  return {
    ...raw,
    vaguePatterns: raw.vaguePatterns.map((pattern) => new RegExp(pattern, 'i')),
    genericPhrases: raw.genericPhrases.map((phrase) => wholeWordPattern(phrase)),
    bracketWhitelist: raw.bracketWhitelist.map((pattern) => new RegExp(pattern, 'i')),
  };
});

export function getActionVerbs(): readonly string[] {
  return getRules().actionVerbs;
}

export const PASS_THRESHOLD = 80;
export const HARD_REJECT_THRESHOLD = 60;
export const MIN_SPECIFIC_TITLE_LENGTH = 20;
const CONTEXT_TEXT_MIN_LENGTH = 50;
const MAX_REALISTIC_TIMEBOX = 600;

/** Sources whose tasks are contextual by construction */
const CONTEXTUAL_SOURCES: ReadonlySet<TaskSource> = new Set(['custom_generator', 'unique_generator', 'research_agent']);

export type ValidationCheck = 'hasUserContext' | 'isSpecific' | 'isActionable' | 'hasRealisticTimebox' | 'notGeneric';

const CHECK_NAMES: readonly ValidationCheck[] = [
  'hasUserContext',
  'isSpecific',
  'isActionable',
  'hasRealisticTimebox',
  'notGeneric',
];

export interface TaskValidationResult {
  score: number;
  valid: boolean;
  hardReject: boolean;
  checks: Record<ValidationCheck, boolean>;
  issues: string[];
}

export interface BatchValidationResult {
  total: number;
  passed: number;
  failed: number;
  /** Failed but above the hard-reject line */
  needsRegeneration: number;
  averageScore: number;
  failedTasks: Array<{ title: string; score: number; issues: string[] }>;
}

function combinedText(task: Task): string {
  return `${task.title} ${task.description}`.toLowerCase();
}

export function hasUserContext(task: Task, context: ProfileContext): boolean {
  if (CONTEXTUAL_SOURCES.has(task.source)) return true;

  const text = combinedText(task);
  const names = [...(context.study?.targetUniversities ?? []), context.field, context.startupName ?? '']
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);
  if (names.some((name) => text.includes(name))) return true;

  return /\d/.test(text) && text.length > CONTEXT_TEXT_MIN_LENGTH;
}

export function isSpecific(task: Task): boolean {
  if (task.title.trim().length < MIN_SPECIFIC_TITLE_LENGTH) return false;
  return !getRules().vaguePatterns.some((pattern) => pattern.test(task.title));
}

export function isActionable(task: Task): boolean {
  const { actionVerbs, weakVerbs } = getRules();
  const title = task.title.toLowerCase();
  if (weakVerbs.some((weak) => title.includes(weak))) return false;

  const words = title.split(/\s+/).filter(Boolean);
  const firstWord = words[0] ?? '';
  if (actionVerbs.some((verb) => firstWord.includes(verb))) return true;

  const firstThree = words.slice(0, 3).join(' ');
  return actionVerbs.some((verb) => firstThree.includes(verb));
}

export function hasRealisticTimebox(task: Task): boolean {
  return task.timeboxMinutes > 0 && task.timeboxMinutes <= MAX_REALISTIC_TIMEBOX;
}

export function isNotGeneric(task: Task): boolean {
  const { genericPhrases, bracketWhitelist } = getRules();
  const text = combinedText(task);
  if (genericPhrases.some((phrase) => phrase.test(text))) return false;

  const brackets = text.match(/\[[^\]]*\]/g) ?? [];
  return brackets.every((bracket) => bracketWhitelist.some((pattern) => pattern.test(bracket)));
}

const CHECK_ISSUES: Record<ValidationCheck, string> = {
  hasUserContext: 'Does not reference the user (target university, field, startup) or concrete numbers',
  isSpecific: 'Title is too short or vague',
  isActionable: 'Title does not start with a clear action verb',
  hasRealisticTimebox: 'Timebox must be between 1 and 600 minutes',
  notGeneric: 'Contains generic phrases or placeholders',
};

/**
 * Score one task against the five checks.
 */
export function validateTask(task: Task, context: ProfileContext): TaskValidationResult {
  const checks: Record<ValidationCheck, boolean> = {
    hasUserContext: hasUserContext(task, context),
    isSpecific: isSpecific(task),
    isActionable: isActionable(task),
    hasRealisticTimebox: hasRealisticTimebox(task),
    notGeneric: isNotGeneric(task),
  };

  const passed = CHECK_NAMES.filter((name) => checks[name]).length;
  const score = Math.floor((passed * 100) / CHECK_NAMES.length);

  return {
    score,
    valid: score >= PASS_THRESHOLD,
    hardReject: score < HARD_REJECT_THRESHOLD,
    checks,
    issues: CHECK_NAMES.filter((name) => !checks[name]).map((name) => CHECK_ISSUES[name]),
  };
}

export function validateBatch(tasks: readonly Task[], context: ProfileContext): BatchValidationResult {
  const results = tasks.map((task) => ({ task, result: validateTask(task, context) }));
  const failed = results.filter(({ result }) => !result.valid);
  const total = results.length;

  return {
    total,
    passed: total - failed.length,
    failed: failed.length,
    needsRegeneration: failed.filter(({ result }) => !result.hardReject).length,
    averageScore: total > 0 ? Math.round(results.reduce((sum, { result }) => sum + result.score, 0) / total) : 0,
    failedTasks: failed.map(({ task, result }) => ({ title: task.title, score: result.score, issues: result.issues })),
  };
}
