import stringSimilarity from 'string-similarity';
import type { Task } from '../types/index.js';
import { logger } from '../utils/logger.js';

/** Titles at or above this similarity are the same task */
export const DUPLICATE_THRESHOLD = 0.85;

export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Sørensen-Dice similarity over bigrams of the normalized titles.
 */
export function titleSimilarity(a: string, b: string): number {
  return stringSimilarity.compareTwoStrings(normalizeTitle(a), normalizeTitle(b));
}

/**
 * Drop every task whose title is too close to one already kept. Input order
 * decides which copy survives, so callers pass tasks in generator order.
 */
export function deduplicateTasks(tasks: readonly Task[], threshold: number = DUPLICATE_THRESHOLD): Task[] {
  const kept: Task[] = [];
  for (const task of tasks) {
    const duplicateOf = kept.find((existing) => titleSimilarity(existing.title, task.title) >= threshold);
    if (duplicateOf) {
      logger.debug('Duplicate task removed', undefined, { title: task.title, duplicateOf: duplicateOf.title });
      continue;
    }
    kept.push(task);
  }
  if (kept.length < tasks.length) {
    logger.info('Duplicates removed', { before: tasks.length, after: kept.length });
  }
  return kept;
}
