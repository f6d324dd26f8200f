/**
 * Scheduler
 *
 * Assigns `scheduledDate` to every task as a day offset from `today`:
 * - template batches: two tasks per day, min(⌊i/2⌋, daysAhead)
 * - milestone batches: each milestone starts two weeks after the previous
 *   one and its tasks are two days apart, min((m-1)·14 + t·2, daysAhead)
 *
 * Pure and deterministic for the same input and `today`.
 */

import { DateTime } from 'luxon';
import type { Task } from '../types/index.js';
import { DEFAULT_DAYS_AHEAD } from '../utils/config.js';
import { ValidationError } from '../utils/errors.js';

export type ScheduleMode = 'template' | 'milestone';

export const TASKS_PER_DAY = 2;
export const DAYS_PER_MILESTONE = 14;
export const DAYS_BETWEEN_MILESTONE_TASKS = 2;

export interface ScheduleOptions {
  /** `YYYY-MM-DD`; defaults to the current local date */
  today?: string;
  daysAhead?: number;
  mode?: ScheduleMode;
}

export function todayIso(): string {
  return DateTime.now().toISODate() ?? '';
}

function parseToday(today: string): DateTime {
  const date = DateTime.fromISO(today);
  if (!date.isValid) {
    throw new ValidationError(`Invalid date: ${today}`, [{ path: 'today', message: date.invalidReason ?? 'unparsable' }]);
  }
  return date.startOf('day');
}

function clampOffset(offset: number, daysAhead: number): number {
  return Math.max(0, Math.min(offset, Math.max(0, daysAhead)));
}

export function templateOffset(index: number, daysAhead: number): number {
  return clampOffset(Math.floor(index / TASKS_PER_DAY), daysAhead);
}

export function milestoneOffset(milestoneIndex: number, taskIndex: number, daysAhead: number): number {
  return clampOffset((milestoneIndex - 1) * DAYS_PER_MILESTONE + taskIndex * DAYS_BETWEEN_MILESTONE_TASKS, daysAhead);
}

/**
 * Return copies of the tasks with dates assigned. In milestone mode, tasks
 * without a milestone stamp are spread like a template batch.
 */
export function scheduleTasks(tasks: readonly Task[], options: ScheduleOptions = {}): Task[] {
  const start = parseToday(options.today ?? todayIso());
  const daysAhead = options.daysAhead ?? DEFAULT_DAYS_AHEAD;
  const mode = options.mode ?? 'template';

  const perMilestone = new Map<number, number>();
  let unstamped = 0;

  return tasks.map((task) => {
    let offset: number;
    if (mode === 'milestone' && task.milestoneIndex !== undefined) {
      const taskIndex = perMilestone.get(task.milestoneIndex) ?? 0;
      perMilestone.set(task.milestoneIndex, taskIndex + 1);
      offset = milestoneOffset(task.milestoneIndex, taskIndex, daysAhead);
    } else {
      offset = templateOffset(unstamped++, daysAhead);
    }
    return { ...task, scheduledDate: start.plus({ days: offset }).toISODate() ?? '' };
  });
}
