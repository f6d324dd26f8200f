/**
 * Shared helpers for building Task records: ids, deliverable inference,
 * definition-of-done normalization, and lenient parsing of model-written tasks.
 */

import { z } from 'zod';
import type { DeliverableType, DodItem, Task, TaskSource, TaskType } from '../types/index.js';
import { DeliverableTypeSchema, MAX_TIMEBOX_MINUTES, MIN_TIMEBOX_MINUTES, TaskTypeSchema } from '../types/index.js';
import { generateId } from '../utils/id.js';
import { isRecord } from '../utils/json.js';
import { logger } from '../utils/logger.js';

export function newTaskId(): string {
  return generateId('task');
}

const DELIVERABLE_KEYWORDS: ReadonlyArray<[DeliverableType, readonly string[]]> = [
  ['spreadsheet', ['spreadsheet', 'sheet', 'tracker', 'table']],
  ['email', ['email', 'message', 'inmail']],
  ['recording', ['recording', 'video', 'audio']],
  ['link', ['link', 'url', 'profile', 'post']],
  ['shortlist', ['shortlist', 'list of']],
  ['file', ['pdf', 'file', 'upload', 'confirmation']],
  ['doc', ['doc', 'draft', 'essay', 'resume', 'cv', 'letter', 'notes', 'outline']],
];

/**
 * Deliverable type from free text such as "Google Sheet with 5 programs".
 */
export function inferDeliverableType(text: string): DeliverableType {
  const lower = text.toLowerCase();
  for (const [type, keywords] of DELIVERABLE_KEYWORDS) {
    if (keywords.some((kw) => lower.includes(kw))) return type;
  }
  return 'note';
}

/**
 * Rescale weights so they sum to exactly 100. Items keep their order; the
 * rounding remainder goes to the last item.
 */
export function normalizeDod(items: readonly DodItem[]): DodItem[] {
  if (items.length === 0) return [];

  const total = items.reduce((sum, item) => sum + Math.max(0, item.weight), 0);
  const scaled = items.map((item) => ({
    ...item,
    weight: total > 0 ? Math.floor((Math.max(0, item.weight) / total) * 100) : Math.floor(100 / items.length),
  }));
  const assigned = scaled.reduce((sum, item) => sum + item.weight, 0);
  const last = scaled[scaled.length - 1];
  if (last) last.weight += 100 - assigned;
  return scaled;
}

export function dod(...entries: Array<[text: string, weight: number]>): DodItem[] {
  return entries.map(([text, weight]) => ({ text, weight, completed: false }));
}

export function clampTimebox(minutes: number): number {
  return Math.min(MAX_TIMEBOX_MINUTES, Math.max(MIN_TIMEBOX_MINUTES, Math.round(minutes)));
}

const PRIORITY_WORDS: Record<string, number> = { low: 2, medium: 3, high: 4, critical: 5 };

/**
 * Integer priority from a number or a word, clamped to [min, 5].
 */
export function normalizePriority(value: unknown, min = 1, fallback = 3): number {
  let priority = fallback;
  if (typeof value === 'number' && Number.isFinite(value)) {
    priority = Math.round(value);
  } else if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    priority = PRIORITY_WORDS[lower] ?? (Number.isFinite(Number.parseInt(lower, 10)) ? Number.parseInt(lower, 10) : fallback);
  }
  return Math.min(5, Math.max(min, priority));
}

const LooseDodSchema = z.union([
  z.string().min(1),
  z.object({ text: z.string().min(1), weight: z.number().optional(), completed: z.boolean().optional() }),
]);

/**
 * A task as a model writes it. Snake and camel case are both accepted.
 */
export const LlmTaskSchema = z
  .object({
    title: z.string().min(1),
    description: z.string().optional(),
    timebox_minutes: z.coerce.number().optional(),
    timeboxMinutes: z.coerce.number().optional(),
    priority: z.union([z.number(), z.string()]).optional(),
    task_type: z.string().optional(),
    deliverable_type: z.string().optional(),
    deliverable: z.string().optional(),
    specific_resource: z.string().optional(),
    definition_of_done: z.array(LooseDodSchema).optional(),
  })
  .passthrough();

export type LlmTask = z.infer<typeof LlmTaskSchema>;

export function llmTimebox(task: LlmTask): number | undefined {
  return task.timebox_minutes ?? task.timeboxMinutes;
}

function toDod(items: LlmTask['definition_of_done'], deliverable: string | undefined): DodItem[] {
  const parsed = (items ?? []).map((item) =>
    typeof item === 'string'
      ? { text: item, weight: 0, completed: false }
      : { text: item.text, weight: item.weight ?? 0, completed: item.completed ?? false }
  );
  if (parsed.length === 0) {
    return dod([deliverable ?? 'Task completed', 100]);
  }
  if (parsed.every((item) => item.weight === 0)) {
    return normalizeDod(parsed.map((item) => ({ ...item, weight: 1 })));
  }
  return normalizeDod(parsed);
}

export interface LlmTaskDefaults {
  source: TaskSource;
  taskType?: TaskType;
  minPriority?: number;
  timeboxMinutes?: number;
}

/**
 * Convert one parsed model task into a Task.
 */
export function taskFromLlm(raw: LlmTask, defaults: LlmTaskDefaults): Task {
  const typeResult = TaskTypeSchema.safeParse(raw.task_type);
  const deliverableResult = DeliverableTypeSchema.safeParse(raw.deliverable_type);
  const deliverableText = raw.deliverable ?? '';

  return {
    id: newTaskId(),
    title: raw.title.trim(),
    description: raw.description?.trim() ?? '',
    taskType: typeResult.success ? typeResult.data : (defaults.taskType ?? 'copilot'),
    timeboxMinutes: clampTimebox(llmTimebox(raw) ?? defaults.timeboxMinutes ?? 60),
    priority: normalizePriority(raw.priority, defaults.minPriority ?? 1),
    deliverableType: deliverableResult.success
      ? deliverableResult.data
      : inferDeliverableType(`${deliverableText} ${raw.title}`),
    definitionOfDone: toDod(raw.definition_of_done, raw.deliverable),
    constraints: {},
    source: defaults.source,
    ...(raw.deliverable ? { deliverable: raw.deliverable } : {}),
    ...(raw.specific_resource ? { specificResource: raw.specific_resource } : {}),
  };
}

/**
 * Parse every well-formed item of a model response into Tasks. Malformed
 * items are logged and dropped one by one.
 */
export function parseLlmTasks(items: readonly unknown[], defaults: LlmTaskDefaults): Task[] {
  const tasks: Task[] = [];
  items.forEach((item, index) => {
    const result = LlmTaskSchema.safeParse(item);
    if (!result.success) {
      logger.debug('Dropping malformed model task', undefined, {
        index,
        source: defaults.source,
        keys: isRecord(item) ? Object.keys(item) : typeof item,
      });
      return;
    }
    tasks.push(taskFromLlm(result.data, defaults));
  });
  return tasks;
}
