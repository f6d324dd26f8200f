import { z } from 'zod';
import { IsoDateSchema } from './goal.js';

/**
 * Which generator produced a task. Fixed at creation.
 */
export const TaskSourceSchema = z.enum([
  'template_agent',
  'custom_generator',
  'atomic_task_generator',
  'unique_generator',
  'full_llm_generator',
  'research_agent',
]);

export type TaskSource = z.infer<typeof TaskSourceSchema>;

export const TaskTypeSchema = z.enum(['auto', 'copilot', 'manual']);

export type TaskType = z.infer<typeof TaskTypeSchema>;

export const DeliverableTypeSchema = z.enum([
  'spreadsheet',
  'doc',
  'email',
  'recording',
  'link',
  'shortlist',
  'file',
  'note',
  'other',
]);

export type DeliverableType = z.infer<typeof DeliverableTypeSchema>;

export const DodItemSchema = z.object({
  text: z.string().min(1),
  weight: z.number().int().min(0).max(100),
  completed: z.boolean().default(false),
});

export type DodItem = z.infer<typeof DodItemSchema>;

export const MIN_TIMEBOX_MINUTES = 10;
export const MAX_TIMEBOX_MINUTES = 600;
/** Definition-of-done weights must sum to 100 within this tolerance */
export const DOD_WEIGHT_TOLERANCE = 5;

/**
 * A candidate task as it moves through the pipeline. Optional fields are
 * filled in by later stages (scheduler, enricher, scorer).
 */
export const TaskSchema = z.object({
  id: z.string(),
  title: z.string().min(1),
  description: z.string().default(''),
  taskType: TaskTypeSchema,
  timeboxMinutes: z.number().int(),
  priority: z.number().int().min(1).max(5),
  deliverableType: DeliverableTypeSchema,
  definitionOfDone: z.array(DodItemSchema),
  constraints: z.record(z.string()).default({}),
  source: TaskSourceSchema,
  scheduledDate: IsoDateSchema.optional(),
  milestoneTitle: z.string().optional(),
  milestoneIndex: z.number().int().positive().optional(),
  specificResource: z.string().optional(),
  deliverable: z.string().optional(),
  energyLevel: z.enum(['low', 'medium', 'high']).optional(),
  isQuickWin: z.boolean().optional(),
  templateId: z.string().optional(),
  enriched: z.boolean().optional(),
  notes: z.string().optional(),
  validationScore: z.number().optional(),
  personalizationScore: z.number().optional(),
});

export type Task = z.infer<typeof TaskSchema>;

/**
 * The shape a finished task must satisfy on the way out of the pipeline.
 */
export const WireTaskSchema = TaskSchema.extend({
  title: z.string().min(10).max(150),
  timeboxMinutes: z.number().int().min(MIN_TIMEBOX_MINUTES).max(MAX_TIMEBOX_MINUTES),
  scheduledDate: IsoDateSchema,
  definitionOfDone: z.array(DodItemSchema).min(1),
}).refine(
  (task) => {
    const total = task.definitionOfDone.reduce((sum, item) => sum + item.weight, 0);
    return Math.abs(total - 100) <= DOD_WEIGHT_TOLERANCE;
  },
  { message: 'Definition-of-done weights must sum to 100', path: ['definitionOfDone'] }
);

export type WireTask = z.infer<typeof WireTaskSchema>;
