import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  DeliverableTypeSchema,
  DodItemSchema,
  GoalSchema,
  TaskSchema,
  TaskSourceSchema,
  TaskTypeSchema,
  UserProfileSchema,
} from '../types/index.js';
import type { Task } from '../types/index.js';
import { checkAtomicity, validateAtomicBatch } from '../engines/atomicity-checker.js';
import type { AtomicityBatchResult, AtomicityResult } from '../engines/atomicity-checker.js';
import { extractContext } from '../engines/profile-extractor.js';
import { newTaskId } from '../engines/task-builder.js';
import { validateBatch, validateTask } from '../engines/task-validator.js';
import type { BatchValidationResult, TaskValidationResult } from '../engines/task-validator.js';

/**
 * planner_validate - Rule checks for a list of tasks
 */
export const validateTool: Tool = {
  name: 'planner_validate',
  description: `Run the rule-based quality checks on tasks. No LLM calls.

For each task returns:
- **validation**: the five fast checks (user context, specific, actionable, timebox, not generic); valid at 80+
- **atomicity**: the five atomicity checks (single action, 10-90 min, concrete resource, deliverable, no meta); valid at 60+

Pass the user's profile and goal so the user-context check can see their universities, field, and startup.

## Example

\`\`\`json
{
  "tasks": [{ "title": "Research universities and update resume", "timeboxMinutes": 120 }],
  "goal": { "id": "goal-1", "userId": "user-1", "category": "study", "title": "Apply to grad school" }
}
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      tasks: {
        type: 'array',
        description: 'Tasks to check; only title is required',
        items: { type: 'object' },
      },
      profile: { type: 'object', description: 'User profile (optional)' },
      goal: { type: 'object', description: 'Goal (optional)' },
    },
    required: ['tasks'],
  },
};

/**
 * A task as a caller may send it: everything but the title has a default.
 */
export const TaskInputSchema = TaskSchema.extend({
  id: z.string().default(() => newTaskId()),
  taskType: TaskTypeSchema.default('copilot'),
  timeboxMinutes: z.number().int().default(60),
  priority: z.number().int().min(1).max(5).default(3),
  deliverableType: DeliverableTypeSchema.default('note'),
  definitionOfDone: z.array(DodItemSchema).default([]),
  source: TaskSourceSchema.default('template_agent'),
});

const AD_HOC_GOAL = {
  id: 'adhoc-goal',
  userId: 'adhoc-user',
  category: 'study',
  title: 'Ad hoc validation',
} as const;

export const ValidateInputSchema = z.object({
  tasks: z.array(TaskInputSchema).min(1).max(200),
  profile: UserProfileSchema.default({}),
  goal: GoalSchema.default(AD_HOC_GOAL),
});

export interface ValidateToolResult {
  summary: BatchValidationResult;
  atomicity: AtomicityBatchResult;
  results: Array<{ title: string; validation: TaskValidationResult; atomicity: AtomicityResult }>;
}

export function handleValidate(args: Record<string, unknown>): ValidateToolResult {
  const input = ValidateInputSchema.parse(args);
  const context = extractContext(input.profile, input.goal);
  const tasks: Task[] = input.tasks;

  return {
    summary: validateBatch(tasks, context),
    atomicity: validateAtomicBatch(tasks),
    results: tasks.map((task) => ({
      title: task.title,
      validation: validateTask(task, context),
      atomicity: checkAtomicity(task),
    })),
  };
}
