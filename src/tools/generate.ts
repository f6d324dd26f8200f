import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ServiceContainer } from '../services/index.js';
import type { PlanResult } from '../types/index.js';
import { GoalSchema, IsoDateSchema, UserProfileSchema } from '../types/index.js';
import { generatePlan } from '../engines/pipeline.js';

/**
 * planner_generate - Build a scheduled, ranked plan for one goal
 */
export const generateTool: Tool = {
  name: 'planner_generate',
  description: `Generate a personalized plan of atomic tasks for one goal.

Takes the user's profile and a goal and:
1. Builds the profile context and scores template coverage
2. Generates tasks from templates, rule-based generators, and the LLM
3. Enriches, validates, deduplicates, schedules, and ranks them

## Example

\`\`\`json
{
  "profile": { "name": "Sam", "gpa": 3.2, "hasStartup": true, "startup": { "name": "Acme", "users": "2,000" } },
  "goal": { "id": "goal-1", "userId": "user-1", "category": "study", "title": "Get into a CS master's program" },
  "daysAhead": 60
}
\`\`\`

## What You Get Back

- **tasks** with dates, timeboxes, and definitions of done
- **coverage** and the **path** taken (templates, hybrid, full_llm, two_tier)
- **stats** per pipeline stage and the LLM **costUsd**

Set \`path: "two_tier"\` to generate milestones first and expand each into atomic tasks.`,

  inputSchema: {
    type: 'object',
    properties: {
      profile: {
        type: 'object',
        description: 'User profile; every field is optional',
      },
      goal: {
        type: 'object',
        description: 'Goal with id, userId, category (study|career|sport|finance|language) and title',
      },
      path: {
        type: 'string',
        enum: ['templates', 'hybrid', 'full_llm', 'two_tier'],
        description: 'Force a generation path instead of following coverage',
      },
      daysAhead: {
        type: 'number',
        description: 'Scheduling horizon in days',
      },
      today: {
        type: 'string',
        description: 'Anchor date YYYY-MM-DD (defaults to today)',
      },
      research: {
        type: 'boolean',
        description: 'Run the research fan-out per milestone (two_tier only)',
      },
      persist: {
        type: 'boolean',
        description: 'Store the final tasks',
        default: false,
      },
    },
    required: ['goal'],
  },
};

export const GenerateInputSchema = z.object({
  profile: UserProfileSchema.default({}),
  goal: GoalSchema,
  path: z.enum(['templates', 'hybrid', 'full_llm', 'two_tier']).optional(),
  daysAhead: z.number().int().positive().max(730).optional(),
  today: IsoDateSchema.optional(),
  research: z.boolean().optional(),
  persist: z.boolean().default(false),
});

export async function handleGenerate(args: Record<string, unknown>, container: ServiceContainer): Promise<PlanResult> {
  const input = GenerateInputSchema.parse(args);
  const deps = await container.getPipelineDeps();

  return generatePlan(
    input.profile,
    input.goal,
    {
      daysAhead: input.daysAhead ?? container.getConfig().daysAhead,
      persist: input.persist,
      ...(input.path !== undefined && { path: input.path }),
      ...(input.today !== undefined && { today: input.today }),
      ...(input.research !== undefined && { research: input.research }),
    },
    deps
  );
}
