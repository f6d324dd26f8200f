import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CoverageResult, ProfileContext } from '../types/index.js';
import { GoalSchema, UserProfileSchema } from '../types/index.js';
import { detectCoverage } from '../engines/coverage-detector.js';
import { extractContext } from '../engines/profile-extractor.js';

/**
 * planner_coverage - How well templates cover this user
 */
export const coverageTool: Tool = {
  name: 'planner_coverage',
  description: `Score how well the built-in templates cover a user's background and field.

Returns the coverage score (0-100), tier, recommended generation strategy, and a
summary of the profile context the generators would see. No LLM calls.`,

  inputSchema: {
    type: 'object',
    properties: {
      profile: { type: 'object', description: 'User profile; every field is optional' },
      goal: { type: 'object', description: 'Goal with id, userId, category and title' },
    },
    required: ['goal'],
  },
};

export const CoverageInputSchema = z.object({
  profile: UserProfileSchema.default({}),
  goal: GoalSchema,
});

export interface ContextSummary {
  category: ProfileContext['category'];
  background: string;
  field: string;
  budgetTier: ProfileContext['budgetTier'];
  hasStartupBackground: boolean;
  hasProfessionalExperience: boolean;
  hasResearchExperience: boolean;
  gpaNeedsCompensation: boolean;
  testPrepNeeded: ProfileContext['testPrepNeeded'];
}

export interface CoverageToolResult {
  coverage: CoverageResult;
  context: ContextSummary;
}

export function summarizeContext(context: ProfileContext): ContextSummary {
  return {
    category: context.category,
    background: context.background,
    field: context.field,
    budgetTier: context.budgetTier,
    hasStartupBackground: context.hasStartupBackground,
    hasProfessionalExperience: context.hasProfessionalExperience,
    hasResearchExperience: context.hasResearchExperience,
    gpaNeedsCompensation: context.gpaNeedsCompensation,
    testPrepNeeded: context.testPrepNeeded,
  };
}

export function handleCoverage(args: Record<string, unknown>): CoverageToolResult {
  const input = CoverageInputSchema.parse(args);
  const context = extractContext(input.profile, input.goal);
  return { coverage: detectCoverage(context), context: summarizeContext(context) };
}
