/**
 * Task template registry, loaded from `data/templates.yaml`.
 */

import { z } from 'zod';
import { GoalCategorySchema } from '../types/index.js';
import type { GoalCategory } from '../types/index.js';
import { lazy, loadDataFile } from '../utils/data.js';

export const BudgetTierSchema = z.enum(['BUDGET', 'STANDARD', 'PREMIUM']);

export const TaskTemplateSchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/),
  name: z.string(),
  category: GoalCategorySchema,
  milestoneType: z.string(),
  /** Context keys the template needs; rendering fails without them */
  variables: z.array(z.string()).default([]),
  title: z.string(),
  body: z.string(),
  budgetTier: BudgetTierSchema.default('STANDARD'),
  timeboxMinutes: z.number().int().min(10).max(600),
  priority: z.number().int().min(1).max(5),
  energyLevel: z.enum(['low', 'medium', 'high']).default('medium'),
});

export type TaskTemplate = z.infer<typeof TaskTemplateSchema>;

const MilestoneTypeSchema = z.object({ type: z.string(), title: z.string() });

export type MilestoneType = z.infer<typeof MilestoneTypeSchema>;

const RegistrySchema = z.object({
  milestones: z.record(z.array(MilestoneTypeSchema)),
  templates: z.array(TaskTemplateSchema),
});

const getRegistry = lazy(() => loadDataFile('templates.yaml', RegistrySchema));

export function getTemplates(): readonly TaskTemplate[] {
  return getRegistry().templates;
}

export function getTemplate(id: string): TaskTemplate | undefined {
  return getRegistry().templates.find((template) => template.id === id);
}

/**
 * Milestone types for a category, in plan order. Categories without
 * templates (finance, language) have none.
 */
export function getMilestoneTypes(category: GoalCategory): readonly MilestoneType[] {
  return getRegistry().milestones[category] ?? [];
}
