/**
 * Template Selector
 *
 * Picks templates for a milestone type by budget tier, weakness, experience
 * level, and a mix of quick wins and longer foundation work.
 */

import type { BudgetTier, ProfileContext } from '../types/index.js';
import { getTemplates } from './template-registry.js';
import type { TaskTemplate } from './template-registry.js';

/** Budget assumed when none is given or it cannot be parsed */
export const DEFAULT_BUDGET_AMOUNT = 20000;
export const BUDGET_TIER_MAX = 15000;
export const STANDARD_TIER_MAX = 30000;
export const QUICK_WIN_MAX_MINUTES = 30;
const QUICK_WIN_SHARE = 0.4;

/**
 * Annual budget amount from free text such as "$15k", "≤£15k", "20,000-30,000 EUR".
 * Ranges take their lower bound.
 */
export function parseBudget(budget: string): number {
  const cleaned = budget
    .toLowerCase()
    .replace(/[≤≥<>$£€¥₹,\s]/g, '')
    .replace(/[a-z]{3}$/, '');
  if (!cleaned) return DEFAULT_BUDGET_AMOUNT;

  const lower = cleaned.split('-')[0] ?? '';
  const match = /^(\d+(?:\.\d+)?)(k?)/.exec(lower);
  if (!match?.[1]) return DEFAULT_BUDGET_AMOUNT;

  const amount = Number.parseFloat(match[1]);
  return Math.round(match[2] === 'k' ? amount * 1000 : amount);
}

/**
 * Tier for a budget string. Both boundaries (15000 and 30000) are STANDARD.
 */
export function budgetTierFor(budget: string): BudgetTier {
  if (!budget.trim()) return 'STANDARD';
  const amount = parseBudget(budget);
  if (amount < BUDGET_TIER_MAX) return 'BUDGET';
  if (amount <= STANDARD_TIER_MAX) return 'STANDARD';
  return 'PREMIUM';
}

/** Stable partition: matching templates first, order otherwise kept */
function moveToFront(templates: TaskTemplate[], matches: (template: TaskTemplate) => boolean): TaskTemplate[] {
  return [...templates.filter(matches), ...templates.filter((template) => !matches(template))];
}

/**
 * Up to `count` templates for one milestone type.
 */
export function selectMultiple(
  milestoneType: string,
  context: ProfileContext,
  count: number,
  registry: readonly TaskTemplate[] = getTemplates()
): TaskTemplate[] {
  let candidates = registry.filter(
    (template) => template.milestoneType === milestoneType && template.category === context.category
  );
  if (candidates.length === 0 || count <= 0) return [];

  const inTier = candidates.filter((template) => template.budgetTier === context.budgetTier);
  if (inTier.length > 0) {
    candidates = inTier;
  }

  const weakness = context.weakness.toLowerCase();
  candidates = moveToFront(candidates, (template) => template.name.toLowerCase().includes(weakness));

  const level = context.career?.experienceLevel;
  if (level) {
    candidates = moveToFront(
      candidates,
      (template) => template.id.includes(level) || template.name.toLowerCase().includes(level)
    );
  }

  const quickWins = candidates.filter((template) => template.timeboxMinutes <= QUICK_WIN_MAX_MINUTES);
  const foundation = candidates.filter((template) => template.timeboxMinutes > QUICK_WIN_MAX_MINUTES);

  const quickCount = Math.min(quickWins.length, Math.max(1, Math.floor(count * QUICK_WIN_SHARE)));
  const foundationCount = Math.min(foundation.length, count - quickCount);

  const selected = [...quickWins.slice(0, quickCount), ...foundation.slice(0, foundationCount)];
  for (const template of candidates) {
    if (selected.length >= count) break;
    if (!selected.includes(template)) selected.push(template);
  }

  return selected.slice(0, count);
}
