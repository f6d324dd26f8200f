/**
 * Scenario Coverage Detector
 *
 * Scores how well the template library covers a user's background and
 * target field, and recommends a generation strategy:
 * - 80-100: well covered, templates only
 * - 40-79: partially covered, templates plus an LLM top-up
 * - 0-39: uncovered, full LLM generation
 */

import { z } from 'zod';
import type { CoverageResult, CoverageTier, GenerationStrategy, ProfileContext } from '../types/index.js';
import { lazy, loadDataFile } from '../utils/data.js';

const CoverageTablesSchema = z.object({
  coveredBackgrounds: z.record(z.array(z.string())),
  coveredFields: z.array(z.string()),
  edgeCases: z.array(z.object({ background: z.string(), field: z.string(), reason: z.string() })),
  healthcareAiTerms: z.array(z.string()),
  healthcareBackgrounds: z.array(z.string()),
  workHistoryBackgrounds: z.array(z.object({ label: z.string(), keywords: z.array(z.string()) })),
});

export type CoverageTables = z.infer<typeof CoverageTablesSchema>;

export const getCoverageTables = lazy(() => loadDataFile('coverage.yaml', CoverageTablesSchema));

const BACKGROUND_POINTS = 50;
const FIELD_POINTS = 40;
const FOUNDER_BONUS = 10;
const EDGE_CASE_PENALTY = 30;

/**
 * Background category a covered label falls into, or null when uncovered.
 */
export function matchCoveredBackground(background: string): string | null {
  const lower = background.toLowerCase();
  for (const [category, keywords] of Object.entries(getCoverageTables().coveredBackgrounds)) {
    if (keywords.some((kw) => lower.includes(kw))) {
      return category;
    }
  }
  return null;
}

export function isFieldCovered(field: string): boolean {
  const lower = field.toLowerCase();
  return getCoverageTables().coveredFields.some((covered) => lower.includes(covered));
}

/**
 * First edge-case reason matching the pair, or null.
 */
export function findEdgeCase(background: string, field: string): string | null {
  const tables = getCoverageTables();
  const bg = background.toLowerCase();
  const fieldLower = field.toLowerCase();

  for (const edge of tables.edgeCases) {
    if (!bg.includes(edge.background)) continue;

    const fieldMatch =
      tables.healthcareBackgrounds.includes(edge.background) && edge.field === 'ai'
        ? tables.healthcareAiTerms.some((term) => fieldLower.includes(term))
        : fieldLower.includes(edge.field);

    if (fieldMatch) return edge.reason;
  }
  return null;
}

function tierFor(score: number): { tier: CoverageTier; strategy: GenerationStrategy } {
  if (score >= 80) return { tier: 'well_covered', strategy: 'templates' };
  if (score >= 40) return { tier: 'partially_covered', strategy: 'hybrid' };
  return { tier: 'uncovered', strategy: 'full_llm' };
}

/**
 * Compute the coverage score for a profile context. Pure.
 */
export function detectCoverage(context: ProfileContext): CoverageResult {
  const background = context.background;
  const field = context.field.toLowerCase();

  const backgroundCategory = matchCoveredBackground(background);
  const fieldCovered = isFieldCovered(field);
  const edgeCaseReason = findEdgeCase(background, field);

  let score = 0;
  if (backgroundCategory) score += BACKGROUND_POINTS;
  if (fieldCovered) score += FIELD_POINTS;
  if (context.hasStartupBackground || background.toLowerCase() === 'founder') score += FOUNDER_BONUS;
  if (edgeCaseReason) score -= EDGE_CASE_PENALTY;
  score = Math.max(0, Math.min(100, score));

  const { tier, strategy } = tierFor(score);

  const reasoning = [
    backgroundCategory
      ? `Background '${background}' is covered by templates`
      : `Background '${background}' is not covered by templates`,
    fieldCovered ? `Field '${field}' is covered by templates` : `Field '${field}' is not covered by templates`,
    ...(edgeCaseReason ? [`Edge case: ${edgeCaseReason}`] : []),
  ].join(' | ');

  return {
    score,
    tier,
    strategy,
    reasoning,
    backgroundMatch: backgroundCategory !== null,
    fieldCovered,
    isEdgeCase: edgeCaseReason !== null,
    edgeCaseReason,
    background,
  };
}
