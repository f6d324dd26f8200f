export type CoverageTier = 'well_covered' | 'partially_covered' | 'uncovered';

export type GenerationStrategy = 'templates' | 'hybrid' | 'full_llm';

export interface CoverageResult {
  /** 0-100 */
  score: number;
  tier: CoverageTier;
  strategy: GenerationStrategy;
  reasoning: string;
  backgroundMatch: boolean;
  fieldCovered: boolean;
  isEdgeCase: boolean;
  edgeCaseReason: string | null;
  background: string;
}
