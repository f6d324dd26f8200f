import type { CoverageResult } from './coverage.js';
import type { Task, TaskSource } from './task.js';

/** Generation path; `two_tier` is only taken when explicitly requested */
export type PlanPath = 'templates' | 'hybrid' | 'full_llm' | 'two_tier';

export interface PlanOptions {
  /** Anchor date for scheduling, `YYYY-MM-DD`. Defaults to the current date. */
  today?: string;
  /** Scheduling horizon in days */
  daysAhead?: number;
  /** Force a path instead of following the coverage strategy */
  path?: PlanPath;
  /** Run the research fan-out per milestone on the two-tier path */
  research?: boolean;
  /** Write the final tasks through the task repository */
  persist?: boolean;
}

export interface PlanStats {
  generated: Partial<Record<TaskSource, number>>;
  enriched: number;
  rejectedByValidator: number;
  rejectedByAtomicity: number;
  rejectedByVerifier: number;
  removedByFilter: number;
  removedAsDuplicates: number;
  final: number;
}

export interface PersistSummary {
  created: number;
  existing: number;
}

export interface PlanResult {
  status: 'ok' | 'empty';
  path: PlanPath;
  coverage: CoverageResult;
  tasks: Task[];
  stats: PlanStats;
  /** Dollar cost of LLM calls made for this plan */
  costUsd: number;
  /** Two-tier state transitions, in order */
  stateHistory?: string[];
  persisted?: PersistSummary;
}
