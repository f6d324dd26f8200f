/**
 * Central export for the planner's types.
 */

export {
  type Goal,
  type GoalInput,
  type GoalCategory,
  type UserProfile,
  type NetworkContact,
  type WorkHistoryEntry,
  type EducationEntry,
  type Startup,
  GoalSchema,
  GoalCategorySchema,
  IsoDateSchema,
  UserProfileSchema,
  NetworkContactSchema,
  WorkHistoryEntrySchema,
  EducationEntrySchema,
  StartupSchema,
} from './goal.js';

export {
  type Task,
  type WireTask,
  type TaskSource,
  type TaskType,
  type DeliverableType,
  type DodItem,
  TaskSchema,
  WireTaskSchema,
  TaskSourceSchema,
  TaskTypeSchema,
  DeliverableTypeSchema,
  DodItemSchema,
  MIN_TIMEBOX_MINUTES,
  MAX_TIMEBOX_MINUTES,
  DOD_WEIGHT_TOLERANCE,
} from './task.js';

export type {
  ProfileContext,
  StudyContext,
  CareerContext,
  FitnessContext,
  TestPrepNeeded,
  BudgetTier,
  ExperienceLevel,
  TemplateValue,
  TemplateScope,
} from './context.js';

export type { CoverageResult, CoverageTier, GenerationStrategy } from './coverage.js';

export {
  type Milestone,
  type UserStories,
  MilestoneSchema,
  MIN_MILESTONE_WEEKS,
  MAX_MILESTONE_WEEKS,
} from './milestone.js';

export type { PlanPath, PlanOptions, PlanStats, PlanResult, PersistSummary } from './plan.js';
