import { z } from 'zod';

export const MIN_MILESTONE_WEEKS = 1;
export const MAX_MILESTONE_WEEKS = 8;

/**
 * Coarse sub-goal produced by tier 1 of the two-tier generator. Never persisted.
 */
export const MilestoneSchema = z.object({
  title: z.string().min(10),
  description: z.string().min(1),
  durationWeeks: z.number().min(MIN_MILESTONE_WEEKS).max(MAX_MILESTONE_WEEKS),
  successCriteria: z.string().min(1),
});

export type Milestone = z.infer<typeof MilestoneSchema>;

/**
 * Five narrative summaries of the user, fed to generation and repair prompts.
 */
export interface UserStories {
  workStory: string;
  achievementStory: string;
  networkStory: string;
  challengeStory: string;
  aspirationStory: string;
}
