/**
 * User Story Extractor
 *
 * Turns profile facts into five one-to-two sentence stories that generation
 * and repair prompts can quote. Falls back to deterministic stories when the
 * model is unavailable or answers badly.
 */

import { z } from 'zod';
import type { ProfileContext, UserStories } from '../types/index.js';
import { describeProfile } from '../prompts/index.js';
import { logger } from '../utils/logger.js';
import { requestJson } from './llm-client.js';
import type { LlmService } from './llm-client.js';

const SYSTEM_PROMPT = `You turn a user's profile into short narrative stories for a planning assistant.

Write five stories, each one or two sentences, in the second person ("You ..."):
- workStory: what they have built or done professionally
- achievementStory: their most concrete result, with numbers when the profile has them
- networkStory: who they know that can help with this goal
- challengeStory: the main obstacle between them and the goal
- aspirationStory: what reaching the goal means for them

Use only facts from the profile. Where the profile is silent, say so plainly instead of inventing details.

Return JSON: {"workStory": "...", "achievementStory": "...", "networkStory": "...", "challengeStory": "...", "aspirationStory": "..."}`;

const StoriesSchema = z.object({
  workStory: z.string().min(1).optional(),
  achievementStory: z.string().min(1).optional(),
  networkStory: z.string().min(1).optional(),
  challengeStory: z.string().min(1).optional(),
  aspirationStory: z.string().min(1).optional(),
});

/**
 * Stories built from the context alone.
 */
export function defaultStories(context: ProfileContext): UserStories {
  const workStory = context.hasStartupBackground
    ? `You founded ${context.startupName ?? 'a startup'} as ${context.startupRole ?? 'Founder'}.`
    : context.workSummary
      ? `You have worked as ${context.workSummary}.`
      : `You are building toward ${context.goalTitle} from a ${context.background} background.`;

  const achievementStory = context.hasStartupBackground
    ? `${context.startupName ?? 'Your startup'} reached ${context.startupUsers ?? '0'} users.`
    : context.achievements[0]
      ? `Your strongest result so far: ${context.achievements[0]}.`
      : 'You have not listed a headline achievement yet.';

  const contacts = context.career?.warmIntros ?? context.study?.professorContacts ?? [];
  const networkStory =
    contacts.length > 0 ? `You can reach out to ${contacts.slice(0, 3).join(', ')}.` : 'You are starting without warm contacts.';

  const challengeStory = context.gpaNeedsCompensation
    ? `Your GPA of ${context.gpa ?? ''} needs context, and ${context.weakness} is your main weakness.`
    : `Your main weakness is ${context.weakness}.`;

  return {
    workStory,
    achievementStory,
    networkStory,
    challengeStory,
    aspirationStory: `You want to ${context.goalTitle.charAt(0).toLowerCase()}${context.goalTitle.slice(1)}.`,
  };
}

/**
 * One LLM call; any field the model leaves out keeps its default.
 */
export async function extractStories(llm: LlmService, context: ProfileContext): Promise<UserStories> {
  const fallback = defaultStories(context);
  if (!llm.isAvailable()) {
    logger.debug('LLM unavailable; using default user stories');
    return fallback;
  }

  try {
    const { data } = await requestJson(llm, {
      system: SYSTEM_PROMPT,
      user: `PROFILE\n${describeProfile(context)}`,
      maxTokens: 1024,
      temperature: 0.3,
      operation: 'extract_stories',
    });
    const parsed = StoriesSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Story extraction returned an unexpected shape; using defaults', parsed.error);
      return fallback;
    }
    return {
      workStory: parsed.data.workStory ?? fallback.workStory,
      achievementStory: parsed.data.achievementStory ?? fallback.achievementStory,
      networkStory: parsed.data.networkStory ?? fallback.networkStory,
      challengeStory: parsed.data.challengeStory ?? fallback.challengeStory,
      aspirationStory: parsed.data.aspirationStory ?? fallback.aspirationStory,
    };
  } catch (error) {
    logger.warn('Story extraction failed; using defaults', error);
    return fallback;
  }
}
