/**
 * Shared prompt fragments.
 *
 * Each generator owns its system prompt; these helpers render the user-facing
 * facts every prompt needs so they read the same everywhere.
 */

import type { Milestone, ProfileContext, Task, UserStories } from '../types/index.js';

function list(values: readonly string[], fallback = 'none given'): string {
  return values.length > 0 ? values.join(', ') : fallback;
}

/**
 * Bullet summary of the facts generators may reference.
 */
export function describeProfile(context: ProfileContext): string {
  const lines = [
    `- Goal (${context.category}): ${context.goalTitle}`,
    context.goalDescription ? `- Goal details: ${context.goalDescription}` : null,
    `- Background: ${context.background}`,
    context.field ? `- Field: ${context.field}` : null,
    `- Daily time available: ${context.dailyMinutes} minutes, best energy in the ${context.energyPeak}`,
    `- Main weakness: ${context.weakness}`,
    context.workSummary ? `- Work history: ${context.workSummary}` : null,
    context.achievements.length > 0 ? `- Achievements: ${list(context.achievements)}` : null,
    context.gpa !== null ? `- GPA: ${context.gpa}/4.0` : null,
    context.budget ? `- Budget: ${context.budget} (${context.budgetTier})` : null,
  ];

  if (context.hasStartupBackground) {
    lines.push(
      `- Startup: ${context.startupName ?? 'unnamed'} (${context.startupRole ?? 'Founder'}), ${context.startupUsers ?? '0'} users, ${context.startupFunding ?? '$0'} raised`
    );
  }

  const study = context.study;
  if (study) {
    lines.push(
      `- Degree: ${study.degreeLevel} in ${study.field}`,
      `- Target universities: ${list(study.targetUniversities)}`,
      `- Target countries: ${list(study.targetCountries)}`,
      `- Research interest: ${study.researchInterest}`
    );
    const prep = Object.entries(context.testPrepNeeded)
      .filter(([, needed]) => needed)
      .map(([test]) => test.toUpperCase());
    if (prep.length > 0) lines.push(`- Tests below target: ${prep.join(', ')}`);
  }

  const career = context.career;
  if (career) {
    lines.push(
      `- Experience: ${career.experienceText} experience (${career.experienceLevel}) as ${career.currentRole}`,
      `- Target role: ${career.targetRole} in ${career.targetIndustry}`,
      `- Skills: ${list(career.topSkills)}`,
      `- Target companies: ${list(career.targetCompanies)}`,
      career.warmIntros.length > 0 ? `- Warm contacts: ${list(career.warmIntros)}` : '- Warm contacts: none'
    );
  }

  const fitness = context.fitness;
  if (fitness) {
    lines.push(
      `- Fitness level: ${fitness.fitnessLevel}, trains at ${fitness.workoutLocation}`,
      `- Limitations: ${list(fitness.limitations)}`
    );
  }

  return lines.filter((line): line is string => line !== null).join('\n');
}

export function describeStories(stories: UserStories): string {
  return [
    `- Work: ${stories.workStory}`,
    `- Achievement: ${stories.achievementStory}`,
    `- Network: ${stories.networkStory}`,
    `- Challenge: ${stories.challengeStory}`,
    `- Aspiration: ${stories.aspirationStory}`,
  ].join('\n');
}

export function describeMilestone(milestone: Milestone, index: number): string {
  return [
    `Milestone ${index}: ${milestone.title}`,
    `Description: ${milestone.description}`,
    `Duration: ${milestone.durationWeeks} weeks`,
    `Success criteria: ${milestone.successCriteria}`,
  ].join('\n');
}

/**
 * The fields a repair or verification prompt shows for one task.
 */
export function describeTask(task: Task): string {
  return JSON.stringify(
    {
      title: task.title,
      description: task.description,
      timebox_minutes: task.timeboxMinutes,
      deliverable: task.deliverable ?? task.deliverableType,
      specific_resource: task.specificResource ?? null,
    },
    null,
    2
  );
}

/**
 * JSON shape every task-producing prompt asks for.
 */
export const TASK_JSON_SHAPE = `{
  "tasks": [
    {
      "title": "Verb-first, single action, names a concrete resource",
      "description": "2-4 sentences with the exact steps",
      "timebox_minutes": 45,
      "priority": 3,
      "deliverable": "What exists when the task is done",
      "deliverable_type": "spreadsheet|doc|email|recording|link|shortlist|file|note|other",
      "specific_resource": "A named person, website, or document",
      "definition_of_done": [{"text": "Checklist item", "weight": 50}, {"text": "Checklist item", "weight": 50}]
    }
  ]
}`;
