/**
 * Enricher
 *
 * Best-effort rewrite of generic tasks into ones that name a real resource
 * (admissions page, faculty contact, careers page). Intent keywords and lookup
 * tables live in data/enrichment.yaml. A task with no matching intent, or no
 * lookup hit, passes through unchanged.
 */

import { z } from 'zod';
import type { GoalCategory, ProfileContext, Task } from '../types/index.js';
import { lazy, loadDataFile } from '../utils/data.js';
import { logger } from '../utils/logger.js';
import { wholeWordPattern } from '../utils/text.js';

export const EnrichmentIntentSchema = z.enum([
  'university_research',
  'professor_contact',
  'job_application',
  'company_research',
  'deadline_check',
  'event_research',
]);

export type EnrichmentIntent = z.infer<typeof EnrichmentIntentSchema>;

const FacultySchema = z.object({
  name: z.string(),
  email: z.string(),
  research: z.string(),
});

const UniversitySchema = z.object({
  name: z.string(),
  aliases: z.array(z.string()).default([]),
  admissionsUrl: z.string(),
  faculty: z.array(FacultySchema).default([]),
});

const CompanySchema = z.object({
  name: z.string(),
  careersUrl: z.string(),
});

const EnrichmentTablesSchema = z.object({
  intents: z.array(z.object({ intent: EnrichmentIntentSchema, keywords: z.array(z.string()).min(1) })),
  universities: z.array(UniversitySchema),
  companies: z.array(CompanySchema),
  deadlineNotes: z.record(z.string()),
  eventPlatforms: z.array(z.string()),
});

export type UniversityRecord = z.infer<typeof UniversitySchema>;
export type CompanyRecord = z.infer<typeof CompanySchema>;

const getTables = lazy(() => loadDataFile('enrichment.yaml', EnrichmentTablesSchema));

export const LINKEDIN_EVENTS_URL = 'linkedin.com/events';

/**
 * First intent, in table order, with a keyword in the task's title or description.
 */
export function detectIntent(task: Task): EnrichmentIntent | null {
  const text = `${task.title} ${task.description}`.toLowerCase();
  const match = getTables().intents.find(({ keywords }) => keywords.some((keyword) => text.includes(keyword)));
  return match?.intent ?? null;
}

export function findUniversity(name: string): UniversityRecord | null {
  const lower = name.trim().toLowerCase();
  if (!lower) return null;
  return (
    getTables().universities.find(
      (uni) =>
        uni.name.toLowerCase() === lower || uni.aliases.some((alias) => wholeWordPattern(alias).test(lower))
    ) ?? null
  );
}

export function findCompany(name: string): CompanyRecord | null {
  const lower = name.trim().toLowerCase();
  if (!lower) return null;
  return getTables().companies.find((company) => company.name.toLowerCase() === lower) ?? null;
}

function deadlineNote(category: GoalCategory): string | undefined {
  return getTables().deadlineNotes[category];
}

function appendNote(task: Task, note: string): string {
  return task.notes ? `${task.notes}\n${note}` : note;
}

type Enrich = (task: Task, context: ProfileContext) => Task | null;

const enrichUniversity: Enrich = (task, context) => {
  const uni = findUniversity(context.study?.targetUniversities[0] ?? '');
  if (!uni) return null;
  const field = context.study?.field ?? context.field;
  return {
    ...task,
    title: `Visit ${uni.name} ${field} website and note admission requirements`,
    description: [
      `1. Open ${uni.admissionsUrl}.`,
      `2. Find the ${field} program page.`,
      '3. Note the deadline, required tests, minimum GPA, and application fee in your tracker.',
    ].join('\n'),
    specificResource: uni.admissionsUrl,
  };
};

const enrichProfessor: Enrich = (task, context) => {
  const uni = findUniversity(context.study?.targetUniversities[0] ?? '');
  if (!uni || uni.faculty.length === 0) return null;
  const interest = context.study?.researchInterest ?? context.field;
  const faculty = uni.faculty.find((f) => interest.toLowerCase().includes(f.research)) ?? uni.faculty[0];
  if (!faculty) return null;
  return {
    ...task,
    title: `Email ${faculty.name} about ${interest} research`,
    description: [
      `1. Read two recent papers from ${faculty.name} (${uni.name}, ${faculty.research}).`,
      `2. Write a 150-word email to ${faculty.email} linking your background to their work.`,
      '3. Ask one specific question about open positions in their group.',
    ].join('\n'),
    specificResource: faculty.email,
  };
};

const enrichJob: Enrich = (task, context) => {
  const company = findCompany(context.career?.targetCompanies[0] ?? '');
  if (!company || !context.career) return null;
  return {
    ...task,
    title: `Apply to ${company.name} ${context.career.targetRole} role`,
    description: [
      `1. Open ${company.careersUrl} and filter for ${context.career.targetRole}.`,
      '2. Pick the posting that best matches your experience.',
      '3. Submit your tailored resume and save the confirmation.',
    ].join('\n'),
    specificResource: company.careersUrl,
  };
};

const enrichCompany: Enrich = (task, context) => {
  const company = findCompany(context.career?.targetCompanies[0] ?? '');
  if (!company) return null;
  return { ...task, specificResource: company.careersUrl };
};

const enrichDeadline: Enrich = (task, context) => {
  const note = deadlineNote(context.category);
  if (!note) return null;
  return { ...task, notes: appendNote(task, note) };
};

const enrichEvent: Enrich = (task, context) => {
  if (context.category !== 'career') return null;
  return {
    ...task,
    specificResource: LINKEDIN_EVENTS_URL,
    notes: appendNote(task, `Try: ${getTables().eventPlatforms.join(', ')}`),
  };
};

const ENRICHERS: Record<EnrichmentIntent, Enrich> = {
  university_research: enrichUniversity,
  professor_contact: enrichProfessor,
  job_application: enrichJob,
  company_research: enrichCompany,
  deadline_check: enrichDeadline,
  event_research: enrichEvent,
};

export function enrichTask(task: Task, context: ProfileContext): Task {
  const intent = detectIntent(task);
  if (!intent) return task;
  const enriched = ENRICHERS[intent](task, context);
  return enriched ? { ...enriched, enriched: true } : task;
}

export interface EnrichResult {
  tasks: Task[];
  enriched: number;
}

/**
 * Enrich every task. A failure on one task keeps that task as it was.
 */
export function enrichTasks(tasks: readonly Task[], context: ProfileContext): EnrichResult {
  let enriched = 0;
  const out = tasks.map((task) => {
    try {
      const result = enrichTask(task, context);
      if (result !== task) enriched++;
      return result;
    } catch (error) {
      logger.warn('Enrichment failed; keeping original task', error, { title: task.title });
      return task;
    }
  });
  logger.info('Enrichment finished', { total: tasks.length, enriched });
  return { tasks: out, enriched };
}
