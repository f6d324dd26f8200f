/**
 * Profile Context Extractor
 *
 * Builds the read-only ProfileContext every generator works from. Missing
 * profile fields fall back to documented defaults; nothing here throws on an
 * incomplete profile.
 */

import { z } from 'zod';
import type {
  CareerContext,
  ExperienceLevel,
  FitnessContext,
  Goal,
  ProfileContext,
  StudyContext,
  TemplateScope,
  TestPrepNeeded,
  UserProfile,
} from '../types/index.js';
import { lazy, loadDataFile } from '../utils/data.js';
import { getCoverageTables } from './coverage-detector.js';
import { budgetTierFor, parseBudget } from './template-selector.js';

const ProfileTablesSchema = z.object({
  fieldKeywords: z.array(z.object({ field: z.string(), keywords: z.array(z.string()) })),
  degreeKeywords: z.array(z.object({ level: z.string(), keywords: z.array(z.string()) })),
  regions: z.record(z.string()),
  defaultRegion: z.string(),
  defaultCountries: z.array(z.string()),
  defaultUniversities: z.record(z.array(z.string())),
  defaultUniversityName: z.string(),
  industryCompanies: z.array(z.object({ industry: z.string(), companies: z.array(z.string()) })),
  defaultCompanies: z.array(z.string()),
  skillGaps: z.array(z.object({ role: z.string(), gap: z.string() })),
  defaultSkillGap: z.string(),
  academicRoleKeywords: z.array(z.string()),
});

const getProfileTables = lazy(() => loadDataFile('profile.yaml', ProfileTablesSchema));

export const GPA_COMPENSATION_THRESHOLD = 3.5;
export const DEFAULT_TARGET_IELTS = 7.0;
export const DEFAULT_TARGET_TOEFL = 100;
export const DEFAULT_TARGET_GRE = 320;

type Specs = Record<string, unknown>;

function specString(specs: Specs, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = specs[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

function specNumber(specs: Specs, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = specs[key];
    const num = typeof value === 'string' ? Number.parseFloat(value) : value;
    if (typeof num === 'number' && Number.isFinite(num)) return num;
  }
  return undefined;
}

function specList(specs: Specs, ...keys: string[]): string[] | undefined {
  for (const key of keys) {
    const value = specs[key];
    if (Array.isArray(value)) {
      const items = value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
      if (items.length > 0) return items;
    }
    if (typeof value === 'string' && value.trim()) {
      return value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
    }
  }
  return undefined;
}

function specBool(specs: Specs, key: string): boolean | undefined {
  const value = specs[key];
  return typeof value === 'boolean' ? value : undefined;
}

function nonEmpty<T>(list: readonly T[] | undefined): list is readonly T[] {
  return list !== undefined && list.length > 0;
}

const SCORE_PATTERNS: Record<keyof TestPrepNeeded, RegExp> = {
  ielts: /ielts[:\s]+(\d+\.?\d*)/,
  toefl: /toefl[:\s]+(\d+)/,
  gre: /gre[:\s]+(\d+)/,
};

/**
 * Current test scores from a score record or a free-text string like "IELTS: 6.5, GRE 310".
 */
export function parseTestScores(scores: UserProfile['testScores']): Partial<Record<keyof TestPrepNeeded, number>> {
  if (scores === undefined) return {};

  const result: Partial<Record<keyof TestPrepNeeded, number>> = {};
  if (typeof scores === 'string') {
    const text = scores.toLowerCase();
    for (const test of ['ielts', 'toefl', 'gre'] as const) {
      const match = SCORE_PATTERNS[test].exec(text);
      if (match?.[1]) {
        const value = Number.parseFloat(match[1]);
        if (Number.isFinite(value)) result[test] = value;
      }
    }
    return result;
  }

  for (const [key, value] of Object.entries(scores)) {
    const test = key.toLowerCase();
    if ((test === 'ielts' || test === 'toefl' || test === 'gre') && value > 0) {
      result[test] = value;
    }
  }
  return result;
}

export function mapExperienceLevel(years: number): ExperienceLevel {
  if (years <= 2) return 'entry_level';
  if (years <= 7) return 'mid_level';
  return 'senior';
}

/**
 * Target salary from a market rate string such as "$80-100k": the first
 * number, raised 10% beyond five years of experience and 5% otherwise.
 */
export function calculateTargetSalary(marketRate: string, years: number): string {
  const match = /\d+/.exec(marketRate);
  if (!match) return '$85k';

  const first = Number.parseInt(match[0], 10);
  const base = marketRate.toLowerCase().includes('k') ? first * 1000 : first;
  const target = Math.floor(base * (years > 5 ? 1.1 : 1.05));
  return target >= 1000 ? `$${Math.floor(target / 1000)}k` : `$${target}`;
}

function workHistoryText(profile: UserProfile): string {
  const parts = [
    profile.currentRole,
    ...(profile.workHistory ?? []).flatMap((entry) => [entry.role, entry.company, entry.description]),
  ];
  return parts.filter((part): part is string => Boolean(part)).join(' ').toLowerCase();
}

/**
 * Background label: an explicit one wins, then flags and work-history keywords.
 */
export function inferBackground(
  profile: UserProfile,
  specs: Specs,
  flags: { hasStartupBackground: boolean; hasProfessionalExperience: boolean; hasResearchExperience: boolean }
): string {
  const explicit = profile.background?.trim() || specString(specs, 'background');
  if (explicit) return explicit.toLowerCase();

  if (flags.hasStartupBackground) return 'founder';

  if (flags.hasProfessionalExperience) {
    const history = workHistoryText(profile);
    for (const { label, keywords } of getCoverageTables().workHistoryBackgrounds) {
      if (keywords.some((kw) => history.includes(kw))) return label;
    }
    return 'professional';
  }

  if (flags.hasResearchExperience) return 'researcher';

  return 'student';
}

function inferField(goal: Goal): string | undefined {
  const combined = `${goal.title} ${goal.description}`.toLowerCase();
  for (const { field, keywords } of getProfileTables().fieldKeywords) {
    if (keywords.some((kw) => combined.includes(kw))) return field;
  }
  return undefined;
}

function inferDegreeLevel(goal: Goal): string {
  const combined = `${goal.title} ${goal.description} `.toLowerCase();
  for (const { level, keywords } of getProfileTables().degreeKeywords) {
    if (keywords.some((kw) => combined.includes(kw))) return level;
  }
  return 'graduate';
}

function buildStudyContext(
  profile: UserProfile,
  goal: Goal,
  scores: Partial<Record<keyof TestPrepNeeded, number>>,
  gpa: number | null
): StudyContext {
  const tables = getProfileTables();
  const specs = goal.specifications;

  const field =
    profile.field?.trim() || specString(specs, 'field', 'field_of_study') || inferField(goal) || 'your field of study';

  const targetCountries =
    (nonEmpty(profile.targetCountries) ? profile.targetCountries : undefined) ??
    specList(specs, 'target_countries', 'country') ??
    tables.defaultCountries;
  const countryCode = (targetCountries[0] ?? '').toUpperCase();

  const targetUniversities =
    (nonEmpty(profile.targetUniversities) ? profile.targetUniversities : undefined) ??
    specList(specs, 'target_universities', 'universities') ??
    [];

  const universityName =
    specString(specs, 'university_name') ??
    targetUniversities[0] ??
    tables.defaultUniversities[countryCode]?.[0] ??
    tables.defaultUniversityName;

  const currentUniversity =
    profile.education?.[0]?.institution ??
    specString(specs, 'current_university') ??
    (targetUniversities[0] ? `${targetUniversities[0]} (target)` : 'your university');

  const professorContacts = (profile.networkContacts ?? [])
    .filter((contact) => {
      const role = (contact.role ?? '').toLowerCase();
      return tables.academicRoleKeywords.some((kw) => role.includes(kw));
    })
    .map((contact) => contact.name)
    .slice(0, 3);

  return {
    field,
    degreeLevel: specString(specs, 'degree_level') ?? inferDegreeLevel(goal),
    gpaDisplay: gpa !== null ? `${gpa}/4.0` : 'your GPA',
    currentIelts: scores.ielts ?? null,
    currentToefl: scores.toefl ?? null,
    currentGre: scores.gre ?? null,
    targetIelts: specNumber(specs, 'target_ielts', 'target_score') ?? DEFAULT_TARGET_IELTS,
    targetToefl: specNumber(specs, 'target_toefl') ?? DEFAULT_TARGET_TOEFL,
    targetGre: specNumber(specs, 'target_gre') ?? DEFAULT_TARGET_GRE,
    targetCountries,
    targetRegion: tables.regions[countryCode] ?? specString(specs, 'target_regions') ?? tables.defaultRegion,
    targetUniversities,
    universityName,
    currentUniversity,
    professorContacts,
    researchInterest: specString(specs, 'research_interest', 'research_area') ?? field,
    examMonth: specString(specs, 'exam_month') ?? 'next available',
    examDate: specString(specs, 'exam_date') ?? 'your exam date',
    numSchools: specNumber(specs, 'num_schools') ?? 5,
    visaType: specString(specs, 'visa_type') ?? 'Student Visa',
  };
}

function buildCareerContext(profile: UserProfile, goal: Goal): CareerContext {
  const tables = getProfileTables();
  const specs = goal.specifications;
  const years = profile.yearsExperience ?? 0;
  const latestJob = profile.workHistory?.[0];

  const topSkills = nonEmpty(profile.skills)
    ? profile.skills.slice(0, 5)
    : nonEmpty(profile.techStack)
      ? profile.techStack.slice(0, 5)
      : ['your key skills'];
  const stackList = nonEmpty(profile.techStack) ? profile.techStack : topSkills;

  const notableProjects = nonEmpty(profile.achievements) ? profile.achievements : (profile.projects ?? []);

  const targetRole = profile.targetRole?.trim() || specString(specs, 'target_role', 'targetRole', 'role') || goal.title;
  const targetIndustry = profile.targetIndustry?.trim() || specString(specs, 'target_industry', 'industry') || 'Tech';

  const industryLower = targetIndustry.toLowerCase();
  const targetCompanies =
    (nonEmpty(profile.targetCompanies) ? profile.targetCompanies.slice(0, 5) : undefined) ??
    specList(specs, 'target_companies', 'companies')?.slice(0, 5) ??
    tables.industryCompanies.find((entry) => industryLower.includes(entry.industry))?.companies ??
    tables.defaultCompanies;

  const companiesWorked = nonEmpty(profile.companiesWorked)
    ? profile.companiesWorked
    : (profile.workHistory ?? []).map((entry) => entry.company);

  const introContacts = (profile.networkContacts ?? []).filter((contact) => Boolean(contact.company)).slice(0, 5);
  const warmIntros = introContacts.map((contact) => `${contact.name} (${contact.company ?? ''})`);

  const roleLower = targetRole.toLowerCase();
  const skillGap = tables.skillGaps.find((entry) => roleLower.includes(entry.role))?.gap ?? tables.defaultSkillGap;

  return {
    yearsExperience: years,
    experienceLevel: mapExperienceLevel(years),
    experienceText: years === 0 ? 'early-career' : years === 1 ? '1 year of' : `${years} years of`,
    currentRole: profile.currentRole ?? latestJob?.role ?? 'your current role',
    currentCompany: profile.currentCompany ?? latestJob?.company ?? 'your current company',
    targetRole,
    targetIndustry,
    topSkills,
    techStack: stackList.slice(0, 5).join(', '),
    notableProjects,
    project1: notableProjects[0] ?? 'your most impactful project',
    project2: notableProjects[1] ?? 'another recent project',
    project3: notableProjects[2] ?? 'a side project',
    keySkill1: stackList[0] ?? 'your primary skill',
    keySkill2: stackList[1] ?? 'your secondary skill',
    keySkill3: stackList[2] ?? 'a complementary skill',
    targetCompanies,
    company1: companiesWorked[0] ?? 'previous company',
    company2: companiesWorked[1] ?? 'another company',
    warmIntros,
    mutualConnection: introContacts[0]?.name ?? 'a mutual contact',
    targetSalary: calculateTargetSalary(specString(specs, 'market_rate', 'salary') ?? '$80-100k', years),
    skillGap,
  };
}

function buildFitnessContext(profile: UserProfile): FitnessContext {
  return {
    fitnessLevel: profile.fitnessLevel ?? 'beginner',
    workoutLocation: profile.hasGymAccess ? 'gym' : 'home',
    limitations: profile.injuries ?? [],
  };
}

/**
 * Build the context for one (profile, goal) pair. Pure.
 */
export function extractContext(profile: UserProfile, goal: Goal): ProfileContext {
  const specs = goal.specifications;

  const hasStartupBackground =
    specBool(specs, 'has_startup_background') ?? profile.hasStartup ?? profile.startup !== undefined;

  const workHistory = profile.workHistory ?? [];
  const achievements = profile.achievements ?? [];
  const hasProfessionalExperience = (profile.yearsExperience ?? 0) > 0 || workHistory.length > 0;
  const hasNotableAchievements = achievements.length > 0;
  const hasResearchExperience = profile.researchExperience ?? specBool(specs, 'has_research_experience') ?? false;

  const gpa = profile.gpa ?? specNumber(specs, 'gpa') ?? null;
  const gpaBelowAverage = gpa !== null && gpa < GPA_COMPENSATION_THRESHOLD;
  const gpaNeedsCompensation = gpaBelowAverage && (hasStartupBackground || hasNotableAchievements);

  const scores = parseTestScores(profile.testScores);
  const study = goal.category === 'study' ? buildStudyContext(profile, goal, scores, gpa) : undefined;
  const career = goal.category === 'career' ? buildCareerContext(profile, goal) : undefined;
  const fitness = goal.category === 'sport' ? buildFitnessContext(profile) : undefined;

  const testPrepNeeded: TestPrepNeeded = study
    ? {
        ielts: study.currentIelts !== null && study.currentIelts < study.targetIelts,
        toefl: study.currentToefl !== null && study.currentToefl < study.targetToefl,
        gre: study.currentGre !== null && study.currentGre < study.targetGre,
      }
    : { ielts: false, toefl: false, gre: false };

  const budget = profile.budget ?? specString(specs, 'budget') ?? '';
  const maxTuition = parseBudget(budget);

  const field =
    study?.field ?? (profile.field?.trim() || specString(specs, 'field', 'field_of_study') || career?.targetIndustry || '');

  const workSummary =
    workHistory.map((entry) => `${entry.role} at ${entry.company}`).join('; ') ||
    (profile.currentRole && profile.currentCompany ? `${profile.currentRole} at ${profile.currentCompany}` : '');

  const startup = hasStartupBackground
    ? {
        startupName: specString(specs, 'startup_name') ?? profile.startup?.name ?? 'your startup',
        startupDescription: specString(specs, 'startup_description') ?? profile.startup?.description ?? 'your startup',
        startupUsers: specString(specs, 'startup_users') ?? profile.startup?.users ?? '0',
        startupFunding: specString(specs, 'startup_funding') ?? profile.startup?.funding ?? '$0',
        startupRole: specString(specs, 'startup_role') ?? profile.startup?.role ?? 'Founder',
      }
    : {};

  return {
    userId: goal.userId,
    goalId: goal.id,
    category: goal.category,
    goalTitle: goal.title,
    goalDescription: goal.description,
    goalPriority: goal.priority,

    userName: profile.name ?? 'there',
    country: profile.country ?? '',
    energyPeak: profile.energyPeak ?? 'morning',
    dailyMinutes: profile.dailyMinutes ?? 120,
    weakness: profile.weaknesses?.[0] ?? 'general improvement',

    hasStartupBackground,
    ...startup,

    hasProfessionalExperience,
    hasNotableAchievements,
    hasResearchExperience,
    achievements,
    workSummary,
    companiesWorked: profile.companiesWorked ?? workHistory.map((entry) => entry.company),

    gpa,
    gpaBelowAverage,
    gpaNeedsCompensation,
    testPrepNeeded,

    budget,
    maxTuition,
    budgetTier: budgetTierFor(budget),

    background: inferBackground(profile, specs, {
      hasStartupBackground,
      hasProfessionalExperience,
      hasResearchExperience,
    }),
    field,

    ...(study && { study }),
    ...(career && { career }),
    ...(fitness && { fitness }),
  };
}

/**
 * Flatten a context into template variables: top-level fields plus the
 * category section's fields, with the sections also reachable by name.
 */
export function toTemplateVariables(context: ProfileContext): TemplateScope {
  return {
    ...context,
    ...context.study,
    ...context.career,
    ...context.fitness,
  };
}
