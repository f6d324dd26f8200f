import type { GoalCategory } from './goal.js';

export type BudgetTier = 'BUDGET' | 'STANDARD' | 'PREMIUM';

export type ExperienceLevel = 'entry_level' | 'mid_level' | 'senior';

export type TestPrepNeeded = {
  readonly ielts: boolean;
  readonly toefl: boolean;
  readonly gre: boolean;
};

export type StudyContext = {
  readonly field: string;
  readonly degreeLevel: string;
  readonly gpaDisplay: string;
  readonly currentIelts: number | null;
  readonly currentToefl: number | null;
  readonly currentGre: number | null;
  readonly targetIelts: number;
  readonly targetToefl: number;
  readonly targetGre: number;
  readonly targetCountries: readonly string[];
  readonly targetRegion: string;
  readonly targetUniversities: readonly string[];
  /** First target university, or a country-based fallback */
  readonly universityName: string;
  readonly currentUniversity: string;
  readonly professorContacts: readonly string[];
  readonly researchInterest: string;
  readonly examMonth: string;
  readonly examDate: string;
  readonly numSchools: number;
  readonly visaType: string;
};

export type CareerContext = {
  readonly yearsExperience: number;
  readonly experienceLevel: ExperienceLevel;
  readonly experienceText: string;
  readonly currentRole: string;
  readonly currentCompany: string;
  readonly targetRole: string;
  readonly targetIndustry: string;
  readonly topSkills: readonly string[];
  readonly techStack: string;
  readonly notableProjects: readonly string[];
  readonly project1: string;
  readonly project2: string;
  readonly project3: string;
  readonly keySkill1: string;
  readonly keySkill2: string;
  readonly keySkill3: string;
  readonly targetCompanies: readonly string[];
  readonly company1: string;
  readonly company2: string;
  readonly warmIntros: readonly string[];
  readonly mutualConnection: string;
  readonly targetSalary: string;
  readonly skillGap: string;
};

export type FitnessContext = {
  readonly fitnessLevel: string;
  readonly workoutLocation: 'gym' | 'home';
  readonly limitations: readonly string[];
};

/**
 * Everything the generators know about one (profile, goal) pair. Built once,
 * never mutated.
 */
export type ProfileContext = {
  readonly userId: string;
  readonly goalId: string;
  readonly category: GoalCategory;
  readonly goalTitle: string;
  readonly goalDescription: string;
  readonly goalPriority: number;

  readonly userName: string;
  readonly country: string;
  readonly energyPeak: string;
  readonly dailyMinutes: number;
  readonly weakness: string;

  readonly hasStartupBackground: boolean;
  /** Startup fields are only present with a startup background */
  readonly startupName?: string;
  readonly startupDescription?: string;
  readonly startupUsers?: string;
  readonly startupFunding?: string;
  readonly startupRole?: string;

  readonly hasProfessionalExperience: boolean;
  readonly hasNotableAchievements: boolean;
  readonly hasResearchExperience: boolean;
  readonly achievements: readonly string[];
  readonly workSummary: string;
  readonly companiesWorked: readonly string[];

  readonly gpa: number | null;
  readonly gpaBelowAverage: boolean;
  readonly gpaNeedsCompensation: boolean;
  readonly testPrepNeeded: TestPrepNeeded;

  readonly budget: string;
  readonly maxTuition: number;
  readonly budgetTier: BudgetTier;

  /** Explicit or inferred background label, e.g. 'founder', 'nurse' */
  readonly background: string;
  /** Study field, or the career industry/field of interest */
  readonly field: string;

  readonly study?: StudyContext;
  readonly career?: CareerContext;
  readonly fitness?: FitnessContext;
};

/**
 * Values a template can reference. Scopes nest so `{{ study.field }}` and
 * `{{ field }}` both resolve.
 */
export type TemplateValue = string | number | boolean | null | readonly string[] | TemplateScope;

export interface TemplateScope {
  readonly [key: string]: TemplateValue | undefined;
}
