import { z } from 'zod';

/**
 * Goal categories. Closed set; a goal's category never changes after creation.
 */
export const GoalCategorySchema = z.enum(['study', 'career', 'sport', 'finance', 'language']);

export type GoalCategory = z.infer<typeof GoalCategorySchema>;

/** Calendar date without time, `YYYY-MM-DD` */
export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

/**
 * A user goal. `specifications` is free-form and read defensively by the
 * context extractor; it is never strictly validated.
 */
export const GoalSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  category: GoalCategorySchema,
  title: z.string().min(1),
  description: z.string().default(''),
  specifications: z.record(z.unknown()).default({}),
  priority: z.number().int().min(1).max(5).default(2),
  startDate: IsoDateSchema.optional(),
  targetDate: IsoDateSchema.optional(),
});

export type Goal = z.infer<typeof GoalSchema>;
export type GoalInput = z.input<typeof GoalSchema>;

export const NetworkContactSchema = z.object({
  name: z.string(),
  role: z.string().optional(),
  company: z.string().optional(),
  relationship: z.string().optional(),
});

export type NetworkContact = z.infer<typeof NetworkContactSchema>;

export const WorkHistoryEntrySchema = z.object({
  company: z.string(),
  role: z.string(),
  years: z.number().nonnegative().optional(),
  description: z.string().optional(),
});

export type WorkHistoryEntry = z.infer<typeof WorkHistoryEntrySchema>;

export const EducationEntrySchema = z.object({
  institution: z.string(),
  degree: z.string().optional(),
  field: z.string().optional(),
  year: z.number().int().optional(),
});

export type EducationEntry = z.infer<typeof EducationEntrySchema>;

export const StartupSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  users: z.string().optional(),
  funding: z.string().optional(),
  role: z.string().optional(),
});

export type Startup = z.infer<typeof StartupSchema>;

/**
 * User profile. Every field is optional; the extractor documents the default
 * it falls back to.
 */
export const UserProfileSchema = z.object({
  userId: z.string().optional(),
  name: z.string().optional(),
  country: z.string().optional(),
  energyPeak: z.enum(['morning', 'afternoon', 'evening']).optional(),
  dailyMinutes: z.number().int().positive().optional(),
  weaknesses: z.array(z.string()).optional(),

  // Academic
  gpa: z.number().min(0).max(5).optional(),
  testScores: z.union([z.record(z.number()), z.string()]).optional(),
  education: z.array(EducationEntrySchema).optional(),
  researchExperience: z.boolean().optional(),
  field: z.string().optional(),
  budget: z.string().optional(),
  targetUniversities: z.array(z.string()).optional(),
  targetCountries: z.array(z.string()).optional(),

  // Professional
  background: z.string().optional(),
  yearsExperience: z.number().nonnegative().optional(),
  currentRole: z.string().optional(),
  currentCompany: z.string().optional(),
  companiesWorked: z.array(z.string()).optional(),
  workHistory: z.array(WorkHistoryEntrySchema).optional(),
  skills: z.array(z.string()).optional(),
  techStack: z.array(z.string()).optional(),
  achievements: z.array(z.string()).optional(),
  projects: z.array(z.string()).optional(),
  networkContacts: z.array(NetworkContactSchema).optional(),
  targetRole: z.string().optional(),
  targetIndustry: z.string().optional(),
  targetCompanies: z.array(z.string()).optional(),
  currentSalary: z.number().nonnegative().optional(),
  hasStartup: z.boolean().optional(),
  startup: StartupSchema.optional(),

  // Fitness
  fitnessLevel: z.string().optional(),
  hasGymAccess: z.boolean().optional(),
  injuries: z.array(z.string()).optional(),
});

export type UserProfile = z.infer<typeof UserProfileSchema>;
