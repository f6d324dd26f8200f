import { GoalSchema, TaskSchema } from '../../src/types/index.js';
import type { Goal, GoalInput, Task, UserProfile } from '../../src/types/index.js';

export function makeGoal(overrides: Partial<GoalInput> = {}): Goal {
  return GoalSchema.parse({
    id: 'goal-1',
    userId: 'user-1',
    category: 'study',
    title: "Get into a computer science master's program",
    ...overrides,
  });
}

/** Startup founder with a below-average GPA applying to UK programs */
export const founderProfile: UserProfile = {
  name: 'Sam',
  gpa: 3.2,
  hasStartup: true,
  startup: { name: 'Acme Labs', users: '2,000', funding: '$50k', role: 'CEO' },
  testScores: { ielts: 6.5 },
  targetUniversities: ['University of Edinburgh'],
  targetCountries: ['UK'],
  budget: '£15k',
  achievements: ['Won a regional hackathon'],
};

export function makeTask(overrides: Partial<Task> = {}): Task {
  return TaskSchema.parse({
    id: 'task-1',
    title: 'Email Prof. Lee about robotics research openings',
    description: 'Short email referencing the 2024 paper.',
    taskType: 'copilot',
    timeboxMinutes: 30,
    priority: 3,
    deliverableType: 'email',
    definitionOfDone: [{ text: 'Email sent', weight: 100 }],
    source: 'template_agent',
    ...overrides,
  });
}
