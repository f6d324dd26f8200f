/**
 * Canned model answers shared by generator and pipeline tests.
 */

export function milestoneItems(count: number): Array<Record<string, unknown>> {
  const topics = [
    'Shortlist UK programs',
    'Book and pass IELTS',
    'Draft the statement of purpose',
    'Secure recommendation letters',
    'Submit all applications',
    'Apply for scholarships',
    'Prepare the visa file',
    'Plan the move',
  ];
  return Array.from({ length: count }, (_, i) => ({
    title: topics[i % topics.length] ?? 'Milestone title',
    description: 'A coarse step toward the goal.',
    duration_weeks: 2,
    success_criteria: 'Done and recorded in the tracker',
  }));
}

export const emailTask = {
  title: 'Email Maria Chen at ETH Zurich about robotics lab openings',
  description: 'Send a 150-word email introducing your work at Acme Labs.',
  timebox_minutes: 30,
  priority: 3,
  deliverable: 'Sent email to Maria Chen',
};

export const sheetTask = {
  title: 'Compare tuition for 5 programs on the Imperial College London site',
  description: 'Record tuition, deadline and IELTS minimum for each program in a Google Sheet.',
  timebox_minutes: 45,
  priority: 4,
  deliverable: 'Google Sheet with 5 programs',
};

export const metaTask = {
  title: 'Develop a plan for the application season',
  description: 'Think through everything.',
  timebox_minutes: 60,
};
