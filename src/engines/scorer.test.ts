import { describe, it, expect } from 'vitest';
import { personalizationScore, rankTasks, smartFilter } from './scorer.js';
import { extractContext } from './profile-extractor.js';
import { founderProfile, makeGoal, makeTask } from '../../tests/helpers/fixtures.js';

const founder = extractContext(founderProfile, makeGoal());

const storyTask = makeTask({ id: 'story', title: 'Write the startup story for the essay', source: 'unique_generator', priority: 4 });
const gpaTask = makeTask({ id: 'gpa', title: 'Explain the GPA in an optional essay', source: 'custom_generator' });
const templateTask = makeTask({ id: 'template' });

describe('personalizationScore', () => {
  it('should add source, founder, priority and essay points', () => {
    expect(personalizationScore(storyTask, founder)).toBe(60);
  });

  it('should reward GPA compensation for custom tasks', () => {
    expect(personalizationScore(gpaTask, founder)).toBe(45);
  });

  it('should give a plain template task only the template bonus', () => {
    expect(personalizationScore(templateTask, founder)).toBe(5);
  });

  it('should only read keywords from the title', () => {
    const task = makeTask({
      title: 'Book a call with the Edinburgh admissions office',
      description: 'Mention the startup essay and GPA.',
    });

    expect(personalizationScore(task, founder)).toBe(5);
  });

  it('should skip the founder bonus without a startup', () => {
    expect(personalizationScore(storyTask, extractContext({}, makeGoal()))).toBe(45);
  });
});

describe('rankTasks', () => {
  it('should sort by score and store it on each task', () => {
    const ranked = rankTasks([templateTask, storyTask, gpaTask], founder);

    expect(ranked.map((task) => task.id)).toEqual(['story', 'gpa', 'template']);
    expect(ranked.map((task) => task.personalizationScore)).toEqual([60, 45, 5]);
  });

  it('should break score ties by priority then date', () => {
    const low = makeTask({ id: 'low', priority: 2 });
    const late = makeTask({ id: 'late', scheduledDate: '2026-03-02' });
    const early = makeTask({ id: 'early', scheduledDate: '2026-03-01' });

    expect(rankTasks([low, late, early], founder).map((task) => task.id)).toEqual(['early', 'late', 'low']);
  });
});

describe('smartFilter', () => {
  it('should drop prep for a test the user already passes', () => {
    const context = extractContext({ testScores: { ielts: 7.5 } }, makeGoal());
    const prep = makeTask({ id: 'prep', title: 'Book an IELTS mock test' });

    expect(smartFilter([prep, templateTask], context).map((task) => task.id)).toEqual(['template']);
  });

  it('should keep registration for a test the user already passes', () => {
    const context = extractContext({ testScores: { ielts: 7.5 } }, makeGoal());
    const register = makeTask({
      id: 'register',
      title: 'Register for the IELTS Academic test in May',
      templateId: 'ielts_registration_budget',
    });
    const writing = makeTask({
      id: 'writing',
      title: 'Write 1 timed IELTS Task 2 essay',
      templateId: 'ielts_prep_weakness_writing',
    });

    expect(smartFilter([register, writing], context).map((task) => task.id)).toEqual(['register']);
  });

  it('should keep prep while no score is on file', () => {
    const context = extractContext({}, makeGoal());
    const prep = makeTask({ id: 'prep', title: 'Complete 4 IELTS practice tests at the British Council' });

    expect(context.testPrepNeeded.ielts).toBe(false);
    expect(smartFilter([prep], context).map((task) => task.id)).toEqual(['prep']);
  });

  it('should keep prep for a test the user still needs', () => {
    const prep = makeTask({ id: 'prep', title: 'Book an IELTS mock test' });

    expect(smartFilter([prep], founder)).toHaveLength(1);
  });

  it('should drop the LinkedIn template when a founder has a custom LinkedIn task', () => {
    const custom = makeTask({ id: 'custom', title: 'Update LinkedIn headline with Acme Labs', source: 'custom_generator' });
    const generic = makeTask({ id: 'generic', title: 'Polish your profile headline', templateId: 'linkedin_headline' });

    expect(smartFilter([custom, generic], founder).map((task) => task.id)).toEqual(['custom']);
    expect(smartFilter([generic], founder).map((task) => task.id)).toEqual(['generic']);
  });
});
