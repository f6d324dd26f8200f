import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { handleValidate, validateTool } from '../../src/tools/validate.js';
import { founderProfile, makeGoal } from '../helpers/fixtures.js';

describe('validate tool', () => {
  it('should be named planner_validate', () => {
    expect(validateTool.name).toBe('planner_validate');
  });

  it('should score a compound task low on atomicity', () => {
    const result = handleValidate({ tasks: [{ title: 'Research universities and update resume', timeboxMinutes: 120 }] });

    expect(result.atomicity.total).toBe(1);
    expect(result.atomicity.nonAtomic).toBe(1);
    expect(result.results[0]?.atomicity.score).toBe(20);
    expect(result.results[0]?.atomicity.checks.singleAction).toBe(false);
  });

  it('should use the profile for the user-context check', () => {
    const result = handleValidate({
      tasks: [{ title: 'Email University of Edinburgh admissions about the MSc deadline' }],
      profile: founderProfile,
      goal: makeGoal(),
    });

    expect(result.results[0]?.validation.score).toBe(100);
    expect(result.summary.passed).toBe(1);
  });

  it('should return one result per task in order', () => {
    const result = handleValidate({ tasks: [{ title: 'First task title' }, { title: 'Second task title' }] });

    expect(result.results.map((entry) => entry.title)).toEqual(['First task title', 'Second task title']);
    expect(result.summary.total).toBe(2);
  });

  it('should reject an empty task list', () => {
    expect(() => handleValidate({ tasks: [] })).toThrow(ZodError);
  });
});
