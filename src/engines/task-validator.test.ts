import { describe, it, expect } from 'vitest';
import {
  HARD_REJECT_THRESHOLD,
  PASS_THRESHOLD,
  hasUserContext,
  isActionable,
  isNotGeneric,
  isSpecific,
  validateBatch,
  validateTask,
} from './task-validator.js';
import { extractContext } from './profile-extractor.js';
import { founderProfile, makeGoal, makeTask } from '../../tests/helpers/fixtures.js';

describe('task validator', () => {
  const context = extractContext(founderProfile, makeGoal());

  const strongTask = makeTask({
    title: 'Email University of Edinburgh admissions about the MSc deadline',
    description: '',
  });
  const vagueTask = makeTask({ title: 'Think about universities', description: '' });

  describe('validateTask', () => {
    it('should pass a specific, contextual, actionable task', () => {
      const result = validateTask(strongTask, context);

      expect(result.score).toBe(100);
      expect(result.valid).toBe(true);
      expect(result.hardReject).toBe(false);
      expect(result.issues).toEqual([]);
    });

    it('should hard-reject a vague task', () => {
      const result = validateTask(vagueTask, context);

      expect(result.checks).toEqual({
        hasUserContext: false,
        isSpecific: false,
        isActionable: false,
        hasRealisticTimebox: true,
        notGeneric: true,
      });
      expect(result.score).toBe(40);
      expect(result.valid).toBe(false);
      expect(result.hardReject).toBe(true);
      expect(result.issues).toHaveLength(3);
    });

    it('should still pass with a single failed check', () => {
      const result = validateTask({ ...strongTask, timeboxMinutes: 700 }, context);

      expect(result.score).toBe(PASS_THRESHOLD);
      expect(result.valid).toBe(true);
      expect(result.issues).toEqual(['Timebox must be between 1 and 600 minutes']);
    });

    it('should never raise the score when a check starts failing', () => {
      const base = validateTask(strongTask, context).score;
      const variants = [
        { ...strongTask, timeboxMinutes: 0 },
        { ...strongTask, title: 'Email Edinburgh' },
        { ...strongTask, description: 'Mention your startup.' },
      ];

      for (const variant of variants) {
        expect(validateTask(variant, context).score).toBeLessThan(base);
      }
    });

    it('should score at least the hard-reject line with three passing checks', () => {
      const result = validateTask({ ...strongTask, title: 'Email Edinburgh' }, context);

      expect(result.score).toBe(HARD_REJECT_THRESHOLD);
      expect(result.hardReject).toBe(false);
      expect(result.valid).toBe(false);
    });
  });

  describe('hasUserContext', () => {
    it('should exempt custom-generated tasks', () => {
      expect(hasUserContext({ ...vagueTask, source: 'custom_generator' }, context)).toBe(true);
    });

    it('should accept a long text with numbers', () => {
      const task = makeTask({
        title: 'Book 2 mock interviews this month',
        description: 'Use the careers office booking page for both slots.',
      });

      expect(hasUserContext(task, context)).toBe(true);
    });

    it('should match the startup name', () => {
      expect(hasUserContext(makeTask({ title: 'Post the Acme Labs launch story', description: '' }), context)).toBe(
        true
      );
    });
  });

  describe('isSpecific', () => {
    it('should reject short titles and vague phrases', () => {
      expect(isSpecific(makeTask({ title: 'Write SOP' }))).toBe(false);
      expect(isSpecific(makeTask({ title: 'Research some programs in Europe' }))).toBe(false);
      expect(isSpecific(makeTask({ title: 'Draft the first SOP paragraph' }))).toBe(true);
    });
  });

  describe('isActionable', () => {
    it('should accept a verb within the first three words', () => {
      expect(isActionable(makeTask({ title: 'Today, draft the SOP intro for Edinburgh' }))).toBe(true);
    });

    it('should reject weak verbs anywhere in the title', () => {
      expect(isActionable(makeTask({ title: 'Write down options to explore later' }))).toBe(false);
    });

    it('should reject titles without an action verb', () => {
      expect(isActionable(makeTask({ title: 'University application season begins' }))).toBe(false);
    });
  });

  describe('isNotGeneric', () => {
    it('should allow whitelisted brackets', () => {
      expect(isNotGeneric(makeTask({ title: 'Email [professor name] about lab openings', description: '' }))).toBe(
        true
      );
      expect(isNotGeneric(makeTask({ title: 'Draft [Part 1] of the essay', description: '' }))).toBe(true);
    });

    it('should reject unknown brackets and generic phrases', () => {
      expect(isNotGeneric(makeTask({ title: 'Email the [department] office', description: '' }))).toBe(false);
      expect(isNotGeneric(makeTask({ title: 'Email [insert university] admissions', description: '' }))).toBe(false);
      expect(isNotGeneric(makeTask({ title: 'Shortlist programs in your field', description: '' }))).toBe(false);
    });

    it('should match generic phrases as whole words', () => {
      expect(isNotGeneric(makeTask({ title: 'Confirm the interview date, still TBD', description: '' }))).toBe(false);
      expect(isNotGeneric(makeTask({ title: 'Email the Artbdesk studio about internships', description: '' }))).toBe(
        true
      );
    });
  });

  describe('validateBatch', () => {
    it('should summarize pass, fail and regeneration counts', () => {
      const summary = validateBatch([strongTask, vagueTask, { ...strongTask, title: 'Email Edinburgh' }], context);

      expect(summary.total).toBe(3);
      expect(summary.passed).toBe(1);
      expect(summary.failed).toBe(2);
      expect(summary.needsRegeneration).toBe(1);
      expect(summary.averageScore).toBe(67);
      expect(summary.failedTasks.map((failed) => failed.title)).toEqual(['Think about universities', 'Email Edinburgh']);
    });

    it('should handle an empty batch', () => {
      expect(validateBatch([], context).averageScore).toBe(0);
    });
  });
});
