import { describe, it, expect } from 'vitest';
import {
  breakdownTask,
  checkAtomicity,
  hasDeliverable,
  hasSpecificResource,
  isAcceptedAsAtomic,
  isSingleAction,
  isTimeboxInRange,
  validateAtomicBatch,
} from './atomicity-checker.js';
import { extractContext } from './profile-extractor.js';
import { founderProfile, makeGoal, makeTask } from '../../tests/helpers/fixtures.js';
import { StubLlm, json } from '../../tests/helpers/stub-llm.js';

const atomicTask = makeTask({
  title: 'Email Maria Chen about robotics lab openings',
  description: 'Send a 150-word email.',
  timeboxMinutes: 30,
});

const compoundTask = makeTask({
  title: 'Research universities and update resume',
  description: '',
  timeboxMinutes: 120,
  definitionOfDone: [],
});

describe('atomicity checker', () => {
  describe('checkAtomicity', () => {
    it('should score a single concrete action at 100', () => {
      const result = checkAtomicity(atomicTask);

      expect(result.score).toBe(100);
      expect(result.valid).toBe(true);
    });

    it('should fail a task that joins two actions', () => {
      const result = checkAtomicity(compoundTask);

      expect(result.checks.singleAction).toBe(false);
      expect(result.score).toBe(20);
      expect(result.valid).toBe(false);
    });

    it('should fail the single-action check whatever the other attributes', () => {
      const polished = { ...atomicTask, title: 'Research universities and update resume' };

      expect(checkAtomicity(polished).checks.singleAction).toBe(false);
    });

    it('should flag planning work as meta', () => {
      const result = checkAtomicity(makeTask({ title: 'Develop a plan for applications', description: '' }));

      expect(result.checks.noMeta).toBe(false);
      expect(result.issues).toContain('Describes planning work instead of an action');
    });
  });

  describe('isSingleAction', () => {
    it('should allow "and" between nouns', () => {
      expect(isSingleAction(makeTask({ title: 'Compare tuition and deadlines for ETH Zurich' }))).toBe(true);
    });

    it('should reject sequenced steps', () => {
      expect(isSingleAction(makeTask({ title: 'Draft the SOP intro then email Maria Chen' }))).toBe(false);
      expect(isSingleAction(makeTask({ title: 'Complete step 2 of the application' }))).toBe(false);
    });
  });

  describe('isTimeboxInRange', () => {
    it('should accept 10 to 90 minutes inclusive', () => {
      expect(isTimeboxInRange(makeTask({ timeboxMinutes: 10 }))).toBe(true);
      expect(isTimeboxInRange(makeTask({ timeboxMinutes: 90 }))).toBe(true);
      expect(isTimeboxInRange(makeTask({ timeboxMinutes: 9 }))).toBe(false);
      expect(isTimeboxInRange(makeTask({ timeboxMinutes: 91 }))).toBe(false);
    });
  });

  describe('isAcceptedAsAtomic', () => {
    it('should refuse an out-of-range timebox even when the score passes', () => {
      const long = { ...atomicTask, timeboxMinutes: 300 };

      expect(checkAtomicity(long).valid).toBe(true);
      expect(isAcceptedAsAtomic(long)).toBe(false);
      expect(isAcceptedAsAtomic(atomicTask)).toBe(true);
    });
  });

  describe('hasSpecificResource', () => {
    it('should accept an explicit resource or a domain', () => {
      expect(
        hasSpecificResource(makeTask({ title: 'Read the admissions page', specificResource: 'ed.ac.uk/admissions' }))
      ).toBe(true);
      expect(hasSpecificResource(makeTask({ title: 'Read the admissions page', description: 'Start at mit.edu' }))).toBe(
        true
      );
    });

    it('should reject placeholders even with a resource set', () => {
      const task = makeTask({
        title: 'Email [professor name] about openings',
        description: '',
        specificResource: 'faculty page',
      });

      expect(hasSpecificResource(task)).toBe(false);
    });

    it('should not count a capitalized first word as a name', () => {
      expect(hasSpecificResource(makeTask({ title: 'Write three paragraphs tonight', description: '' }))).toBe(false);
    });
  });

  describe('hasDeliverable', () => {
    it('should accept a described deliverable without a definition of done', () => {
      expect(
        hasDeliverable(makeTask({ definitionOfDone: [], deliverable: 'Google Sheet with 5 programs', description: '' }))
      ).toBe(true);
      expect(hasDeliverable(makeTask({ definitionOfDone: [], description: 'Write notes on each call' }))).toBe(true);
      expect(hasDeliverable(makeTask({ definitionOfDone: [], description: 'Just do it' }))).toBe(false);
    });
  });

  describe('validateAtomicBatch', () => {
    it('should average scores and list failures', () => {
      const result = validateAtomicBatch([atomicTask, compoundTask]);

      expect(result).toEqual({
        total: 2,
        atomic: 1,
        nonAtomic: 1,
        atomicityScore: 60,
        failedTasks: [{ title: compoundTask.title, score: 20, issues: checkAtomicity(compoundTask).issues }],
      });
    });
  });

  describe('breakdownTask', () => {
    const context = extractContext(founderProfile, makeGoal());
    const parent = {
      ...compoundTask,
      priority: 4,
      source: 'atomic_task_generator' as const,
      milestoneTitle: 'Shortlist programs',
      milestoneIndex: 2,
    };
    const children = [1, 2, 3, 4, 5].map((n) => ({
      title: `Compare program ${n} at ETH Zurich`,
      deliverable: 'Row in the comparison sheet',
    }));

    it('should split into at most four children that keep the milestone', async () => {
      const llm = new StubLlm({ breakdown_task: json({ tasks: children }) });

      const result = await breakdownTask(llm, parent, context);

      expect(result).toHaveLength(4);
      for (const child of result) {
        expect(child.source).toBe('atomic_task_generator');
        expect(child.milestoneTitle).toBe('Shortlist programs');
        expect(child.milestoneIndex).toBe(2);
        expect(child.priority).toBe(4);
        expect(child.timeboxMinutes).toBe(90);
      }
    });

    it('should drop children whose timebox leaves the atomic range', async () => {
      const llm = new StubLlm({
        breakdown_task: json({
          tasks: [
            { ...children[0], timebox_minutes: 300 },
            { ...children[1], timebox_minutes: 45 },
          ],
        }),
      });

      const result = await breakdownTask(llm, parent, context);

      expect(result.map((child) => [child.title, child.timeboxMinutes])).toEqual([
        ['Compare program 2 at ETH Zurich', 45],
      ]);
    });

    it('should return nothing when the model fails', async () => {
      const llm = new StubLlm({ breakdown_task: new Error('timeout') });

      expect(await breakdownTask(llm, parent, context)).toEqual([]);
    });

    it('should not call an unavailable model', async () => {
      const llm = new StubLlm();
      llm.available = false;

      expect(await breakdownTask(llm, parent, context)).toEqual([]);
      expect(llm.calls).toHaveLength(0);
    });
  });
});
