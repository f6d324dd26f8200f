import { describe, it, expect } from 'vitest';
import { founderTasks, generateCustomTasks, gpaCompensationTasks, testPrepTasks } from './custom-generator.js';
import { extractContext } from './profile-extractor.js';
import { founderProfile, makeGoal } from '../../tests/helpers/fixtures.js';

describe('custom generator', () => {
  const founderContext = extractContext(founderProfile, makeGoal());

  describe('founderTasks', () => {
    it('should write startup-specific tasks including an investor recommendation', () => {
      const tasks = founderTasks(founderContext);

      expect(tasks.map((task) => task.title)).toEqual([
        'Write a 500-word founder journey essay about building Acme Labs',
        'Quantify Acme Labs impact in 4 CV bullets with user and funding numbers',
        'Email 1 Acme Labs investor or advisor requesting a recommendation letter',
        'Rewrite your LinkedIn headline around CEO of Acme Labs',
      ]);
    });

    it('should skip the investor task without funding', () => {
      const context = extractContext({ hasStartup: true, startup: { name: 'Acme Labs' } }, makeGoal());

      expect(founderTasks(context)).toHaveLength(3);
    });

    it('should emit nothing without a startup background', () => {
      expect(founderTasks(extractContext({}, makeGoal()))).toEqual([]);
    });
  });

  describe('gpaCompensationTasks', () => {
    it('should reference the GPA and the startup as evidence', () => {
      const tasks = gpaCompensationTasks(founderContext);

      expect(tasks.map((task) => task.title)).toEqual([
        'Write a 300-word academic context essay explaining your 3.2/4.0 GPA',
        'Email your recommender a 1-page brief that highlights building Acme Labs',
      ]);
    });

    it('should use the first achievement without a startup', () => {
      const context = extractContext({ gpa: 3.0, achievements: ['Published a workshop paper'] }, makeGoal());

      expect(gpaCompensationTasks(context)[1]?.title).toBe(
        'Email your recommender a 1-page brief that highlights Published a workshop paper'
      );
    });

    it('should emit nothing when the GPA needs no compensation', () => {
      expect(gpaCompensationTasks(extractContext({ gpa: 3.9, hasStartup: true }, makeGoal()))).toEqual([]);
    });
  });

  describe('testPrepTasks', () => {
    it('should add one block per test below target', () => {
      const context = extractContext({ testScores: { ielts: 6.5, gre: 300, toefl: 110 } }, makeGoal());
      const tasks = testPrepTasks(context);

      expect(tasks.map((task) => task.title)).toEqual([
        'Complete 4 IELTS practice tests to raise band 6.5 to 7',
        'Complete 10 GRE study sessions to raise 300 to 320',
      ]);
    });

    it('should emit nothing for non-study goals', () => {
      const context = extractContext(
        { testScores: { ielts: 5 } },
        makeGoal({ category: 'career', title: 'Become a data scientist' })
      );

      expect(testPrepTasks(context)).toEqual([]);
    });
  });

  it('should combine every branch with the custom source and valid weights', () => {
    const tasks = generateCustomTasks(founderContext);

    expect(tasks).toHaveLength(7);
    for (const task of tasks) {
      expect(task.source).toBe('custom_generator');
      expect(task.definitionOfDone.reduce((sum, item) => sum + item.weight, 0)).toBe(100);
    }
  });
});
