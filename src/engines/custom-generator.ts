/**
 * Rule-Based Custom Generator
 *
 * Hand-written tasks for narrow profile situations the templates cannot
 * express well: a founder background, a GPA that needs compensating, and
 * test scores below target. Each branch fires only on its own flag and adds
 * to the others; none emits filler when its flag is off.
 */

import type { ProfileContext, Task } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { dod, newTaskId } from './task-builder.js';

type CustomTaskSpec = Omit<Task, 'id' | 'source' | 'constraints' | 'taskType'> & {
  taskType?: Task['taskType'];
};

function customTask(spec: CustomTaskSpec): Task {
  return {
    id: newTaskId(),
    taskType: 'copilot',
    constraints: {},
    source: 'custom_generator',
    ...spec,
  };
}

/**
 * Up to four tasks that turn a startup into application material.
 */
export function founderTasks(context: ProfileContext): Task[] {
  if (!context.hasStartupBackground) return [];

  const name = context.startupName ?? 'your startup';
  const users = context.startupUsers ?? '0';
  const funding = context.startupFunding ?? '$0';
  const role = context.startupRole ?? 'Founder';

  const tasks: Task[] = [
    customTask({
      title: `Write a 500-word founder journey essay about building ${name}`,
      description: [
        `Tell the story of ${name} in 500 words: the problem you saw, the first version you shipped, and what ${users} users taught you.`,
        `End with how it shapes what you want to do next${context.field ? ` in ${context.field}` : ''}.`,
      ].join('\n\n'),
      timeboxMinutes: 180,
      priority: 5,
      deliverableType: 'doc',
      definitionOfDone: dod(['500-word draft written', 40], ['Includes 2 concrete metrics', 30], ['Read aloud and revised', 30]),
      energyLevel: 'high',
    }),
    customTask({
      title: `Quantify ${name} impact in 4 CV bullets with user and funding numbers`,
      description: `Rewrite your ${role} entry as 4 bullets of action + result. Use ${users} users and ${funding} raised where they apply.`,
      timeboxMinutes: 90,
      priority: 4,
      deliverableType: 'doc',
      definitionOfDone: dod(['4 bullets written', 50], ['Every bullet has a number', 50]),
      energyLevel: 'medium',
    }),
  ];

  if (funding !== '$0') {
    tasks.push(
      customTask({
        title: `Email 1 ${name} investor or advisor requesting a recommendation letter`,
        description: `Ask someone who backed ${name} (${funding}) to write about your execution as ${role}. Attach a 1-page brief with 3 highlights and the deadline.`,
        timeboxMinutes: 60,
        priority: 4,
        deliverableType: 'email',
        definitionOfDone: dod(['Brief attached', 40], ['Email sent', 40], ['Follow-up date set', 20]),
        energyLevel: 'medium',
      })
    );
  }

  tasks.push(
    customTask({
      title: `Rewrite your LinkedIn headline around ${role} of ${name}`,
      description: `Headline formula: ${role} @ ${name} | ${users} users | what you want next. Keep it under 120 characters.`,
      timeboxMinutes: 45,
      priority: 3,
      deliverableType: 'link',
      definitionOfDone: dod(['Headline rewritten', 60], ['Profile saved and link copied', 40]),
      energyLevel: 'low',
    })
  );

  return tasks;
}

/**
 * Two tasks that put a below-average GPA in context.
 */
export function gpaCompensationTasks(context: ProfileContext): Task[] {
  if (!context.gpaNeedsCompensation) return [];

  const gpa = context.gpa !== null ? `${context.gpa}/4.0` : 'current';
  const evidence = context.hasStartupBackground
    ? `building ${context.startupName ?? 'your startup'}`
    : (context.achievements[0] ?? 'your strongest achievement');

  return [
    customTask({
      title: `Write a 300-word academic context essay explaining your ${gpa} GPA`,
      description: [
        'Use the optional essay section. One paragraph on circumstances, one on the upward evidence since.',
        `Point to ${evidence} as proof of what you can do now. No excuses, no blame.`,
      ].join('\n\n'),
      timeboxMinutes: 120,
      priority: 4,
      deliverableType: 'doc',
      definitionOfDone: dod(['300-word draft written', 50], ['Evidence paragraph included', 30], ['Reviewed by 1 person', 20]),
      energyLevel: 'high',
    }),
    customTask({
      title: `Email your recommender a 1-page brief that highlights ${evidence}`,
      description: `Give your recommender 3 concrete examples that speak to ability beyond the ${gpa} GPA, so the letter addresses it directly.`,
      timeboxMinutes: 60,
      priority: 4,
      deliverableType: 'email',
      definitionOfDone: dod(['Brief written', 50], ['Email sent', 50]),
      energyLevel: 'medium',
    }),
  ];
}

/**
 * One preparation block per test whose current score is below target.
 */
export function testPrepTasks(context: ProfileContext): Task[] {
  const study = context.study;
  if (!study) return [];

  const tasks: Task[] = [];
  if (context.testPrepNeeded.ielts) {
    tasks.push(
      customTask({
        title: `Complete 4 IELTS practice tests to raise band ${study.currentIelts ?? ''} to ${study.targetIelts}`,
        description: `Four full timed tests over the next weeks. After each, log band scores per section and drill ${context.weakness} for 30 minutes.`,
        timeboxMinutes: 240,
        priority: 3,
        deliverableType: 'spreadsheet',
        definitionOfDone: dod(['4 tests completed', 60], ['Scores logged per section', 40]),
        energyLevel: 'high',
      })
    );
  }
  if (context.testPrepNeeded.toefl) {
    tasks.push(
      customTask({
        title: `Complete 4 TOEFL practice tests to move from ${study.currentToefl ?? ''} to ${study.targetToefl}`,
        description: 'Use official TOEFL practice sets. Record section scores and review every wrong answer.',
        timeboxMinutes: 240,
        priority: 3,
        deliverableType: 'spreadsheet',
        definitionOfDone: dod(['4 tests completed', 60], ['Scores logged per section', 40]),
        energyLevel: 'high',
      })
    );
  }
  if (context.testPrepNeeded.gre) {
    tasks.push(
      customTask({
        title: `Complete 10 GRE study sessions to raise ${study.currentGre ?? ''} to ${study.targetGre}`,
        description: '10 sessions of 60 minutes: 6 quant, 4 verbal. Take 1 full practice test at the end and compare to your baseline.',
        timeboxMinutes: 600,
        priority: 3,
        deliverableType: 'spreadsheet',
        definitionOfDone: dod(['10 sessions done', 50], ['Practice test taken', 30], ['Score compared to baseline', 20]),
        energyLevel: 'high',
      })
    );
  }
  return tasks;
}

/**
 * All rule-based tasks for a context.
 */
export function generateCustomTasks(context: ProfileContext): Task[] {
  const founder = founderTasks(context);
  const gpa = gpaCompensationTasks(context);
  const testPrep = testPrepTasks(context);

  logger.info('Custom generation complete', {
    founder: founder.length,
    gpaCompensation: gpa.length,
    testPrep: testPrep.length,
  });
  return [...founder, ...gpa, ...testPrep];
}
