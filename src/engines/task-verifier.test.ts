import { describe, it, expect } from 'vitest';
import { TaskVerifier } from './task-verifier.js';
import { extractContext } from './profile-extractor.js';
import { defaultStories } from './story-extractor.js';
import type { LlmRequest } from './llm-client.js';
import { founderProfile, makeGoal, makeTask } from '../../tests/helpers/fixtures.js';
import { StubLlm, json } from '../../tests/helpers/stub-llm.js';

const context = extractContext(founderProfile, makeGoal());
const stories = defaultStories(context);

const PASS = { isAtomic: true, isPersonalized: true, hasSpecificResource: true, passes: true, issues: [] };

function verifyReply(request: LlmRequest): string {
  if (request.user.includes('Offline')) {
    throw new Error('connection reset');
  }
  return request.user.includes('Vague') ? json({ passes: false, issues: ['No concrete resource'] }) : json(PASS);
}

function fixReply(request: LlmRequest): string {
  return request.user.includes('hopeless')
    ? json({ title: 'Vague and still hopeless', description: 'Same as before', timebox_minutes: 30 })
    : json({
        title: 'Email Maria Chen about the ETH Zurich robotics lab',
        description: 'Ask about open MSc thesis projects.',
        timebox_minutes: 30,
      });
}

const goodTask = makeTask({ title: 'Email Prof. Lee about the Edinburgh robotics lab' });
const vagueTask = makeTask({
  id: 'task-vague',
  title: 'Vague: reach out to people',
  source: 'full_llm_generator',
  priority: 4,
  milestoneTitle: 'Outreach',
  milestoneIndex: 3,
});

describe('TaskVerifier', () => {
  describe('verifyAndFix', () => {
    it('should keep a task that passes', async () => {
      const verifier = new TaskVerifier(new StubLlm({ verify_task: verifyReply }), context, stories);

      const result = await verifier.verifyAndFix(goodTask);

      expect(result).toEqual({ outcome: 'passed', task: goodTask });
    });

    it('should repair a failing task and keep its identity', async () => {
      const llm = new StubLlm({ verify_task: verifyReply, fix_task: fixReply });
      const verifier = new TaskVerifier(llm, context, stories);

      const result = await verifier.verifyAndFix(vagueTask);

      expect(result.outcome).toBe('fixed');
      expect(result.task).toMatchObject({
        id: 'task-vague',
        title: 'Email Maria Chen about the ETH Zurich robotics lab',
        source: 'full_llm_generator',
        priority: 4,
        milestoneTitle: 'Outreach',
        milestoneIndex: 3,
      });
      expect(llm.callsFor('verify_task')).toHaveLength(2);
      expect(llm.callsFor('fix_task')[0]?.user).toContain('- No concrete resource');
    });

    it('should drop a task that still fails after the fix', async () => {
      const verifier = new TaskVerifier(
        new StubLlm({ verify_task: verifyReply, fix_task: fixReply }),
        context,
        stories
      );

      const result = await verifier.verifyAndFix({ ...vagueTask, title: 'Vague and hopeless' });

      expect(result).toEqual({ outcome: 'dropped', task: null });
    });

    it('should drop a task when the fix returns nothing usable', async () => {
      const verifier = new TaskVerifier(
        new StubLlm({ verify_task: verifyReply, fix_task: json({ tasks: [] }) }),
        context,
        stories
      );

      expect((await verifier.verifyAndFix(vagueTask)).outcome).toBe('dropped');
    });

    it('should drop a task when the fix call fails', async () => {
      const verifier = new TaskVerifier(
        new StubLlm({ verify_task: verifyReply, fix_task: new Error('overloaded') }),
        context,
        stories
      );

      expect((await verifier.verifyAndFix(vagueTask)).outcome).toBe('dropped');
    });

    it('should keep the task when verification cannot be reached', async () => {
      const offline = makeTask({ title: 'Offline check of the Edinburgh portal' });
      const verifier = new TaskVerifier(new StubLlm({ verify_task: verifyReply }), context, stories);

      expect(await verifier.verifyAndFix(offline)).toEqual({ outcome: 'failed_open', task: offline });
    });
  });

  describe('repair rule checks', () => {
    const atomicTask = makeTask({
      id: 'task-atomic',
      title: 'Vague outreach to the lab',
      source: 'atomic_task_generator',
      timeboxMinutes: 45,
      milestoneIndex: 1,
    });

    function repairWith(timebox: number): StubLlm {
      return new StubLlm({
        verify_task: verifyReply,
        fix_task: json({
          title: 'Email Maria Chen about the ETH Zurich robotics lab',
          description: 'Ask about open MSc thesis projects.',
          timebox_minutes: timebox,
          deliverable: 'Sent email to Maria Chen',
        }),
      });
    }

    it('should drop a two-tier repair whose timebox leaves the atomic range', async () => {
      const llm = repairWith(240);
      const verifier = new TaskVerifier(llm, context, stories);

      expect(await verifier.verifyAndFix(atomicTask)).toEqual({ outcome: 'dropped', task: null });
      expect(llm.callsFor('verify_task')).toHaveLength(1);
    });

    it('should keep a two-tier repair inside the atomic range and record its score', async () => {
      const verifier = new TaskVerifier(repairWith(45), context, stories);

      const result = await verifier.verifyAndFix(atomicTask);

      expect(result.outcome).toBe('fixed');
      expect(result.task).toMatchObject({ id: 'task-atomic', timeboxMinutes: 45, validationScore: 80 });
    });

    it('should drop a repair that fails the fast validator', async () => {
      const llm = new StubLlm({
        verify_task: verifyReply,
        fix_task: json({ title: 'Think about options', description: '', timebox_minutes: 30 }),
      });
      const verifier = new TaskVerifier(llm, context, stories);

      expect((await verifier.verifyAndFix(vagueTask)).outcome).toBe('dropped');
      expect(llm.callsFor('verify_task')).toHaveLength(1);
    });

    it('should accept a long timebox from the other generators', () => {
      const verifier = new TaskVerifier(new StubLlm(), context, stories);
      const long = makeTask({ source: 'full_llm_generator', timeboxMinutes: 240 });

      expect(verifier.checkRepair(long)?.timeboxMinutes).toBe(240);
    });
  });

  describe('verify', () => {
    it('should treat an unreadable answer as a failure', async () => {
      const verifier = new TaskVerifier(new StubLlm({ verify_task: json(['yes']) }), context, stories);

      expect(await verifier.verify(goodTask)).toEqual({
        isAtomic: false,
        isPersonalized: false,
        hasSpecificResource: false,
        passes: false,
        issues: ['Verifier returned an unreadable answer'],
      });
    });
  });

  describe('verifyBatch', () => {
    it('should count every outcome and keep passed, fixed and unverified tasks', async () => {
      const verifier = new TaskVerifier(
        new StubLlm({ verify_task: verifyReply, fix_task: fixReply }),
        context,
        stories
      );
      const offline = makeTask({ title: 'Offline check of the Edinburgh portal' });

      const result = await verifier.verifyBatch([
        goodTask,
        vagueTask,
        offline,
        { ...vagueTask, title: 'Vague and hopeless' },
      ]);

      expect(result.passed).toBe(1);
      expect(result.fixed).toBe(1);
      expect(result.failedOpen).toBe(1);
      expect(result.dropped).toBe(1);
      expect(result.tasks.map((task) => task.title)).toEqual([
        goodTask.title,
        'Email Maria Chen about the ETH Zurich robotics lab',
        offline.title,
      ]);
    });
  });
});
