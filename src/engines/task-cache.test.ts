import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  TaskCache,
  genericizeTasks,
  personalizeTasks,
  profileFeatureHash,
  profileFeatures,
} from './task-cache.js';
import { extractContext } from './profile-extractor.js';
import { Storage } from '../storage/index.js';
import { founderProfile, makeGoal, makeTask } from '../../tests/helpers/fixtures.js';

const founderContext = extractContext(founderProfile, makeGoal());
const lookalikeContext = extractContext(
  {
    ...founderProfile,
    name: 'Lee',
    startup: { name: 'Beta Co', users: '300' },
    targetUniversities: ['ETH Zurich'],
  },
  makeGoal({ userId: 'user-2' })
);

const personalTask = makeTask({
  title: 'Email University of Edinburgh admissions about Acme Labs',
  description: 'Mention your Computer Science focus.',
});

describe('profileFeatureHash', () => {
  it('should match for users that differ only in names', () => {
    expect(profileFeatureHash(founderContext)).toBe(profileFeatureHash(lookalikeContext));
    expect(profileFeatureHash(founderContext)).toMatch(/^[0-9a-f]{32}$/);
  });

  it('should differ when the field differs', () => {
    const other = extractContext({ ...founderProfile, field: 'Economics' }, makeGoal());

    expect(profileFeatureHash(other)).not.toBe(profileFeatureHash(founderContext));
  });

  it('should leave names and numbers out of the features', () => {
    const features = profileFeatures(founderContext);

    expect(Object.keys(features)).not.toContain('userName');
    expect(Object.keys(features)).not.toContain('gpa');
    expect(features['field']).toBe('computer science');
  });
});

describe('genericizeTasks', () => {
  it('should replace the user names with placeholders', () => {
    const [task] = genericizeTasks([personalTask], founderContext);

    expect(task?.title).toBe('Email [university name] admissions about [startup name]');
    expect(task?.description).toBe('Mention your [field] focus.');
  });

  it('should not replace partial words', () => {
    const context = extractContext({ field: 'AI' }, makeGoal());
    const [task] = genericizeTasks([makeTask({ title: 'Find AI labs at MAIN campus' })], context);

    expect(task?.title).toBe('Find [field] labs at MAIN campus');
  });
});

describe('personalizeTasks', () => {
  it('should fill placeholders for another user and give fresh ids', () => {
    const generic = genericizeTasks([personalTask], founderContext);
    const [task] = personalizeTasks(generic, lookalikeContext);

    expect(task?.title).toBe('Email ETH Zurich admissions about Beta Co');
    expect(task?.id).not.toBe(personalTask.id);
  });

  it('should accept placeholder aliases', () => {
    const [task] = personalizeTasks([makeTask({ title: 'Shortlist labs at [your university]' })], founderContext);

    expect(task?.title).toBe('Shortlist labs at University of Edinburgh');
  });

  it('should leave placeholders the user has no value for', () => {
    const [task] = personalizeTasks(
      [makeTask({ title: 'Pitch [startup name] in your essay' })],
      extractContext({}, makeGoal())
    );

    expect(task?.title).toBe('Pitch [startup name] in your essay');
  });
});

describe('TaskCache', () => {
  let storage: Storage;

  beforeEach(() => {
    storage = new Storage(':memory:');
  });

  afterEach(() => {
    storage.close();
  });

  it('should generate on a miss and serve a lookalike user from the cache', async () => {
    const cache = new TaskCache(storage);
    const generate = vi.fn().mockResolvedValue({ tasks: [personalTask], costUsd: 0.02 });

    const first = await cache.getOrGenerate(founderContext, 'unique', generate);
    const second = await cache.getOrGenerate(lookalikeContext, 'unique', generate);

    expect(first.cacheHit).toBe(false);
    expect(first.costUsd).toBe(0.02);
    expect(first.tasks[0]?.title).toBe('Email University of Edinburgh admissions about Acme Labs');

    expect(second.cacheHit).toBe(true);
    expect(second.costUsd).toBe(0);
    expect(second.tasks[0]?.title).toBe('Email ETH Zurich admissions about Beta Co');
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('should keep generation types apart', async () => {
    const cache = new TaskCache(storage);
    const generate = vi.fn().mockResolvedValue({ tasks: [personalTask], costUsd: 0.01 });

    await cache.getOrGenerate(founderContext, 'unique', generate);
    const full = await cache.getOrGenerate(founderContext, 'full_llm', generate);

    expect(full.cacheHit).toBe(false);
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it('should not cache an empty generation', async () => {
    const cache = new TaskCache(storage);
    const generate = vi.fn().mockResolvedValue({ tasks: [], costUsd: 0 });

    await cache.getOrGenerate(founderContext, 'unique', generate);
    await cache.getOrGenerate(founderContext, 'unique', generate);

    expect(generate).toHaveBeenCalledTimes(2);
    expect(storage.getCacheStats().entries).toBe(0);
  });

  it('should generate every time without a store', async () => {
    const cache = new TaskCache(undefined);
    const generate = vi.fn().mockResolvedValue({ tasks: [personalTask], costUsd: 0.01 });

    await cache.getOrGenerate(founderContext, 'unique', generate);
    const again = await cache.getOrGenerate(founderContext, 'unique', generate);

    expect(again.cacheHit).toBe(false);
    expect(generate).toHaveBeenCalledTimes(2);
  });
});
