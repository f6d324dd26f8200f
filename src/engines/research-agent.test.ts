import { describe, it, expect } from 'vitest';
import { ResearchAgent, runPool } from './research-agent.js';
import type { SearchQuery, SearchResult, SearchService } from './research-agent.js';
import { extractContext } from './profile-extractor.js';
import type { Milestone } from '../types/index.js';
import { founderProfile, makeGoal } from '../../tests/helpers/fixtures.js';
import { emailTask, sheetTask } from '../../tests/helpers/replies.js';
import { StubLlm, json } from '../../tests/helpers/stub-llm.js';

const context = extractContext(founderProfile, makeGoal());

const milestone: Milestone = {
  title: 'Build a network in Edinburgh',
  description: 'Meet people working in robotics.',
  durationWeeks: 2,
  successCriteria: 'Five calls booked',
};

class FakeSearch implements SearchService {
  readonly queries: SearchQuery[] = [];

  async search(query: SearchQuery): Promise<SearchResult[]> {
    this.queries.push(query);
    if (query.kind === 'linkedin') {
      throw new Error('quota exceeded');
    }
    return [{ title: 'Edinburgh AI Meetup', url: 'https://meetup.example.com/ai', snippet: 'Monthly talks' }];
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('runPool', () => {
  it('should keep input order and respect the pool size', async () => {
    let active = 0;
    let peak = 0;

    const results = await runPool([30, 5, 20, 1], 2, async (ms) => {
      active++;
      peak = Math.max(peak, active);
      await delay(ms);
      active--;
      return ms * 2;
    });

    expect(results).toEqual([60, 10, 40, 2]);
    expect(peak).toBe(2);
  });

  it('should resolve immediately for no items', async () => {
    expect(await runPool([], 5, async (item: number) => item)).toEqual([]);
  });
});

describe('ResearchAgent', () => {
  it('should generate stamped tasks without a search service', async () => {
    const llm = new StubLlm({ research_tasks: json({ tasks: [emailTask, sheetTask] }) });
    const agent = new ResearchAgent({ llm });

    const tasks = await agent.researchMilestone(milestone, 2, context);

    expect(tasks.map((task) => task.title)).toEqual([emailTask.title, sheetTask.title]);
    expect(tasks.every((task) => task.source === 'research_agent')).toBe(true);
    expect(tasks.every((task) => task.milestoneIndex === 2)).toBe(true);
    expect(tasks[0]?.milestoneTitle).toBe('Build a network in Edinburgh');
    expect(llm.callsFor('plan_searches')).toHaveLength(0);
    expect(llm.callsFor('research_tasks')[0]?.user).toContain('RESULTS\nNo search results.');
  });

  it('should skip a failing search and pass the other results to the model', async () => {
    const llm = new StubLlm({
      plan_searches: json({
        searches: [
          { kind: 'linkedin', query: 'Edinburgh robotics alumni' },
          { kind: 'forums', query: 'AI meetups Edinburgh' },
        ],
      }),
      research_tasks: json({ tasks: [emailTask] }),
    });
    const search = new FakeSearch();
    const agent = new ResearchAgent({ llm, search });

    const tasks = await agent.researchMilestone(milestone, 1, context);

    expect(tasks).toHaveLength(1);
    expect(search.queries.map((query) => query.kind)).toEqual(['linkedin', 'general']);
    const prompt = llm.callsFor('research_tasks')[0]?.user ?? '';
    expect(prompt).toContain(
      '[general] AI meetups Edinburgh\n- Edinburgh AI Meetup (https://meetup.example.com/ai): Monthly talks'
    );
    expect(prompt).not.toContain('[linkedin]');
  });

  it('should still generate tasks when search planning fails', async () => {
    const llm = new StubLlm({ plan_searches: new Error('timeout'), research_tasks: json({ tasks: [sheetTask] }) });
    const search = new FakeSearch();

    const tasks = await new ResearchAgent({ llm, search }).researchMilestone(milestone, 1, context);

    expect(tasks).toHaveLength(1);
    expect(search.queries).toEqual([]);
  });

  it('should cap the tasks at five per milestone', async () => {
    const many = Array.from({ length: 7 }, (_, i) => ({ ...emailTask, title: `${emailTask.title} ${i}` }));
    const llm = new StubLlm({ research_tasks: json({ tasks: many }) });

    expect(await new ResearchAgent({ llm }).researchMilestone(milestone, 1, context)).toHaveLength(5);
  });

  it('should return nothing when the task call fails', async () => {
    const llm = new StubLlm({ research_tasks: new Error('overloaded') });

    expect(await new ResearchAgent({ llm }).researchMilestone(milestone, 1, context)).toEqual([]);
  });

  it('should return nothing without a model', async () => {
    const llm = new StubLlm();
    llm.available = false;

    expect(await new ResearchAgent({ llm }).researchMilestone(milestone, 1, context)).toEqual([]);
    expect(llm.calls).toHaveLength(0);
  });
});
