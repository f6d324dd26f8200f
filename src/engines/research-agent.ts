/**
 * Research fan-out
 *
 * For one milestone: plan the searches with one LLM call, run them on a
 * bounded worker pool, then turn the results into 3-5 grounded tasks.
 */

import { z } from 'zod';
import type { Milestone, ProfileContext, Task } from '../types/index.js';
import { describeMilestone, describeProfile, TASK_JSON_SHAPE } from '../prompts/index.js';
import { extractList } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import { requestJson } from './llm-client.js';
import type { LlmService } from './llm-client.js';
import { parseLlmTasks } from './task-builder.js';

export const SearchKindSchema = z.enum(['linkedin', 'events', 'courses', 'general']);

export type SearchKind = z.infer<typeof SearchKindSchema>;

export interface SearchQuery {
  kind: SearchKind;
  query: string;
}

export interface SearchResult {
  title: string;
  url: string;
  snippet?: string;
}

/**
 * Web search collaborator. Implementations may throw; failures are logged
 * and the query is skipped.
 */
export interface SearchService {
  search(query: SearchQuery): Promise<SearchResult[]>;
}

export const MAX_SEARCH_WORKERS = 5;
const MAX_SEARCHES = 8;
const MAX_RESEARCH_TASKS = 5;
const RESULTS_PER_QUERY = 5;

const SearchPlanSchema = z.object({
  searches: z.array(z.object({ kind: SearchKindSchema.catch('general'), query: z.string().min(1) })).default([]),
});

const PLAN_PROMPT = `You decide which web searches would make a milestone's tasks concrete.

Pick up to ${MAX_SEARCHES} searches. Each has a kind:
- linkedin: people to contact (alumni, recruiters, founders)
- events: meetups, webinars, fairs, conferences
- courses: courses or certifications
- general: anything else (program pages, deadlines, guides)

Return JSON: {"searches": [{"kind": "linkedin", "query": "..."}]}. Return {"searches": []} when no search would help.`;

const TASKS_PROMPT = `You turn search results into 3-5 atomic tasks for one milestone.

Every task is one action of 10-90 minutes that starts with a verb and names a specific person, event, course, or page from the results (put its URL in specific_resource). Do not invent resources that are not in the results. When there are no results, use well-known resources you are sure exist.

Return JSON:
${TASK_JSON_SHAPE}`;

/**
 * Run `worker` over every item with at most `size` in flight. Resolves when
 * all have settled; results keep input order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;
  const next = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item, index);
    }
  };
  const workers = Array.from({ length: Math.max(0, Math.min(size, items.length)) }, () => next());
  await Promise.all(workers);
  return results;
}

export interface ResearchDeps {
  llm: LlmService;
  search?: SearchService | undefined;
}

export class ResearchAgent {
  constructor(private readonly deps: ResearchDeps) {}

  async planSearches(milestone: Milestone, index: number, context: ProfileContext): Promise<SearchQuery[]> {
    const { data } = await requestJson(this.deps.llm, {
      system: PLAN_PROMPT,
      user: [describeMilestone(milestone, index), `PROFILE\n${describeProfile(context)}`].join('\n\n'),
      maxTokens: 512,
      temperature: 0.2,
      operation: 'plan_searches',
    });
    const parsed = SearchPlanSchema.safeParse(data);
    return parsed.success ? parsed.data.searches.slice(0, MAX_SEARCHES) : [];
  }

  async runSearches(queries: readonly SearchQuery[]): Promise<Array<{ query: SearchQuery; results: SearchResult[] }>> {
    const search = this.deps.search;
    if (!search || queries.length === 0) return [];

    const settled = await runPool(queries, Math.min(queries.length, MAX_SEARCH_WORKERS), async (query) => {
      try {
        return { query, results: (await search.search(query)).slice(0, RESULTS_PER_QUERY) };
      } catch (error) {
        logger.warn('Search failed; skipping query', error, { kind: query.kind, query: query.query });
        return { query, results: [] };
      }
    });
    return settled.filter(({ results }) => results.length > 0);
  }

  /**
   * Tasks for one milestone, stamped with it. Returns [] when the model is
   * unavailable or the task call fails.
   */
  async researchMilestone(milestone: Milestone, index: number, context: ProfileContext): Promise<Task[]> {
    const { llm } = this.deps;
    if (!llm.isAvailable()) return [];

    let queries: SearchQuery[] = [];
    if (this.deps.search) {
      try {
        queries = await this.planSearches(milestone, index, context);
      } catch (error) {
        logger.warn('Search planning failed; generating without search', error, { milestoneIndex: index });
      }
    }
    const found = await this.runSearches(queries);

    const resultsText =
      found.length > 0
        ? found
            .map(
              ({ query, results }) =>
                `[${query.kind}] ${query.query}\n${results
                  .map((r) => `- ${r.title} (${r.url})${r.snippet ? `: ${r.snippet}` : ''}`)
                  .join('\n')}`
            )
            .join('\n\n')
        : 'No search results.';

    try {
      const { data } = await requestJson(llm, {
        system: TASKS_PROMPT,
        user: [describeMilestone(milestone, index), `PROFILE\n${describeProfile(context)}`, `RESULTS\n${resultsText}`].join(
          '\n\n'
        ),
        maxTokens: 2048,
        temperature: 0.4,
        operation: 'research_tasks',
      });
      const tasks = parseLlmTasks(extractList(data, 'tasks'), { source: 'research_agent', minPriority: 2 })
        .slice(0, MAX_RESEARCH_TASKS)
        .map((task) => ({ ...task, milestoneTitle: milestone.title, milestoneIndex: index }));
      logger.info('Research tasks generated', { milestoneIndex: index, searches: queries.length, tasks: tasks.length });
      return tasks;
    } catch (error) {
      logger.warn('Research task generation failed', error, { milestoneIndex: index });
      return [];
    }
  }
}
