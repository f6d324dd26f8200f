import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Storage, CacheStats } from '../storage/index.js';
import type { LlmService } from '../engines/llm-client.js';

/**
 * Tool definition for health check
 */
export const healthTool: Tool = {
  name: 'planner_health',
  description: `Check the health status of the planner server.

Returns:
- Overall health status (healthy, degraded, unhealthy)
- Storage connectivity
- LLM availability (LLM stages are skipped without an API key)
- Task cache metrics when verbose

Use this for monitoring and debugging the server.`,

  inputSchema: {
    type: 'object',
    properties: {
      verbose: {
        type: 'boolean',
        description: 'Include task cache metrics',
        default: false,
      },
    },
  },
};

/**
 * Health status levels
 */
type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

interface CheckResult {
  status: HealthStatus;
  message: string;
  latencyMs?: number;
}

/**
 * Health check result
 */
export interface HealthResult {
  status: HealthStatus;
  timestamp: string;
  version: string;
  checks: {
    storage: CheckResult;
    llm: CheckResult;
  };
  metrics?: {
    cache: CacheStats;
  };
}

export const SLOW_STORAGE_MS = 1000;

/**
 * Handle health check request
 */
export function handleHealth(args: Record<string, unknown>, storage: Storage, llm: LlmService): HealthResult {
  const verbose = args['verbose'] === true;

  const storageCheck = checkStorage(storage);
  const llmCheck: CheckResult = llm.isAvailable()
    ? { status: 'healthy', message: 'LLM available' }
    : { status: 'degraded', message: 'LLM unavailable; template and rule-based generation only' };

  // Storage decides unhealthy; a missing LLM only degrades
  let overallStatus: HealthStatus = 'healthy';
  if (storageCheck.status === 'unhealthy') {
    overallStatus = 'unhealthy';
  } else if (storageCheck.status === 'degraded' || llmCheck.status === 'degraded') {
    overallStatus = 'degraded';
  }

  const result: HealthResult = {
    status: overallStatus,
    timestamp: new Date().toISOString(),
    version: '0.1.0',
    checks: {
      storage: storageCheck,
      llm: llmCheck,
    },
  };

  if (verbose && storageCheck.status !== 'unhealthy') {
    result.metrics = { cache: storage.getCacheStats() };
  }

  return result;
}

/**
 * Check storage connectivity and health
 */
function checkStorage(storage: Storage): CheckResult {
  const start = Date.now();

  try {
    if (!storage.ping()) {
      return { status: 'unhealthy', message: 'Storage did not answer the probe' };
    }
    const latencyMs = Date.now() - start;

    if (latencyMs > SLOW_STORAGE_MS) {
      return {
        status: 'degraded',
        message: `Storage responding slowly (${latencyMs}ms)`,
        latencyMs,
      };
    }

    return {
      status: 'healthy',
      message: 'Storage is operational',
      latencyMs,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown storage error';
    return {
      status: 'unhealthy',
      message: `Storage error: ${message}`,
    };
  }
}
