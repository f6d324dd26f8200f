import type { Tool, TextContent } from '@modelcontextprotocol/sdk/types.js';
import type { ServiceContainer } from '../services/index.js';
import { logger } from '../utils/logger.js';
import { classifyError, createErrorResponse, ErrorCode, PlannerError } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';

import { generateTool, handleGenerate } from './generate.js';
import { validateTool, handleValidate } from './validate.js';
import { coverageTool, handleCoverage } from './coverage.js';
import { healthTool, handleHealth } from './health.js';

export const TOOL_NAMES = ['planner_generate', 'planner_validate', 'planner_coverage', 'planner_health'] as const;

/**
 * Register all MCP tools
 *
 * - planner_generate: profile + goal → scheduled, ranked plan
 * - planner_validate: rule checks for a list of tasks
 * - planner_coverage: template coverage for a profile + goal
 * - planner_health: storage, LLM, and cache status
 */
export function registerTools(): Tool[] {
  return [generateTool, validateTool, coverageTool, healthTool];
}

/**
 * Validate that args is a proper object (not null, not array).
 */
function validateArgs(args: unknown): args is Record<string, unknown> {
  return isRecord(args);
}

/**
 * Extract user and goal ids from arguments for request tracking
 */
function extractContextIds(args: Record<string, unknown>): {
  userId?: string | undefined;
  goalId?: string | undefined;
} {
  const goal = args['goal'];
  if (!isRecord(goal)) return {};
  return {
    userId: typeof goal['userId'] === 'string' ? goal['userId'] : undefined,
    goalId: typeof goal['id'] === 'string' ? goal['id'] : undefined,
  };
}

function textResponse(value: unknown): { content: TextContent[] } {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/**
 * Handle tool calls with input validation, request tracking, and structured error responses.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  container: ServiceContainer
): Promise<{ content: TextContent[] }> {
  const { userId, goalId } = validateArgs(args) ? extractContextIds(args) : {};

  return logger.withRequestContext({ toolName: name, userId, goalId }, async () => {
    const requestId = logger.getRequestId();

    try {
      if (!validateArgs(args)) {
        logger.warn('Invalid arguments received', undefined, {
          argType: typeof args,
          isNull: args === null,
          isArray: Array.isArray(args),
        });
        const invalidArgsError = new PlannerError('Arguments must be a non-null object', ErrorCode.INVALID_ARGUMENTS, {
          details: { received: typeof args },
        });
        return textResponse(createErrorResponse(invalidArgsError, requestId));
      }

      logger.debug('Tool call started', undefined, {
        argKeys: Object.keys(args),
      });

      let result: unknown;

      switch (name) {
        case 'planner_generate':
          result = await handleGenerate(args, container);
          break;

        case 'planner_validate':
          result = handleValidate(args);
          break;

        case 'planner_coverage':
          result = handleCoverage(args);
          break;

        case 'planner_health': {
          const { storage, llm } = await container.getAll();
          result = handleHealth(args, storage, llm);
          break;
        }

        default:
          logger.warn('Unknown tool requested', undefined, { tool: name });
          throw new PlannerError(`Unknown tool: ${name}. Available: ${TOOL_NAMES.join(', ')}`, ErrorCode.UNKNOWN_TOOL, {
            details: { tool: name },
          });
      }

      const elapsedMs = logger.getElapsedMs();
      logger.debug('Tool call completed', undefined, { elapsedMs });

      return textResponse(result);
    } catch (error) {
      const elapsedMs = logger.getElapsedMs();
      const classified = classifyError(error);

      logger.error('Tool call failed', error, {
        code: classified.code,
        httpStatus: classified.httpStatus,
        isRetryable: classified.isRetryable,
        elapsedMs,
      });

      return textResponse(createErrorResponse(error, requestId));
    }
  });
}
