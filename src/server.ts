import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { registerTools, handleToolCall } from './tools/index.js';
import { ServiceContainer } from './services/index.js';
import type { ServiceConfig } from './services/index.js';
import { logger } from './utils/logger.js';

/**
 * Atomic Planner MCP Server
 *
 * Turns a user profile and a goal into a scheduled list of atomic tasks.
 */
export class PlannerServer {
  private server: Server;
  private container: ServiceContainer;

  constructor(config: ServiceConfig = {}) {
    this.server = new Server(
      {
        name: 'atomic-planner',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.container = new ServiceContainer(config);
    logger.setLevel(this.container.getConfig().logLevel);
    this.setupHandlers();
  }

  private setupHandlers(): void {
    // Tool listing
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: registerTools(),
      };
    });

    // Tool execution
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return handleToolCall(name, args ?? {}, this.container);
    });
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    logger.info('Atomic planner MCP server started', { logLevel: logger.getLevel() });
  }

  async stop(): Promise<void> {
    await this.server.close();
    this.container.clear();
  }
}
