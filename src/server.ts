import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { registerTools, handleToolCall } from './tools/index.js';
import { registerResources, handleResourceRead } from './resources/index.js';
import { getContainer, type ServiceContainer } from './services/index.js';
import { logger } from './utils/logger.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

/**
 * Self-assessment MCP Server
 *
 * Runs a knowledge valorisation self-assessment: questionnaire, scoring,
 * benchmark comparison and narrative insights.
 */
export class AssessmentServer {
  private server: Server;
  private container: ServiceContainer;

  constructor(container: ServiceContainer = getContainer()) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    this.container = container;
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: registerTools(),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      const services = await this.container.getAll();
      return handleToolCall(name, args ?? {}, services);
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      const services = await this.container.getAll();
      return {
        resources: registerResources(services),
      };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;
      const services = await this.container.getAll();
      return handleResourceRead(uri, services);
    });
  }

  async start(): Promise<void> {
    // Load the questionnaire up front so a bad source shows in the startup log
    const questionBank = await this.container.getQuestionBank();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    logger.info('Self-assessment MCP server started', {
      version: SERVER_VERSION,
      questionSource: questionBank.source,
      questions: questionBank.questions.length,
    });
  }

  async stop(): Promise<void> {
    await this.server.close();
    this.container.clear();
  }
}
