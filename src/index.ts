#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { resolveConfig } from './config.js';
import { createHttpApp, SERVICE_NAME, SERVICE_VERSION } from './http.js';
import { RequestPipeline } from './pipeline/pipeline.js';
import { logger, setLogLevel } from './utils/logger.js';

const requestMediaArgsSchema = z.object({
  title: z.string(),
  allSeasons: z.boolean().optional(),
});

export class VoiceRequestServer {
  private server: Server;

  constructor(private pipeline: RequestPipeline) {
    this.server = new Server(
      {
        name: SERVICE_NAME,
        version: SERVICE_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();

    this.server.onerror = (error: Error) => logger.error('[MCP Error]', error);
    process.on('SIGINT', () => {
      this.server
        .close()
        .catch((error: unknown) => logger.error('Error closing server', error))
        .finally(() => process.exit(0));
    });
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [
        {
          name: 'request_media',
          description:
            'Find a movie or TV show by title and request it in Overseerr. ' +
            'Takes the first search match. TV requests cover the latest season unless allSeasons is set. ' +
            'Returns the spoken confirmation sentence.',
          inputSchema: {
            type: 'object',
            properties: {
              title: {
                type: 'string',
                description: 'Movie or TV show title, as spoken',
              },
              allSeasons: {
                type: 'boolean',
                description: 'Request every regular season instead of the latest one',
                default: false,
              },
            },
            required: ['title'],
          },
        },
      ],
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      switch (request.params.name) {
        case 'request_media':
          return await this.handleRequestMedia(request.params.arguments);
        default:
          throw new McpError(
            ErrorCode.MethodNotFound,
            `Unknown tool: ${request.params.name}`
          );
      }
    });
  }

  private async handleRequestMedia(args: unknown): Promise<CallToolResult> {
    const parsed = requestMediaArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${parsed.error.message}`);
    }

    const { outcome, text } = await this.pipeline.run({
      title: parsed.data.title,
      requestAllSeasons: parsed.data.allSeasons ?? false,
    });

    return {
      content: [{ type: 'text', text }],
      isError: outcome.kind === 'transport-error',
    };
  }

  async run() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info(`${SERVICE_NAME} v${SERVICE_VERSION} running on stdio`);
  }

  async runHttp(port: number = 8085) {
    const app = createHttpApp(this.pipeline);

    await new Promise<void>((resolve) => {
      app.listen(port, () => {
        logger.info(`${SERVICE_NAME} v${SERVICE_VERSION} running on HTTP port ${port}`);
        logger.info(`Voice endpoint: http://localhost:${port}/voice`);
        logger.info(`Health check: http://localhost:${port}/health`);
        resolve();
      });
    });
  }
}

async function main() {
  const config = await resolveConfig();
  setLogLevel(config.logLevel);

  const server = new VoiceRequestServer(RequestPipeline.fromConfig(config));

  const httpMode = process.env.HTTP_MODE === 'true' || process.argv.includes('--http');
  const port = process.env.PORT ? parseInt(process.env.PORT, 10) : 8085;

  if (httpMode) {
    await server.runHttp(port);
  } else {
    await server.run();
  }
}

main().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
