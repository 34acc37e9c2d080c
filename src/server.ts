import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  evaluate,
  evaluateSchema,
  batch,
  batchSchema,
  summarize,
  summarizeSchema,
} from './tools/index.js';
import { getVersion } from './cli.js';
import { logger } from './logger.js';

interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function success(result: unknown): ToolResponse {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
  };
}

function failure(error: unknown): ToolResponse {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: 'text' as const, text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}

// Register tools with logging wrapper
export function wrapTool<T extends Record<string, unknown>, R>(name: string, fn: (args: T) => R | Promise<R>) {
  return async (args: T): Promise<ToolResponse> => {
    logger.tool(name, args);
    try {
      const result = await fn(args);
      logger.debug(`Tool ${name} completed`);
      return success(result);
    } catch (error) {
      logger.error(`Tool ${name} failed`, error);
      return failure(error);
    }
  };
}

export function createServer(): McpServer {
  logger.info('Creating QA evaluation MCP server');

  const server = new McpServer({
    name: 'qa-eval',
    version: getVersion(),
  });

  server.tool(
    'qa_evaluate',
    'Clone a repository, have the AI judge score its QA practices, and return score, level, verdict and insights',
    evaluateSchema.shape,
    wrapTool('qa_evaluate', evaluate)
  );

  server.tool(
    'qa_batch',
    'Evaluate several repositories in order and return every result plus batch statistics',
    batchSchema.shape,
    wrapTool('qa_batch', batch)
  );

  server.tool(
    'qa_summarize',
    'Recompute batch statistics (distributions, common strengths and gaps) from saved evaluation records',
    summarizeSchema.shape,
    wrapTool('qa_summarize', summarize)
  );

  logger.info('QA evaluation MCP server ready', { tools: 3 });
  return server;
}
