#!/usr/bin/env node

/**
 * Repository analysis MCP server
 * Exposes analyze_repository over stdio; progress output stays silent since
 * stdout carries the protocol.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ErrorCode, McpError, CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { runAnalysis } from './analyzer.js';
import { loadConfig } from './config.js';
import { createTextGenerator, createToolSessionFactory } from './factories.js';
import { AnalysisHandler } from './handlers/analysis.js';
import { MCPTool, createLogger, loadEnv, setLogLevel, parseLogLevel, withErrorHandling } from './shared/index.js';
import { RepositoryRef } from './types/index.js';

const log = createLogger('RepoInsightMCP');

loadEnv();
setLogLevel(parseLogLevel(process.env.LOG_LEVEL));

export const TOOLS: MCPTool[] = [
  {
    name: 'analyze_repository',
    description: 'Analyze a GitHub repository: services, architecture, metadata files, issue and pull request activity. Returns the combined JSON report.',
    inputSchema: {
      type: 'object',
      properties: {
        owner: { type: 'string', description: 'Repository owner (user or organization)' },
        repo: { type: 'string', description: 'Repository name' },
        write_output: { type: 'boolean', description: 'Also write the report to OUTPUT_DIR', default: false },
      },
      required: ['owner', 'repo'],
    },
  },
];

async function analyze(repository: RepositoryRef, writeOutput: boolean) {
  const config = loadConfig({ repository });
  return runAnalysis(config, {
    sessionFactory: createToolSessionFactory(config),
    generator: createTextGenerator(config.llm),
    writeOutput,
  });
}

export class RepoInsightMCPServer {
  private server: Server;
  private analysisHandler: AnalysisHandler;

  constructor() {
    this.server = new Server(
      {
        name: 'repo-insight-mcp-server',
        version: '1.0.0',
      },
      {
        capabilities: { tools: {} },
      }
    );

    this.analysisHandler = new AnalysisHandler(analyze);
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOLS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => withErrorHandling(async () => {
      const { name, arguments: args } = request.params;
      switch (name) {
        case 'analyze_repository':
          return this.analysisHandler.analyzeRepository(args ?? {});

        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
    }));
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    log.info('Repository analysis MCP server running on stdio');
  }
}

const server = new RepoInsightMCPServer();
server.run().catch((error) => {
  log.error('Failed to start server', error);
  process.exit(1);
});
