import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { InvalidArgumentError, NavigatorError, toErrorDescriptor } from './errors.js';
import { formatTimeAgo } from './session/record.js';
import { SESSION_SORT_KEYS } from './session/types.js';
import { NavigationSession, navigationTools } from './tools/index.js';
import { logger } from './utils/logger.js';
import type { ReviewService } from './service/review-service.js';

const log = logger.child('mcp');

export interface McpTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required: string[];
  };
  handler(args: Record<string, unknown>): Promise<string>;
}

export interface McpToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

const projectRootProperty = {
  type: 'string',
  description: 'Absolute path of the project root',
};

const RootArgs = z.object({ projectRoot: z.string().min(1) });
const SessionArgs = RootArgs.extend({ name: z.string().min(1) });
const ListArgs = z.object({
  projectRoot: z.string().min(1).optional(),
  limit: z.number().int().nonnegative().optional(),
  sortBy: z.enum(['created', 'last_reviewed', 'name', 'iterations']).optional(),
});

function parseArgs<T>(schema: z.ZodType<T>, tool: string, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(`Invalid arguments for ${tool}: ${issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown'}`);
  }
  return parsed.data;
}

/**
 * Navigation tools as MCP tools. Each call takes the project root next to
 * the operation's own arguments and runs against the cached index.
 */
function navigationMcpTools(service: ReviewService): McpTool[] {
  return navigationTools.map(tool => ({
    name: tool.name,
    description: tool.description,
    inputSchema: {
      type: 'object',
      properties: { projectRoot: projectRootProperty, ...tool.inputSchema.properties },
      required: ['projectRoot', ...tool.inputSchema.required],
    },
    handler: async (args) => {
      const { projectRoot } = parseArgs(RootArgs, tool.name, args);
      const toolArgs = Object.fromEntries(Object.entries(args).filter(([key]) => key !== 'projectRoot'));
      const index = await service.indexes.indexFor(projectRoot, []);
      const navigation = new NavigationSession(index, service.config.navigation);
      const result = await navigation.execute(tool.name, toolArgs);
      if (!result.ok) {
        const error = result.error;
        throw error && error.code !== 'Internal'
          ? new NavigatorError(error.code, error.message)
          : new Error(error?.message ?? result.output);
      }
      return result.output;
    },
  }));
}

function managementTools(service: ReviewService): McpTool[] {
  return [
    {
      name: 'index_project',
      description: 'Build (or rebuild) the structural index of a project and report its statistics.',
      inputSchema: { type: 'object', properties: { projectRoot: projectRootProperty }, required: ['projectRoot'] },
      handler: async (args) => {
        const { projectRoot } = parseArgs(RootArgs, 'index_project', args);
        const { index, stats } = await service.indexProject(projectRoot);
        const lines = [
          `Indexed ${index.root}`,
          `Files: ${stats.files} (${stats.parsedFiles} parsed)`,
          `Symbols: ${stats.symbols}`,
          `Imports: ${stats.imports}`,
          `Unparsed: ${stats.unparsed}`,
          `Duration: ${stats.durationMs}ms`,
        ];
        if (index.unparsed.length > 0) {
          lines.push('', 'Files that failed to parse:', ...index.unparsed.map(path => `  - ${path}`));
        }
        return lines.join('\n');
      },
    },
    {
      name: 'list_review_sessions',
      description: 'List stored review sessions, optionally for one project.',
      inputSchema: {
        type: 'object',
        properties: {
          projectRoot: projectRootProperty,
          limit: { type: 'number', description: 'Maximum sessions to return (default 20)' },
          sortBy: { type: 'string', enum: [...SESSION_SORT_KEYS], description: 'Sort order (default last_reviewed)' },
        },
        required: [],
      },
      handler: async (args) => {
        const options = parseArgs(ListArgs, 'list_review_sessions', args);
        const sessions = await service.listSessions(options);
        if (sessions.length === 0) return 'No review sessions found.';
        return sessions
          .map(session => [
            `${session.name} (${session.projectRoot})`,
            `  iterations: ${session.iterationCount}, messages: ${session.messageCount}`,
            `  last reviewed: ${session.lastReviewedAgo}`,
          ].join('\n'))
          .join('\n');
      },
    },
    {
      name: 'get_review_session',
      description: 'Show one review session: iteration count, timing and the trace of its latest review.',
      inputSchema: {
        type: 'object',
        properties: { name: { type: 'string', description: 'Session name' }, projectRoot: projectRootProperty },
        required: ['name', 'projectRoot'],
      },
      handler: async (args) => {
        const { name, projectRoot } = parseArgs(SessionArgs, 'get_review_session', args);
        const session = await service.getSession(name, projectRoot);
        const lines = [
          `Session: ${session.name}`,
          `Project: ${session.projectRoot}`,
          `Iterations: ${session.iterationCount}`,
          `Created: ${session.createdAt}`,
          `Last reviewed: ${formatTimeAgo(session.lastUpdated)}`,
          `Messages: ${session.messageHistory.length}`,
          `Token estimate: ${session.cumulativeTokenEstimate}`,
        ];
        if (session.lastIssuesCount !== null) lines.push(`Issues in last review: ${session.lastIssuesCount}`);
        if (session.navigationState.length > 0) {
          lines.push('', 'Latest navigation trace:');
          for (const entry of session.navigationState) {
            lines.push(`  - ${entry.tool} ${JSON.stringify(entry.arguments)} (${entry.resultSize} bytes, ${entry.reason})`);
          }
        }
        return lines.join('\n');
      },
    },
    {
      name: 'delete_review_session',
      description: 'Delete a stored review session so the next review starts fresh.',
      inputSchema: {
        type: 'object',
        properties: { name: { type: 'string', description: 'Session name' }, projectRoot: projectRootProperty },
        required: ['name', 'projectRoot'],
      },
      handler: async (args) => {
        const { name, projectRoot } = parseArgs(SessionArgs, 'delete_review_session', args);
        const deleted = await service.deleteSession(name, projectRoot);
        return deleted ? `Deleted session '${name}'.` : `Session '${name}' not found.`;
      },
    },
  ];
}

export function createMcpTools(service: ReviewService): McpTool[] {
  return [...navigationMcpTools(service), ...managementTools(service)];
}

/** Run one MCP tool call; failures come back as an error result, never a throw. */
export async function callMcpTool(tools: McpTool[], name: string, args: unknown): Promise<McpToolResult> {
  const tool = tools.find(candidate => candidate.name === name);
  if (!tool) {
    return { content: [{ type: 'text', text: `Error: Unknown tool: ${name}` }], isError: true };
  }
  try {
    const record = args !== null && typeof args === 'object' && !Array.isArray(args)
      ? Object.fromEntries(Object.entries(args))
      : {};
    return { content: [{ type: 'text', text: await tool.handler(record) }] };
  } catch (error) {
    const descriptor = toErrorDescriptor(error);
    log.debug(`Tool ${name} failed: ${descriptor.code}: ${descriptor.message}`);
    return { content: [{ type: 'text', text: `Error (${descriptor.code}): ${descriptor.message}` }], isError: true };
  }
}

export function createMcpServer(service: ReviewService, version: string): Server {
  const tools = createMcpTools(service);
  const server = new Server(
    {
      name: 'review-navigator',
      version,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callMcpTool(tools, request.params.name, request.params.arguments));

  return server;
}
