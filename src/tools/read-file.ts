import type { ToolContext, ToolDefinition, ToolOutcome } from './types.js';

export const readFileDefinition: ToolDefinition = {
  name: 'read_file',
  description: `Read a file from the project.

Returns the file content. Content past the size ceiling is cut off and a
"[truncated ...]" marker says how much was omitted. Paths are relative to the
project root; anything resolving outside it is refused.`,
  inputSchema: {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'File path relative to the project root' },
    },
    required: ['path'],
  },
};

export interface ReadFileResult {
  path: string;
  content: string;
  truncated: boolean;
  totalBytes: number;
}

export function truncateContent(content: string, maxBytes: number): { content: string; truncated: boolean; totalBytes: number } {
  const bytes = Buffer.from(content, 'utf-8');
  if (bytes.length <= maxBytes) {
    return { content, truncated: false, totalBytes: bytes.length };
  }
  // drop a multi-byte character split by the cut
  const head = bytes.subarray(0, maxBytes).toString('utf-8').replace(/\uFFFD$/, '');
  return {
    content: `${head}\n[truncated: showing ${maxBytes} of ${bytes.length} bytes]`,
    truncated: true,
    totalBytes: bytes.length,
  };
}

export async function readFile(context: ToolContext, args: { path: string }): Promise<ToolOutcome> {
  const path = await context.accessor.projectPath(args.path);
  const content = (await context.readIndexed(path)) ?? await context.accessor.readText(path);
  const result: ReadFileResult = { path, ...truncateContent(content, context.limits.maxReadBytes) };
  return { output: result.content, data: result };
}
