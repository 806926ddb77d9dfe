import { NotFoundError } from '../errors.js';
import type { ImportEdge } from '../indexer/types.js';
import type { ToolContext, ToolDefinition, ToolOutcome } from './types.js';

export const getImportsDefinition: ToolDefinition = {
  name: 'get_imports',
  description: `List what a file imports, in source order.

Each entry has the specifier as written and, when it points at a file in this
project, the resolved project-relative path.`,
  inputSchema: {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'File path relative to the project root' },
    },
    required: ['path'],
  },
};

export async function getImports(context: ToolContext, args: { path: string }): Promise<ToolOutcome> {
  const path = await context.accessor.projectPath(args.path);
  if (!Object.hasOwn(context.index.files, path)) {
    throw new NotFoundError(`File not found in index: ${args.path}`);
  }
  const imports: ImportEdge[] = context.index.files[path].imports;
  return { output: JSON.stringify(imports, null, 2), data: imports };
}
