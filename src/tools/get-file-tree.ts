import { buildFileTree, renderFileTree } from '../indexer/file-tree.js';
import type { ToolContext, ToolDefinition, ToolOutcome } from './types.js';

export const getFileTreeDefinition: ToolDefinition = {
  name: 'get_file_tree',
  description: 'Show the project structure as a tree of the indexed files. Takes no arguments.',
  inputSchema: {
    type: 'object',
    properties: {},
    required: [],
  },
};

export async function getFileTree(context: ToolContext): Promise<ToolOutcome> {
  const tree = buildFileTree(context.index);
  return { output: renderFileTree(tree), data: tree };
}
