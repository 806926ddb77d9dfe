import micromatch from 'micromatch';
import { InvalidArgumentError, describeError } from '../errors.js';
import { scanLines } from './text-scan.js';
import type { ToolContext, ToolDefinition, ToolOutcome } from './types.js';

export const searchTextDefinition: ToolDefinition = {
  name: 'search_text',
  description: `Search file contents with a regular expression, line by line.

The optional scope narrows the search: a directory or file path
("src/api"), or a glob ("*.py", "src/**/*.ts"). Returns {file, line, text}
entries; an empty list when nothing matches.`,
  inputSchema: {
    type: 'object',
    properties: {
      pattern: { type: 'string', description: 'JavaScript regular expression' },
      scope: { type: 'string', description: 'Optional directory, file or glob to search within' },
    },
    required: ['pattern'],
  },
};

const GLOB_CHARS = /[*?[\]{}]/;

function compile(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new InvalidArgumentError(`Invalid regular expression: ${describeError(error)}`);
  }
}

async function scopeFilter(context: ToolContext, scope: string | undefined): Promise<(file: string) => boolean> {
  if (!scope || scope === '.' || scope === './') return () => true;

  if (GLOB_CHARS.test(scope)) {
    const options = { dot: true, basename: !scope.includes('/') };
    return file => micromatch.isMatch(file, scope, options);
  }

  // plain paths go through the sandbox like any other path argument
  const prefix = await context.accessor.projectPath(scope);
  if (prefix === '') return () => true;
  return file => file === prefix || file.startsWith(`${prefix}/`);
}

export async function searchText(
  context: ToolContext,
  args: { pattern: string; scope?: string },
): Promise<ToolOutcome> {
  const regex = compile(args.pattern);
  const inScope = await scopeFilter(context, args.scope);
  const files = Object.keys(context.index.files).filter(inScope);
  const matches = await scanLines(context, files, regex);
  return { output: JSON.stringify(matches, null, 2), data: matches };
}
