import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';
import type { NavigationCall, NavigationOperation } from './types.js';

const pathArgs = z.object({
  path: z.string().trim().min(1, 'path must be a non-empty string'),
});

const nameArgs = z.object({
  name: z.string().trim().min(1, 'name must be a non-empty string'),
});

const searchTextArgs = z.object({
  pattern: z.string().min(1, 'pattern must be a non-empty string'),
  scope: z.string().trim().min(1).nullish().transform(value => value ?? undefined),
});

const emptyArgs = z.object({}).nullish().transform((): Record<string, never> => ({}));

export const NAVIGATION_OPERATIONS: readonly NavigationOperation[] = [
  'read_file',
  'search_symbol',
  'find_usages',
  'get_imports',
  'get_file_tree',
  'search_text',
];

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, operation: string, args: unknown): T {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid arguments for ${operation}: ${issues}`);
  }
  return result.data;
}

/**
 * Validate an engine-issued call against the operation names and argument
 * shapes. Unknown names and malformed arguments raise InvalidArgumentError.
 */
export function parseNavigationCall(name: string, args: unknown): NavigationCall {
  switch (name) {
    case 'read_file':
      return { op: name, args: parseWith(pathArgs, name, args) };
    case 'get_imports':
      return { op: name, args: parseWith(pathArgs, name, args) };
    case 'search_symbol':
      return { op: name, args: parseWith(nameArgs, name, args) };
    case 'find_usages':
      return { op: name, args: parseWith(nameArgs, name, args) };
    case 'get_file_tree':
      return { op: name, args: parseWith(emptyArgs, name, args) };
    case 'search_text': {
      const parsed = parseWith(searchTextArgs, name, args);
      return {
        op: name,
        args: parsed.scope === undefined ? { pattern: parsed.pattern } : { pattern: parsed.pattern, scope: parsed.scope },
      };
    }
    default:
      throw new InvalidArgumentError(
        `Unknown operation '${name}'. Available: ${NAVIGATION_OPERATIONS.join(', ')}`,
      );
  }
}

/** Argument object serialized with sorted keys, for cache keys. */
export function canonicalArguments(args: Record<string, unknown>): string {
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(args).sort()) {
    if (args[key] !== undefined) sorted[key] = args[key];
  }
  return JSON.stringify(sorted);
}
