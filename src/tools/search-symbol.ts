import type { SymbolLocation, ToolContext, ToolDefinition, ToolOutcome } from './types.js';

export const searchSymbolDefinition: ToolDefinition = {
  name: 'search_symbol',
  description: `Find where a class, function, method or type is defined.

Exact name match. Returns every definition site as {name, kind, file, line};
an empty list when the name is not defined in the project.`,
  inputSchema: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Symbol name, e.g. "UserService" or "parse_config"' },
    },
    required: ['name'],
  },
};

export function lookupSymbol(context: ToolContext, name: string): SymbolLocation[] {
  const entries = Object.hasOwn(context.index.symbols, name) ? context.index.symbols[name] : [];
  return entries.slice(0, context.limits.maxSearchResults).map(entry => ({
    name: entry.name,
    kind: entry.kind,
    file: entry.file,
    line: entry.line,
    ...(entry.parent ? { parent: entry.parent } : {}),
  }));
}

export async function searchSymbol(context: ToolContext, args: { name: string }): Promise<ToolOutcome> {
  const locations = lookupSymbol(context, args.name);
  return { output: JSON.stringify(locations, null, 2), data: locations };
}
