import { readFileDefinition } from './read-file.js';
import { searchSymbolDefinition } from './search-symbol.js';
import { findUsagesDefinition } from './find-usages.js';
import { getImportsDefinition } from './get-imports.js';
import { getFileTreeDefinition } from './get-file-tree.js';
import { searchTextDefinition } from './search-text.js';
import type { ToolDefinition } from './types.js';

export const navigationTools: ToolDefinition[] = [
  readFileDefinition,
  searchSymbolDefinition,
  findUsagesDefinition,
  getImportsDefinition,
  getFileTreeDefinition,
  searchTextDefinition,
];

export { NavigationSession } from './navigation-session.js';
export { parseNavigationCall, canonicalArguments, NAVIGATION_OPERATIONS } from './arguments.js';
export { truncateContent } from './read-file.js';
export type {
  LineMatch,
  NavigationCall,
  NavigationOperation,
  NavigationTraceEntry,
  SymbolLocation,
  ToolDefinition,
  ToolExecutionResult,
  TraceReason,
} from './types.js';
