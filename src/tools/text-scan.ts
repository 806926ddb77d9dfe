import type { LineMatch, ToolContext } from './types.js';

const MAX_LINE_TEXT = 240;

/**
 * Line-by-line regex scan over indexed files in the given order, stopping at
 * `maxSearchResults`. Files that cannot be read as text are skipped.
 */
export async function scanLines(
  context: ToolContext,
  files: string[],
  pattern: RegExp,
  accept: (match: LineMatch) => boolean = () => true,
): Promise<LineMatch[]> {
  const limit = context.limits.maxSearchResults;
  const matches: LineMatch[] = [];

  for (const file of files) {
    const content = await context.readIndexed(file);
    if (content === null || content.includes('\0')) continue;

    const lines = content.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      if (!pattern.test(lines[i])) continue;
      const text = lines[i].trim();
      const match: LineMatch = {
        file,
        line: i + 1,
        text: text.length > MAX_LINE_TEXT ? `${text.slice(0, MAX_LINE_TEXT)}…` : text,
      };
      if (!accept(match)) continue;
      matches.push(match);
      if (matches.length >= limit) return matches;
    }
  }

  return matches;
}
