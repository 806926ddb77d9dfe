import { readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { getParserFactory, ParserFactory } from '../parsers/index.js';
import { ParseFailureError, describeError, isNodeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { ScannedFile } from './file-scanner.js';
import type { FileEntry } from './types.js';

const log = logger.child('extractor');

export interface Extraction {
  entry: FileEntry;
  /** True when the file could not be read, or a parser exists for it but threw. */
  failed: boolean;
}

export class SymbolExtractor {
  constructor(private readonly factory: ParserFactory = getParserFactory()) {}

  /**
   * Parse one file into its index entry. Resolves null when the file vanished
   * after it was scanned. Read and parser failures are not fatal: the entry
   * keeps its language with no symbols or imports and is flagged. A
   * `previous` entry with the same content hash is reused without parsing.
   */
  async extract(file: ScannedFile, previous?: FileEntry): Promise<Extraction | null> {
    let content: string;
    try {
      content = await readFile(file.absolutePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        log.debug(`${file.path} disappeared before it was read`);
        return null;
      }
      log.warn(`Cannot read ${file.path}: ${describeError(error)}`);
      const language = this.factory.getParserForFile(file.path)?.getLanguage() ?? null;
      return { entry: { language, size: file.size, hash: '', symbols: [], imports: [] }, failed: true };
    }

    const hash = hashContent(content);
    if (previous && previous.hash === hash && previous.size === file.size) {
      return { entry: previous, failed: false };
    }
    return this.extractContent(file.path, file.size, content, hash);
  }

  extractContent(path: string, size: number, content: string, hash = hashContent(content)): Extraction {
    const parser = this.factory.getParserForFile(path);

    if (!parser) {
      return { entry: { language: null, size, hash, symbols: [], imports: [] }, failed: false };
    }

    try {
      const result = parser.parse(path, content);
      return {
        entry: {
          language: result.language,
          size,
          hash,
          symbols: result.symbols,
          imports: result.imports.map(specifier => ({ specifier })),
        },
        failed: false,
      };
    } catch (error) {
      const failure = new ParseFailureError(path, error);
      log.warn(failure.message);
      return {
        entry: { language: parser.getLanguage(), size, hash, symbols: [], imports: [] },
        failed: true,
      };
    }
  }
}

function hashContent(content: string): string {
  return createHash('sha1').update(content).digest('hex');
}
