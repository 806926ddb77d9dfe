#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { build } from './indexer/index.js';
import { createMcpServer } from './server.js';
import { ReviewService } from './service/review-service.js';
import { startHttpServer } from './service/http.js';
import { isLogLevel, logger } from './utils/logger.js';

const log = logger.child('cli');

const USAGE = `Usage: review-navigator <command> [options]

Commands:
  serve            Start the HTTP review service
  mcp              Serve the navigation tools over MCP (stdio)
  index <root>     Index a project and print statistics

Options:
  --config <path>  Config file (default: review-navigator.config.json beside the package)
  --host <host>    Override service.host (serve)
  --port <port>    Override service.port (serve)
  --json           Print index statistics as JSON (index)
  -h, --help       Show this help`;

function packageVersion(): string {
  const path = resolve(dirname(fileURLToPath(import.meta.url)), '../package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (parsed !== null && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    log.debug(`Could not read ${path}: ${describeError(error)}`);
  }
  return '0.0.0';
}

/** Resolve once on SIGINT or SIGTERM. */
function shutdownSignal(): Promise<string> {
  return new Promise(resolve => {
    const handler = (signal: NodeJS.Signals): void => resolve(signal);
    process.once('SIGINT', handler);
    process.once('SIGTERM', handler);
  });
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      host: { type: 'string' },
      port: { type: 'string' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.error(USAGE);
    return command || values.help ? 0 : 1;
  }

  const config = loadConfig(values.config);
  if (!process.env.REVIEW_NAVIGATOR_LOG_LEVEL && isLogLevel(config.logging.level)) {
    logger.setLevel(config.logging.level);
  }

  switch (command) {
    case 'serve': {
      const port = values.port === undefined ? config.service.port : Number(values.port);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        console.error(`Invalid port: ${values.port}`);
        return 1;
      }
      const service = new ReviewService(config);
      const http = await startHttpServer(service, values.host ?? config.service.host, port);
      const signal = await shutdownSignal();
      log.info(`Received ${signal}, shutting down`);
      await http.close();
      await service.close();
      return 0;
    }

    case 'mcp': {
      const service = new ReviewService(config);
      const server = createMcpServer(service, packageVersion());
      await server.connect(new StdioServerTransport());
      log.info('MCP server started on stdio');
      const signal = await Promise.race([
        shutdownSignal(),
        new Promise<string>(resolve => { server.onclose = () => resolve('close'); }),
      ]);
      log.info(`MCP server stopping (${signal})`);
      await server.close();
      await service.close();
      return 0;
    }

    case 'index': {
      const root = rest[0];
      if (!root) {
        console.error('Usage: review-navigator index <root>');
        return 1;
      }
      const { index, stats } = await build(resolve(root), config.indexer.ignore, config.indexer);
      if (values.json) {
        console.log(JSON.stringify({ root: index.root, stats, unparsed: index.unparsed }, null, 2));
      } else {
        console.log(`Indexed ${index.root}`);
        console.log(`  files:    ${stats.files} (${stats.parsedFiles} parsed)`);
        console.log(`  symbols:  ${stats.symbols}`);
        console.log(`  imports:  ${stats.imports}`);
        console.log(`  unparsed: ${stats.unparsed}`);
        console.log(`  duration: ${stats.durationMs}ms`);
        for (const path of index.unparsed) console.log(`  ! ${path}`);
      }
      return 0;
    }

    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log.error(`Fatal: ${describeError(error)}`);
    process.exitCode = 1;
  },
);
