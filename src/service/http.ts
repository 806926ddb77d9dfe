import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { z } from 'zod';
import { InvalidArgumentError, NotFoundError, toErrorDescriptor, type ErrorDescriptor } from '../errors.js';
import { REVIEW_MODES } from '../orchestrator/types.js';
import { SESSION_SORT_KEYS, type SessionSortKey } from '../session/types.js';
import { logger } from '../utils/logger.js';
import type { ReviewService } from './review-service.js';

const log = logger.child('http');

const MAX_BODY_BYTES = 1024 * 1024;

const ReviewBodySchema = z.object({
  projectRoot: z.string().min(1),
  changedFiles: z.array(z.string()).optional(),
  sessionName: z.string().min(1).optional(),
  instructions: z.string().optional(),
  diffs: z.record(z.string()).optional(),
  mode: z.enum(REVIEW_MODES).optional(),
  designDoc: z.string().optional(),
  story: z.string().optional(),
});

const STATUS_BY_CODE: Partial<Record<ErrorDescriptor['code'], number>> = {
  InvalidArgument: 400,
  NotFound: 404,
  SessionBusy: 409,
  RateLimitExceeded: 429,
  EngineUnreachable: 502,
  EngineProtocolError: 502,
};

export function statusForError(descriptor: ErrorDescriptor): number {
  return STATUS_BY_CODE[descriptor.code] ?? 500;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'content-type': 'application/json; charset=utf-8',
    'content-length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

function sendError(res: ServerResponse, error: unknown): void {
  const descriptor = toErrorDescriptor(error);
  const status = statusForError(descriptor);
  if (status >= 500) log.error(`Request failed: ${descriptor.message}`);
  sendJson(res, status, { error: descriptor });
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new InvalidArgumentError(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    }
    chunks.push(buffer);
  }
  const text = Buffer.concat(chunks).toString('utf-8');
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidArgumentError('Request body is not valid JSON');
  }
}

function requireParam(url: URL, name: string): string {
  const value = url.searchParams.get(name);
  if (!value) throw new InvalidArgumentError(`Missing query parameter '${name}'`);
  return value;
}

function parseLimit(raw: string | null): number | undefined {
  if (raw === null) return undefined;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError(`limit must be a non-negative integer, got '${raw}'`);
  }
  return limit;
}

function parseSortKey(raw: string | null): SessionSortKey | undefined {
  if (raw === null) return undefined;
  const key = SESSION_SORT_KEYS.find(candidate => candidate === raw);
  if (!key) {
    throw new InvalidArgumentError(`sortBy must be one of ${SESSION_SORT_KEYS.join(', ')}`);
  }
  return key;
}

function sessionNameFrom(pathname: string): string | null {
  const match = /^\/sessions\/([^/]+)$/.exec(pathname);
  return match ? decodeURIComponent(match[1]) : null;
}

async function route(service: ReviewService, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const method = req.method ?? 'GET';

  if (method === 'GET' && url.pathname === '/health') {
    sendJson(res, 200, { status: 'ok', rateLimits: service.rateLimitSnapshot() });
    return;
  }

  if (method === 'POST' && url.pathname === '/reviews') {
    const parsed = ReviewBodySchema.safeParse(await readJsonBody(req));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidArgumentError(`Invalid review request: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`);
    }

    // a client that hangs up cancels its review
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const result = await service.review(parsed.data, controller.signal);
    if (result.state === 'TERMINATED_ERROR' && result.error) {
      sendJson(res, statusForError(result.error), { error: result.error, result });
      return;
    }
    sendJson(res, 200, result);
    return;
  }

  if (method === 'GET' && url.pathname === '/sessions') {
    const sessions = await service.listSessions({
      projectRoot: url.searchParams.get('project') ?? undefined,
      limit: parseLimit(url.searchParams.get('limit')),
      sortBy: parseSortKey(url.searchParams.get('sortBy')),
    });
    sendJson(res, 200, { sessions });
    return;
  }

  const sessionName = sessionNameFrom(url.pathname);
  if (sessionName !== null && method === 'GET') {
    const session = await service.getSession(sessionName, requireParam(url, 'projectRoot'));
    sendJson(res, 200, session);
    return;
  }
  if (sessionName !== null && method === 'DELETE') {
    const projectRoot = requireParam(url, 'projectRoot');
    if (!(await service.deleteSession(sessionName, projectRoot))) {
      throw new NotFoundError(`Session '${sessionName}' not found for ${projectRoot}`);
    }
    sendJson(res, 200, { deleted: sessionName });
    return;
  }

  throw new NotFoundError(`No route for ${method} ${url.pathname}`);
}

export function createHttpServer(service: ReviewService): Server {
  return createServer((req, res) => {
    route(service, req, res).catch((error: unknown) => {
      if (res.headersSent) {
        log.error(`Error after response started: ${toErrorDescriptor(error).message}`);
        res.destroy();
        return;
      }
      sendError(res, error);
    });
  });
}

export interface RunningHttpServer {
  server: Server;
  port: number;
  close(): Promise<void>;
}

export async function startHttpServer(service: ReviewService, host: string, port: number): Promise<RunningHttpServer> {
  const server = createHttpServer(service);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;
  log.info(`Review service listening on http://${host}:${boundPort}`);

  return {
    server,
    port: boundPort,
    close: () => new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    }),
  };
}
