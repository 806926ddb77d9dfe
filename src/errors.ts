export type NavigatorErrorCode =
  | 'OutsideSandbox'
  | 'NotFound'
  | 'InvalidArgument'
  | 'ParseFailure'
  | 'RateLimitExceeded'
  | 'SessionBusy'
  | 'SessionVersionUnsupported'
  | 'EngineUnreachable'
  | 'EngineProtocolError'
  | 'Cancelled'
  | 'ConfigInvalid';

export class NavigatorError extends Error {
  readonly code: NavigatorErrorCode;

  constructor(code: NavigatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
  }
}

export class OutsideSandboxError extends NavigatorError {
  constructor(readonly requestedPath: string, reason?: string) {
    super('OutsideSandbox', `Access denied - path outside project root: ${requestedPath}${reason ? ` (${reason})` : ''}`);
  }
}

export class NotFoundError extends NavigatorError {
  constructor(message: string) {
    super('NotFound', message);
  }
}

export class InvalidArgumentError extends NavigatorError {
  constructor(message: string) {
    super('InvalidArgument', message);
  }
}

export class ParseFailureError extends NavigatorError {
  constructor(readonly filepath: string, cause: unknown) {
    super('ParseFailure', `Failed to parse ${filepath}: ${describeError(cause)}`, { cause });
  }
}

export class RateLimitExceededError extends NavigatorError {
  constructor(readonly category: string, readonly waitMs: number, readonly maxWaitMs: number) {
    super(
      'RateLimitExceeded',
      `Rate limit for ${category} would require waiting ${Math.ceil(waitMs)}ms (ceiling ${maxWaitMs}ms)`,
    );
  }
}

export class SessionBusyError extends NavigatorError {
  constructor(readonly sessionName: string, readonly projectRoot: string) {
    super('SessionBusy', `Session '${sessionName}' for ${projectRoot} is in use by another review`);
  }
}

export class SessionVersionError extends NavigatorError {
  constructor(readonly found: unknown, readonly supported: number) {
    super('SessionVersionUnsupported', `Session record version ${String(found)} is not supported (max ${supported})`);
  }
}

export class EngineUnreachableError extends NavigatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EngineUnreachable', message, options);
  }
}

export class EngineProtocolError extends NavigatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EngineProtocolError', message, options);
  }
}

export class CancelledError extends NavigatorError {
  constructor(message = 'Review was cancelled') {
    super('Cancelled', message);
  }
}

export class ConfigError extends NavigatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ConfigInvalid', message, options);
  }
}

export interface ErrorDescriptor {
  code: NavigatorErrorCode | 'Internal';
  message: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorDescriptor(error: unknown): ErrorDescriptor {
  if (error instanceof NavigatorError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'Internal', message: describeError(error) };
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
