export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Empty or non-text message handed to the router or chat service. */
export class InvalidInputError extends HttpError {
  constructor(message = 'Message cannot be empty') {
    super(400, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message: string) {
    super(503, message);
  }
}

export type DependencyErrorKind = 'unavailable' | 'timeout' | 'malformed';

// Internal to the service layer: recovered locally, never sent to clients.
export abstract class DependencyError extends Error {
  abstract readonly kind: DependencyErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DependencyUnavailableError extends DependencyError {
  readonly kind: DependencyErrorKind = 'unavailable';
}

export class DependencyTimeoutError extends DependencyUnavailableError {
  readonly kind: DependencyErrorKind = 'timeout';

  constructor(timeoutMs: number) {
    super(`Dependency did not respond within ${timeoutMs}ms`);
  }
}

export class MalformedResponseError extends DependencyError {
  readonly kind: DependencyErrorKind = 'malformed';
}

export function toDependencyError(error: unknown): DependencyError {
  if (error instanceof DependencyError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new DependencyUnavailableError(message, { cause: error });
}
