export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Forbidden', details?: unknown) {
    super(message, 403, details);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found', details?: unknown) {
    super(message, 404, details);
    this.name = 'NotFoundError';
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(
    public readonly allowed: string[],
    message = 'Method not allowed',
  ) {
    super(message, 405, { allowed });
    this.name = 'MethodNotAllowedError';
  }
}

/** The relayed call to a pod could not be completed. */
export class RelayError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(message, 502, details);
    this.name = 'RelayError';
  }
}

/** Listing pods from the cluster failed; the reconcile cycle is skipped. */
export class DiscoveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiscoveryError';
  }
}

export type FetchErrorKind = 'connect' | 'status' | 'decode';

/** One pod's status endpoint was unreachable or answered something unusable. */
export class FetchError extends Error {
  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
