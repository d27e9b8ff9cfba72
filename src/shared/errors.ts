export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HttpError {
  constructor(message = "Bad Request", details?: Record<string, unknown>) {
    super(400, message, details);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Unauthorized") {
    super(401, message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "Forbidden") {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not Found") {
    super(404, message);
  }
}

export class ConfigurationError extends HttpError {
  constructor(message: string) {
    super(500, message);
  }
}

/** The directory service refused our credential or could not issue a token. */
export class AuthenticationError extends HttpError {
  constructor(message = "Directory authentication failed") {
    super(502, message);
  }
}

export class DirectoryError extends HttpError {
  constructor(
    message: string,
    public readonly upstreamStatus?: number,
  ) {
    super(502, message, upstreamStatus === undefined ? undefined : { upstream_status: upstreamStatus });
  }
}

export class EmptyCatalogError extends HttpError {
  constructor(message = "Directory returned no subscribed SKUs") {
    super(502, message);
  }
}

export class SnapshotReadError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class SnapshotWriteError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
