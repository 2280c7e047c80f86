/**
 * Errors that map directly to an HTTP status.
 * Anything else reaching the error middleware is answered with 500.
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

/** Missing or invalid input, e.g. a blank title. */
export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ValidationError';
  }
}

/** Unknown, deleted or expired todo. */
export class NotFoundError extends HttpError {
  constructor(message = 'Todo not found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}
