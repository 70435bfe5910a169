export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string) {
    super(401, 'AUTHENTICATION_ERROR', message);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string) {
    super(403, 'AUTHORIZATION_ERROR', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
  }
}

/** The document store did not answer within the request timeout. */
export class SearchTimeoutError extends AppError {
  constructor(message = 'Search request timed out') {
    super(408, 'SEARCH_TIMEOUT', message);
  }
}

/** The document store could not be reached. */
export class SearchUnavailableError extends AppError {
  constructor(message = 'Search service is temporarily unavailable') {
    super(503, 'SEARCH_UNAVAILABLE', message);
  }
}
