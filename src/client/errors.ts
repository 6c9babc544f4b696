/**
 * Error types raised by the Mirth client.
 *
 * Everything thrown by the library derives from MirthError so callers can
 * catch the whole family with a single instanceof check.
 */

export class MirthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MirthError';
  }
}

/**
 * Non-2xx response from the Mirth API
 */
export class MirthApiError extends MirthError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody?: string
  ) {
    super(message);
    this.name = 'MirthApiError';
  }
}

export class MirthLoginError extends MirthError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MirthLoginError';
  }
}

/**
 * A message posted to a channel was rejected or errored at a connector
 */
export class MirthPostError extends MirthError {
  constructor(message: string) {
    super(message);
    this.name = 'MirthPostError';
  }
}

/**
 * Response body could not be parsed into the expected model.
 * `issues` holds one line per XML or schema problem.
 */
export class MirthParseError extends MirthError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'MirthParseError';
  }
}

export class MirthValidationError extends MirthError {
  constructor(message: string) {
    super(message);
    this.name = 'MirthValidationError';
  }
}
