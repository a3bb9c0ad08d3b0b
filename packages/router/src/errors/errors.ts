import { StatusCodes } from 'http-status-codes';

import type { RouteBuildErrorReason } from '../types';

export class RouterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A pattern that cannot be registered. Thrown while routes are added, before
 * anything is served, so registration can be fixed.
 */
export class RouteBuildError extends RouterError {
  readonly pattern: string;
  readonly reason: RouteBuildErrorReason;

  constructor(reason: RouteBuildErrorReason, pattern: string, message: string) {
    super(message);
    this.reason = reason;
    this.pattern = pattern;
  }
}

export class BuilderFinalizedError extends RouterError {
  constructor() {
    super('PathTrieBuilder has already been built. Instantiate a new builder for additional routes.');
  }
}

export class InvalidSeparatorError extends RouterError {
  readonly separator: string;

  constructor(separator: string) {
    super(`Separator must be exactly one character, received '${separator}'`);
    this.separator = separator;
  }
}

export class RouterConfigError extends RouterError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid router options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class HttpError extends RouterError {
  readonly statusCode: StatusCodes;

  constructor(statusCode: StatusCodes, message: string) {
    super(message);
    this.statusCode = statusCode;
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request') {
    super(StatusCodes.BAD_REQUEST, message);
  }
}
