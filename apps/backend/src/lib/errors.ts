import { StatusCodes } from 'http-status-codes';
import type { ConnectorErrorKind } from '@terminal-connector/types';

export interface ConnectorErrorOptions {
  field?: string;
  details?: unknown;
}

/**
 * Base class for every error the connector reports to the terminal.
 *
 * `code` is the machine-readable kind, `status` the HTTP status the error
 * handler responds with, and `field` names the offending parameter or column.
 */
export class ConnectorError extends Error {
  public readonly field?: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    public readonly code: ConnectorErrorKind = 'INTERNAL_ERROR',
    public readonly status: number = StatusCodes.INTERNAL_SERVER_ERROR,
    options: ConnectorErrorOptions = {}
  ) {
    super(message);
    this.name = 'ConnectorError';
    this.field = options.field;
    this.details = options.details;
  }
}

/**
 * No route matches the request path.
 */
export class RouteNotFoundError extends ConnectorError {
  constructor(method: string, path: string) {
    super(`No route for ${method} ${path}`, 'NOT_FOUND', StatusCodes.NOT_FOUND);
    this.name = 'RouteNotFoundError';
  }
}

/**
 * Credential missing or not matching. The message never says which.
 */
export class UnauthorizedError extends ConnectorError {
  constructor(message = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', StatusCodes.UNAUTHORIZED);
    this.name = 'UnauthorizedError';
  }
}

export class UnknownWidgetError extends ConnectorError {
  constructor(public readonly widgetId: string) {
    super(`Unknown widget "${widgetId}"`, 'UNKNOWN_WIDGET', StatusCodes.NOT_FOUND);
    this.name = 'UnknownWidgetError';
  }
}

export class ValidationError extends ConnectorError {
  constructor(message = 'Validation failed', field?: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', StatusCodes.BAD_REQUEST, { field, details });
    this.name = 'ValidationError';
  }
}

export class UpstreamTimeoutError extends ConnectorError {
  constructor(message = 'Upstream provider timed out', details?: unknown) {
    super(message, 'UPSTREAM_TIMEOUT', StatusCodes.GATEWAY_TIMEOUT, { details });
    this.name = 'UpstreamTimeoutError';
  }
}

export class UpstreamUnavailableError extends ConnectorError {
  constructor(message = 'Upstream provider unavailable', details?: unknown) {
    super(message, 'UPSTREAM_UNAVAILABLE', StatusCodes.BAD_GATEWAY, { details });
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * The provider answered that the request itself is invalid (4xx).
 */
export class UpstreamRejectedError extends ConnectorError {
  constructor(message = 'Upstream provider rejected the request', public readonly upstreamStatus?: number) {
    super(message, 'UPSTREAM_REJECTED', StatusCodes.UNPROCESSABLE_ENTITY, { details: { upstreamStatus } });
    this.name = 'UpstreamRejectedError';
  }
}

/**
 * Provider payload did not match the widget's declared columns.
 */
export class TranslationError extends ConnectorError {
  constructor(message: string, field?: string) {
    super(message, 'TRANSLATION_ERROR', StatusCodes.BAD_GATEWAY, { field });
    this.name = 'TranslationError';
  }
}

/**
 * The inbound caller went away before a response was produced.
 *
 * Not a terminal-facing kind: nobody is left to receive it.
 */
export class RequestAbortedError extends Error {
  constructor(message = 'Request aborted by caller') {
    super(message);
    this.name = 'RequestAbortedError';
  }
}
