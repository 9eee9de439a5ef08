// ═══════════════════════════════════════════════════════════════════════════
// Error taxonomy for the catalog pipeline and the collection/trade ledgers
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.statusCode = options.statusCode || 500;
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid request input
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'VALIDATION_ERROR', statusCode: 400, context });
  }
}

/**
 * A catalog record without its external identifier. The batch skips it.
 */
export class MissingIdentifierError extends AppError {
  constructor(kind: 'card' | 'set', context?: Record<string, unknown>) {
    super(`Catalog ${kind} record has no id`, {
      code: 'MISSING_IDENTIFIER',
      statusCode: 422,
      context: { kind, ...context },
    });
  }
}

/**
 * A trade or deck referencing a card the store does not know.
 */
export class CardNotFoundError extends AppError {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message, {
      code: 'CARD_NOT_FOUND',
      statusCode: 404,
      context: { missing },
    });
    this.missing = missing;
  }

  static bySetAndNumber(setCode: string, collectorNumber: string): CardNotFoundError {
    return new CardNotFoundError(`Card not found: ${setCode} #${collectorNumber}`, [
      `${setCode} #${collectorNumber}`,
    ]);
  }

  static byId(cardId: string): CardNotFoundError {
    return new CardNotFoundError(`Card not found: ${cardId}`, [cardId]);
  }

  static byNames(names: string[]): CardNotFoundError {
    return new CardNotFoundError(`Cards not found in database: ${names.join(', ')}`, names);
  }
}

/**
 * A sell, or the reversal of a buy, that would drive a holding negative.
 */
export class InsufficientHoldingsError extends AppError {
  public readonly held: number;
  public readonly requested: number;

  constructor(message: string, held: number, requested: number) {
    super(message, {
      code: 'INSUFFICIENT_HOLDINGS',
      statusCode: 409,
      context: { held, requested },
    });
    this.held = held;
    this.requested = requested;
  }
}

/**
 * Missing trade/deck, including deletes of rows that are already gone
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string | number) {
    super(`${resource}${identifier !== undefined ? ` '${identifier}'` : ''} not found`, {
      code: 'NOT_FOUND',
      statusCode: 404,
      context: { resource, identifier },
    });
  }
}

/**
 * Network or HTTP failure talking to the card catalog
 */
export class ExternalFetchError extends AppError {
  public readonly service: string;

  constructor(
    service: string,
    message: string,
    options: { status?: number; url?: string; cause?: unknown } = {},
  ) {
    super(`${service} API error: ${message}`, {
      code: 'EXTERNAL_FETCH_ERROR',
      statusCode: 502,
      context: { service, status: options.status, url: options.url },
      cause: options.cause,
    });
    this.service = service;
  }
}

/**
 * The catalog answered with something that is not the expected envelope
 */
export class MalformedPayloadError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'MALFORMED_PAYLOAD', statusCode: 502, context });
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error occurred';
}
