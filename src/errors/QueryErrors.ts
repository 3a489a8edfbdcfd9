/**
 * Query errors
 *
 * Every failure the engine reports carries a stable `code` so callers can
 * branch on it without string matching. Bind-time errors (syntax, prefixes,
 * unsupported constructs) are raised before any evaluation starts.
 */

export type QueryErrorCode =
  | 'SYNTAX_ERROR'
  | 'UNKNOWN_PREFIX'
  | 'UNSUPPORTED_QUERY'
  | 'RESOURCE_EXCEEDED'
  | 'EXPRESSION_ERROR'
  | 'INVALID_TRIPLE';

export class QueryError extends Error {
  public readonly code: QueryErrorCode;

  public constructor(code: QueryErrorCode, message: string) {
    super(message);
    this.name = 'QueryError';
    this.code = code;
  }
}

export class QuerySyntaxError extends QueryError {
  public constructor(message: string) {
    super('SYNTAX_ERROR', message);
    this.name = 'QuerySyntaxError';
  }
}

export class UnknownPrefixError extends QueryError {
  public readonly prefix: string;

  public constructor(prefix: string) {
    super('UNKNOWN_PREFIX', `Missing prefix for '${prefix}'`);
    this.name = 'UnknownPrefixError';
    this.prefix = prefix;
  }
}

export class UnsupportedQueryError extends QueryError {
  public constructor(message: string) {
    super('UNSUPPORTED_QUERY', message);
    this.name = 'UnsupportedQueryError';
  }
}

export class ResourceExceededError extends QueryError {
  public readonly steps: number;
  public readonly limit: number;

  public constructor(message: string, steps: number, limit: number) {
    super('RESOURCE_EXCEEDED', message);
    this.name = 'ResourceExceededError';
    this.steps = steps;
    this.limit = limit;
  }
}

/**
 * Raised while evaluating an expression for a single solution.
 * Never escapes the engine: filters treat it as false, BIND leaves the
 * variable unbound.
 */
export class ExpressionError extends QueryError {
  public constructor(message: string) {
    super('EXPRESSION_ERROR', message);
    this.name = 'ExpressionError';
  }
}

export class InvalidTripleError extends QueryError {
  public constructor(message: string) {
    super('INVALID_TRIPLE', message);
    this.name = 'InvalidTripleError';
  }
}

export function isQueryError(value: unknown): value is QueryError {
  return value instanceof QueryError;
}
