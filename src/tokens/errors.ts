export type RouteInvariantCode = 'INVALID_WETH_CONTEXT' | 'WRAP_FAILED' | 'EMPTY_ROUTE';

/**
 * Raised when route data contradicts the model: a wrap/unwrap hop where a pool
 * was expected, a failing mid-route wrap, or a route without hops.
 * An infeasible trade is never reported this way; it yields an undefined result.
 */
export class RouteInvariantError extends Error {
  readonly code: RouteInvariantCode;

  constructor(code: RouteInvariantCode, message: string) {
    super(message);
    this.name = 'RouteInvariantError';
    this.code = code;
  }
}
