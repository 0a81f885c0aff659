/** Which collaborator an external call went to */
export type ExternalSource = 'venue' | 'router' | 'pool' | 'oracle' | 'ledger' | 'framework' | 'checkpoint';

export type EngineErrorCode =
  | 'EXTERNAL_CALL_FAILED'
  | 'PRICE_UNAVAILABLE'
  | 'STALE_PRICE'
  | 'UNAUTHORIZED'
  | 'CYCLE_IN_PROGRESS'
  | 'INSUFFICIENT_BALANCE';

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly details?: Record<string, string>,
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

/** A venue, router, pool, oracle or ledger call failed. Always fatal to the entry point. */
export class ExternalCallError extends EngineError {
  constructor(
    public readonly source: ExternalSource,
    public readonly operation: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${source}.${operation} failed: ${reason}`, 'EXTERNAL_CALL_FAILED', { source, operation });
    this.name = 'ExternalCallError';
    this.cause = cause;
  }
}

export class PriceUnavailableError extends EngineError {
  constructor(feed: string) {
    super(`Price unavailable from ${feed}`, 'PRICE_UNAVAILABLE', { feed });
    this.name = 'PriceUnavailableError';
  }
}

export class StalePriceError extends EngineError {
  constructor(feed: string, ageSeconds: number, maxAgeSeconds: number) {
    super(
      `Price from ${feed} is ${ageSeconds}s old (max ${maxAgeSeconds}s)`,
      'STALE_PRICE',
      { feed, ageSeconds: String(ageSeconds), maxAgeSeconds: String(maxAgeSeconds) },
    );
    this.name = 'StalePriceError';
  }
}

export class UnauthorizedError extends EngineError {
  constructor(caller: string, action: string) {
    super(`${caller} is not an operator and cannot ${action}`, 'UNAUTHORIZED', { caller, action });
    this.name = 'UnauthorizedError';
  }
}

export class CycleInProgressError extends EngineError {
  constructor(running: string, requested: string) {
    super(`Cannot start ${requested} while ${running} is in progress`, 'CYCLE_IN_PROGRESS', {
      running,
      requested,
    });
    this.name = 'CycleInProgressError';
  }
}

export class InsufficientBalanceError extends EngineError {
  constructor(asset: string, requested: bigint, available: bigint) {
    super(
      `Insufficient ${asset}: requested ${requested}, available ${available}`,
      'INSUFFICIENT_BALANCE',
      { asset, requested: requested.toString(), available: available.toString() },
    );
    this.name = 'InsufficientBalanceError';
  }
}

/**
 * Run a call against an external collaborator. Anything it throws that is
 * not already an EngineError is wrapped in an ExternalCallError.
 */
export async function external<T>(
  source: ExternalSource,
  operation: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof EngineError) throw err;
    throw new ExternalCallError(source, operation, err);
  }
}
