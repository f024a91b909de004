/**
 * Failures raised at the data boundary and propagated unchanged through
 * repositories and use cases. The presentation layer turns them into
 * responses.
 */
export type FailureKind = 'NoConnectivity' | 'ServerError';

export abstract class Failure extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NoConnectivityFailure extends Failure {
  readonly kind = 'NoConnectivity' as const;

  constructor(message = 'No network connection') {
    super(message);
    Object.freeze(this);
  }
}

export class ServerFailure extends Failure {
  readonly kind = 'ServerError' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    Object.freeze(this);
  }
}

export function isFailure(error: unknown): error is Failure {
  return error instanceof Failure;
}
