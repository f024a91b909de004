/**
 * Wiring errors. All of them mean the composition root is wrong and are
 * fatal at startup.
 */
export class ContainerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotRegisteredError extends ContainerError {
  constructor(readonly token: string) {
    super(`No registration for ${token}`);
  }
}

export class CircularDependencyError extends ContainerError {
  constructor(
    readonly token: string,
    readonly path: readonly string[]
  ) {
    super(`Circular dependency while resolving ${token}: ${path.join(' -> ')}`);
  }
}

export class RegistrationError extends ContainerError {
  constructor(
    readonly token: string,
    reason: string
  ) {
    super(`Cannot register ${token}: ${reason}`);
  }
}
