import { logger as rootLogger, Logger } from '../logger.js';
import {
  CircularDependencyError,
  NotRegisteredError,
  RegistrationError,
} from './errors.js';

/**
 * Typed identity of an abstract dependency. `T` only exists at compile time.
 */
export interface Token<T> {
  readonly name: string;
  readonly __type?: T;
}

export function createToken<T>(name: string): Token<T> {
  return Object.freeze({ name });
}

export type Factory<T> = (container: Container) => T;

export type Lifetime = 'lazySingleton' | 'factory';

export interface SingletonOptions<T> {
  /** Called by `dispose()` if the singleton was created. */
  dispose?: (instance: Awaited<T>) => void | Promise<void>;
}

interface Registration<T> {
  lifetime: Lifetime;
  factory: Factory<T>;
  dispose?(instance: Awaited<T>): void | Promise<void>;
  cached?: { value: T };
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Registry of factories keyed by token identity; two tokens created with
 * the same name are distinct.
 *
 * Lazy singletons run their factory at most once. A factory that returns a
 * promise has the promise cached, so concurrent first resolutions share a
 * single construction; if that promise rejects it is dropped and the next
 * resolve starts over. Async factories must resolve their own dependencies
 * before their first `await`; cycle detection only sees the synchronous
 * part of a factory.
 *
 * Registrations are made during startup. After `seal()` the container
 * only resolves.
 */
export class Container {
  private readonly registrations = new Map<Token<unknown>, Registration<unknown>>();
  private readonly resolving: Token<unknown>[] = [];
  private readonly resolutionOrder: Token<unknown>[] = [];
  private sealed = false;
  private readonly logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child({ component: 'Container' });
  }

  registerLazySingleton<T>(
    token: Token<T>,
    factory: Factory<T>,
    options: SingletonOptions<T> = {}
  ): this {
    this.assertCanRegister(token);
    const registration: Registration<T> = {
      lifetime: 'lazySingleton',
      factory,
      dispose: options.dispose,
    };
    this.store(token, registration);
    return this;
  }

  registerFactory<T>(token: Token<T>, factory: Factory<T>): this {
    this.assertCanRegister(token);
    const registration: Registration<T> = {
      lifetime: 'factory',
      factory,
    };
    this.store(token, registration);
    return this;
  }

  isRegistered<T>(token: Token<T>): boolean {
    return this.registrations.has(token);
  }

  resolve<T>(token: Token<T>): T {
    const registration = this.lookup(token);

    if (registration.cached) {
      return registration.cached.value;
    }

    const start = this.resolving.indexOf(token);
    if (start !== -1) {
      throw new CircularDependencyError(token.name, [
        ...this.resolving.slice(start).map((t) => t.name),
        token.name,
      ]);
    }

    const instance = this.construct(token, registration);
    if (registration.lifetime === 'lazySingleton') {
      this.cache(token, registration, instance);
    }
    return instance;
  }

  /** Rejects any further registration. */
  seal(): void {
    this.sealed = true;
    this.logger.debug(
      { tokens: [...this.registrations.keys()].map((t) => t.name) },
      'Container sealed'
    );
  }

  /**
   * Runs disposers of the singletons created so far, newest first, and
   * forgets the instances. Registrations stay in place.
   *
   * Every disposer runs even when an earlier one fails; the failures are
   * rethrown together as an `AggregateError`.
   */
  async dispose(): Promise<void> {
    const order = this.resolutionOrder.splice(0).reverse();
    const errors: unknown[] = [];

    for (const token of order) {
      const registration = this.registrations.get(token);
      const cached = registration?.cached;
      if (!registration || !cached) continue;
      registration.cached = undefined;

      try {
        const instance = await cached.value;
        if (registration.dispose) {
          this.logger.debug({ token: token.name }, 'Disposing singleton');
          await registration.dispose(instance);
        }
      } catch (error) {
        this.logger.error({ token: token.name, err: error }, 'Singleton disposal failed');
        errors.push(error);
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Failed to dispose ${errors.length} singleton(s)`);
    }
  }

  private construct<T>(token: Token<T>, registration: Registration<T>): T {
    this.resolving.push(token);
    try {
      return registration.factory(this);
    } finally {
      this.resolving.pop();
    }
  }

  private lookup<T>(token: Token<T>): Registration<T> {
    const registration = this.registrations.get(token);
    if (!registration) {
      throw new NotRegisteredError(token.name);
    }
    // Keyed by the token object, and store() only pairs Token<T> with
    // Registration<T>.
    return registration as Registration<T>;
  }

  private store<T>(token: Token<T>, registration: Registration<T>): void {
    this.registrations.set(token, registration);
  }

  private cache<T>(token: Token<T>, registration: Registration<T>, instance: T): void {
    const cached = { value: instance };
    registration.cached = cached;
    this.resolutionOrder.push(token);

    if (isPromiseLike(instance)) {
      void Promise.resolve(instance).catch((error: unknown) => {
        if (registration.cached !== cached) return;
        this.logger.warn({ token: token.name, err: error }, 'Singleton factory rejected');
        registration.cached = undefined;
        const index = this.resolutionOrder.lastIndexOf(token);
        if (index !== -1) this.resolutionOrder.splice(index, 1);
      });
    }
  }

  private assertCanRegister<T>(token: Token<T>): void {
    if (this.sealed) {
      throw new RegistrationError(token.name, 'container is sealed');
    }
    const existing = this.registrations.get(token);
    if (existing?.cached) {
      throw new RegistrationError(token.name, 'singleton already resolved');
    }
  }
}
