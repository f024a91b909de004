import { NetworkInfo } from '../../domain/network/networkInfo.js';

/**
 * Rejects with `Error('timeout')` if the promise has not settled within `ms`.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/** The part of `pg.Pool` the check needs. */
export interface Pingable {
  query(text: string): Promise<unknown>;
}

/**
 * Treats the database as "the network": connected means a `SELECT 1`
 * round trip finishes within the timeout. Every call checks again.
 */
export class PgNetworkInfo implements NetworkInfo {
  constructor(
    private readonly pool: Pingable,
    private readonly timeoutMs: number
  ) {}

  async isConnected(): Promise<boolean> {
    try {
      await withTimeout(this.pool.query('SELECT 1'), this.timeoutMs);
      return true;
    } catch {
      return false;
    }
  }
}
