/**
 * Answers whether the remote side is reachable right now. Implementations
 * must not cache the answer between calls.
 */
export interface NetworkInfo {
  isConnected(): Promise<boolean>;
}
