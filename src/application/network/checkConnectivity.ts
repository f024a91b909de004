import { NetworkInfo } from '../../domain/network/networkInfo.js';
import { NoParamsUseCase } from '../useCase.js';

export interface ConnectivityStatus {
  connected: boolean;
  checkedAt: Date;
}

/**
 * Reports current reachability of the backing store. Asks the oracle on
 * every call.
 */
export class CheckConnectivityUseCase implements NoParamsUseCase<ConnectivityStatus> {
  constructor(
    private readonly networkInfo: NetworkInfo,
    private readonly now: () => Date = () => new Date()
  ) {}

  async execute(): Promise<ConnectivityStatus> {
    const connected = await this.networkInfo.isConnected();
    return { connected, checkedAt: this.now() };
  }
}
