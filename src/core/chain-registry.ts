import type { Wallet } from 'ethers';
import { BotError } from '../errors.js';
import { EvmAdapter } from './evm-adapter.js';
import { RpcManager } from './rpc-manager.js';
import type { ChainAdapter } from './chain-adapter.js';
import type { ChainConfig } from '../types.js';

/**
 * Chains known to this process. Passed by construction; nothing reads a
 * process-wide table.
 */
export class ChainRegistry {
  private readonly chains = new Map<number, ChainConfig>();

  constructor(configs: ChainConfig[]) {
    for (const c of configs) this.chains.set(c.id, c);
  }

  get(chainId: number): ChainConfig {
    const chain = this.chains.get(chainId);
    if (!chain) throw new BotError('ConfigInvalid', `unknown chain id ${chainId}`);
    return chain;
  }

  has(chainId: number): boolean {
    return this.chains.has(chainId);
  }

  byName(name: string): ChainConfig | undefined {
    return [...this.chains.values()].find((c) => c.name === name.toLowerCase());
  }

  list(): ChainConfig[] {
    return [...this.chains.values()];
  }

  /** One ethers-backed adapter for `chainId`, signing with `wallet`. */
  createAdapter(chainId: number, wallet: Wallet): ChainAdapter {
    const chain = this.get(chainId);
    if (chain.rpcUrls.length === 0) {
      throw new BotError('ConfigInvalid', `${chain.name}: no rpc urls configured`);
    }
    return new EvmAdapter(chain, RpcManager.forUrls(chain.rpcUrls, chain.id), wallet);
  }
}
