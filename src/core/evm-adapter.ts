import {
  WebSocketProvider,
  ZeroAddress,
  type Block,
  type Interface,
  type JsonRpcProvider,
  type Result,
  type TransactionReceipt,
  type TransactionResponse,
  type Wallet,
} from 'ethers';
import { logger } from '../utils/logger.js';
import { BotError, errorMessage, toBotError } from '../errors.js';
import { RpcManager } from './rpc-manager.js';
import { PrivateRelay } from './private-relay.js';
import { erc20Interface, factoryInterface, pairInterface, routerInterface } from './router-abi.js';
import { applyOverrides, type BundleSimulation, type ChainAdapter, type TxOverrides, type Unsubscribe } from './chain-adapter.js';
import type {
  ChainBlock,
  ChainConfig,
  ChainReceipt,
  ChainTransaction,
  PairReserves,
  TokenInfo,
  TxRequest,
} from '../types.js';

/**
 * ChainAdapter over ethers v6: HTTP reads through RpcManager, pending
 * transactions over WebSocket when the chain has a ws url, optional relay.
 */
export class EvmAdapter implements ChainAdapter {
  readonly router: Interface = routerInterface;
  private readonly relay: PrivateRelay | null;
  private wsProvider: WebSocketProvider | null = null;

  constructor(
    readonly chain: ChainConfig,
    private readonly rpc: RpcManager<JsonRpcProvider>,
    private readonly wallet: Wallet,
  ) {
    this.relay = chain.relayUrl ? new PrivateRelay(chain.relayUrl, wallet) : null;
    if (this.relay) {
      this.sendPrivateBundle = (txs, block) => this.relayOrThrow().sendBundle(txs, block);
      this.simulateBundle = (txs, block) => this.relayOrThrow().simulateBundle(txs, block);
    }
  }

  sendPrivateBundle?: (signedTxs: string[], targetBlock: number) => Promise<string>;
  simulateBundle?: (signedTxs: string[], targetBlock: number) => Promise<BundleSimulation>;

  get walletAddress(): string {
    return this.wallet.address;
  }

  // ─── Reads ─────────────────────────────────────────────────────────

  getBlockNumber(): Promise<number> {
    return this.read('getBlockNumber', (p) => p.getBlockNumber());
  }

  async getBlockWithTransactions(blockNumber: number): Promise<ChainBlock | null> {
    const block = await this.read('getBlock', (p) => p.getBlock(blockNumber, true));
    return block ? toChainBlock(block) : null;
  }

  async getTransaction(hash: string): Promise<ChainTransaction | null> {
    const tx = await this.read('getTransaction', (p) => p.getTransaction(hash));
    return tx ? toChainTx(tx) : null;
  }

  async getTransactionReceipt(hash: string): Promise<ChainReceipt | null> {
    const receipt = await this.read('getTransactionReceipt', (p) => p.getTransactionReceipt(hash));
    return receipt ? toChainReceipt(receipt) : null;
  }

  async getGasPrice(): Promise<bigint> {
    const fee = await this.read('getFeeData', (p) => p.getFeeData());
    if (fee.gasPrice === null) throw new BotError('ChainUnavailable', `${this.chain.name}: node returned no gas price`);
    return fee.gasPrice;
  }

  async getBaseFee(): Promise<bigint | null> {
    if (!this.chain.eip1559) return null;
    const block = await this.read('getBlock', (p) => p.getBlock('latest'));
    return block?.baseFeePerGas ?? null;
  }

  getTransactionCount(address: string): Promise<number> {
    return this.read('getTransactionCount', (p) => p.getTransactionCount(address, 'pending'));
  }

  getBalance(address: string): Promise<bigint> {
    return this.read('getBalance', (p) => p.getBalance(address));
  }

  async getTokenBalance(token: string, owner: string): Promise<bigint> {
    const res = await this.view(token, erc20Interface, 'balanceOf', [owner]);
    return bigintAt(res, 0);
  }

  async getAllowance(token: string, owner: string, spender: string): Promise<bigint> {
    const res = await this.view(token, erc20Interface, 'allowance', [owner, spender]);
    return bigintAt(res, 0);
  }

  async getAmountsOut(amountIn: bigint, path: string[]): Promise<bigint[]> {
    const res = await this.view(this.chain.router, routerInterface, 'getAmountsOut', [amountIn, path]);
    const amounts: unknown = res[0];
    if (!Array.isArray(amounts)) throw new BotError('Unknown', 'getAmountsOut returned no array');
    return amounts.map((a: unknown) => {
      if (typeof a !== 'bigint') throw new BotError('Unknown', 'getAmountsOut returned a non-integer');
      return a;
    });
  }

  async getPair(tokenA: string, tokenB: string): Promise<string | null> {
    const res = await this.view(this.chain.factory, factoryInterface, 'getPair', [tokenA, tokenB]);
    const pair = stringAt(res, 0);
    return pair === ZeroAddress ? null : pair;
  }

  async getReserves(pair: string): Promise<PairReserves | null> {
    try {
      const [t0, t1, reserves] = await Promise.all([
        this.view(pair, pairInterface, 'token0', []),
        this.view(pair, pairInterface, 'token1', []),
        this.view(pair, pairInterface, 'getReserves', []),
      ]);
      return {
        pair,
        token0: stringAt(t0, 0),
        token1: stringAt(t1, 0),
        reserve0: bigintAt(reserves, 0),
        reserve1: bigintAt(reserves, 1),
      };
    } catch (err) {
      logger.debug(`[chain] getReserves(${pair}) failed: ${errorMessage(err)}`);
      return null;
    }
  }

  async getTokenInfo(token: string): Promise<TokenInfo> {
    const [symbol, decimals, supply] = await Promise.all([
      this.view(token, erc20Interface, 'symbol', []).then((r) => stringAt(r, 0)).catch(() => '???'),
      this.view(token, erc20Interface, 'decimals', []).then((r) => Number(bigintAt(r, 0))),
      this.view(token, erc20Interface, 'totalSupply', []).then((r) => bigintAt(r, 0)),
    ]);
    return { symbol, decimals, totalSupply: supply };
  }

  getCode(address: string): Promise<string> {
    return this.read('getCode', (p) => p.getCode(address));
  }

  estimateGas(tx: TxRequest): Promise<bigint> {
    return this.read('estimateGas', (p) => p.estimateGas({ ...tx, from: this.wallet.address }));
  }

  call(tx: TxRequest): Promise<string> {
    return this.read('call', (p) => p.call({ ...tx, from: this.wallet.address }));
  }

  async subscribePendingTransactions(
    onTx: (tx: ChainTransaction) => void,
    onError: (err: Error) => void,
  ): Promise<Unsubscribe> {
    if (!this.chain.wsUrl) {
      throw new BotError('ChainUnavailable', `${this.chain.name}: no websocket endpoint for pending transactions`);
    }
    const ws = new WebSocketProvider(this.chain.wsUrl, this.chain.id, { staticNetwork: true });
    this.wsProvider = ws;

    await ws.on('pending', (hash: string) => {
      ws.getTransaction(hash)
        .then((tx) => {
          if (tx) onTx(toChainTx(tx));
        })
        .catch((err: unknown) => onError(toBotError(err, 'pending tx lookup')));
    });
    await ws.on('error', (err: unknown) => onError(toBotError(err, 'websocket')));

    logger.info(`[chain] ${this.chain.name}: subscribed to pending transactions`);
    return async () => {
      await ws.removeAllListeners();
      await ws.destroy();
      if (this.wsProvider === ws) this.wsProvider = null;
    };
  }

  // ─── Writes ────────────────────────────────────────────────────────

  signTransaction(tx: TxRequest): Promise<string> {
    return this.wallet.signTransaction({
      ...tx,
      chainId: tx.chainId ?? this.chain.id,
      type: tx.maxFeePerGas !== undefined ? 2 : 0,
    });
  }

  async sendTransaction(signed: string): Promise<string> {
    const provider = await this.rpc.acquire();
    try {
      const response = await provider.broadcastTransaction(signed);
      return response.hash;
    } catch (err) {
      throw toBotError(err, 'sendTransaction');
    }
  }

  async approveToken(token: string, spender: string, amount: bigint, overrides: TxOverrides): Promise<string> {
    const request: TxRequest = {
      to: token,
      data: erc20Interface.encodeFunctionData('approve', [spender, amount]),
      value: 0n,
    };
    const signed = await this.signTransaction(applyOverrides(request, overrides, this.chain.id));
    return this.sendTransaction(signed);
  }

  destroy(): void {
    this.rpc.destroy();
    this.wsProvider?.destroy().catch((err: unknown) => {
      logger.debug(`[chain] ws destroy: ${errorMessage(err)}`);
    });
  }

  private relayOrThrow(): PrivateRelay {
    if (!this.relay) throw new BotError('ChainUnavailable', `${this.chain.name}: no private relay configured`);
    return this.relay;
  }

  private async read<T>(label: string, fn: (p: JsonRpcProvider) => Promise<T>): Promise<T> {
    const provider = await this.rpc.acquire();
    try {
      return await fn(provider);
    } catch (err) {
      throw toBotError(err, `${this.chain.name} ${label}`);
    }
  }

  private view(to: string, iface: Interface, fn: string, args: unknown[]): Promise<Result> {
    return this.read(fn, async (p) => {
      const raw = await p.call({ to, data: iface.encodeFunctionData(fn, args) });
      return iface.decodeFunctionResult(fn, raw);
    });
  }
}

// ─── Mapping ─────────────────────────────────────────────────────────

function bigintAt(res: Result, index: number): bigint {
  const value: unknown = res[index];
  if (typeof value !== 'bigint') throw new BotError('Unknown', `expected integer at result[${index}]`);
  return value;
}

function stringAt(res: Result, index: number): string {
  const value: unknown = res[index];
  if (typeof value !== 'string') throw new BotError('Unknown', `expected string at result[${index}]`);
  return value;
}

export function toChainTx(tx: TransactionResponse): ChainTransaction {
  return {
    hash: tx.hash,
    from: tx.from,
    to: tx.to,
    value: tx.value,
    data: tx.data,
    nonce: tx.nonce,
    gasPrice: tx.gasPrice > 0n ? tx.gasPrice : (tx.maxFeePerGas ?? 0n),
    maxFeePerGas: tx.maxFeePerGas ?? undefined,
    maxPriorityFeePerGas: tx.maxPriorityFeePerGas ?? undefined,
    blockNumber: tx.blockNumber,
    transactionIndex: tx.index ?? null,
  };
}

function toChainBlock(block: Block): ChainBlock {
  return {
    number: block.number,
    timestamp: block.timestamp,
    baseFeePerGas: block.baseFeePerGas,
    transactions: block.prefetchedTransactions.map(toChainTx),
  };
}

function toChainReceipt(receipt: TransactionReceipt): ChainReceipt {
  return {
    hash: receipt.hash,
    status: receipt.status === 1 ? 'success' : 'reverted',
    blockNumber: receipt.blockNumber,
    transactionIndex: receipt.index,
    gasUsed: receipt.gasUsed,
    effectiveGasPrice: receipt.gasPrice,
  };
}
