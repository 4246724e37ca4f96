import { keccak256, type Interface } from 'ethers';
import type {
  ChainBlock,
  ChainConfig,
  ChainReceipt,
  ChainTransaction,
  GasSetting,
  PairReserves,
  TokenInfo,
  TxRequest,
} from '../types.js';

export interface TxOverrides {
  nonce: number;
  gasLimit: bigint;
  gas: GasSetting;
}

export interface BundleSimulation {
  success: boolean;
  gasUsed: bigint;
  error?: string;
}

export type Unsubscribe = () => Promise<void>;

/**
 * Uniform access to one EVM network. Chain differences (swap names,
 * wrapped native, fee model) live in ChainConfig, not in subclasses.
 */
export interface ChainAdapter {
  readonly chain: ChainConfig;
  readonly walletAddress: string;
  /** Router ABI, exposed for calldata decoding. */
  readonly router: Interface;

  // ─── Reads ─────────────────────────────────────────────────────────
  getBlockNumber(): Promise<number>;
  getBlockWithTransactions(blockNumber: number): Promise<ChainBlock | null>;
  getTransaction(hash: string): Promise<ChainTransaction | null>;
  getTransactionReceipt(hash: string): Promise<ChainReceipt | null>;
  getGasPrice(): Promise<bigint>;
  /** null on chains without EIP-1559 base fees. */
  getBaseFee(): Promise<bigint | null>;
  getTransactionCount(address: string): Promise<number>;
  getBalance(address: string): Promise<bigint>;
  getTokenBalance(token: string, owner: string): Promise<bigint>;
  getAllowance(token: string, owner: string, spender: string): Promise<bigint>;
  getAmountsOut(amountIn: bigint, path: string[]): Promise<bigint[]>;
  getPair(tokenA: string, tokenB: string): Promise<string | null>;
  getReserves(pair: string): Promise<PairReserves | null>;
  getTokenInfo(token: string): Promise<TokenInfo>;
  getCode(address: string): Promise<string>;
  estimateGas(tx: TxRequest): Promise<bigint>;
  /** Static call from the wallet; resolves with return data or rejects with the revert. */
  call(tx: TxRequest): Promise<string>;
  /**
   * Push feed of pending transactions. Rejects with ChainUnavailable when the
   * endpoint has no push transport; callers fall back to block polling.
   */
  subscribePendingTransactions(
    onTx: (tx: ChainTransaction) => void,
    onError: (err: Error) => void,
  ): Promise<Unsubscribe>;

  // ─── Writes ────────────────────────────────────────────────────────
  signTransaction(tx: TxRequest): Promise<string>;
  sendTransaction(signed: string): Promise<string>;
  approveToken(token: string, spender: string, amount: bigint, overrides: TxOverrides): Promise<string>;

  // ─── Optional private relay ────────────────────────────────────────
  sendPrivateBundle?(signedTxs: string[], targetBlock: number): Promise<string>;
  simulateBundle?(signedTxs: string[], targetBlock: number): Promise<BundleSimulation>;
}

export function hasPrivateRelay(
  adapter: ChainAdapter,
): adapter is ChainAdapter & Required<Pick<ChainAdapter, 'sendPrivateBundle'>> {
  return typeof adapter.sendPrivateBundle === 'function';
}

export function applyOverrides(tx: TxRequest, overrides: TxOverrides, chainId: number): TxRequest {
  const base: TxRequest = { ...tx, nonce: overrides.nonce, gasLimit: overrides.gasLimit, chainId };
  if (overrides.gas.kind === 'legacy') {
    return { ...base, gasPrice: overrides.gas.gasPrice };
  }
  return {
    ...base,
    maxFeePerGas: overrides.gas.maxFeePerGas,
    maxPriorityFeePerGas: overrides.gas.maxPriorityFeePerGas,
  };
}

/** The price a transaction pays at most per gas unit. */
export function gasCeiling(gas: GasSetting): bigint {
  return gas.kind === 'legacy' ? gas.gasPrice : gas.maxFeePerGas;
}

/** Hash of a signed raw transaction: keccak256 over its serialized bytes. */
export function hashOfSigned(signed: string): string {
  return keccak256(signed);
}
