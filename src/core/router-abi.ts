import { Interface } from 'ethers';

/**
 * UniswapV2-style router. Includes the AVAX-named variants used by
 * Trader Joe so one Interface decodes every configured chain.
 */
export const ROUTER_ABI = [
  'function factory() view returns (address)',
  'function getAmountsOut(uint256 amountIn, address[] path) view returns (uint256[] amounts)',
  'function swapExactETHForTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable returns (uint256[] amounts)',
  'function swapETHForExactTokens(uint256 amountOut, address[] path, address to, uint256 deadline) payable returns (uint256[] amounts)',
  'function swapExactTokensForETH(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) returns (uint256[] amounts)',
  'function swapExactTokensForTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) returns (uint256[] amounts)',
  'function swapExactETHForTokensSupportingFeeOnTransferTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable',
  'function swapExactTokensForETHSupportingFeeOnTransferTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline)',
  'function swapExactTokensForTokensSupportingFeeOnTransferTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline)',
  'function swapExactAVAXForTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable returns (uint256[] amounts)',
  'function swapExactTokensForAVAX(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) returns (uint256[] amounts)',
  'function swapExactAVAXForTokensSupportingFeeOnTransferTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable',
  'function swapExactTokensForAVAXSupportingFeeOnTransferTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline)',
] as const;

export const ERC20_ABI = [
  'function symbol() view returns (string)',
  'function decimals() view returns (uint8)',
  'function totalSupply() view returns (uint256)',
  'function balanceOf(address owner) view returns (uint256)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function approve(address spender, uint256 amount) returns (bool)',
] as const;

export const FACTORY_ABI = [
  'function getPair(address tokenA, address tokenB) view returns (address pair)',
] as const;

export const PAIR_ABI = [
  'function token0() view returns (address)',
  'function token1() view returns (address)',
  'function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)',
] as const;

export const routerInterface = new Interface(ROUTER_ABI);
export const erc20Interface = new Interface(ERC20_ABI);
export const factoryInterface = new Interface(FACTORY_ABI);
export const pairInterface = new Interface(PAIR_ABI);

/** Swap-family methods whose calldata the mempool tracker decodes. */
export const SWAP_METHODS: ReadonlySet<string> = new Set(
  ROUTER_ABI.filter((f) => f.startsWith('function swap')).map((f) => f.slice('function '.length, f.indexOf('('))),
);

/** Methods that spend native value, i.e. buys. */
export function isNativeInMethod(method: string): boolean {
  return /^swap(Exact)?(ETH|AVAX)For/.test(method);
}

export function isNativeOutMethod(method: string): boolean {
  return /For(ETH|AVAX)(SupportingFeeOnTransferTokens)?$/.test(method);
}
