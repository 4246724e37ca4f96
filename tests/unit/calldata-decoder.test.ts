import { describe, it, expect } from 'vitest';
import { decodeSwap, isSwapSelector, targetToken } from '../../src/detection/calldata-decoder.js';
import { erc20Interface, routerInterface } from '../../src/core/router-abi.js';
import { ROUTER, VICTIM, WETH, tokenAddress } from '../helpers/fake-chain-adapter.js';

const TOKEN = tokenAddress(1);
const E18 = 10n ** 18n;

describe('decodeSwap', () => {
  it('should decode a native-in buy with the value as amountIn', () => {
    const data = routerInterface.encodeFunctionData('swapExactETHForTokens', [123n, [WETH, TOKEN], VICTIM, 9_999_999_999n]);

    const swap = decodeSwap(routerInterface, data, 2n * E18);

    expect(swap).toEqual({
      method: 'swapExactETHForTokens',
      selector: data.slice(0, 10),
      path: [WETH, TOKEN],
      amountIn: 2n * E18,
      amountOutMin: 123n,
      nativeIn: true,
      nativeOut: false,
    });
  });

  it('should decode a fee-on-transfer sell', () => {
    const data = routerInterface.encodeFunctionData('swapExactTokensForETHSupportingFeeOnTransferTokens', [
      500n,
      7n,
      [TOKEN, WETH],
      VICTIM,
      1n,
    ]);

    const swap = decodeSwap(routerInterface, data, 0n);

    expect(swap?.amountIn).toBe(500n);
    expect(swap?.amountOutMin).toBe(7n);
    expect(swap?.nativeIn).toBe(false);
    expect(swap?.nativeOut).toBe(true);
  });

  it('should read amountOut as the minimum for exact-output buys', () => {
    const data = routerInterface.encodeFunctionData('swapETHForExactTokens', [42n, [WETH, TOKEN], VICTIM, 1n]);

    expect(decodeSwap(routerInterface, data, E18)?.amountOutMin).toBe(42n);
  });

  it('should ignore calldata that is not a swap', () => {
    const approve = erc20Interface.encodeFunctionData('approve', [ROUTER, 1n]);
    const quote = routerInterface.encodeFunctionData('getAmountsOut', [1n, [WETH, TOKEN]]);

    expect(decodeSwap(routerInterface, approve, 0n)).toBeNull();
    expect(decodeSwap(routerInterface, quote, 0n)).toBeNull();
    expect(decodeSwap(routerInterface, '0x', 0n)).toBeNull();
  });

  it('should reject truncated swap calldata', () => {
    const data = routerInterface.encodeFunctionData('swapExactETHForTokens', [1n, [WETH, TOKEN], VICTIM, 1n]);

    expect(isSwapSelector(routerInterface, data.slice(0, 10))).toBe(true);
    expect(decodeSwap(routerInterface, data.slice(0, 40), E18)).toBeNull();
  });
});

describe('targetToken', () => {
  it('should pick the last non-native hop', () => {
    expect(targetToken([WETH, TOKEN], WETH)).toBe(TOKEN);
    expect(targetToken([TOKEN, WETH], WETH.toLowerCase())).toBe(TOKEN);
    expect(targetToken([WETH], WETH)).toBeNull();
  });
});
