import type { Interface, TransactionDescription } from 'ethers';
import { SWAP_METHODS, isNativeInMethod, isNativeOutMethod } from '../core/router-abi.js';
import { addrKey } from '../utils/helpers.js';

export interface DecodedSwap {
  method: string;
  selector: string;
  path: string[];
  amountIn: bigint | null;
  amountOutMin: bigint | null;
  nativeIn: boolean;
  nativeOut: boolean;
}

function arg(desc: TransactionDescription, name: string): unknown {
  const index = desc.fragment.inputs.findIndex((p) => p.name === name);
  return index >= 0 ? desc.args[index] : undefined;
}

function asBigint(v: unknown): bigint | null {
  return typeof v === 'bigint' ? v : null;
}

function asAddressList(v: unknown): string[] | null {
  if (!Array.isArray(v)) return null;
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== 'string') return null;
    out.push(item);
  }
  return out;
}

/** True when the 4-byte selector belongs to a router swap method. */
export function isSwapSelector(router: Interface, data: string): boolean {
  if (data.length < 10) return false;
  const fragment = router.getFunction(data.slice(0, 10));
  return fragment !== null && SWAP_METHODS.has(fragment.name);
}

/** Decodes swap-family calldata; anything else yields null. */
export function decodeSwap(router: Interface, data: string, value: bigint): DecodedSwap | null {
  if (!isSwapSelector(router, data)) return null;

  let desc: TransactionDescription | null;
  try {
    desc = router.parseTransaction({ data, value });
  } catch {
    return null;
  }
  if (!desc) return null;

  const path = asAddressList(arg(desc, 'path'));
  if (!path || path.length < 2) return null;

  const nativeIn = isNativeInMethod(desc.name);
  return {
    method: desc.name,
    selector: desc.selector,
    path,
    amountIn: nativeIn ? value : asBigint(arg(desc, 'amountIn')),
    amountOutMin: asBigint(arg(desc, 'amountOutMin')) ?? asBigint(arg(desc, 'amountOut')),
    nativeIn,
    nativeOut: isNativeOutMethod(desc.name),
  };
}

/** Last address in the path that is not the wrapped native token. */
export function targetToken(path: readonly string[], wrappedNative: string): string | null {
  const wrapped = addrKey(wrappedNative);
  for (let i = path.length - 1; i >= 0; i--) {
    const a = path[i];
    if (a !== undefined && addrKey(a) !== wrapped) return a;
  }
  return null;
}
