import { MaxUint256, id } from 'ethers';

// ─── Chain ───────────────────────────────────────────────────────────

export const MAX_APPROVAL = MaxUint256;
export const SWAP_DEADLINE_SECONDS = 120;
export const DEX_FEE = 0.003; // UniswapV2-style pair fee per leg

/** Locker contracts; LP held here counts as locked liquidity. */
export const LP_LOCKERS: ReadonlySet<string> = new Set([
  '0x663a5c229c09b049e36dcc11a9b0d4a8eb9db214', // Unicrypt (Ethereum)
  '0xc765bddb93b0d1c1a88282ba0fa6b2d00e3e0c83', // Unicrypt (BSC)
  '0xe2fe530c047f2d85298b07d9333c05737f1435fb', // Team Finance
  '0x000000000000000000000000000000000000dead', // burn
  '0x0000000000000000000000000000000000000000',
]);

// ─── Risk ────────────────────────────────────────────────────────────

/** Owner-only functions that let a deployer trap or dilute holders. */
export const DANGEROUS_SIGNATURES = [
  'mint(address,uint256)',
  'setFees(uint256)',
  'setTaxes(uint256,uint256)',
  'setTaxFeePercent(uint256)',
  'setMaxTxAmount(uint256)',
  'addToBlacklist(address)',
  'removeFromBlacklist(address)',
  'setBlacklist(address,bool)',
  'blacklistAddress(address,bool)',
  'pause()',
] as const;

export const DANGEROUS_SELECTORS: ReadonlyMap<string, string> = new Map(
  DANGEROUS_SIGNATURES.map((sig) => [id(sig).slice(2, 10), sig.slice(0, sig.indexOf('('))]),
);

/** Addresses of long-running MEV searchers; their transactions score as MEV on sight. */
export const KNOWN_MEV_BOTS: ReadonlySet<string> = new Set([
  '0x00000000003b3cc22af3ae1eac0440bcee416b40',
  '0x000000000dfde7deaf24138722987c9a6991e2d4',
  '0x000000a52a03835517e9d193b3c27626e1bc96b1',
  '0xb4a81261b16b92af0b9f7c4a83f1e885132d81e4',
  '0xae2ebf7d5efe0e3c1a2082a1e9fd63912c42c2f5',
]);

// ─── Strategy grids ──────────────────────────────────────────────────

export const GAS_MULTIPLIERS = [1.05, 1.1, 1.15, 1.2, 1.3, 1.4, 1.5] as const;
export const AMOUNT_FRACTIONS = [0.2, 0.3, 0.4, 0.5, 0.6] as const;

export const MEV_HASH_CAPACITY = 1000;
export const MEV_HASH_LOW_WATERMARK = 800;
