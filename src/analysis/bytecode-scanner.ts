import { DANGEROUS_SELECTORS } from '../constants.js';

const PUSH4 = '63';

/**
 * Names of owner-only functions whose selectors appear in the runtime
 * bytecode's dispatcher. Solidity compares the calldata selector against
 * PUSH4 constants, so `63` followed by the selector marks a match.
 */
export function scanDangerousFunctions(bytecode: string): string[] {
  const code = (bytecode.startsWith('0x') ? bytecode.slice(2) : bytecode).toLowerCase();
  if (code.length === 0) return [];

  const found = new Set<string>();
  for (const [selector, name] of DANGEROUS_SELECTORS) {
    if (code.includes(PUSH4 + selector)) found.add(name);
  }
  return [...found].sort();
}

export function isContractCode(bytecode: string): boolean {
  return bytecode !== '' && bytecode !== '0x';
}
