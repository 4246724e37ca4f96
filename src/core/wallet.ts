import { Wallet } from 'ethers';
import { logger } from '../utils/logger.js';
import { BotError, errorMessage } from '../errors.js';
import { shortenAddress } from '../utils/helpers.js';

/** Hex private key (with or without 0x) to an ethers signer. */
export function loadWallet(privateKey: string): Wallet {
  const key = privateKey.startsWith('0x') ? privateKey : `0x${privateKey}`;
  try {
    return new Wallet(key);
  } catch (err) {
    throw new BotError('ConfigInvalid', `Invalid private key: ${errorMessage(err)}`, { cause: err });
  }
}

export function logWallet(wallet: Wallet): void {
  logger.info(`[wallet] Address: ${shortenAddress(wallet.address, 6)}`);
}
