import { MAX_USER_ID_LENGTH, characterLength } from '../lib/ledgerLimits.js';
import type { LedgerTx, WalletRecord } from '../repositories/ledger.repository.js';
import { InvalidUserIdError } from './ledger.errors.js';

/**
 * Wallet Store
 * One wallet per user, created lazily with a zero balance.
 */

export function requireValidUserId(userId: string): void {
  const length = characterLength(userId);
  if (length === 0 || length > MAX_USER_ID_LENGTH) {
    throw new InvalidUserIdError(MAX_USER_ID_LENGTH);
  }
}

/**
 * Gets or creates the wallet of a user. Safe under concurrent first access:
 * every caller ends up with the same row. The result is unlocked and for
 * reading only; any decision that leads to a write goes through
 * {@link lockWallets}.
 */
export async function getOrCreateWallet<THandle>(tx: LedgerTx<THandle>, userId: string): Promise<WalletRecord> {
  requireValidUserId(userId);
  return tx.ensureWallet(userId);
}

/**
 * Creates any missing wallets, then locks them all in wallet id order.
 * Returns the locked rows keyed by user id.
 */
export async function lockWallets<THandle>(
  tx: LedgerTx<THandle>,
  userIds: readonly string[]
): Promise<Map<string, WalletRecord>> {
  const unique = [...new Set(userIds)].sort();

  for (const userId of unique) {
    await getOrCreateWallet(tx, userId);
  }

  const locked = await tx.lockWallets(unique);
  return new Map(locked.map((wallet) => [wallet.userId, wallet]));
}
