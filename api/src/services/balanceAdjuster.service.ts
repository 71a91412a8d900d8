import type { Money } from '../lib/money.js';
import type { LedgerTx, WalletRecord } from '../repositories/ledger.repository.js';
import { MAX_AMOUNT } from '../lib/ledgerLimits.js';
import { BalanceLimitError, InsufficientFundsError } from './ledger.errors.js';

/**
 * Balance Adjuster
 * The only code path that writes a wallet balance. Expects the wallet to be
 * locked by the current unit of work; writes no transaction record. Keeps the
 * balance between zero and MAX_AMOUNT.
 */
export async function adjustBalance<THandle>(
  tx: LedgerTx<THandle>,
  wallet: WalletRecord,
  delta: Money
): Promise<WalletRecord> {
  const newBalance = wallet.balance.add(delta);

  if (newBalance.isNegative()) {
    throw new InsufficientFundsError(wallet.userId, delta.abs(), wallet.balance);
  }
  if (MAX_AMOUNT.isLessThan(newBalance)) {
    throw new BalanceLimitError(wallet.userId, newBalance, MAX_AMOUNT);
  }

  return tx.saveBalance(wallet.id, newBalance);
}
