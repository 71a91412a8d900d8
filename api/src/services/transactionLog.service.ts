import type { TransactionType } from '@tiffin-wallet/shared';
import type { Money } from '../lib/money.js';
import type {
  LedgerTx,
  TransactionQuery,
  TransactionRecord,
  WalletRecord,
} from '../repositories/ledger.repository.js';
import { MAX_REFERENCE_LENGTH, characterLength } from '../lib/ledgerLimits.js';
import { InvalidReferenceError, InvariantViolationError } from './ledger.errors.js';

/**
 * Transaction Log
 * Append-only history of balance changes. Records are never updated or removed.
 */

export function requireValidReference(reference: string): void {
  if (characterLength(reference) > MAX_REFERENCE_LENGTH) {
    throw new InvalidReferenceError(MAX_REFERENCE_LENGTH);
  }
}

export async function appendTransaction<THandle>(
  tx: LedgerTx<THandle>,
  wallet: WalletRecord,
  type: TransactionType,
  amount: Money,
  reference: string
): Promise<TransactionRecord> {
  requireValidReference(reference);

  if (!amount.isPositive()) {
    throw new InvariantViolationError('Transaction amount must be a positive magnitude', {
      walletId: wallet.id,
      type,
      amount: amount.toString(),
    });
  }

  return tx.insertTransaction({
    walletId: wallet.id,
    type,
    amount,
    balanceAfter: wallet.balance,
    reference,
  });
}

export async function listWalletTransactions<THandle>(
  tx: LedgerTx<THandle>,
  wallet: WalletRecord,
  query?: TransactionQuery
): Promise<TransactionRecord[]> {
  return tx.listTransactions(wallet.id, query);
}
