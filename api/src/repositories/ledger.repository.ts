import type { TransactionType } from '@tiffin-wallet/shared';
import type { Money } from '../lib/money.js';

export interface WalletRecord {
  id: string;
  userId: string;
  balance: Money;
  createdAt: Date;
  updatedAt: Date;
}

export interface TransactionRecord {
  id: number;
  walletId: string;
  type: TransactionType;
  amount: Money;
  balanceAfter: Money;
  reference: string;
  createdAt: Date;
}

export interface NewTransactionEntry {
  walletId: string;
  type: TransactionType;
  amount: Money;
  balanceAfter: Money;
  reference: string;
}

export interface TransactionQuery {
  type?: TransactionType;
  limit?: number;
  offset?: number;
}

/**
 * One atomic unit of work against the ledger tables. Everything done through
 * a LedgerTx commits together when the callback given to
 * {@link LedgerRepository.transaction} resolves, and is discarded when it throws.
 *
 * `handle` is the store's own transaction handle, exposed so collaborators
 * (order creation) can write in the same unit of work.
 */
export interface LedgerTx<THandle> {
  readonly handle: THandle;

  /** Returns the user's wallet, inserting a zero-balance row if none exists. */
  ensureWallet(userId: string): Promise<WalletRecord>;

  /**
   * Takes the row lock of each user's wallet, in ascending wallet id order,
   * and returns the rows as seen under the lock. Wallets must already exist.
   */
  lockWallets(userIds: readonly string[]): Promise<WalletRecord[]>;

  /** Persists a new balance. The caller must hold the wallet's lock. */
  saveBalance(walletId: string, balance: Money): Promise<WalletRecord>;

  insertTransaction(entry: NewTransactionEntry): Promise<TransactionRecord>;

  /**
   * Newest first by id. Ids are drawn while the wallet lock is held, so id
   * order is the order the changes were applied in.
   */
  listTransactions(walletId: string, query?: TransactionQuery): Promise<TransactionRecord[]>;
}

export interface LedgerRepository<THandle> {
  transaction<T>(work: (tx: LedgerTx<THandle>) => Promise<T>): Promise<T>;
}
