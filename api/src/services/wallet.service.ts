import type {
  DeliveryFeeTransfer,
  WalletBalance,
  Transaction,
  TransactionFilters,
  TransactionType,
  WalletReconciliation,
} from '@tiffin-wallet/shared';
import { config } from '../config/index.js';
import { db, type Database, type DbTransaction } from '../lib/db.js';
import { MAX_AMOUNT } from '../lib/ledgerLimits.js';
import { Money, sumMoney } from '../lib/money.js';
import { signedAmount } from '../lib/transactionTypes.js';
import { ApiError } from '../middleware/errorHandler.js';
import { DrizzleLedgerRepository } from '../repositories/drizzleLedger.repository.js';
import { MemoryLedgerRepository, type MemoryUnit } from '../repositories/memoryLedger.repository.js';
import type {
  LedgerRepository,
  LedgerTx,
  TransactionRecord,
  WalletRecord,
} from '../repositories/ledger.repository.js';
import { adjustBalance } from './balanceAdjuster.service.js';
import { InsufficientFundsError, InvariantViolationError, StorageUnavailableError } from './ledger.errors.js';
import { appendTransaction, listWalletTransactions, requireValidReference } from './transactionLog.service.js';
import { getOrCreateWallet, lockWallets } from './walletStore.service.js';

/**
 * Wallet Service
 * Every fund movement is one named operation running in a single unit of
 * work: wallets are locked in id order, preconditions are checked under the
 * lock, each balance change is paired with its transaction record, and the
 * whole thing commits or leaves every wallet untouched.
 */

export interface DeliveryFeeResult {
  ownerBalance: Money;
  agentBalance: Money;
}

export interface LedgerReconciliation {
  userId: string;
  balance: Money;
  ledgerTotal: Money;
  transactionCount: number;
  consistent: boolean;
}

export interface DebitForOrderOptions<THandle> {
  /**
   * Runs inside the debit's unit of work, after the funds check and before
   * the debit, with the store's transaction handle. Used to create the order
   * row so that an order never exists without its debit or the reverse.
   */
  withinUnit?: (handle: THandle) => Promise<void>;
}

/** The operations the rest of the application may call. */
export interface WalletOperations {
  deposit(userId: string, amount: Money, reference: string): Promise<WalletRecord>;
  withdraw(userId: string, amount: Money, reference: string): Promise<WalletRecord>;
  debitForOrder(customerId: string, amount: Money, orderReference: string): Promise<Money>;
  creditOwnerForOrder(ownerId: string, amount: Money, orderReference: string): Promise<Money>;
  transferDeliveryFee(
    ownerId: string,
    agentId: string,
    fee: Money,
    deliveryReference: string
  ): Promise<DeliveryFeeResult>;
  getWallet(userId: string): Promise<WalletRecord>;
  getBalance(userId: string): Promise<Money>;
  listTransactions(userId: string, filters?: TransactionFilters): Promise<TransactionRecord[]>;
  reconcile(userId: string): Promise<LedgerReconciliation>;
}

type LockedWallets = Map<string, WalletRecord>;

function requireValidAmount(amount: Money): void {
  if (!amount.isPositive()) {
    throw ApiError.badRequest('WAL_002', 'Amount must be greater than 0');
  }
  if (MAX_AMOUNT.isLessThan(amount)) {
    throw ApiError.badRequest('WAL_002', `Amount must not exceed ${MAX_AMOUNT.toString()}`);
  }
}

function lockedWallet(wallets: LockedWallets, userId: string): WalletRecord {
  const wallet = wallets.get(userId);
  if (!wallet) {
    throw new InvariantViolationError(`Wallet of user ${userId} is not locked by this operation`);
  }
  return wallet;
}

function ensureSufficientFunds(wallet: WalletRecord, amount: Money): void {
  if (wallet.balance.isLessThan(amount)) {
    throw new InsufficientFundsError(wallet.userId, amount, wallet.balance);
  }
}

/**
 * Checks that a balance change and the record written for it describe the
 * same movement.
 */
function verifyPosting(
  before: WalletRecord,
  after: WalletRecord,
  record: TransactionRecord,
  amount: Money,
  delta: Money
): void {
  const problems: string[] = [];

  if (record.walletId !== after.id || after.id !== before.id) problems.push('wallet');
  if (!record.amount.equals(amount)) problems.push('amount');
  if (!signedAmount(record.type, record.amount).equals(delta)) problems.push('direction');
  if (!after.balance.equals(before.balance.add(delta))) problems.push('balance');
  if (!record.balanceAfter.equals(after.balance)) problems.push('balanceAfter');

  if (problems.length > 0) {
    throw new InvariantViolationError('Transaction record does not match its balance change', {
      walletId: before.id,
      transactionId: record.id,
      mismatched: problems,
    });
  }
}

export class WalletLedger<THandle> implements WalletOperations {
  constructor(private readonly repository: LedgerRepository<THandle>) {}

  private async run<T>(operation: string, work: (tx: LedgerTx<THandle>) => Promise<T>): Promise<T> {
    try {
      return await this.repository.transaction(work);
    } catch (error) {
      if (error instanceof StorageUnavailableError || error instanceof InvariantViolationError) {
        console.error(`[wallet] ${operation} aborted:`, error.message);
      }
      throw error;
    }
  }

  /** Balance Adjuster call plus its Transaction Log entry. */
  private async post(
    tx: LedgerTx<THandle>,
    wallets: LockedWallets,
    userId: string,
    type: TransactionType,
    amount: Money,
    reference: string
  ): Promise<WalletRecord> {
    const wallet = lockedWallet(wallets, userId);
    const delta = signedAmount(type, amount);

    const adjusted = await adjustBalance(tx, wallet, delta);
    const record = await appendTransaction(tx, adjusted, type, amount, reference);
    verifyPosting(wallet, adjusted, record, amount, delta);

    wallets.set(userId, adjusted);
    return adjusted;
  }

  async deposit(userId: string, amount: Money, reference: string): Promise<WalletRecord> {
    requireValidAmount(amount);
    requireValidReference(reference);

    return this.run('deposit', async (tx) => {
      const wallets = await lockWallets(tx, [userId]);
      return this.post(tx, wallets, userId, 'deposit', amount, reference);
    });
  }

  async withdraw(userId: string, amount: Money, reference: string): Promise<WalletRecord> {
    requireValidAmount(amount);
    requireValidReference(reference);

    return this.run('withdraw', async (tx) => {
      const wallets = await lockWallets(tx, [userId]);
      ensureSufficientFunds(lockedWallet(wallets, userId), amount);
      return this.post(tx, wallets, userId, 'withdrawal', amount, reference);
    });
  }

  async debitForOrder(
    customerId: string,
    amount: Money,
    orderReference: string,
    options: DebitForOrderOptions<THandle> = {}
  ): Promise<Money> {
    requireValidAmount(amount);
    requireValidReference(orderReference);

    return this.run('debitForOrder', async (tx) => {
      const wallets = await lockWallets(tx, [customerId]);
      ensureSufficientFunds(lockedWallet(wallets, customerId), amount);

      if (options.withinUnit) {
        await options.withinUnit(tx.handle);
      }

      const wallet = await this.post(tx, wallets, customerId, 'debit', amount, orderReference);
      return wallet.balance;
    });
  }

  async creditOwnerForOrder(ownerId: string, amount: Money, orderReference: string): Promise<Money> {
    requireValidAmount(amount);
    requireValidReference(orderReference);

    return this.run('creditOwnerForOrder', async (tx) => {
      const wallets = await lockWallets(tx, [ownerId]);
      const wallet = await this.post(tx, wallets, ownerId, 'credit_for_goods', amount, orderReference);
      return wallet.balance;
    });
  }

  /**
   * Moves the delivery fee from the owner to the delivery agent. Both wallets
   * are locked up front in wallet id order, whichever side is debited, so
   * transfers running in opposite directions cannot deadlock.
   */
  async transferDeliveryFee(
    ownerId: string,
    agentId: string,
    fee: Money,
    deliveryReference: string
  ): Promise<DeliveryFeeResult> {
    requireValidAmount(fee);
    requireValidReference(deliveryReference);

    return this.run('transferDeliveryFee', async (tx) => {
      const wallets = await lockWallets(tx, [ownerId, agentId]);
      ensureSufficientFunds(lockedWallet(wallets, ownerId), fee);

      await this.post(tx, wallets, ownerId, 'debit_for_delivery', fee, deliveryReference);
      await this.post(tx, wallets, agentId, 'delivery_earning', fee, deliveryReference);

      return {
        ownerBalance: lockedWallet(wallets, ownerId).balance,
        agentBalance: lockedWallet(wallets, agentId).balance,
      };
    });
  }

  async getWallet(userId: string): Promise<WalletRecord> {
    return this.run('getWallet', (tx) => getOrCreateWallet(tx, userId));
  }

  async getBalance(userId: string): Promise<Money> {
    const wallet = await this.getWallet(userId);
    return wallet.balance;
  }

  async listTransactions(userId: string, filters: TransactionFilters = {}): Promise<TransactionRecord[]> {
    return this.run('listTransactions', async (tx) => {
      const wallet = await getOrCreateWallet(tx, userId);
      return listWalletTransactions(tx, wallet, filters);
    });
  }

  /**
   * Compares the balance with the signed sum of the wallet's history. The
   * wallet is locked while reading so both come from the same state.
   */
  async reconcile(userId: string): Promise<LedgerReconciliation> {
    return this.run('reconcile', async (tx) => {
      const wallets = await lockWallets(tx, [userId]);
      const wallet = lockedWallet(wallets, userId);
      const records = await listWalletTransactions(tx, wallet);
      const ledgerTotal = sumMoney(records.map((record) => signedAmount(record.type, record.amount)));

      return {
        userId,
        balance: wallet.balance,
        ledgerTotal,
        transactionCount: records.length,
        consistent: ledgerTotal.equals(wallet.balance),
      };
    });
  }
}

export function createPostgresWalletLedger(database: Database = db): WalletLedger<DbTransaction> {
  return new WalletLedger(new DrizzleLedgerRepository(database, { lockTimeoutMs: config.wallet.lockTimeoutMs }));
}

export function createMemoryWalletLedger(): WalletLedger<MemoryUnit> {
  return new WalletLedger(new MemoryLedgerRepository({ lockTimeoutMs: config.wallet.lockTimeoutMs }));
}

let activeLedger: WalletOperations | null = null;

/**
 * Replaces the ledger used by the module-level helpers below
 */
export function setWalletLedger(ledger: WalletOperations): void {
  activeLedger = ledger;
}

export function getWalletLedger(): WalletOperations {
  if (!activeLedger) {
    activeLedger = config.ledger.store === 'memory' ? createMemoryWalletLedger() : createPostgresWalletLedger();
  }
  return activeLedger;
}

export const deliveryReference = (deliveryId: string | number): string => `DELIVERY:${deliveryId}`;

export function configuredDeliveryFee(): Money {
  return Money.parse(config.wallet.deliveryFee);
}

/**
 * Transforms a wallet record to the shared WalletBalance type
 */
export function toWalletBalance(wallet: WalletRecord): WalletBalance {
  return {
    userId: wallet.userId,
    balance: wallet.balance.toString(),
    updatedAt: wallet.updatedAt,
  };
}

/**
 * Transforms a transaction record to the shared Transaction type
 */
export function toTransaction(record: TransactionRecord): Transaction {
  return {
    id: record.id,
    walletId: record.walletId,
    type: record.type,
    amount: record.amount.toString(),
    balanceAfter: record.balanceAfter.toString(),
    reference: record.reference,
    createdAt: record.createdAt,
  };
}

export function toDeliveryFeeTransfer(result: DeliveryFeeResult): DeliveryFeeTransfer {
  return {
    ownerBalance: result.ownerBalance.toString(),
    agentBalance: result.agentBalance.toString(),
  };
}

export function toWalletReconciliation(result: LedgerReconciliation): WalletReconciliation {
  return {
    userId: result.userId,
    balance: result.balance.toString(),
    ledgerTotal: result.ledgerTotal.toString(),
    transactionCount: result.transactionCount,
    consistent: result.consistent,
  };
}

/**
 * Gets wallet balance for a user
 */
export async function getWalletBalance(userId: string): Promise<WalletBalance> {
  const wallet = await getWalletLedger().getWallet(userId);
  return toWalletBalance(wallet);
}

/**
 * Gets wallet transactions, newest first
 */
export async function getTransactions(userId: string, filters?: TransactionFilters): Promise<Transaction[]> {
  const records = await getWalletLedger().listTransactions(userId, filters);
  return records.map(toTransaction);
}

/**
 * Adds money to a wallet. The balance returned is the one written by the deposit.
 */
export async function addMoney(userId: string, amount: Money, reference: string): Promise<WalletBalance> {
  const wallet = await getWalletLedger().deposit(userId, amount, reference);
  return toWalletBalance(wallet);
}

/**
 * Withdraws money from a wallet to the user's bank account
 */
export async function withdrawMoney(userId: string, amount: Money, reference: string): Promise<WalletBalance> {
  const wallet = await getWalletLedger().withdraw(userId, amount, reference);
  return toWalletBalance(wallet);
}

/**
 * Pays the configured delivery fee from the owner to the delivery agent
 */
export async function payDeliveryFee(
  ownerId: string,
  agentId: string,
  deliveryId: string | number
): Promise<DeliveryFeeTransfer> {
  const result = await getWalletLedger().transferDeliveryFee(
    ownerId,
    agentId,
    configuredDeliveryFee(),
    deliveryReference(deliveryId)
  );
  return toDeliveryFeeTransfer(result);
}

export async function reconcileWallet(userId: string): Promise<WalletReconciliation> {
  const result = await getWalletLedger().reconcile(userId);
  return toWalletReconciliation(result);
}
