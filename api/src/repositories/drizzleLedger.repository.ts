import { and, asc, desc, eq, inArray, sql } from 'drizzle-orm';
import type { Database, DbTransaction } from '../lib/db.js';
import { Money } from '../lib/money.js';
import { toStorageError } from '../lib/pgErrors.js';
import { wallets, walletTransactions, type WalletRow, type WalletTransactionRow } from '../db/schema.js';
import { InvariantViolationError } from '../services/ledger.errors.js';
import type {
  LedgerRepository,
  LedgerTx,
  NewTransactionEntry,
  TransactionQuery,
  TransactionRecord,
  WalletRecord,
} from './ledger.repository.js';

export interface DrizzleLedgerOptions {
  lockTimeoutMs: number;
}

function toWalletRecord(row: WalletRow): WalletRecord {
  return {
    id: row.id,
    userId: row.userId,
    balance: Money.parse(row.balance),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toTransactionRecord(row: WalletTransactionRow): TransactionRecord {
  return {
    id: row.id,
    walletId: row.walletId,
    type: row.type,
    amount: Money.parse(row.amount),
    balanceAfter: Money.parse(row.balanceAfter),
    reference: row.reference,
    createdAt: row.createdAt,
  };
}

class DrizzleLedgerTx implements LedgerTx<DbTransaction> {
  constructor(readonly handle: DbTransaction) {}

  async ensureWallet(userId: string): Promise<WalletRecord> {
    // A concurrent inserter blocks on the unique index until the first one
    // commits, then does nothing and reads the committed row.
    await this.handle
      .insert(wallets)
      .values({ userId, balance: '0.00' })
      .onConflictDoNothing({ target: wallets.userId });

    const [row] = await this.handle.select().from(wallets).where(eq(wallets.userId, userId)).limit(1);

    if (!row) {
      throw new InvariantViolationError(`Wallet for user ${userId} vanished after creation`);
    }

    return toWalletRecord(row);
  }

  async lockWallets(userIds: readonly string[]): Promise<WalletRecord[]> {
    const unique = [...new Set(userIds)];

    const rows = await this.handle
      .select()
      .from(wallets)
      .where(inArray(wallets.userId, unique))
      .orderBy(asc(wallets.id))
      .for('update');

    if (rows.length !== unique.length) {
      throw new InvariantViolationError('Locked fewer wallets than requested', {
        requested: unique,
        locked: rows.map((row) => row.userId),
      });
    }

    return rows.map(toWalletRecord);
  }

  async saveBalance(walletId: string, balance: Money): Promise<WalletRecord> {
    const [row] = await this.handle
      .update(wallets)
      .set({ balance: balance.toString(), updatedAt: new Date() })
      .where(eq(wallets.id, walletId))
      .returning();

    if (!row) {
      throw new InvariantViolationError(`Wallet ${walletId} not found while saving balance`);
    }

    return toWalletRecord(row);
  }

  async insertTransaction(entry: NewTransactionEntry): Promise<TransactionRecord> {
    const [row] = await this.handle
      .insert(walletTransactions)
      .values({
        walletId: entry.walletId,
        type: entry.type,
        amount: entry.amount.toString(),
        balanceAfter: entry.balanceAfter.toString(),
        reference: entry.reference,
      })
      .returning();

    if (!row) {
      throw new InvariantViolationError(`Transaction for wallet ${entry.walletId} was not written`);
    }

    return toTransactionRecord(row);
  }

  async listTransactions(walletId: string, query: TransactionQuery = {}): Promise<TransactionRecord[]> {
    let statement = this.handle
      .select()
      .from(walletTransactions)
      .where(
        and(
          eq(walletTransactions.walletId, walletId),
          query.type ? eq(walletTransactions.type, query.type) : undefined,
        ),
      )
      .orderBy(desc(walletTransactions.id))
      .$dynamic();

    if (query.limit !== undefined) {
      statement = statement.limit(query.limit);
    }
    if (query.offset) {
      statement = statement.offset(query.offset);
    }

    const rows = await statement;
    return rows.map(toTransactionRecord);
  }
}

/**
 * PostgreSQL-backed ledger. Each unit of work is one database transaction
 * with a bounded wait for row locks.
 */
export class DrizzleLedgerRepository implements LedgerRepository<DbTransaction> {
  constructor(
    private readonly db: Database,
    private readonly options: DrizzleLedgerOptions,
  ) {}

  async transaction<T>(work: (tx: LedgerTx<DbTransaction>) => Promise<T>): Promise<T> {
    const lockTimeoutMs = Math.max(1, Math.trunc(this.options.lockTimeoutMs));

    try {
      return await this.db.transaction(async (handle) => {
        await handle.execute(sql.raw(`SET LOCAL lock_timeout = ${lockTimeoutMs}`));
        return work(new DrizzleLedgerTx(handle));
      });
    } catch (error) {
      throw toStorageError(error);
    }
  }
}
