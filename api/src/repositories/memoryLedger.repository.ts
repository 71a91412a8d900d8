import { randomUUID } from 'node:crypto';
import { Money } from '../lib/money.js';
import { InvariantViolationError, StorageUnavailableError } from '../services/ledger.errors.js';
import type {
  LedgerRepository,
  LedgerTx,
  NewTransactionEntry,
  TransactionQuery,
  TransactionRecord,
  WalletRecord,
} from './ledger.repository.js';

export interface MemoryLedgerOptions {
  lockTimeoutMs?: number;
}

/**
 * What collaborators get as the transaction handle: side effects registered
 * here run only if the unit of work commits.
 */
export interface MemoryUnit {
  onCommit(effect: () => void): void;
}

/** Exclusive row lock with FIFO hand-off and a bounded wait. */
class RowLock {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  acquire(timeoutMs: number, walletId: string): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const grant = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new StorageUnavailableError(`Timed out after ${timeoutMs}ms waiting for lock on wallet ${walletId}`));
      }, timeoutMs);

      this.waiters.push(grant);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.held = false;
    }
  }
}

interface MemoryState {
  walletsByUser: Map<string, WalletRecord>;
  userByWallet: Map<string, string>;
  transactions: TransactionRecord[];
  locks: Map<string, RowLock>;
  nextTransactionId: number;
}

function newestFirst(a: TransactionRecord, b: TransactionRecord): number {
  return b.id - a.id;
}

export class MemoryLedgerTx implements LedgerTx<MemoryUnit> {
  private readonly heldLocks = new Set<string>();
  private readonly stagedWallets = new Map<string, WalletRecord>();
  private readonly stagedTransactions: TransactionRecord[] = [];
  private readonly commitEffects: Array<() => void> = [];

  readonly handle: MemoryUnit = {
    onCommit: (effect) => {
      this.commitEffects.push(effect);
    },
  };

  constructor(
    private readonly state: MemoryState,
    private readonly lockTimeoutMs: number,
  ) {}

  private current(userId: string): WalletRecord | undefined {
    const committed = this.state.walletsByUser.get(userId);
    return committed ? (this.stagedWallets.get(committed.id) ?? committed) : undefined;
  }

  async ensureWallet(userId: string): Promise<WalletRecord> {
    const existing = this.current(userId);
    if (existing) {
      return { ...existing };
    }

    // Creation is immediately visible, like a committed insert: a zero
    // balance wallet with no history is consistent whatever happens next.
    const now = new Date();
    const wallet: WalletRecord = { id: randomUUID(), userId, balance: Money.zero(), createdAt: now, updatedAt: now };
    this.state.walletsByUser.set(userId, wallet);
    this.state.userByWallet.set(wallet.id, userId);
    return { ...wallet };
  }

  async lockWallets(userIds: readonly string[]): Promise<WalletRecord[]> {
    const targets = [...new Set(userIds)].map((userId) => {
      const wallet = this.state.walletsByUser.get(userId);
      if (!wallet) {
        throw new InvariantViolationError(`Cannot lock missing wallet for user ${userId}`);
      }
      return wallet;
    });

    targets.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    for (const wallet of targets) {
      if (this.heldLocks.has(wallet.id)) {
        continue;
      }
      let lock = this.state.locks.get(wallet.id);
      if (!lock) {
        lock = new RowLock();
        this.state.locks.set(wallet.id, lock);
      }
      await lock.acquire(this.lockTimeoutMs, wallet.id);
      this.heldLocks.add(wallet.id);
    }

    return targets.map((wallet) => {
      const latest = this.current(wallet.userId);
      if (!latest) {
        throw new InvariantViolationError(`Wallet ${wallet.id} disappeared while locked`);
      }
      return { ...latest };
    });
  }

  async saveBalance(walletId: string, balance: Money): Promise<WalletRecord> {
    if (!this.heldLocks.has(walletId)) {
      throw new InvariantViolationError(`Balance of wallet ${walletId} written without holding its lock`);
    }

    const userId = this.state.userByWallet.get(walletId);
    const wallet = userId === undefined ? undefined : this.current(userId);
    if (!wallet) {
      throw new InvariantViolationError(`Wallet ${walletId} not found while saving balance`);
    }

    const updated: WalletRecord = { ...wallet, balance, updatedAt: new Date() };
    this.stagedWallets.set(walletId, updated);
    return { ...updated };
  }

  async insertTransaction(entry: NewTransactionEntry): Promise<TransactionRecord> {
    if (!this.state.userByWallet.has(entry.walletId)) {
      throw new InvariantViolationError(`Transaction references unknown wallet ${entry.walletId}`);
    }

    // Ids are consumed even if the unit rolls back, like a sequence.
    const record: TransactionRecord = { ...entry, id: this.state.nextTransactionId++, createdAt: new Date() };
    this.stagedTransactions.push(record);
    return { ...record };
  }

  async listTransactions(walletId: string, query: TransactionQuery = {}): Promise<TransactionRecord[]> {
    const offset = query.offset ?? 0;
    const visible = [...this.state.transactions, ...this.stagedTransactions]
      .filter((record) => record.walletId === walletId && (!query.type || record.type === query.type))
      .sort(newestFirst);

    const page = query.limit === undefined ? visible.slice(offset) : visible.slice(offset, offset + query.limit);
    return page.map((record) => ({ ...record }));
  }

  commit(): void {
    for (const wallet of this.stagedWallets.values()) {
      this.state.walletsByUser.set(wallet.userId, wallet);
    }
    this.state.transactions.push(...this.stagedTransactions);

    // The unit is committed at this point; a failing effect must not turn
    // that into a rejection.
    for (const effect of this.commitEffects) {
      try {
        effect();
      } catch (error) {
        console.error('[ledger] commit effect failed:', error);
      }
    }
  }

  releaseLocks(): void {
    for (const walletId of this.heldLocks) {
      this.state.locks.get(walletId)?.release();
    }
    this.heldLocks.clear();
  }
}

/**
 * In-process ledger store with per-wallet row locks and all-or-nothing
 * commits. Backs `LEDGER_STORE=memory` runs and the test suite.
 */
export class MemoryLedgerRepository implements LedgerRepository<MemoryUnit> {
  private readonly state: MemoryState = {
    walletsByUser: new Map(),
    userByWallet: new Map(),
    transactions: [],
    locks: new Map(),
    nextTransactionId: 1,
  };
  private readonly lockTimeoutMs: number;
  private online = true;

  constructor(options: MemoryLedgerOptions = {}) {
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
  }

  /** Simulates the store going away; new units of work fail to start. */
  setOnline(online: boolean): void {
    this.online = online;
  }

  async transaction<T>(work: (tx: LedgerTx<MemoryUnit>) => Promise<T>): Promise<T> {
    if (!this.online) {
      throw new StorageUnavailableError('Wallet storage unavailable: store is offline');
    }

    const tx = new MemoryLedgerTx(this.state, this.lockTimeoutMs);
    try {
      const result = await work(tx);
      tx.commit();
      return result;
    } finally {
      tx.releaseLocks();
    }
  }
}
