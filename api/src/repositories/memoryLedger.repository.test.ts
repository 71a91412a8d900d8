import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Money } from '../lib/money.js';
import { InvariantViolationError, StorageUnavailableError } from '../services/ledger.errors.js';
import { MemoryLedgerRepository } from './memoryLedger.repository.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = () => done();
  });
  return { promise, resolve };
}

describe('MemoryLedgerRepository', () => {
  let store: MemoryLedgerRepository;

  beforeEach(() => {
    store = new MemoryLedgerRepository({ lockTimeoutMs: 25 });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('creates a single zero-balance wallet under concurrent first access', async () => {
    const wallets = await Promise.all(
      Array.from({ length: 5 }, () => store.transaction((tx) => tx.ensureWallet('user-1')))
    );

    expect(new Set(wallets.map((wallet) => wallet.id)).size).toBe(1);
    expect(wallets.map((wallet) => wallet.balance.toString())).toEqual(['0.00', '0.00', '0.00', '0.00', '0.00']);
  });

  it('discards staged balances and records when the unit of work throws', async () => {
    await expect(
      store.transaction(async (tx) => {
        const wallet = await tx.ensureWallet('user-1');
        await tx.lockWallets(['user-1']);
        await tx.saveBalance(wallet.id, Money.parse('50'));
        await tx.insertTransaction({
          walletId: wallet.id,
          type: 'deposit',
          amount: Money.parse('50'),
          balanceAfter: Money.parse('50'),
          reference: 'DEP:1',
        });
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    const after = await store.transaction(async (tx) => {
      const wallet = await tx.ensureWallet('user-1');
      return { balance: wallet.balance.toString(), records: await tx.listTransactions(wallet.id) };
    });

    expect(after).toEqual({ balance: '0.00', records: [] });
  });

  it('shows a unit of work its own staged writes', async () => {
    const seen = await store.transaction(async (tx) => {
      const wallet = await tx.ensureWallet('user-1');
      await tx.lockWallets(['user-1']);
      await tx.saveBalance(wallet.id, Money.parse('12.5'));
      await tx.insertTransaction({
        walletId: wallet.id,
        type: 'deposit',
        amount: Money.parse('12.5'),
        balanceAfter: Money.parse('12.5'),
        reference: 'DEP:1',
      });

      const [relocked] = await tx.lockWallets(['user-1']);
      const records = await tx.listTransactions(wallet.id);
      return { balance: relocked?.balance.toString(), references: records.map((record) => record.reference) };
    });

    expect(seen).toEqual({ balance: '12.50', references: ['DEP:1'] });
  });

  it('refuses a balance write from a unit of work that does not hold the lock', async () => {
    await expect(
      store.transaction(async (tx) => {
        const wallet = await tx.ensureWallet('user-1');
        return tx.saveBalance(wallet.id, Money.parse('10'));
      })
    ).rejects.toBeInstanceOf(InvariantViolationError);
  });

  it('refuses to lock a wallet that was never created', async () => {
    await expect(store.transaction((tx) => tx.lockWallets(['ghost']))).rejects.toBeInstanceOf(InvariantViolationError);
  });

  it('times out waiting for a lock held by another unit of work', async () => {
    await store.transaction((tx) => tx.ensureWallet('user-1'));
    const locked = deferred();
    const gate = deferred();

    const holder = store.transaction(async (tx) => {
      await tx.lockWallets(['user-1']);
      locked.resolve();
      await gate.promise;
    });
    await locked.promise;

    await expect(store.transaction((tx) => tx.lockWallets(['user-1']))).rejects.toBeInstanceOf(StorageUnavailableError);

    gate.resolve();
    await holder;

    await expect(store.transaction((tx) => tx.lockWallets(['user-1']))).resolves.toHaveLength(1);
  });

  it('hands a released lock to waiters in arrival order', async () => {
    const patient = new MemoryLedgerRepository({ lockTimeoutMs: 1000 });
    await patient.transaction((tx) => tx.ensureWallet('user-1'));
    const locked = deferred();
    const gate = deferred();
    const order: string[] = [];

    const holder = patient.transaction(async (tx) => {
      await tx.lockWallets(['user-1']);
      locked.resolve();
      await gate.promise;
      order.push('holder');
    });
    await locked.promise;

    const first = patient.transaction(async (tx) => {
      await tx.lockWallets(['user-1']);
      order.push('first');
    });
    const second = patient.transaction(async (tx) => {
      await tx.lockWallets(['user-1']);
      order.push('second');
    });

    gate.resolve();
    await Promise.all([holder, first, second]);

    expect(order).toEqual(['holder', 'first', 'second']);
  });

  it('runs commit effects only when the unit of work commits', async () => {
    const effects: string[] = [];

    await store.transaction(async (tx) => {
      tx.handle.onCommit(() => effects.push('committed'));
    });
    await expect(
      store.transaction(async (tx) => {
        tx.handle.onCommit(() => effects.push('rolled back'));
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(effects).toEqual(['committed']);
  });

  it('reports a committed unit as committed when a commit effect throws', async () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    const effects: string[] = [];

    const wallet = await store.transaction(async (tx) => {
      const created = await tx.ensureWallet('user-1');
      await tx.lockWallets(['user-1']);
      await tx.saveBalance(created.id, Money.parse('15'));
      tx.handle.onCommit(() => {
        throw new Error('notify failed');
      });
      tx.handle.onCommit(() => effects.push('second'));
      return created;
    });

    expect(effects).toEqual(['second']);
    expect(errorLog).toHaveBeenCalledTimes(1);
    const stored = await store.transaction((tx) => tx.ensureWallet('user-1'));
    expect(stored.id).toBe(wallet.id);
    expect(stored.balance.toString()).toBe('15.00');
  });

  it('orders history by application order even if the clock moves backwards', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });

    const walletId = await store.transaction(async (tx) => {
      const wallet = await tx.ensureWallet('user-1');
      const entry = { walletId: wallet.id, type: 'deposit' as const, amount: Money.parse('1'), balanceAfter: Money.zero() };

      vi.setSystemTime(new Date('2026-03-01T10:00:05Z'));
      await tx.insertTransaction({ ...entry, reference: 'DEP:1' });
      vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));
      await tx.insertTransaction({ ...entry, reference: 'DEP:2' });
      return wallet.id;
    });

    const references = await store.transaction(async (tx) =>
      (await tx.listTransactions(walletId)).map((record) => record.reference)
    );
    expect(references).toEqual(['DEP:2', 'DEP:1']);
  });

  it('rejects new units of work while offline', async () => {
    store.setOnline(false);
    await expect(store.transaction((tx) => tx.ensureWallet('user-1'))).rejects.toBeInstanceOf(StorageUnavailableError);

    store.setOnline(true);
    await expect(store.transaction((tx) => tx.ensureWallet('user-1'))).resolves.toMatchObject({ userId: 'user-1' });
  });

  it('lists transactions newest first with type, limit and offset', async () => {
    const walletId = await store.transaction(async (tx) => {
      const wallet = await tx.ensureWallet('user-1');
      const entries = [
        { type: 'deposit' as const, amount: '10', reference: 'DEP:1' },
        { type: 'debit' as const, amount: '5', reference: 'ORDER:1' },
        { type: 'deposit' as const, amount: '20', reference: 'DEP:2' },
      ];
      for (const entry of entries) {
        await tx.insertTransaction({
          walletId: wallet.id,
          type: entry.type,
          amount: Money.parse(entry.amount),
          balanceAfter: Money.zero(),
          reference: entry.reference,
        });
      }
      return wallet.id;
    });

    const listed = await store.transaction(async (tx) => ({
      all: (await tx.listTransactions(walletId)).map((record) => record.reference),
      deposits: (await tx.listTransactions(walletId, { type: 'deposit' })).map((record) => record.reference),
      page: (await tx.listTransactions(walletId, { limit: 1, offset: 1 })).map((record) => record.reference),
    }));

    expect(listed).toEqual({
      all: ['DEP:2', 'ORDER:1', 'DEP:1'],
      deposits: ['DEP:2', 'DEP:1'],
      page: ['ORDER:1'],
    });
  });
});
