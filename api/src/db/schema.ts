import { sql } from 'drizzle-orm';
import {
  pgTable,
  uuid,
  varchar,
  numeric,
  timestamp,
  bigserial,
  index,
  check,
} from 'drizzle-orm/pg-core';
import {
  AMOUNT_PRECISION,
  AMOUNT_SCALE,
  MAX_REFERENCE_LENGTH,
  MAX_USER_ID_LENGTH,
} from '../lib/ledgerLimits.js';
import { TRANSACTION_TYPES } from '../lib/transactionTypes.js';

const money = { precision: AMOUNT_PRECISION, scale: AMOUNT_SCALE };

export const wallets = pgTable(
  'wallets',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: varchar('user_id', { length: MAX_USER_ID_LENGTH }).notNull().unique(),
    balance: numeric('balance', money).notNull().default('0.00'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [check('wallets_balance_non_negative', sql`${table.balance} >= 0`)],
);

export const walletTransactions = pgTable(
  'wallet_transactions',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    walletId: uuid('wallet_id')
      .references(() => wallets.id)
      .notNull(),
    type: varchar('type', { length: 32, enum: TRANSACTION_TYPES }).notNull(),
    amount: numeric('amount', money).notNull(),
    balanceAfter: numeric('balance_after', money).notNull(),
    reference: varchar('reference', { length: MAX_REFERENCE_LENGTH }).notNull().default(''),
    // Insert time rather than transaction start. History is ordered by id.
    createdAt: timestamp('created_at', { withTimezone: true })
      .default(sql`clock_timestamp()`)
      .notNull(),
  },
  (table) => [
    index('wallet_transactions_wallet_id_idx').on(table.walletId, table.id),
    check('wallet_transactions_amount_positive', sql`${table.amount} > 0`),
  ],
);

export type WalletRow = typeof wallets.$inferSelect;
export type WalletTransactionRow = typeof walletTransactions.$inferSelect;
