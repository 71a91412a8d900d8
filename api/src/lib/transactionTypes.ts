import type { TransactionType } from '@tiffin-wallet/shared';
import type { Money } from './money.js';

export const TRANSACTION_TYPES = [
  'debit',
  'credit_for_goods',
  'debit_for_delivery',
  'delivery_earning',
  'deposit',
  'withdrawal',
] as const satisfies readonly TransactionType[];

// Amounts are stored as magnitudes; the type decides which way the balance moved.
const TRANSACTION_DIRECTION: Record<TransactionType, 1 | -1> = {
  debit: -1,
  credit_for_goods: 1,
  debit_for_delivery: -1,
  delivery_earning: 1,
  deposit: 1,
  withdrawal: -1,
};

export function signedAmount(type: TransactionType, amount: Money): Money {
  return TRANSACTION_DIRECTION[type] === 1 ? amount : amount.negate();
}

