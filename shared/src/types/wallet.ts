// Wallet Types
export type TransactionType =
  | 'debit'
  | 'credit_for_goods'
  | 'debit_for_delivery'
  | 'delivery_earning'
  | 'deposit'
  | 'withdrawal';

/**
 * Amounts travel as fixed-point decimal strings with two places ("120.50"),
 * never as floats.
 */
export type DecimalString = string;

export interface WalletBalance {
  userId: string;
  balance: DecimalString;
  updatedAt: Date;
}

export interface Transaction {
  id: number;
  walletId: string;
  type: TransactionType;
  amount: DecimalString;
  balanceAfter: DecimalString;
  reference: string;
  createdAt: Date;
}

export interface TransactionFilters {
  type?: TransactionType;
  limit?: number;
  offset?: number;
}

export interface DeliveryFeeTransfer {
  ownerBalance: DecimalString;
  agentBalance: DecimalString;
}

export interface WalletReconciliation {
  userId: string;
  balance: DecimalString;
  ledgerTotal: DecimalString;
  transactionCount: number;
  consistent: boolean;
}
