import { Money } from './money.js';

// Widths of the ledger columns. The engine rejects anything wider so both
// stores accept exactly the same inputs.
export const AMOUNT_PRECISION = 12;
export const AMOUNT_SCALE = 2;

/** Largest value a numeric(12,2) column holds: 9999999999.99 */
export const MAX_AMOUNT = Money.fromMinor(10n ** BigInt(AMOUNT_PRECISION) - 1n);

export const MAX_REFERENCE_LENGTH = 100;
export const MAX_USER_ID_LENGTH = 64;

/** Length in characters, the way varchar(n) counts it. */
export function characterLength(value: string): number {
  return Array.from(value).length;
}
