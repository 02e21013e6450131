import { FREE_CURRENCY } from './price_source.js';

/** Prices are compared in whole cents so float noise never reads as a change. */
export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function formatAmount(amount: number, currency: string | null): string {
  const value = amount.toFixed(2);
  return currency && currency !== FREE_CURRENCY ? `${value} ${currency}` : value;
}
