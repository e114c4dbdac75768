import type { Decimal } from '@stock-tracker/ledger';

const money = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
});

const pricePerShare = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 4,
});

const shareCount = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 4,
});

export function formatCurrency(v: Decimal): string {
  return money.format(v.toDecimalPlaces(2).toNumber());
}

export function formatPrice(v: Decimal): string {
  return pricePerShare.format(v.toDecimalPlaces(4).toNumber());
}

export function formatShares(v: Decimal): string {
  return shareCount.format(v.toDecimalPlaces(4).toNumber());
}

export const ACTION_LABELS = {
  BUY: 'Buy',
  SELL: 'Sell',
  TRANSFER_IN: 'Transfer in',
  TRANSFER_OUT: 'Transfer out',
  TRANSFER: 'Transfer (both)',
} as const;
