import { Decimal } from '@stock-tracker/ledger';
import { formatCurrency, formatPrice, formatShares } from './format';

describe('format', () => {
  it('formats money to cents', () => {
    expect(formatCurrency(new Decimal('1234.567'))).toBe('$1,234.57');
    expect(formatCurrency(new Decimal('-25.5'))).toBe('-$25.50');
    expect(formatCurrency(new Decimal(0))).toBe('$0.00');
  });

  it('shows prices with up to four decimals', () => {
    expect(formatPrice(new Decimal(110))).toBe('$110.00');
    expect(formatPrice(new Decimal('33.333333'))).toBe('$33.3333');
  });

  it('shows fractional share counts', () => {
    expect(formatShares(new Decimal('1234.56789'))).toBe('1,234.5679');
    expect(formatShares(new Decimal(15))).toBe('15');
  });
});
