import { validateForm } from '../../pages/form-validation';
import { CreateTradeDto } from './create-trade.dto';
import { CreateTransferDto } from './create-transfer.dto';

describe('CreateTradeDto', () => {
  it('normalizes form input', async () => {
    const res = await validateForm(CreateTradeDto, {
      account: '  TFSA ',
      symbol: ' aapl ',
      stockName: ' Apple Inc. ',
      action: 'sell',
      quantity: ' 2,5 ',
      price: '150',
      commission: '',
      date: '',
    });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value).toMatchObject({
      account: 'TFSA',
      symbol: 'AAPL',
      stockName: 'Apple Inc.',
      action: 'SELL',
      quantity: '2.5',
      price: '150',
    });
    expect(res.value.commission).toBeUndefined();
    expect(res.value.date).toBeUndefined();
  });

  it('collects every field error', async () => {
    const res = await validateForm(CreateTradeDto, {
      account: ' ',
      symbol: 'AAPL',
      action: 'HOLD',
      quantity: '0',
      price: '-1',
      date: '2024-02-30',
    });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors).toEqual(
      expect.arrayContaining([
        'account is required',
        'action must be one of BUY, SELL, TRANSFER_IN, TRANSFER_OUT',
        'quantity must be > 0',
        'price must be >= 0',
        'date must be a valid date',
      ]),
    );
  });

  it('rejects amounts with more digits than the ledger keeps exactly', async () => {
    const res = await validateForm(CreateTradeDto, {
      account: 'TFSA',
      symbol: 'AAPL',
      action: 'BUY',
      quantity: '1234567890123456789012.345',
      price: '10',
      commission: '0.0000000000000000000000001',
    });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors).toHaveLength(2);
    expect(res.errors).toEqual(
      expect.arrayContaining([
        'quantity must have at most 24 digits',
        'commission must have at most 24 digits',
      ]),
    );
  });

  it('accepts a long fractional quantity within the limit', async () => {
    const res = await validateForm(CreateTradeDto, {
      account: 'TFSA',
      symbol: 'AAPL',
      action: 'BUY',
      quantity: '12345678901234567890.5',
      price: '5',
    });

    expect(res.ok).toBe(true);
  });

  it('lets price be left out', async () => {
    const res = await validateForm(CreateTradeDto, {
      account: 'TFSA',
      symbol: 'AAPL',
      action: 'TRANSFER_OUT',
      quantity: '1',
    });

    expect(res.ok).toBe(true);
  });
});

describe('CreateTransferDto', () => {
  it('requires both accounts', async () => {
    const res = await validateForm(CreateTransferDto, {
      fromAccount: 'TFSA',
      symbol: 'AAPL',
      quantity: '1',
    });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors).toContain('toAccount is required');
    expect(res.errors.filter((e) => !e.startsWith('toAccount'))).toEqual([]);
  });
});
