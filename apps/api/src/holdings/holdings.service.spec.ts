import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { holdingKey } from '@stock-tracker/ledger';
import { LedgerStoreService } from '../storage/ledger-store.service';
import { storageConfig, type StorageConfig } from '../storage/storage.config';
import { TradesService } from '../trades/trades.service';
import { HoldingsService } from './holdings.service';

const HOLDINGS_HEADER =
  'account,symbol,stock_name,shares,average_cost,book_cost,realized_gain,date_acquired';
const TRADES_HEADER =
  'date,account,symbol,stock_name,action,quantity,price,commission';

describe('HoldingsService', () => {
  let dir: string;
  let config: StorageConfig;
  let store: LedgerStoreService;
  let trades: TradesService;
  let service: HoldingsService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'holdings-service-'));
    config = storageConfig(dir);
    store = new LedgerStoreService(config);
    await store.onModuleInit();
    trades = new TradesService(store);
    service = new HoldingsService(store, trades);
  });

  afterEach(() => rm(dir, { recursive: true, force: true }));

  it('adds an existing position at book cost per share', async () => {
    const h = await service.addExisting({
      account: 'RRSP',
      symbol: 'MSFT',
      stockName: 'Microsoft',
      quantity: '30',
      bookCost: '3000.30',
      acquiredOn: '2023-06-01',
    });

    expect(h.shares.toFixed()).toBe('30');
    expect(h.averageCost.toFixed()).toBe('100.01');
    expect(h.acquiredOn).toBe('2023-06-01');

    const [logged] = await store.readTrades();
    expect(logged.action).toBe('TRANSFER_IN');
    expect(logged.price.toFixed()).toBe('100.01');
    expect(logged.date).toBe('2023-06-01');
  });

  it('refuses to pre-populate an open position', async () => {
    const dto = {
      account: 'TFSA',
      symbol: 'AAPL',
      stockName: 'Apple Inc.',
      quantity: '5',
      bookCost: '500',
    };
    await service.addExisting(dto);

    await expect(service.addExisting(dto)).rejects.toThrow(
      'Holding for AAPL in TFSA already exists. Use trade entry to add more shares.',
    );
    expect(await store.readTrades()).toHaveLength(1);
  });

  it('reopens a closed position and keeps its realized gain', async () => {
    await trades.record({ account: 'TFSA', symbol: 'AAPL', action: 'BUY', quantity: '5', price: '20', date: '2024-01-02' });
    await trades.record({ account: 'TFSA', symbol: 'AAPL', action: 'SELL', quantity: '5', price: '30', date: '2024-02-02' });

    const h = await service.addExisting({
      account: 'TFSA',
      symbol: 'AAPL',
      stockName: 'Apple Inc.',
      quantity: '2',
      bookCost: '90',
      acquiredOn: '2024-03-01',
    });

    expect(h.shares.toFixed()).toBe('2');
    expect(h.averageCost.toFixed()).toBe('45');
    expect(h.realizedGain.toFixed()).toBe('50');
    expect(h.acquiredOn).toBe('2024-03-01');
  });

  it('reports filtered holdings with totals', async () => {
    await trades.record({ account: 'TFSA', symbol: 'AAPL', stockName: 'Apple Inc.', action: 'BUY', quantity: '10', price: '100', date: '2024-01-02' });
    await trades.record({ account: 'TFSA', symbol: 'AAPL', action: 'SELL', quantity: '4', price: '120', date: '2024-01-05' });
    await trades.record({ account: 'RRSP', symbol: 'MSFT', stockName: 'Microsoft', action: 'BUY', quantity: '2', price: '300', date: '2024-01-03' });

    const all = await service.list();
    expect(all.total).toBe(2);
    expect(all.holdings.map((h) => `${h.account}/${h.symbol}`)).toEqual(['RRSP/MSFT', 'TFSA/AAPL']);
    expect(all.summary.totalShares.toFixed()).toBe('8');
    expect(all.summary.totalBookValue.toFixed()).toBe('1200');
    expect(all.summary.totalRealizedGain.toFixed()).toBe('80');

    const tfsa = await service.list({ account: 'TFSA' });
    expect(tfsa.total).toBe(2);
    expect(tfsa.holdings).toHaveLength(1);
    expect(tfsa.summary.totalBookValue.toFixed()).toBe('600');
    expect(tfsa.accounts).toEqual(['RRSP', 'TFSA']);
  });

  it('keeps the holdings table equal to a replay of the log', async () => {
    await service.addExisting({ account: 'TFSA', symbol: 'AAPL', stockName: 'Apple Inc.', quantity: '3', bookCost: '1000', acquiredOn: '2023-01-01' });
    await trades.record({ account: 'TFSA', symbol: 'AAPL', action: 'BUY', quantity: '7', price: '101.37', commission: '9.99', date: '2024-01-02' });
    await trades.record({ account: 'TFSA', symbol: 'AAPL', action: 'SELL', quantity: '2.5', price: '140', commission: '4.99', date: '2024-02-02' });
    await trades.transfer({ fromAccount: 'TFSA', toAccount: 'RRSP', symbol: 'AAPL', quantity: '1.25', date: '2024-03-03' });
    await trades.record({ account: 'RRSP', symbol: 'AAPL', action: 'SELL', quantity: '1.25', price: '90', date: '2024-04-04' });

    const res = await service.reconcile();

    expect(res).toEqual({ consistent: true, trades: 6, holdings: 2, mismatches: [] });
  });

  it('detects a hand-edited holdings table and rebuilds it from the log', async () => {
    await trades.record({ account: 'TFSA', symbol: 'AAPL', stockName: 'Apple Inc.', action: 'BUY', quantity: '10', price: '100', date: '2024-01-02' });
    await writeFile(
      config.holdingsFile,
      `${HOLDINGS_HEADER}\n` +
        'TFSA,AAPL,Apple Inc.,12,100,1200,0,2024-01-02\n' +
        'TFSA,MSFT,Microsoft,1,300,300,0,2024-01-02\n',
    );

    const before = await service.reconcile();
    expect(before.consistent).toBe(false);
    expect(before.mismatches.map((m) => [m.symbol, m.expected?.shares.toFixed() ?? null, m.actual?.shares.toFixed() ?? null])).toEqual([
      ['AAPL', '10', '12'],
      ['MSFT', null, '1'],
    ]);

    expect(await service.rebuild()).toEqual({ trades: 1, holdings: 1 });

    const after = await service.reconcile();
    expect(after.consistent).toBe(true);
    const rebuilt = await store.readHoldings();
    expect(rebuilt.get(holdingKey('TFSA', 'AAPL'))?.shares.toFixed()).toBe('10');
    expect(rebuilt.has(holdingKey('TFSA', 'MSFT'))).toBe(false);
  });

  it('names the trade that breaks a replay', async () => {
    await writeFile(
      config.tradesFile,
      `${TRADES_HEADER}\n2024-01-02,TFSA,AAPL,Apple Inc.,SELL,1,10,0\n`,
    );

    const res = await service.reconcile();

    expect(res.consistent).toBe(false);
    expect(res.replayError).toBe(
      'Trade #1 (2024-01-02): Insufficient shares of AAPL in TFSA: holding 0, trying to sell 1',
    );
    await expect(service.rebuild()).rejects.toThrow(res.replayError);
  });
});
