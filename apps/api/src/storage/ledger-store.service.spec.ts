import { InternalServerErrorException } from '@nestjs/common';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CsvFormatError,
  Decimal,
  holdingKey,
  type HoldingRecord,
  type TradeRecord,
} from '@stock-tracker/ledger';
import { LedgerStoreService } from './ledger-store.service';
import { storageConfig } from './storage.config';

const HOLDINGS_HEADER =
  'account,symbol,stock_name,shares,average_cost,book_cost,realized_gain,date_acquired';
const TRADES_HEADER =
  'date,account,symbol,stock_name,action,quantity,price,commission';

const buy: TradeRecord = {
  date: '2024-01-02',
  account: 'TFSA',
  symbol: 'AAPL',
  stockName: 'Apple Inc.',
  action: 'BUY',
  quantity: new Decimal(10),
  price: new Decimal(100),
  commission: new Decimal(0),
};

const position: HoldingRecord = {
  account: 'TFSA',
  symbol: 'AAPL',
  stockName: 'Apple Inc.',
  shares: new Decimal(10),
  averageCost: new Decimal(100),
  bookCost: new Decimal(1000),
  realizedGain: new Decimal(0),
  acquiredOn: '2024-01-02',
};

describe('LedgerStoreService', () => {
  let dir: string;
  let dataDir: string;
  let store: LedgerStoreService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-store-'));
    dataDir = join(dir, 'data');
    store = new LedgerStoreService(storageConfig(dataDir));
    await store.onModuleInit();
  });

  afterEach(() => rm(dir, { recursive: true, force: true }));

  it('creates both tables with only a header', async () => {
    expect(await readFile(join(dataDir, 'consolidated.csv'), 'utf8')).toBe(
      `${HOLDINGS_HEADER}\n`,
    );
    expect(await readFile(join(dataDir, 'trades.csv'), 'utf8')).toBe(
      `${TRADES_HEADER}\n`,
    );
  });

  it('leaves existing tables alone on startup', async () => {
    await writeFile(
      join(dataDir, 'trades.csv'),
      `${TRADES_HEADER}\n2024-01-02,TFSA,AAPL,Apple Inc.,BUY,10,100,0\n`,
    );

    await store.onModuleInit();

    expect(await store.readTrades()).toHaveLength(1);
  });

  it('reads a missing table as empty', async () => {
    await rm(join(dataDir, 'consolidated.csv'));
    await rm(join(dataDir, 'trades.csv'));

    expect((await store.readHoldings()).size).toBe(0);
    expect(await store.readTrades()).toEqual([]);
  });

  it('appends to the log and rewrites the holdings on commit', async () => {
    await store.commit([buy], new Map([[holdingKey('TFSA', 'AAPL'), position]]));
    await store.commit(
      [{ ...buy, date: '2024-01-03', quantity: new Decimal(10), price: new Decimal(120) }],
      new Map([
        [
          holdingKey('TFSA', 'AAPL'),
          {
            ...position,
            shares: new Decimal(20),
            averageCost: new Decimal(110),
            bookCost: new Decimal(2200),
          },
        ],
      ]),
    );

    expect(await readFile(join(dataDir, 'trades.csv'), 'utf8')).toBe(
      `${TRADES_HEADER}\n` +
        '2024-01-02,TFSA,AAPL,Apple Inc.,BUY,10,100,0\n' +
        '2024-01-03,TFSA,AAPL,Apple Inc.,BUY,10,120,0\n',
    );
    expect(await readFile(join(dataDir, 'consolidated.csv'), 'utf8')).toBe(
      `${HOLDINGS_HEADER}\nTFSA,AAPL,Apple Inc.,20,110,2200,0,2024-01-02\n`,
    );

    const holdings = await store.readHoldings();
    expect(holdings.get(holdingKey('TFSA', 'AAPL'))?.averageCost.toFixed()).toBe('110');
  });

  it('recreates a deleted log before appending', async () => {
    await rm(join(dataDir, 'trades.csv'));

    await store.appendTrades([buy]);

    expect(await readFile(join(dataDir, 'trades.csv'), 'utf8')).toBe(
      `${TRADES_HEADER}\n2024-01-02,TFSA,AAPL,Apple Inc.,BUY,10,100,0\n`,
    );
  });

  it('starts a new line when the log was saved without a trailing newline', async () => {
    await writeFile(
      join(dataDir, 'trades.csv'),
      `${TRADES_HEADER}\n2024-01-02,TFSA,AAPL,Apple Inc.,BUY,10,100,0`,
    );

    await store.appendTrades([{ ...buy, date: '2024-01-03', symbol: 'MSFT', stockName: 'Microsoft' }]);

    expect(await readFile(join(dataDir, 'trades.csv'), 'utf8')).toBe(
      `${TRADES_HEADER}\n` +
        '2024-01-02,TFSA,AAPL,Apple Inc.,BUY,10,100,0\n' +
        '2024-01-03,TFSA,MSFT,Microsoft,BUY,10,100,0\n',
    );
    expect((await store.readTrades()).map((t) => t.symbol)).toEqual(['AAPL', 'MSFT']);
  });

  it('rejects a table with the wrong columns', async () => {
    await writeFile(join(dataDir, 'consolidated.csv'), 'foo,bar\n1,2\n');

    await expect(store.readHoldings()).rejects.toThrow(CsvFormatError);
    await expect(store.readHoldings()).rejects.toThrow(
      'consolidated.csv:1: missing column(s): account, symbol, stock_name, shares, average_cost, book_cost, realized_gain, date_acquired',
    );
  });

  it('reports write failures by file name only', async () => {
    const broken = new LedgerStoreService({
      dataDir,
      holdingsFile: join(dataDir, 'missing', 'consolidated.csv'),
      tradesFile: join(dataDir, 'trades.csv'),
    });

    await expect(broken.writeHoldings(new Map())).rejects.toThrow(
      new InternalServerErrorException('Failed to write consolidated.csv'),
    );
  });

  it('runs exclusive tasks one at a time, in order', async () => {
    const order: string[] = [];

    const slow = store.exclusive(async () => {
      await new Promise<void>((resolve) => setTimeout(resolve, 20));
      order.push('slow');
    });
    const failing = store.exclusive(async () => {
      order.push('failing');
      throw new Error('boom');
    });
    const fast = store.exclusive(async () => {
      order.push('fast');
      return 42;
    });

    const results = await Promise.allSettled([slow, failing, fast]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    expect(order).toEqual(['slow', 'failing', 'fast']);
    await expect(fast).resolves.toBe(42);
  });
});
