import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  OnModuleInit,
} from '@nestjs/common';
import { appendFile, mkdir, open, readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import {
  HOLDINGS_COLUMNS,
  TRADES_COLUMNS,
  emptyTableCsv,
  parseHoldingsCsv,
  parseTradesCsv,
  serializeHoldingsCsv,
  serializeTradeRows,
  type Holdings,
  type TradeRecord,
} from '@stock-tracker/ledger';
import { STORAGE_CONFIG, type StorageConfig } from './storage.config';

// fs errors may come from another realm, so no instanceof Error here
function errorCode(e: unknown): string | undefined {
  if (
    typeof e === 'object' &&
    e !== null &&
    'code' in e &&
    typeof e.code === 'string'
  ) {
    return e.code;
  }
  return undefined;
}

@Injectable()
export class LedgerStoreService implements OnModuleInit {
  private readonly logger = new Logger(LedgerStoreService.name);
  private queue: Promise<unknown> = Promise.resolve();

  constructor(@Inject(STORAGE_CONFIG) private readonly config: StorageConfig) {}

  async onModuleInit() {
    await this.ensureFiles();
  }

  async ensureFiles() {
    try {
      await mkdir(this.config.dataDir, { recursive: true });
    } catch (e) {
      throw this.ioFailure('create', this.config.dataDir, e);
    }
    await this.createIfMissing(this.config.holdingsFile, HOLDINGS_COLUMNS);
    await this.createIfMissing(this.config.tradesFile, TRADES_COLUMNS);
  }

  /** Runs write sequences one at a time. */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // failures reach the caller through `run`; the queue only needs ordering
    this.queue = run.catch(() => undefined);
    return run;
  }

  async readHoldings(): Promise<Holdings> {
    const file = this.config.holdingsFile;
    const text = await this.readTable(file, HOLDINGS_COLUMNS);
    return parseHoldingsCsv(text, basename(file));
  }

  async readTrades(): Promise<TradeRecord[]> {
    const file = this.config.tradesFile;
    const text = await this.readTable(file, TRADES_COLUMNS);
    return parseTradesCsv(text, basename(file));
  }

  async appendTrades(trades: readonly TradeRecord[]) {
    if (!trades.length) return;
    const file = this.config.tradesFile;
    await this.createIfMissing(file, TRADES_COLUMNS);
    try {
      const lead = (await this.endsWithNewline(file)) ? '' : '\n';
      await appendFile(file, lead + serializeTradeRows(trades), 'utf8');
    } catch (e) {
      throw this.ioFailure('append to', file, e);
    }
  }

  async writeHoldings(holdings: Holdings) {
    const file = this.config.holdingsFile;
    try {
      await writeFile(file, serializeHoldingsCsv(holdings), 'utf8');
    } catch (e) {
      throw this.ioFailure('write', file, e);
    }
  }

  /** Appends to the log first; the holdings table can always be rebuilt from it. */
  async commit(trades: readonly TradeRecord[], holdings: Holdings) {
    await this.appendTrades(trades);
    await this.writeHoldings(holdings);
  }

  private async endsWithNewline(file: string): Promise<boolean> {
    const handle = await open(file, 'r');
    try {
      const { size } = await handle.stat();
      if (size === 0) return true;
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      return last[0] === 0x0a;
    } finally {
      await handle.close();
    }
  }

  private async readTable(file: string, columns: readonly string[]) {
    try {
      return await readFile(file, 'utf8');
    } catch (e) {
      if (errorCode(e) === 'ENOENT') return emptyTableCsv(columns);
      throw this.ioFailure('read', file, e);
    }
  }

  private async createIfMissing(file: string, columns: readonly string[]) {
    try {
      await writeFile(file, emptyTableCsv(columns), { flag: 'wx' });
      this.logger.log(`created ${file}`);
    } catch (e) {
      if (errorCode(e) === 'EEXIST') return;
      throw this.ioFailure('create', file, e);
    }
  }

  private ioFailure(op: string, file: string, e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    this.logger.error(`failed to ${op} ${file}: ${reason}`);
    return new InternalServerErrorException(`Failed to ${op} ${basename(file)}`);
  }
}
