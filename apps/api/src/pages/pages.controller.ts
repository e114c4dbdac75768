import {
  Body,
  Controller,
  Get,
  Header,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { CsvFormatError, ValidationError } from '@stock-tracker/ledger';
import { CreateHoldingDto } from '../holdings/dto/create-holding.dto';
import { ListHoldingsQuery } from '../holdings/dto/list-holdings.query';
import { HoldingsService } from '../holdings/holdings.service';
import { CreateTradeDto } from '../trades/dto/create-trade.dto';
import { CreateTransferDto } from '../trades/dto/create-transfer.dto';
import { ListTradesQuery } from '../trades/dto/list-trades.query';
import {
  TradesService,
  type TradeOutcome,
  type TransferOutcome,
} from '../trades/trades.service';
import { todayIso } from '../utils/date';
import { formatCurrency, formatPrice, formatShares } from './format';
import { validateForm, type FormValues } from './form-validation';
import { consolidatedPage } from './views/consolidated.view';
import { historyPage } from './views/history.view';
import type { Notice } from './views/layout';
import { prepopulatePage } from './views/prepopulate.view';
import { tradeEntryPage, type TradeEntryModel } from './views/trade-entry.view';

// the part of express' Response the form handlers use
export interface HtmlReply {
  status(code: number): this;
  type(contentType: string): this;
  send(body: string): unknown;
}

type FormOutcome = { status: HttpStatus; notice: Notice };

type PickLists = { accounts: string[]; symbols: string[] };

// unreadable tables and file failures, shown on the page instead of as JSON
function isStorageFailure(e: unknown): e is CsvFormatError | HttpException {
  return e instanceof CsvFormatError || e instanceof HttpException;
}

function tradeMessage({ trade, holding, realizedGain }: TradeOutcome): string {
  switch (trade.action) {
    case 'BUY':
      return `Buy trade processed successfully. New quantity: ${formatShares(holding.shares)}, New avg price: ${formatPrice(holding.averageCost)}`;
    case 'SELL':
      return `Sell trade processed successfully. Remaining quantity: ${formatShares(holding.shares)}, Trade gain/loss: ${formatCurrency(realizedGain)}, Total gain/loss: ${formatCurrency(holding.realizedGain)}`;
    case 'TRANSFER_IN':
      return `Transfer in processed successfully. New quantity: ${formatShares(holding.shares)}, New avg price: ${formatPrice(holding.averageCost)}`;
    case 'TRANSFER_OUT':
      return `Transfer out processed successfully. Remaining quantity: ${formatShares(holding.shares)}`;
  }
}

function transferMessage({ trades, destination }: TransferOutcome): string {
  const [out, into] = trades;
  return `Transferred ${formatShares(out.quantity)} ${out.symbol} from ${out.account} to ${into.account} at ${formatPrice(out.price)} per share. ${into.account} now holds ${formatShares(destination.shares)}.`;
}

@Controller()
export class PagesController {
  private readonly logger = new Logger(PagesController.name);

  constructor(
    private readonly holdingsService: HoldingsService,
    private readonly tradesService: TradesService,
  ) {}

  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  async consolidated(@Query() query: ListHoldingsQuery): Promise<string> {
    return consolidatedPage(await this.holdingsService.list(query), query);
  }

  @Get('history')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async history(@Query() query: ListTradesQuery): Promise<string> {
    return historyPage(await this.tradesService.list(query), query);
  }

  @Get('trade-entry')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async tradeEntry(): Promise<string> {
    return tradeEntryPage(await this.tradeEntryModel());
  }

  @Post('trade-entry')
  async submitTrade(
    @Body() body: FormValues,
    @Res() res: HtmlReply,
  ): Promise<void> {
    const { status, notice } = await this.submit(CreateTradeDto, body, async (dto) =>
      tradeMessage(await this.tradesService.record(dto)),
    );
    const model = await this.tradeEntryModel();
    this.send(
      res,
      status,
      tradeEntryPage({
        ...model,
        trade: status === HttpStatus.OK ? undefined : body,
        tradeNotice: notice,
      }),
    );
  }

  @Post('trade-entry/transfer')
  async submitTransfer(
    @Body() body: FormValues,
    @Res() res: HtmlReply,
  ): Promise<void> {
    const { status, notice } = await this.submit(CreateTransferDto, body, async (dto) =>
      transferMessage(await this.tradesService.transfer(dto)),
    );
    const model = await this.tradeEntryModel();
    this.send(
      res,
      status,
      tradeEntryPage({
        ...model,
        transfer: status === HttpStatus.OK ? undefined : body,
        transferNotice: notice,
      }),
    );
  }

  @Get('prepopulate')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async prepopulate(): Promise<string> {
    const { accounts } = await this.holdingsService.list();
    return prepopulatePage({ accounts, today: todayIso() });
  }

  @Post('prepopulate')
  async submitHolding(
    @Body() body: FormValues,
    @Res() res: HtmlReply,
  ): Promise<void> {
    const { status, notice } = await this.submit(CreateHoldingDto, body, async (dto) => {
      const h = await this.holdingsService.addExisting(dto);
      return `Added ${formatShares(h.shares)} shares of ${h.symbol} (${h.stockName}) to ${h.account} at an average cost of ${formatPrice(h.averageCost)}.`;
    });
    const { accounts } = await this.pickLists();
    this.send(
      res,
      status,
      prepopulatePage({
        accounts,
        today: todayIso(),
        values: status === HttpStatus.OK ? undefined : body,
        notice,
      }),
    );
  }

  private async submit<T extends object>(
    cls: new () => T,
    body: FormValues,
    run: (dto: T) => Promise<string>,
  ): Promise<FormOutcome> {
    const form = await validateForm(cls, body);
    if (!form.ok) {
      return {
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        notice: { errors: form.errors },
      };
    }
    try {
      return { status: HttpStatus.OK, notice: { message: await run(form.value) } };
    } catch (e) {
      if (e instanceof ValidationError) {
        return {
          status: HttpStatus.UNPROCESSABLE_ENTITY,
          notice: { errors: [e.message] },
        };
      }
      if (isStorageFailure(e)) {
        this.logger.error(`form submission failed: ${e.message}`);
        return {
          status: HttpStatus.INTERNAL_SERVER_ERROR,
          notice: { errors: [e.message] },
        };
      }
      throw e;
    }
  }

  // Empty lists when the tables cannot be read, so the form still renders.
  private async pickLists(): Promise<PickLists> {
    try {
      const { accounts, symbols } = await this.tradesService.list();
      return { accounts, symbols };
    } catch (e) {
      if (!isStorageFailure(e)) throw e;
      this.logger.warn(`rendering form without pick lists: ${e.message}`);
      return { accounts: [], symbols: [] };
    }
  }

  private async tradeEntryModel(): Promise<TradeEntryModel> {
    return { ...(await this.pickLists()), today: todayIso() };
  }

  private send(res: HtmlReply, status: HttpStatus, body: string): void {
    res.status(status).type('html').send(body);
  }
}
