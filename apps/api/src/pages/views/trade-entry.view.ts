import { TRADE_ACTIONS } from '@stock-tracker/ledger';
import { ACTION_LABELS } from '../format';
import { fieldValue, type FormValues } from '../form-validation';
import { html } from '../html';
import {
  datalist,
  inputField,
  layout,
  notices,
  selectField,
  type Notice,
} from './layout';

export type TradeEntryModel = {
  accounts: string[];
  symbols: string[];
  today: string;
  trade?: FormValues;
  transfer?: FormValues;
  tradeNotice?: Notice;
  transferNotice?: Notice;
};

const ACTION_OPTIONS = TRADE_ACTIONS.map((a): [string, string] => [
  a,
  ACTION_LABELS[a],
]);

const AMOUNT = html`type="number" step="any" min="0"`;

export function tradeEntryPage(model: TradeEntryModel): string {
  const trade = model.trade ?? {};
  const transfer = model.transfer ?? {};
  const dateOr = (v: FormValues, name: string) =>
    fieldValue(v, name) || model.today;

  return layout(
    '/trade-entry',
    'Trade Entry',
    html`${datalist('accounts', model.accounts)}${datalist('symbols', model.symbols)}
<h2>Record a trade</h2>
${notices(model.tradeNotice ?? {})}
<form method="post" action="/trade-entry" class="grid">
${inputField('account', 'Account', fieldValue(trade, 'account'), html`list="accounts" required`)}
${inputField('symbol', 'Stock Symbol', fieldValue(trade, 'symbol'), html`list="symbols" required`)}
${inputField('stockName', 'Stock Name', fieldValue(trade, 'stockName'))}
${selectField('action', 'Trade Type', ACTION_OPTIONS, fieldValue(trade, 'action') || 'BUY')}
${inputField('quantity', 'Number of Shares', fieldValue(trade, 'quantity'), AMOUNT)}
${inputField('price', 'Price per Share', fieldValue(trade, 'price'), AMOUNT)}
${inputField('commission', 'Commission', fieldValue(trade, 'commission') || '0', AMOUNT)}
${inputField('date', 'Trade Date', dateOr(trade, 'date'), html`type="date"`)}
<button type="submit">Process Trade</button>
</form>
<p class="info">Transfer out moves shares at their current average cost; the price is not used.</p>
<h2>Transfer between accounts</h2>
${notices(model.transferNotice ?? {})}
<form method="post" action="/trade-entry/transfer" class="grid">
${inputField('fromAccount', 'From Account', fieldValue(transfer, 'fromAccount'), html`list="accounts" required`)}
${inputField('toAccount', 'To Account', fieldValue(transfer, 'toAccount'), html`list="accounts" required`)}
${inputField('symbol', 'Stock Symbol', fieldValue(transfer, 'symbol'), html`list="symbols" required`)}
${inputField('quantity', 'Number of Shares', fieldValue(transfer, 'quantity'), AMOUNT)}
${inputField('date', 'Transfer Date', dateOr(transfer, 'date'), html`type="date"`)}
<button type="submit">Transfer Shares</button>
</form>`,
  );
}
