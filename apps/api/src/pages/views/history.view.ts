import type { TradesFilter } from '@stock-tracker/ledger';
import type { TradesReport } from '../../trades/trades.service';
import { TRADE_ACTION_FILTERS } from '../../trades/dto/list-trades.query';
import {
  ACTION_LABELS,
  formatCurrency,
  formatPrice,
  formatShares,
} from '../format';
import { html } from '../html';
import { allOr, layout, metric, selectField } from './layout';

const ACTION_OPTIONS: [string, string][] = [
  ['', 'All'],
  ...TRADE_ACTION_FILTERS.map((a): [string, string] => [a, ACTION_LABELS[a]]),
];

export function historyPage(report: TradesReport, filter: TradesFilter): string {
  if (report.total === 0) {
    return layout(
      '/history',
      'Trade History',
      html`<p class="info">No trades found. Use Trade Entry to record trades.</p>`,
    );
  }

  const rows = report.trades.map(
    (t) => html`<tr>
<td>${t.date}</td><td>${t.account}</td><td>${t.stockName}</td><td>${t.symbol}</td>
<td>${ACTION_LABELS[t.action]}</td>
<td class="num">${formatShares(t.quantity)}</td>
<td class="num">${formatPrice(t.price)}</td>
<td class="num">${formatCurrency(t.commission)}</td>
</tr>`,
  );

  const s = report.summary;

  return layout(
    '/history',
    'Trade History',
    html`<form method="get" action="/history" class="grid">
${selectField('account', 'Account', allOr(report.accounts), filter.account)}
${selectField('symbol', 'Symbol', allOr(report.symbols), filter.symbol)}
${selectField('action', 'Trade Type', ACTION_OPTIONS, filter.action)}
<button type="submit">Filter</button>
</form>
${rows.length
  ? html`<table>
<thead><tr><th>Date</th><th>Account</th><th>Stock Name</th><th>Symbol</th><th>Type</th><th>Shares</th><th>Price/Share</th><th>Commission</th></tr></thead>
<tbody>${rows}</tbody>
</table>
<h2>Summary</h2>
<div class="metrics">
${metric('Total Trades', String(s.trades))}
${metric('Total Shares Traded', formatShares(s.totalShares))}
${metric('Total Commission', formatCurrency(s.totalCommission))}
</div>`
  : html`<p class="info">No trades match the selected filters.</p>`}`,
  );
}
