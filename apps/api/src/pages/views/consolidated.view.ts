import type { HoldingsFilter } from '@stock-tracker/ledger';
import type { HoldingsReport } from '../../holdings/holdings.service';
import { formatCurrency, formatPrice, formatShares } from '../format';
import { html } from '../html';
import { allOr, layout, metric, selectField } from './layout';

export function consolidatedPage(
  report: HoldingsReport,
  filter: HoldingsFilter,
): string {
  if (report.total === 0) {
    return layout(
      '/',
      'Consolidated Record',
      html`<p class="info">No holdings found. Use Pre-populate to add existing holdings or Trade Entry to record trades.</p>`,
    );
  }

  const s = report.summary;
  const rows = report.holdings.map(
    (h) => html`<tr>
<td>${h.account}</td><td>${h.stockName}</td><td>${h.symbol}</td>
<td class="num">${formatShares(h.shares)}</td>
<td class="num">${formatPrice(h.averageCost)}</td>
<td class="num">${formatCurrency(h.bookCost)}</td>
<td class="num">${formatCurrency(h.realizedGain)}</td>
<td>${h.acquiredOn}</td>
</tr>`,
  );

  return layout(
    '/',
    'Consolidated Record',
    html`<div class="metrics">
${metric('Total Holdings', String(s.positions))}
${metric('Total Shares', formatShares(s.totalShares))}
${metric('Total Book Value', formatCurrency(s.totalBookValue))}
${metric('Total Gain/Loss', formatCurrency(s.totalRealizedGain))}
</div>
<form method="get" action="/" class="grid">
${selectField('account', 'Account', allOr(report.accounts), filter.account)}
${selectField('symbol', 'Symbol', allOr(report.symbols), filter.symbol)}
<button type="submit">Filter</button>
</form>
${rows.length
  ? html`<table>
<thead><tr><th>Account</th><th>Stock Name</th><th>Symbol</th><th>Quantity</th><th>Avg Price/Share</th><th>Book Value</th><th>Gain/Loss</th><th>Date Acquired</th></tr></thead>
<tbody>${rows}</tbody>
</table>`
  : html`<p class="info">No holdings match the selected filters.</p>`}`,
  );
}
