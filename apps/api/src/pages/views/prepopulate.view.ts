import { fieldValue, type FormValues } from '../form-validation';
import { html } from '../html';
import { datalist, inputField, layout, notices, type Notice } from './layout';

export type PrepopulateModel = {
  accounts: string[];
  today: string;
  values?: FormValues;
  notice?: Notice;
};

export function prepopulatePage(model: PrepopulateModel): string {
  const v = model.values ?? {};

  return layout(
    '/prepopulate',
    'Pre-populate Holdings',
    html`<p>Add positions you held before you started recording trades.</p>
${notices(model.notice ?? {})}
${datalist('accounts', model.accounts)}
<form method="post" action="/prepopulate" class="grid">
${inputField('account', 'Account', fieldValue(v, 'account'), html`list="accounts" required`)}
${inputField('symbol', 'Stock Symbol', fieldValue(v, 'symbol'), html`required`)}
${inputField('stockName', 'Stock Name', fieldValue(v, 'stockName'), html`required`)}
${inputField('quantity', 'Number of Shares', fieldValue(v, 'quantity'), html`type="number" step="any" min="0"`)}
${inputField('bookCost', 'Total Book Cost', fieldValue(v, 'bookCost'), html`type="number" step="any" min="0"`)}
${inputField('acquiredOn', 'Date Acquired', fieldValue(v, 'acquiredOn') || model.today, html`type="date"`)}
<button type="submit">Add Holding</button>
</form>`,
  );
}
