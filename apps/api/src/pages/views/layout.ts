import { SafeHtml, html, type HtmlValue } from '../html';

const NAV = [
  ['/', 'Consolidated Record'],
  ['/trade-entry', 'Trade Entry'],
  ['/prepopulate', 'Pre-populate'],
  ['/history', 'Trade History'],
] as const;

const STYLE = `
  body { font-family: system-ui, sans-serif; margin: 0; display: flex; color: #1f2937; }
  nav { width: 13rem; min-height: 100vh; background: #f3f4f6; padding: 1rem; }
  nav a { display: block; padding: .4rem 0; color: #1f2937; text-decoration: none; }
  nav a.active { font-weight: 600; }
  main { flex: 1; padding: 1rem 2rem; }
  table { border-collapse: collapse; width: 100%; margin: 1rem 0; }
  th, td { border-bottom: 1px solid #e5e7eb; padding: .35rem .6rem; text-align: left; }
  td.num { text-align: right; font-variant-numeric: tabular-nums; }
  .metrics { display: flex; gap: 2rem; margin: 1rem 0; }
  .metric span { display: block; font-size: .8rem; color: #6b7280; }
  .metric strong { font-size: 1.4rem; }
  .error { background: #fee2e2; padding: .5rem 1rem; }
  .success { background: #dcfce7; padding: .5rem 1rem; }
  .info { background: #e0f2fe; padding: .5rem 1rem; }
  form.grid { display: grid; grid-template-columns: repeat(2, minmax(12rem, 22rem)); gap: .6rem 2rem; }
  label { display: flex; flex-direction: column; font-size: .85rem; }
`;

export type Notice = { errors?: string[]; message?: string };

export function notices({ errors, message }: Notice): SafeHtml {
  return html`${errors?.length
    ? html`<div class="error"><ul>${errors.map((e) => html`<li>${e}</li>`)}</ul></div>`
    : null}${message ? html`<p class="success">${message}</p>` : null}`;
}

export function metric(label: string, value: string): SafeHtml {
  return html`<div class="metric"><span>${label}</span><strong>${value}</strong></div>`;
}

export function selectField(
  name: string,
  label: string,
  options: readonly (readonly [string, string])[],
  selected: string | undefined,
): SafeHtml {
  return html`<label>${label}<select name="${name}">${options.map(
    ([value, text]) =>
      html`<option value="${value}"${value === (selected ?? '') ? html` selected` : null}>${text}</option>`,
  )}</select></label>`;
}

export function allOr(values: readonly string[]): [string, string][] {
  return [['', 'All'], ...values.map((v): [string, string] => [v, v])];
}

export function inputField(
  name: string,
  label: string,
  value: string,
  attrs: HtmlValue = null,
): SafeHtml {
  return html`<label>${label}<input name="${name}" value="${value}" ${attrs}></label>`;
}

export function datalist(id: string, values: readonly string[]): SafeHtml {
  return html`<datalist id="${id}">${values.map((v) => html`<option value="${v}">`)}</datalist>`;
}

export function layout(path: string, title: string, body: HtmlValue): string {
  return html`<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title} · Stock Tracker</title>
<style>${new SafeHtml(STYLE)}</style>
</head>
<body>
<nav><h2>Stock Tracker</h2>${NAV.map(
    ([href, text]) =>
      html`<a href="${href}"${href === path ? html` class="active"` : null}>${text}</a>`,
  )}</nav>
<main><h1>${title}</h1>${body}</main>
</body>
</html>
`.value;
}
