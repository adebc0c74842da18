import { COMMON_CURRENCIES, DEFAULT_BASE, DEFAULT_TARGETS, MAX_THROTTLE_SECONDS } from '../config/constants.js';
import { toCalendarDate } from '../services/dateRange.service.js';

function options(codes: string[], selected: string[]): string {
  return codes
    .map(code => `<option value="${code}"${selected.includes(code) ? ' selected' : ''}>${code}</option>`)
    .join('');
}

// Plain form, no script: the two buttons submit to the preview and export routes
export function renderQueryForm(today: Date = new Date()): string {
  const currencies = [...COMMON_CURRENCIES].sort();
  const firstOfMonth = toCalendarDate(new Date(today.getFullYear(), today.getMonth(), 1));

  return `<!DOCTYPE html>
<html>
<head>
  <title>FX Timeseries Downloader</title>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
</head>
<body>
  <h1>FX Timeseries Downloader</h1>
  <p>Query historical FX rates for this month, last month or custom dates and export to Excel.</p>
  <form method="get" action="/api/fx/timeseries/export">
    <label>Base currency
      <select name="base">${options(currencies, [DEFAULT_BASE])}</select>
    </label>
    <label>Target currencies
      <select name="targets" multiple size="8">${options(currencies, DEFAULT_TARGETS)}</select>
    </label>
    <fieldset>
      <legend>Period</legend>
      <label><input type="radio" name="mode" value="this_month" /> This month</label>
      <label><input type="radio" name="mode" value="last_month" checked /> Last month</label>
      <label><input type="radio" name="mode" value="custom" /> Custom</label>
      <label>Start date <input type="date" name="start" value="${firstOfMonth}" /></label>
      <label>End date <input type="date" name="end" value="${toCalendarDate(today)}" /></label>
    </fieldset>
    <label>Request throttle (seconds)
      <input type="number" name="throttle" min="0" max="${MAX_THROTTLE_SECONDS}" step="0.1" value="0" />
    </label>
    <button type="submit" formaction="/api/fx/timeseries">Preview</button>
    <button type="submit">Download .xlsx</button>
  </form>
</body>
</html>
`;
}
