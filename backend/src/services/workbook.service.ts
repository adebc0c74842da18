import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import type { QueryMeta, RateTable } from '../types/index.js';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function metaEntries(meta: QueryMeta): Array<[string, string]> {
  return [
    ['Base', meta.base],
    ['Targets', meta.targets.join(', ')],
    ['Start', meta.range.start],
    ['End', meta.range.end],
    ['Endpoint', meta.endpoint],
    ['Source', meta.source],
    ['Generated', meta.fetchedAt]
  ];
}

/**
 * "Rates" holds the table (a Date column, then one column per currency, a
 * missing rate left as an empty cell); "Meta" holds the query as Key/Value rows.
 */
export function buildWorkbook(table: RateTable, meta: QueryMeta): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date(meta.fetchedAt);

  const rates = workbook.addWorksheet('Rates');
  rates.columns = [
    { header: 'Date', key: 'date', width: 12, style: { numFmt: 'yyyy-mm-dd' } },
    ...table.currencies.map(currency => ({
      header: currency,
      key: currency,
      width: 12,
      style: { numFmt: '0.000000' }
    }))
  ];

  for (const row of table.rows) {
    rates.addRow([
      new Date(`${row.date}T00:00:00Z`),
      ...table.currencies.map(currency => row.rates[currency])
    ]);
  }
  rates.getRow(1).font = { bold: true };

  const metaSheet = workbook.addWorksheet('Meta');
  metaSheet.columns = [
    { header: 'Key', key: 'key', width: 12 },
    { header: 'Value', key: 'value', width: 40 }
  ];
  for (const [key, value] of metaEntries(meta)) {
    metaSheet.addRow([key, value]);
  }
  metaSheet.getRow(1).font = { bold: true };

  return workbook;
}

export async function renderWorkbook(workbook: Workbook): Promise<Buffer> {
  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}

export function exportFileName(meta: QueryMeta): string {
  return `fx_timeseries_${meta.base}_${meta.range.start}_${meta.range.end}.xlsx`;
}
