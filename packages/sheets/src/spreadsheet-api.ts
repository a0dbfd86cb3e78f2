/**
 * Narrow port over the Google Sheets v4 API. The store only needs these calls,
 * and tests swap in InMemorySpreadsheetApi.
 */

import type { sheets_v4 } from 'googleapis';

export type CellValue = string | number | boolean | null;

export interface SpreadsheetApi {
  getTitle(): Promise<string>;
  listWorksheets(): Promise<string[]>;
  addWorksheet(title: string): Promise<void>;
  getValues(range: string): Promise<CellValue[][]>;
  /** Returns the A1 range that received the rows, when the API reports it */
  appendValues(range: string, values: CellValue[][]): Promise<string | null>;
  updateValues(range: string, values: CellValue[][]): Promise<void>;
  clearValues(range: string): Promise<void>;
}

/**
 * `'My Sheet'!A1`. Titles are always quoted so spaces and accents are safe.
 */
export function a1Range(worksheet: string, cells: string): string {
  return `'${worksheet.replace(/'/g, "''")}'!${cells}`;
}

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

const NEW_WORKSHEET_GRID = { rowCount: 100, columnCount: 20 } as const;

/**
 * Date cells come back as serial numbers, never as text in the spreadsheet's locale.
 */
export const VALUE_READ_OPTIONS = {
  valueRenderOption: 'UNFORMATTED_VALUE',
  dateTimeRenderOption: 'SERIAL_NUMBER',
} as const;

export class GoogleSpreadsheetApi implements SpreadsheetApi {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string
  ) {}

  async getTitle(): Promise<string> {
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'properties.title',
    });
    return res.data.properties?.title ?? '';
  }

  async listWorksheets(): Promise<string[]> {
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties.title',
    });
    const titles: string[] = [];
    for (const sheet of res.data.sheets ?? []) {
      const title = sheet.properties?.title;
      if (typeof title === 'string') titles.push(title);
    }
    return titles;
  }

  async addWorksheet(title: string): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [{ addSheet: { properties: { title, gridProperties: { ...NEW_WORKSHEET_GRID } } } }],
      },
    });
  }

  async getValues(range: string): Promise<CellValue[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range,
      ...VALUE_READ_OPTIONS,
    });
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map((row) => row.map(toCellValue));
  }

  async appendValues(range: string, values: CellValue[][]): Promise<string | null> {
    const res = await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values },
    });
    return res.data.updates?.updatedRange ?? null;
  }

  async updateValues(range: string, values: CellValue[][]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: 'RAW',
      requestBody: { values },
    });
  }

  async clearValues(range: string): Promise<void> {
    await this.sheets.spreadsheets.values.clear({
      spreadsheetId: this.spreadsheetId,
      range,
      requestBody: {},
    });
  }
}
