/**
 * Google Sheets client initialization and configuration.
 * Credentials come from a service-account key file; the spreadsheet must be
 * shared with that account's email (Editor access).
 */

import { google } from 'googleapis';
import { z } from 'zod';
import { ConfigError } from '@ledger/types';
import { GoogleSpreadsheetApi, type SpreadsheetApi } from './spreadsheet-api.js';

export const SPREADSHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export const DEFAULT_WORKSHEET = 'Transactions';
export const DEFAULT_REFERENCE_WORKSHEET = 'References';

export const SheetsConfigSchema = z.object({
  spreadsheetId: z.string().min(1),
  credentialsPath: z.string().min(1),
  worksheet: z.string().min(1),
  referenceWorksheet: z.string().min(1),
});
export type SheetsConfig = z.infer<typeof SheetsConfigSchema>;

function fromEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Get Sheets configuration from explicit config or environment variables.
 * Priority: explicit config > environment variables > defaults
 */
export function getSheetsConfig(config?: Partial<SheetsConfig>): SheetsConfig {
  const spreadsheetId = config?.spreadsheetId ?? fromEnv('SPREADSHEET_ID');
  const credentialsPath = config?.credentialsPath ?? fromEnv('GOOGLE_SHEETS_CREDENTIALS');

  if (spreadsheetId === undefined) {
    throw new ConfigError('Spreadsheet id is required. Set SPREADSHEET_ID environment variable or pass spreadsheetId.');
  }
  if (credentialsPath === undefined) {
    throw new ConfigError(
      'Service account credentials are required. Set GOOGLE_SHEETS_CREDENTIALS to the key file path or pass credentialsPath.'
    );
  }

  const result = SheetsConfigSchema.safeParse({
    spreadsheetId,
    credentialsPath,
    worksheet: config?.worksheet ?? fromEnv('LEDGER_WORKSHEET') ?? DEFAULT_WORKSHEET,
    referenceWorksheet: config?.referenceWorksheet ?? fromEnv('LEDGER_REFERENCE_WORKSHEET') ?? DEFAULT_REFERENCE_WORKSHEET,
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid Sheets configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

export function isSheetsConfigured(): boolean {
  return fromEnv('SPREADSHEET_ID') !== undefined && fromEnv('GOOGLE_SHEETS_CREDENTIALS') !== undefined;
}

export function createSpreadsheetApi(config: Pick<SheetsConfig, 'spreadsheetId' | 'credentialsPath'>): SpreadsheetApi {
  const auth = new google.auth.GoogleAuth({
    keyFile: config.credentialsPath,
    scopes: [SPREADSHEETS_SCOPE],
  });
  const sheets = google.sheets({ version: 'v4', auth });
  return new GoogleSpreadsheetApi(sheets, config.spreadsheetId);
}

/**
 * Test the connection by reading the spreadsheet title.
 */
export async function testConnection(api: SpreadsheetApi): Promise<{
  success: boolean;
  title?: string;
  error?: string;
}> {
  try {
    const title = await api.getTitle();
    return { success: true, title };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
