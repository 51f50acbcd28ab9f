import { google } from 'googleapis';
import type { SheetsConfig } from './env.js';
import type { PlayerCapRecord } from './types.js';

export const SHEET_HEADER = ['player_name', 'position', 'cap_hit', 'roster_status', 'team'] as const;

export type SheetCell = string | number;

export interface SheetMirror {
  replaceRows(records: readonly PlayerCapRecord[]): Promise<number>;
}

export function toSheetRows(records: readonly PlayerCapRecord[]): SheetCell[][] {
  return records.map((record) => [
    record.player_name ?? '',
    record.position ?? '',
    record.cap_hit ?? '',
    record.roster_status,
    record.team,
  ]);
}

export function createSheetMirror(config: SheetsConfig): SheetMirror {
  const auth = new google.auth.GoogleAuth({
    keyFile: config.serviceAccountFile,
    scopes: ['https://www.googleapis.com/auth/spreadsheets'],
  });
  const sheets = google.sheets({ version: 'v4', auth });
  const { spreadsheetId, sheetTitle } = config;

  async function replaceRows(records: readonly PlayerCapRecord[]): Promise<number> {
    await sheets.spreadsheets.values.update({
      spreadsheetId,
      range: `${sheetTitle}!A1:E1`,
      valueInputOption: 'RAW',
      requestBody: { values: [[...SHEET_HEADER]] },
    });

    await sheets.spreadsheets.values.clear({
      spreadsheetId,
      range: `${sheetTitle}!A2:E`,
    });
    console.log(`[sheets] Data truncated from ${sheetTitle}`);

    const values = toSheetRows(records);
    if (!values.length) {
      return 0;
    }

    await sheets.spreadsheets.values.update({
      spreadsheetId,
      range: `${sheetTitle}!A2`,
      valueInputOption: 'RAW',
      requestBody: { values },
    });
    console.log(`[sheets] Uploaded ${values.length} rows to ${sheetTitle}`);
    return values.length;
  }

  return { replaceRows };
}
