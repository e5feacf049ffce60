import { ConfigService } from '@nestjs/config';
import { google, sheets_v4 } from 'googleapis';
import { LedgerRange, LedgerStore } from '../../ports/ledger-store.interface';
import { LedgerCell } from '../../domain/ledger/ledger-row.codec';
import { AllConfigType } from '../../../config/config.type';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];
const LAST_COLUMN = 'Q';

/**
 * Ledger kept in a Google Sheet, one booking per row, header in row 1.
 * Cells are written RAW so dates and times read back exactly as written.
 */
export class GoogleSheetsLedgerStore implements LedgerStore {
  private readonly sheets: sheets_v4.Sheets;
  private readonly spreadsheetId: string;
  private readonly sheetName: string;

  constructor(configService: ConfigService<AllConfigType>) {
    const googleConfig = configService.getOrThrow('ground.google', {
      infer: true,
    });
    if (!googleConfig.spreadsheetId) {
      throw new Error(
        'GOOGLE_SPREADSHEET_ID is required when LEDGER_DRIVER is sheets',
      );
    }

    const auth = new google.auth.GoogleAuth({
      keyFile: googleConfig.serviceAccountFile,
      scopes: SCOPES,
    });
    this.sheets = google.sheets({ version: 'v4', auth });
    this.spreadsheetId = googleConfig.spreadsheetId;
    this.sheetName = googleConfig.sheetName;
  }

  async ensureHeaderRow(columns: readonly string[]): Promise<void> {
    const range = `${this.sheetName}!A1:${LAST_COLUMN}1`;
    const current = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range,
    });
    if (current.data.values && current.data.values.length > 0) {
      return;
    }

    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: 'RAW',
      requestBody: { values: [[...columns]] },
    });
  }

  async appendRow(cells: LedgerCell[]): Promise<number> {
    const response = await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${this.sheetName}!A:${LAST_COLUMN}`,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: [cells] },
    });

    // e.g. "Ledger!A12:Q12"
    const updatedRange = response.data.updates?.updatedRange ?? '';
    const match = /![A-Z]+(\d+)/.exec(updatedRange);
    if (!match) {
      throw new Error(`Unexpected append range: "${updatedRange}"`);
    }
    return Number(match[1]);
  }

  async readRows(range: LedgerRange): Promise<string[][]> {
    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: `${this.sheetName}!A${range.startRow}:${LAST_COLUMN}${range.endRow ?? ''}`,
    });

    return (response.data.values ?? []).map((row) =>
      row.map((cell) => String(cell)),
    );
  }
}
