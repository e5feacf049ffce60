export type LedgerDriver = 'sqlite' | 'sheets';

export type GroundConfig = {
  policyPath: string;
  databasePath: string;
  ledgerDriver: LedgerDriver;
  externalCallTimeoutMs: number;
  google: {
    serviceAccountFile: string;
    calendarId: string;
    spreadsheetId?: string;
    sheetName: string;
  };
  discordWebhookUrl?: string;
  gemini: {
    apiKey?: string;
    model: string;
  };
};
