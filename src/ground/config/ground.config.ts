import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { GroundConfig } from './ground-config.type';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const EnvironmentSchema = z.object({
  GROUND_POLICY_PATH: z.string().default('config/ground-policy.json'),
  DATABASE_PATH: z.string().default('ground-ledger.db'),
  LEDGER_DRIVER: z.enum(['sqlite', 'sheets']).default('sqlite'),
  EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  GOOGLE_SERVICE_ACCOUNT_FILE: z.string().default('service_account.json'),
  GOOGLE_CALENDAR_ID: z.string().default('primary'),
  GOOGLE_SPREADSHEET_ID: optionalString,
  LEDGER_SHEET_NAME: z.string().default('Ledger'),
  DISCORD_WEBHOOK_URL: optionalString,
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-1.5-flash'),
});

export default registerAs<GroundConfig>('ground', () => {
  const env = EnvironmentSchema.parse(process.env);

  return {
    policyPath: env.GROUND_POLICY_PATH,
    databasePath: env.DATABASE_PATH,
    ledgerDriver: env.LEDGER_DRIVER,
    externalCallTimeoutMs: env.EXTERNAL_CALL_TIMEOUT_MS,
    google: {
      serviceAccountFile: env.GOOGLE_SERVICE_ACCOUNT_FILE,
      calendarId: env.GOOGLE_CALENDAR_ID,
      spreadsheetId: env.GOOGLE_SPREADSHEET_ID,
      sheetName: env.LEDGER_SHEET_NAME,
    },
    discordWebhookUrl: env.DISCORD_WEBHOOK_URL,
    gemini: {
      apiKey: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL,
    },
  };
});
