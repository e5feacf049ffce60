import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from './app-config.type';

const EnvironmentSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  APP_NAME: z.string().default('ground-reservations'),
  APP_PORT: z.coerce.number().int().positive().default(3000),
  API_PREFIX: z.string().default('api'),
});

export default registerAs<AppConfig>('app', () => {
  const env = EnvironmentSchema.parse(process.env);

  return {
    nodeEnv: env.NODE_ENV,
    name: env.APP_NAME,
    port: env.APP_PORT,
    apiPrefix: env.API_PREFIX,
  };
});
