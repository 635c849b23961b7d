import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { booleanFromEnv, validateConfig } from '../../utils/validate-config';
import { DatabaseConfig } from './database-config.type';

const EnvironmentSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('optimizer.db'),
  DROP_SCHEMA_ON_STARTUP: booleanFromEnv.default('false'),
});

export default registerAs<DatabaseConfig>('database', () => {
  const env = validateConfig(process.env, EnvironmentSchema);

  return {
    path: env.DATABASE_PATH,
    dropSchema: env.DROP_SCHEMA_ON_STARTUP,
  };
});
