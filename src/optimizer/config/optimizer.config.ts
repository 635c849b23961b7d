import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { validateConfig } from '../../utils/validate-config';
import { OptimizerConfig } from './optimizer-config.type';

const EnvironmentSchema = z.object({
  DEFAULT_TRADE_OFF: z.coerce.number().finite().default(0.5),
  INTERVALS_CSV_PATH: z.string().min(1).default('intervals.csv'),
  MAX_INTERVALS: z.coerce.number().int().positive().default(100000),
});

export default registerAs<OptimizerConfig>('optimizer', () => {
  const env = validateConfig(process.env, EnvironmentSchema);

  return {
    defaultTradeOff: env.DEFAULT_TRADE_OFF,
    intervalsCsvPath: env.INTERVALS_CSV_PATH,
    maxIntervals: env.MAX_INTERVALS,
  };
});
