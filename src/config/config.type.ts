import { AppConfig } from './app-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { OptimizerConfig } from '../optimizer/config/optimizer-config.type';

export type AllConfigType = {
  app: AppConfig;
  database: DatabaseConfig;
  optimizer: OptimizerConfig;
};
