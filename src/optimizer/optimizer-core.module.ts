import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from '../config/app.config';
import optimizerConfig from './config/optimizer.config';
import { PredecessorFinderService } from './domain/services/predecessor-finder.service';
import { IntervalOptimizerService } from './domain/services/interval-optimizer.service';
import { IntervalCsvParser } from './infrastructure/csv/interval-csv.parser';
import { LoggerService } from './infrastructure/logging/logger.service';

/**
 * Optimizer pieces that need no database or HTTP server: shared by the API
 * and the command line driver.
 */
@Module({
  imports: [
    ConfigModule.forFeature(appConfig),
    ConfigModule.forFeature(optimizerConfig),
  ],
  providers: [
    PredecessorFinderService,
    IntervalOptimizerService,
    IntervalCsvParser,
    LoggerService,
  ],
  exports: [
    PredecessorFinderService,
    IntervalOptimizerService,
    IntervalCsvParser,
    LoggerService,
  ],
})
export class OptimizerCoreModule {}
