import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD, APP_FILTER } from '@nestjs/core';
import { OptimizerCoreModule } from './optimizer-core.module';
import { OptimizationRun } from './domain/entities/optimization-run.entity';
import { OptimizationRunRepository } from './infrastructure/persistence/repositories/optimization-run.repository';
import { SelectionCsvWriter } from './infrastructure/csv/selection-csv.writer';
import { MetricsService } from './infrastructure/metrics/metrics.service';
import { ThrottlerExceptionFilter } from './infrastructure/rate-limiting/throttler-exception.filter';
import { OptimizationCommandService } from './application/services/optimization-command.service';
import { OptimizationQueryService } from './application/services/optimization-query.service';
import { OptimizerController } from './infrastructure/http/optimizer.controller';
import { OPTIMIZATION_RUN_REPOSITORY } from './tokens';

@Module({
  imports: [
    OptimizerCoreModule,
    TypeOrmModule.forFeature([OptimizationRun]),
    ThrottlerModule.forRoot({
      throttlers: [
        {
          ttl: 60000,
          limit: process.env.NODE_ENV === 'test' ? 10000 : 100, // Much higher limit in test (overridden by @Throttle decorators)
        },
      ],
    }),
  ],
  controllers: [OptimizerController],
  providers: [
    // Infrastructure services
    SelectionCsvWriter,
    MetricsService,
    // Repository interface (provide token, use implementation)
    {
      provide: OPTIMIZATION_RUN_REPOSITORY,
      useClass: OptimizationRunRepository,
    },
    // Application services
    OptimizationCommandService,
    OptimizationQueryService,
    // Rate limiting
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: ThrottlerExceptionFilter,
    },
  ],
})
export class OptimizerModule {}
