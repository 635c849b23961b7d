import {
  BadRequestException,
  Inject,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { randomUUID } from 'crypto';
import optimizerConfig from '../../config/optimizer.config';
import { OptimizationRunRepository as IOptimizationRunRepository } from '../../ports/repositories/optimization-run.repository.interface';
import { OPTIMIZATION_RUN_REPOSITORY } from '../../tokens';
import { IntervalOptimizerService } from '../../domain/services/interval-optimizer.service';
import { OptimizationRun } from '../../domain/entities/optimization-run.entity';
import { Interval } from '../../domain/types/interval.type';
import { RunSource } from '../../domain/types/run-source.enum';
import { IntervalCsvParser } from '../../infrastructure/csv/interval-csv.parser';
import { IntervalSourceError } from '../../infrastructure/csv/interval-source.error';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import {
  ImportIntervalsCsvRequest,
  OptimizationRunResponse,
  OptimizeIntervalsRequest,
} from '../dto/optimize-intervals.dto';
import { summarizeSelection } from '../utils/selection-report.util';
import { toRunResponse } from '../utils/run-response.util';

@Injectable()
export class OptimizationCommandService {
  constructor(
    @Inject(OPTIMIZATION_RUN_REPOSITORY)
    private readonly runRepository: IOptimizationRunRepository,
    @Inject(optimizerConfig.KEY)
    private readonly config: ConfigType<typeof optimizerConfig>,
    private readonly intervalOptimizer: IntervalOptimizerService,
    private readonly csvParser: IntervalCsvParser,
    private readonly metricsService: MetricsService,
  ) {}

  async createRun(
    request: OptimizeIntervalsRequest,
  ): Promise<OptimizationRunResponse> {
    return this.optimizeAndStore(
      request.intervals,
      request.tradeOff,
      RunSource.JSON,
    );
  }

  async createRunFromCsv(
    request: ImportIntervalsCsvRequest,
  ): Promise<OptimizationRunResponse> {
    let intervals: Interval[];
    try {
      intervals = this.csvParser.parse(request.csv);
    } catch (error) {
      if (error instanceof IntervalSourceError) {
        this.metricsService.recordCsvRejected();
        throw new BadRequestException({
          error: 'invalid_intervals_csv',
          detail: error.message,
        });
      }
      throw error;
    }

    return this.optimizeAndStore(intervals, request.tradeOff, RunSource.CSV);
  }

  async deleteRun(id: string): Promise<void> {
    const run = await this.runRepository.findById(id);
    if (!run) {
      throw new NotFoundException({
        error: 'not_found',
        detail: 'Optimization run not found',
      });
    }

    await this.runRepository.delete(id);
  }

  private async optimizeAndStore(
    intervals: Interval[],
    requestedTradeOff: number | undefined,
    source: RunSource,
  ): Promise<OptimizationRunResponse> {
    if (intervals.length > this.config.maxIntervals) {
      throw new BadRequestException({
        error: 'invalid_input',
        detail: `At most ${this.config.maxIntervals} intervals per run`,
      });
    }

    const tradeOff = requestedTradeOff ?? this.config.defaultTradeOff;

    const startTime = performance.now();
    const result = this.intervalOptimizer.optimize(intervals, tradeOff);
    this.metricsService.recordOptimizationTime(performance.now() - startTime);

    const { totalCost, selectedCount } = summarizeSelection(result.selected);

    const run = new OptimizationRun();
    run.id = `RUN_${randomUUID().substring(0, 8).toUpperCase()}`;
    run.tradeOff = tradeOff;
    run.tradeOffScaled = result.tradeOffScaled;
    run.score = result.score;
    run.rawScore = result.rawScore;
    run.totalCost = totalCost;
    run.selectedCount = selectedCount;
    run.intervalCount = intervals.length;
    run.selected = result.selected;
    run.source = source;
    run.createdAt = new Date();

    const savedRun = await this.runRepository.create(run);
    this.metricsService.recordRunCompleted(intervals.length, selectedCount);

    return toRunResponse(savedRun);
  }
}
