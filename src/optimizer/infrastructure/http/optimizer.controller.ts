import {
  Controller,
  Get,
  Post,
  Delete,
  Query,
  Body,
  Param,
  Header,
  HttpCode,
  HttpStatus,
  HttpException,
  BadRequestException,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { randomUUID } from 'crypto';
import { ZodError } from 'zod';
import { OptimizationCommandService } from '../../application/services/optimization-command.service';
import { OptimizationQueryService } from '../../application/services/optimization-query.service';
import {
  ImportIntervalsCsvSchema,
  OptimizationRunResponse,
  OptimizeIntervalsSchema,
} from '../../application/dto/optimize-intervals.dto';
import {
  ListRunsQuerySchema,
  ListRunsResponse,
} from '../../application/dto/list-runs.dto';
import { LoggerService } from '../logging/logger.service';
import { MetricsService, OptimizerMetrics } from '../metrics/metrics.service';

// Tests run with much higher limits unless ENABLE_RATE_LIMITING=true.
const getThrottleConfig = (defaultLimit: number) => {
  const isTest = process.env.NODE_ENV === 'test';
  const relaxInTests = isTest && process.env.ENABLE_RATE_LIMITING !== 'true';
  return {
    default: {
      limit: relaxInTests ? 10000 : defaultLimit,
      ttl: 60000,
    },
  };
};

@ApiTags('optimizer')
@Controller('optimizer')
export class OptimizerController {
  constructor(
    private readonly commandService: OptimizationCommandService,
    private readonly queryService: OptimizationQueryService,
    private readonly logger: LoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  @Post('runs')
  @Throttle(getThrottleConfig(30))
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Optimize a list of intervals' })
  @ApiResponse({ status: 201, description: 'Run stored' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  async createRun(@Body() body: unknown): Promise<OptimizationRunResponse> {
    return this.handle('create_run', async () => {
      const validated = OptimizeIntervalsSchema.parse(body);
      return this.commandService.createRun(validated);
    });
  }

  @Post('runs/csv')
  @Throttle(getThrottleConfig(30))
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Optimize intervals read from CSV text' })
  @ApiResponse({ status: 201, description: 'Run stored' })
  @ApiResponse({ status: 400, description: 'Invalid input or malformed CSV' })
  async createRunFromCsv(
    @Body() body: unknown,
  ): Promise<OptimizationRunResponse> {
    return this.handle('create_run_csv', async () => {
      const validated = ImportIntervalsCsvSchema.parse(body);
      return this.commandService.createRunFromCsv(validated);
    });
  }

  @Get('runs')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: 'List recent optimization runs' })
  @ApiResponse({ status: 200, description: 'Runs, newest first' })
  async listRuns(@Query() query: unknown): Promise<ListRunsResponse> {
    return this.handle('list_runs', async () => {
      const validated = ListRunsQuerySchema.parse(query);
      return this.queryService.listRuns(validated);
    });
  }

  @Get('runs/:id')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: 'Get an optimization run' })
  @ApiResponse({ status: 200, description: 'Run found' })
  @ApiResponse({ status: 404, description: 'Run not found' })
  async getRun(@Param('id') id: string): Promise<OptimizationRunResponse> {
    return this.handle('get_run', () => this.queryService.getRun(id), {
      runId: id,
    });
  }

  @Get('runs/:id/selection.csv')
  @Throttle(getThrottleConfig(100))
  @Header('Content-Type', 'text/csv')
  @ApiOperation({ summary: 'Export the selected intervals of a run as CSV' })
  @ApiResponse({ status: 200, description: 'CSV with start,end,cost' })
  @ApiResponse({ status: 404, description: 'Run not found' })
  async exportSelection(@Param('id') id: string): Promise<string> {
    return this.handle(
      'export_selection',
      () => this.queryService.exportSelection(id),
      { runId: id },
    );
  }

  @Delete('runs/:id')
  @Throttle(getThrottleConfig(30))
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an optimization run' })
  @ApiResponse({ status: 204, description: 'Run deleted' })
  @ApiResponse({ status: 404, description: 'Run not found' })
  async deleteRun(@Param('id') id: string): Promise<void> {
    return this.handle('delete_run', () => this.commandService.deleteRun(id), {
      runId: id,
    });
  }

  @Get('metrics')
  @ApiOperation({ summary: 'Get optimizer metrics' })
  @ApiResponse({ status: 200, description: 'Metrics retrieved' })
  getMetrics(): OptimizerMetrics {
    return this.metricsService.getMetrics();
  }

  /**
   * Runs a request with timing and outcome logging. HTTP exceptions pass
   * through, zod failures become 400 invalid_input.
   */
  private async handle<T>(
    op: string,
    action: () => Promise<T>,
    context: Record<string, unknown> = {},
  ): Promise<T> {
    const requestId = randomUUID();
    const startTime = Date.now();

    try {
      const result = await action();

      this.logger.log({
        requestId,
        ...context,
        durationMs: Date.now() - startTime,
        outcome: 'success',
        op,
      });

      return result;
    } catch (error) {
      this.logger.error(`${op} failed`, error, {
        requestId,
        ...context,
        durationMs: Date.now() - startTime,
        outcome: 'error',
      });

      if (error instanceof HttpException) {
        throw error;
      }

      if (error instanceof ZodError) {
        throw new BadRequestException({
          error: 'invalid_input',
          detail: error.errors,
        });
      }

      throw error;
    }
  }
}
