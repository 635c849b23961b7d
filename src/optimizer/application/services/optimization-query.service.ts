import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { OptimizationRunRepository as IOptimizationRunRepository } from '../../ports/repositories/optimization-run.repository.interface';
import { OPTIMIZATION_RUN_REPOSITORY } from '../../tokens';
import { OptimizationRun } from '../../domain/entities/optimization-run.entity';
import { SelectionCsvWriter } from '../../infrastructure/csv/selection-csv.writer';
import { OptimizationRunResponse } from '../dto/optimize-intervals.dto';
import { ListRunsQuery, ListRunsResponse } from '../dto/list-runs.dto';
import { toRunResponse, toRunSummary } from '../utils/run-response.util';

@Injectable()
export class OptimizationQueryService {
  constructor(
    @Inject(OPTIMIZATION_RUN_REPOSITORY)
    private readonly runRepository: IOptimizationRunRepository,
    private readonly csvWriter: SelectionCsvWriter,
  ) {}

  async getRun(id: string): Promise<OptimizationRunResponse> {
    return toRunResponse(await this.findRunOrThrow(id));
  }

  async listRuns(query: ListRunsQuery): Promise<ListRunsResponse> {
    const runs = await this.runRepository.findRecent(query.limit);
    return { runs: runs.map(toRunSummary) };
  }

  async exportSelection(id: string): Promise<string> {
    const run = await this.findRunOrThrow(id);
    return this.csvWriter.write(run.selected);
  }

  private async findRunOrThrow(id: string): Promise<OptimizationRun> {
    const run = await this.runRepository.findById(id);
    if (!run) {
      throw new NotFoundException({
        error: 'not_found',
        detail: 'Optimization run not found',
      });
    }
    return run;
  }
}
