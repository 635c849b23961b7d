import { OptimizationRun } from '../../domain/entities/optimization-run.entity';
import {
  OptimizationRunResponse,
  OptimizationRunSummary,
} from '../dto/optimize-intervals.dto';

export function toRunSummary(run: OptimizationRun): OptimizationRunSummary {
  return {
    id: run.id,
    source: run.source,
    tradeOff: run.tradeOff,
    score: run.score,
    totalCost: run.totalCost,
    selectedCount: run.selectedCount,
    intervalCount: run.intervalCount,
    createdAt: run.createdAt.toISOString(),
  };
}

export function toRunResponse(run: OptimizationRun): OptimizationRunResponse {
  return {
    ...toRunSummary(run),
    tradeOffScaled: run.tradeOffScaled,
    rawScore: run.rawScore,
    selected: run.selected.map(({ start, end, cost }) => ({ start, end, cost })),
  };
}
