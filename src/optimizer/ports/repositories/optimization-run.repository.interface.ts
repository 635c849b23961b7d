import { OptimizationRun } from '../../domain/entities/optimization-run.entity';

export interface OptimizationRunRepository {
  findById(id: string): Promise<OptimizationRun | null>;
  findRecent(limit: number): Promise<OptimizationRun[]>;
  create(run: OptimizationRun): Promise<OptimizationRun>;
  delete(id: string): Promise<void>;
}
