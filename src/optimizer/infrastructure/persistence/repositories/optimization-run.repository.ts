import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { OptimizationRun } from '../../../domain/entities/optimization-run.entity';
import { OptimizationRunRepository as IOptimizationRunRepository } from '../../../ports/repositories/optimization-run.repository.interface';

@Injectable()
export class OptimizationRunRepository implements IOptimizationRunRepository {
  constructor(
    @InjectRepository(OptimizationRun)
    private readonly repository: Repository<OptimizationRun>,
  ) {}

  async findById(id: string): Promise<OptimizationRun | null> {
    return this.repository.findOne({ where: { id } });
  }

  async findRecent(limit: number): Promise<OptimizationRun[]> {
    return this.repository.find({
      order: {
        seq: 'DESC',
      },
      take: limit,
    });
  }

  async create(run: OptimizationRun): Promise<OptimizationRun> {
    const newRun = this.repository.create(run);
    return this.repository.save(newRun);
  }

  async delete(id: string): Promise<void> {
    await this.repository.delete({ id });
  }
}
