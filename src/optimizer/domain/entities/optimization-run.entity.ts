import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
} from 'typeorm';
import { Interval } from '../types/interval.type';
import { RunSource } from '../types/run-source.enum';

@Entity('optimization_runs')
export class OptimizationRun {
  // Insertion order; runs created within the same millisecond share createdAt
  @PrimaryGeneratedColumn()
  seq!: number;

  @Column({ unique: true })
  id!: string;

  @Column('real')
  tradeOff!: number;

  @Column('integer')
  tradeOffScaled!: number;

  @Column('real')
  score!: number;

  @Column('integer')
  rawScore!: number;

  @Column('integer')
  totalCost!: number;

  @Column('integer')
  selectedCount!: number;

  @Column('integer')
  intervalCount!: number;

  @Column('simple-json')
  selected!: Interval[]; // ordered by end time

  @Column({
    type: 'varchar',
    enum: RunSource,
  })
  source!: RunSource;

  @CreateDateColumn()
  createdAt!: Date;
}
