import { z } from 'zod';
import { RunSource } from '../../domain/types/run-source.enum';

export const IntervalSchema = z.object({
  start: z.number().int(),
  end: z.number().int(),
  cost: z.number().int(),
});

// Values outside [0, 1] are accepted and extrapolate the blend
export const TradeOffSchema = z.number().finite();

export const OptimizeIntervalsSchema = z.object({
  intervals: z.array(IntervalSchema),
  tradeOff: TradeOffSchema.optional(),
});

export type OptimizeIntervalsRequest = z.infer<typeof OptimizeIntervalsSchema>;

export const ImportIntervalsCsvSchema = z.object({
  csv: z.string(),
  tradeOff: TradeOffSchema.optional(),
});

export type ImportIntervalsCsvRequest = z.infer<
  typeof ImportIntervalsCsvSchema
>;

export interface IntervalResponse {
  start: number;
  end: number;
  cost: number;
}

export interface OptimizationRunSummary {
  id: string;
  source: RunSource;
  tradeOff: number;
  score: number;
  totalCost: number;
  selectedCount: number;
  intervalCount: number;
  createdAt: string; // ISO 8601
}

export interface OptimizationRunResponse extends OptimizationRunSummary {
  tradeOffScaled: number;
  rawScore: number;
  selected: IntervalResponse[];
}
