import { Interval } from './interval.type';

export interface OptimizationResult {
  selected: Interval[];
  score: number;
  rawScore: number; // accumulated integer DP value, before unscaling
  tradeOffScaled: number;
}
