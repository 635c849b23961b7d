import { Injectable } from '@nestjs/common';
import { Interval } from '../types/interval.type';
import { OptimizationResult } from '../types/optimization-result.type';
import {
  TRADE_OFF_SCALE_FACTOR,
  scaleTradeOff,
  scoreIfIncluded,
} from '../utils/trade-off-scoring.util';
import { PredecessorFinderService } from './predecessor-finder.service';

@Injectable()
export class IntervalOptimizerService {
  constructor(private readonly predecessorFinder: PredecessorFinderService) {}

  /**
   * Select non-overlapping intervals that maximize the count/cost blend.
   *
   * Works on a stable copy sorted by end time; the caller's array keeps its
   * order. Each DP entry stores a score and a parent pointer (the entry it
   * extends), and the selection is rebuilt by walking the pointers back from
   * the last entry. Ties between including and skipping an interval favor
   * skipping it.
   *
   * With `tradeOff === 1` the reported score is the number of selected
   * intervals; otherwise it is the accumulated score divided by the scale
   * factor.
   */
  optimize(intervals: readonly Interval[], tradeOff: number): OptimizationResult {
    const sorted = [...intervals].sort((a, b) => a.end - b.end);
    const tradeOffScaled = scaleTradeOff(tradeOff);
    const count = sorted.length;

    const scores = new Array<number>(count + 1).fill(0);
    const taken = new Array<boolean>(count + 1).fill(false);
    const parents = new Array<number>(count + 1).fill(0);

    for (let i = 1; i <= count; i++) {
      const interval = sorted[i - 1];
      const excludeScore = scores[i - 1];

      const base = this.predecessorFinder.findPredecessor(sorted, i - 1) + 1;
      const includeScore =
        scores[base] + scoreIfIncluded(tradeOff, tradeOffScaled, interval.cost);

      if (includeScore > excludeScore) {
        scores[i] = includeScore;
        taken[i] = true;
        parents[i] = base;
      } else {
        scores[i] = excludeScore;
        parents[i] = i - 1;
      }
    }

    const selected = this.backtrack(sorted, taken, parents);
    const rawScore = scores[count];
    const score =
      tradeOff === 1 ? selected.length : rawScore / TRADE_OFF_SCALE_FACTOR;

    return { selected, score, rawScore, tradeOffScaled };
  }

  private backtrack(
    sorted: readonly Interval[],
    taken: readonly boolean[],
    parents: readonly number[],
  ): Interval[] {
    const selected: Interval[] = [];
    let index = sorted.length;

    while (index > 0) {
      if (taken[index]) {
        selected.push(sorted[index - 1]);
      }
      index = parents[index];
    }

    return selected.reverse();
  }
}
