import { Injectable } from '@nestjs/common';
import { Interval } from '../types/interval.type';

export const NO_PREDECESSOR = -1;

@Injectable()
export class PredecessorFinderService {
  /**
   * Find the last interval that ends strictly before the current one starts.
   *
   * `sortedIntervals` must be ordered by `end` ascending. Returns the largest
   * index `j < currentIndex` with `sortedIntervals[j].end < start`, or
   * NO_PREDECESSOR when nothing qualifies.
   */
  findPredecessor(
    sortedIntervals: readonly Interval[],
    currentIndex: number,
  ): number {
    const start = sortedIntervals[currentIndex].start;
    let low = 0;
    let high = currentIndex - 1;

    while (low <= high) {
      const mid = Math.floor((low + high) / 2);

      if (sortedIntervals[mid].end < start) {
        // mid + 1 <= currentIndex, so the probe stays in bounds
        if (sortedIntervals[mid + 1].end < start) {
          low = mid + 1;
        } else {
          return mid;
        }
      } else {
        high = mid - 1;
      }
    }

    return NO_PREDECESSOR;
  }
}
