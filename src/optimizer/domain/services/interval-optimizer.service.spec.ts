import { Test, TestingModule } from '@nestjs/testing';
import { IntervalOptimizerService } from './interval-optimizer.service';
import { PredecessorFinderService } from './predecessor-finder.service';
import { Interval } from '../types/interval.type';
import { scaleTradeOff, scoreIfIncluded } from '../utils/trade-off-scoring.util';
import {
  bestSubsetScore,
  createRandom,
  maxCompatibleCount,
  randomInt,
  randomIntervals,
} from '../../../../test/helpers/random-intervals';

function expectNonOverlapping(selected: Interval[]): void {
  for (let i = 1; i < selected.length; i++) {
    expect(selected[i - 1].end).toBeLessThan(selected[i].start);
  }
}

describe('IntervalOptimizerService', () => {
  let service: IntervalOptimizerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [IntervalOptimizerService, PredecessorFinderService],
    }).compile();

    service = module.get<IntervalOptimizerService>(IntervalOptimizerService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('empty input', () => {
    it.each([0, 0.5, 1, 2])('should return no selection for trade-off %p', (tradeOff) => {
      const result = service.optimize([], tradeOff);

      expect(result.selected).toEqual([]);
      expect(result.score).toBe(0);
      expect(result.rawScore).toBe(0);
    });
  });

  describe('pure count (trade-off 1)', () => {
    it('should keep the maximum number of compatible intervals', () => {
      const intervals: Interval[] = [
        { start: 1, end: 3, cost: 5 },
        { start: 2, end: 5, cost: 1 },
        { start: 4, end: 6, cost: 2 },
        { start: 6, end: 7, cost: 1 },
      ];

      const result = service.optimize(intervals, 1);

      // (4, 6) and (6, 7) touch, so only two intervals fit together
      expect(result.selected).toEqual([
        { start: 1, end: 3, cost: 5 },
        { start: 4, end: 6, cost: 2 },
      ]);
      expect(result.score).toBe(2);
      expect(result.rawScore).toBe(2);
      expect(result.tradeOffScaled).toBe(1000);
    });

    it('should ignore cost entirely', () => {
      const intervals: Interval[] = [
        { start: 1, end: 2, cost: 100 },
        { start: 3, end: 4, cost: 200 },
      ];

      const result = service.optimize(intervals, 1);

      expect(result.selected).toHaveLength(2);
      expect(result.score).toBe(2);
    });

    it('should match the greedy optimum on random instances', () => {
      const random = createRandom(7);

      for (let round = 0; round < 100; round++) {
        const intervals = randomIntervals(random, randomInt(random, 0, 30));
        const result = service.optimize(intervals, 1);

        expect(result.selected).toHaveLength(maxCompatibleCount(intervals));
        expect(result.score).toBe(result.selected.length);
        expectNonOverlapping(result.selected);
      }
    });
  });

  describe('pure cost (trade-off 0)', () => {
    it('should take the first of two duplicate free intervals', () => {
      const first = { start: 1, end: 2, cost: 0 };
      const duplicate = { start: 1, end: 2, cost: 0 };
      const later = { start: 3, end: 4, cost: 0 };

      const result = service.optimize([first, duplicate, later], 0);

      expect(result.selected).toHaveLength(2);
      expect(result.selected[0]).toBe(first);
      expect(result.selected[1]).toBe(later);
      expect(result.rawScore).toBe(2);
      expect(result.score).toBe(0.002);
    });

    it('should never select an interval that has a cost', () => {
      const intervals: Interval[] = [
        { start: 1, end: 2, cost: 3 },
        { start: 4, end: 5, cost: 1 },
      ];

      const result = service.optimize(intervals, 0);

      expect(result.selected).toEqual([]);
      expect(result.score).toBe(0);
    });

    it('should prefer free intervals over costly ones', () => {
      const intervals: Interval[] = [
        { start: 1, end: 2, cost: 0 },
        { start: 3, end: 4, cost: 2 },
        { start: 5, end: 6, cost: 0 },
      ];

      const result = service.optimize(intervals, 0);

      expect(result.selected).toEqual([
        { start: 1, end: 2, cost: 0 },
        { start: 5, end: 6, cost: 0 },
      ]);
      expect(result.score).toBe(0.002);
    });
  });

  describe('blended trade-off', () => {
    it('should skip intervals whose cost cancels their count reward', () => {
      const intervals: Interval[] = [
        { start: 5, end: 6, cost: 0 },
        { start: 3, end: 4, cost: 1 },
        { start: 1, end: 2, cost: 0 },
      ];

      const result = service.optimize(intervals, 0.5);

      expect(result.selected).toEqual([
        { start: 1, end: 2, cost: 0 },
        { start: 5, end: 6, cost: 0 },
      ]);
      expect(result.rawScore).toBe(1000);
      expect(result.score).toBe(1);
      expect(result.tradeOffScaled).toBe(500);
    });

    it('should pick a cheaper overlapping alternative', () => {
      const intervals: Interval[] = [
        { start: 0, end: 10, cost: 2 },
        { start: 1, end: 9, cost: 0 },
      ];

      const result = service.optimize(intervals, 0.75);

      // (1, 9) sorts first and scores 750; (0, 10) could only reach 250
      expect(result.selected).toEqual([{ start: 1, end: 9, cost: 0 }]);
      expect(result.rawScore).toBe(750);
      expect(result.score).toBe(0.75);
    });

    it('should trade two cheap intervals against one spanning free one', () => {
      const intervals: Interval[] = [
        { start: 1, end: 2, cost: 1 },
        { start: 3, end: 4, cost: 1 },
        { start: 0, end: 5, cost: 0 },
      ];

      const result = service.optimize(intervals, 0.75);

      // each cheap interval scores 750 - 250 = 500, the spanning one 750
      expect(result.selected).toEqual([
        { start: 1, end: 2, cost: 1 },
        { start: 3, end: 4, cost: 1 },
      ]);
      expect(result.rawScore).toBe(1000);
      expect(result.score).toBe(1);
    });

    it('should keep score * 1000 within 1 of the raw score', () => {
      const random = createRandom(99);

      for (let round = 0; round < 50; round++) {
        const intervals = randomIntervals(random, randomInt(random, 1, 25));
        const result = service.optimize(intervals, 0.25);

        expect(Math.abs(result.score * 1000 - result.rawScore)).toBeLessThanOrEqual(1);
        expectNonOverlapping(result.selected);
      }
    });
  });

  describe('out-of-range trade-off', () => {
    it('should reward every compatible interval above 1', () => {
      const intervals: Interval[] = [
        { start: 1, end: 2, cost: 9 },
        { start: 3, end: 4, cost: 9 },
      ];

      const result = service.optimize(intervals, 1.5);

      expect(result.selected).toHaveLength(2);
      expect(result.rawScore).toBe(3000);
      expect(result.score).toBe(3);
    });

    it('should select nothing below 0', () => {
      const intervals: Interval[] = [{ start: 1, end: 2, cost: 0 }];

      const result = service.optimize(intervals, -0.5);

      expect(result.selected).toEqual([]);
      expect(result.score).toBe(0);
    });
  });

  describe('exhaustive comparison', () => {
    const tradeOffs = [0, 0.3, 0.5, 0.75, 0.999, 1.5, -0.25];

    it('should reach the best subset score for every scoring rule', () => {
      const random = createRandom(2024);

      for (const tradeOff of tradeOffs) {
        const scaled = scaleTradeOff(tradeOff);
        const scoreOf = (interval: Interval) =>
          scoreIfIncluded(tradeOff, scaled, interval.cost);

        for (let round = 0; round < 40; round++) {
          const intervals = randomIntervals(random, randomInt(random, 0, 9), {
            horizon: 15,
            maxLength: 5,
            maxCost: 3,
          });

          const result = service.optimize(intervals, tradeOff);

          expect(result.rawScore).toBe(bestSubsetScore(intervals, scoreOf));
          expect(
            result.selected.reduce((total, interval) => total + scoreOf(interval), 0),
          ).toBe(result.rawScore);
          expectNonOverlapping(result.selected);
        }
      }
    });
  });

  describe('side effects and determinism', () => {
    it('should not reorder the caller array', () => {
      const intervals: Interval[] = [
        { start: 6, end: 7, cost: 1 },
        { start: 1, end: 3, cost: 5 },
        { start: 4, end: 6, cost: 2 },
      ];
      const snapshot = [...intervals];

      service.optimize(intervals, 0.5);

      expect(intervals).toEqual(snapshot);
    });

    it('should return identical results for repeated runs', () => {
      const random = createRandom(3);
      const intervals = randomIntervals(random, 40);

      const first = service.optimize([...intervals], 0.6);
      const second = service.optimize([...intervals], 0.6);

      expect(second).toEqual(first);
    });
  });
});
