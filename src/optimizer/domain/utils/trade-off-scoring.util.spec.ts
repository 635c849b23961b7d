import {
  TRADE_OFF_SCALE_FACTOR,
  scaleTradeOff,
  scoreIfIncluded,
} from './trade-off-scoring.util';

describe('trade-off scoring', () => {
  describe('scaleTradeOff', () => {
    it('should scale by the scale factor', () => {
      expect(TRADE_OFF_SCALE_FACTOR).toBe(1000);
      expect(scaleTradeOff(0)).toBe(0);
      expect(scaleTradeOff(0.5)).toBe(500);
      expect(scaleTradeOff(1)).toBe(1000);
    });

    it('should truncate instead of rounding', () => {
      expect(scaleTradeOff(0.0015)).toBe(1);
      expect(scaleTradeOff(0.9999)).toBe(999);
    });

    it('should truncate toward zero for negative trade-offs', () => {
      expect(scaleTradeOff(-0.5)).toBe(-500);
      expect(scaleTradeOff(-0.0015)).toBe(-1);
    });
  });

  describe('scoreIfIncluded', () => {
    it('should award one unit for a free interval at zero trade-off', () => {
      expect(scoreIfIncluded(0, 0, 0)).toBe(1);
    });

    it('should penalize a costly interval at zero trade-off', () => {
      expect(scoreIfIncluded(0, 0, 1)).toBe(-1000);
      expect(scoreIfIncluded(0, 0, 3)).toBe(-3000);
    });

    it('should award one unit regardless of cost at trade-off 1', () => {
      expect(scoreIfIncluded(1, 1000, 0)).toBe(1);
      expect(scoreIfIncluded(1, 1000, 42)).toBe(1);
    });

    it('should blend count and cost in between', () => {
      expect(scoreIfIncluded(0.5, 500, 0)).toBe(500);
      expect(scoreIfIncluded(0.5, 500, 1)).toBe(0);
      expect(scoreIfIncluded(0.75, 750, 2)).toBe(250);
      expect(scoreIfIncluded(0.75, 750, 4)).toBe(-250);
    });

    it('should never turn a negative cost into a bonus', () => {
      expect(scoreIfIncluded(0.5, 500, -2)).toBe(500);
    });

    it('should ignore cost above trade-off 1', () => {
      // (1000 - 1500) * cost is negative and clamps to zero
      expect(scoreIfIncluded(1.5, 1500, 7)).toBe(1500);
    });

    it('should penalize everything below trade-off 0', () => {
      expect(scoreIfIncluded(-0.5, -500, 0)).toBe(-500);
      expect(scoreIfIncluded(-0.5, -500, 1)).toBe(-2000);
    });
  });
});
