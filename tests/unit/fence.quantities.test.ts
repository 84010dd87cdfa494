/**
 * Fence Quantity Tests
 */

import {
  assertNonNegative,
  calculateBattens,
  calculateBracing,
  calculateInsulators,
  calculatePosts,
  calculateRolls,
  calculateStaples,
  ceilDiv,
  round2
} from '../../src/calculations/fence';
import { DEFAULT_FENCE_RULES } from '../../src/constants';
import { InternalCalculationError } from '../../src/errors';

describe('Fence Quantities', () => {
  describe('ceilDiv', () => {
    it('should round partial quotients up', () => {
      expect(ceilDiv(100, 5)).toBe(20);
      expect(ceilDiv(101, 5)).toBe(21);
    });

    it('should ignore floating-point noise on exact quotients', () => {
      // 1.1 / 0.1 = 11.000000000000002
      expect(ceilDiv(1.1, 0.1)).toBe(11);
    });

    it('should scale the noise allowance with large quotients', () => {
      // 49008.51 / (0.03 × 0.15) is exactly 10890780
      expect(ceilDiv(49008.51, 0.03 * 0.15)).toBe(10890780);
    });

    it('should still round up tiny genuine fractions', () => {
      // 100.0000000004 / 5 = 20.00000000008
      expect(ceilDiv(100.0000000004, 5)).toBe(21);
    });
  });

  describe('round2', () => {
    it('should round to cents', () => {
      expect(round2(3.14159)).toBe(3.14);
      expect(round2(0.69 * 72)).toBe(49.68);
    });
  });

  describe('calculatePosts', () => {
    it('should add one post to the number of spans', () => {
      // 100m / 5m = 20 spans → 21 posts
      expect(calculatePosts(100, 5, DEFAULT_FENCE_RULES)).toEqual({ total: 21, end: 2, line: 19 });
    });

    it('should round a partial span up', () => {
      // 101m / 5m = 20.2 → 21 spans → 22 posts
      expect(calculatePosts(101, 5, DEFAULT_FENCE_RULES)).toEqual({ total: 22, end: 2, line: 20 });
    });

    it('should keep the post count within one span', () => {
      for (const length of [100.01, 102.5, 104.99, 105]) {
        expect(calculatePosts(length, 5, DEFAULT_FENCE_RULES).total).toBe(22);
      }
      expect(calculatePosts(105.01, 5, DEFAULT_FENCE_RULES).total).toBe(23);
    });

    it('should add a post for a length just past a spacing multiple', () => {
      expect(calculatePosts(100.0000000004, 5, DEFAULT_FENCE_RULES).total).toBe(22);
    });

    it('should make both posts of the shortest fence end posts', () => {
      expect(calculatePosts(0.01, 5, DEFAULT_FENCE_RULES)).toEqual({ total: 2, end: 2, line: 0 });
    });
  });

  describe('calculateRolls', () => {
    it('should return whole rolls', () => {
      expect(calculateRolls(1000, 500)).toBe(2);
      expect(calculateRolls(1001, 500)).toBe(3);
    });

    it('should return zero for no length', () => {
      expect(calculateRolls(0, 500)).toBe(0);
    });
  });

  describe('calculateStaples', () => {
    const posts = { total: 21, end: 2, line: 19 };

    it('should staple each wire once per line post and twice per end post', () => {
      // 1 × (19 + 2 × 2) = 23
      expect(calculateStaples(1, posts, false, 2000, DEFAULT_FENCE_RULES)).toEqual({
        count: 23,
        per_box: 2000,
        boxes: 1
      });
    });

    it('should add four staples per post for netting', () => {
      // 2 × 23 + 4 × 21 = 130
      expect(calculateStaples(2, posts, true, 100, DEFAULT_FENCE_RULES)).toEqual({
        count: 130,
        per_box: 100,
        boxes: 2
      });
    });

    it('should need no boxes when nothing is stapled', () => {
      expect(calculateStaples(0, posts, false, 2000, DEFAULT_FENCE_RULES).boxes).toBe(0);
    });

    it('should take multipliers from the rules', () => {
      const rules = { ...DEFAULT_FENCE_RULES, staples_per_wire_per_line_post: 2, staples_per_wire_per_end_post: 3 };
      // 1 × (2 × 19 + 3 × 2) = 44
      expect(calculateStaples(1, posts, false, 2000, rules).count).toBe(44);
    });
  });

  describe('calculateBattens', () => {
    it('should fill batten positions not taken by posts', () => {
      // spacing 2.5m → ceil(100 / 2.5) + 1 = 41 positions, 21 are posts
      expect(calculateBattens(100, 5, 0.5, 21)).toBe(20);
    });

    it('should not over-count battens on long runs with fine spacing', () => {
      // 10890780 + 1 positions less 1633618 posts
      expect(calculateBattens(49008.51, 0.03, 0.15, 1633618)).toBe(9257163);
    });

    it('should need no battens when they share the post spacing', () => {
      expect(calculateBattens(100, 5, 1, 21)).toBe(0);
    });

    it('should need no battens when none are requested', () => {
      expect(calculateBattens(100, 5, null, 21)).toBe(0);
    });
  });

  describe('calculateInsulators', () => {
    it('should put bullnose insulators on end posts and claws on line posts', () => {
      expect(calculateInsulators(3, { total: 26, end: 2, line: 24 })).toEqual({ bullnose: 6, claw: 72 });
    });

    it('should need none without hot wires', () => {
      expect(calculateInsulators(0, { total: 26, end: 2, line: 24 })).toEqual({ bullnose: 0, claw: 0 });
    });
  });

  describe('calculateBracing', () => {
    it('should place a stay post every 100m and triplex every 500m', () => {
      expect(calculateBracing(100, DEFAULT_FENCE_RULES)).toEqual({ stay_posts: 1, triplex: 1 });
      expect(calculateBracing(250, DEFAULT_FENCE_RULES)).toEqual({ stay_posts: 3, triplex: 1 });
      expect(calculateBracing(1000, DEFAULT_FENCE_RULES)).toEqual({ stay_posts: 10, triplex: 2 });
    });
  });

  describe('assertNonNegative', () => {
    it('should accept nested non-negative values', () => {
      expect(() => assertNonNegative({ a: { b: [0, 1.5] }, label: 'x' }, '')).not.toThrow();
    });

    it('should name the path of a negative value', () => {
      expect(() => assertNonNegative({ a: { b: [1, -1] } }, '')).toThrow(
        new InternalCalculationError('a.b[1]', -1)
      );
      expect(() => assertNonNegative({ a: { b: [1, -1] } }, '')).toThrow(
        'Invalid intermediate value for a.b[1]: -1'
      );
    });

    it('should reject non-finite values', () => {
      expect(() => assertNonNegative({ cost: Number.NaN }, '')).toThrow(InternalCalculationError);
    });
  });
});
