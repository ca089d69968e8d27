/**
 * Unit tests for RatingService Elo calculations
 *
 * These tests verify the arithmetic the arena uses to rank AI contestants:
 * expected scores, per-game deltas, round updates and the K-factor decay.
 */

import { RATING_CONSTANTS, RatingService } from '../../src/cli/services/RatingService';

describe('RatingService - Elo Calculations', () => {
  describe('calculateExpectedScore', () => {
    it('should return 0.5 for equal ratings', () => {
      expect(RatingService.calculateExpectedScore(1500, 1500)).toBe(0.5);
    });

    it('should return about 0.91 for a 400 point advantage', () => {
      expect(RatingService.calculateExpectedScore(1900, 1500)).toBeCloseTo(1 / 1.1, 10);
    });

    it('should be complementary for both sides', () => {
      const a = RatingService.calculateExpectedScore(1620, 1480);
      const b = RatingService.calculateExpectedScore(1480, 1620);
      expect(a + b).toBeCloseTo(1, 10);
    });
  });

  describe('calculateRatingDelta', () => {
    it('should award half of K for a win between equals', () => {
      expect(RatingService.calculateRatingDelta(1500, 1500, 1, 100)).toBe(50);
      expect(RatingService.calculateRatingDelta(1500, 1500, 0, 100)).toBe(-50);
    });

    it('should not move equal ratings on a draw', () => {
      expect(RatingService.calculateRatingDelta(1500, 1500, 0.5, 40)).toBe(0);
    });

    it('should reward an upset more than an expected win', () => {
      const upset = RatingService.calculateRatingDelta(1400, 1600, 1, 32);
      const expected = RatingService.calculateRatingDelta(1600, 1400, 1, 32);
      expect(upset).toBeGreaterThan(expected);
    });
  });

  describe('applyRound', () => {
    it('should apply a single game symmetrically', () => {
      expect(RatingService.applyRound([1500, 1500], [{ first: 0, second: 1, score: 1 }], 100)).toEqual([
        1550, 1450,
      ]);
    });

    it('should score every game of a round against the starting ratings', () => {
      const ratings = [1500, 1500];
      const next = RatingService.applyRound(
        ratings,
        [
          { first: 0, second: 1, score: 1 },
          { first: 1, second: 0, score: 1 },
        ],
        100
      );

      expect(next).toEqual([1500, 1500]);
      expect(ratings).toEqual([1500, 1500]);
    });

    it('should leave uninvolved contestants alone', () => {
      expect(
        RatingService.applyRound([1500, 1500, 1500], [{ first: 2, second: 0, score: 0 }], 10)
      ).toEqual([1505, 1500, 1495]);
    });

    it('should conserve the total rating', () => {
      const next = RatingService.applyRound(
        [1510, 1490, 1525],
        [
          { first: 0, second: 1, score: 0.5 },
          { first: 1, second: 2, score: 1 },
          { first: 2, second: 0, score: 0 },
        ],
        75
      );
      expect(next.reduce((a, b) => a + b, 0)).toBeCloseTo(4525, 8);
    });

    it('should reject unknown contestant indices', () => {
      expect(() =>
        RatingService.applyRound([1500, 1500], [{ first: 0, second: 2, score: 1 }], 100)
      ).toThrow(RangeError);
    });
  });

  describe('kFactorSchedule', () => {
    it('should decay K by a quarter per round until it drops below 10', () => {
      expect(RatingService.kFactorSchedule()).toEqual([
        100, 75, 56.25, 42.1875, 31.640625, 23.73046875, 17.7978515625, 13.348388671875,
        10.01129150390625,
      ]);
    });

    it('should honour custom parameters', () => {
      expect(RatingService.kFactorSchedule(40, 0.5, 10)).toEqual([40, 20, 10]);
      expect(RatingService.kFactorSchedule(5, 0.5, 10)).toEqual([]);
    });

    it('should start from the initial constants', () => {
      expect(RATING_CONSTANTS.INITIAL_RATING).toBe(1500);
      expect(RatingService.kFactorSchedule()[0]).toBe(RATING_CONSTANTS.INITIAL_K_FACTOR);
    });
  });
});
