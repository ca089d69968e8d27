/**
 * Elo rating arithmetic for the AI arena.
 *
 * Formula: delta = K * (actualScore - expectedScore)
 * Expected score: 1 / (1 + 10^((opponentRating - playerRating) / 400))
 *
 * Ratings are updated in rounds: every game of a round is scored against
 * the ratings at the start of the round, and the summed deltas are applied
 * together when the round ends. K starts high and decays each round so the
 * table settles.
 */

export const RATING_CONSTANTS = {
  INITIAL_RATING: 1500,
  INITIAL_K_FACTOR: 100,
  K_FACTOR_DECAY: 0.75,
  /** The arena stops once K would fall below this. */
  MIN_K_FACTOR: 10,
} as const;

export interface MatchRecord {
  /** Contestant index of player 1 in this game. */
  first: number;
  /** Contestant index of player 2 in this game. */
  second: number;
  /** Actual score for `first`: 1 win, 0.5 draw, 0 loss. */
  score: number;
}

export class RatingService {
  /**
   * Calculate expected score based on rating difference.
   * Formula: 1 / (1 + 10^((Rb - Ra) / 400))
   *
   * @returns Expected score (probability of winning) between 0 and 1
   */
  static calculateExpectedScore(playerRating: number, opponentRating: number): number {
    return 1 / (1 + Math.pow(10, (opponentRating - playerRating) / 400));
  }

  /**
   * Rating change for the player after one game. The opponent's change is
   * the negation.
   */
  static calculateRatingDelta(
    playerRating: number,
    opponentRating: number,
    actualScore: number,
    kFactor: number
  ): number {
    return kFactor * (actualScore - this.calculateExpectedScore(playerRating, opponentRating));
  }

  /**
   * Apply one round of results. Returns a new ratings array; `ratings` is
   * not modified.
   */
  static applyRound(
    ratings: ReadonlyArray<number>,
    matches: ReadonlyArray<MatchRecord>,
    kFactor: number
  ): number[] {
    const diffs = ratings.map(() => 0);
    for (const match of matches) {
      const a = ratings[match.first];
      const b = ratings[match.second];
      if (a === undefined || b === undefined) {
        throw new RangeError(`Match refers to unknown contestant ${match.first} or ${match.second}`);
      }
      const delta = this.calculateRatingDelta(a, b, match.score, kFactor);
      diffs[match.first] = (diffs[match.first] ?? 0) + delta;
      diffs[match.second] = (diffs[match.second] ?? 0) - delta;
    }
    return ratings.map((rating, i) => rating + (diffs[i] ?? 0));
  }

  /**
   * K-factors for successive rounds: INITIAL_K_FACTOR decayed by
   * K_FACTOR_DECAY until it would drop below MIN_K_FACTOR.
   */
  static kFactorSchedule(
    initial: number = RATING_CONSTANTS.INITIAL_K_FACTOR,
    decay: number = RATING_CONSTANTS.K_FACTOR_DECAY,
    minimum: number = RATING_CONSTANTS.MIN_K_FACTOR
  ): number[] {
    const schedule: number[] = [];
    for (let k = initial; k >= minimum; k *= decay) {
      schedule.push(k);
    }
    return schedule;
  }
}

export default RatingService;
