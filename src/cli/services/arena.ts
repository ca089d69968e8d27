import type winston from 'winston';
import { PlayerId } from '../../shared/engine';
import { LocalAIRng } from '../../shared/utils/rng';
import { GameSession } from '../game/GameSession';
import { PlayerAgent } from '../game/PlayerAgent';
import { MatchRecord, RATING_CONSTANTS, RatingService } from './RatingService';

export interface Contestant {
  name: string;
  create(player: PlayerId, rng: LocalAIRng): PlayerAgent;
}

export interface ArenaOptions {
  /** Games per pairing per round; sides alternate between games. */
  gamesPerPairing: number;
  maxTurns: number;
  rng: LocalAIRng;
  kFactors?: ReadonlyArray<number>;
  logger: winston.Logger;
  /** Called after each round with the updated ratings. */
  onRound?: (round: number, kFactor: number, ratings: ReadonlyArray<number>) => void;
}

export interface ArenaResult {
  ratings: number[];
  gamesPlayed: number;
  /** Wins per contestant; a game hitting the turn limit counts for no one. */
  wins: number[];
}

/**
 * Score for player 1 of a finished session: 1 win, 0 loss, 0.5 when the
 * turn limit ended the game.
 */
async function playGame(
  first: PlayerAgent,
  second: PlayerAgent,
  options: ArenaOptions
): Promise<number> {
  const session = new GameSession({ 1: first, 2: second }, { maxTurns: options.maxTurns, logger: options.logger });
  const result = await session.run();
  if (result.status === 'turn_limit') {
    return 0.5;
  }
  return result.winner === 1 ? 1 : 0;
}

/**
 * Round-robin Elo arena. Every round each pair of contestants plays
 * `gamesPerPairing` games; ratings move once per round with that round's K.
 */
export async function runArena(
  contestants: ReadonlyArray<Contestant>,
  options: ArenaOptions
): Promise<ArenaResult> {
  const kFactors = options.kFactors ?? RatingService.kFactorSchedule();
  let ratings: number[] = contestants.map(() => RATING_CONSTANTS.INITIAL_RATING);
  const wins = contestants.map(() => 0);
  let gamesPlayed = 0;

  for (const [round, kFactor] of kFactors.entries()) {
    const matches: MatchRecord[] = [];

    for (let i = 0; i < contestants.length; i++) {
      for (let j = i + 1; j < contestants.length; j++) {
        const a = contestants[i];
        const b = contestants[j];
        if (!a || !b) continue;

        for (let game = 0; game < options.gamesPerPairing; game++) {
          const swap = game % 2 === 1;
          const [firstIdx, secondIdx] = swap ? [j, i] : [i, j];
          const firstAgent = (swap ? b : a).create(1, options.rng);
          const secondAgent = (swap ? a : b).create(2, options.rng);

          const score = await playGame(firstAgent, secondAgent, options);
          matches.push({ first: firstIdx, second: secondIdx, score });
          gamesPlayed++;
          if (score === 1) wins[firstIdx] = (wins[firstIdx] ?? 0) + 1;
          if (score === 0) wins[secondIdx] = (wins[secondIdx] ?? 0) + 1;
        }
      }
    }

    ratings = RatingService.applyRound(ratings, matches, kFactor);
    options.logger.info('Arena round complete', { round: round + 1, kFactor, ratings });
    options.onRound?.(round + 1, kFactor, ratings);
  }

  return { ratings, gamesPlayed, wins };
}
