/**
 * GameSession integration tests: whole games between in-process agents,
 * rejection handling, turn limits and cancellation.
 */

import { RandomAIPlayer } from '../../src/cli/game/ai/RandomAIPlayer';
import { HeuristicAIPlayer } from '../../src/cli/game/ai/HeuristicAIPlayer';
import { GameSession } from '../../src/cli/game/GameSession';
import { GameEngine } from '../../src/shared/engine/GameEngine';
import { EngineErrorCode, InvalidState } from '../../src/shared/engine/errors';
import type { GameSnapshot } from '../../src/shared/engine/types';
import { OperationCanceledError, createCancellationSource } from '../../src/shared/utils/cancellation';
import { SeededRNG } from '../../src/shared/utils/rng';
import { cornerOpening, level, makeState } from '../helpers/santoriniFixtures';
import { ScriptedAgent, StubbornAgent } from '../helpers/scriptedAgents';

function randomSession(seed: number, maxTurns = 200): GameSession {
  const rng = new SeededRNG(seed).asFunction();
  return new GameSession(
    { 1: new RandomAIPlayer(1, { rng }), 2: new RandomAIPlayer(2, { rng }) },
    { maxTurns }
  );
}

describe('GameSession', () => {
  it('plays random games from setup to a result', async () => {
    for (const seed of [1, 2, 3]) {
      const result = await randomSession(seed).run();

      expect(result.turns).toBe(result.moves.length);
      if (result.status === 'finished') {
        expect(result.winner).not.toBe(result.loser);
        expect(['reached_level_three', 'no_legal_move']).toContain(result.reason);
      } else {
        expect(result.turns).toBe(200);
      }
    }
  });

  it('replays identically from the same seed', async () => {
    const first = await randomSession(42).run();
    const second = await randomSession(42).run();

    expect(second).toEqual(first);
  });

  it('ends the game when the heuristic AI climbs to level 3', async () => {
    const engine = new GameEngine(
      makeState(
        [
          { x: 0, y: 0 },
          { x: 4, y: 0 },
        ],
        [
          { x: 4, y: 4 },
          { x: 3, y: 4 },
        ],
        [
          [{ x: 0, y: 0 }, level(2)],
          [{ x: 1, y: 1 }, level(3)],
        ]
      )
    );
    const snapshots: GameSnapshot[] = [];
    const session = new GameSession(
      {
        1: new HeuristicAIPlayer(1, { depth: 1, rng: () => 0 }),
        2: new ScriptedAgent(2),
      },
      { onStateChange: (snapshot) => snapshots.push(snapshot) },
      engine
    );

    const result = await session.run();

    expect(result).toEqual({
      status: 'finished',
      winner: 1,
      loser: 2,
      reason: 'reached_level_three',
      turns: 1,
      moves: [{ player: 1, worker: 0, from: { x: 0, y: 0 }, to: { x: 1, y: 1 }, build: null }],
    });
    expect(snapshots.map((s) => s.phase.phase)).toEqual(['selecting_worker', 'choosing_destination', 'won']);
  });

  it('records a resignation', async () => {
    const session = new GameSession(
      { 1: new ScriptedAgent(1), 2: new ScriptedAgent(2) },
      {},
      new GameEngine(cornerOpening())
    );

    await expect(session.run()).resolves.toEqual({
      status: 'finished',
      winner: 2,
      loser: 1,
      reason: 'resignation',
      turns: 0,
      moves: [],
    });
  });

  it('reports rejections to the agent and keeps asking', async () => {
    const p1 = new ScriptedAgent(1, [
      { type: 'MOVE_WORKER', to: { x: 1, y: 1 } },
      { type: 'SELECT_WORKER', worker: { player: 2, index: 0 } },
      { type: 'SELECT_WORKER', worker: { player: 1, index: 0 } },
      { type: 'MOVE_WORKER', to: { x: 1, y: 1 } },
      { type: 'BUILD', at: { x: 0, y: 0 } },
    ]);
    const p2 = new ScriptedAgent(2);
    const session = new GameSession({ 1: p1, 2: p2 }, {}, new GameEngine(cornerOpening()));

    const result = await session.run();

    expect(p1.rejections.map((error) => error.code)).toEqual([
      EngineErrorCode.FSM_OUT_OF_PHASE,
      EngineErrorCode.RULES_INVALID_SELECTION,
    ]);
    expect(result).toMatchObject({ status: 'finished', winner: 1, reason: 'resignation', turns: 1 });
  });

  it('gives up on an agent that is rejected too often', async () => {
    const stubborn = new StubbornAgent(1, { type: 'BUILD', at: { x: 2, y: 2 } });
    const session = new GameSession(
      { 1: stubborn, 2: new ScriptedAgent(2) },
      { maxConsecutiveRejections: 3 },
      new GameEngine(cornerOpening())
    );

    expect.assertions(4);
    try {
      await session.run();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidState);
      if (error instanceof InvalidState) {
        expect(error.code).toBe(EngineErrorCode.INTERNAL_ASSERTION_FAILED);
        expect(error.domain).toBe('GameSession');
      }
    }
    expect(stubborn.rejections).toHaveLength(3);
  });

  it('stops at the turn limit', async () => {
    const result = await randomSession(7, 2).run();

    expect(result.status).toBe('turn_limit');
    expect(result.turns).toBe(2);
    expect(result.moves.map((move) => move.player)).toEqual([1, 2]);
  });

  it('aborts when cancelled', async () => {
    const source = createCancellationSource();
    source.cancel('interrupted');
    const session = new GameSession(
      { 1: new ScriptedAgent(1), 2: new ScriptedAgent(2) },
      { cancellationToken: source.token },
      new GameEngine(cornerOpening())
    );

    await expect(session.run()).rejects.toBeInstanceOf(OperationCanceledError);
  });

  it('closes both agents', () => {
    const p1 = new ScriptedAgent(1);
    const p2 = new ScriptedAgent(2);
    new GameSession({ 1: p1, 2: p2 }).close();

    expect([p1.closed, p2.closed]).toEqual([true, true]);
  });
});
