import {
  GameSnapshot,
  PLAYER_IDS,
  Position,
  formatPosition,
  getCell,
  getWorkerAt,
} from '../../shared/engine';

/** Worker letters per player, indexed by worker slot. */
export const WORKER_LABELS = {
  1: ['A', 'B'],
  2: ['X', 'Y'],
} as const;

const DOME = '^';

/**
 * Plain-text board. Each cell shows its height (or `^` for a dome) followed
 * by the worker standing on it, if any:
 *
 *     a  b  c  d  e
 *   1 0A 0  1  ^  0
 */
export function renderBoard(snapshot: GameSnapshot): string {
  const size = snapshot.board.size;
  const files = Array.from({ length: size }, (_, x) => formatPosition({ x, y: 0 }).charAt(0));
  const lines = [`  ${files.join('  ')}`];

  for (let y = 0; y < size; y++) {
    const cells: string[] = [];
    for (let x = 0; x < size; x++) {
      cells.push(renderCell(snapshot, { x, y }));
    }
    lines.push(`${y + 1} ${cells.join(' ')}`.trimEnd());
  }

  return lines.join('\n');
}

function renderCell(snapshot: GameSnapshot, pos: Position): string {
  const cell = getCell(snapshot.board, pos);
  const level = cell.capped ? DOME : String(cell.height);
  const worker = getWorkerAt(snapshot.workers, pos);
  const label = worker ? WORKER_LABELS[worker.player][worker.index] : ' ';
  return `${level}${label}`;
}

/**
 * One-line status under the board: whose turn it is and what they must do,
 * or how the game ended.
 */
export function describeStatus(snapshot: GameSnapshot): string {
  const outcome = snapshot.outcome;
  if (outcome.isOver) {
    switch (outcome.reason) {
      case 'reached_level_three':
        return `Player ${outcome.winner} wins by climbing to level 3.`;
      case 'resignation':
        return `Player ${outcome.loser} resigned. Player ${outcome.winner} wins.`;
      case 'no_legal_move':
        return `Player ${outcome.loser} cannot move. Player ${outcome.winner} wins.`;
    }
  }

  const player = snapshot.currentPlayer;
  switch (snapshot.phase.phase) {
    case 'placement':
      return `Player ${player}: place a worker.`;
    case 'selecting_worker':
      return `Turn ${snapshot.turnNumber}. Player ${player}: choose a worker.`;
    case 'choosing_destination':
      return `Turn ${snapshot.turnNumber}. Player ${player}: choose where to move.`;
    case 'choosing_build_site':
      return `Turn ${snapshot.turnNumber}. Player ${player}: choose where to build.`;
    default:
      return '';
  }
}

/**
 * Legend naming each player's worker letters.
 */
export function renderLegend(): string {
  return PLAYER_IDS.map((p) => `Player ${p}: ${WORKER_LABELS[p].join('/')}`).join('   ');
}
