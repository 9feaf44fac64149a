/**
 * Replay audit: replays a game through the notation resolver and through
 * chess.js side by side, and reports where the two disagree.
 */

import { IllegalMoveError } from '../errors.js';
import type { Game } from '../index.js';
import { applySan, type ResolveOptions } from '../notation/notation-resolver.js';
import { finalPly, halfMoveAt } from '../replay/replay-engine.js';

import { createStartingBoard, diffBoards, type Side, type Square } from './board.js';
import { ReferencePosition } from './reference-position.js';

export type AuditFindingKind = 'unresolved' | 'illegal' | 'mismatch';

export interface AuditFinding {
  kind: AuditFindingKind;
  /** Half-move index, 0 being White's first move */
  ply: number;
  moveNumber: number;
  side: Side;
  san: string;
  message: string;
  /** Squares whose occupants differ, for mismatches */
  squares?: Square[];
}

export interface AuditReport {
  gameId: string;
  /** Half-moves replayed */
  plies: number;
  findings: AuditFinding[];
  clean: boolean;
}

/**
 * Cross-check a game's replay against chess.js.
 *
 * Once chess.js rejects a move, later half-moves are no longer compared.
 * Only the first board mismatch is reported; later plies inherit it.
 */
export function auditReplay(game: Game, options: ResolveOptions = {}): AuditReport {
  const board = createStartingBoard();
  const findings: AuditFinding[] = [];
  let reference: ReferencePosition | undefined = new ReferencePosition();
  let diverged = false;

  const plies = finalPly(game.moves);

  for (let ply = 0; ply < plies; ply++) {
    const halfMove = halfMoveAt(game.moves, ply);
    if (!halfMove) continue;

    const { san, side } = halfMove;
    const moveNumber = game.moves[Math.floor(ply / 2)]?.moveNumber ?? Math.floor(ply / 2) + 1;
    const at = { ply, moveNumber, side, san };

    const outcome = applySan(board, san, side, options);
    if (!outcome.ok) {
      findings.push({ ...at, kind: 'unresolved', message: outcome.error.message });
    }

    if (!reference) continue;

    try {
      reference.move(san);
    } catch (err) {
      if (!(err instanceof IllegalMoveError)) throw err;
      findings.push({ ...at, kind: 'illegal', message: err.message });
      reference = undefined;
      continue;
    }

    if (!diverged) {
      const squares = diffBoards(board, reference.placement());
      if (squares.length > 0) {
        diverged = true;
        findings.push({
          ...at,
          kind: 'mismatch',
          message: `Board differs from the rules reference on ${squares.join(', ')}`,
          squares,
        });
      }
    }
  }

  return { gameId: game.id, plies, findings, clean: findings.length === 0 };
}
