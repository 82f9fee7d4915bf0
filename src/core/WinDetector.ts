import { Board } from './Board';
import { InvariantError } from './errors';
import { GameState, GameStatus, Move, PlayerColor, Position, WIN_LENGTH } from './types';

const DIRECTIONS = [
    { dr: 0, dc: 1 },  // Horizontal
    { dr: 1, dc: 0 },  // Vertical
    { dr: 1, dc: 1 },  // Diagonal \
    { dr: 1, dc: -1 }  // Diagonal /
] as const;

/**
 * Decides the game state right after `lastMove` was applied.
 *
 * Only the four lines through the last stone are scanned, since any new run
 * of five has to pass through it.
 */
export function checkGameState(board: Board, lastMove: Move): GameState {
    const { position, color } = lastMove;
    if (board.getCell(position) !== color) {
        throw new InvariantError(
            `Win check at (${position.row}, ${position.col}) which does not hold a ${color} stone`
        );
    }

    for (const { dr, dc } of DIRECTIONS) {
        if (countInLine(board, position, color, dr, dc) >= WIN_LENGTH) {
            return { status: GameStatus.WIN, winner: color };
        }
    }

    if (board.isFull()) {
        return { status: GameStatus.DRAW };
    }
    return { status: GameStatus.IN_PROGRESS };
}

/**
 * Length of the run through `position` along one direction (both ways)
 */
export function countInLine(
    board: Board,
    position: Position,
    color: PlayerColor,
    dr: number,
    dc: number
): number {
    return 1 + countDirection(board, position, color, dr, dc) + countDirection(board, position, color, -dr, -dc);
}

function countDirection(board: Board, position: Position, color: PlayerColor, dr: number, dc: number): number {
    let count = 0;
    let row = position.row + dr;
    let col = position.col + dc;

    while (board.isValidPosition({ row, col }) && board.getCell({ row, col }) === color) {
        count++;
        row += dr;
        col += dc;
    }

    return count;
}
