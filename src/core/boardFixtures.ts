import { Board } from './Board';
import { PlayerColor, Position } from './types';

/**
 * Fills every cell in a checkered pattern, which never holds five in a row.
 * `skip` leaves one cell empty.
 */
export function fillCheckered(board: Board, skip?: Position): Board {
    let next = board;
    for (let row = 0; row < board.getSize(); row++) {
        for (let col = 0; col < board.getSize(); col++) {
            if (skip && skip.row === row && skip.col === col) continue;
            const color = (row + col) % 2 === 0 ? PlayerColor.BLACK : PlayerColor.WHITE;
            next = next.place({ row, col }, color);
        }
    }
    return next;
}
