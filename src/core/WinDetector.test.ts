import { describe, it, expect } from 'vitest';
import { Board } from './Board';
import { InvariantError } from './errors';
import { GameStatus, PlayerColor, Position, StoneColor } from './types';
import { checkGameState, countInLine } from './WinDetector';

function placeAll(board: Board, positions: Position[], color: StoneColor): Board {
    return positions.reduce((next, position) => next.place(position, color), board);
}

function line(count: number, start: Position, dr: number, dc: number): Position[] {
    return Array.from({ length: count }, (_, i) => ({ row: start.row + i * dr, col: start.col + i * dc }));
}

describe('checkGameState', () => {
    describe('horizontal wins', () => {
        it('detects 5 in a row horizontally', () => {
            const board = placeAll(new Board(), line(5, { row: 7, col: 0 }, 0, 1), PlayerColor.BLACK);
            expect(checkGameState(board, { position: { row: 7, col: 2 }, color: PlayerColor.BLACK })).toEqual({
                status: GameStatus.WIN,
                winner: PlayerColor.BLACK
            });
        });

        it('does not detect 4 in a row as win', () => {
            const board = placeAll(new Board(), line(4, { row: 7, col: 0 }, 0, 1), PlayerColor.BLACK);
            expect(checkGameState(board, { position: { row: 7, col: 3 }, color: PlayerColor.BLACK })).toEqual({
                status: GameStatus.IN_PROGRESS
            });
        });

        it('detects the win from any stone of the run', () => {
            const board = placeAll(new Board(), line(5, { row: 7, col: 3 }, 0, 1), PlayerColor.WHITE);
            for (const col of [3, 5, 7]) {
                expect(checkGameState(board, { position: { row: 7, col }, color: PlayerColor.WHITE }).status).toBe(
                    GameStatus.WIN
                );
            }
        });
    });

    describe('vertical wins', () => {
        it('detects 5 in a row vertically', () => {
            const board = placeAll(new Board(), line(5, { row: 0, col: 7 }, 1, 0), PlayerColor.WHITE);
            expect(checkGameState(board, { position: { row: 4, col: 7 }, color: PlayerColor.WHITE })).toEqual({
                status: GameStatus.WIN,
                winner: PlayerColor.WHITE
            });
        });

        it('works at board edges', () => {
            const board = placeAll(new Board(), line(5, { row: 10, col: 0 }, 1, 0), PlayerColor.BLACK);
            expect(checkGameState(board, { position: { row: 14, col: 0 }, color: PlayerColor.BLACK }).status).toBe(
                GameStatus.WIN
            );
        });
    });

    describe('diagonal wins', () => {
        it('detects diagonal win (top-left to bottom-right)', () => {
            const board = placeAll(new Board(), line(5, { row: 0, col: 0 }, 1, 1), PlayerColor.BLACK);
            expect(checkGameState(board, { position: { row: 2, col: 2 }, color: PlayerColor.BLACK }).status).toBe(
                GameStatus.WIN
            );
        });

        it('detects diagonal win (top-right to bottom-left)', () => {
            const board = placeAll(new Board(), line(5, { row: 0, col: 14 }, 1, -1), PlayerColor.WHITE);
            expect(checkGameState(board, { position: { row: 2, col: 12 }, color: PlayerColor.WHITE }).status).toBe(
                GameStatus.WIN
            );
        });
    });

    describe('no false positives', () => {
        it('does not detect win with gaps', () => {
            const board = placeAll(
                new Board(),
                [0, 1, 3, 4, 5].map(col => ({ row: 7, col })),
                PlayerColor.BLACK
            );
            expect(checkGameState(board, { position: { row: 7, col: 3 }, color: PlayerColor.BLACK }).status).toBe(
                GameStatus.IN_PROGRESS
            );
        });

        it('does not detect win with opponent stone in between', () => {
            let board = placeAll(new Board(), [0, 1, 3, 4, 5].map(col => ({ row: 7, col })), PlayerColor.BLACK);
            board = board.place({ row: 7, col: 2 }, PlayerColor.WHITE);
            expect(checkGameState(board, { position: { row: 7, col: 2 }, color: PlayerColor.WHITE }).status).toBe(
                GameStatus.IN_PROGRESS
            );
        });

        it('ignores a five that does not pass through the last stone', () => {
            let board = placeAll(new Board(), line(5, { row: 0, col: 0 }, 0, 1), PlayerColor.BLACK);
            board = board.place({ row: 10, col: 10 }, PlayerColor.BLACK);
            expect(checkGameState(board, { position: { row: 10, col: 10 }, color: PlayerColor.BLACK }).status).toBe(
                GameStatus.IN_PROGRESS
            );
        });
    });

    describe('more than 5 in a row', () => {
        it('detects 6 in a row as win', () => {
            const board = placeAll(new Board(), line(6, { row: 7, col: 0 }, 0, 1), PlayerColor.BLACK);
            expect(checkGameState(board, { position: { row: 7, col: 3 }, color: PlayerColor.BLACK }).status).toBe(
                GameStatus.WIN
            );
        });
    });

    describe('draw', () => {
        it('returns DRAW for a full board without five in a row', () => {
            let board = new Board(5);
            for (let row = 0; row < 5; row++) {
                for (let col = 0; col < 5; col++) {
                    const color = (col + 2 * row) % 4 < 2 ? PlayerColor.BLACK : PlayerColor.WHITE;
                    board = board.place({ row, col }, color);
                }
            }
            expect(checkGameState(board, { position: { row: 4, col: 4 }, color: PlayerColor.BLACK })).toEqual({
                status: GameStatus.DRAW
            });
        });

        it('prefers WIN when the last move fills the board with five', () => {
            let board = new Board(5);
            for (let row = 0; row < 5; row++) {
                for (let col = 0; col < 5; col++) {
                    const color = row === 0 || (col + 2 * row) % 4 < 2 ? PlayerColor.BLACK : PlayerColor.WHITE;
                    board = board.place({ row, col }, color);
                }
            }
            expect(board.isFull()).toBe(true);
            expect(checkGameState(board, { position: { row: 0, col: 4 }, color: PlayerColor.BLACK })).toEqual({
                status: GameStatus.WIN,
                winner: PlayerColor.BLACK
            });
        });
    });

    describe('invariants', () => {
        it('throws when the last move cell is empty', () => {
            expect(() =>
                checkGameState(new Board(), { position: { row: 7, col: 7 }, color: PlayerColor.BLACK })
            ).toThrow(InvariantError);
        });

        it('throws when the last move cell holds the other color', () => {
            const board = new Board().place({ row: 7, col: 7 }, PlayerColor.WHITE);
            expect(() => checkGameState(board, { position: { row: 7, col: 7 }, color: PlayerColor.BLACK })).toThrow(
                'Win check at (7, 7) which does not hold a BLACK stone'
            );
        });
    });
});

describe('countInLine', () => {
    it('counts the run through a position in both directions', () => {
        const board = placeAll(new Board(), line(4, { row: 3, col: 3 }, 1, 1), PlayerColor.BLACK);
        expect(countInLine(board, { row: 4, col: 4 }, PlayerColor.BLACK, 1, 1)).toBe(4);
        expect(countInLine(board, { row: 4, col: 4 }, PlayerColor.BLACK, 0, 1)).toBe(1);
    });
});
