import { BoardFormatError, ConfigError, InvariantError, MoveError } from './errors';
import { DEFAULT_BOARD_SIZE, PlayerColor, Position, WIN_LENGTH } from './types';

const CELL_SYMBOLS: Record<PlayerColor, string> = {
    [PlayerColor.EMPTY]: '.',
    [PlayerColor.BLACK]: 'X',
    [PlayerColor.WHITE]: 'O'
};

const SYMBOL_CELLS: Record<string, PlayerColor | undefined> = {
    '.': PlayerColor.EMPTY,
    X: PlayerColor.BLACK,
    O: PlayerColor.WHITE
};

/**
 * Represents the Gomoku game board.
 * Immutable: `place` returns a new board and leaves the receiver untouched.
 */
export class Board {
    private size: number;
    private board: PlayerColor[][];
    private stoneCount: number;

    constructor(size: number = DEFAULT_BOARD_SIZE) {
        if (!Number.isInteger(size) || size < WIN_LENGTH) {
            throw new ConfigError(`Board size must be an integer of at least ${WIN_LENGTH}, got ${size}`);
        }
        this.size = size;
        this.board = this.createEmptyBoard();
        this.stoneCount = 0;
    }

    /**
     * Rebuilds a board from the output of `serialize`
     */
    public static deserialize(text: string): Board {
        const rows = text.split('\n');
        const size = rows.length;
        if (size < WIN_LENGTH) {
            throw new BoardFormatError(`Expected at least ${WIN_LENGTH} rows, got ${size}`);
        }

        const cells: PlayerColor[][] = [];
        let stoneCount = 0;
        rows.forEach((line, row) => {
            const symbols = Array.from(line);
            if (symbols.length !== size) {
                throw new BoardFormatError(`Row ${row} has ${symbols.length} cells, expected ${size}`);
            }
            cells.push(
                symbols.map((symbol, col) => {
                    const cell = SYMBOL_CELLS[symbol];
                    if (cell === undefined) {
                        throw new BoardFormatError(`Unknown cell '${symbol}' at (${row}, ${col})`);
                    }
                    if (cell !== PlayerColor.EMPTY) {
                        stoneCount++;
                    }
                    return cell;
                })
            );
        });

        const board = new Board(size);
        board.board = cells;
        board.stoneCount = stoneCount;
        return board;
    }

    /**
     * Creates an empty board
     */
    private createEmptyBoard(): PlayerColor[][] {
        return Array(this.size)
            .fill(null)
            .map(() => Array<PlayerColor>(this.size).fill(PlayerColor.EMPTY));
    }

    public getSize(): number {
        return this.size;
    }

    /**
     * Number of stones on the board, which is also the number of moves applied
     */
    public getStoneCount(): number {
        return this.stoneCount;
    }

    /**
     * Gets the color at a specific position
     */
    public getCell(position: Position): PlayerColor {
        if (!this.isValidPosition(position)) {
            throw this.outOfRange(position);
        }
        return this.board[position.row][position.col];
    }

    /**
     * Returns a new board with a stone placed at the specified position
     */
    public place(position: Position, color: PlayerColor): Board {
        if (color === PlayerColor.EMPTY) {
            throw new InvariantError('Cannot place an EMPTY stone');
        }
        if (!this.isEmpty(position)) {
            throw new MoveError(
                'CELL_OCCUPIED',
                `Cell (${position.row}, ${position.col}) is already occupied`
            );
        }

        const next = new Board(this.size);
        next.board = this.getBoard();
        next.board[position.row][position.col] = color;
        next.stoneCount = this.stoneCount + 1;
        return next;
    }

    /**
     * Checks if a position is on the board
     */
    public isValidPosition(position: Position): boolean {
        return (
            Number.isInteger(position.row) &&
            Number.isInteger(position.col) &&
            position.row >= 0 &&
            position.row < this.size &&
            position.col >= 0 &&
            position.col < this.size
        );
    }

    /**
     * Checks if a position is empty
     */
    public isEmpty(position: Position): boolean {
        return this.getCell(position) === PlayerColor.EMPTY;
    }

    public isFull(): boolean {
        return this.stoneCount === this.size * this.size;
    }

    /**
     * Lists the empty positions in row-major order
     */
    public getEmptyPositions(): Position[] {
        const positions: Position[] = [];
        for (let row = 0; row < this.size; row++) {
            for (let col = 0; col < this.size; col++) {
                if (this.board[row][col] === PlayerColor.EMPTY) {
                    positions.push({ row, col });
                }
            }
        }
        return positions;
    }

    /**
     * Gets a copy of the current board state
     */
    public getBoard(): PlayerColor[][] {
        return this.board.map(row => [...row]);
    }

    /**
     * Encodes the board one character per cell, row-major, one line per row.
     * This text is the only view of the board a proposer ever gets.
     */
    public serialize(): string {
        return this.board
            .map(row => row.map(cell => CELL_SYMBOLS[cell]).join(''))
            .join('\n');
    }

    private outOfRange(position: Position): MoveError {
        return new MoveError(
            'OUT_OF_RANGE',
            `Position (${position.row}, ${position.col}) is outside the ${this.size}x${this.size} board`
        );
    }
}

export function symbolOf(color: PlayerColor): string {
    return CELL_SYMBOLS[color];
}
