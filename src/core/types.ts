/**
 * Represents a position on the Gomoku board
 */
export interface Position {
    row: number;
    col: number;
}

/**
 * Represents the content of a board cell
 */
export enum PlayerColor {
    BLACK = 'BLACK',
    WHITE = 'WHITE',
    EMPTY = 'EMPTY'
}

/**
 * A color that can actually be played
 */
export type StoneColor = PlayerColor.BLACK | PlayerColor.WHITE;

/**
 * Represents a move in the game
 */
export interface Move {
    position: Position;
    color: StoneColor;
}

export enum GameStatus {
    IN_PROGRESS = 'IN_PROGRESS',
    WIN = 'WIN',
    DRAW = 'DRAW',
    FORFEIT = 'FORFEIT'
}

/**
 * Represents the state of the game.
 * FORFEIT is reached when `forfeitedBy` used up its retry budget without a legal move.
 */
export type GameState =
    | { status: GameStatus.IN_PROGRESS }
    | { status: GameStatus.WIN; winner: StoneColor }
    | { status: GameStatus.DRAW }
    | { status: GameStatus.FORFEIT; forfeitedBy: StoneColor; winner: StoneColor };

export type MoveErrorCode =
    | 'OUT_OF_RANGE'
    | 'CELL_OCCUPIED'
    | 'MALFORMED_REPLY'
    | 'PROPOSER_TIMEOUT'
    | 'PROPOSER_FAILED';

/**
 * One request/reply round with a proposer during the current turn
 */
export interface ProposalAttempt {
    attempt: number;
    color: StoneColor;
    serializedBoard: string;
    /** null when the proposer timed out or rejected */
    rawReply: string | null;
    outcome: 'accepted' | MoveErrorCode;
}

export enum LoopPhaseKind {
    AWAITING_MOVE = 'AWAITING_MOVE',
    APPLYING = 'APPLYING',
    TERMINATED = 'TERMINATED'
}

export type LoopPhase =
    | { kind: LoopPhaseKind.AWAITING_MOVE; color: StoneColor }
    | { kind: LoopPhaseKind.APPLYING; move: Move }
    | { kind: LoopPhaseKind.TERMINATED; state: GameState };

/**
 * Final report of a finished game
 */
export interface GameResult {
    state: GameState;
    moves: Move[];
}

export function opponentOf(color: StoneColor): StoneColor {
    return color === PlayerColor.BLACK ? PlayerColor.WHITE : PlayerColor.BLACK;
}

export function isTerminal(state: GameState): boolean {
    return state.status !== GameStatus.IN_PROGRESS;
}

export const DEFAULT_BOARD_SIZE = 15;

/** Stones in a row needed to win */
export const WIN_LENGTH = 5;
