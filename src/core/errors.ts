import type { MoveErrorCode } from './types';

/**
 * Base class for every error raised by the referee
 */
export class GomokuError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A rejected move proposal. Recoverable: the loop asks the proposer again.
 */
export class MoveError extends GomokuError {
    constructor(
        public readonly code: MoveErrorCode,
        message: string
    ) {
        super(message);
    }
}

/**
 * A broken internal invariant. Indicates a bug, never bad input.
 */
export class InvariantError extends GomokuError {}

export class ConfigError extends GomokuError {}

export class GameOverError extends GomokuError {
    constructor() {
        super('Game is already over');
    }
}

/**
 * `playTurn` was called while the previous turn is still waiting on a proposer
 */
export class TurnInProgressError extends GomokuError {
    constructor() {
        super('A turn is already in progress');
    }
}

export class BoardFormatError extends GomokuError {}
