export { Board } from './core/Board';
export { GameLoop, describeState } from './core/GameLoop';
export type { GameLoopOptions } from './core/GameLoop';
export { checkGameState } from './core/WinDetector';
export { validateMove, parsePosition } from './core/MoveValidator';
export type { ValidationResult } from './core/MoveValidator';
export {
    PlayerColor,
    GameStatus,
    LoopPhaseKind,
    DEFAULT_BOARD_SIZE,
    WIN_LENGTH,
    opponentOf,
    isTerminal
} from './core/types';
export type {
    Position,
    StoneColor,
    Move,
    GameState,
    GameResult,
    LoopPhase,
    MoveErrorCode,
    ProposalAttempt
} from './core/types';
export {
    GomokuError,
    MoveError,
    InvariantError,
    ConfigError,
    GameOverError,
    TurnInProgressError,
    BoardFormatError
} from './core/errors';
export { DEFAULT_CONFIG, resolveConfig, configFromEnv } from './config';
export type { GameConfig } from './config';
export { consoleLogger, silentLogger } from './logger';
export type { GameLogger } from './logger';
export * from './ai';
