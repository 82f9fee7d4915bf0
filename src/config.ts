import { ConfigError } from './core/errors';
import { DEFAULT_BOARD_SIZE, WIN_LENGTH } from './core/types';

/**
 * Plain values the game loop is built from
 */
export interface GameConfig {
    boardSize: number;
    /** Invalid proposals allowed per turn before the side forfeits */
    retryLimit: number;
    /** Per-call proposer timeout in milliseconds; null waits forever */
    proposerTimeoutMs: number | null;
}

/** Longest delay `setTimeout` honours; larger values fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_CONFIG: Readonly<GameConfig> = {
    boardSize: DEFAULT_BOARD_SIZE,
    retryLimit: 3,
    proposerTimeoutMs: null
};

/**
 * Applies overrides on top of the defaults and checks every value
 */
export function resolveConfig(overrides: Partial<GameConfig> = {}): GameConfig {
    const config: GameConfig = { ...DEFAULT_CONFIG };
    if (overrides.boardSize !== undefined) config.boardSize = overrides.boardSize;
    if (overrides.retryLimit !== undefined) config.retryLimit = overrides.retryLimit;
    if (overrides.proposerTimeoutMs !== undefined) config.proposerTimeoutMs = overrides.proposerTimeoutMs;

    if (!Number.isInteger(config.boardSize) || config.boardSize < WIN_LENGTH) {
        throw new ConfigError(`boardSize must be an integer of at least ${WIN_LENGTH}, got ${config.boardSize}`);
    }
    if (!Number.isInteger(config.retryLimit) || config.retryLimit < 1) {
        throw new ConfigError(`retryLimit must be a positive integer, got ${config.retryLimit}`);
    }
    if (
        config.proposerTimeoutMs !== null &&
        (!Number.isFinite(config.proposerTimeoutMs) ||
            config.proposerTimeoutMs <= 0 ||
            config.proposerTimeoutMs > MAX_TIMEOUT_MS)
    ) {
        throw new ConfigError(
            `proposerTimeoutMs must be a positive number of at most ${MAX_TIMEOUT_MS}, got ${config.proposerTimeoutMs}`
        );
    }

    return config;
}

const ENV_KEYS = {
    boardSize: 'GOMOKU_BOARD_SIZE',
    retryLimit: 'GOMOKU_RETRY_LIMIT',
    proposerTimeoutMs: 'GOMOKU_PROPOSER_TIMEOUT_MS'
} as const;

/**
 * Reads overrides from environment variables. Unset or blank variables keep the default.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): GameConfig {
    const overrides: Partial<GameConfig> = {};

    const boardSize = readNumber(env, ENV_KEYS.boardSize);
    if (boardSize !== undefined) overrides.boardSize = boardSize;

    const retryLimit = readNumber(env, ENV_KEYS.retryLimit);
    if (retryLimit !== undefined) overrides.retryLimit = retryLimit;

    const timeout = readNumber(env, ENV_KEYS.proposerTimeoutMs);
    if (timeout !== undefined) overrides.proposerTimeoutMs = timeout;

    return resolveConfig(overrides);
}

function readNumber(env: Record<string, string | undefined>, key: string): number | undefined {
    const raw = env[key]?.trim();
    if (raw === undefined || raw === '') {
        return undefined;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
        throw new ConfigError(`${key} must be a number, got "${raw}"`);
    }
    return value;
}
