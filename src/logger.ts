/**
 * The subset of `console` the referee writes to
 */
export interface GameLogger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
}

const noop = (): void => undefined;

export const silentLogger: GameLogger = {
    debug: noop,
    info: noop,
    warn: noop
};

export const consoleLogger: GameLogger = console;
