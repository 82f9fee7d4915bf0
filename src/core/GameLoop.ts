import type { MoveProposer } from '../ai/MoveProposer';
import { GameConfig, resolveConfig } from '../config';
import { consoleLogger, GameLogger } from '../logger';
import { Board } from './Board';
import { GameOverError, MoveError, TurnInProgressError } from './errors';
import { validateMove } from './MoveValidator';
import {
    GameResult,
    GameState,
    GameStatus,
    isTerminal,
    LoopPhase,
    LoopPhaseKind,
    Move,
    MoveErrorCode,
    opponentOf,
    PlayerColor,
    ProposalAttempt,
    StoneColor
} from './types';
import { checkGameState } from './WinDetector';

export interface GameLoopOptions extends Partial<GameConfig> {
    /** Which proposer plays each side */
    players: Record<StoneColor, MoveProposer>;
    logger?: GameLogger;
}

type ProposalReply =
    | { ok: true; text: string }
    | { ok: false; error: MoveError };

/**
 * Referee for one game: asks proposers for moves, validates and applies them,
 * and decides when the game is over.
 *
 * A side that sends `retryLimit` unusable proposals in a single turn forfeits.
 */
export class GameLoop {
    private readonly config: GameConfig;
    private readonly players: Record<StoneColor, MoveProposer>;
    private readonly logger: GameLogger;
    private board: Board;
    private currentPlayer: StoneColor;
    private phase: LoopPhase;
    private moveHistory: Move[];
    private attempts: ProposalAttempt[];
    private turnInProgress = false;

    constructor({ players, logger = consoleLogger, ...overrides }: GameLoopOptions) {
        this.config = resolveConfig(overrides);
        this.players = { ...players };
        this.logger = logger;
        this.board = new Board(this.config.boardSize);
        this.currentPlayer = PlayerColor.BLACK; // Black plays first
        this.phase = { kind: LoopPhaseKind.AWAITING_MOVE, color: this.currentPlayer };
        this.moveHistory = [];
        this.attempts = [];
    }

    public getBoard(): Board {
        return this.board;
    }

    public getConfig(): Readonly<GameConfig> {
        return this.config;
    }

    /**
     * Side to move, or the side that made the final move once the game is over
     */
    public getCurrentPlayer(): StoneColor {
        return this.currentPlayer;
    }

    public getPhase(): LoopPhase {
        return this.phase;
    }

    public getGameState(): GameState {
        return this.phase.kind === LoopPhaseKind.TERMINATED
            ? this.phase.state
            : { status: GameStatus.IN_PROGRESS };
    }

    public isOver(): boolean {
        return this.phase.kind === LoopPhaseKind.TERMINATED;
    }

    /**
     * Gets the applied moves in order
     */
    public getMoveHistory(): Move[] {
        return [...this.moveHistory];
    }

    /**
     * Gets the proposals made so far in the current turn.
     * Cleared whenever a move is applied.
     */
    public getAttempts(): ProposalAttempt[] {
        return [...this.attempts];
    }

    /**
     * Plays until the game ends
     */
    public async run(): Promise<GameResult> {
        while (!this.isOver()) {
            await this.playTurn();
        }
        return { state: this.getGameState(), moves: this.getMoveHistory() };
    }

    /**
     * Plays one turn for the current player, retrying rejected proposals
     * up to the retry limit. Turns never overlap: a call made before the
     * previous one settled is rejected with `TurnInProgressError`.
     */
    public async playTurn(): Promise<GameState> {
        if (this.isOver()) {
            throw new GameOverError();
        }
        if (this.turnInProgress) {
            throw new TurnInProgressError();
        }

        this.turnInProgress = true;
        try {
            return await this.negotiateMove();
        } finally {
            this.turnInProgress = false;
        }
    }

    private async negotiateMove(): Promise<GameState> {
        const color = this.currentPlayer;
        const proposer = this.players[color];
        const { retryLimit } = this.config;
        this.attempts = [];

        while (this.attempts.length < retryLimit) {
            const attempt = this.attempts.length + 1;
            const serializedBoard = this.board.serialize();
            const reply = await this.requestProposal(proposer, serializedBoard, color);
            const result = reply.ok ? validateMove(this.board, reply.text, color) : reply;
            const rawReply = reply.ok ? reply.text : null;

            if (result.ok) {
                this.attempts.push({ attempt, color, serializedBoard, rawReply, outcome: 'accepted' });
                return this.applyMove(result.move);
            }

            this.attempts.push({ attempt, color, serializedBoard, rawReply, outcome: result.error.code });
            this.logger.warn(
                `${color} proposal ${attempt}/${retryLimit} from ${proposer.name} rejected (${result.error.code}): ${result.error.message}`
            );
        }

        return this.terminate({
            status: GameStatus.FORFEIT,
            forfeitedBy: color,
            winner: opponentOf(color)
        });
    }

    private applyMove(move: Move): GameState {
        this.phase = { kind: LoopPhaseKind.APPLYING, move };
        this.board = this.board.place(move.position, move.color);
        this.moveHistory.push(move);
        this.attempts = [];
        this.logger.debug(`${move.color} plays (${move.position.row}, ${move.position.col})`);

        const state = checkGameState(this.board, move);
        if (isTerminal(state)) {
            return this.terminate(state);
        }

        this.currentPlayer = opponentOf(this.currentPlayer);
        this.phase = { kind: LoopPhaseKind.AWAITING_MOVE, color: this.currentPlayer };
        return state;
    }

    private terminate(state: GameState): GameState {
        this.phase = { kind: LoopPhaseKind.TERMINATED, state };
        this.logger.info(`Game over after ${this.moveHistory.length} moves: ${describeState(state)}`);
        return state;
    }

    /**
     * Calls the proposer, turning a rejection or a timeout into a MoveError
     */
    private async requestProposal(
        proposer: MoveProposer,
        serializedBoard: string,
        color: StoneColor
    ): Promise<ProposalReply> {
        const call = Promise.resolve()
            .then(() => proposer.propose(serializedBoard, color))
            .then(
                (text): ProposalReply => ({ ok: true, text }),
                (error: unknown): ProposalReply =>
                    failure('PROPOSER_FAILED', `${proposer.name} failed: ${errorMessage(error)}`)
            );

        const timeoutMs = this.config.proposerTimeoutMs;
        if (timeoutMs === null) {
            return call;
        }

        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<ProposalReply>(resolve => {
            timer = setTimeout(
                () => resolve(failure('PROPOSER_TIMEOUT', `${proposer.name} did not answer within ${timeoutMs}ms`)),
                timeoutMs
            );
        });

        try {
            return await Promise.race([call, timeout]);
        } finally {
            clearTimeout(timer);
        }
    }
}

function failure(code: MoveErrorCode, message: string): ProposalReply {
    return { ok: false, error: new MoveError(code, message) };
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * One-line summary of a game state, e.g. for logs
 */
export function describeState(state: GameState): string {
    switch (state.status) {
        case GameStatus.IN_PROGRESS:
            return 'in progress';
        case GameStatus.WIN:
            return `${state.winner} wins`;
        case GameStatus.DRAW:
            return 'draw';
        case GameStatus.FORFEIT:
            return `${state.forfeitedBy} forfeits by invalid moves, ${state.winner} wins`;
    }
}
