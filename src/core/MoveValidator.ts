import { Board } from './Board';
import { MoveError } from './errors';
import { Move, Position, StoneColor } from './types';

export type ValidationResult =
    | { ok: true; move: Move }
    | { ok: false; error: MoveError };

// Flat JSON objects in a reply that also carries prose or a code fence
const EMBEDDED_OBJECT = /\{[^{}]*\}/g;

/**
 * Turns a raw proposer reply into a legal move for `expectedColor`.
 * Nothing in the reply is trusted: coordinates are re-checked against the board
 * and any color the reply names is ignored.
 */
export function validateMove(board: Board, rawReply: string, expectedColor: StoneColor): ValidationResult {
    const position = parsePosition(rawReply);
    if (position === null) {
        return reject('MALFORMED_REPLY', `Reply does not hold integer "row" and "col" fields: ${preview(rawReply)}`);
    }

    if (!board.isValidPosition(position)) {
        const size = board.getSize();
        return reject(
            'OUT_OF_RANGE',
            `Position (${position.row}, ${position.col}) is outside the ${size}x${size} board`
        );
    }
    if (!board.isEmpty(position)) {
        return reject('CELL_OCCUPIED', `Cell (${position.row}, ${position.col}) is already occupied`);
    }

    return { ok: true, move: { position, color: expectedColor } };
}

/**
 * Extracts `{ row, col }` from a reply, or null when it has no such object
 */
export function parsePosition(rawReply: string): Position | null {
    const text = rawReply.trim();
    const decoded = tryParseJson(text);
    if (decoded !== undefined) {
        return toPosition(decoded);
    }

    // Not JSON as a whole: take the first embedded object that holds a position
    for (const [candidate] of text.matchAll(EMBEDDED_OBJECT)) {
        const position = toPosition(tryParseJson(candidate));
        if (position !== null) {
            return position;
        }
    }
    return null;
}

function toPosition(decoded: unknown): Position | null {
    if (!isRecord(decoded)) {
        return null;
    }

    const { row, col } = decoded;
    if (typeof row !== 'number' || typeof col !== 'number') {
        return null;
    }
    if (!Number.isInteger(row) || !Number.isInteger(col)) {
        return null;
    }
    return { row, col };
}

function tryParseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reject(code: MoveError['code'], message: string): ValidationResult {
    return { ok: false, error: new MoveError(code, message) };
}

function preview(text: string): string {
    return text.length > 80 ? `${JSON.stringify(text.slice(0, 80))}...` : JSON.stringify(text);
}
