import { symbolOf } from '../core/Board';
import { opponentOf, PlayerColor, StoneColor } from '../core/types';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

/**
 * Builds the system and user messages asking a chat model for its next move
 */
export function buildMoveMessages(serializedBoard: string, color: StoneColor): ChatMessage[] {
    const player = symbolOf(color);
    const rival = symbolOf(opponentOf(color));
    const size = serializedBoard.split('\n').length;

    const system = [
        'You are a professional Gomoku (5-in-a-row) player acting as a tactical engine.',
        `You play as ${player} and the opponent plays as ${rival}.`,
        'Evaluate the board using this priority order:',
        '1. If there is a move that wins immediately, choose it.',
        '2. If the opponent has a move that wins next turn, block it.',
        '3. If there is a move that creates an open 4, choose it.',
        "4. If there is a move that blocks opponent's open 4, choose it.",
        '5. If there is a move that creates an open 3, choose it.',
        '6. Otherwise, play the strongest positional move that advances your attack or limits theirs.',
        'Output only the coordinates of the chosen move.'
    ].join('\n');

    const user = [
        `Here is the current board. The grid is ${size}x${size}, with row and column indices labeled.`,
        'Cells contain:',
        `- "${symbolOf(PlayerColor.EMPTY)}" for empty`,
        `- "${player}" for your stones`,
        `- "${rival}" for opponent's stones`,
        '',
        labelBoard(serializedBoard),
        '',
        'Return ONLY a JSON object with two integers: row and col.',
        'No extra text, no explanation, no code block.',
        '',
        'Example:',
        '{"row": 3, "col": 4}'
    ].join('\n');

    return [
        { role: 'system', content: system },
        { role: 'user', content: user }
    ];
}

/**
 * Adds column indices on top and row indices on the left of a serialized board
 */
export function labelBoard(serializedBoard: string): string {
    const rows = serializedBoard.split('\n');
    const width = String(rows.length - 1).length;
    const pad = (value: number | string): string => String(value).padStart(width);

    const header = [' '.repeat(width), ...rows.map((_, col) => pad(col))].join(' ');
    const body = rows.map((line, row) => [pad(row), ...Array.from(line, cell => pad(cell))].join(' '));
    return [header, ...body].join('\n');
}
