import type { StoneColor } from '../core/types';

/**
 * Anything that can suggest a move: a language model, a local player, a script.
 *
 * The referee treats every reply as untrusted text. Each call is an independent
 * attempt, and the proposer may be called again for the same turn.
 */
export interface MoveProposer {
    readonly name: string;

    /**
     * Proposes a move for `color`
     * @param serializedBoard - Snapshot from `Board.serialize()`
     * @returns Raw reply, expected to contain `{"row": r, "col": c}`
     */
    propose(serializedBoard: string, color: StoneColor): Promise<string>;
}
