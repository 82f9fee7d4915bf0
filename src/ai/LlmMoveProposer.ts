import type { StoneColor } from '../core/types';
import type { MoveProposer } from './MoveProposer';
import { buildMoveMessages, ChatMessage } from './prompt';

/**
 * Sends chat messages to a model and resolves with the text of its answer.
 * Transport, credentials and model choice live behind this function.
 */
export type ChatCompletion = (messages: ChatMessage[]) => Promise<string>;

/**
 * Asks a chat model for moves
 */
export class LlmMoveProposer implements MoveProposer {
    public readonly name: string;

    constructor(
        private readonly complete: ChatCompletion,
        name = 'llm'
    ) {
        this.name = name;
    }

    public async propose(serializedBoard: string, color: StoneColor): Promise<string> {
        return this.complete(buildMoveMessages(serializedBoard, color));
    }
}
