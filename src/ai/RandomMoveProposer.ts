import { Board } from '../core/Board';
import type { StoneColor } from '../core/types';
import type { MoveProposer } from './MoveProposer';

/**
 * Local player that picks a random empty cell
 */
export class RandomMoveProposer implements MoveProposer {
    public readonly name = 'random';

    /**
     * @param random - Source of numbers in [0, 1), `Math.random` unless overridden
     */
    constructor(private readonly random: () => number = Math.random) {}

    public async propose(serializedBoard: string, _color: StoneColor): Promise<string> {
        const availableMoves = Board.deserialize(serializedBoard).getEmptyPositions();

        if (availableMoves.length === 0) {
            throw new Error('No available moves');
        }

        const randomIndex = Math.floor(this.random() * availableMoves.length);
        const { row, col } = availableMoves[randomIndex];
        return JSON.stringify({ row, col });
    }
}
