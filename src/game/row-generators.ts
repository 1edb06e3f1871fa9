import type { UnsignedIndex } from 'tunnel/index-type';
import type { NarrowChoice, RowGenerator } from 'tunnel/row';
import type { RandomManager } from 'util/random';

/** Starts the player mid-corridor and flips a fair coin for every row. */
export const createRandomRowGenerator = <I>(index: UnsignedIndex<I>, random: RandomManager): RowGenerator<I> => ({
    chooseInitialPlayerOffset: (corridorWidth) => index.half(corridorWidth),
    chooseNextMove: () => (random.boolean(0.5) ? 'narrow-from-left' : 'narrow-from-right'),
});

export interface ScriptedRowGeneratorOptions<I> {
    readonly initialOffset: I;
    readonly moves: readonly NarrowChoice[];
}

export interface ScriptedRowGenerator<I> extends RowGenerator<I> {
    /** Moves handed out so far. */
    readonly consumed: () => number;
}

/**
 * Replays `moves` in order, then keeps repeating the last one. An empty script
 * always answers `narrow-from-right`.
 */
export const createScriptedRowGenerator = <I>(options: ScriptedRowGeneratorOptions<I>): ScriptedRowGenerator<I> => {
    const moves = [...options.moves];
    let cursor = 0;

    const chooseNextMove = (): NarrowChoice => {
        const fallback: NarrowChoice = moves.length > 0 ? moves[moves.length - 1] : 'narrow-from-right';
        const choice = cursor < moves.length ? moves[cursor] : fallback;
        cursor += 1;
        return choice;
    };

    return {
        chooseInitialPlayerOffset: () => options.initialOffset,
        chooseNextMove,
        consumed: () => cursor,
    };
};
