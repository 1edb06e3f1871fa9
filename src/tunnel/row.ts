import type { UnsignedIndex } from './index-type';

export interface RowGeometry<I> {
    /** Rightmost column occupied by the left wall. */
    readonly leftWallIndex: I;
    /** Passable columns between the left wall and the right wall. */
    readonly gapWidth: I;
}

export type NarrowChoice = 'narrow-from-left' | 'narrow-from-right';

/**
 * Shapes the corridor. The tunnel calls `chooseNextMove` once for every row it
 * derives from the previous one; the first row of an empty tunnel is fixed.
 */
export interface RowGenerator<I> {
    chooseInitialPlayerOffset(corridorWidth: I): I;
    chooseNextMove(): NarrowChoice;
}

export const isWallColumn = <I>(index: UnsignedIndex<I>, row: RowGeometry<I>, column: I): boolean => {
    if (!index.lessThan(row.leftWallIndex, column)) {
        return true;
    }
    return index.lessThan(index.add(row.leftWallIndex, row.gapWidth), column);
};

export const createOpeningRow = <I>(index: UnsignedIndex<I>, corridorWidth: I): RowGeometry<I> => ({
    leftWallIndex: index.zero,
    gapWidth: index.sub(corridorWidth, index.two),
});

export const deriveNextRow = <I>(
    index: UnsignedIndex<I>,
    previous: RowGeometry<I>,
    corridorWidth: I,
    choice: NarrowChoice,
): RowGeometry<I> => {
    let { leftWallIndex, gapWidth } = previous;

    if (index.lessThan(index.one, gapWidth)) {
        gapWidth = index.sub(gapWidth, index.one);
    }

    if (choice === 'narrow-from-left') {
        // The shifted corridor has to keep two wall columns before the right edge.
        const reach = index.add(index.add(leftWallIndex, gapWidth), index.three);
        if (index.lessThan(reach, corridorWidth)) {
            leftWallIndex = index.add(leftWallIndex, index.one);
        }
    } else if (index.equals(gapWidth, index.one)) {
        leftWallIndex = index.sub(leftWallIndex, index.one);
    }

    return { leftWallIndex, gapWidth };
};
