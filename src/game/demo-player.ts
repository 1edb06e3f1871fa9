import type { UnsignedIndex } from 'tunnel/index-type';
import type { TunnelCell } from 'tunnel/cell-cursor';

export type DemoDecision = 'left' | 'right' | 'stay';

export interface DemoObservation<I> {
    readonly player: I;
    readonly safeLeft: I;
    readonly safeRight: I;
    readonly goal: I;
}

/**
 * Reads one pass of cells and records where the player is and which columns
 * of the next row are open. Keeps three values, never the grid.
 */
export const observeTunnel = <I>(index: UnsignedIndex<I>, cells: Iterable<TunnelCell<I>>): DemoObservation<I> => {
    // Row 1 is the one the next step scrolls under the player.
    const lookaheadRow = index.one;
    let player = index.zero;
    let safeLeft = index.max;
    let safeRight = index.zero;

    for (const cell of cells) {
        if (cell.kind === 'wall') {
            continue;
        }
        if (cell.kind === 'player') {
            player = cell.column;
        }
        if (index.equals(cell.row, lookaheadRow)) {
            if (index.lessThan(cell.column, safeLeft)) {
                safeLeft = cell.column;
            }
            if (index.lessThan(safeRight, cell.column)) {
                safeRight = cell.column;
            }
        }
    }

    const goal = index.add(safeLeft, index.half(index.sub(safeRight, safeLeft)));
    return { player, safeLeft, safeRight, goal };
};

export const chooseDemoMove = <I>(index: UnsignedIndex<I>, cells: Iterable<TunnelCell<I>>): DemoDecision => {
    const { player, goal } = observeTunnel(index, cells);
    if (index.lessThan(goal, player)) {
        return 'left';
    }
    if (index.lessThan(player, goal)) {
        return 'right';
    }
    return 'stay';
};
