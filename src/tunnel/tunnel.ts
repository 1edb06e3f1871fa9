import type { UnsignedIndex } from './index-type';
import { TunnelCellCursor, type TunnelView } from './cell-cursor';
import { createRowBuffer, type RowBuffer } from './row-buffer';
import { createOpeningRow, deriveNextRow, isWallColumn, type RowGeometry, type RowGenerator } from './row';

/** Rows of context (current row plus two ahead) the visible height reserves. */
export const LOOKAHEAD_BIAS = 3;

const MAX_RESERVED_ROWS = 4096;

/**
 * Scrolling corridor state: the player's column, a fixed corridor width and a
 * sliding window of row geometries. Front of the window is the row the player
 * is on.
 */
export class Tunnel<I> implements TunnelView<I> {
    readonly index: UnsignedIndex<I>;

    readonly corridorWidth: I;

    private readonly rows: RowBuffer<RowGeometry<I>>;

    private player: I;

    private mutations = 0;

    constructor(index: UnsignedIndex<I>, generator: RowGenerator<I>, height: I, width: I) {
        this.index = index;
        this.corridorWidth = width;
        this.player = generator.chooseInitialPlayerOffset(width);

        const prefill = index.sub(height, index.literal(LOOKAHEAD_BIAS));
        this.rows = createRowBuffer(Math.min(index.toNumber(prefill) + 1, MAX_RESERVED_ROWS));
        for (let filled = index.zero; index.lessThan(filled, prefill); filled = index.add(filled, index.one)) {
            this.advanceRow(generator);
        }
    }

    get playerColumn(): I {
        return this.player;
    }

    get rowCount(): number {
        return this.rows.size();
    }

    /** Bumped on every mutation; cursors compare against it. */
    get revision(): number {
        return this.mutations;
    }

    rowAt(position: number): RowGeometry<I> | undefined {
        return this.rows.at(position);
    }

    frontRow(): RowGeometry<I> | undefined {
        return this.rows.front();
    }

    advanceRow(generator: RowGenerator<I>): void {
        const last = this.rows.back();
        const next = last
            ? deriveNextRow(this.index, last, this.corridorWidth, generator.chooseNextMove())
            : createOpeningRow(this.index, this.corridorWidth);
        this.rows.pushBack(next);
        this.mutations += 1;
    }

    step(generator: RowGenerator<I>): void {
        this.advanceRow(generator);
        this.rows.popFront();
    }

    movePlayerLeft(): void {
        this.player = this.index.sub(this.player, this.index.one);
        this.mutations += 1;
    }

    movePlayerRight(): void {
        this.player = this.index.add(this.player, this.index.one);
        this.mutations += 1;
    }

    isCollision(): boolean {
        const front = this.rows.front();
        if (!front) {
            return false;
        }
        return isWallColumn(this.index, front, this.player);
    }

    cells(): TunnelCellCursor<I> {
        return new TunnelCellCursor(this);
    }
}
