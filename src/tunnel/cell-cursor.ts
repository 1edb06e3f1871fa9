import type { UnsignedIndex } from './index-type';
import { isWallColumn, type RowGeometry } from './row';

export type CellKind = 'player' | 'floor' | 'wall';

export interface TunnelCell<I> {
    readonly row: I;
    readonly column: I;
    readonly kind: CellKind;
}

/** Read side of a tunnel, as seen by a cursor. */
export interface TunnelView<I> {
    readonly index: UnsignedIndex<I>;
    readonly corridorWidth: I;
    readonly playerColumn: I;
    readonly rowCount: number;
    readonly revision: number;
    rowAt(position: number): RowGeometry<I> | undefined;
}

/**
 * Single-pass walk over every buffered row crossed with every column.
 *
 * The row cursor only moves when the column cursor wraps. The row limit is
 * converted once through `fromCount`, so a buffer the index type cannot count
 * enumerates as empty. A cursor whose tunnel has stepped or moved since it was
 * created reports done.
 */
export class TunnelCellCursor<I> implements IterableIterator<TunnelCell<I>> {
    private readonly index: UnsignedIndex<I>;

    private readonly rowLimit: I;

    private readonly revision: number;

    private row: I;

    private column: I;

    constructor(private readonly view: TunnelView<I>) {
        this.index = view.index;
        this.rowLimit = view.index.fromCount(view.rowCount);
        this.revision = view.revision;
        this.row = view.index.zero;
        this.column = view.index.zero;
    }

    [Symbol.iterator](): TunnelCellCursor<I> {
        return this;
    }

    next(): IteratorResult<TunnelCell<I>> {
        const { index, view } = this;
        if (view.revision !== this.revision) {
            return { done: true, value: undefined };
        }
        if (!index.lessThan(this.column, view.corridorWidth) || !index.lessThan(this.row, this.rowLimit)) {
            return { done: true, value: undefined };
        }

        const geometry = view.rowAt(index.toNumber(this.row));
        if (!geometry) {
            return { done: true, value: undefined };
        }

        const cell: TunnelCell<I> = {
            row: this.row,
            column: this.column,
            kind: this.classify(geometry),
        };

        this.column = index.add(this.column, index.one);
        if (!index.lessThan(this.column, view.corridorWidth)) {
            this.column = index.zero;
            this.row = index.add(this.row, index.one);
        }

        return { done: false, value: cell };
    }

    private classify(geometry: RowGeometry<I>): CellKind {
        const { index, view } = this;
        if (index.equals(this.row, index.zero) && index.equals(this.column, view.playerColumn)) {
            return 'player';
        }
        return isWallColumn(index, geometry, this.column) ? 'wall' : 'floor';
    }
}
