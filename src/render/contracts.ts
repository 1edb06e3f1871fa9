/**
 * Render Contract
 *
 * Purpose: The drawing surface a tunnel session paints on. Coordinates are
 * zero based, `x` is the column and `y` the row.
 */

import type { KeySource } from 'input/contracts';

export interface TerminalSurface extends KeySource {
    /** Visible size in character cells. */
    readonly columns: number;
    readonly rows: number;

    /**
     * Take over the terminal (alternate screen, hidden cursor, raw keys).
     */
    open(): void;

    /**
     * Give the terminal back. Safe to call more than once.
     */
    close(): void;

    clear(): void;

    /**
     * Write text at a cell position. `text` may carry ANSI colour codes.
     */
    writeAt(x: number, y: number, text: string): void;
}
