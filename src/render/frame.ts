import { ANSI_RESET, gameConfig, type GlyphConfig } from 'config/game';
import type { CellKind, TunnelCell } from 'tunnel/cell-cursor';
import type { UnsignedIndex } from 'tunnel/index-type';
import type { TerminalSurface } from './contracts';

export type GlyphTable = Readonly<Record<CellKind, GlyphConfig>>;

const colorize = (glyph: GlyphConfig): string => (glyph.color ? `${glyph.color}${glyph.char}${ANSI_RESET}` : glyph.char);

/**
 * Collapses one pass of cells into plain text lines, one per buffered row.
 * Headless runs and tests read frames this way; the terminal painter does not.
 */
export const buildFrameLines = <I>(
    index: UnsignedIndex<I>,
    cells: Iterable<TunnelCell<I>>,
    glyphs: GlyphTable = gameConfig.glyphs,
): string[] => {
    const lines: string[] = [];
    for (const cell of cells) {
        const row = index.toNumber(cell.row);
        while (lines.length <= row) {
            lines.push('');
        }
        lines[row] += glyphs[cell.kind].char;
    }
    return lines;
};

export interface TunnelPainterOptions {
    readonly glyphs?: GlyphTable;
    readonly scoreColor?: string;
}

export interface TunnelPainter<I> {
    readonly paint: (cells: Iterable<TunnelCell<I>>, score: number) => void;
}

/**
 * Paints every cell at `(column, row)` and the score on the bottom-left cell
 * of the surface.
 */
export const createTunnelPainter = <I>(
    surface: TerminalSurface,
    index: UnsignedIndex<I>,
    options: TunnelPainterOptions = {},
): TunnelPainter<I> => {
    const glyphs = options.glyphs ?? gameConfig.glyphs;
    const scoreColor = options.scoreColor ?? gameConfig.scoreColor;

    const paint = (cells: Iterable<TunnelCell<I>>, score: number) => {
        surface.clear();
        for (const cell of cells) {
            surface.writeAt(index.toNumber(cell.column), index.toNumber(cell.row), colorize(glyphs[cell.kind]));
        }
        surface.writeAt(0, Math.max(0, surface.rows - 1), `${scoreColor}${score}${ANSI_RESET}`);
    };

    return { paint };
};
