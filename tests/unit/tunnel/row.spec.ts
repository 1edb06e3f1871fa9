import { describe, expect, it } from 'vitest';
import { uint8 } from 'tunnel/index-type';
import { createOpeningRow, deriveNextRow, isWallColumn } from 'tunnel/row';

describe('isWallColumn', () => {
    it('treats the left wall and everything past the gap as wall', () => {
        const row = { leftWallIndex: 0, gapWidth: 3 };
        const walls = [0, 1, 2, 3, 4].map((column) => isWallColumn(uint8, row, column));
        expect(walls).toEqual([true, false, false, false, true]);
    });

    it('saturates the right boundary at the index maximum', () => {
        const row = { leftWallIndex: 250, gapWidth: 10 };
        expect(isWallColumn(uint8, row, 255)).toBe(false);
        expect(isWallColumn(uint8, row, 250)).toBe(true);
    });
});

describe('createOpeningRow', () => {
    it('opens every column between the edge walls', () => {
        expect(createOpeningRow(uint8, 5)).toEqual({ leftWallIndex: 0, gapWidth: 3 });
    });

    it('saturates the gap for corridors narrower than three', () => {
        expect(createOpeningRow(uint8, 1)).toEqual({ leftWallIndex: 0, gapWidth: 0 });
        expect(createOpeningRow(uint8, 0)).toEqual({ leftWallIndex: 0, gapWidth: 0 });
    });
});

describe('deriveNextRow', () => {
    it('narrows the gap by one every row', () => {
        expect(deriveNextRow(uint8, { leftWallIndex: 4, gapWidth: 3 }, 20, 'narrow-from-right')).toEqual({
            leftWallIndex: 4,
            gapWidth: 2,
        });
    });

    it('shifts the left wall right when the corridor still fits', () => {
        expect(deriveNextRow(uint8, { leftWallIndex: 0, gapWidth: 2 }, 10, 'narrow-from-left')).toEqual({
            leftWallIndex: 1,
            gapWidth: 1,
        });
    });

    it('keeps the left wall when the shift would crowd the right edge', () => {
        expect(deriveNextRow(uint8, { leftWallIndex: 0, gapWidth: 3 }, 5, 'narrow-from-left')).toEqual({
            leftWallIndex: 0,
            gapWidth: 2,
        });
        expect(deriveNextRow(uint8, { leftWallIndex: 1, gapWidth: 1 }, 5, 'narrow-from-left')).toEqual({
            leftWallIndex: 1,
            gapWidth: 1,
        });
    });

    it('moves the corridor left only once the gap is minimal', () => {
        expect(deriveNextRow(uint8, { leftWallIndex: 4, gapWidth: 2 }, 20, 'narrow-from-right')).toEqual({
            leftWallIndex: 3,
            gapWidth: 1,
        });
        expect(deriveNextRow(uint8, { leftWallIndex: 4, gapWidth: 1 }, 20, 'narrow-from-right')).toEqual({
            leftWallIndex: 3,
            gapWidth: 1,
        });
    });

    it('never pulls the left wall below column zero', () => {
        expect(deriveNextRow(uint8, { leftWallIndex: 0, gapWidth: 1 }, 20, 'narrow-from-right')).toEqual({
            leftWallIndex: 0,
            gapWidth: 1,
        });
    });

    it('leaves a zero gap alone', () => {
        expect(deriveNextRow(uint8, { leftWallIndex: 0, gapWidth: 0 }, 0, 'narrow-from-left')).toEqual({
            leftWallIndex: 0,
            gapWidth: 0,
        });
        expect(deriveNextRow(uint8, { leftWallIndex: 0, gapWidth: 0 }, 0, 'narrow-from-right')).toEqual({
            leftWallIndex: 0,
            gapWidth: 0,
        });
    });
});
