export type SmallLiteral = 0 | 1 | 2 | 3;

/**
 * Unsigned integer capability the tunnel engine is written against.
 *
 * Arithmetic saturates at `zero` and `max`. `fromCount` never throws: a count
 * the type cannot hold comes back as `zero`, which callers treat as "nothing to
 * enumerate".
 */
export interface UnsignedIndex<I> {
    readonly name: string;
    readonly zero: I;
    readonly one: I;
    readonly two: I;
    readonly three: I;
    readonly max: I;
    literal(value: SmallLiteral): I;
    add(a: I, b: I): I;
    sub(a: I, b: I): I;
    half(value: I): I;
    compare(a: I, b: I): number;
    lessThan(a: I, b: I): boolean;
    equals(a: I, b: I): boolean;
    fromCount(count: number): I;
    toNumber(value: I): number;
}

const MAX_NUMBER_BITS = 32;

const isCount = (count: number): boolean => Number.isInteger(count) && count >= 0;

export const createFixedWidthIndex = (bits: number): UnsignedIndex<number> => {
    if (!Number.isInteger(bits) || bits < 2 || bits > MAX_NUMBER_BITS) {
        throw new RangeError(`bits must be an integer between 2 and ${MAX_NUMBER_BITS}`);
    }

    const max = 2 ** bits - 1;
    const literals: Record<SmallLiteral, number> = { 0: 0, 1: 1, 2: 2, 3: 3 };

    const compare = (a: number, b: number): number => (a < b ? -1 : a > b ? 1 : 0);

    return {
        name: `uint${bits}`,
        zero: 0,
        one: 1,
        two: 2,
        three: 3,
        max,
        literal: (value) => literals[value],
        add: (a, b) => Math.min(max, a + b),
        sub: (a, b) => Math.max(0, a - b),
        half: (value) => Math.floor(value / 2),
        compare,
        lessThan: (a, b) => a < b,
        equals: (a, b) => a === b,
        fromCount: (count) => (isCount(count) && count <= max ? count : 0),
        toNumber: (value) => value,
    } satisfies UnsignedIndex<number>;
};

const UINT64_MAX = (1n << 64n) - 1n;

const createUint64Index = (): UnsignedIndex<bigint> => {
    const literals: Record<SmallLiteral, bigint> = { 0: 0n, 1: 1n, 2: 2n, 3: 3n };

    const clamp = (value: bigint): bigint => {
        if (value < 0n) {
            return 0n;
        }
        return value > UINT64_MAX ? UINT64_MAX : value;
    };

    return {
        name: 'uint64',
        zero: 0n,
        one: 1n,
        two: 2n,
        three: 3n,
        max: UINT64_MAX,
        literal: (value) => literals[value],
        add: (a, b) => clamp(a + b),
        sub: (a, b) => clamp(a - b),
        half: (value) => value / 2n,
        compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
        lessThan: (a, b) => a < b,
        equals: (a, b) => a === b,
        fromCount: (count) => {
            if (!isCount(count)) {
                return 0n;
            }
            const value = BigInt(count);
            return value <= UINT64_MAX ? value : 0n;
        },
        toNumber: (value) => Number(value),
    } satisfies UnsignedIndex<bigint>;
};

export const uint8 = createFixedWidthIndex(8);
export const uint16 = createFixedWidthIndex(16);
export const uint32 = createFixedWidthIndex(32);
export const uint64 = createUint64Index();
