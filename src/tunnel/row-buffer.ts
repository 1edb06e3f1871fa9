export interface RowBuffer<T> {
    readonly size: () => number;
    readonly front: () => T | undefined;
    readonly back: () => T | undefined;
    readonly at: (position: number) => T | undefined;
    readonly pushBack: (value: T) => void;
    readonly popFront: () => T | undefined;
}

const MIN_CAPACITY = 4;

const normalizeCapacity = (capacity: number): number => {
    if (!Number.isFinite(capacity) || capacity < MIN_CAPACITY) {
        return MIN_CAPACITY;
    }
    return Math.floor(capacity);
};

/**
 * Double-ended ring of rows. Sized up front for the lookahead window and only
 * grows when a caller pushes past it.
 */
export const createRowBuffer = <T>(initialCapacity = MIN_CAPACITY): RowBuffer<T> => {
    let slots: (T | undefined)[] = new Array<T | undefined>(normalizeCapacity(initialCapacity));
    let head = 0;
    let count = 0;

    const slotFor = (position: number): number => (head + position) % slots.length;

    const grow = () => {
        const next = new Array<T | undefined>(slots.length * 2);
        for (let position = 0; position < count; position += 1) {
            next[position] = slots[slotFor(position)];
        }
        slots = next;
        head = 0;
    };

    const at = (position: number): T | undefined => {
        if (!Number.isInteger(position) || position < 0 || position >= count) {
            return undefined;
        }
        return slots[slotFor(position)];
    };

    const pushBack = (value: T) => {
        if (count === slots.length) {
            grow();
        }
        slots[slotFor(count)] = value;
        count += 1;
    };

    const popFront = (): T | undefined => {
        if (count === 0) {
            return undefined;
        }
        const value = slots[head];
        slots[head] = undefined;
        head = (head + 1) % slots.length;
        count -= 1;
        return value;
    };

    return {
        size: () => count,
        front: () => at(0),
        back: () => at(count - 1),
        at,
        pushBack,
        popFront,
    };
};
