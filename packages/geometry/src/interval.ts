export type Interval = {
    min: number;
    max: number;
};

/**
 *
 * @param i the interval to return the size of
 * @returns the size of the interval, aka the distance between its start and end. note this value may be negative
 */
export function size(i: Interval) {
    return i.max - i.min;
}
/**
 *
 * @param i a given VALID interval
 * @param x  a value
 * @returns true iff the x is within (double-inclusive) the interval i
 */
export function within(i: Interval, x: number): boolean {
    return i.min <= x && i.max >= x;
}
/**
 *
 * @param i a given interval
 * @returns true iff its min and max values are both finite, non-NaN values
 */
export function isFiniteInterval(i: Interval) {
    return Number.isFinite(i.min) && Number.isFinite(i.max);
}
/**
 * @param values at least one value
 * @returns the smallest interval containing every value
 */
export function fromValues(first: number, ...rest: readonly number[]): Interval {
    let min = first;
    let max = first;
    for (const v of rest) {
        if (v < min) {
            min = v;
        } else if (v > max) {
            max = v;
        }
    }
    return { min, max };
}
/**
 *
 * @param a a valid interval
 * @param b a valid interval
 * @return true iff a and b share at least one value. both ends are closed, so intervals that only touch overlap
 */
export function overlaps(a: Interval, b: Interval): boolean {
    return a.min <= b.max && b.min <= a.max;
}
/**
 *
 * @param a a valid interval
 * @param b a valid interval
 * @return the interval where a and b overlap, or undefined if there is no such interval
 */
export function intersection(a: Interval, b: Interval): Interval | undefined {
    const result = { min: Math.max(a.min, b.min), max: Math.min(a.max, b.max) };
    if (size(result) > 0) return result;

    return undefined;
}
