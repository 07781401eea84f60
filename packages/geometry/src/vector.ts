// Vectors here are readonly tuples of numbers with value semantics: every operation returns a new tuple
// and nothing is ever mutated. The operations live in a separate 'library' object (see VectorLibFactory
// at the bottom of this file), so callers can pass literal arrays straight in, eg. Vec2.add([1, 1], v)

type binOp<T> = (a: T, b: T) => T;
type scalarOp<T> = (a: T, scalar: number) => T;
type reduceOp<T> = (a: T) => number;
type unaryOp<T> = (a: T) => T;
type predOp<T> = (a: T) => boolean;
type VectorConstraint = ReadonlyArray<number>;

function componentOpFn<T extends VectorConstraint>(op: binOp<number>): binOp<T> {
    return (a: T, b: T) => {
        const r: Array<number> = [...a];
        for (let i = 0; i < a.length; i += 1) {
            r[i] = op(a[i], b[i]);
        }
        // the copy has the same length as the input, so it is still a T
        return r as unknown as T;
    };
}
function scalarOpFn<T extends VectorConstraint>(op: scalarOp<number>): scalarOp<T> {
    return (a: T, scalar: number) => {
        const r: Array<number> = [...a];
        for (let i = 0; i < a.length; i += 1) {
            r[i] = op(a[i], scalar);
        }
        return r as unknown as T;
    };
}
function reduceComponentOpFn<T extends VectorConstraint>(op: binOp<number>): reduceOp<T> {
    return (a: T) => {
        let r: number = a[0];
        for (let i = 1; i < a.length; i += 1) {
            r = op(r, a[i]);
        }
        return r;
    };
}
function allCmp<T extends VectorConstraint>(op: predOp<number>): predOp<T> {
    return (a: T) => {
        for (let i = 0; i < a.length; i += 1) {
            if (!op(a[i])) return false;
        }
        return true;
    };
}

export type VectorLib<T> = Readonly<{
    add: binOp<T>;
    sub: binOp<T>;
    mul: binOp<T>;
    div: binOp<T>;
    min: binOp<T>;
    max: binOp<T>;
    map: (v: T, op: (c: number, index: number) => number) => T;
    minComponent: reduceOp<T>;
    maxComponent: reduceOp<T>;
    scale: scalarOp<T>;
    negate: unaryOp<T>;
    sum: reduceOp<T>;
    dot: (a: T, b: T) => number;
    lengthSquared: reduceOp<T>;
    length: reduceOp<T>;
    normalize: unaryOp<T>;
    finite: predOp<T>;
    all: (v: T, op: (c: number) => boolean) => boolean;
    exactlyEqual: (a: T, b: T) => boolean;
}>;

// build a library of component-wise math for a fixed-length vector type V, eg. readonly [number, number]
export function VectorLibFactory<V extends VectorConstraint>(): VectorLib<V> {
    const add = componentOpFn<V>((a, b) => a + b);
    const sub = componentOpFn<V>((a, b) => a - b);
    const mul = componentOpFn<V>((a, b) => a * b);
    const div = componentOpFn<V>((a, b) => a / b);
    const min = componentOpFn<V>((a, b) => Math.min(a, b));
    const max = componentOpFn<V>((a, b) => Math.max(a, b));
    const scale = scalarOpFn<V>((a, b) => a * b);
    const negate = (a: V) => scale(a, -1);
    const sum = reduceComponentOpFn<V>((a, b) => a + b);
    const minComponent = reduceComponentOpFn<V>((a, b) => Math.min(a, b));
    const maxComponent = reduceComponentOpFn<V>((a, b) => Math.max(a, b));
    const dot = (a: V, b: V) => sum(mul(a, b));
    const lengthSquared = (a: V) => dot(a, a);
    const length = (a: V) => Math.sqrt(lengthSquared(a));
    const normalize = (a: V) => scale(a, 1.0 / length(a));
    const finite = allCmp<V>((a) => Number.isFinite(a)); // no NaNs, no +- Infinities
    const all = (vec: V, op: predOp<number>) => allCmp<V>(op)(vec);
    // strict === per component: 0 equals -0, NaN equals nothing
    const exactlyEqual = (a: V, b: V) => a.length === b.length && a.every((c, i) => c === b[i]);
    const map = (v: V, fn: (c: number, index: number) => number) => v.map(fn) as unknown as V;
    return {
        add,
        sub,
        mul,
        div,
        min,
        max,
        map,
        minComponent,
        maxComponent,
        scale,
        negate,
        sum,
        dot,
        lengthSquared,
        length,
        normalize,
        finite,
        all,
        exactlyEqual,
    };
}
