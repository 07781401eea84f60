import { Vec2, type vec2 } from './vec2';

/**
 * a 2x2 matrix, stored as two columns. The first column is where the x-axis [1,0] ends up,
 * the second is where the y-axis [0,1] ends up.
 */
export type mat2 = readonly [vec2, vec2];

const identity = (): mat2 => [
    [1, 0],
    [0, 1],
];

/**
 * @param radians the angle of rotation about the origin, counter-clockwise in a y-up frame
 * (clockwise on screen, where y points down)
 */
const rotate = (radians: number): mat2 => {
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    return [
        [cos, sin],
        [-sin, cos],
    ];
};

const scale = ([sx, sy]: vec2): mat2 => [
    [sx, 0],
    [0, sy],
];

const transpose = ([[a, b], [c, d]]: mat2): mat2 => [
    [a, c],
    [b, d],
];

const transform = (m: mat2, [x, y]: vec2): vec2 => {
    const [[a, b], [c, d]] = m;
    return [a * x + c * y, b * x + d * y];
};

/**
 * Note the ordering of arguments: we follow the math convention "b (x) a", so that
 * transform(mul(b, a), v) === transform(b, transform(a, v)) - a happens first, then b
 * @returns a single matrix equivalent to applying a and then b
 */
const mul = (b: mat2, a: mat2): mat2 => [transform(b, a[0]), transform(b, a[1])];

const determinant = ([[a, b], [c, d]]: mat2): number => a * d - c * b;

/**
 * @returns the inverse of m, or undefined if m is singular (or not finite)
 */
const invert = (m: mat2): mat2 | undefined => {
    const det = determinant(m);
    if (det === 0 || !Number.isFinite(det)) {
        return undefined;
    }
    const [[a, b], [c, d]] = m;
    return [
        [d / det, -b / det],
        [-c / det, a / det],
    ];
};

const exactlyEqual = (m: mat2, n: mat2) => Vec2.exactlyEqual(m[0], n[0]) && Vec2.exactlyEqual(m[1], n[1]);

const finite = (m: mat2) => Vec2.finite(m[0]) && Vec2.finite(m[1]);

export const Mat2 = { identity, rotate, scale, transpose, transform, mul, determinant, invert, exactlyEqual, finite };
