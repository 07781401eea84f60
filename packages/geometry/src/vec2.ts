import { VectorLibFactory } from './vector';

export type vec2 = readonly [number, number];
const isVec2 = (v: ReadonlyArray<number>): v is vec2 => v.length === 2;

// Determinants are difficult to support in a generic fashion, so only the 2D library has one
function det([a, b]: vec2, [c, d]: vec2): number {
    return a * d - c * b;
}

// rotate a quarter turn counter-clockwise (in a y-up frame)
function perpendicular([x, y]: vec2): vec2 {
    return [-y, x];
}

export const Vec2 = { isVec2, det, perpendicular, ...VectorLibFactory<vec2>() };
