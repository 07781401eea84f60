import type { box2D } from './box2D';
import { Vec2, type vec2 } from './vec2';

// an axis-aligned rectangle described by its center and its full size
export type rectangle2D = {
    center: vec2;
    size: vec2;
};

export function getMinimumBoundingBox(rect: rectangle2D): box2D {
    const { center, size } = rect;
    const half = Vec2.scale(size, 0.5);
    return {
        minCorner: Vec2.sub(center, half),
        maxCorner: Vec2.add(center, half),
    };
}
