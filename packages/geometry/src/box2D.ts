import { BoxClassFactory, type box } from './BoundingBox';
import type { rectangle2D } from './Rectangle2D';
import { Vec2, type vec2 } from './vec2';

export type box2D = box<vec2>;

const isBox2D = (maybe: unknown): maybe is box2D => {
    if (typeof maybe === 'object' && maybe !== null && 'minCorner' in maybe && 'maxCorner' in maybe) {
        if (Array.isArray(maybe.minCorner) && Array.isArray(maybe.maxCorner)) {
            return maybe.minCorner.length === 2 && maybe.maxCorner.length === 2;
        }
    }

    return false;
};
const boxClass = BoxClassFactory<vec2>(Vec2);

function toRectangle2D(b: box2D): rectangle2D {
    return { center: boxClass.midpoint(b), size: boxClass.size(b) };
}

// build a box from a top-left position and a size, the way most 2D APIs describe a rectangle
function fromXYWH(x: number, y: number, width: number, height: number): box2D {
    return boxClass.create([x, y], [x + width, y + height]);
}

export const Box2D = { isBox2D, toRectangle2D, fromXYWH, ...boxClass };
