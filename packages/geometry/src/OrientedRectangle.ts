import { logger } from './logger';
import { Box2D, type box2D } from './box2D';
import { GeometryValidationError } from './errors';
import { type Interval, fromValues, overlaps } from './interval';
import { Mat2, type mat2 } from './matrix';
import type { rectangle2D } from './Rectangle2D';
import { Vec2, type vec2 } from './vec2';

/**
 * A rectangle with an arbitrary orientation. The rectangle spans `radii` in each direction of its own
 * local x and y axes, which `orientation` maps to world directions, around `center`.
 *
 * `orientation` is expected to be a pure rotation. Every operation here assumes it preserves lengths.
 */
export type orientedRectangle = {
    readonly center: vec2;
    readonly radii: vec2;
    readonly orientation: mat2;
};

/**
 * the corners of an oriented rectangle, always in this order (in the local frame, with y pointing down):
 * right-top, left-top, left-bottom, right-bottom
 */
export type corners = readonly [vec2, vec2, vec2, vec2];

// the intersection test squares edge lengths, so those must stay finite as well as the corners
function fitsInFloatRange(rect: orientedRectangle): boolean {
    const [a, b, c, d] = points(rect);
    if (![a, b, c, d].every(Vec2.finite)) {
        return false;
    }
    const edges = [Vec2.sub(b, a), Vec2.sub(d, a)];
    return edges.every((edge) => Number.isFinite(Vec2.lengthSquared(edge)));
}

function validate(rect: orientedRectangle): orientedRectangle {
    const { center, radii, orientation } = rect;
    let problem: string | undefined;
    if (!Vec2.finite(center)) {
        problem = `center must be finite, got [${center.join(', ')}]`;
    } else if (!Vec2.finite(radii) || !Vec2.all(radii, (r) => r >= 0)) {
        problem = `radii must be finite and non-negative, got [${radii.join(', ')}]`;
    } else if (!Mat2.finite(orientation)) {
        problem = 'orientation must be finite';
    } else if (!fitsInFloatRange(rect)) {
        problem = `corners and edge lengths overflow, radii [${radii.join(', ')}] are too large`;
    }
    if (problem !== undefined) {
        const message = `invalid oriented rectangle: ${problem}`;
        logger.error(message);
        throw new GeometryValidationError(message);
    }
    return rect;
}

/**
 * @param center the centre of the rectangle
 * @param radii the (non-negative) half-extents of the rectangle along its own axes
 * @param orientation the rotation of the rectangle, identity if not given
 * @throws GeometryValidationError if any value is not finite, either radius is negative, or the radii are
 * so large that the corners or edge lengths overflow.
 * A radius of zero is fine: the rectangle collapses to a segment (or a point)
 */
function create(center: vec2, radii: vec2, orientation: mat2 = Mat2.identity()): orientedRectangle {
    return validate({ center, radii, orientation });
}

function points(rect: orientedRectangle): corners {
    const { center, radii, orientation } = rect;
    const [rx, ry] = radii;
    const corner = (offset: vec2) => Vec2.add(Mat2.transform(orientation, offset), center);
    return [corner([rx, -ry]), corner([-rx, -ry]), corner([-rx, ry]), corner([rx, ry])];
}

/**
 * @returns the transformed local top-left corner of the rectangle
 */
function position(rect: orientedRectangle): vec2 {
    return Vec2.add(Mat2.transform(rect.orientation, Vec2.negate(rect.radii)), rect.center);
}

/**
 * @returns the smallest axis-aligned box that contains the rectangle. This is computed fresh from the
 * corners every time, so it always agrees with the current center, radii and orientation.
 */
function boundingBox(rect: orientedRectangle): box2D {
    return Box2D.fromPoints(...points(rect));
}

/**
 * Apply a linear transform (about the origin) to a rectangle. The center is transformed, and the
 * orientation becomes "orientation, then matrix".
 *
 * WARNING: the radii are NOT changed, so this is only geometrically correct when matrix is a pure rotation.
 * To scale a rectangle, scale its radii yourself. A matrix cannot express a translation either, so use
 * translate to move a rectangle.
 */
function transform(rect: orientedRectangle, matrix: mat2): orientedRectangle {
    return {
        center: Mat2.transform(matrix, rect.center),
        radii: rect.radii,
        orientation: Mat2.mul(matrix, rect.orientation),
    };
}

function translate(rect: orientedRectangle, offset: vec2): orientedRectangle {
    return { ...rect, center: Vec2.add(rect.center, offset) };
}

// an axis to test for separation, and the width of the source rectangle's projection onto it
type SeparatingAxis = { readonly axis: vec2; readonly width: number };

/**
 * Build a candidate axis from an edge of the source rectangle. The edge is divided by its squared length,
 * so that projecting the source onto it gives an interval of width exactly 1.
 *
 * A zero-length edge (a zero radius) has no direction to divide by. In that case the source is a segment
 * along the other edge, so we test the perpendicular of that edge, onto which the source projects to a
 * single value. If both edges are zero-length the source is a point, and we fall back to a world axis.
 * Any axis at all is a valid candidate for separation.
 */
function candidateAxis(edge: vec2, otherEdge: vec2, fallback: vec2): SeparatingAxis {
    const lengthSquared = Vec2.lengthSquared(edge);
    if (lengthSquared > 0) {
        return { axis: Vec2.map(edge, (c) => c / lengthSquared), width: 1 };
    }
    const otherLengthSquared = Vec2.lengthSquared(otherEdge);
    if (otherLengthSquared > 0) {
        return { axis: Vec2.map(Vec2.perpendicular(otherEdge), (c) => c / otherLengthSquared), width: 0 };
    }
    return { axis: fallback, width: 0 };
}

function project(target: corners, axis: vec2): Interval {
    const [a, b, c, d] = target;
    return fromValues(Vec2.dot(a, axis), Vec2.dot(b, axis), Vec2.dot(c, axis), Vec2.dot(d, axis));
}

/**
 * @returns false if either edge direction of source separates source from target, true otherwise
 */
function intersectsOneWay(source: corners, target: corners): boolean {
    const edge0 = Vec2.sub(source[1], source[0]);
    const edge1 = Vec2.sub(source[3], source[0]);
    const axes = [candidateAxis(edge0, edge1, [1, 0]), candidateAxis(edge1, edge0, [0, 1])];

    for (const { axis, width } of axes) {
        const origin = Vec2.dot(source[0], axis);
        // both intervals are closed: rectangles that just touch are intersecting
        if (!overlaps({ min: origin, max: origin + width }, project(target, axis))) {
            return false;
        }
    }
    return true;
}

/**
 * Determine if two oriented rectangles overlap, using the separating axis theorem: two convex shapes are
 * disjoint iff there is some axis onto which their projections do not overlap. For a pair of rectangles,
 * the edge directions of both are the only candidates we need to check.
 *
 * Touching counts as intersecting, and the test is symmetric: intersects(a, b) === intersects(b, a)
 */
function intersects(a: orientedRectangle, b: orientedRectangle): boolean {
    const cornersA = points(a);
    const cornersB = points(b);
    return intersectsOneWay(cornersA, cornersB) && intersectsOneWay(cornersB, cornersA);
}

function fromBox2D(box: box2D): orientedRectangle {
    const radii = Vec2.scale(Box2D.size(box), 0.5);
    return create(Vec2.add(box.minCorner, radii), radii);
}

function fromRectangle2D(rect: rectangle2D): orientedRectangle {
    return create(rect.center, Vec2.scale(rect.size, 0.5));
}

// the enclosing axis-aligned box, which loses the rotation
function toBox2D(rect: orientedRectangle): box2D {
    return boundingBox(rect);
}

/**
 * exact equality of every component, with no tolerance. Compare with your own epsilon if you need to
 */
function equals(a: orientedRectangle, b: orientedRectangle): boolean {
    return (
        Vec2.exactlyEqual(a.center, b.center) &&
        Vec2.exactlyEqual(a.radii, b.radii) &&
        Mat2.exactlyEqual(a.orientation, b.orientation)
    );
}

const scratch = new DataView(new ArrayBuffer(8));
function hashNumber(n: number): number {
    // 0 and -0 are equal, so they must hash the same
    scratch.setFloat64(0, n === 0 ? 0 : n);
    return scratch.getInt32(0) ^ scratch.getInt32(4);
}
function hashCombine(seed: number, values: readonly number[]): number {
    return values.reduce((h, v) => (Math.imul(h, 31) + hashNumber(v)) | 0, seed);
}

/**
 * @returns a 32-bit integer hash, consistent with equals
 */
function hash(rect: orientedRectangle): number {
    const { center, radii, orientation } = rect;
    const h = hashCombine(17, center);
    return hashCombine(hashCombine(h, radii), [...orientation[0], ...orientation[1]]);
}

function toString(rect: orientedRectangle): string {
    const v = (x: vec2) => `[${x.join(', ')}]`;
    const { center, radii, orientation } = rect;
    return `Center: ${v(center)}, Radii: ${v(radii)}, Orientation: [${v(orientation[0])}, ${v(orientation[1])}]`;
}

export const OrientedRectangle = {
    create,
    points,
    position,
    boundingBox,
    transform,
    translate,
    intersects,
    fromBox2D,
    fromRectangle2D,
    toBox2D,
    equals,
    hash,
    toString,
};
