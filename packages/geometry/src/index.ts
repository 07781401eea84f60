export { Vec2, type vec2 } from './vec2';
export type { VectorLib } from './vector';
export { Mat2, type mat2 } from './matrix';
export { BoxClassFactory, type box } from './BoundingBox';
export { Box2D, type box2D } from './box2D';
export { getMinimumBoundingBox, type rectangle2D } from './Rectangle2D';
export {
    type Interval,
    size as intervalSize,
    within,
    isFiniteInterval,
    fromValues as intervalFromValues,
    overlaps as intervalsOverlap,
    intersection as intervalIntersection,
} from './interval';
export { OrientedRectangle, type orientedRectangle, type corners } from './OrientedRectangle';
export {
    OrientedRectangleSchema,
    Vec2Schema,
    Mat2Schema,
    parseOrientedRectangle,
    type SerializedOrientedRectangle,
} from './schemas';
export { Viewport, type ViewportAdapter, type ViewportMode } from './viewport';
export { GeometryError, GeometryValidationError } from './errors';
export { logger as geometryLogger } from './logger';
