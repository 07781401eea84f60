import { logger } from './logger';
import { Box2D, type box2D } from './box2D';
import { GeometryValidationError } from './errors';
import { Mat2, type mat2 } from './matrix';
import { Vec2, type vec2 } from './vec2';

/**
 * 'default': the virtual resolution is whatever the viewport is, no scaling happens
 * 'scaling': content is authored at a fixed virtual resolution and stretched to fill the viewport
 */
export type ViewportMode = 'default' | 'scaling';

export type ViewportAdapter = {
    readonly mode: ViewportMode;
    readonly virtualSize: vec2;
    readonly viewportSize: vec2;
};

const isValidSize = (size: vec2) => Vec2.finite(size) && Vec2.all(size, (v) => v > 0);

function checkSize(size: vec2, label: string) {
    if (!isValidSize(size)) {
        const message = `invalid ${label} size: [${size.join(', ')}], sizes must be finite and positive`;
        logger.error(message);
        throw new GeometryValidationError(message);
    }
}

/**
 * @param virtualSize the resolution content is authored at. ignored in 'default' mode
 * @param viewportSize the actual size, in pixels, of the viewport
 */
export function createViewportAdapter(mode: ViewportMode, virtualSize: vec2, viewportSize: vec2): ViewportAdapter {
    checkSize(viewportSize, 'viewport');
    if (mode === 'default') {
        return { mode, virtualSize: viewportSize, viewportSize };
    }
    checkSize(virtualSize, 'virtual');
    return { mode, virtualSize, viewportSize };
}

export function resize(adapter: ViewportAdapter, viewportSize: vec2): ViewportAdapter {
    return createViewportAdapter(adapter.mode, adapter.virtualSize, viewportSize);
}

/**
 * @returns the matrix taking virtual coordinates to viewport coordinates
 */
export function getScaleMatrix(adapter: ViewportAdapter): mat2 {
    return Mat2.scale(Vec2.div(adapter.viewportSize, adapter.virtualSize));
}

/**
 * Map a point on the screen (in viewport pixels) to the virtual coordinate space, truncated to whole units
 */
export function pointToScreen(adapter: ViewportAdapter, point: vec2): vec2 {
    const inverse = Mat2.invert(getScaleMatrix(adapter));
    if (inverse === undefined) {
        // unreachable for adapters built by createViewportAdapter
        throw new GeometryValidationError('viewport scale matrix is not invertible');
    }
    return Vec2.map(Mat2.transform(inverse, point), Math.trunc);
}

export function boundingBox(adapter: ViewportAdapter): box2D {
    return Box2D.create([0, 0], adapter.virtualSize);
}

export function center(adapter: ViewportAdapter): vec2 {
    return Vec2.map(Box2D.midpoint(boundingBox(adapter)), Math.trunc);
}

export const Viewport = { create: createViewportAdapter, resize, getScaleMatrix, pointToScreen, boundingBox, center };
