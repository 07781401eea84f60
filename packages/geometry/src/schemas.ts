import { logger } from './logger';
import { z, ZodError } from 'zod';
import { OrientedRectangle, type orientedRectangle } from './OrientedRectangle';

export const Vec2Schema = z.tuple([z.number().finite(), z.number().finite()]);

export const Mat2Schema = z.tuple([Vec2Schema, Vec2Schema]);

// the serialized form of an oriented rectangle, eg. { center: [0, 0], radii: [1, 2], orientation: [[1, 0], [0, 1]] }
export const OrientedRectangleSchema = z.object({
    center: Vec2Schema,
    radii: z.tuple([z.number().finite().nonnegative(), z.number().finite().nonnegative()]),
    orientation: Mat2Schema,
});

export type SerializedOrientedRectangle = z.infer<typeof OrientedRectangleSchema>;

/**
 * @param data anything, typically the result of JSON.parse
 * @returns a valid oriented rectangle
 * @throws ZodError if data does not have the shape of a serialized oriented rectangle
 */
export function parseOrientedRectangle(data: unknown): orientedRectangle {
    try {
        const { center, radii, orientation } = OrientedRectangleSchema.parse(data);
        return OrientedRectangle.create(center, radii, orientation);
    } catch (e) {
        if (e instanceof ZodError) {
            logger.error(`could not parse oriented rectangle: ${e.issues.map((i) => i.path.join('.')).join(', ')}`);
        }
        throw e;
    }
}
