import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Box2D } from '../box2D';
import { GeometryValidationError } from '../errors';
import { Viewport } from '../viewport';

describe('viewport adapter', () => {
    describe('default mode', () => {
        const adapter = Viewport.create('default', [1, 1], [640, 480]);
        it('the virtual size is the viewport size', () => {
            expect(adapter.virtualSize).toStrictEqual([640, 480]);
            expect(Viewport.getScaleMatrix(adapter)).toStrictEqual([
                [1, 0],
                [0, 1],
            ]);
        });
        it('pointToScreen truncates toward zero', () => {
            expect(Viewport.pointToScreen(adapter, [10.7, 3.2])).toStrictEqual([10, 3]);
            expect(Viewport.pointToScreen(adapter, [-3.5, 2])).toStrictEqual([-3, 2]);
        });
    });
    describe('scaling mode', () => {
        const adapter = Viewport.create('scaling', [800, 600], [1600, 900]);
        it('scales virtual coordinates up to the viewport', () => {
            expect(Viewport.getScaleMatrix(adapter)).toStrictEqual([
                [2, 0],
                [0, 1.5],
            ]);
        });
        it('maps screen points back into virtual coordinates', () => {
            expect(Viewport.pointToScreen(adapter, [101, 151])).toStrictEqual([50, 100]);
        });
        it('bounding box and center are in virtual units', () => {
            expect(Viewport.boundingBox(adapter)).toStrictEqual(Box2D.create([0, 0], [800, 600]));
            expect(Viewport.center(Viewport.create('scaling', [801, 600], [1600, 900]))).toStrictEqual([400, 300]);
        });
        it('resize keeps the virtual size', () => {
            const resized = Viewport.resize(adapter, [400, 300]);
            expect(resized.virtualSize).toStrictEqual([800, 600]);
            expect(Viewport.getScaleMatrix(resized)).toStrictEqual([
                [0.5, 0],
                [0, 0.5],
            ]);
        });
    });
    describe('invalid sizes', () => {
        beforeEach(() => {
            vi.spyOn(console, 'error').mockImplementation(() => {});
        });
        afterEach(() => {
            vi.restoreAllMocks();
        });
        it('are rejected', () => {
            expect(() => Viewport.create('default', [1, 1], [0, 480])).toThrow(GeometryValidationError);
            expect(() => Viewport.create('scaling', [800, -1], [640, 480])).toThrow(GeometryValidationError);
            expect(() => Viewport.create('scaling', [800, 600], [NaN, 480])).toThrow(GeometryValidationError);
            expect(console.error).toHaveBeenCalledTimes(3);
        });
    });
});
