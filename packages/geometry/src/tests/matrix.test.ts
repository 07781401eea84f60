import { describe, expect, test } from 'vitest';
import { Mat2, type mat2 } from '../matrix';

// an exact quarter turn, free of any rounding from sin/cos
const quarterTurn: mat2 = [
    [0, 1],
    [-1, 0],
];

describe('mat2', () => {
    test('identity leaves vectors alone', () => {
        expect(Mat2.transform(Mat2.identity(), [3, 4])).toStrictEqual([3, 4]);
    });
    test('rotate turns the x axis toward the y axis', () => {
        const [x, y] = Mat2.transform(Mat2.rotate(Math.PI / 2), [1, 0]);
        expect(x).toBeCloseTo(0);
        expect(y).toBeCloseTo(1);
        expect(Mat2.determinant(Mat2.rotate(0.4))).toBeCloseTo(1);
    });
    test('scale', () => {
        expect(Mat2.transform(Mat2.scale([2, 3]), [5, 7])).toStrictEqual([10, 21]);
    });
    test('mul(b, a) applies a first, then b', () => {
        const s = Mat2.scale([2, 3]);
        const m = Mat2.mul(s, quarterTurn);
        expect(m).toStrictEqual([
            [0, 3],
            [-2, 0],
        ]);
        expect(Mat2.transform(m, [1, 0])).toStrictEqual(Mat2.transform(s, Mat2.transform(quarterTurn, [1, 0])));
        // the other order is a different matrix
        expect(Mat2.mul(quarterTurn, s)).toStrictEqual([
            [0, 2],
            [-3, 0],
        ]);
    });
    test('transpose', () => {
        expect(
            Mat2.transpose([
                [1, 2],
                [3, 4],
            ]),
        ).toStrictEqual([
            [1, 3],
            [2, 4],
        ]);
    });
    test('invert', () => {
        const m: mat2 = [
            [1, 2],
            [3, 4],
        ];
        const inverse = Mat2.invert(m);
        expect(inverse).toStrictEqual([
            [-2, 1],
            [1.5, -0.5],
        ]);
        if (inverse === undefined) return;
        expect(Mat2.mul(m, inverse)).toStrictEqual(Mat2.identity());
    });
    test('singular matrices have no inverse', () => {
        expect(
            Mat2.invert([
                [1, 2],
                [2, 4],
            ]),
        ).toBeUndefined();
        expect(Mat2.invert(Mat2.scale([0, 1]))).toBeUndefined();
        expect(Mat2.invert(Mat2.scale([Infinity, 1]))).toBeUndefined();
    });
    test('exactlyEqual and finite', () => {
        expect(Mat2.exactlyEqual(Mat2.identity(), Mat2.scale([1, 1]))).toBe(true);
        expect(Mat2.exactlyEqual(Mat2.identity(), quarterTurn)).toBe(false);
        expect(Mat2.finite(quarterTurn)).toBe(true);
        expect(Mat2.finite(Mat2.scale([NaN, 1]))).toBe(false);
    });
});
