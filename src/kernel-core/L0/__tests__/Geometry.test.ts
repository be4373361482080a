import { describe, it, expect } from '@jest/globals';
import { CENTER, MAX_DISTANCE, clamp, displace, euclidean, norm, normalize, unitVector, zeros } from '../Geometry.js';

describe('Geometry', () => {
    it('should measure the centre-to-corner distance as the maximum', () => {
        expect(MAX_DISTANCE).toBeCloseTo(Math.SQRT2, 12);
        expect(euclidean(CENTER, zeros())).toBeCloseTo(MAX_DISTANCE, 12);
        expect(euclidean(CENTER, CENTER)).toBe(0);
    });

    it('should reject vectors of different dimension', () => {
        expect(() => euclidean([0, 1], [0, 1, 2])).toThrow(RangeError);
    });

    it('should leave the zero vector at zero when normalizing', () => {
        expect(normalize(zeros())).toEqual(zeros());
        expect(norm(normalize([3, 4, 0, 0, 0, 0, 0, 0]))).toBeCloseTo(1, 12);
    });

    it('should map each domain onto its basis vector', () => {
        const e = unitVector('mathematics');
        expect(e[2]).toBe(1);
        expect(norm(e)).toBe(1);
    });

    it('should clamp displaced coordinates into the unit interval', () => {
        const moved = displace([0.9, 0.1, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5], [1, -1, 0, 0, 0, 0, 0, 0], 0.5);
        expect(moved.slice(0, 3)).toEqual([1, 0, 0.5]);
        expect(clamp(-0.2)).toBe(0);
        expect(clamp(1.7)).toBe(1);
    });
});
