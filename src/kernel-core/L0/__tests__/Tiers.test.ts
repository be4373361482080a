import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { TIERS, energyCap, tierDefinition, tierFor } from '../Tiers.js';

describe('Tier thresholds', () => {
    test('boundaries belong to the higher tier', () => {
        expect(tierFor(1.0)).toBe(1);
        expect(tierFor(9.999)).toBe(1);
        expect(tierFor(10.0)).toBe(2);
        expect(tierFor(99.99)).toBe(2);
        expect(tierFor(100.0)).toBe(3);
        expect(tierFor(1000.0)).toBe(4);
    });

    test('tier is a non-decreasing step function of complexity', () => {
        fc.assert(
            fc.property(
                fc.double({ min: 1e-6, max: 1e7, noNaN: true }),
                fc.double({ min: 1e-6, max: 1e7, noNaN: true }),
                (a, b) => {
                    const [lo, hi] = a <= b ? [a, b] : [b, a];
                    expect(tierFor(lo)).toBeLessThanOrEqual(tierFor(hi));
                    // The tier's own threshold is never above the complexity that earned it.
                    expect(tierDefinition(tierFor(hi)).minComplexity).toBeLessThanOrEqual(hi);
                }
            )
        );
    });

    test('caps and bonuses follow the tier table', () => {
        expect(TIERS.map((t) => t.energyBonus)).toEqual([0, 200, 500, 1000]);
        expect(energyCap(1)).toBe(1000);
        expect(energyCap(4)).toBe(4000);
    });
});
