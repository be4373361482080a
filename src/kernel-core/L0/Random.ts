import { randomBytes } from 'crypto';

/**
 * Source of randomness injected into the validation gate and the
 * evolutionary leap. Deterministic implementations make runs replayable.
 */
export interface RandomSource {
    /** Uniform draw in [0, 1). */
    next(): number;
    /** Normal draw with the given mean and standard deviation. */
    nextGaussian(mean?: number, stddev?: number): number;
}

/**
 * RandomEngine: Deterministic pseudo-random number generator
 *
 * Uses a Linear Congruential Generator (LCG) for reproducible randomness,
 * and Box-Muller for normal draws.
 */
export class RandomEngine implements RandomSource {
    private seed: number;

    constructor(seed?: number) {
        this.seed = RandomEngine.toState(seed ?? Date.now());
    }

    /**
     * Seeded from the operating system's CSPRNG; for production nodes.
     */
    public static fromEntropy(): RandomEngine {
        return new RandomEngine(randomBytes(4).readUInt32BE(0));
    }

    private static toState(seed: number): number {
        return Math.trunc(Math.abs(seed)) % 2147483648;
    }

    /**
     * Generate next random number in [0, 1)
     * Uses LCG: X(n+1) = (a * X(n) + c) mod m
     */
    public next(): number {
        // LCG parameters (from Numerical Recipes), m = 2^31.
        // Math.imul keeps the product exact in its low 32 bits.
        this.seed = (Math.imul(1103515245, this.seed) + 12345) & 0x7fffffff;
        return this.seed / 2147483648;
    }

    public nextGaussian(mean = 0, stddev = 1): number {
        const u1 = 1 - this.next(); // (0, 1], keeps log finite
        const u2 = this.next();
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        return mean + stddev * z;
    }
}
