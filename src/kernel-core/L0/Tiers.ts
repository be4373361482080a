import type { Tier } from './Ontology.js';

export interface TierDefinition {
    tier: Tier;
    name: string;
    minComplexity: number;
    energyBonus: number; // one-time bonus on entering this tier
}

export const TIERS: readonly TierDefinition[] = [
    { tier: 1, name: 'Single-Cell', minComplexity: 0, energyBonus: 0 },
    { tier: 2, name: 'Multi-Cellular', minComplexity: 10.0, energyBonus: 200.0 },
    { tier: 3, name: 'Humanity', minComplexity: 100.0, energyBonus: 500.0 },
    { tier: 4, name: 'Galactic', minComplexity: 1000.0, energyBonus: 1000.0 },
];

const ENERGY_CAP_PER_TIER = 1000.0;

/** Step function of the complexity index over the fixed thresholds 10 / 100 / 1000. */
export function tierFor(complexityIndex: number): Tier {
    if (complexityIndex >= 1000.0) return 4;
    if (complexityIndex >= 100.0) return 3;
    if (complexityIndex >= 10.0) return 2;
    return 1;
}

export function tierDefinition(tier: Tier): TierDefinition {
    const def = TIERS.find((t) => t.tier === tier);
    if (!def) throw new RangeError(`Unknown tier: ${tier}`);
    return def;
}

export function energyCap(tier: Tier): number {
    return ENERGY_CAP_PER_TIER * tier;
}
