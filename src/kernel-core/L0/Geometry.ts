import { DIMENSIONS, KNOWLEDGE_DOMAINS } from './Ontology.js';
import type { KnowledgeDomain, Vector8 } from './Ontology.js';

// Centre of the unit hypercube and the distance from it to any corner.
export const CENTER: Vector8 = Object.freeze(new Array<number>(DIMENSIONS).fill(0.5));
export const MAX_DISTANCE = Math.sqrt(DIMENSIONS * 0.25);

export function zeros(): number[] {
    return new Array<number>(DIMENSIONS).fill(0);
}

export function clamp(value: number, min = 0, max = 1): number {
    return Math.min(max, Math.max(min, value));
}

export function norm(v: Vector8): number {
    let sum = 0;
    for (const x of v) sum += x * x;
    return Math.sqrt(sum);
}

export function euclidean(a: Vector8, b: Vector8): number {
    if (a.length !== b.length) {
        throw new RangeError(`Dimension mismatch: ${a.length} vs ${b.length}`);
    }
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const d = (a[i] ?? 0) - (b[i] ?? 0);
        sum += d * d;
    }
    return Math.sqrt(sum);
}

/** Unit vector in the direction of v, or the zero vector when v has no length. */
export function normalize(v: Vector8): number[] {
    const length = norm(v);
    if (length === 0) return v.map(() => 0);
    return v.map((x) => x / length);
}

export function unitVector(domain: KnowledgeDomain): number[] {
    const v = zeros();
    v[KNOWLEDGE_DOMAINS.indexOf(domain)] = 1;
    return v;
}

/** p + scale * direction, clamped to [0, 1] per axis. */
export function displace(p: Vector8, direction: Vector8, scale: number): number[] {
    return p.map((x, i) => clamp(x + scale * (direction[i] ?? 0)));
}
