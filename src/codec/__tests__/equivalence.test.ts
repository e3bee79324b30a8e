import { describe, it, expect } from 'vitest';
import { BSONRegExp, Double, Int32, Long, ObjectId, serialize } from 'bson';
import type { Document } from 'bson';
import { current, legacy } from '../codec';
import { compareValues, valuesEqual } from '../../bson/compare';
import { D, M } from '../../bson/document';
import { LegacyObjectId } from '../../bson/objectId';
import { RegEx } from '../../bson/regex';

/**
 * 同一逻辑内容的旧版与当前表示
 * EN: Legacy and current representations of the same logical content
 */
interface Pair {
    legacy: unknown;
    current: unknown;
}

type Rng = () => number;

const MAX_DEPTH = 3;
const STRINGS = ['', 'a', 'héllo', '中文', 'x y', 'tab\there'];
const PATTERNS = ['^a', 'b+c', 'x.*y', '中'];
const REGEX_OPTIONS = ['i', 'm', 's', 'u', 'x'];

// 可复现的伪随机数（mulberry32）
// EN: Reproducible pseudo-random numbers (mulberry32)
function seeded(seed: number): Rng {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

function intIn(rng: Rng, lo: number, hi: number): number {
    return lo + Math.floor(rng() * (hi - lo + 1));
}

function pick<T>(rng: Rng, items: readonly T[]): T {
    return items[intIn(rng, 0, items.length - 1)];
}

function same(value: unknown): Pair {
    return { legacy: value, current: value };
}

function leaf(rng: Rng): Pair {
    switch (intIn(rng, 0, 10)) {
        case 0: {
            const bytes = Buffer.from(Array.from({ length: 12 }, () => intIn(rng, 0, 255)));
            return { legacy: LegacyObjectId.fromBytes(bytes), current: new ObjectId(bytes) };
        }
        case 1: {
            const pattern = pick(rng, PATTERNS);
            const options = REGEX_OPTIONS.filter(() => rng() < 0.4).reverse().join('');
            return { legacy: new RegEx(pattern, options), current: new BSONRegExp(pattern, options) };
        }
        case 2:
            return same(pick(rng, STRINGS));
        case 3: {
            const n = intIn(rng, -2147483648, 2147483647);
            return { legacy: n, current: new Int32(n) };
        }
        case 4: {
            const n = intIn(rng, -1000000, 1000000) + 0.5;
            return { legacy: n, current: new Double(n) };
        }
        case 5: {
            const n = intIn(rng, -1000, 1000);
            return { legacy: new Double(n), current: new Double(n) };
        }
        case 6: {
            const n = BigInt(intIn(rng, -1000000000, 1000000000)) * 1000003n;
            return { legacy: n, current: Long.fromBigInt(n) };
        }
        case 7:
            return same(rng() < 0.5);
        case 8:
            return same(null);
        case 9: {
            const millis = intIn(rng, 0, 4000000000000);
            return { legacy: new Date(millis), current: new Date(millis) };
        }
        default:
            return same(intIn(rng, -5, 5) * 2 ** 40);
    }
}

function entries(rng: Rng, depth: number): { legacy: Array<[string, unknown]>; current: Array<[string, unknown]> } {
    const legacyEntries: Array<[string, unknown]> = [];
    const currentEntries: Array<[string, unknown]> = [];
    const count = intIn(rng, 0, 3);
    for (let i = 0; i < count; i++) {
        const child = value(rng, depth + 1);
        legacyEntries.push([`k${i}`, child.legacy]);
        currentEntries.push([`k${i}`, child.current]);
    }
    return { legacy: legacyEntries, current: currentEntries };
}

function value(rng: Rng, depth: number): Pair {
    if (depth >= MAX_DEPTH) {
        return leaf(rng);
    }
    switch (intIn(rng, 0, 5)) {
        case 0: {
            const e = entries(rng, depth);
            return { legacy: D.from(e.legacy), current: new Map(e.current) };
        }
        case 1: {
            const e = entries(rng, depth);
            return { legacy: M.from(e.legacy), current: Object.fromEntries(e.current) };
        }
        case 2: {
            const items = Array.from({ length: intIn(rng, 0, 3) }, () => value(rng, depth + 1));
            return { legacy: items.map((p) => p.legacy), current: items.map((p) => p.current) };
        }
        default:
            return leaf(rng);
    }
}

function topLevel(rng: Rng): { legacy: D | M; current: Document } {
    const e = entries(rng, 0);
    return {
        legacy: rng() < 0.5 ? D.from(e.legacy) : M.from(e.legacy),
        current: Object.fromEntries(e.current),
    };
}

const SEEDS = Array.from({ length: 120 }, (_, i) => i + 1);

describe('generated legacy and current documents', () => {
    it.each(SEEDS)('encode identically and round-trip (seed %i)', (seed) => {
        const pair = topLevel(seeded(seed));
        const expected = Buffer.from(serialize(pair.current));

        expect(legacy.marshal(pair.legacy)).toEqual(expected);
        expect(current.marshal(pair.current)).toEqual(expected);

        const legacyValue = legacy.unmarshalAny(expected);
        const currentValue = current.unmarshalAny(expected);
        expect(legacy.marshal(legacyValue)).toEqual(expected);
        expect(current.marshal(currentValue)).toEqual(expected);
        expect(valuesEqual(legacyValue, currentValue)).toBe(true);

        const ordered = new D();
        legacy.unmarshal(expected, ordered);
        expect(legacy.marshal(ordered)).toEqual(expected);
    });
});

describe('generated value ordering', () => {
    it.each(SEEDS.slice(0, 40))('is antisymmetric across families (seed %i)', (seed) => {
        const rng = seeded(seed);
        const a = value(rng, 1);
        const b = value(rng, 1);
        const forward = Math.sign(compareValues(a.legacy, b.current));
        const backward = Math.sign(compareValues(b.current, a.legacy));
        expect(forward === -backward).toBe(true);
        expect(compareValues(a.legacy, a.current)).toBe(0);
    });
});
