import { describe, it, expect } from 'vitest';
import { Binary, BSONRegExp, Double, Int32, Long, MaxKey, MinKey, ObjectId, Timestamp, serialize } from 'bson';
import { compareValues, valuesEqual } from '../compare';
import { BSONDecoder } from '../decoder';
import { D, M } from '../document';
import { LegacyObjectId, objectIdHex } from '../objectId';
import { RegEx } from '../regex';
import { Family } from '../types';

const HEX = '507f1f77bcf86cd799439011';

describe('valuesEqual across families', () => {
    it('compares identifiers by raw bytes', () => {
        expect(valuesEqual(objectIdHex(HEX), new ObjectId(HEX))).toBe(true);
        expect(valuesEqual(objectIdHex(HEX), new ObjectId('507f1f77bcf86cd799439012'))).toBe(false);
        expect(compareValues(LegacyObjectId.empty(), new ObjectId(HEX))).toBeLessThan(0);
    });

    it('compares regexes by pattern and sorted options', () => {
        expect(valuesEqual(new RegEx('^a', 'mi'), new BSONRegExp('^a', 'im'))).toBe(true);
        expect(valuesEqual(new RegEx('^a', 'i'), new BSONRegExp('^b', 'i'))).toBe(false);
    });

    it('unwraps numeric wrappers', () => {
        expect(valuesEqual(1, new Int32(1))).toBe(true);
        expect(valuesEqual(2.5, new Double(2.5))).toBe(true);
        expect(valuesEqual(5n, Long.fromNumber(5))).toBe(true);
        expect(valuesEqual(5, 5n)).toBe(true);
        expect(compareValues(new Int32(2), Long.fromNumber(3))).toBeLessThan(0);
    });

    it('compares documents entry by entry', () => {
        expect(valuesEqual(M.from({ a: 1, b: 'x' }), { a: new Int32(1), b: 'x' })).toBe(true);
        expect(valuesEqual(D.from([['a', 1], ['b', 'x']]), M.from({ a: 1, b: 'x' }))).toBe(true);
        expect(valuesEqual(M.from({ a: 1, b: 2 }), M.from({ a: 1, b: 3 }))).toBe(false);
        expect(compareValues({ a: 1 }, { a: 1, b: 2 })).toBeLessThan(0);
    });

    it('ignores key order of unordered documents', () => {
        expect(valuesEqual(M.from({ a: 1, b: 2 }), M.from({ b: 2, a: 1 }))).toBe(true);
        expect(valuesEqual({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(true);
        expect(valuesEqual(M.from({ b: 2, a: 1 }), { a: new Int32(1), b: new Int32(2) })).toBe(true);
        expect(valuesEqual(M.from({ a: 1, b: 2 }), M.from({ b: 2, c: 1 }))).toBe(false);
    });

    it('keeps key order significant for ordered documents', () => {
        expect(valuesEqual(D.from([['a', 1], ['b', 2]]), D.from([['b', 2], ['a', 1]]))).toBe(false);
        const first = new Map<string, unknown>([['a', 1], ['b', 2]]);
        const second = new Map<string, unknown>([['b', 2], ['a', 1]]);
        expect(valuesEqual(first, second)).toBe(false);
        expect(valuesEqual(D.from([['a', 1], ['a', 2]]), D.from([['a', 1]]))).toBe(false);
    });

    it('treats both decode families of the same bytes as equal', () => {
        const decoder = new BSONDecoder();
        const data = serialize({
            _id: new ObjectId(HEX),
            re: new BSONRegExp('x', 'i'),
            n: 7,
            big: Long.fromNumber(9),
            list: [{ inner: 1.5 }],
        });
        const legacyValue = decoder.decodeAny(data, Family.Legacy);
        const currentValue = decoder.decodeAny(data, Family.Current);
        expect(valuesEqual(legacyValue, currentValue)).toBe(true);
    });
});

describe('compareValues ordering', () => {
    it('orders by type first', () => {
        const ordered: unknown[] = [
            new MinKey(),
            null,
            1,
            'a',
            { a: 1 },
            [1],
            new Binary(Buffer.from([1])),
            new ObjectId(HEX),
            false,
            new Date(0),
            new Timestamp({ t: 1, i: 1 }),
            new RegEx('a'),
            new MaxKey(),
        ];
        for (let i = 1; i < ordered.length; i++) {
            expect(compareValues(ordered[i - 1], ordered[i])).toBeLessThan(0);
        }
    });

    it('sorts NaN below other numbers', () => {
        expect(compareValues(NaN, -Infinity)).toBeLessThan(0);
        expect(compareValues(NaN, NaN)).toBe(0);
    });

    it('compares arrays element by element, then by length', () => {
        expect(compareValues([1, 2], [1, 3])).toBeLessThan(0);
        expect(compareValues([1, 2], [1])).toBeGreaterThan(0);
    });

    it('compares binaries by length before content', () => {
        expect(compareValues(new Binary(Buffer.from([9])), Buffer.from([0, 0]))).toBeLessThan(0);
        expect(valuesEqual(new Binary(Buffer.from([1, 2])), Buffer.from([1, 2]))).toBe(true);
    });

    it('compares timestamps by seconds then increment', () => {
        expect(compareValues(new Timestamp({ t: 1, i: 9 }), new Timestamp({ t: 2, i: 0 }))).toBeLessThan(0);
        expect(compareValues(new Timestamp({ t: 2, i: 3 }), new Timestamp({ t: 2, i: 1 }))).toBeGreaterThan(0);
    });
});
