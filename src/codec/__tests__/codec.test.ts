import { afterEach, describe, it, expect, vi } from 'vitest';
import { BSONRegExp, Double, Int32, ObjectId, serialize } from 'bson';
import type { Document } from 'bson';
import { Codec, current, legacy, marshal, unmarshal, unmarshalAny } from '../codec';
import { TargetKind } from '../../bson/coercion';
import { D, M } from '../../bson/document';
import { LegacyObjectId, objectIdHex } from '../../bson/objectId';
import { RegEx } from '../../bson/regex';
import { defineStruct } from '../../bson/schema';
import { Family } from '../../bson/types';
import { DecodeError, EncodeError } from '../../core/codecError';
import { LogLevel, Logger } from '../../core/logger';

const HEX = '507f1f77bcf86cd799439011';
const OTHER_HEX = '5f0c8a9b1d2e3f4a5b6c7d8e';

function wire(doc: Document): Buffer {
    return Buffer.from(serialize(doc));
}

function legacyId(hex: string): LegacyObjectId {
    return LegacyObjectId.fromBytes(Buffer.from(hex, 'hex'));
}

describe('Codec entry points', () => {
    it('encodes a simple document identically for both families', () => {
        const expected = wire({ name: 'abc' });
        expect(legacy.marshal(M.from({ name: 'abc' }))).toEqual(expected);
        expect(current.marshal({ name: 'abc' })).toEqual(expected);
        expect(marshal({ name: 'abc' })).toEqual(expected);
    });

    it('encodes identifiers built from the same hex to the same payload', () => {
        const fromLegacy = legacy.marshal(M.from({ _id: objectIdHex(HEX) }));
        const fromCurrent = current.marshal({ _id: new ObjectId(HEX) });
        expect(fromLegacy).toEqual(fromCurrent);
        // 长度(4) + 类型(1) + "_id\0"(4) 之后是 12 字节标识符
        // EN: The 12 identifier bytes follow length(4) + type(1) + "_id\0"(4)
        expect(fromLegacy.subarray(9, 21).toString('hex')).toBe(HEX);
    });

    it('exposes the entry family', () => {
        expect(legacy.family).toBe(Family.Legacy);
        expect(current.family).toBe(Family.Current);
        expect(new Codec().family).toBe(Family.Legacy);
    });
});

describe('mixed array scenario', () => {
    const data = legacy.marshal(
        M.from({ array: [new ObjectId(HEX), objectIdHex(OTHER_HEX), 'asdf', M.from({ name: 123 })] })
    );

    it('encodes both identifier families the same way', () => {
        expect(data).toEqual(
            wire({ array: [new ObjectId(HEX), new ObjectId(OTHER_HEX), 'asdf', { name: 123 }] })
        );
    });

    it('decodes through the legacy entry into M', () => {
        const dest = new M();
        unmarshal(data, dest);
        expect(dest).toEqual(
            M.from({ array: [legacyId(HEX), legacyId(OTHER_HEX), 'asdf', M.from({ name: 123 })] })
        );
    });

    it('decodes through the legacy entry into a plain object', () => {
        const dest: Document = {};
        legacy.unmarshal(data, dest);
        expect(dest).toEqual({ array: [legacyId(HEX), legacyId(OTHER_HEX), 'asdf', { name: 123 }] });
    });

    it('decodes through the current entry into M', () => {
        const dest = new M();
        current.unmarshal(data, dest);
        expect(dest).toEqual(
            M.from({ array: [new ObjectId(HEX), new ObjectId(OTHER_HEX), 'asdf', M.from({ name: new Int32(123) })] })
        );
    });

    it('decodes through the current entry into a plain object', () => {
        const dest: Document = {};
        current.unmarshal(data, dest);
        expect(dest).toEqual({
            array: [new ObjectId(HEX), new ObjectId(OTHER_HEX), 'asdf', { name: new Int32(123) }],
        });
    });
});

describe('family propagation', () => {
    it('yields M at every level under the legacy entry', () => {
        const dest = new M();
        unmarshal(wire({ a: { b: { c: 1 } } }), dest);
        expect(dest).toEqual(M.from({ a: M.from({ b: M.from({ c: 1 }) }) }));
    });

    it('yields M below an intervening array', () => {
        expect(unmarshalAny(wire({ a: [{ b: 1 }] }))).toEqual(M.from({ a: [M.from({ b: 1 })] }));
    });

    it('yields plain objects under the current entry', () => {
        expect(current.unmarshalAny(wire({ a: [{ b: 1 }] }))).toEqual({ a: [{ b: new Int32(1) }] });
    });
});

describe('round trip', () => {
    it('reproduces ordered legacy values', () => {
        const value = D.from([
            ['_id', objectIdHex(HEX)],
            ['re', new RegEx('^a', 'i')],
            ['nested', D.from([['z', 1], ['a', [1, 'x', D.from([['deep', true]])]]])],
            ['big', 2n ** 40n],
        ]);
        const dest = new D();
        legacy.unmarshal(legacy.marshal(value), dest);
        expect(dest).toEqual(value);
    });

    it('reproduces whole-number doubles', () => {
        const bytes = wire({ x: new Double(1), nested: { y: new Double(-3) }, list: [new Double(0), 4] });
        expect(legacy.marshal(unmarshalAny(bytes))).toEqual(bytes);
        expect(current.marshal(current.unmarshalAny(bytes))).toEqual(bytes);
    });

    it('reproduces the reference bytes after decoding into the legacy family', () => {
        const bytes = wire({ _id: new ObjectId(HEX), re: new BSONRegExp('x', 'mi'), doc: { list: [1, 2.5] } });
        expect(legacy.marshal(unmarshalAny(bytes))).toEqual(bytes);
    });
});

describe('array destinations', () => {
    it('resolves each top-level value on its own', () => {
        const dest: unknown[] = [];
        unmarshal(wire({ a: { b: 1 }, id: new ObjectId(HEX) }), dest);
        expect(dest).toEqual([M.from({ b: 1 }), legacyId(HEX)]);

        current.unmarshal(wire({ a: { b: 1 }, id: new ObjectId(HEX) }), dest);
        expect(dest).toEqual([{ b: new Int32(1) }, new ObjectId(HEX)]);
    });

    it('rejects destinations that are not containers with a decode error', () => {
        const data = wire({ a: 1 });
        expect(() => Reflect.apply(legacy.unmarshal, legacy, [data, new Date(0)])).toThrow(
            'cannot decode into Date: destination must be an M, D, Map, array or plain object, or come with a schema'
        );
        expect(() => Reflect.apply(unmarshal, undefined, [data, 5])).toThrow(DecodeError);
    });
});

describe('time values', () => {
    const when = new Date(Date.UTC(2024, 1, 29, 12, 30, 45, 678));
    const TimeSchema = defineStruct<{ time: Date }>('Timed', {
        time: { key: 'time', kind: TargetKind.Date },
    });

    it('encodes dates like the reference serializer from both families', () => {
        expect(legacy.marshal(M.from({ time: when }))).toEqual(wire({ time: when }));
        expect(current.marshal({ time: when })).toEqual(wire({ time: when }));
        expect(legacy.marshal({ time: when }, TimeSchema)).toEqual(wire({ time: when }));
    });

    it('decodes a date field through both entries', () => {
        const data = legacy.marshal(M.from({ time: when }));
        for (const codec of [legacy, current]) {
            const target = { time: new Date(0) };
            codec.unmarshal(data, target, TimeSchema);
            expect(target.time).toBeInstanceOf(Date);
            expect(target.time.getTime()).toBe(when.getTime());
        }
    });

    it('rejects a string for a date field', () => {
        const target = { time: new Date(0) };
        expect(() => legacy.unmarshal(wire({ time: 'today' }), target, TimeSchema)).toThrow(
            "cannot decode BSON String into date (at 'time')"
        );
    });
});

describe('absent and null identifiers', () => {
    interface Pointer {
        id?: LegacyObjectId;
    }
    interface Plain {
        id: LegacyObjectId;
    }
    interface Strict {
        id: ObjectId;
    }

    const OmittedSchema = defineStruct<Pointer>('Omitted', {
        id: { key: '_id', kind: TargetKind.LegacyObjectId, optional: true, omitEmpty: true },
    });
    const NullableSchema = defineStruct<Pointer>('Nullable', {
        id: { key: '_id', kind: TargetKind.LegacyObjectId, optional: true },
    });
    const PlainSchema = defineStruct<Plain>('Plain', {
        id: { key: '_id', kind: TargetKind.LegacyObjectId },
    });
    const StrictSchema = defineStruct<Strict>('Strict', {
        id: { key: '_id', kind: TargetKind.ObjectId },
    });

    it('omits an undefined identifier tagged omitEmpty', () => {
        expect(legacy.marshal({}, OmittedSchema)).toEqual(wire({}));
    });

    it('decodes an omitted identifier into the zero value', () => {
        const data = legacy.marshal({}, OmittedSchema);
        const plain: Plain = { id: legacyId(HEX) };
        legacy.unmarshal(data, plain, PlainSchema);
        expect(plain.id.isZero()).toBe(true);
    });

    it('decodes a null identifier into the empty legacy identifier from both entries', () => {
        const data = legacy.marshal({}, NullableSchema);
        expect(data).toEqual(wire({ _id: null }));
        for (const codec of [legacy, current]) {
            const plain: Plain = { id: legacyId(HEX) };
            codec.unmarshal(data, plain, PlainSchema);
            expect(plain.id.isZero()).toBe(true);
        }
    });

    it('rejects a null identifier for a current identifier from both entries', () => {
        const data = legacy.marshal({}, NullableSchema);
        for (const codec of [legacy, current]) {
            const strict: Strict = { id: new ObjectId(HEX) };
            expect(() => codec.unmarshal(data, strict, StrictSchema)).toThrow(DecodeError);
            expect(strict.id.toHexString()).toBe(HEX);
        }
    });
});

describe('Codec options', () => {
    it('applies limits to both directions', () => {
        const shallow = new Codec({ maxDepth: 1 });
        expect(() => shallow.marshal({ a: { b: 1 } })).toThrow(EncodeError);
        expect(() => shallow.unmarshalAny(wire({ a: { b: 1 } }))).toThrow(DecodeError);
    });

    it('freezes the resolved options', () => {
        expect(Object.isFrozen(current.options)).toBe(true);
        expect(current.options.maxDepth).toBe(100);
    });
});

describe('failure logging', () => {
    const originalLevel = Logger.getLevel();

    afterEach(() => {
        Logger.setLevel(originalLevel);
    });

    it('logs failures at debug level and rethrows', () => {
        Logger.setLevel(LogLevel.Debug);
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

        expect(() => current.marshal({ f: () => 1 })).toThrow(EncodeError);

        expect(debug).toHaveBeenCalledTimes(1);
        expect(String(debug.mock.calls[0][0])).toMatch(
            /\] DEBUG \[bson-compat\.codec\] marshal failed \{"family":"current","error":"cannot encode value of type function at 'f': no BSON mapping"\}$/
        );
    });

    it('stays quiet above debug level', () => {
        Logger.setLevel(LogLevel.Warn);
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        expect(() => legacy.unmarshalAny(Buffer.from([1, 2]))).toThrow(DecodeError);
        expect(debug).not.toHaveBeenCalled();
    });
});
