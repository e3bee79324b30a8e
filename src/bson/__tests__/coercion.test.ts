import { describe, it, expect } from 'vitest';
import { Int32, Long, ObjectId } from 'bson';
import {
    ALL_WIRE_TYPES,
    COERCION_TABLE,
    CoercionAction,
    ENCODE_WIRE_TYPES,
    GENERIC_TARGETS,
    TARGET_FAMILY,
    TargetKind,
    resolveCoercion,
    resolveGenericTarget,
    zeroValue,
} from '../coercion';
import { D, M } from '../document';
import { LegacyObjectId } from '../objectId';
import { BSONType, Family } from '../types';

describe('coercion table', () => {
    it('has a row for every target kind', () => {
        for (const kind of Object.values(TargetKind)) {
            expect(COERCION_TABLE[kind]).toBeDefined();
        }
    });

    it('resolves identifier coercions', () => {
        expect(resolveCoercion(BSONType.ObjectId, TargetKind.LegacyObjectId)).toBe(CoercionAction.Assign);
        expect(resolveCoercion(BSONType.String, TargetKind.LegacyObjectId)).toBe(CoercionAction.Convert);
        expect(resolveCoercion(BSONType.ObjectId, TargetKind.HexString)).toBe(CoercionAction.Convert);
        expect(resolveCoercion(BSONType.Int32, TargetKind.ObjectId)).toBe(CoercionAction.Fail);
    });

    it('lets null into legacy identifiers but not current ones', () => {
        expect(resolveCoercion(BSONType.Null, TargetKind.LegacyObjectId)).toBe(CoercionAction.Convert);
        expect(resolveCoercion(BSONType.Null, TargetKind.ObjectId)).toBe(CoercionAction.Fail);
        expect(resolveCoercion(BSONType.Null, TargetKind.BSONRegExp)).toBe(CoercionAction.Fail);
        expect(resolveCoercion(BSONType.Null, TargetKind.RegEx)).toBe(CoercionAction.Convert);
    });

    it('accepts every numeric subtype for numeric targets', () => {
        for (const kind of [TargetKind.Int, TargetKind.Float, TargetKind.BigInt, TargetKind.Int32, TargetKind.Long, TargetKind.Double]) {
            for (const wire of [BSONType.Int32, BSONType.Int64, BSONType.Double]) {
                expect(resolveCoercion(wire, kind)).not.toBe(CoercionAction.Fail);
            }
            expect(resolveCoercion(BSONType.String, kind)).toBe(CoercionAction.Fail);
        }
        expect(resolveCoercion(BSONType.Int32, TargetKind.Int)).toBe(CoercionAction.Assign);
        expect(resolveCoercion(BSONType.Int64, TargetKind.Int)).toBe(CoercionAction.Convert);
        expect(resolveCoercion(BSONType.Int64, TargetKind.Long)).toBe(CoercionAction.Assign);
        expect(resolveCoercion(BSONType.Double, TargetKind.Double)).toBe(CoercionAction.Assign);
    });

    it('requires an exact element type for structural documents and regexes', () => {
        expect(resolveCoercion(BSONType.Document, TargetKind.Struct)).toBe(CoercionAction.Assign);
        expect(resolveCoercion(BSONType.Array, TargetKind.Struct)).toBe(CoercionAction.Fail);
        expect(resolveCoercion(BSONType.Array, TargetKind.M)).toBe(CoercionAction.Fail);
        expect(resolveCoercion(BSONType.String, TargetKind.RegEx)).toBe(CoercionAction.Fail);
        expect(resolveCoercion(BSONType.Array, TargetKind.Sequence)).toBe(CoercionAction.Assign);
    });

    it('converts every wire type into a generic slot', () => {
        for (const wire of ALL_WIRE_TYPES) {
            expect(resolveCoercion(wire, TargetKind.Any)).toBe(CoercionAction.Convert);
        }
    });
});

describe('generic resolution', () => {
    it('covers every wire type in both families', () => {
        for (const family of [Family.Legacy, Family.Current]) {
            for (const wire of ALL_WIRE_TYPES) {
                const kind = GENERIC_TARGETS[family][wire];
                expect(kind).toBeDefined();
                expect(resolveCoercion(wire, kind)).not.toBe(CoercionAction.Fail);
            }
        }
    });

    it('never resolves into the other family', () => {
        for (const wire of ALL_WIRE_TYPES) {
            expect(TARGET_FAMILY[GENERIC_TARGETS[Family.Legacy][wire]]).not.toBe(Family.Current);
            expect(TARGET_FAMILY[GENERIC_TARGETS[Family.Current][wire]]).not.toBe(Family.Legacy);
        }
    });

    it('resolves leaves by entry family', () => {
        expect(resolveGenericTarget(BSONType.ObjectId, Family.Legacy)).toBe(TargetKind.LegacyObjectId);
        expect(resolveGenericTarget(BSONType.ObjectId, Family.Current)).toBe(TargetKind.ObjectId);
        expect(resolveGenericTarget(BSONType.Regex, Family.Legacy)).toBe(TargetKind.RegEx);
        expect(resolveGenericTarget(BSONType.Regex, Family.Current)).toBe(TargetKind.BSONRegExp);
        expect(resolveGenericTarget(BSONType.Int32, Family.Legacy)).toBe(TargetKind.Int);
        expect(resolveGenericTarget(BSONType.Int64, Family.Current)).toBe(TargetKind.Long);
        expect(resolveGenericTarget(BSONType.Array, Family.Legacy)).toBe(TargetKind.Sequence);
        expect(resolveGenericTarget(BSONType.Symbol, Family.Current)).toBe(TargetKind.String);
    });

    it('resolves documents to the locked container', () => {
        expect(resolveGenericTarget(BSONType.Document, Family.Legacy)).toBe(TargetKind.M);
        expect(resolveGenericTarget(BSONType.Document, Family.Current)).toBe(TargetKind.Document);
        expect(resolveGenericTarget(BSONType.Document, Family.Legacy, TargetKind.Document)).toBe(TargetKind.Document);
        expect(resolveGenericTarget(BSONType.Document, Family.Current, TargetKind.M)).toBe(TargetKind.M);
        expect(resolveGenericTarget(BSONType.ObjectId, Family.Current, TargetKind.M)).toBe(TargetKind.ObjectId);
    });
});

describe('encode wire types', () => {
    it('forces numeric and identifier kinds', () => {
        expect(ENCODE_WIRE_TYPES[TargetKind.Int]).toEqual([BSONType.Int32, BSONType.Int64]);
        expect(ENCODE_WIRE_TYPES[TargetKind.Float]).toEqual([BSONType.Double]);
        expect(ENCODE_WIRE_TYPES[TargetKind.LegacyObjectId]).toEqual([BSONType.ObjectId, BSONType.Null]);
        expect(ENCODE_WIRE_TYPES[TargetKind.String]).toBeUndefined();
    });
});

describe('zeroValue', () => {
    it('returns the zero value of each family', () => {
        const legacyId = zeroValue(TargetKind.LegacyObjectId);
        expect(legacyId).toBeInstanceOf(LegacyObjectId);
        expect(legacyId instanceof LegacyObjectId && legacyId.isZero()).toBe(true);

        const currentId = zeroValue(TargetKind.ObjectId);
        expect(currentId).toBeInstanceOf(ObjectId);
        expect(currentId instanceof ObjectId && currentId.toHexString()).toBe('000000000000000000000000');

        expect(zeroValue(TargetKind.Int)).toBe(0);
        expect(zeroValue(TargetKind.BigInt)).toBe(0n);
        expect(zeroValue(TargetKind.String)).toBe('');
        expect(zeroValue(TargetKind.Int32)).toEqual(new Int32(0));
        expect(zeroValue(TargetKind.Long)).toEqual(Long.fromNumber(0));
        expect(zeroValue(TargetKind.M)).toBeInstanceOf(M);
        expect(zeroValue(TargetKind.D)).toBeInstanceOf(D);
        expect(zeroValue(TargetKind.Sequence)).toEqual([]);
        expect(zeroValue(TargetKind.Any)).toBeNull();
    });
});
