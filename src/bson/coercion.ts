/**
 * 类型转换策略表
 * EN: Coercion policy tables
 *
 * 线上元素类型与目标类型不一致时的唯一决策来源，编码端与解码端共用。
 * EN: The single source of truth when the wire element type and the target
 * EN: type disagree, shared by the encoder and the decoder.
 */

import {
    Binary,
    BSONRegExp,
    Code,
    Decimal128,
    Double,
    Int32,
    Long,
    MaxKey,
    MinKey,
    Timestamp,
} from 'bson';
import { D, M } from './document';
import { LegacyObjectId, zeroObjectId } from './objectId';
import { RegEx } from './regex';
import { BSONType, Family } from './types';

/**
 * 目标类型（结构化字段的声明类型，或通用槽位解析后的类型）
 * EN: Target kind (a structural field's declared kind, or the kind a generic slot resolves to)
 */
export enum TargetKind {
    // 旧版类型族 EN: Legacy family
    LegacyObjectId = 'legacyObjectId',
    HexString = 'hexString',
    RegEx = 'regex',
    M = 'm',
    D = 'd',
    Int = 'int',
    Float = 'float',
    BigInt = 'bigint',
    Bytes = 'bytes',
    // 当前类型族 EN: Current family
    ObjectId = 'objectId',
    BSONRegExp = 'bsonRegExp',
    Document = 'document',
    OrderedMap = 'orderedMap',
    Int32 = 'int32',
    Long = 'long',
    Double = 'double',
    // 两族共用 EN: Shared by both families
    String = 'string',
    Boolean = 'boolean',
    Date = 'date',
    Decimal128 = 'decimal128',
    Timestamp = 'timestamp',
    Binary = 'binary',
    Code = 'code',
    MinKey = 'minKey',
    MaxKey = 'maxKey',
    Null = 'null',
    Sequence = 'sequence',
    Struct = 'struct',
    Any = 'any',
}

/**
 * 转换动作
 * EN: Coercion action
 */
export enum CoercionAction {
    /** 直接赋值：线上类型的自然表示 EN: Direct assign: the wire type's natural representation */
    Assign = 'assign',
    /** 转换后赋值（值层面仍可能失败） EN: Convert then assign (may still fail on the value) */
    Convert = 'convert',
    /** 失败 EN: Fail */
    Fail = 'fail',
}

/**
 * 文档容器类型（会锁定嵌套文档的类型族）
 * EN: Document container kinds (they lock the family of nested documents)
 */
export type ContainerKind = TargetKind.M | TargetKind.D | TargetKind.Document | TargetKind.OrderedMap;

const ASSIGN = CoercionAction.Assign;
const CONVERT = CoercionAction.Convert;

type Row = Partial<Record<BSONType, CoercionAction>>;

/** 空值转为零值 EN: Null converts to the zero value */
const NULLABLE: Row = { [BSONType.Null]: CONVERT, [BSONType.Undefined]: CONVERT };

/** 整数目标接受所有数值子类型 EN: Integer targets accept every numeric subtype */
function numericRow(natural: BSONType): Row {
    const row: Row = {
        [BSONType.Int32]: CONVERT,
        [BSONType.Int64]: CONVERT,
        [BSONType.Double]: CONVERT,
        ...NULLABLE,
    };
    row[natural] = ASSIGN;
    return row;
}

function anyRow(): Row {
    const row: Row = {};
    for (const type of ALL_WIRE_TYPES) {
        row[type] = CONVERT;
    }
    return row;
}

/**
 * 所有受支持的线上元素类型
 * EN: Every supported wire element type
 */
export const ALL_WIRE_TYPES: readonly BSONType[] = [
    BSONType.Double,
    BSONType.String,
    BSONType.Document,
    BSONType.Array,
    BSONType.Binary,
    BSONType.Undefined,
    BSONType.ObjectId,
    BSONType.Boolean,
    BSONType.DateTime,
    BSONType.Null,
    BSONType.Regex,
    BSONType.JavaScript,
    BSONType.Symbol,
    BSONType.Int32,
    BSONType.Timestamp,
    BSONType.Int64,
    BSONType.Decimal128,
    BSONType.MinKey,
    BSONType.MaxKey,
];

/**
 * 解码转换表：(目标类型, 线上类型) → 动作；缺省为失败
 * EN: Decode coercion table: (target kind, wire type) → action; missing entries fail
 */
export const COERCION_TABLE: Readonly<Record<TargetKind, Row>> = {
    [TargetKind.LegacyObjectId]: { [BSONType.ObjectId]: ASSIGN, [BSONType.String]: CONVERT, ...NULLABLE },
    [TargetKind.HexString]: { [BSONType.ObjectId]: CONVERT, [BSONType.String]: CONVERT, ...NULLABLE },
    [TargetKind.RegEx]: { [BSONType.Regex]: ASSIGN, ...NULLABLE },
    [TargetKind.M]: { [BSONType.Document]: ASSIGN, ...NULLABLE },
    [TargetKind.D]: { [BSONType.Document]: ASSIGN, ...NULLABLE },
    [TargetKind.Int]: numericRow(BSONType.Int32),
    [TargetKind.Float]: numericRow(BSONType.Double),
    [TargetKind.BigInt]: numericRow(BSONType.Int64),
    [TargetKind.Bytes]: { [BSONType.Binary]: CONVERT, ...NULLABLE },

    // 当前类型族对空值更严格
    // EN: The current family is stricter about null
    [TargetKind.ObjectId]: { [BSONType.ObjectId]: ASSIGN, [BSONType.String]: CONVERT },
    [TargetKind.BSONRegExp]: { [BSONType.Regex]: ASSIGN },
    [TargetKind.Document]: { [BSONType.Document]: ASSIGN, ...NULLABLE },
    [TargetKind.OrderedMap]: { [BSONType.Document]: ASSIGN, ...NULLABLE },
    [TargetKind.Int32]: numericRow(BSONType.Int32),
    [TargetKind.Long]: numericRow(BSONType.Int64),
    [TargetKind.Double]: numericRow(BSONType.Double),

    [TargetKind.String]: { [BSONType.String]: ASSIGN, [BSONType.Symbol]: CONVERT, ...NULLABLE },
    [TargetKind.Boolean]: { [BSONType.Boolean]: ASSIGN, ...NULLABLE },
    [TargetKind.Date]: { [BSONType.DateTime]: ASSIGN, ...NULLABLE },
    [TargetKind.Decimal128]: { [BSONType.Decimal128]: ASSIGN, ...NULLABLE },
    [TargetKind.Timestamp]: { [BSONType.Timestamp]: ASSIGN, ...NULLABLE },
    [TargetKind.Binary]: { [BSONType.Binary]: ASSIGN, ...NULLABLE },
    [TargetKind.Code]: { [BSONType.JavaScript]: ASSIGN, ...NULLABLE },
    [TargetKind.MinKey]: { [BSONType.MinKey]: ASSIGN },
    [TargetKind.MaxKey]: { [BSONType.MaxKey]: ASSIGN },
    [TargetKind.Null]: { [BSONType.Null]: ASSIGN, [BSONType.Undefined]: CONVERT },
    [TargetKind.Sequence]: { [BSONType.Array]: ASSIGN, ...NULLABLE },
    [TargetKind.Struct]: { [BSONType.Document]: ASSIGN, ...NULLABLE },
    [TargetKind.Any]: anyRow(),
};

/**
 * 通用槽位解析表：(入口类型族, 线上类型) → 具体目标类型
 * EN: Generic slot resolution: (entry family, wire type) → concrete target kind
 */
export const GENERIC_TARGETS: Readonly<Record<Family, Readonly<Record<BSONType, TargetKind>>>> = {
    [Family.Legacy]: {
        [BSONType.Double]: TargetKind.Float,
        [BSONType.String]: TargetKind.String,
        [BSONType.Document]: TargetKind.M,
        [BSONType.Array]: TargetKind.Sequence,
        [BSONType.Binary]: TargetKind.Binary,
        [BSONType.Undefined]: TargetKind.Null,
        [BSONType.ObjectId]: TargetKind.LegacyObjectId,
        [BSONType.Boolean]: TargetKind.Boolean,
        [BSONType.DateTime]: TargetKind.Date,
        [BSONType.Null]: TargetKind.Null,
        [BSONType.Regex]: TargetKind.RegEx,
        [BSONType.JavaScript]: TargetKind.Code,
        [BSONType.Symbol]: TargetKind.String,
        [BSONType.Int32]: TargetKind.Int,
        [BSONType.Timestamp]: TargetKind.Timestamp,
        [BSONType.Int64]: TargetKind.BigInt,
        [BSONType.Decimal128]: TargetKind.Decimal128,
        [BSONType.MinKey]: TargetKind.MinKey,
        [BSONType.MaxKey]: TargetKind.MaxKey,
    },
    [Family.Current]: {
        [BSONType.Double]: TargetKind.Double,
        [BSONType.String]: TargetKind.String,
        [BSONType.Document]: TargetKind.Document,
        [BSONType.Array]: TargetKind.Sequence,
        [BSONType.Binary]: TargetKind.Binary,
        [BSONType.Undefined]: TargetKind.Null,
        [BSONType.ObjectId]: TargetKind.ObjectId,
        [BSONType.Boolean]: TargetKind.Boolean,
        [BSONType.DateTime]: TargetKind.Date,
        [BSONType.Null]: TargetKind.Null,
        [BSONType.Regex]: TargetKind.BSONRegExp,
        [BSONType.JavaScript]: TargetKind.Code,
        [BSONType.Symbol]: TargetKind.String,
        [BSONType.Int32]: TargetKind.Int32,
        [BSONType.Timestamp]: TargetKind.Timestamp,
        [BSONType.Int64]: TargetKind.Long,
        [BSONType.Decimal128]: TargetKind.Decimal128,
        [BSONType.MinKey]: TargetKind.MinKey,
        [BSONType.MaxKey]: TargetKind.MaxKey,
    },
};

/**
 * 目标类型所属的类型族（两族共用的类型不在表中）
 * EN: The family a target kind belongs to (shared kinds are absent)
 */
export const TARGET_FAMILY: Readonly<Partial<Record<TargetKind, Family>>> = {
    [TargetKind.LegacyObjectId]: Family.Legacy,
    [TargetKind.HexString]: Family.Legacy,
    [TargetKind.RegEx]: Family.Legacy,
    [TargetKind.M]: Family.Legacy,
    [TargetKind.D]: Family.Legacy,
    [TargetKind.Int]: Family.Legacy,
    [TargetKind.Float]: Family.Legacy,
    [TargetKind.BigInt]: Family.Legacy,
    [TargetKind.Bytes]: Family.Legacy,
    [TargetKind.ObjectId]: Family.Current,
    [TargetKind.BSONRegExp]: Family.Current,
    [TargetKind.Document]: Family.Current,
    [TargetKind.OrderedMap]: Family.Current,
    [TargetKind.Int32]: Family.Current,
    [TargetKind.Long]: Family.Current,
    [TargetKind.Double]: Family.Current,
};

/**
 * 编码端：声明类型强制使用的线上类型（按优先级，选第一个能表示该值的）
 * EN: Encode side: wire types a declared kind forces (in preference order; the first that fits wins)
 */
export const ENCODE_WIRE_TYPES: Readonly<Partial<Record<TargetKind, readonly BSONType[]>>> = {
    [TargetKind.LegacyObjectId]: [BSONType.ObjectId, BSONType.Null],
    [TargetKind.HexString]: [BSONType.ObjectId, BSONType.Null],
    [TargetKind.Int]: [BSONType.Int32, BSONType.Int64],
    [TargetKind.Int32]: [BSONType.Int32],
    [TargetKind.BigInt]: [BSONType.Int64],
    [TargetKind.Long]: [BSONType.Int64],
    [TargetKind.Float]: [BSONType.Double],
    [TargetKind.Double]: [BSONType.Double],
};

/**
 * 查询转换动作
 * EN: Look up the coercion action
 */
export function resolveCoercion(wire: BSONType, target: TargetKind): CoercionAction {
    return COERCION_TABLE[target][wire] ?? CoercionAction.Fail;
}

/**
 * 为通用槽位解析具体目标类型；文档遵循已锁定的容器类型
 * EN: Resolve the concrete kind for a generic slot; documents follow the locked container kind
 */
export function resolveGenericTarget(wire: BSONType, family: Family, lock?: ContainerKind): TargetKind {
    if (wire === BSONType.Document && lock !== undefined) {
        return lock;
    }
    return GENERIC_TARGETS[family][wire];
}

/**
 * 字段缺失（或空值）时的零值
 * EN: Zero value for an absent (or null) field
 */
export function zeroValue(kind: Exclude<TargetKind, TargetKind.Struct>): unknown {
    switch (kind) {
        case TargetKind.LegacyObjectId:
            return LegacyObjectId.empty();
        case TargetKind.HexString:
        case TargetKind.String:
            return '';
        case TargetKind.RegEx:
            return new RegEx('');
        case TargetKind.M:
            return new M();
        case TargetKind.D:
            return new D();
        case TargetKind.Int:
        case TargetKind.Float:
            return 0;
        case TargetKind.BigInt:
            return 0n;
        case TargetKind.Bytes:
            return Buffer.alloc(0);
        case TargetKind.ObjectId:
            return zeroObjectId();
        case TargetKind.BSONRegExp:
            return new BSONRegExp('');
        case TargetKind.Document:
            return {};
        case TargetKind.OrderedMap:
            return new Map<string, unknown>();
        case TargetKind.Int32:
            return new Int32(0);
        case TargetKind.Long:
            return Long.fromNumber(0);
        case TargetKind.Double:
            return new Double(0);
        case TargetKind.Boolean:
            return false;
        case TargetKind.Date:
            return new Date(0);
        case TargetKind.Decimal128:
            return Decimal128.fromString('0');
        case TargetKind.Timestamp:
            return new Timestamp({ t: 0, i: 0 });
        case TargetKind.Binary:
            return new Binary(new Uint8Array(0));
        case TargetKind.Code:
            return new Code('');
        case TargetKind.MinKey:
            return new MinKey();
        case TargetKind.MaxKey:
            return new MaxKey();
        case TargetKind.Sequence:
            return [];
        case TargetKind.Null:
        case TargetKind.Any:
            return null;
    }
}
