/**
 * 动态值分类：编码器与比较器共用的封闭类型分派
 * EN: Dynamic value classification: the closed type dispatch shared by the encoder and comparator
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
    ObjectId,
    Timestamp,
} from 'bson';
import { D, M } from './document';
import { LegacyObjectId } from './objectId';
import { RegEx } from './regex';
import { Document, isPlainObject } from './types';

/**
 * 动态值的封闭变体枚举
 * EN: Closed variant enumeration of dynamic values
 *
 * 新增变体时必须同时扩展编码器与转换策略表。
 * EN: A new variant must be added together with the encoder and the coercion table.
 */
export enum ValueKind {
    Null = 'null',
    Undefined = 'undefined',
    Boolean = 'boolean',
    Number = 'number',
    BigInt = 'bigint',
    String = 'string',
    Date = 'date',
    LegacyObjectId = 'legacyObjectId',
    ObjectId = 'objectId',
    RegEx = 'regex',
    BSONRegExp = 'bsonRegExp',
    M = 'm',
    D = 'd',
    Document = 'document',
    OrderedMap = 'orderedMap',
    Sequence = 'sequence',
    Int32 = 'int32',
    Long = 'long',
    Double = 'double',
    Decimal128 = 'decimal128',
    Timestamp = 'timestamp',
    Binary = 'binary',
    Bytes = 'bytes',
    MinKey = 'minKey',
    MaxKey = 'maxKey',
    Code = 'code',
    Unsupported = 'unsupported',
}

/**
 * 分类结果：变体标签 + 收窄后的值
 * EN: Classification result: variant tag plus the narrowed value
 */
export type ClassifiedValue =
    | { kind: ValueKind.Null; value: null }
    | { kind: ValueKind.Undefined; value: undefined }
    | { kind: ValueKind.Boolean; value: boolean }
    | { kind: ValueKind.Number; value: number }
    | { kind: ValueKind.BigInt; value: bigint }
    | { kind: ValueKind.String; value: string }
    | { kind: ValueKind.Date; value: Date }
    | { kind: ValueKind.LegacyObjectId; value: LegacyObjectId }
    | { kind: ValueKind.ObjectId; value: ObjectId }
    | { kind: ValueKind.RegEx; value: RegEx }
    | { kind: ValueKind.BSONRegExp; value: BSONRegExp }
    | { kind: ValueKind.M; value: M }
    | { kind: ValueKind.D; value: D }
    | { kind: ValueKind.Document; value: Document }
    | { kind: ValueKind.OrderedMap; value: Map<unknown, unknown> }
    | { kind: ValueKind.Sequence; value: readonly unknown[] }
    | { kind: ValueKind.Int32; value: Int32 }
    | { kind: ValueKind.Long; value: Long }
    | { kind: ValueKind.Double; value: Double }
    | { kind: ValueKind.Decimal128; value: Decimal128 }
    | { kind: ValueKind.Timestamp; value: Timestamp }
    | { kind: ValueKind.Binary; value: Binary }
    | { kind: ValueKind.Bytes; value: Uint8Array }
    | { kind: ValueKind.MinKey; value: MinKey }
    | { kind: ValueKind.MaxKey; value: MaxKey }
    | { kind: ValueKind.Code; value: Code }
    | { kind: ValueKind.Unsupported; value: unknown; description: string };

/**
 * 对值做一次类型检查并归类
 * EN: Inspect a value once and classify it
 */
export function classifyValue(value: unknown): ClassifiedValue {
    switch (typeof value) {
        case 'undefined':
            return { kind: ValueKind.Undefined, value };
        case 'boolean':
            return { kind: ValueKind.Boolean, value };
        case 'number':
            return { kind: ValueKind.Number, value };
        case 'bigint':
            return { kind: ValueKind.BigInt, value };
        case 'string':
            return { kind: ValueKind.String, value };
        case 'function':
        case 'symbol':
            return { kind: ValueKind.Unsupported, value, description: typeof value };
        default:
            break;
    }

    if (value === null) return { kind: ValueKind.Null, value };
    if (value instanceof LegacyObjectId) return { kind: ValueKind.LegacyObjectId, value };
    if (value instanceof ObjectId) return { kind: ValueKind.ObjectId, value };
    if (value instanceof RegEx) return { kind: ValueKind.RegEx, value };
    if (value instanceof BSONRegExp) return { kind: ValueKind.BSONRegExp, value };
    // M 继承自 Map，必须先于 Map 检查
    // EN: M extends Map, so it must be checked before Map
    if (value instanceof M) return { kind: ValueKind.M, value };
    if (value instanceof D) return { kind: ValueKind.D, value };
    if (value instanceof Map) return { kind: ValueKind.OrderedMap, value };
    if (Array.isArray(value)) return { kind: ValueKind.Sequence, value };
    if (value instanceof Date) return { kind: ValueKind.Date, value };
    if (value instanceof Int32) return { kind: ValueKind.Int32, value };
    if (value instanceof Double) return { kind: ValueKind.Double, value };
    // Timestamp 继承自 Long，必须先于 Long 检查
    // EN: Timestamp extends Long, so it must be checked before Long
    if (value instanceof Timestamp) return { kind: ValueKind.Timestamp, value };
    if (value instanceof Long) return { kind: ValueKind.Long, value };
    if (value instanceof Decimal128) return { kind: ValueKind.Decimal128, value };
    if (value instanceof Binary) return { kind: ValueKind.Binary, value };
    if (value instanceof Uint8Array) return { kind: ValueKind.Bytes, value };
    if (value instanceof MinKey) return { kind: ValueKind.MinKey, value };
    if (value instanceof MaxKey) return { kind: ValueKind.MaxKey, value };
    if (value instanceof Code) return { kind: ValueKind.Code, value };
    if (isPlainObject(value)) return { kind: ValueKind.Document, value };

    return { kind: ValueKind.Unsupported, value, description: describeValue(value) };
}

/**
 * 描述不支持的值（用于错误消息）
 * EN: Describe an unsupported value (for error messages)
 */
export function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value !== 'object') return typeof value;
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}
