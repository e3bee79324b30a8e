/**
 * BSON 解码器：按转换策略表把线上元素树写入目标
 * EN: BSON Decoder: converts the wire element tree into a destination through the coercion policy
 *
 * 先完整构建结果，再写入目标；失败时目标保持不变。
 * EN: The result is built completely before it is committed; the destination is untouched on failure.
 */

import {
    Binary,
    BSONError,
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
import { DecodeError } from '../core/codecError';
import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from '../core/limits';
import {
    CoercionAction,
    ContainerKind,
    TargetKind,
    resolveCoercion,
    resolveGenericTarget,
    zeroValue,
} from './coercion';
import { D, M } from './document';
import { encodesAsInt32, joinPath } from './encoder';
import { LegacyObjectId, isObjectIdHex } from './objectId';
import { BSONReader, ReaderOptions, WireElement, WireValue } from './reader';
import { RegEx } from './regex';
import { ElementSpec, StructSchema } from './schema';
import { BSONType, Document, Family, bsonTypeName, isPlainObject } from './types';
import { describeValue } from './valueKind';

/**
 * 解码器配置
 * EN: Decoder options
 */
export type DecoderOptions = ReaderOptions;

/**
 * 通用容器目标；顶层数组按文档元素顺序接收各值
 * EN: Generic container destination; a top-level array receives the document's values in element order
 */
export type GenericContainer = M | D | Map<string, unknown> | Document | unknown[];

/**
 * 解码上下文：入口类型族 + 已锁定的容器类型
 * EN: Decode context: entry family + locked container kind
 */
interface DecodeContext {
    family: Family;
    lock?: ContainerKind;
}

const ANY: ElementSpec = { kind: TargetKind.Any };
const MAX_DATE_MILLIS = 8.64e15;

/**
 * BSON 解码器
 * EN: BSON Decoder
 */
export class BSONDecoder {
    private readonly reader: BSONReader;

    constructor(options: Partial<DecoderOptions> = {}) {
        this.reader = new BSONReader(options);
    }

    /**
     * 无目标解码：返回入口类型族的默认容器（旧版 M，当前为普通对象）
     * EN: Decode without a destination: returns the entry family's default container (M for legacy, a plain object for current)
     */
    decodeAny(data: Uint8Array, family: Family): M | Document {
        const elements = this.reader.readDocument(data);
        if (family === Family.Legacy) {
            return this.buildM(elements, { family, lock: TargetKind.M }, '');
        }
        return this.buildDocument(elements, { family, lock: TargetKind.Document }, '');
    }

    /**
     * 解码到通用容器；目标容器类型锁定所有嵌套文档
     * EN: Decode into a generic container; the destination's container kind locks every nested document
     *
     * M 与 Map 合并键，D 与数组被替换，普通对象按键覆盖。
     * EN: M and Map merge keys, D and arrays are replaced, plain objects get keys overwritten.
     *
     * 数组目标不设锁：每个文档元素按入口类型族各自锁定。
     * EN: An array destination sets no lock: each document element locks its own family from the entry.
     */
    decodeInto(data: Uint8Array, dest: GenericContainer, family: Family): void {
        if (Array.isArray(dest)) {
            const values = this.convertEntries(this.reader.readDocument(data), { family }, '').map(([, value]) => value);
            dest.splice(0, dest.length, ...values);
            return;
        }

        const kind = containerKindOf(dest);
        const elements = this.reader.readDocument(data);
        const ctx: DecodeContext = { family, lock: kind };
        const entries = this.convertEntries(elements, ctx, '');

        if (dest instanceof D) {
            dest.elements.splice(0, dest.elements.length, ...entries.map(([name, value]) => ({ name, value })));
        } else if (dest instanceof Map) {
            for (const [key, value] of entries) {
                dest.set(key, value);
            }
        } else {
            for (const [key, value] of entries) {
                defineEntry(dest, key, value);
            }
        }
    }

    /**
     * 解码到结构化目标；未知键被忽略，缺失字段得到零值
     * EN: Decode into a structural target; unknown keys are ignored, absent fields get their zero value
     */
    decodeStruct<T extends object>(data: Uint8Array, dest: T, schema: StructSchema<T>, family: Family): void {
        const elements = this.reader.readDocument(data);
        const values = this.buildStruct(elements, schema, { family }, '');
        Object.assign(dest, values);
    }

    /**
     * 按目标规格转换一个线上值
     * EN: Convert one wire value to the target spec
     */
    private convert(wire: WireValue, spec: ElementSpec, ctx: DecodeContext, path: string): unknown {
        const kind = spec.kind === TargetKind.Any ? resolveGenericTarget(wire.type, ctx.family, ctx.lock) : spec.kind;

        if (resolveCoercion(wire.type, kind) === CoercionAction.Fail) {
            throw mismatch(wire, kind, path);
        }
        if (wire.type === BSONType.Null || wire.type === BSONType.Undefined) {
            return kind === TargetKind.Struct ? zeroStruct(spec.schema) : zeroValue(kind);
        }

        switch (kind) {
            case TargetKind.LegacyObjectId:
                return LegacyObjectId.fromBytes(objectIdBytes(wire, kind, path));
            case TargetKind.HexString:
                return objectIdBytes(wire, kind, path).toString('hex');
            case TargetKind.ObjectId:
                return new ObjectId(objectIdBytes(wire, kind, path));
            case TargetKind.RegEx: {
                const { pattern, options } = regexOf(wire, kind, path);
                return new RegEx(pattern, options);
            }
            case TargetKind.BSONRegExp: {
                const { pattern, options } = regexOf(wire, kind, path);
                return toBSONRegExp(pattern, options, path);
            }
            case TargetKind.M:
            case TargetKind.D:
            case TargetKind.Document:
            case TargetKind.OrderedMap:
                return this.buildContainer(documentOf(wire, kind, path), kind, ctx.family, path);
            case TargetKind.Int:
                return toSafeInteger(wire, kind, path);
            case TargetKind.Int32: {
                const n = toSafeInteger(wire, kind, path);
                if (n < INT32_MIN || n > INT32_MAX) {
                    throw DecodeError.lossyNumber(String(n), kind, path);
                }
                return new Int32(n);
            }
            case TargetKind.BigInt:
                return toInt64(wire, kind, path);
            case TargetKind.Long:
                return Long.fromBigInt(toInt64(wire, kind, path));
            case TargetKind.Float: {
                const n = toFloat(wire, kind, path);
                // 通用槽位里的整数值 double 保持 Double，否则重新编码会写成 int32
                // EN: Whole-number doubles in generic slots stay Double, otherwise re-encoding writes int32
                if (spec.kind === TargetKind.Any && wire.type === BSONType.Double && encodesAsInt32(n)) {
                    return new Double(n);
                }
                return n;
            }
            case TargetKind.Double:
                return new Double(toFloat(wire, kind, path));
            case TargetKind.Bytes:
                if (wire.type === BSONType.Binary) {
                    return wire.value;
                }
                break;
            case TargetKind.Binary:
                if (wire.type === BSONType.Binary) {
                    return new Binary(wire.value, wire.subtype);
                }
                break;
            case TargetKind.String:
                if (wire.type === BSONType.String || wire.type === BSONType.Symbol) {
                    return wire.value;
                }
                break;
            case TargetKind.Boolean:
                if (wire.type === BSONType.Boolean) {
                    return wire.value;
                }
                break;
            case TargetKind.Date:
                if (wire.type === BSONType.DateTime) {
                    const millis = Number(wire.value);
                    if (Math.abs(millis) > MAX_DATE_MILLIS) {
                        throw DecodeError.lossyNumber(wire.value.toString(), kind, path);
                    }
                    return new Date(millis);
                }
                break;
            case TargetKind.Decimal128:
                if (wire.type === BSONType.Decimal128) {
                    return new Decimal128(wire.value);
                }
                break;
            case TargetKind.Timestamp:
                if (wire.type === BSONType.Timestamp) {
                    return new Timestamp({ t: wire.t, i: wire.i });
                }
                break;
            case TargetKind.Code:
                if (wire.type === BSONType.JavaScript) {
                    return new Code(wire.value);
                }
                break;
            case TargetKind.MinKey:
                return new MinKey();
            case TargetKind.MaxKey:
                return new MaxKey();
            case TargetKind.Null:
                return null;
            case TargetKind.Sequence:
                if (wire.type === BSONType.Array) {
                    const elements = spec.elements ?? ANY;
                    return wire.value.map((el) => this.convert(el.value, elements, ctx, joinPath(path, el.name)));
                }
                break;
            case TargetKind.Struct:
                if (wire.type === BSONType.Document && spec.schema !== undefined) {
                    return this.buildStruct(wire.value, spec.schema, ctx, path);
                }
                break;
            case TargetKind.Any:
                break;
        }
        throw mismatch(wire, kind, path);
    }

    /**
     * 构建结构化值；重复键以后者为准
     * EN: Build a structural value; later duplicate keys win
     */
    private buildStruct(elements: WireElement[], schema: StructSchema, ctx: DecodeContext, path: string): Record<string, unknown> {
        const byKey = new Map<string, WireValue>();
        for (const el of elements) {
            byKey.set(el.name, el.value);
        }

        const values: Array<[string, unknown]> = [];
        for (const { property, spec } of schema.fields) {
            const wire = byKey.get(spec.key);
            if (wire === undefined) {
                values.push([property, spec.optional ? undefined : zeroOf(spec)]);
            } else if (spec.optional && (wire.type === BSONType.Null || wire.type === BSONType.Undefined)) {
                values.push([property, undefined]);
            } else {
                values.push([property, this.convert(wire, spec, ctx, joinPath(path, spec.key))]);
            }
        }
        return Object.fromEntries(values);
    }

    /**
     * 构建文档容器，并把锁设为该容器类型
     * EN: Build a document container and set the lock to its kind
     */
    private buildContainer(elements: WireElement[], kind: ContainerKind, family: Family, path: string): GenericContainer {
        const ctx: DecodeContext = { family, lock: kind };
        switch (kind) {
            case TargetKind.M:
                return this.buildM(elements, ctx, path);
            case TargetKind.D:
                return D.from(this.convertEntries(elements, ctx, path));
            case TargetKind.OrderedMap:
                return new Map(this.convertEntries(elements, ctx, path));
            case TargetKind.Document:
                return this.buildDocument(elements, ctx, path);
        }
    }

    private buildM(elements: WireElement[], ctx: DecodeContext, path: string): M {
        return M.from(this.convertEntries(elements, ctx, path));
    }

    private buildDocument(elements: WireElement[], ctx: DecodeContext, path: string): Document {
        const doc: Document = {};
        for (const [key, value] of this.convertEntries(elements, ctx, path)) {
            defineEntry(doc, key, value);
        }
        return doc;
    }

    private convertEntries(elements: WireElement[], ctx: DecodeContext, path: string): Array<[string, unknown]> {
        return elements.map((el) => [el.name, this.convert(el.value, ANY, ctx, joinPath(path, el.name))]);
    }
}

/**
 * 判断值能否作为通用容器目标
 * EN: Whether a value can be a generic container destination
 */
export function isGenericContainer(value: unknown): value is GenericContainer {
    return value instanceof Map || value instanceof D || Array.isArray(value) || isPlainObject(value);
}

/**
 * 目标的容器类型（M 必须先于 Map 检查）
 * EN: Container kind of a destination (M must be checked before Map)
 */
function containerKindOf(dest: M | D | Map<string, unknown> | Document): ContainerKind {
    if (dest instanceof M) return TargetKind.M;
    if (dest instanceof D) return TargetKind.D;
    if (dest instanceof Map) return TargetKind.OrderedMap;
    if (isPlainObject(dest)) return TargetKind.Document;
    throw DecodeError.invalidDestination(describeValue(dest));
}

/**
 * 以自有数据属性写入键（包括 "__proto__"）
 * EN: Write a key as an own data property (including "__proto__")
 */
function defineEntry(doc: Document, key: string, value: unknown): void {
    Object.defineProperty(doc, key, { value, enumerable: true, writable: true, configurable: true });
}

function zeroOf(spec: ElementSpec): unknown {
    const kind = spec.kind;
    return kind === TargetKind.Struct ? zeroStruct(spec.schema) : zeroValue(kind);
}

/**
 * 结构化值的零值：每个字段取零值，可选字段为 undefined
 * EN: Zero value of a structural value: every field zeroed, optional fields undefined
 */
function zeroStruct(schema: StructSchema | undefined): Record<string, unknown> {
    const values: Array<[string, unknown]> = [];
    for (const { property, spec } of schema?.fields ?? []) {
        values.push([property, spec.optional ? undefined : zeroOf(spec)]);
    }
    return Object.fromEntries(values);
}

function mismatch(wire: WireValue, kind: TargetKind, path: string): DecodeError {
    return DecodeError.typeMismatch(bsonTypeName(wire.type), kind, path);
}

/**
 * 标识符字节：ObjectId 直接取用，字符串必须是 24 位十六进制
 * EN: Identifier bytes: ObjectId as-is, strings must be 24 hex characters
 */
function objectIdBytes(wire: WireValue, kind: TargetKind, path: string): Buffer {
    if (wire.type === BSONType.ObjectId) {
        return wire.value;
    }
    if (wire.type === BSONType.String) {
        if (!isObjectIdHex(wire.value)) {
            throw DecodeError.invalidHex(wire.value, path);
        }
        return Buffer.from(wire.value, 'hex');
    }
    throw mismatch(wire, kind, path);
}

function regexOf(wire: WireValue, kind: TargetKind, path: string): { pattern: string; options: string } {
    if (wire.type !== BSONType.Regex) {
        throw mismatch(wire, kind, path);
    }
    return { pattern: wire.pattern, options: wire.options };
}

function documentOf(wire: WireValue, kind: TargetKind, path: string): WireElement[] {
    if (wire.type !== BSONType.Document) {
        throw mismatch(wire, kind, path);
    }
    return wire.value;
}

/**
 * 官方库会拒绝未知的正则选项
 * EN: The official library rejects unknown regex options
 */
function toBSONRegExp(pattern: string, options: string, path: string): BSONRegExp {
    try {
        return new BSONRegExp(pattern, options);
    } catch (err) {
        if (BSONError.isBSONError(err)) {
            throw DecodeError.invalidBSON(err.message, path);
        }
        throw err;
    }
}

/**
 * 转换为安全整数；小数或超出 2^53 范围的值会失败
 * EN: Convert to a safe integer; fractions and values beyond 2^53 fail
 */
function toSafeInteger(wire: WireValue, kind: TargetKind, path: string): number {
    switch (wire.type) {
        case BSONType.Int32:
            return wire.value;
        case BSONType.Int64:
            if (wire.value < BigInt(Number.MIN_SAFE_INTEGER) || wire.value > BigInt(Number.MAX_SAFE_INTEGER)) {
                throw DecodeError.lossyNumber(wire.value.toString(), kind, path);
            }
            return Number(wire.value);
        case BSONType.Double:
            if (!Number.isSafeInteger(wire.value)) {
                throw DecodeError.lossyNumber(String(wire.value), kind, path);
            }
            return wire.value;
        default:
            throw mismatch(wire, kind, path);
    }
}

/**
 * 转换为 int64
 * EN: Convert to int64
 */
function toInt64(wire: WireValue, kind: TargetKind, path: string): bigint {
    switch (wire.type) {
        case BSONType.Int32:
            return BigInt(wire.value);
        case BSONType.Int64:
            return wire.value;
        case BSONType.Double: {
            if (!Number.isInteger(wire.value)) {
                throw DecodeError.lossyNumber(String(wire.value), kind, path);
            }
            const n = BigInt(wire.value);
            if (n < INT64_MIN || n > INT64_MAX) {
                throw DecodeError.lossyNumber(String(wire.value), kind, path);
            }
            return n;
        }
        default:
            throw mismatch(wire, kind, path);
    }
}

/**
 * 转换为双精度浮点数；int64 必须在 2^53 范围内
 * EN: Convert to a double; int64 values must be within 2^53
 */
function toFloat(wire: WireValue, kind: TargetKind, path: string): number {
    switch (wire.type) {
        case BSONType.Double:
        case BSONType.Int32:
            return wire.value;
        case BSONType.Int64:
            if (wire.value < BigInt(Number.MIN_SAFE_INTEGER) || wire.value > BigInt(Number.MAX_SAFE_INTEGER)) {
                throw DecodeError.lossyNumber(wire.value.toString(), kind, path);
            }
            return Number(wire.value);
        default:
            throw mismatch(wire, kind, path);
    }
}
