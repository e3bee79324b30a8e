/**
 * BSON 编码器：遍历任意类型族的值并写出规范的 BSON 字节
 * EN: BSON Encoder: walks values of either type family and writes canonical BSON bytes
 *
 * 输出与官方 bson 库对等价的当前类型族值产生的字节完全一致。
 * EN: Output is byte-identical to what the official bson library produces for
 * EN: the equivalent current-family value.
 */

import { Double, Int32, Long, ObjectId } from 'bson';
import { EncodeError } from '../core/codecError';
import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN, MAX_BSON_DEPTH, MAX_DOCUMENT_SIZE } from '../core/limits';
import { ENCODE_WIRE_TYPES, TargetKind } from './coercion';
import { ByteWriter } from './dataEndian';
import { LegacyObjectId, isObjectIdHex } from './objectId';
import { sortRegexOptions } from './regex';
import { ElementSpec, StructSchema, isEmptyValue, readProperty } from './schema';
import { BinarySubtype, BSONType } from './types';
import { ClassifiedValue, ValueKind, classifyValue, describeValue } from './valueKind';

/**
 * 编码器配置
 * EN: Encoder options
 */
export interface EncoderOptions {
    /** 最大嵌套深度 EN: Max nesting depth */
    maxDepth: number;
    /** 最大文档大小 EN: Max document size */
    maxDocumentSize: number;
}

type Entries = Iterable<readonly [string, unknown]>;
type PayloadWriter = (w: ByteWriter) => void;

/**
 * 拼接字段路径（用于错误消息）
 * EN: Join a field path (for error messages)
 */
export function joinPath(path: string, name: string): string {
    return path ? `${path}.${name}` : name;
}

/**
 * 与官方库一致：int32 范围内的安全整数（非 -0）写为 int32，其余 number 写为 double
 * EN: Same as the official library: safe integers in int32 range (not -0) are int32, other numbers are double
 */
export function encodesAsInt32(n: number): boolean {
    return !Object.is(n, -0) && Number.isSafeInteger(n) && n >= INT32_MIN && n <= INT32_MAX;
}

/**
 * BSON 编码器
 * EN: BSON Encoder
 */
export class BSONEncoder {
    private readonly maxDepth: number;
    private readonly maxDocumentSize: number;

    constructor(options: Partial<EncoderOptions> = {}) {
        this.maxDepth = options.maxDepth ?? MAX_BSON_DEPTH;
        this.maxDocumentSize = options.maxDocumentSize ?? MAX_DOCUMENT_SIZE;
    }

    /**
     * 将文档（或结构化值）编码为 BSON 字节
     * EN: Encode a document (or a structural value) to BSON bytes
     */
    encode(value: unknown, schema?: StructSchema): Buffer {
        const writer = new ByteWriter();

        if (schema) {
            if (value === null || typeof value !== 'object') {
                throw EncodeError.invalidValue(`struct ${schema.name} expects an object, got ${describeValue(value)}`);
            }
            this.writeStruct(writer, value, schema, 1, '');
        } else {
            const entries = documentEntries(classifyValue(value));
            if (entries === undefined) {
                throw EncodeError.invalidValue(`top-level value must be a document, got ${describeValue(value)}`);
            }
            this.writeDocument(writer, entries, undefined, 1, '');
        }

        if (writer.length > this.maxDocumentSize) {
            throw EncodeError.documentTooLarge(writer.length, this.maxDocumentSize);
        }
        return writer.toBuffer();
    }

    /**
     * 写入文档主体：int32 长度 + 元素 + 结束符
     * EN: Write a document body: int32 length + elements + terminator
     */
    private writeDocument(w: ByteWriter, entries: Entries, spec: ElementSpec | undefined, depth: number, path: string): void {
        if (depth > this.maxDepth) {
            throw EncodeError.tooDeep(this.maxDepth, path || '<root>');
        }
        const start = w.reserveInt32();
        for (const [name, value] of entries) {
            this.writeElement(w, name, value, spec, depth, joinPath(path, name));
        }
        w.writeUInt8(0);
        w.patchInt32(start, w.length - start);
    }

    /**
     * 按结构字段顺序写入
     * EN: Write in struct field order
     */
    private writeStruct(w: ByteWriter, target: object, schema: StructSchema, depth: number, path: string): void {
        if (depth > this.maxDepth) {
            throw EncodeError.tooDeep(this.maxDepth, path || '<root>');
        }
        const start = w.reserveInt32();
        for (const { property, spec } of schema.fields) {
            const value = readProperty(target, property);
            if (spec.omitEmpty && isEmptyValue(value, spec)) {
                continue;
            }
            this.writeElement(w, spec.key, value, spec, depth, joinPath(path, spec.key));
        }
        w.writeUInt8(0);
        w.patchInt32(start, w.length - start);
    }

    /**
     * 写入一个元素；声明类型优先，其次按动态类型分派
     * EN: Write one element; the declared kind wins, then dynamic dispatch
     */
    private writeElement(
        w: ByteWriter,
        name: string,
        value: unknown,
        spec: ElementSpec | undefined,
        depth: number,
        path: string
    ): void {
        if (spec !== undefined && value !== undefined && value !== null) {
            const forced = ENCODE_WIRE_TYPES[spec.kind];
            if (forced !== undefined) {
                this.writeForced(w, name, value, spec.kind, forced, path);
                return;
            }
            if (spec.kind === TargetKind.Struct && spec.schema !== undefined && typeof value === 'object') {
                writeHeader(w, BSONType.Document, name);
                this.writeStruct(w, value, spec.schema, depth + 1, path);
                return;
            }
            if (spec.kind === TargetKind.Sequence && spec.elements !== undefined && Array.isArray(value)) {
                writeHeader(w, BSONType.Array, name);
                this.writeDocument(w, indexedEntries(value), spec.elements, depth + 1, path);
                return;
            }
        }
        this.writeDynamic(w, name, classifyValue(value), depth, path);
    }

    /**
     * 按声明类型强制的线上类型写入（选第一个能表示该值的）
     * EN: Write with the wire type a declared kind forces (the first that fits)
     */
    private writeForced(
        w: ByteWriter,
        name: string,
        value: unknown,
        kind: TargetKind,
        candidates: readonly BSONType[],
        path: string
    ): void {
        for (const type of candidates) {
            const payload = fitForced(type, value);
            if (payload !== undefined) {
                writeHeader(w, type, name);
                payload(w);
                return;
            }
        }
        if (typeof value === 'number' || typeof value === 'bigint') {
            throw EncodeError.outOfRange(String(value), kind, path);
        }
        throw EncodeError.invalidValue(`cannot encode ${describeValue(value)} at '${path}' as ${kind}`);
    }

    /**
     * 按动态类型分派（封闭变体）
     * EN: Dispatch on the dynamic type (closed variant)
     */
    private writeDynamic(w: ByteWriter, name: string, c: ClassifiedValue, depth: number, path: string): void {
        switch (c.kind) {
            case ValueKind.Null:
            case ValueKind.Undefined:
                writeHeader(w, BSONType.Null, name);
                return;
            case ValueKind.Boolean:
                writeHeader(w, BSONType.Boolean, name);
                w.writeUInt8(c.value ? 1 : 0);
                return;
            case ValueKind.Number:
                if (encodesAsInt32(c.value)) {
                    writeHeader(w, BSONType.Int32, name);
                    w.writeInt32LE(c.value);
                } else {
                    writeHeader(w, BSONType.Double, name);
                    w.writeDoubleLE(c.value);
                }
                return;
            case ValueKind.BigInt:
                if (c.value < INT64_MIN || c.value > INT64_MAX) {
                    throw EncodeError.outOfRange(c.value.toString(), 'int64', path);
                }
                writeHeader(w, BSONType.Int64, name);
                w.writeInt64LE(c.value);
                return;
            case ValueKind.String:
                writeHeader(w, BSONType.String, name);
                w.writeString(c.value);
                return;
            case ValueKind.Date: {
                const millis = c.value.getTime();
                if (Number.isNaN(millis)) {
                    throw EncodeError.invalidValue(`invalid Date at '${path}'`);
                }
                writeHeader(w, BSONType.DateTime, name);
                w.writeInt64LE(BigInt(millis));
                return;
            }
            case ValueKind.LegacyObjectId:
                // 空标识符写为 null
                // EN: The empty identifier is written as null
                if (c.value.isZero()) {
                    writeHeader(w, BSONType.Null, name);
                } else {
                    writeHeader(w, BSONType.ObjectId, name);
                    w.writeBytes(c.value.bytes());
                }
                return;
            case ValueKind.ObjectId:
                writeHeader(w, BSONType.ObjectId, name);
                w.writeBytes(c.value.id);
                return;
            case ValueKind.RegEx:
            case ValueKind.BSONRegExp: {
                const { pattern, options } = c.value;
                if (pattern.includes('\0')) {
                    throw EncodeError.invalidCString('regex pattern', path);
                }
                if (options.includes('\0')) {
                    throw EncodeError.invalidCString('regex options', path);
                }
                writeHeader(w, BSONType.Regex, name);
                w.writeCString(pattern);
                w.writeCString(sortRegexOptions(options));
                return;
            }
            case ValueKind.M:
            case ValueKind.D:
            case ValueKind.Document:
            case ValueKind.OrderedMap: {
                const entries = documentEntries(c);
                if (entries === undefined) {
                    throw EncodeError.unsupportedType(c.kind, path);
                }
                writeHeader(w, BSONType.Document, name);
                this.writeDocument(w, entries, undefined, depth + 1, path);
                return;
            }
            case ValueKind.Sequence:
                writeHeader(w, BSONType.Array, name);
                this.writeDocument(w, indexedEntries(c.value), undefined, depth + 1, path);
                return;
            case ValueKind.Int32:
                writeHeader(w, BSONType.Int32, name);
                w.writeInt32LE(c.value.value);
                return;
            case ValueKind.Double:
                writeHeader(w, BSONType.Double, name);
                w.writeDoubleLE(c.value.value);
                return;
            case ValueKind.Long:
                writeHeader(w, BSONType.Int64, name);
                w.writeInt64LE(c.value.toBigInt());
                return;
            case ValueKind.Timestamp:
                // 低 32 位为递增值，高 32 位为秒
                // EN: Low 32 bits are the increment, high 32 bits the seconds
                writeHeader(w, BSONType.Timestamp, name);
                w.writeUInt32LE(c.value.i);
                w.writeUInt32LE(c.value.t);
                return;
            case ValueKind.Decimal128:
                writeHeader(w, BSONType.Decimal128, name);
                w.writeBytes(c.value.bytes);
                return;
            case ValueKind.Binary:
                writeHeader(w, BSONType.Binary, name);
                writeBinary(w, c.value.buffer.subarray(0, c.value.position), c.value.sub_type);
                return;
            case ValueKind.Bytes:
                writeHeader(w, BSONType.Binary, name);
                writeBinary(w, c.value, BinarySubtype.Generic);
                return;
            case ValueKind.MinKey:
                writeHeader(w, BSONType.MinKey, name);
                return;
            case ValueKind.MaxKey:
                writeHeader(w, BSONType.MaxKey, name);
                return;
            case ValueKind.Code:
                if (c.value.scope !== null && c.value.scope !== undefined) {
                    throw EncodeError.unsupportedType('Code with scope', path);
                }
                writeHeader(w, BSONType.JavaScript, name);
                w.writeString(c.value.code);
                return;
            case ValueKind.Unsupported:
                throw EncodeError.unsupportedType(c.description, path);
        }
    }
}

/**
 * 写入元素头：类型字节 + 字段名
 * EN: Write the element header: type byte + field name
 */
function writeHeader(w: ByteWriter, type: BSONType, name: string): void {
    if (name.includes('\0')) {
        throw EncodeError.invalidKey(name);
    }
    w.writeUInt8(type);
    w.writeCString(name);
}

/**
 * 写入二进制负载；旧版子类型 0x02 带内部长度前缀
 * EN: Write a binary payload; the old subtype 0x02 carries an inner length prefix
 */
function writeBinary(w: ByteWriter, data: Uint8Array, subtype: number): void {
    if (subtype === BinarySubtype.BinaryOld) {
        w.writeInt32LE(data.length + 4);
        w.writeUInt8(subtype);
        w.writeInt32LE(data.length);
    } else {
        w.writeInt32LE(data.length);
        w.writeUInt8(subtype);
    }
    w.writeBytes(data);
}

/**
 * 文档类值的 (键, 值) 序列；非文档返回 undefined
 * EN: (key, value) sequence of a document-like value; undefined for non-documents
 */
function documentEntries(c: ClassifiedValue): Entries | undefined {
    switch (c.kind) {
        case ValueKind.M:
            return c.value.entries();
        case ValueKind.D:
            return c.value.elements.map((e) => [e.name, e.value] as const);
        case ValueKind.Document:
            return Object.entries(c.value);
        case ValueKind.OrderedMap:
            return stringKeyed(c.value);
        case ValueKind.Sequence:
            return indexedEntries(c.value);
        default:
            return undefined;
    }
}

function* stringKeyed(map: Map<unknown, unknown>): Generator<readonly [string, unknown]> {
    for (const [key, value] of map) {
        if (typeof key !== 'string') {
            throw EncodeError.invalidValue(`Map keys must be strings, got ${describeValue(key)}`);
        }
        yield [key, value];
    }
}

function indexedEntries(items: readonly unknown[]): Array<readonly [string, unknown]> {
    return items.map((item, index) => [String(index), item] as const);
}

/**
 * 判断值能否用给定线上类型表示；能则返回负载写入函数
 * EN: Whether a value fits a wire type; if so, return the payload writer
 */
function fitForced(type: BSONType, value: unknown): PayloadWriter | undefined {
    switch (type) {
        case BSONType.ObjectId: {
            if (value instanceof LegacyObjectId && !value.isZero()) {
                const bytes = value.bytes();
                return (w) => w.writeBytes(bytes);
            }
            if (value instanceof ObjectId) {
                const bytes = value.id;
                return (w) => w.writeBytes(bytes);
            }
            if (typeof value === 'string' && isObjectIdHex(value)) {
                const bytes = Buffer.from(value, 'hex');
                return (w) => w.writeBytes(bytes);
            }
            return undefined;
        }
        case BSONType.Null:
            if ((value instanceof LegacyObjectId && value.isZero()) || value === '') {
                return () => undefined;
            }
            return undefined;
        case BSONType.Int32: {
            const n = integerOf(value);
            if (n !== undefined && n >= BigInt(INT32_MIN) && n <= BigInt(INT32_MAX)) {
                return (w) => w.writeInt32LE(Number(n));
            }
            return undefined;
        }
        case BSONType.Int64: {
            const n = integerOf(value);
            if (n !== undefined && n >= INT64_MIN && n <= INT64_MAX) {
                return (w) => w.writeInt64LE(n);
            }
            return undefined;
        }
        case BSONType.Double: {
            const n = floatOf(value);
            if (n !== undefined) {
                return (w) => w.writeDoubleLE(n);
            }
            return undefined;
        }
        default:
            return undefined;
    }
}

/**
 * 提取整数值（number 必须为安全整数）
 * EN: Extract an integer value (numbers must be safe integers)
 */
function integerOf(value: unknown): bigint | undefined {
    if (typeof value === 'number') return Number.isSafeInteger(value) ? BigInt(value) : undefined;
    if (typeof value === 'bigint') return value;
    if (value instanceof Int32) return BigInt(value.value);
    if (value instanceof Long) return value.toBigInt();
    return undefined;
}

/**
 * 提取浮点值（bigint 必须为安全整数）
 * EN: Extract a float value (bigints must be safe integers)
 */
function floatOf(value: unknown): number | undefined {
    if (typeof value === 'number') return value;
    if (value instanceof Double || value instanceof Int32) return value.value;
    if (typeof value === 'bigint') {
        return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
            ? Number(value)
            : undefined;
    }
    return undefined;
}
