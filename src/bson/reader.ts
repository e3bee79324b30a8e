/**
 * BSON 读取器：校验元素语法并生成线上元素树
 * EN: BSON reader: validates the element grammar and produces a wire element tree
 */

import { isUtf8 } from 'buffer';
import { DecodeError } from '../core/codecError';
import { MAX_BSON_DEPTH, MAX_DOCUMENT_SIZE, MIN_DOCUMENT_SIZE, OBJECT_ID_LENGTH } from '../core/limits';
import { DataEndian } from './dataEndian';
import { BinarySubtype, BSONType, isBSONType } from './types';

/**
 * 线上值（按元素类型区分的负载）
 * EN: Wire value (payload discriminated by element type)
 */
export type WireValue =
    | { type: BSONType.Double; value: number }
    | { type: BSONType.String; value: string }
    | { type: BSONType.Document; value: WireElement[] }
    | { type: BSONType.Array; value: WireElement[] }
    | { type: BSONType.Binary; subtype: number; value: Buffer }
    | { type: BSONType.Undefined }
    | { type: BSONType.ObjectId; value: Buffer }
    | { type: BSONType.Boolean; value: boolean }
    | { type: BSONType.DateTime; value: bigint }
    | { type: BSONType.Null }
    | { type: BSONType.Regex; pattern: string; options: string }
    | { type: BSONType.JavaScript; value: string }
    | { type: BSONType.Symbol; value: string }
    | { type: BSONType.Int32; value: number }
    | { type: BSONType.Timestamp; t: number; i: number }
    | { type: BSONType.Int64; value: bigint }
    | { type: BSONType.Decimal128; value: Buffer }
    | { type: BSONType.MinKey }
    | { type: BSONType.MaxKey };

/**
 * 线上元素：字段名 + 值
 * EN: Wire element: field name + value
 */
export interface WireElement {
    name: string;
    value: WireValue;
}

/**
 * 读取器配置
 * EN: Reader options
 */
export interface ReaderOptions {
    validateUtf8: boolean;
    maxDepth: number;
    maxDocumentSize: number;
}

/**
 * BSON 读取器
 * EN: BSON reader
 */
export class BSONReader {
    private readonly validateUtf8: boolean;
    private readonly maxDepth: number;
    private readonly maxDocumentSize: number;

    constructor(options: Partial<ReaderOptions> = {}) {
        this.validateUtf8 = options.validateUtf8 ?? true;
        this.maxDepth = options.maxDepth ?? MAX_BSON_DEPTH;
        this.maxDocumentSize = options.maxDocumentSize ?? MAX_DOCUMENT_SIZE;
    }

    /**
     * 读取顶层文档；缓冲区必须恰好包含一个文档
     * EN: Read a top-level document; the buffer must hold exactly one document
     */
    readDocument(data: Uint8Array): WireElement[] {
        const buf = Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);

        if (buf.length < MIN_DOCUMENT_SIZE) {
            throw DecodeError.truncated(0, MIN_DOCUMENT_SIZE, buf.length);
        }
        const size = DataEndian.readInt32LE(buf, 0);
        if (size > this.maxDocumentSize) {
            throw DecodeError.documentTooLarge(size, this.maxDocumentSize);
        }
        if (size > buf.length) {
            throw DecodeError.truncated(0, size, buf.length);
        }
        if (size !== buf.length) {
            throw DecodeError.invalidBSON(`document length ${size} does not match buffer length ${buf.length}`);
        }

        return this.readElements(buf, 0, buf.length, 1).elements;
    }

    /**
     * 读取 offset 处的文档（长度前缀 + 元素 + 结束符）
     * EN: Read the document at offset (length prefix + elements + terminator)
     */
    private readElements(buf: Buffer, offset: number, limit: number, depth: number): { elements: WireElement[]; next: number } {
        if (depth > this.maxDepth) {
            throw DecodeError.tooDeep(this.maxDepth);
        }

        const size = DataEndian.readInt32LE(buf, offset, limit);
        if (size < MIN_DOCUMENT_SIZE || offset + size > limit) {
            throw DecodeError.invalidLength(size, offset);
        }
        const end = offset + size;
        if (buf[end - 1] !== 0) {
            throw DecodeError.invalidBSON(`document at offset ${offset} is not null-terminated`);
        }

        const elements: WireElement[] = [];
        const bodyEnd = end - 1;
        let pos = offset + 4;
        while (pos < bodyEnd) {
            const tag = buf[pos];
            if (!isBSONType(tag)) {
                throw DecodeError.invalidBSON(`unknown element type 0x${tag.toString(16).padStart(2, '0')} at offset ${pos}`);
            }
            pos += 1;

            const key = DataEndian.readCStringBytes(buf, pos, bodyEnd);
            const name = this.decodeUtf8(key.bytes, pos);
            pos += key.bytesRead;

            const read = this.readValue(buf, tag, pos, bodyEnd, depth);
            elements.push({ name, value: read.value });
            pos = read.next;
        }
        if (pos !== bodyEnd) {
            throw DecodeError.invalidBSON(`element overruns document at offset ${offset}`);
        }

        return { elements, next: end };
    }

    /**
     * 按元素类型读取负载
     * EN: Read a payload by element type
     */
    private readValue(buf: Buffer, type: BSONType, pos: number, limit: number, depth: number): { value: WireValue; next: number } {
        switch (type) {
            case BSONType.Double:
                return { value: { type, value: DataEndian.readDoubleLE(buf, pos, limit) }, next: pos + 8 };
            case BSONType.String:
            case BSONType.JavaScript:
            case BSONType.Symbol: {
                const s = this.readString(buf, pos, limit);
                return { value: { type, value: s.value }, next: s.next };
            }
            case BSONType.Document:
            case BSONType.Array: {
                const doc = this.readElements(buf, pos, limit, depth + 1);
                return { value: { type, value: doc.elements }, next: doc.next };
            }
            case BSONType.Binary:
                return this.readBinary(buf, pos, limit);
            case BSONType.Undefined:
            case BSONType.Null:
            case BSONType.MinKey:
            case BSONType.MaxKey:
                return { value: { type }, next: pos };
            case BSONType.ObjectId:
                DataEndian.ensure(buf, pos, OBJECT_ID_LENGTH, limit);
                return {
                    value: { type, value: Buffer.from(buf.subarray(pos, pos + OBJECT_ID_LENGTH)) },
                    next: pos + OBJECT_ID_LENGTH,
                };
            case BSONType.Boolean: {
                const byte = DataEndian.readUInt8(buf, pos, limit);
                if (byte !== 0 && byte !== 1) {
                    throw DecodeError.invalidBSON(`invalid boolean byte 0x${byte.toString(16)} at offset ${pos}`);
                }
                return { value: { type, value: byte === 1 }, next: pos + 1 };
            }
            case BSONType.DateTime:
                return { value: { type, value: DataEndian.readInt64LE(buf, pos, limit) }, next: pos + 8 };
            case BSONType.Regex: {
                const pattern = DataEndian.readCStringBytes(buf, pos, limit);
                const optionsAt = pos + pattern.bytesRead;
                const options = DataEndian.readCStringBytes(buf, optionsAt, limit);
                return {
                    value: {
                        type,
                        pattern: this.decodeUtf8(pattern.bytes, pos),
                        options: this.decodeUtf8(options.bytes, optionsAt),
                    },
                    next: optionsAt + options.bytesRead,
                };
            }
            case BSONType.Int32:
                return { value: { type, value: DataEndian.readInt32LE(buf, pos, limit) }, next: pos + 4 };
            case BSONType.Timestamp: {
                const i = DataEndian.readUInt32LE(buf, pos, limit);
                const t = DataEndian.readUInt32LE(buf, pos + 4, limit);
                return { value: { type, t, i }, next: pos + 8 };
            }
            case BSONType.Int64:
                return { value: { type, value: DataEndian.readInt64LE(buf, pos, limit) }, next: pos + 8 };
            case BSONType.Decimal128:
                DataEndian.ensure(buf, pos, 16, limit);
                return { value: { type, value: Buffer.from(buf.subarray(pos, pos + 16)) }, next: pos + 16 };
        }
    }

    /**
     * 读取 BSON 字符串：int32 长度（含结束符）+ UTF-8 + NUL
     * EN: Read a BSON string: int32 length (including terminator) + UTF-8 + NUL
     */
    private readString(buf: Buffer, pos: number, limit: number): { value: string; next: number } {
        const length = DataEndian.readInt32LE(buf, pos, limit);
        const start = pos + 4;
        if (length < 1 || start + length > limit) {
            throw DecodeError.invalidLength(length, pos);
        }
        if (buf[start + length - 1] !== 0) {
            throw DecodeError.invalidBSON(`string at offset ${pos} is not null-terminated`);
        }
        return { value: this.decodeUtf8(buf.subarray(start, start + length - 1), start), next: start + length };
    }

    private readBinary(buf: Buffer, pos: number, limit: number): { value: WireValue; next: number } {
        const length = DataEndian.readInt32LE(buf, pos, limit);
        const subtype = DataEndian.readUInt8(buf, pos + 4, limit);
        const start = pos + 5;
        if (length < 0 || start + length > limit) {
            throw DecodeError.invalidLength(length, pos);
        }

        let data = buf.subarray(start, start + length);
        if (subtype === BinarySubtype.BinaryOld) {
            // 旧版子类型带内部长度前缀
            // EN: The old subtype carries an inner length prefix
            const inner = DataEndian.readInt32LE(buf, start, start + length);
            if (inner !== length - 4) {
                throw DecodeError.invalidBSON(`binary subtype 0x02 inner length ${inner} does not match ${length - 4}`);
            }
            data = buf.subarray(start + 4, start + length);
        }

        return {
            value: { type: BSONType.Binary, subtype, value: Buffer.from(data) },
            next: start + length,
        };
    }

    private decodeUtf8(bytes: Buffer, offset: number): string {
        if (this.validateUtf8 && !isUtf8(bytes)) {
            throw DecodeError.invalidUtf8(offset);
        }
        return bytes.toString('utf8');
    }
}
