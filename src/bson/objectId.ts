/**
 * 旧版对象标识符与十六进制工具
 * EN: Legacy object identifier and hex helpers
 */

import { ObjectId } from 'bson';
import { CodecError } from '../core/codecError';
import { OBJECT_ID_HEX_LENGTH, OBJECT_ID_LENGTH } from '../core/limits';

const HEX_PATTERN = /^[0-9a-fA-F]{24}$/;

/**
 * 旧版对象标识符：12 个原始字节，或空（零值）
 * EN: Legacy object identifier: 12 raw bytes, or empty (the zero value)
 *
 * 零值与“字段缺失”只能通过字段是否存在来区分。
 * EN: The zero value is told apart from "absent" only by field presence.
 */
export class LegacyObjectId {
    /** 原始字节（长度 0 或 12） EN: Raw bytes (length 0 or 12) */
    private readonly raw: Buffer;

    private constructor(raw: Buffer) {
        this.raw = raw;
    }

    /**
     * 空标识符（零值）
     * EN: Empty identifier (zero value)
     */
    static empty(): LegacyObjectId {
        return new LegacyObjectId(Buffer.alloc(0));
    }

    /**
     * 从原始字节创建（复制输入）
     * EN: Create from raw bytes (input is copied)
     */
    static fromBytes(bytes: Uint8Array): LegacyObjectId {
        if (bytes.length !== 0 && bytes.length !== OBJECT_ID_LENGTH) {
            throw CodecError.badValue(`ObjectId must be ${OBJECT_ID_LENGTH} bytes long, got ${bytes.length}`);
        }
        return new LegacyObjectId(Buffer.from(bytes));
    }

    /**
     * 从官方库 ObjectId 转换
     * EN: Convert from an official-library ObjectId
     */
    static fromObjectId(id: ObjectId): LegacyObjectId {
        return new LegacyObjectId(Buffer.from(id.id));
    }

    /**
     * 是否为零值
     * EN: Whether this is the zero value
     */
    isZero(): boolean {
        return this.raw.length === 0;
    }

    /**
     * 规范十六进制形式（24 个小写字符，零值为空字符串）
     * EN: Canonical hex form (24 lowercase characters, empty string for the zero value)
     */
    hex(): string {
        return this.raw.toString('hex');
    }

    bytes(): Buffer {
        return Buffer.from(this.raw);
    }

    /**
     * 生成时间（前 4 字节的秒数）
     * EN: Generation time (seconds in the first 4 bytes)
     */
    timestamp(): Date {
        if (this.isZero()) {
            throw CodecError.badValue('empty ObjectId has no timestamp');
        }
        return new Date(this.raw.readUInt32BE(0) * 1000);
    }

    equals(other: LegacyObjectId): boolean {
        return this.raw.equals(other.raw);
    }

    /**
     * 按原始字节比较（零值最小）
     * EN: Compare by raw bytes (the zero value sorts first)
     */
    compare(other: LegacyObjectId): number {
        return Buffer.compare(this.raw, other.raw);
    }

    /**
     * 转换为官方库 ObjectId；零值无法转换
     * EN: Convert to an official-library ObjectId; the zero value has no counterpart
     */
    toObjectId(): ObjectId {
        if (this.isZero()) {
            throw CodecError.badValue('empty ObjectId cannot be converted');
        }
        return new ObjectId(this.bytes());
    }

    toString(): string {
        return `ObjectIdHex(${JSON.stringify(this.hex())})`;
    }

    toJSON(): string {
        return this.hex();
    }
}

/**
 * 判断文本是否为有效的 24 位十六进制标识符
 * EN: Check whether text is a valid 24-character hex identifier
 */
export function isObjectIdHex(text: string): boolean {
    return text.length === OBJECT_ID_HEX_LENGTH && HEX_PATTERN.test(text);
}

/**
 * 从十六进制文本构建旧版标识符
 * EN: Build a legacy identifier from hex text
 */
export function objectIdHex(text: string): LegacyObjectId {
    if (!isObjectIdHex(text)) {
        throw CodecError.badValue(`invalid input to objectIdHex: ${JSON.stringify(text)}`);
    }
    return LegacyObjectId.fromBytes(Buffer.from(text, 'hex'));
}

/**
 * 生成新的旧版标识符（字节布局与官方库一致）
 * EN: Generate a fresh legacy identifier (same byte layout as the official library)
 */
export function newObjectId(): LegacyObjectId {
    return LegacyObjectId.fromBytes(ObjectId.generate());
}

/**
 * 当前类型族的零值标识符（12 个零字节）
 * EN: Current-family zero identifier (12 zero bytes)
 */
export function zeroObjectId(): ObjectId {
    return new ObjectId(new Uint8Array(OBJECT_ID_LENGTH));
}

/**
 * 判断当前类型族的标识符是否全零
 * EN: Whether a current-family identifier is all zeros
 */
export function isZeroObjectId(id: ObjectId): boolean {
    return id.id.every((b) => b === 0);
}
