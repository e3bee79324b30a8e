/**
 * 小端序二进制读写工具（BSON 的整数与浮点数均为小端序）
 * EN: Little-endian binary read/write utilities (BSON integers and doubles are little-endian)
 */

import { DecodeError } from '../core/codecError';

/**
 * 带边界检查的读取器
 * EN: Reader with bounds checks
 */
export class DataEndian {
    /**
     * 确保 offset 处还有 size 字节
     * EN: Ensure size bytes are available at offset
     */
    static ensure(buf: Buffer, offset: number, size: number, end: number = buf.length): void {
        if (offset < 0 || offset + size > end) {
            throw DecodeError.truncated(offset, size, Math.max(0, end - offset));
        }
    }

    /**
     * 从缓冲区读取 uint8
     * EN: Read uint8 from buffer
     */
    static readUInt8(buf: Buffer, offset: number, end?: number): number {
        DataEndian.ensure(buf, offset, 1, end);
        return buf.readUInt8(offset);
    }

    /**
     * 从缓冲区读取小端序 int32
     * EN: Read int32 little-endian from buffer
     */
    static readInt32LE(buf: Buffer, offset: number, end?: number): number {
        DataEndian.ensure(buf, offset, 4, end);
        return buf.readInt32LE(offset);
    }

    /**
     * 从缓冲区读取小端序 uint32
     * EN: Read uint32 little-endian from buffer
     */
    static readUInt32LE(buf: Buffer, offset: number, end?: number): number {
        DataEndian.ensure(buf, offset, 4, end);
        return buf.readUInt32LE(offset);
    }

    /**
     * 从缓冲区读取小端序 int64（返回 bigint）
     * EN: Read int64 little-endian from buffer (as bigint)
     */
    static readInt64LE(buf: Buffer, offset: number, end?: number): bigint {
        DataEndian.ensure(buf, offset, 8, end);
        return buf.readBigInt64LE(offset);
    }

    /**
     * 从缓冲区读取小端序 double
     * EN: Read double little-endian from buffer
     */
    static readDoubleLE(buf: Buffer, offset: number, end?: number): number {
        DataEndian.ensure(buf, offset, 8, end);
        return buf.readDoubleLE(offset);
    }

    /**
     * 读取 C 字符串（以 null 结尾），返回原始字节范围
     * EN: Read a C-string (null-terminated), returning its raw byte range
     */
    static readCStringBytes(buf: Buffer, offset: number, end: number = buf.length): { bytes: Buffer; bytesRead: number } {
        const nul = buf.indexOf(0, offset);
        if (nul === -1 || nul >= end) {
            throw DecodeError.invalidBSON(`unterminated C-string at offset ${offset}`);
        }
        return { bytes: buf.subarray(offset, nul), bytesRead: nul - offset + 1 };
    }
}

/** 写缓冲区初始大小 EN: Initial writer capacity */
const INITIAL_CAPACITY = 256;

/**
 * 可增长的小端序写入器
 * EN: Growable little-endian writer
 */
export class ByteWriter {
    private buf: Buffer;
    private pos: number = 0;

    constructor(capacity: number = INITIAL_CAPACITY) {
        this.buf = Buffer.alloc(capacity);
    }

    /** 已写入字节数 EN: Bytes written so far */
    get length(): number {
        return this.pos;
    }

    private grow(size: number): void {
        if (this.pos + size <= this.buf.length) {
            return;
        }
        let capacity = this.buf.length * 2;
        while (capacity < this.pos + size) {
            capacity *= 2;
        }
        const next = Buffer.alloc(capacity);
        this.buf.copy(next, 0, 0, this.pos);
        this.buf = next;
    }

    writeUInt8(value: number): void {
        this.grow(1);
        this.buf.writeUInt8(value, this.pos);
        this.pos += 1;
    }

    writeInt32LE(value: number): void {
        this.grow(4);
        this.buf.writeInt32LE(value, this.pos);
        this.pos += 4;
    }

    writeUInt32LE(value: number): void {
        this.grow(4);
        this.buf.writeUInt32LE(value, this.pos);
        this.pos += 4;
    }

    writeInt64LE(value: bigint): void {
        this.grow(8);
        this.buf.writeBigInt64LE(value, this.pos);
        this.pos += 8;
    }

    writeDoubleLE(value: number): void {
        this.grow(8);
        this.buf.writeDoubleLE(value, this.pos);
        this.pos += 8;
    }

    writeBytes(bytes: Uint8Array): void {
        this.grow(bytes.length);
        this.buf.set(bytes, this.pos);
        this.pos += bytes.length;
    }

    /**
     * 写入 C 字符串（调用方负责确保不含 NUL）
     * EN: Write a C-string (the caller ensures it has no NUL)
     */
    writeCString(value: string): void {
        this.writeBytes(Buffer.from(value, 'utf8'));
        this.writeUInt8(0);
    }

    /**
     * 写入 BSON 字符串：int32 长度（含结束符）+ UTF-8 + NUL
     * EN: Write a BSON string: int32 length (including terminator) + UTF-8 + NUL
     */
    writeString(value: string): void {
        const bytes = Buffer.from(value, 'utf8');
        this.writeInt32LE(bytes.length + 1);
        this.writeBytes(bytes);
        this.writeUInt8(0);
    }

    /**
     * 预留 int32 长度位置，稍后回填
     * EN: Reserve an int32 length slot to be patched later
     */
    reserveInt32(): number {
        const offset = this.pos;
        this.writeInt32LE(0);
        return offset;
    }

    patchInt32(offset: number, value: number): void {
        this.buf.writeInt32LE(value, offset);
    }

    toBuffer(): Buffer {
        return Buffer.from(this.buf.subarray(0, this.pos));
    }
}
