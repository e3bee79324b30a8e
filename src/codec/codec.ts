/**
 * 编解码器入口：旧版与当前两种调用方式共用同一实现，仅入口类型族不同
 * EN: Codec front-ends: the legacy and current entry points share one implementation and differ only in the entry family
 */

import { BSONDecoder, GenericContainer, isGenericContainer } from '../bson/decoder';
import { BSONEncoder } from '../bson/encoder';
import { M } from '../bson/document';
import { StructSchema } from '../bson/schema';
import { Document, Family } from '../bson/types';
import { describeValue } from '../bson/valueKind';
import { DecodeError, asCodecError } from '../core/codecError';
import { CodecOptions, configureFromEnv, resolveCodecOptions } from '../core/config';
import { ILogger, Logger } from '../core/logger';

/**
 * BSON 编解码器
 * EN: BSON codec
 */
export class Codec {
    readonly options: Readonly<CodecOptions>;
    private readonly encoder: BSONEncoder;
    private readonly decoder: BSONDecoder;
    private readonly log: ILogger = Logger.child('codec');

    constructor(options: Partial<CodecOptions> = {}) {
        this.options = Object.freeze(resolveCodecOptions(options));
        this.encoder = new BSONEncoder(this.options);
        this.decoder = new BSONDecoder(this.options);
    }

    /**
     * 按环境变量创建编解码器（同时设置日志级别）
     * EN: Create a codec from environment variables (also sets the log level)
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env, overrides: Partial<CodecOptions> = {}): Codec {
        return new Codec({ ...configureFromEnv(env), ...overrides });
    }

    /** 入口类型族 EN: Entry family */
    get family(): Family {
        return this.options.family;
    }

    /**
     * 编码文档或结构化值
     * EN: Encode a document or a structural value
     */
    marshal<T extends object>(value: T, schema: StructSchema<T>): Buffer;
    marshal(value: unknown, schema?: StructSchema): Buffer;
    marshal(value: unknown, schema?: StructSchema): Buffer {
        try {
            return this.encoder.encode(value, schema);
        } catch (err) {
            this.log.debug('marshal failed', { family: this.family, schema: schema?.name, error: asCodecError(err).message });
            throw err;
        }
    }

    /**
     * 解码到目标（原地填充）；失败时目标保持不变
     * EN: Decode into a destination (populated in place); the destination is untouched on failure
     */
    unmarshal<T extends object>(data: Uint8Array, dest: T, schema: StructSchema<T>): void;
    unmarshal(data: Uint8Array, dest: GenericContainer): void;
    unmarshal(data: Uint8Array, dest: object, schema?: StructSchema): void {
        try {
            if (schema) {
                this.decoder.decodeStruct(data, dest, schema, this.family);
            } else if (isGenericContainer(dest)) {
                this.decoder.decodeInto(data, dest, this.family);
            } else {
                throw DecodeError.invalidDestination(describeValue(dest));
            }
        } catch (err) {
            this.log.debug('unmarshal failed', { family: this.family, schema: schema?.name, error: asCodecError(err).message });
            throw err;
        }
    }

    /**
     * 无目标解码：旧版返回 M，当前返回普通对象
     * EN: Decode without a destination: M for legacy, a plain object for current
     */
    unmarshalAny(data: Uint8Array): M | Document {
        try {
            return this.decoder.decodeAny(data, this.family);
        } catch (err) {
            this.log.debug('unmarshalAny failed', { family: this.family, error: asCodecError(err).message });
            throw err;
        }
    }
}

/**
 * 旧版入口
 * EN: Legacy entry point
 */
export const legacy = new Codec({ family: Family.Legacy });

/**
 * 当前入口
 * EN: Current entry point
 */
export const current = new Codec({ family: Family.Current });

export function marshal<T extends object>(value: T, schema: StructSchema<T>): Buffer;
export function marshal(value: unknown, schema?: StructSchema): Buffer;
export function marshal(value: unknown, schema?: StructSchema): Buffer {
    return legacy.marshal(value, schema);
}

export function unmarshal<T extends object>(data: Uint8Array, dest: T, schema: StructSchema<T>): void;
export function unmarshal(data: Uint8Array, dest: GenericContainer): void;
export function unmarshal(data: Uint8Array, dest: object, schema?: StructSchema): void {
    if (schema) {
        legacy.unmarshal(data, dest, schema);
    } else if (isGenericContainer(dest)) {
        legacy.unmarshal(data, dest);
    } else {
        throw DecodeError.invalidDestination(describeValue(dest));
    }
}

export function unmarshalAny(data: Uint8Array): M | Document {
    return legacy.unmarshalAny(data);
}
