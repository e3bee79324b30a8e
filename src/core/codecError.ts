import { ErrorCode, getErrorCodeName } from './errorCodes';

/**
 * 编解码器错误基类（MongoDB 兼容错误码）
 * EN: Codec error base class (MongoDB-compatible error codes)
 */
export class CodecError extends Error {
    /** 错误码 EN: Error code */
    readonly code: ErrorCode;
    /** 错误码名称 EN: Error code name */
    readonly codeName: string;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = 'CodecError';
        this.code = code;
        this.codeName = getErrorCodeName(code);
    }

    /**
     * 转换为字符串
     * EN: Convert to string
     */
    toString(): string {
        return `${this.codeName} (${this.code}): ${this.message}`;
    }

    /**
     * 无效值错误
     * EN: Bad value error
     */
    static badValue(message: string): CodecError {
        return new CodecError(ErrorCode.BadValue, message);
    }

    /**
     * 内部错误
     * EN: Internal error
     */
    static internalError(message: string): CodecError {
        return new CodecError(ErrorCode.InternalError, message);
    }
}

/**
 * 编码错误：值没有 BSON 映射，或无法用 BSON 语法表示
 * EN: Encode error: the value has no BSON mapping or cannot be represented in BSON
 */
export class EncodeError extends CodecError {
    constructor(code: ErrorCode, message: string) {
        super(code, message);
        this.name = 'EncodeError';
    }

    /**
     * 不支持的动态类型
     * EN: Unsupported dynamic type
     */
    static unsupportedType(description: string, path: string): EncodeError {
        return new EncodeError(
            ErrorCode.UnsupportedFormat,
            `cannot encode value of type ${description} at '${path}': no BSON mapping`
        );
    }

    /**
     * 键名包含 NUL 字节
     * EN: Key contains a NUL byte
     */
    static invalidKey(key: string): EncodeError {
        return new EncodeError(ErrorCode.BadValue, `key ${JSON.stringify(key)} must not contain null bytes`);
    }

    /**
     * C 字符串包含 NUL 字节（正则表达式的 pattern/options）
     * EN: C-string contains a NUL byte (regex pattern/options)
     */
    static invalidCString(what: string, path: string): EncodeError {
        return new EncodeError(ErrorCode.BadValue, `${what} at '${path}' must not contain null bytes`);
    }

    /**
     * 数值超出范围
     * EN: Numeric value out of range
     */
    static outOfRange(value: string, target: string, path: string): EncodeError {
        return new EncodeError(ErrorCode.Overflow, `value ${value} at '${path}' does not fit in ${target}`);
    }

    static invalidValue(message: string): EncodeError {
        return new EncodeError(ErrorCode.BadValue, message);
    }

    /**
     * 文档过大
     * EN: Document too large
     */
    static documentTooLarge(size: number, maxSize: number): EncodeError {
        return new EncodeError(
            ErrorCode.BSONObjectTooLarge,
            `document is too large: ${size} bytes, max size is ${maxSize} bytes`
        );
    }

    /**
     * 嵌套过深
     * EN: Nesting too deep
     */
    static tooDeep(maxDepth: number, path: string): EncodeError {
        return new EncodeError(ErrorCode.Overflow, `exceeded depth limit of ${maxDepth} at '${path}'`);
    }
}

/**
 * 解码错误：缓冲区损坏、类型不匹配、无效十六进制或无效 UTF-8
 * EN: Decode error: malformed buffer, type mismatch, invalid hex or invalid UTF-8
 */
export class DecodeError extends CodecError {
    /** 出错字段的点号路径 EN: Dotted path of the failing field */
    readonly path: string;

    constructor(code: ErrorCode, message: string, path: string = '') {
        super(code, path ? `${message} (at '${path}')` : message);
        this.name = 'DecodeError';
        this.path = path;
    }

    /**
     * 缓冲区被截断
     * EN: Buffer truncated
     */
    static truncated(offset: number, needed: number, available: number): DecodeError {
        return new DecodeError(
            ErrorCode.InvalidBSON,
            `truncated buffer: need ${needed} bytes at offset ${offset}, only ${available} available`
        );
    }

    /**
     * 格式错误的 BSON
     * EN: Malformed BSON
     */
    static invalidBSON(message: string, path: string = ''): DecodeError {
        return new DecodeError(ErrorCode.InvalidBSON, message, path);
    }

    /**
     * 无效长度
     * EN: Invalid length
     */
    static invalidLength(length: number, offset: number): DecodeError {
        return new DecodeError(ErrorCode.InvalidLength, `invalid length ${length} at offset ${offset}`);
    }

    /**
     * 类型不匹配
     * EN: Type mismatch
     */
    static typeMismatch(wire: string, target: string, path: string): DecodeError {
        return new DecodeError(ErrorCode.TypeMismatch, `cannot decode BSON ${wire} into ${target}`, path);
    }

    /**
     * 无效的十六进制标识符
     * EN: Invalid hex identifier
     */
    static invalidHex(text: string, path: string): DecodeError {
        return new DecodeError(ErrorCode.BadValue, `invalid ObjectId hex ${JSON.stringify(text)}`, path);
    }

    /**
     * 数值转换会丢失精度或溢出
     * EN: Numeric conversion would overflow or lose precision
     */
    static lossyNumber(value: string, target: string, path: string): DecodeError {
        return new DecodeError(ErrorCode.Overflow, `value ${value} cannot be represented as ${target}`, path);
    }

    /**
     * 无效 UTF-8
     * EN: Invalid UTF-8
     */
    static invalidUtf8(offset: number): DecodeError {
        return new DecodeError(ErrorCode.InvalidBSON, `invalid UTF-8 string at offset ${offset}`);
    }

    /**
     * 目标既不是通用容器也没有结构描述
     * EN: The destination is neither a generic container nor comes with a schema
     */
    static invalidDestination(description: string): DecodeError {
        return new DecodeError(
            ErrorCode.BadValue,
            `cannot decode into ${description}: destination must be an M, D, Map, array or plain object, or come with a schema`
        );
    }

    static tooDeep(maxDepth: number): DecodeError {
        return new DecodeError(ErrorCode.Overflow, `exceeded depth limit of ${maxDepth}`);
    }

    /**
     * 文档过大
     * EN: Document too large
     */
    static documentTooLarge(size: number, maxSize: number): DecodeError {
        return new DecodeError(
            ErrorCode.BSONObjectTooLarge,
            `document is too large: ${size} bytes, max size is ${maxSize} bytes`
        );
    }
}

/**
 * 将任意错误转换为 CodecError
 * EN: Convert any error to CodecError
 */
export function asCodecError(err: unknown): CodecError {
    if (err instanceof CodecError) {
        return err;
    }
    if (err instanceof Error) {
        return CodecError.internalError(err.message);
    }
    return CodecError.internalError(String(err));
}
