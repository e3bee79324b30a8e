/**
 * MongoDB 兼容的错误码（编解码器用到的子集）
 * EN: MongoDB-compatible error codes (the subset used by the codec)
 * 参考: https://github.com/mongodb/mongo/blob/master/src/mongo/base/error_codes.yml
 * EN: Reference: https://github.com/mongodb/mongo/blob/master/src/mongo/base/error_codes.yml
 */
export enum ErrorCode {
    /** 成功 EN: OK */
    OK = 0,
    /** 内部错误 EN: Internal error */
    InternalError = 1,
    /** 无效值 EN: Bad value */
    BadValue = 2,
    /** 不支持的格式 EN: Unsupported format */
    UnsupportedFormat = 12,
    /** 类型不匹配 EN: Type mismatch */
    TypeMismatch = 14,
    /** 溢出 EN: Overflow */
    Overflow = 15,
    /** 无效长度 EN: Invalid length */
    InvalidLength = 16,
    /** 无效BSON EN: Invalid BSON */
    InvalidBSON = 22,
    /** BSON 对象过大 EN: BSON object too large */
    BSONObjectTooLarge = 10334,
}

/**
 * 错误码名称映射
 * EN: Error code name mapping
 */
const errorCodeNames: Map<ErrorCode, string> = new Map([
    [ErrorCode.OK, 'OK'],
    [ErrorCode.InternalError, 'InternalError'],
    [ErrorCode.BadValue, 'BadValue'],
    [ErrorCode.UnsupportedFormat, 'UnsupportedFormat'],
    [ErrorCode.TypeMismatch, 'TypeMismatch'],
    [ErrorCode.Overflow, 'Overflow'],
    [ErrorCode.InvalidLength, 'InvalidLength'],
    [ErrorCode.InvalidBSON, 'InvalidBSON'],
    [ErrorCode.BSONObjectTooLarge, 'BSONObjectTooLarge'],
]);

/**
 * 获取错误码名称
 * EN: Get error code name
 */
export function getErrorCodeName(code: ErrorCode): string {
    return errorCodeNames.get(code) ?? 'UnknownError';
}
