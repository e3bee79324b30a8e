/**
 * 编解码器限制和约束（与 MongoDB 对齐）
 * EN: Codec limits and constraints (aligned with MongoDB)
 */

/** 最大文档大小 16MB EN: Max document size 16MB */
export const MAX_DOCUMENT_SIZE = 16 * 1024 * 1024;
/** 最大 BSON 嵌套深度 EN: Max BSON nesting depth */
export const MAX_BSON_DEPTH = 100;

/** 最小文档大小：int32 长度 + 结束符 EN: Min document size: int32 length + terminator */
export const MIN_DOCUMENT_SIZE = 5;
/** ObjectId 字节数 EN: ObjectId byte length */
export const OBJECT_ID_LENGTH = 12;
/** ObjectId 十六进制长度 EN: ObjectId hex length */
export const OBJECT_ID_HEX_LENGTH = 24;

/** int32 范围 EN: int32 range */
export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;

/** int64 范围 EN: int64 range */
export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/**
 * 验证深度限制
 * EN: Validate a depth limit
 */
export function validateMaxDepth(depth: number): { valid: boolean; error?: string } {
    if (!Number.isInteger(depth) || depth < 1) {
        return { valid: false, error: `max depth must be a positive integer, got ${depth}` };
    }
    if (depth > MAX_BSON_DEPTH) {
        return { valid: false, error: `max depth too large: ${depth} > ${MAX_BSON_DEPTH}` };
    }
    return { valid: true };
}

/**
 * 验证文档大小限制
 * EN: Validate a document size limit
 */
export function validateMaxDocumentSize(size: number): { valid: boolean; error?: string } {
    if (!Number.isInteger(size) || size < MIN_DOCUMENT_SIZE) {
        return { valid: false, error: `max document size must be an integer >= ${MIN_DOCUMENT_SIZE}, got ${size}` };
    }
    if (size > MAX_DOCUMENT_SIZE) {
        return { valid: false, error: `max document size too large: ${size} > ${MAX_DOCUMENT_SIZE}` };
    }
    return { valid: true };
}
