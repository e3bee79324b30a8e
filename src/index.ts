/**
 * bson-compat - 在旧版与当前两种 BSON 类型族之间保持字节兼容的编解码器
 * EN: bson-compat - a BSON codec that stays byte-compatible across the legacy and current type families
 */

// BSON 层
// EN: BSON layer
export * from './bson';

// 编解码器入口
// EN: Codec front-ends
export * from './codec';

// 核心层
// EN: Core layer
export {
    ErrorCode,
    getErrorCodeName,
    CodecError,
    EncodeError,
    DecodeError,
    asCodecError,
    MAX_DOCUMENT_SIZE,
    MAX_BSON_DEPTH,
    DEFAULT_CODEC_OPTIONS,
    resolveCodecOptions,
    loadConfigFromEnv,
    configureFromEnv,
    LogLevel,
    Logger,
    logger,
} from './core';
export type { CodecOptions, EnvConfig, ILogger } from './core';
