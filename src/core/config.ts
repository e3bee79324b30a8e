import { Family } from '../bson/types';
import { CodecError } from './codecError';
import { MAX_BSON_DEPTH, MAX_DOCUMENT_SIZE, validateMaxDepth, validateMaxDocumentSize } from './limits';
import { LogLevel, Logger, parseLogLevel } from './logger';

/**
 * 编解码器配置选项
 * EN: Codec configuration options
 */
export interface CodecOptions {
    /** 入口类型族（决定通用槽位的叶子类型） EN: Entry family (decides leaf types of generic slots) */
    family: Family;
    /** 解码时严格校验 UTF-8 EN: Strictly validate UTF-8 when decoding */
    validateUtf8: boolean;
    /** 最大嵌套深度 EN: Max nesting depth */
    maxDepth: number;
    /** 最大文档大小（字节） EN: Max document size (bytes) */
    maxDocumentSize: number;
}

/**
 * 默认配置
 * EN: Default options
 */
export const DEFAULT_CODEC_OPTIONS: Readonly<CodecOptions> = Object.freeze({
    family: Family.Legacy,
    validateUtf8: true,
    maxDepth: MAX_BSON_DEPTH,
    maxDocumentSize: MAX_DOCUMENT_SIZE,
});

/**
 * 合并并验证配置
 * EN: Merge and validate options
 */
export function resolveCodecOptions(options: Partial<CodecOptions> = {}): CodecOptions {
    const resolved: CodecOptions = { ...DEFAULT_CODEC_OPTIONS, ...options };

    if (resolved.family !== Family.Legacy && resolved.family !== Family.Current) {
        throw CodecError.badValue(`unknown family: ${String(resolved.family)}`);
    }

    const depth = validateMaxDepth(resolved.maxDepth);
    if (!depth.valid) {
        throw CodecError.badValue(depth.error ?? 'invalid max depth');
    }

    const size = validateMaxDocumentSize(resolved.maxDocumentSize);
    if (!size.valid) {
        throw CodecError.badValue(size.error ?? 'invalid max document size');
    }

    return resolved;
}

/**
 * 环境变量配置
 * EN: Environment configuration
 */
export interface EnvConfig {
    logLevel?: LogLevel;
    codec: Partial<CodecOptions>;
}

/** 环境变量名 EN: Environment variable names */
export const ENV_LOG_LEVEL = 'BSON_COMPAT_LOG_LEVEL';
export const ENV_MAX_DEPTH = 'BSON_COMPAT_MAX_DEPTH';
export const ENV_VALIDATE_UTF8 = 'BSON_COMPAT_VALIDATE_UTF8';

/**
 * 从环境变量读取配置
 * EN: Read configuration from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const config: EnvConfig = { codec: {} };

    const level = env[ENV_LOG_LEVEL];
    if (level !== undefined && level !== '') {
        const parsed = parseLogLevel(level);
        if (parsed === undefined) {
            throw CodecError.badValue(`${ENV_LOG_LEVEL}: unknown log level '${level}'`);
        }
        config.logLevel = parsed;
    }

    const depth = env[ENV_MAX_DEPTH];
    if (depth !== undefined && depth !== '') {
        const parsed = Number(depth);
        const check = validateMaxDepth(parsed);
        if (!check.valid) {
            throw CodecError.badValue(`${ENV_MAX_DEPTH}: ${check.error}`);
        }
        config.codec.maxDepth = parsed;
    }

    const utf8 = env[ENV_VALIDATE_UTF8];
    if (utf8 !== undefined && utf8 !== '') {
        const normalized = utf8.trim().toLowerCase();
        if (normalized === 'true' || normalized === '1') {
            config.codec.validateUtf8 = true;
        } else if (normalized === 'false' || normalized === '0') {
            config.codec.validateUtf8 = false;
        } else {
            throw CodecError.badValue(`${ENV_VALIDATE_UTF8}: expected true/false, got '${utf8}'`);
        }
    }

    return config;
}

/**
 * 应用环境配置：设置日志级别并返回编解码器选项
 * EN: Apply environment configuration: set the log level and return codec options
 */
export function configureFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CodecOptions> {
    const config = loadConfigFromEnv(env);
    if (config.logLevel !== undefined) {
        Logger.setLevel(config.logLevel);
    }
    return config.codec;
}
