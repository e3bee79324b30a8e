import { afterEach, describe, it, expect } from 'vitest';
import {
    DEFAULT_CODEC_OPTIONS,
    ENV_LOG_LEVEL,
    ENV_MAX_DEPTH,
    ENV_VALIDATE_UTF8,
    configureFromEnv,
    loadConfigFromEnv,
    resolveCodecOptions,
} from '../config';
import { CodecError } from '../codecError';
import { LogLevel, Logger } from '../logger';
import { Family } from '../../bson/types';
import { Codec } from '../../codec/codec';

describe('resolveCodecOptions', () => {
    it('fills in defaults', () => {
        expect(resolveCodecOptions()).toEqual({
            family: Family.Legacy,
            validateUtf8: true,
            maxDepth: 100,
            maxDocumentSize: 16 * 1024 * 1024,
        });
        expect(resolveCodecOptions({ family: Family.Current }).family).toBe(Family.Current);
    });

    it('does not modify the defaults', () => {
        resolveCodecOptions({ maxDepth: 5 });
        expect(DEFAULT_CODEC_OPTIONS.maxDepth).toBe(100);
    });

    it('rejects out-of-range limits', () => {
        expect(() => resolveCodecOptions({ maxDepth: 0 })).toThrow('max depth must be a positive integer, got 0');
        expect(() => resolveCodecOptions({ maxDepth: 101 })).toThrow('max depth too large: 101 > 100');
        expect(() => resolveCodecOptions({ maxDocumentSize: 4 })).toThrow(CodecError);
    });
});

describe('loadConfigFromEnv', () => {
    it('returns nothing for an empty environment', () => {
        expect(loadConfigFromEnv({})).toEqual({ codec: {} });
    });

    it('reads every variable', () => {
        const config = loadConfigFromEnv({
            [ENV_LOG_LEVEL]: 'Debug',
            [ENV_MAX_DEPTH]: '12',
            [ENV_VALIDATE_UTF8]: 'false',
        });
        expect(config).toEqual({ logLevel: LogLevel.Debug, codec: { maxDepth: 12, validateUtf8: false } });
    });

    it('rejects malformed values', () => {
        expect(() => loadConfigFromEnv({ [ENV_LOG_LEVEL]: 'loud' })).toThrow(
            "BSON_COMPAT_LOG_LEVEL: unknown log level 'loud'"
        );
        expect(() => loadConfigFromEnv({ [ENV_MAX_DEPTH]: 'deep' })).toThrow(CodecError);
        expect(() => loadConfigFromEnv({ [ENV_VALIDATE_UTF8]: 'maybe' })).toThrow(
            "BSON_COMPAT_VALIDATE_UTF8: expected true/false, got 'maybe'"
        );
    });
});

describe('configureFromEnv', () => {
    const originalLevel = Logger.getLevel();

    afterEach(() => {
        Logger.setLevel(originalLevel);
    });

    it('sets the log level and returns codec options', () => {
        expect(configureFromEnv({ [ENV_LOG_LEVEL]: 'error', [ENV_VALIDATE_UTF8]: '1' })).toEqual({ validateUtf8: true });
        expect(Logger.getLevel()).toBe(LogLevel.Error);
    });

    it('builds a codec from the environment', () => {
        const codec = Codec.fromEnv({ [ENV_MAX_DEPTH]: '3' }, { family: Family.Current });
        expect(codec.options).toEqual({
            family: Family.Current,
            validateUtf8: true,
            maxDepth: 3,
            maxDocumentSize: 16 * 1024 * 1024,
        });
    });
});
