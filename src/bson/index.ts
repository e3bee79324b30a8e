/**
 * BSON 模块导出
 * EN: BSON module exports
 */

export * from './types';
export * from './objectId';
export * from './regex';
export * from './document';
export * from './valueKind';
export * from './coercion';
export * from './schema';
export { BSONEncoder, joinPath } from './encoder';
export type { EncoderOptions } from './encoder';
export { BSONReader } from './reader';
export type { ReaderOptions, WireElement, WireValue } from './reader';
export { BSONDecoder, isGenericContainer } from './decoder';
export type { DecoderOptions, GenericContainer } from './decoder';
export { compareValues, valuesEqual } from './compare';
