/**
 * Codec 模块导出
 * EN: Codec module exports
 */

export * from './codec';
