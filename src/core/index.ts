/**
 * Core 模块导出
 * EN: Core module exports
 */

export * from './errorCodes';
export * from './codecError';
export * from './limits';
export * from './logger';
export * from './config';
