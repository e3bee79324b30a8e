/**
 * 日志级别
 * EN: Log levels
 */
export enum LogLevel {
    /** 调试 EN: Debug */
    Debug = 0,
    /** 信息 EN: Info */
    Info = 1,
    /** 警告 EN: Warn */
    Warn = 2,
    /** 错误 EN: Error */
    Error = 3,
    /** 静默 EN: Silent */
    Silent = 4,
}

/**
 * 日志条目结构
 * EN: Log entry structure
 */
export interface LogEntry {
    /** 时间戳 EN: Timestamp */
    timestamp: Date;
    /** 日志级别 EN: Log level */
    level: LogLevel;
    /** 消息 EN: Message */
    message: string;
    /** 上下文 EN: Context */
    context?: Record<string, unknown>;
}

/**
 * 日志器接口
 * EN: Logger interface
 */
export interface ILogger {
    debug(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;
}

/**
 * 解析日志级别名称（不区分大小写）
 * EN: Parse a log level name (case-insensitive)
 */
export function parseLogLevel(text: string): LogLevel | undefined {
    switch (text.trim().toLowerCase()) {
        case 'debug':
            return LogLevel.Debug;
        case 'info':
            return LogLevel.Info;
        case 'warn':
        case 'warning':
            return LogLevel.Warn;
        case 'error':
            return LogLevel.Error;
        case 'silent':
        case 'off':
            return LogLevel.Silent;
        default:
            return undefined;
    }
}

/**
 * 默认日志器实现
 * EN: Default logger implementation
 */
class LoggerImpl implements ILogger {
    /** 最小日志级别（子日志器共享） EN: Minimum log level (shared with children) */
    private readonly levelRef: { level: LogLevel };
    /** 日志器名称 EN: Logger name */
    private readonly name: string;

    constructor(name: string = 'bson-compat', levelRef: { level: LogLevel } = { level: LogLevel.Warn }) {
        this.name = name;
        this.levelRef = levelRef;
    }

    /**
     * 输出日志
     * EN: Output log
     */
    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        // 低于最小级别则不输出
        // EN: Skip if below minimum level
        if (level < this.levelRef.level) {
            return;
        }

        const entry: LogEntry = {
            timestamp: new Date(),
            level,
            message,
            context,
        };

        const levelStr = LogLevel[level].toUpperCase();
        const timestamp = entry.timestamp.toISOString();
        const contextStr = context ? ` ${JSON.stringify(context, jsonReplacer)}` : '';

        const output = `[${timestamp}] ${levelStr} [${this.name}] ${message}${contextStr}`;

        switch (level) {
            case LogLevel.Debug:
                console.debug(output);
                break;
            case LogLevel.Info:
                console.info(output);
                break;
            case LogLevel.Warn:
                console.warn(output);
                break;
            case LogLevel.Error:
                console.error(output);
                break;
        }
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log(LogLevel.Debug, message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log(LogLevel.Info, message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log(LogLevel.Warn, message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log(LogLevel.Error, message, context);
    }

    /**
     * 创建子日志器（共享级别）
     * EN: Create a child logger (shares the level)
     */
    child(name: string): LoggerImpl {
        return new LoggerImpl(`${this.name}.${name}`, this.levelRef);
    }

    /**
     * 设置最小日志级别
     * EN: Set minimum log level
     */
    setLevel(level: LogLevel): void {
        this.levelRef.level = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.level;
    }
}

// bigint 无法被 JSON.stringify 序列化
// EN: JSON.stringify cannot serialize bigint
function jsonReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * 全局日志器实例
 * EN: Global logger instance
 */
export const logger = new LoggerImpl();

/**
 * 静态日志器门面（便于使用）
 * EN: Static logger facade (for convenience)
 */
export const Logger = {
    debug: (message: string, context?: Record<string, unknown>) => logger.debug(message, context),
    info: (message: string, context?: Record<string, unknown>) => logger.info(message, context),
    warn: (message: string, context?: Record<string, unknown>) => logger.warn(message, context),
    error: (message: string, context?: Record<string, unknown>) => logger.error(message, context),
    child: (name: string) => logger.child(name),
    setLevel: (level: LogLevel) => logger.setLevel(level),
    getLevel: () => logger.getLevel(),
};
