/**
 * @fileoverview Console Logger
 *
 * Leveled console logger shared by the engine, the rule loader and
 * domain code, plus helpers to scope a logger to a stage or sink.
 *
 * @module @scriptorium/engine/logging/ConsoleLogger
 */

/**
 * Logger interface for the engine.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const kLEVEL_ORDER: Record<LogLevel, number> = {
    debug : 0,
    info  : 1,
    warn  : 2,
    error : 3,
    silent: 4,
};

/**
 * Type guard for log level strings (e.g. from the environment).
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && Object.prototype.hasOwnProperty.call(kLEVEL_ORDER, value);
}

/**
 * Create a console logger.
 *
 * @param prefix - Tag printed before every message, e.g. "[RuleLoader]"
 * @param minLevel - Messages below this level are dropped
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("[Curator]", "debug");
 * logger.info("Loaded rules", { tables: 4 });
 * // [Curator] [INFO] Loaded rules { tables: 4 }
 * ```
 */
export function createConsoleLogger(prefix = "", minLevel: LogLevel = "info"): EngineLogger {
    const tag = prefix ? `${prefix} ` : "";
    const enabled = (level: LogLevel): boolean => kLEVEL_ORDER[level] >= kLEVEL_ORDER[minLevel];

    return {
        debug: (msg, data) => { if (enabled("debug")) console.debug(`${tag}[DEBUG] ${msg}`, data ?? ""); },
        info : (msg, data) => { if (enabled("info")) console.info(`${tag}[INFO] ${msg}`, data ?? ""); },
        warn : (msg, data) => { if (enabled("warn")) console.warn(`${tag}[WARN] ${msg}`, data ?? ""); },
        error: (msg, data) => { if (enabled("error")) console.error(`${tag}[ERROR] ${msg}`, data ?? ""); },
    };
}

/**
 * Logger that drops everything. Useful for tests.
 */
export const silentLogger: EngineLogger = createConsoleLogger("", "silent");

/**
 * Wrap a logger so every message is tagged with a scope and every data
 * object carries the trace ID.
 *
 * @param logger - Underlying logger
 * @param scope - Scope tag, e.g. "latin:structural-gate"
 * @param traceId - Trace ID of the document being processed
 */
export function createScopedLogger(logger: EngineLogger, scope: string, traceId: string): EngineLogger {
    return {
        debug: (msg, data) => logger.debug(`[${scope}] ${msg}`, { ...data, traceId }),
        info : (msg, data) => logger.info(`[${scope}] ${msg}`, { ...data, traceId }),
        warn : (msg, data) => logger.warn(`[${scope}] ${msg}`, { ...data, traceId }),
        error: (msg, data) => logger.error(`[${scope}] ${msg}`, { ...data, traceId }),
    };
}
