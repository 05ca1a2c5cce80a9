/**
 * @fileoverview Logging barrel exports
 *
 * @module @scriptorium/engine/logging
 */

export {
    createConsoleLogger,
    createScopedLogger,
    isLogLevel,
    silentLogger,
    type EngineLogger,
    type LogLevel,
} from "./ConsoleLogger.js";
