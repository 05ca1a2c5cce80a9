/**
 * @fileoverview Error barrel exports
 *
 * @module @scriptorium/engine/errors
 */

export {
    ErrorCode,
    CurationError,
    DocumentReadError,
    RuleTableError,
    ConfigError,
    wrapError,
    errorMessage,
    type ErrorContext,
    type SerializedError,
} from "./CurationError.js";
