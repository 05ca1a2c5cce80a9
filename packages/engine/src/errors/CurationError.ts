/**
 * @fileoverview Curation Errors
 *
 * Base error class and error codes for the curation engine. Every error
 * carries a code, the operation it came from and a structured context, so
 * batch summaries and logs can report failures without string parsing.
 *
 * Propagation policy:
 * - Per-document errors (read, decode, stage) are local to the document
 * - Rule-table and configuration errors are fatal at startup
 *
 * @module @scriptorium/engine/errors/CurationError
 */

export enum ErrorCode {
    // Document errors (1xxx)
    DOCUMENT_READ_FAILED   = 1001,
    DOCUMENT_DECODE_FAILED = 1002,
    STAGE_FAILED           = 1003,
    SINK_FAILED            = 1004,

    // Rule table errors (2xxx)
    RULE_TABLE_MISSING         = 2001,
    RULE_TABLE_PARSE_FAILED    = 2002,
    RULE_TABLE_INVALID         = 2003,
    RULE_PATTERN_INVALID       = 2004,

    // Configuration errors (3xxx)
    CONFIG_INVALID = 3001,

    // Engine errors (4xxx)
    CORPUS_NOT_REGISTERED     = 4001,
    CORPUS_ALREADY_REGISTERED = 4002,
    PIPELINE_INVALID          = 4003,

    // General errors (9xxx)
    INTERNAL = 9998,
    UNKNOWN  = 9999,
}

export interface ErrorContext {
    operation: string;
    documentId?: string;
    filePath?: string;
    stageId?: string;
    timestamp?: string;
    [key: string]: unknown;
}

export interface SerializedError {
    name: string;
    code: ErrorCode;
    message: string;
    context: ErrorContext;
    cause?: string;
}

/**
 * Base error class for the curation engine.
 * All engine and domain errors extend this class.
 */
export class CurationError extends Error {
    public readonly code: ErrorCode;
    public readonly context: ErrorContext;
    public readonly timestamp: string;

    constructor(
        message: string,
        code: ErrorCode = ErrorCode.UNKNOWN,
        context: Partial<ErrorContext> = {},
        options?: { cause?: unknown }
    ) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = "CurationError";
        this.code = code;
        this.timestamp = new Date().toISOString();
        this.context = {
            ...context,
            operation: context.operation ?? "unknown",
            timestamp: this.timestamp,
        };

        Error.captureStackTrace?.(this, this.constructor);
    }

    /**
     * Serialize error for logging or the batch summary.
     */
    toJSON(): SerializedError {
        return {
            name   : this.name,
            code   : this.code,
            message: this.message,
            context: this.context,
            cause  : this.cause instanceof Error ? this.cause.message : undefined,
        };
    }

    /**
     * Single-line message for logs.
     */
    toLogMessage(): string {
        const parts = [
            `[${this.name}]`,
            `Code: ${this.code}`,
            `Op: ${this.context.operation}`,
            this.message,
        ];
        if (this.context.documentId) parts.push(`Doc: ${this.context.documentId}`);
        if (this.context.filePath) parts.push(`File: ${this.context.filePath}`);
        if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
        return parts.join(" | ");
    }
}

/**
 * Error reading or decoding a single document. Never fatal to a batch.
 */
export class DocumentReadError extends CurationError {
    constructor(
        message: string,
        code: ErrorCode.DOCUMENT_READ_FAILED | ErrorCode.DOCUMENT_DECODE_FAILED,
        context: Partial<ErrorContext> = {},
        options?: { cause?: unknown }
    ) {
        super(message, code, context, options);
        this.name = "DocumentReadError";
    }

    static unreadable(documentId: string, filePath: string, cause: unknown): DocumentReadError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new DocumentReadError(
            `Cannot read ${documentId}: ${reason}`,
            ErrorCode.DOCUMENT_READ_FAILED,
            { operation: "readDocument", documentId, filePath },
            { cause }
        );
    }

    static undecodable(documentId: string, filePath: string, encoding: string): DocumentReadError {
        return new DocumentReadError(
            `Cannot decode ${documentId} as ${encoding}`,
            ErrorCode.DOCUMENT_DECODE_FAILED,
            { operation: "decodeDocument", documentId, filePath, encoding }
        );
    }
}

/**
 * Malformed rule table. Fatal at startup.
 */
export class RuleTableError extends CurationError {
    public readonly table: string;

    constructor(
        message: string,
        code: ErrorCode,
        context: Partial<ErrorContext> & { table: string },
        options?: { cause?: unknown }
    ) {
        super(message, code, { operation: "loadRules", ...context }, options);
        this.name = "RuleTableError";
        this.table = context.table;
    }

    static missing(table: string, filePath: string): RuleTableError {
        return new RuleTableError(
            `Rule table not found: ${filePath}`,
            ErrorCode.RULE_TABLE_MISSING,
            { table, filePath }
        );
    }

    static unparseable(table: string, filePath: string, cause: unknown): RuleTableError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new RuleTableError(
            `Rule table ${table} is not valid YAML: ${reason}`,
            ErrorCode.RULE_TABLE_PARSE_FAILED,
            { table, filePath },
            { cause }
        );
    }

    static invalid(table: string, path: string, expected: string): RuleTableError {
        return new RuleTableError(
            `Invalid rule table ${table} at ${path}: expected ${expected}`,
            ErrorCode.RULE_TABLE_INVALID,
            { table, path }
        );
    }

    static badPattern(table: string, path: string, source: string, cause: unknown): RuleTableError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new RuleTableError(
            `Invalid pattern in ${table} at ${path}: /${source}/ (${reason})`,
            ErrorCode.RULE_PATTERN_INVALID,
            { table, path, source },
            { cause }
        );
    }
}

/**
 * Invalid configuration value. Fatal at startup.
 */
export class ConfigError extends CurationError {
    public readonly field: string;

    constructor(field: string, expected: string, value: unknown) {
        super(
            `Invalid configuration ${field}: expected ${expected}, got ${JSON.stringify(value)}`,
            ErrorCode.CONFIG_INVALID,
            { operation: "loadConfig", field, value }
        );
        this.name = "ConfigError";
        this.field = field;
    }
}

/**
 * Wrap an unknown thrown value in a CurationError, keeping it as the cause.
 */
export function wrapError(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {}
): CurationError {
    if (error instanceof CurationError) {
        return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new CurationError(message, code, context, { cause: error });
}

/**
 * Extract a log-friendly message from any thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
