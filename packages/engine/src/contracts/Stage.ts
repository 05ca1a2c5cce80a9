/**
 * Curation Stage Contract
 *
 * A stage is one named step of a curation pipeline. It receives the
 * document produced by the previous stage and either hands a (possibly
 * rewritten) document on, or rejects it with evidence.
 *
 * Design principles:
 * - Pure: No side effects, no document mutation
 * - Deterministic: Same input produces same output
 * - Synchronous: No suspension points inside a document's pipeline
 */

import type { TextDocument } from "./Document.js";

/**
 * Logger interface for stages and sinks.
 */
export interface StageLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to stages during evaluation.
 */
export interface StageContext {
    /**
     * Read-only configuration for the corpus.
     * Domain-specific settings passed during registration.
     */
    readonly config: Readonly<Record<string, unknown>>;

    /**
     * Logger scoped to the stage.
     */
    readonly logger: StageLogger;

    /**
     * Trace ID of the document being processed.
     */
    readonly traceId: string;
}

/**
 * A stage let the document through, possibly rewritten.
 */
export interface StageContinue<TDocument> {
    readonly kind: "continue";
    readonly document: TDocument;
}

/**
 * A stage stopped the document. Rejection is an outcome, not an error.
 */
export interface StageReject {
    readonly kind: "reject";

    /** Machine-readable reason code (e.g. "too_small", "index") */
    readonly reason: string;

    /** Human-readable explanation */
    readonly detail: string;

    /** The specific matched evidence, for auditability */
    readonly evidence: readonly string[];
}

export type StageOutcome<TDocument> = StageContinue<TDocument> | StageReject;

/**
 * Curation stage interface.
 *
 * Rules:
 * - Must not mutate the document it receives
 * - Must not perform I/O
 * - Returns continue (with the next document) or reject
 *
 * @example
 * ```typescript
 * const emptyGate: CurationStage<TextDocument> = {
 *     id: "empty-gate",
 *     apply(document) {
 *         return document.content.trim()
 *             ? continueWith(document)
 *             : rejectWith("empty", "document has no text");
 *     },
 * };
 * ```
 */
export interface CurationStage<TDocument extends TextDocument<object> = TextDocument> {
    /**
     * Unique identifier for this stage within a pipeline.
     * Used for tracing, rejection records and events.
     */
    readonly id: string;

    /**
     * Optional human-readable name.
     */
    readonly name?: string;

    /**
     * Optional description of what this stage does.
     */
    readonly description?: string;

    /**
     * Evaluate a document.
     *
     * @param document - Output of the previous stage (read-only)
     * @param context - Evaluation context (config, logger, traceId)
     */
    apply(document: TDocument, context: StageContext): StageOutcome<TDocument>;
}

/**
 * Build a "continue" outcome.
 */
export function continueWith<TDocument>(document: TDocument): StageContinue<TDocument> {
    return Object.freeze({ kind: "continue", document });
}

/**
 * Build a frozen "reject" outcome.
 */
export function rejectWith(
    reason: string,
    detail: string,
    evidence: readonly string[] = []
): StageReject {
    return Object.freeze({
        kind    : "reject",
        reason,
        detail,
        evidence: Object.freeze([...evidence]),
    });
}
