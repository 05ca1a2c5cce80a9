/**
 * Document Sink Contract
 *
 * Sinks execute side effects for pipeline outcomes: writing accepted
 * text, recording classification reports, logging rejections.
 * Sinks self-declare which outcomes they handle via bindings.
 *
 * Design principles:
 * - Idempotent: Safe to execute multiple times with same result
 * - Declarative: Sinks declare their bindings, engine decides when to run
 * - Focused: Sinks only execute, they do not transform documents
 */

import type { TextDocument } from "./Document.js";
import type { StageLogger } from "./Stage.js";
import type { PipelineResult } from "../pipeline/CurationPipeline.js";

/**
 * The pipeline outcomes a sink can bind to.
 */
export type OutcomeKind = "accepted" | "rejected";

/**
 * Binding configuration for a sink.
 */
export interface SinkBinding {
    /**
     * Restrict an "accepted" binding to these labels (e.g. "classical/prose").
     * Omitted means every label. Ignored for "rejected".
     */
    readonly labels?: readonly string[];
}

/**
 * Context provided to sinks during execution.
 */
export interface SinkContext<TDocument extends TextDocument<object> = TextDocument<object>> {
    /**
     * The document as read from the provider (read-only).
     */
    readonly source: TDocument;

    /**
     * The pipeline result that triggered this sink.
     */
    readonly result: PipelineResult<TDocument>;

    /**
     * Route label of an accepted document, if the corpus defines one.
     */
    readonly label?: string;

    /**
     * Read-only configuration for the corpus.
     */
    readonly config: Readonly<Record<string, unknown>>;

    /**
     * Logger scoped to the sink.
     */
    readonly logger: StageLogger;

    /**
     * Trace ID of the document.
     */
    readonly traceId: string;
}

/**
 * Result of executing a sink.
 */
export interface SinkResult {
    /**
     * Identifier of the sink that was executed.
     */
    readonly sinkId: string;

    /**
     * Whether the sink succeeded.
     */
    readonly success: boolean;

    /**
     * Error message if the sink failed.
     */
    readonly error?: string;

    /**
     * Optional output data from the sink.
     */
    readonly data?: Record<string, unknown>;
}

/**
 * Document sink interface.
 *
 * The engine executes a sink when:
 * 1. The bindings include the outcome kind ("accepted" or "rejected")
 * 2. For accepted documents, the label passes the binding's label filter
 *
 * @example
 * ```typescript
 * const rejectionLog: DocumentSink = {
 *     id: "rejection-log",
 *     bindings: { rejected: {} },
 *     async handle(context) {
 *         context.logger.info(`Rejected ${context.source.id}`);
 *         return { sinkId: this.id, success: true };
 *     }
 * };
 * ```
 */
export interface DocumentSink<TDocument extends TextDocument<object> = TextDocument<object>> {
    /**
     * Unique identifier for this sink.
     */
    readonly id: string;

    /**
     * Optional human-readable name.
     */
    readonly name?: string;

    /**
     * Optional description of what this sink does.
     */
    readonly description?: string;

    /**
     * Outcomes this sink handles.
     */
    readonly bindings: Partial<Record<OutcomeKind, SinkBinding>>;

    /**
     * Execute the sink. Must be idempotent.
     */
    handle(context: SinkContext<TDocument>): Promise<SinkResult>;
}

/**
 * Check if a sink should execute for a given pipeline outcome.
 *
 * @param sink - The document sink
 * @param outcome - "accepted" or "rejected"
 * @param label - Route label of an accepted document
 * @returns True if the sink should execute
 */
export function shouldSinkExecute(
    sink: Pick<DocumentSink<TextDocument<object>>, "bindings">,
    outcome: OutcomeKind,
    label?: string
): boolean {
    const binding = sink.bindings[outcome];

    if (!binding) {
        return false;
    }

    if (outcome === "rejected" || !binding.labels) {
        return true;
    }

    return label !== undefined && binding.labels.includes(label);
}
