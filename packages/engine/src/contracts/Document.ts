/**
 * Document Contract
 *
 * The base shape of anything that flows through a curation pipeline.
 * Domain implementations extend this with domain-specific metadata.
 *
 * Documents are immutable within the pipeline. A stage never edits the
 * document it receives; it returns a new document with the text replaced
 * or metadata attached.
 */

/**
 * Base document that all domain documents must satisfy.
 *
 * @typeParam TMetadata - Domain-specific metadata type
 *
 * @example
 * ```typescript
 * interface ManuscriptMetadata {
 *     shelfmark: string;
 *     folio?: string;
 * }
 *
 * type Manuscript = TextDocument<ManuscriptMetadata>;
 * ```
 */
export interface TextDocument<TMetadata extends object = Record<string, unknown>> {
    /** Unique identifier for this document (the source filename) */
    readonly id: string;

    /** Text content, raw when read and replaced by text-rewriting stages */
    readonly content: string;

    /** Size of the raw source in bytes, as read from storage */
    readonly byteSize: number;

    /** Domain-specific metadata */
    readonly metadata: TMetadata;

    /** Trace ID assigned by engine for observability */
    readonly traceId?: string;
}

/**
 * Factory function type for creating documents.
 * Domain implementations provide their own factory.
 */
export type DocumentFactory<T extends TextDocument<object> = TextDocument> = (
    data: Omit<T, "traceId">
) => T;

/**
 * Return a frozen copy of a document with its content replaced.
 *
 * @param document - Source document (left untouched)
 * @param content - Replacement text
 */
export function withContent<T extends TextDocument<object>>(document: T, content: string): T {
    return Object.freeze({ ...document, content });
}

/**
 * Return a frozen copy of a document with metadata fields merged in.
 *
 * @param document - Source document (left untouched)
 * @param patch - Metadata fields to set
 */
export function withMetadata<T extends TextDocument<object>>(
    document: T,
    patch: Partial<T["metadata"]>
): T {
    return Object.freeze({
        ...document,
        metadata: Object.freeze({ ...document.metadata, ...patch }),
    });
}

/**
 * Return a frozen copy of a document stamped with a trace ID.
 */
export function withTraceId<T extends TextDocument<object>>(document: T, traceId: string): T {
    return Object.freeze({ ...document, traceId });
}
