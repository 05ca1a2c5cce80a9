/**
 * @fileoverview CurationEngine
 *
 * The batch orchestration engine.
 *
 * Batch flow:
 * 1. Provider pages documents in (read failures are reported, not thrown)
 * 2. Each page is processed by a bounded worker pool
 * 3. Each document runs through the corpus pipeline (stages in fixed order)
 * 4. Sinks with matching bindings execute for the outcome
 * 5. A BatchSummary of accepted/rejected/errored documents is returned
 *
 * Design principles:
 * - Domain-agnostic: knows nothing about Latin, periods or genres
 * - Plugin-based: stages and sinks are plugins
 * - Observable: emits events at each lifecycle step
 * - Fault-isolated: one bad document never aborts the batch
 *
 * @module @scriptorium/engine/engine/CurationEngine
 */

import type { TextDocument } from "../contracts/Document.js";
import { withTraceId } from "../contracts/Document.js";
import type { DocumentProvider, ReadFailure } from "../contracts/DocumentProvider.js";
import type { DocumentSink, SinkContext, SinkResult } from "../contracts/DocumentSink.js";
import { shouldSinkExecute } from "../contracts/DocumentSink.js";
import type { StageContext } from "../contracts/Stage.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { CurationPipeline, PipelineResult } from "../pipeline/CurationPipeline.js";
import { createConsoleLogger, createScopedLogger, type EngineLogger } from "../logging/ConsoleLogger.js";
import { CurationError, ErrorCode, errorMessage } from "../errors/CurationError.js";
import { runWithConcurrency } from "./workerPool.js";

/**
 * Corpus registration - all components needed to curate one corpus.
 */
export interface CorpusRegistration<TDocument extends TextDocument<object> = TextDocument> {
    /** Unique identifier for this corpus */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Document provider for this corpus */
    readonly provider: DocumentProvider<TDocument>;

    /** Ordered stage pipeline */
    readonly pipeline: CurationPipeline<TDocument>;

    /** Sinks executed for pipeline outcomes */
    readonly sinks: readonly DocumentSink<TDocument>[];

    /** Route label of an accepted document (e.g. "classical/prose") */
    labelOf?(document: TDocument): string;

    /** Optional corpus-specific configuration handed to stages and sinks */
    readonly config?: Record<string, unknown>;
}

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Maximum documents fetched per provider page (default: 100) */
    readonly batchSize?: number;

    /** Documents processed in parallel (default: 4) */
    readonly concurrency?: number;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;
}

/**
 * A rejected document and the evidence that triggered the rejection.
 */
export interface RejectionRecord {
    readonly documentId: string;
    readonly stageId: string;
    readonly reason: string;
    readonly detail: string;
    readonly evidence: readonly string[];
}

/**
 * A document that could not be processed.
 */
export interface ErrorRecord {
    readonly documentId: string;
    readonly message: string;
    readonly code?: ErrorCode;
}

/**
 * Outcome counts and records of one batch run.
 */
export interface BatchSummary {
    readonly corpusId: string;
    readonly total: number;
    readonly accepted: number;
    readonly rejected: number;
    readonly errored: number;
    readonly acceptedIds: readonly string[];
    readonly rejections: readonly RejectionRecord[];
    readonly errors: readonly ErrorRecord[];
    readonly durationMs: number;
}

/**
 * Outcome of a single document.
 */
export type DocumentOutcome<TDocument> =
    | { readonly status: "accepted"; readonly documentId: string; readonly document: TDocument; readonly label?: string }
    | { readonly status: "rejected"; readonly documentId: string; readonly rejection: RejectionRecord }
    | { readonly status: "errored"; readonly documentId: string; readonly error: ErrorRecord };

/**
 * Generate a unique trace ID for document processing.
 */
export function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * CurationEngine - the batch orchestration engine.
 *
 * @example
 * ```typescript
 * const engine = new CurationEngine({ concurrency: 4 });
 *
 * engine.registerCorpus({
 *     id      : "latin",
 *     name    : "Latin Library",
 *     provider: new DirectoryDocumentProvider({ directory: "./raw" }),
 *     pipeline: createLatinPipeline(rules, config),
 *     sinks   : [writer, ledger],
 *     labelOf : (doc) => `${doc.metadata.classification?.period}/${doc.metadata.classification?.genre}`,
 * });
 *
 * engine.eventBus.subscribe("document:rejected", (event) => {
 *     console.log("Rejected:", event.data);
 * });
 *
 * const summary = await engine.run("latin");
 * ```
 */
export class CurationEngine {
    private readonly config: {
        batchSize: number;
        concurrency: number;
        logger: EngineLogger;
    };

    // Registrations are heterogeneous in their document type; each one is
    // only ever used with its own provider, pipeline and sinks.
    private readonly corpora: Map<string, CorpusRegistration<TextDocument<object>>> = new Map();

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig = {}) {
        const logger = config.logger ?? createConsoleLogger("[Engine]");

        this.eventBus = config.eventBus ?? new InMemoryEventBus(logger);

        this.config = {
            batchSize  : Math.max(1, config.batchSize ?? 100),
            concurrency: Math.max(1, config.concurrency ?? 4),
            logger,
        };
    }

    /**
     * Register a corpus with the engine.
     *
     * @param corpus - Corpus registration with provider, pipeline and sinks
     * @throws CurationError if a corpus with the same ID is already registered
     */
    registerCorpus<TDocument extends TextDocument<object>>(corpus: CorpusRegistration<TDocument>): void {
        if (this.corpora.has(corpus.id)) {
            throw new CurationError(
                `Corpus already registered: ${corpus.id}`,
                ErrorCode.CORPUS_ALREADY_REGISTERED,
                { operation: "registerCorpus", corpusId: corpus.id }
            );
        }

        this.corpora.set(corpus.id, corpus);
        this.config.logger.info("Corpus registered", {
            corpusId: corpus.id,
            name    : corpus.name,
            stages  : corpus.pipeline.stageIds,
            sinks   : corpus.sinks.map(sink => sink.id),
        });
        this.emit(createEvent("corpus:registered", { corpusId: corpus.id }));
    }

    /**
     * Curate every document the corpus provider yields.
     *
     * @param corpusId - Registered corpus to run
     * @returns Summary of accepted, rejected and errored documents
     * @throws CurationError if the corpus is unknown or the provider fails to initialize
     */
    async run(corpusId: string): Promise<BatchSummary> {
        const corpus = this.corpora.get(corpusId);
        if (!corpus) {
            throw new CurationError(
                `Corpus not registered: ${corpusId}`,
                ErrorCode.CORPUS_NOT_REGISTERED,
                { operation: "run", corpusId }
            );
        }

        const startTime = Date.now();
        const outcomes: DocumentOutcome<TextDocument<object>>[] = [];

        this.emit(createEvent("corpus:starting", { corpusId }));
        this.config.logger.info("Batch starting", { corpusId, concurrency: this.config.concurrency });

        if (corpus.provider.initialize) {
            await corpus.provider.initialize();
        }

        try {
            let cursor: string | undefined;
            let hasMore = true;

            while (hasMore) {
                const page = await corpus.provider.getDocuments({
                    limit: this.config.batchSize,
                    cursor,
                });

                for (const failure of page.failures ?? []) {
                    outcomes.push(this.recordReadFailure(corpus, failure));
                }

                await runWithConcurrency(
                    page.documents,
                    async (document) => {
                        outcomes.push(await this.processDocument(corpus, document));
                    },
                    {
                        concurrency: this.config.concurrency,
                        onError    : (document, error) => {
                            outcomes.push(this.recordError(corpus, document.id, error, generateTraceId()));
                        },
                    }
                );

                cursor = page.cursor;
                hasMore = page.hasMore && page.documents.length + (page.failures?.length ?? 0) > 0;
            }
        }
        catch (error) {
            this.config.logger.error("Batch aborted", { corpusId, error: errorMessage(error) });
            this.emit(createEvent("corpus:error", { corpusId, error: errorMessage(error) }));
            throw error;
        }
        finally {
            await this.shutdownProvider(corpus);
        }

        const summary = summarize(corpusId, outcomes, Date.now() - startTime);

        this.emit(createEvent("corpus:completed", {
            corpusId,
            total     : summary.total,
            accepted  : summary.accepted,
            rejected  : summary.rejected,
            errored   : summary.errored,
            durationMs: summary.durationMs,
        }));
        this.config.logger.info("Batch completed", {
            corpusId,
            total   : summary.total,
            accepted: summary.accepted,
            rejected: summary.rejected,
            errored : summary.errored,
        });

        return summary;
    }

    /**
     * Process a single document through the pipeline and its sinks.
     *
     * Never throws: pipeline exceptions become an "errored" outcome and
     * sink failures are logged without changing the outcome.
     */
    async processDocument<TDocument extends TextDocument<object>>(
        corpus: CorpusRegistration<TDocument>,
        input: TDocument
    ): Promise<DocumentOutcome<TDocument>> {
        const traceId = generateTraceId();
        const document = withTraceId(input, traceId);
        const config = corpus.config ?? {};

        this.emit(createEvent("document:received", {
            corpusId  : corpus.id,
            documentId: document.id,
            byteSize  : document.byteSize,
        }, traceId));

        let result: PipelineResult<TDocument>;
        try {
            result = corpus.pipeline.process(document, (stageId): StageContext => {
                this.emit(createEvent("document:stage", {
                    corpusId  : corpus.id,
                    documentId: document.id,
                    stageId,
                }, traceId));

                return {
                    config,
                    logger: createScopedLogger(this.config.logger, `${corpus.id}:${stageId}`, traceId),
                    traceId,
                };
            });
        }
        catch (error) {
            return this.recordError(corpus, document.id, error, traceId);
        }

        if (result.status === "rejected") {
            const rejection: RejectionRecord = {
                documentId: document.id,
                stageId   : result.stageId,
                reason    : result.reason,
                detail    : result.detail,
                evidence  : result.evidence,
            };

            this.emit(createEvent("document:rejected", { corpusId: corpus.id, ...rejection }, traceId));
            this.config.logger.debug("Document rejected", { corpusId: corpus.id, ...rejection, traceId });

            await this.executeSinks(corpus, document, result, undefined, traceId);
            return { status: "rejected", documentId: document.id, rejection };
        }

        let label: string | undefined;
        try {
            label = corpus.labelOf?.(result.document);
        }
        catch (error) {
            return this.recordError(corpus, document.id, error, traceId);
        }

        this.emit(createEvent("document:accepted", {
            corpusId  : corpus.id,
            documentId: document.id,
            label,
            stages    : result.trace.map(entry => entry.stageId),
        }, traceId));

        await this.executeSinks(corpus, document, result, label, traceId);
        return { status: "accepted", documentId: document.id, document: result.document, label };
    }

    /**
     * Execute sinks that match the outcome via their bindings.
     */
    private async executeSinks<TDocument extends TextDocument<object>>(
        corpus: CorpusRegistration<TDocument>,
        source: TDocument,
        result: PipelineResult<TDocument>,
        label: string | undefined,
        traceId: string
    ): Promise<void> {
        for (const sink of corpus.sinks) {
            if (!shouldSinkExecute(sink, result.status, label)) {
                continue;
            }

            try {
                const context: SinkContext<TDocument> = {
                    source,
                    result,
                    label,
                    config : corpus.config ?? {},
                    logger : createScopedLogger(this.config.logger, `${corpus.id}:${sink.id}`, traceId),
                    traceId,
                };

                const sinkResult: SinkResult = await sink.handle(context);

                this.emit(createEvent("document:sinkExecuted", {
                    corpusId  : corpus.id,
                    documentId: source.id,
                    sinkId    : sink.id,
                    success   : sinkResult.success,
                    error     : sinkResult.error,
                }, traceId));

                if (!sinkResult.success) {
                    this.config.logger.warn("Sink failed", {
                        corpusId  : corpus.id,
                        sinkId    : sink.id,
                        documentId: source.id,
                        error     : sinkResult.error,
                    });
                }
            }
            catch (error) {
                this.config.logger.error("Sink execution error", {
                    corpusId  : corpus.id,
                    sinkId    : sink.id,
                    documentId: source.id,
                    error     : errorMessage(error),
                });

                this.emit(createEvent("document:sinkError", {
                    corpusId  : corpus.id,
                    documentId: source.id,
                    sinkId    : sink.id,
                    error     : errorMessage(error),
                }, traceId));
            }
        }
    }

    /**
     * Turn a provider read failure into an errored outcome.
     */
    private recordReadFailure(
        corpus: CorpusRegistration<TextDocument<object>>,
        failure: ReadFailure
    ): DocumentOutcome<TextDocument<object>> {
        return this.recordError(corpus, failure.documentId, failure.error, generateTraceId());
    }

    /**
     * Log, emit and build an errored outcome.
     */
    private recordError<TDocument extends TextDocument<object>>(
        corpus: CorpusRegistration<TDocument>,
        documentId: string,
        error: unknown,
        traceId: string
    ): DocumentOutcome<TDocument> {
        const record: ErrorRecord = {
            documentId,
            message: errorMessage(error),
            code   : error instanceof CurationError ? error.code : undefined,
        };

        this.emit(createEvent("document:error", { corpusId: corpus.id, ...record }, traceId));
        this.config.logger.error("Document processing error", { corpusId: corpus.id, ...record, traceId });

        return { status: "errored", documentId, error: record };
    }

    /**
     * Shut the provider down; failures are logged only.
     */
    private async shutdownProvider(corpus: CorpusRegistration<TextDocument<object>>): Promise<void> {
        try {
            if (corpus.provider.shutdown) {
                await corpus.provider.shutdown();
            }
        }
        catch (error) {
            this.config.logger.error("Provider shutdown error", {
                corpusId: corpus.id,
                error   : errorMessage(error),
            });
        }
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}

/**
 * Fold per-document outcomes into a batch summary.
 */
export function summarize(
    corpusId: string,
    outcomes: readonly DocumentOutcome<unknown>[],
    durationMs: number
): BatchSummary {
    const acceptedIds: string[] = [];
    const rejections: RejectionRecord[] = [];
    const errors: ErrorRecord[] = [];

    for (const outcome of outcomes) {
        switch (outcome.status) {
            case "accepted":
                acceptedIds.push(outcome.documentId);
                break;
            case "rejected":
                rejections.push(outcome.rejection);
                break;
            case "errored":
                errors.push(outcome.error);
                break;
        }
    }

    return {
        corpusId,
        total   : outcomes.length,
        accepted: acceptedIds.length,
        rejected: rejections.length,
        errored : errors.length,
        acceptedIds,
        rejections,
        errors,
        durationMs,
    };
}
