/**
 * @fileoverview Curation Pipeline
 *
 * The per-document sequencer. A pipeline is a frozen, ordered list of
 * named stages with a single entry point: `process()`. Each stage receives
 * the previous stage's output; the first rejection stops the document.
 *
 * Reordering stages changes results, so the order is fixed at
 * construction and only visible through `stageIds`.
 *
 * @module @scriptorium/engine/pipeline/CurationPipeline
 */

import type { TextDocument } from "../contracts/Document.js";
import type { CurationStage, StageContext } from "../contracts/Stage.js";
import { CurationError, ErrorCode } from "../errors/CurationError.js";

/**
 * One entry in a document's stage trace.
 */
export interface StageTraceEntry {
    readonly stageId: string;
    readonly outcome: "continue" | "reject";
    readonly durationMs: number;
}

/**
 * Document made it through every stage.
 */
export interface PipelineAccepted<TDocument> {
    readonly status: "accepted";
    readonly document: TDocument;
    readonly trace: readonly StageTraceEntry[];
}

/**
 * A stage rejected the document; later stages never saw it.
 */
export interface PipelineRejected {
    readonly status: "rejected";
    readonly stageId: string;
    readonly reason: string;
    readonly detail: string;
    readonly evidence: readonly string[];
    readonly trace: readonly StageTraceEntry[];
}

export type PipelineResult<TDocument> = PipelineAccepted<TDocument> | PipelineRejected;

/**
 * Builds the context handed to one stage. The engine uses this to scope
 * loggers per stage.
 */
export type StageContextFactory = (stageId: string) => StageContext;

/**
 * CurationPipeline - ordered stage sequencer.
 *
 * @example
 * ```typescript
 * const pipeline = new CurationPipeline([gate, classifier, normalizer, standardizer]);
 *
 * const result = pipeline.process(document, () => context);
 * if (result.status === "rejected") {
 *     console.log(result.stageId, result.reason, result.evidence);
 * }
 * ```
 */
export class CurationPipeline<TDocument extends TextDocument<object> = TextDocument> {
    private readonly stages: readonly CurationStage<TDocument>[];

    /**
     * @param stages - Stages in execution order
     * @throws CurationError if the list is empty or stage ids repeat
     */
    constructor(stages: readonly CurationStage<TDocument>[]) {
        if (stages.length === 0) {
            throw new CurationError(
                "A pipeline needs at least one stage",
                ErrorCode.PIPELINE_INVALID,
                { operation: "createPipeline" }
            );
        }

        const seen = new Set<string>();
        for (const stage of stages) {
            if (seen.has(stage.id)) {
                throw new CurationError(
                    `Duplicate stage id: ${stage.id}`,
                    ErrorCode.PIPELINE_INVALID,
                    { operation: "createPipeline", stageId: stage.id }
                );
            }
            seen.add(stage.id);
        }

        this.stages = Object.freeze([...stages]);
    }

    /**
     * Stage ids in execution order.
     */
    get stageIds(): readonly string[] {
        return this.stages.map(stage => stage.id);
    }

    /**
     * Run a document through every stage in order.
     *
     * Exceptions thrown by a stage propagate; the engine turns them into
     * per-document errors.
     *
     * @param document - Input document
     * @param contextFor - Builds the context for each stage
     */
    process(document: TDocument, contextFor: StageContextFactory): PipelineResult<TDocument> {
        const trace: StageTraceEntry[] = [];
        let current = document;

        for (const stage of this.stages) {
            const startTime = Date.now();
            const outcome = stage.apply(current, contextFor(stage.id));
            const durationMs = Date.now() - startTime;

            trace.push({ stageId: stage.id, outcome: outcome.kind, durationMs });

            if (outcome.kind === "reject") {
                return {
                    status  : "rejected",
                    stageId : stage.id,
                    reason  : outcome.reason,
                    detail  : outcome.detail,
                    evidence: outcome.evidence,
                    trace,
                };
            }

            current = outcome.document;
        }

        return { status: "accepted", document: current, trace };
    }
}
