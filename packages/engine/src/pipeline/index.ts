/**
 * @fileoverview Pipeline barrel exports
 *
 * @module @scriptorium/engine/pipeline
 */

export {
    CurationPipeline,
    type PipelineResult,
    type PipelineAccepted,
    type PipelineRejected,
    type StageTraceEntry,
    type StageContextFactory,
} from "./CurationPipeline.js";
