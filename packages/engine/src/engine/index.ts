/**
 * @fileoverview Engine barrel exports
 *
 * @module @scriptorium/engine/engine
 */

export {
    CurationEngine,
    generateTraceId,
    summarize,
    type CorpusRegistration,
    type EngineConfig,
    type BatchSummary,
    type RejectionRecord,
    type ErrorRecord,
    type DocumentOutcome,
} from "./CurationEngine.js";
export { runWithConcurrency, type WorkerPoolOptions } from "./workerPool.js";
