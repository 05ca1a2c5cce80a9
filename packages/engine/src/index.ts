/**
 * @fileoverview Curation Engine
 *
 * Domain-agnostic document curation engine.
 *
 * The engine provides:
 * - Ordered, named stage pipelines with a single entry point
 * - Pull-based document paging from providers
 * - Bounded worker-pool batch runs with per-document fault isolation
 * - Sink execution based on declarative outcome bindings
 * - Fail-fast YAML rule-table loading
 *
 * @module @scriptorium/engine
 * @example
 * ```typescript
 * import {
 *     type TextDocument,
 *     type CurationStage,
 *     type DocumentSink,
 *     type DocumentProvider,
 *     CurationPipeline,
 *     CurationEngine,
 * } from "@scriptorium/engine";
 *
 * // Define domain documents, stages, providers, and sinks
 * // Register a corpus with the engine
 * // Engine runs the batch
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    TextDocument,
    DocumentFactory,
    CurationStage,
    StageContext,
    StageLogger,
    StageOutcome,
    StageContinue,
    StageReject,
    TextPass,
    PassObserver,
    DocumentSink,
    OutcomeKind,
    SinkBinding,
    SinkContext,
    SinkResult,
    DocumentProvider,
    FetchOptions,
    FetchResult,
    ReadFailure,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    CorpusEventType,
    DocumentEventType,
    Subscription,
} from "./contracts/index.js";
export {
    withContent,
    withMetadata,
    withTraceId,
    continueWith,
    rejectWith,
    createTextPass,
    runPasses,
    shouldSinkExecute,
    createEvent,
} from "./contracts/index.js";

// ============================================================================
// Errors and logging
// ============================================================================

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
} from "./errors/index.js";
export {
    createConsoleLogger,
    createScopedLogger,
    isLogLevel,
    silentLogger,
    type EngineLogger,
    type LogLevel,
} from "./logging/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";

// ============================================================================
// Pipeline, engine and rule tables
// ============================================================================

export {
    CurationPipeline,
    type PipelineResult,
    type PipelineAccepted,
    type PipelineRejected,
    type StageTraceEntry,
    type StageContextFactory,
} from "./pipeline/index.js";
export {
    CurationEngine,
    generateTraceId,
    summarize,
    runWithConcurrency,
    type CorpusRegistration,
    type EngineConfig,
    type BatchSummary,
    type RejectionRecord,
    type ErrorRecord,
    type DocumentOutcome,
    type WorkerPoolOptions,
} from "./engine/index.js";
export {
    RuleTableLoader,
    type RuleTableLoaderConfig,
    isRecord,
    expectRecord,
    expectArray,
    expectString,
    expectStringAllowEmpty,
    expectStringList,
    expectStringMap,
    expectNumber,
    optionalBoolean,
    field,
    compilePattern,
    escapeRegExp,
} from "./rules/index.js";
