/**
 * @fileoverview Contract barrel exports
 *
 * All domain-agnostic interfaces and types that define
 * the curation engine contract.
 *
 * @module @scriptorium/engine/contracts
 */

// Document contract
export type { TextDocument, DocumentFactory } from "./Document.js";
export { withContent, withMetadata, withTraceId } from "./Document.js";

// Stage contract
export type {
    CurationStage,
    StageContext,
    StageLogger,
    StageOutcome,
    StageContinue,
    StageReject,
} from "./Stage.js";
export { continueWith, rejectWith } from "./Stage.js";

// Text pass contract
export type { TextPass, PassObserver } from "./TextPass.js";
export { createTextPass, runPasses } from "./TextPass.js";

// Sink contract
export type {
    DocumentSink,
    OutcomeKind,
    SinkBinding,
    SinkContext,
    SinkResult,
} from "./DocumentSink.js";
export { shouldSinkExecute } from "./DocumentSink.js";

// DocumentProvider contract
export type {
    DocumentProvider,
    FetchOptions,
    FetchResult,
    ReadFailure,
} from "./DocumentProvider.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    CorpusEventType,
    DocumentEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
