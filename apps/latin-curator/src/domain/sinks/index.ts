export { CorpusWriterSink, type CorpusWriterSinkConfig } from "./CorpusWriterSink.js";
export { ClassificationLedgerSink } from "./ClassificationLedgerSink.js";
