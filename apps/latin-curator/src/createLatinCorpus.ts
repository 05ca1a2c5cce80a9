/**
 * @fileoverview Latin corpus registration
 *
 * Wires the directory provider, the four-stage pipeline and the sinks
 * into one CorpusRegistration for the engine.
 *
 * @module latin-curator/createLatinCorpus
 */

import type { CorpusRegistration, DocumentSink } from "@scriptorium/engine";
import type { CuratorConfig } from "./config/loadConfig.js";
import type { LatinRules } from "./config/loadRules.js";
import type { ClassificationLedger } from "./adapters/ledger/classification-ledger.js";
import {
    ClassificationLedgerSink,
    CorpusWriterSink,
    DirectoryDocumentProvider,
    createLatinPipeline,
    routeLabel,
    type CorpusDocument,
} from "./domain/index.js";

export const LATIN_CORPUS_ID = "latin";

type CorpusSettings = Pick<
    CuratorConfig,
    "inputDir" | "outputDir" | "minDocumentBytes" | "minResidualChars" | "batchSize" | "dryRun"
>;

/**
 * Create the Latin corpus registration.
 *
 * @param config - Curator configuration
 * @param rules - Loaded rule tables
 * @param ledger - Open classification ledger; outcomes are not recorded without one
 * @throws RuleTableError if a regex in the tables does not compile
 */
export function createLatinCorpus(
    config: CorpusSettings,
    rules: LatinRules,
    ledger?: ClassificationLedger
): CorpusRegistration<CorpusDocument> {
    const sinks: DocumentSink<CorpusDocument>[] = [
        new CorpusWriterSink({ outputDir: config.outputDir, dryRun: config.dryRun }),
    ];

    if (ledger) {
        sinks.push(new ClassificationLedgerSink(ledger));
    }

    return {
        id      : LATIN_CORPUS_ID,
        name    : "Latin texts",
        provider: new DirectoryDocumentProvider({ directory: config.inputDir, defaultLimit: config.batchSize }),
        pipeline: createLatinPipeline(rules, {
            minDocumentBytes: config.minDocumentBytes,
            minResidualChars: config.minResidualChars,
        }),
        sinks,
        labelOf(document) {
            return routeLabel(document);
        },
        config: {
            dryRun: config.dryRun,
        },
    };
}
