/**
 * Shared test fixtures: the shipped rule tables and a silent stage context.
 */

import { fileURLToPath } from "url";
import { silentLogger, withMetadata, type StageContext } from "@scriptorium/engine";
import { loadRules, type LatinRules } from "../config/loadRules.js";
import { createCorpusDocument, type CorpusDocument } from "../domain/entities/CorpusDocument.js";
import type { ClassificationReport } from "../domain/classification/types.js";

export const RULES_DIR = fileURLToPath(new URL("../../rules", import.meta.url));

let rules: LatinRules | undefined;

/**
 * Rule tables from the rules/ directory, loaded once per test file.
 */
export function latinRules(): LatinRules {
    rules ??= loadRules(RULES_DIR, silentLogger);
    return rules;
}

export const testContext: StageContext = {
    config : {},
    logger : silentLogger,
    traceId: "tr_test",
};

export function corpusDocument(id: string, content: string, byteSize?: number): CorpusDocument {
    return createCorpusDocument({
        id,
        content,
        byteSize  : byteSize ?? Buffer.byteLength(content, "utf-8"),
        sourcePath: `/texts/${id}`,
    });
}

export const AENEIS_REPORT: ClassificationReport = {
    documentId      : "aeneis.txt",
    title           : "Aeneis",
    period          : "classical",
    genre           : "poetry",
    confidence      : "high",
    periodConfidence: "high",
    genreConfidence : "high",
    periodSource    : "category",
    genreSource     : "metadata",
    periodSignals   : [],
    genreSignals    : [],
};

/**
 * A classified, standardized document as it leaves the pipeline.
 */
export function createAcceptedDocument(content = "arma uirumque cano"): CorpusDocument {
    const { documentId, title, periodSignals, genreSignals, ...classification } = AENEIS_REPORT;
    return withMetadata(corpusDocument("aeneis.txt", content), { classification, report: AENEIS_REPORT });
}
