/**
 * @fileoverview Latin curation pipeline
 *
 * Builds the four-stage pipeline from loaded rule tables:
 *
 * structural-gate → period-genre-classifier → content-normalizer → orthography-standardizer
 *
 * The classifier runs before normalization so it still sees the header,
 * the title and the original line shape.
 *
 * @module latin-curator/domain/pipeline/createLatinPipeline
 */

import { CurationPipeline } from "@scriptorium/engine";
import type { LatinRules } from "../../config/loadRules.js";
import type { CorpusDocument } from "../entities/CorpusDocument.js";
import { createPatternLibrary } from "../patterns/PatternLibrary.js";
import { StructuralGate } from "../gate/StructuralGate.js";
import { PeriodGenreClassifier } from "../classification/PeriodGenreClassifier.js";
import { AbbreviationExpander } from "../normalization/AbbreviationExpander.js";
import { ContentNormalizer } from "../normalization/ContentNormalizer.js";
import type { GenderContextScorer } from "../normalization/GenderContext.js";
import { OrthographyStandardizer } from "../orthography/OrthographyStandardizer.js";

export const kLATIN_STAGE_IDS = [
    "structural-gate",
    "period-genre-classifier",
    "content-normalizer",
    "orthography-standardizer",
] as const;

export interface LatinPipelineOptions {
    readonly minDocumentBytes: number;
    readonly minResidualChars: number;

    /** Replaces the lexicon gender scorer used for praenomina */
    readonly genderScorer?: GenderContextScorer;
}

/**
 * @throws RuleTableError if a regex in the tables does not compile
 */
export function createLatinPipeline(rules: LatinRules, options: LatinPipelineOptions): CurationPipeline<CorpusDocument> {
    const patterns = createPatternLibrary(rules.patterns);
    const abbreviations = new AbbreviationExpander(rules.abbreviations, { genderScorer: options.genderScorer });

    return new CurationPipeline<CorpusDocument>([
        new StructuralGate(patterns, { minDocumentBytes: options.minDocumentBytes }),
        new PeriodGenreClassifier(rules.lexicons),
        new ContentNormalizer({ patterns, abbreviations, minResidualChars: options.minResidualChars }),
        new OrthographyStandardizer(rules.orthography),
    ]);
}
