/**
 * @fileoverview Content Normalizer
 *
 * Third pipeline stage. Strips everything that is not the Latin text
 * itself (provenance banners, wiki markup, headings, editorial notes,
 * modern-language annotations) and expands abbreviations.
 *
 * A document with fewer than `minResidualChars` characters left is
 * rejected as `empty_after_normalization`.
 *
 * @module latin-curator/domain/normalization/ContentNormalizer
 */

import {
    continueWith,
    rejectWith,
    runPasses,
    withContent,
    type CurationStage,
    type PassObserver,
    type StageContext,
    type StageOutcome,
    type TextPass,
} from "@scriptorium/engine";
import type { CorpusDocument } from "../entities/CorpusDocument.js";
import type { PatternLibrary } from "../patterns/PatternLibrary.js";
import type { AbbreviationExpander } from "./AbbreviationExpander.js";
import { createNormalizationPasses } from "./passes.js";

export interface ContentNormalizerOptions {
    readonly patterns: PatternLibrary;
    readonly abbreviations: AbbreviationExpander;

    /** Minimum characters that must survive normalization */
    readonly minResidualChars: number;
}

export class ContentNormalizer implements CurationStage<CorpusDocument> {
    readonly id = "content-normalizer";
    readonly name = "Content Normalizer";
    readonly description = "Removes non-text material and expands abbreviations";

    readonly passes: readonly TextPass[];
    private readonly minResidualChars: number;

    constructor(options: ContentNormalizerOptions) {
        this.passes = createNormalizationPasses(options.patterns, options.abbreviations);
        this.minResidualChars = options.minResidualChars;
    }

    apply(document: CorpusDocument, context: StageContext): StageOutcome<CorpusDocument> {
        const normalized = this.normalize(document.content, (pass, before, after) => {
            if (before !== after) {
                context.logger.debug("Normalization pass changed text", {
                    documentId: document.id,
                    pass,
                    delta     : after.length - before.length,
                });
            }
        });

        if (normalized.length < this.minResidualChars) {
            return rejectWith(
                "empty_after_normalization",
                `${normalized.length} characters remain after normalization; minimum is ${this.minResidualChars}`,
                [`${document.content.length} → ${normalized.length} characters`]
            );
        }

        return continueWith(withContent(document, normalized));
    }

    /**
     * Run every pass over `text`.
     */
    normalize(text: string, observe?: PassObserver): string {
        return runPasses(this.passes, text, observe);
    }
}
