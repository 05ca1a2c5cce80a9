/**
 * @fileoverview Corpus document
 *
 * The document type that flows through the Latin pipeline. Stages never
 * mutate it; each returns a new frozen document.
 *
 * @module latin-curator/domain/entities/CorpusDocument
 */

import { CurationError, ErrorCode, type TextDocument } from "@scriptorium/engine";
import type { HeaderMetadata } from "../patterns/header.js";
import type { ClassificationReport, ClassificationResult } from "../classification/types.js";

export interface CorpusMetadata {
    /** Where the document was read from */
    readonly sourcePath: string;

    /** Declared header, attached by the classifier */
    readonly header?: HeaderMetadata;

    readonly classification?: ClassificationResult;

    /** Signals behind the classification */
    readonly report?: ClassificationReport;
}

export type CorpusDocument = TextDocument<CorpusMetadata>;

export interface CorpusDocumentInit {
    readonly id: string;
    readonly content: string;
    readonly byteSize: number;
    readonly sourcePath: string;
}

export function createCorpusDocument(init: CorpusDocumentInit): CorpusDocument {
    return Object.freeze({
        id      : init.id,
        content : init.content,
        byteSize: init.byteSize,
        metadata: Object.freeze({ sourcePath: init.sourcePath }),
    });
}

/**
 * Route label of a classified document, e.g. "classical/prose".
 *
 * @throws CurationError if the document was never classified
 */
export function routeLabel(document: CorpusDocument): string {
    const classification = document.metadata.classification;

    if (!classification) {
        throw new CurationError(
            `Document ${document.id} has no classification`,
            ErrorCode.INTERNAL,
            { operation: "routeLabel", documentId: document.id }
        );
    }

    return `${classification.period}/${classification.genre}`;
}
