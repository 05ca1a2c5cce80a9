/**
 * @fileoverview Structural Gate
 *
 * First pipeline stage. Rejects files that are too small to be a text,
 * and files whose line structure says they are a table of contents or
 * an index rather than running Latin.
 *
 * Line shapes are counted over the first 50 content lines (trimmed,
 * non-empty lines after the header). Each sampled line counts toward at
 * most one shape, checked in this order:
 *
 * | Shape     | Test                                                 |
 * |-----------|------------------------------------------------------|
 * | reference | chapter/book reference anywhere in the line          |
 * | numbered  | shorter than 80 chars, led by a number or numeral    |
 * | bullet    | starts with `*`, shorter than 100 chars              |
 * | page      | a bare number or `p. N`                              |
 *
 * @module latin-curator/domain/gate/StructuralGate
 */

import {
    continueWith,
    rejectWith,
    type CurationStage,
    type StageContext,
    type StageOutcome,
    type TextDocument,
} from "@scriptorium/engine";
import type { CorpusDocument } from "../entities/CorpusDocument.js";
import type { PatternLibrary } from "../patterns/PatternLibrary.js";
import { bodyLines } from "../patterns/header.js";
import { isRomanNumeral } from "../patterns/romanNumerals.js";

export type GateRejectReason = "too_small" | "index";

export type GateVerdict =
    | { readonly verdict: "retain" }
    | {
        readonly verdict: "reject";
        readonly reason: GateRejectReason;
        readonly detail: string;
        readonly evidence: readonly string[];
    };

export interface StructuralGateOptions {
    /** Files smaller than this many bytes are rejected outright */
    readonly minDocumentBytes: number;
}

/** Line-shape tallies over the sampled content lines */
export interface LineShapeCounts {
    readonly total: number;
    readonly sampled: number;
    readonly references: number;
    readonly numbered: number;
    readonly bullets: number;
    readonly pages: number;
    readonly evidence: readonly string[];
}

const kSAMPLE_LINES = 50;
const kPROSE_WINDOW = 30;
const kEVIDENCE_EXCERPT = 50;
const kMAX_EVIDENCE = 10;

const RETAIN: GateVerdict = Object.freeze({ verdict: "retain" });

export class StructuralGate implements CurationStage<CorpusDocument> {
    readonly id = "structural-gate";
    readonly name = "Structural Gate";
    readonly description = "Rejects undersized files and index/contents files";

    private readonly patterns: PatternLibrary;
    private readonly minDocumentBytes: number;

    constructor(patterns: PatternLibrary, options: StructuralGateOptions) {
        this.patterns = patterns;
        this.minDocumentBytes = options.minDocumentBytes;
    }

    apply(document: CorpusDocument, context: StageContext): StageOutcome<CorpusDocument> {
        const verdict = this.evaluate(document);

        if (verdict.verdict === "reject") {
            context.logger.debug("Gate rejected document", {
                documentId: document.id,
                reason    : verdict.reason,
                detail    : verdict.detail,
            });
            return rejectWith(verdict.reason, verdict.detail, verdict.evidence);
        }

        return continueWith(document);
    }

    /**
     * Decide whether a document is worth curating.
     *
     * Rules are checked in order; the first that fires decides.
     */
    evaluate(document: Pick<TextDocument<object>, "content" | "byteSize">): GateVerdict {
        if (document.byteSize < this.minDocumentBytes) {
            return {
                verdict : "reject",
                reason  : "too_small",
                detail  : `Document is ${document.byteSize} bytes; minimum is ${this.minDocumentBytes}`,
                evidence: [`${document.byteSize} bytes`],
            };
        }

        const lines = contentLines(document.content);
        if (lines.length === 0) {
            return RETAIN;
        }

        const counts = this.countShapes(lines);
        const { total, sampled, references, bullets, pages } = counts;

        if (references > 5 && references > sampled * 0.3) {
            return reject(
                `${references} of ${sampled} sampled lines are chapter references`,
                counts.evidence
            );
        }

        if (bullets > 10 && total < 100) {
            return reject(`${bullets} bullet lines in a ${total}-line document`, counts.evidence);
        }

        if (total < 30 && references + bullets + pages > total * 0.5) {
            return reject(
                `${references + bullets + pages} of ${total} lines are references, bullets or page numbers`,
                counts.evidence
            );
        }

        if (total < 50) {
            const window = lines.slice(0, Math.min(kPROSE_WINDOW, total));
            const nonProse = window.filter(line => this.isNonProse(line));

            if (nonProse.length > window.length * 0.4) {
                return reject(
                    `${nonProse.length} of the first ${window.length} lines are not prose`,
                    nonProse.slice(0, kMAX_EVIDENCE).map(line => `Non-prose: ${excerpt(line)}`)
                );
            }
        }

        return RETAIN;
    }

    /**
     * Tally line shapes over the first 50 content lines.
     */
    countShapes(lines: readonly string[]): LineShapeCounts {
        const sample = lines.slice(0, kSAMPLE_LINES);
        const evidence: string[] = [];
        let references = 0;
        let numbered = 0;
        let bullets = 0;
        let pages = 0;

        const note = (entry: string): void => {
            if (evidence.length < kMAX_EVIDENCE) {
                evidence.push(entry);
            }
        };

        for (const line of sample) {
            if (this.patterns.chapterReference.test(line)) {
                references += 1;
                note(`Chapter reference: ${excerpt(line)}`);
            }
            else if (this.isNumberedEntry(line)) {
                numbered += 1;
                note(`Numbered section: ${excerpt(line)}`);
            }
            else if (this.patterns.bullet.test(line) && line.length < 100) {
                bullets += 1;
                note(`Bullet: ${excerpt(line)}`);
            }
            else if (this.patterns.pageReference.test(line)) {
                pages += 1;
                note(`Page number: ${excerpt(line)}`);
            }
        }

        return { total: lines.length, sampled: sample.length, references, numbered, bullets, pages, evidence };
    }

    private isNumberedEntry(line: string): boolean {
        if (line.length >= 80) {
            return false;
        }

        const match = this.patterns.numberedEntry.exec(line);
        if (!match) {
            return false;
        }

        const token = match[1];
        return /^[0-9]+$/.test(token) || isRomanNumeral(token);
    }

    /**
     * Short, wordless, unpunctuated and without a function word.
     */
    private isNonProse(line: string): boolean {
        return (
            line.length < 20 &&
            !this.patterns.letterRun.test(line) &&
            !this.patterns.sentenceFinal.test(line) &&
            !this.patterns.functionWord.test(line)
        );
    }
}

/**
 * Trimmed, non-empty lines after the header.
 */
export function contentLines(text: string): string[] {
    return bodyLines(text)
        .map(line => line.trim())
        .filter(line => line !== "");
}

function reject(detail: string, evidence: readonly string[]): GateVerdict {
    return { verdict: "reject", reason: "index", detail, evidence };
}

function excerpt(line: string): string {
    return line.slice(0, kEVIDENCE_EXCERPT);
}
