/**
 * @fileoverview Period / Genre Classifier
 *
 * Second pipeline stage. Assigns every retained document a period
 * (classical, post_classical) and a genre (poetry, prose, mixed) with a
 * confidence tier, from the declared header, the title and the opening
 * content. Classification is total: every document gets a label.
 *
 * Period evidence:
 *
 * | Source     | Weight                         |
 * |------------|--------------------------------|
 * | category   | +5 per indicator               |
 * | author     | +3 per author named in title   |
 * | vocabulary | +0.5 per distinct word, max 2  |
 * | title      | +1, only when nothing else hit |
 *
 * Genre evidence is the declared text type (decisive), title indicators
 * (+3), author hints (+2) and the shape of the opening lines.
 *
 * @module latin-curator/domain/classification/PeriodGenreClassifier
 */

import {
    continueWith,
    escapeRegExp,
    withMetadata,
    type CurationStage,
    type StageContext,
    type StageOutcome,
    type TextDocument,
} from "@scriptorium/engine";
import type { LexiconTable } from "../../config/loadRules.js";
import type { CorpusDocument } from "../entities/CorpusDocument.js";
import { bodyLines, parseHeader, titleOf, type HeaderMetadata } from "../patterns/header.js";
import { ScoreBoard } from "./ScoreBoard.js";
import {
    GENRE_EMPTY_DEFAULT,
    PERIOD_TIE_DEFAULT,
    isGenre,
    kGENRES,
    kPERIODS,
    lowerTier,
    type ClassificationReport,
    type ClassificationResult,
    type ConfidenceTier,
    type Genre,
    type Period,
    type Signal,
    type SignalSource,
} from "./types.js";

const kSAMPLE_LINES = 100;
const kMIN_SHAPE_LINES = 5;
const kMETER_WINDOW = 20;

interface AxisDecision<TLabel extends string> {
    readonly label: TLabel;
    readonly confidence: ConfidenceTier;
    readonly source: SignalSource;
    readonly signals: readonly Signal<TLabel>[];
}

/** Opening content the classifier looks at */
interface ContentSample {
    readonly lines: readonly string[];
    readonly text: string;
}

export class PeriodGenreClassifier implements CurationStage<CorpusDocument> {
    readonly id = "period-genre-classifier";
    readonly name = "Period / Genre Classifier";
    readonly description = "Labels each document with a period, a genre and a confidence tier";

    private readonly lexicons: LexiconTable;
    private readonly vocabulary: Readonly<Record<Period, readonly RegExp[]>>;
    private readonly connectives: RegExp;
    private readonly verseMarker: RegExp;
    private readonly proseMarker: RegExp;

    constructor(lexicons: LexiconTable) {
        this.lexicons = lexicons;
        this.vocabulary = {
            classical     : lexicons.period.vocabulary.classical.map(word => wholeWord(word, "u")),
            post_classical: lexicons.period.vocabulary.post_classical.map(word => wholeWord(word, "u")),
        };
        this.connectives = wordAlternation(lexicons.genre.proseConnectives, "giu");
        this.verseMarker = wordAlternation(lexicons.genre.verseMarkers, "iu");
        this.proseMarker = wordAlternation(lexicons.genre.proseMarkers, "iu");
    }

    apply(document: CorpusDocument, context: StageContext): StageOutcome<CorpusDocument> {
        const header = parseHeader(document.content);
        const report = this.explain(document, header);
        const { documentId, title, periodSignals, genreSignals, ...classification } = report;

        context.logger.debug("Document classified", {
            documentId,
            title,
            label     : `${classification.period}/${classification.genre}`,
            confidence: classification.confidence,
            signals   : periodSignals.length + genreSignals.length,
        });

        return continueWith(withMetadata(document, { header, classification, report }));
    }

    /**
     * Classify a document.
     *
     * @param document - Document whose opening content is sampled
     * @param metadata - Declared header (may have no fields)
     */
    classify(document: Pick<TextDocument<object>, "id" | "content">, metadata: HeaderMetadata): ClassificationResult {
        const { documentId, title, periodSignals, genreSignals, ...result } = this.explain(document, metadata);
        return result;
    }

    /**
     * Classify and keep every signal that moved a score.
     */
    explain(document: Pick<TextDocument<object>, "id" | "content">, metadata: HeaderMetadata): ClassificationReport {
        const title = titleOf(metadata, document.id);
        const sample = sampleContent(document.content);

        const period = this.decidePeriod(title.toLowerCase(), metadata.category?.toLowerCase(), sample);
        const genre = this.decideGenre(title.toLowerCase(), metadata.textType?.toLowerCase(), sample);

        return Object.freeze({
            documentId      : document.id,
            title,
            period          : period.label,
            genre           : genre.label,
            confidence      : lowerTier(period.confidence, genre.confidence),
            periodConfidence: period.confidence,
            genreConfidence : genre.confidence,
            periodSource    : period.source,
            genreSource     : genre.source,
            periodSignals   : period.signals,
            genreSignals    : genre.signals,
        });
    }

    // ========================================================================
    // Period
    // ========================================================================

    private decidePeriod(title: string, category: string | undefined, sample: ContentSample): AxisDecision<Period> {
        const lexicon = this.lexicons.period;
        const board = new ScoreBoard<Period>({ classical: 0, post_classical: 0 }, [PERIOD_TIE_DEFAULT, "post_classical"]);
        const text = sample.text.toLowerCase();

        for (const period of kPERIODS) {
            if (category) {
                for (const indicator of lexicon.categoryIndicators[period]) {
                    if (category.includes(indicator)) {
                        board.add("category", period, 5, `category contains "${indicator}"`);
                    }
                }
            }

            for (const author of lexicon.authors[period]) {
                if (title.includes(author)) {
                    board.add("author", period, 3, `title names ${author}`);
                }
            }

            const hits = lexicon.vocabulary[period].filter((_word, index) => this.vocabulary[period][index].test(text));
            if (hits.length > 0) {
                board.add("vocabulary", period, Math.min(hits.length * 0.5, 2), `vocabulary: ${hits.join(", ")}`);
            }
        }

        if (board.isEmpty()) {
            for (const period of kPERIODS) {
                const keyword = lexicon.titleKeywords[period].find(entry => title.includes(entry));
                if (keyword !== undefined) {
                    board.add("title", period, 1, `title keyword "${keyword}"`);
                }
            }
        }

        if (board.isEmpty()) {
            if (lexicon.fallbackHints.classical.some(hint => title.includes(hint))) {
                return { label: "classical", confidence: "low", source: "title-fallback", signals: board.signals };
            }
            if (lexicon.fallbackHints.post_classical.some(hint => title.includes(hint))) {
                return { label: "post_classical", confidence: "low", source: "title-fallback", signals: board.signals };
            }
            return { label: PERIOD_TIE_DEFAULT, confidence: "very_low", source: "default", signals: board.signals };
        }

        const label = board.leader();
        return {
            label,
            confidence: periodTier(board.score(label)),
            source    : board.decisiveSource(label) ?? "default",
            signals   : board.signals,
        };
    }

    // ========================================================================
    // Genre
    // ========================================================================

    private decideGenre(title: string, textType: string | undefined, sample: ContentSample): AxisDecision<Genre> {
        if (isGenre(textType)) {
            return {
                label     : textType,
                confidence: "high",
                source    : "metadata",
                signals   : [{ source: "metadata", label: textType, weight: 0, evidence: `Text Type: ${textType}` }],
            };
        }

        const lexicon = this.lexicons.genre;
        const board = new ScoreBoard<Genre>({ poetry: 0, prose: 0, mixed: 0 }, kGENRES);

        for (const genre of kGENRES) {
            for (const indicator of lexicon.titleIndicators[genre]) {
                if (title.includes(indicator)) {
                    board.add("title", genre, 3, `title contains "${indicator.trim()}"`);
                }
            }
            for (const author of lexicon.authorHints[genre]) {
                if (title.includes(author)) {
                    board.add("author", genre, 2, `title names ${author}`);
                }
            }
        }

        if (sample.lines.length > kMIN_SHAPE_LINES) {
            this.scoreShape(sample, board);
        }

        if (board.isEmpty()) {
            const poetryKeyword = lexicon.fallbackTitleKeywords.poetry.find(entry => title.includes(entry));
            const proseKeyword = lexicon.fallbackTitleKeywords.prose.find(entry => title.includes(entry));

            if (poetryKeyword !== undefined) {
                board.add("title-fallback", "poetry", 1, `title keyword "${poetryKeyword}"`);
            }
            else if (proseKeyword !== undefined) {
                board.add("title-fallback", "prose", 1, `title keyword "${proseKeyword}"`);
            }
            else {
                const poetryAuthor = lexicon.fallbackAuthors.poetry.find(entry => title.includes(entry));
                const proseAuthor = lexicon.fallbackAuthors.prose.find(entry => title.includes(entry));
                if (poetryAuthor !== undefined) {
                    board.add("author-fallback", "poetry", 1, `title names ${poetryAuthor}`);
                }
                if (proseAuthor !== undefined) {
                    board.add("author-fallback", "prose", 1, `title names ${proseAuthor}`);
                }
            }
        }

        if (board.isEmpty()) {
            return { label: GENRE_EMPTY_DEFAULT, confidence: "very_low", source: "default", signals: board.signals };
        }

        const label = board.leader();
        return {
            label,
            confidence: genreTier(board.score(label)),
            source    : board.decisiveSource(label) ?? "default",
            signals   : board.signals,
        };
    }

    /**
     * Line-length, punctuation and vocabulary shape of the opening lines.
     */
    private scoreShape(sample: ContentSample, board: ScoreBoard<Genre>): void {
        const { lines, text } = sample;
        const count = lines.length;

        const veryShort = lines.filter(line => line.length >= 10 && line.length < 30).length;
        const short = lines.filter(line => line.length >= 20 && line.length <= 80).length;
        const long = lines.filter(line => line.length > 100).length;
        const periodEnded = lines.filter(line => line.endsWith(".")).length;
        const open = count - periodEnded;

        if (veryShort > count * 0.3) {
            board.add("content-shape", "poetry", 2, `${veryShort} of ${count} lines are 10-29 characters`);
        }
        if (short > long * 2) {
            board.add("content-shape", "poetry", 1, `${short} short lines against ${long} long`);
        }
        if (long > count * 0.2) {
            board.add("content-shape", "prose", 2, `${long} of ${count} lines exceed 100 characters`);
        }
        if (open > periodEnded * 2) {
            board.add("content-shape", "poetry", 1, `${open} lines without a closing period`);
        }
        if (periodEnded > open) {
            board.add("content-shape", "prose", 1, `${periodEnded} of ${count} lines end with a period`);
        }

        const connectives = text.match(this.connectives)?.length ?? 0;
        const words = text.match(/[\p{L}\p{N}]+/gu)?.length ?? 0;
        if (connectives > Math.floor(words / 100)) {
            board.add("content-shape", "prose", 1, `${connectives} connectives in ${words} words`);
        }

        if (this.verseMarker.test(text)) {
            board.add("content-shape", "poetry", 1, "verse marker in text");
        }
        if (this.proseMarker.test(text)) {
            board.add("content-shape", "prose", 1, "prose marker in text");
        }

        const opening = lines.slice(0, kMETER_WINDOW);
        const metrical = opening.filter(line => line.length >= 30 && line.length <= 60 && !line.endsWith(".")).length;
        if (metrical > opening.length * 0.4) {
            board.add("content-shape", "poetry", 1, `${metrical} of ${opening.length} opening lines look metrical`);
        }
    }
}

function sampleContent(content: string): ContentSample {
    const lines = bodyLines(content)
        .map(line => line.trim())
        .filter(line => line !== "")
        .slice(0, kSAMPLE_LINES);
    return { lines, text: lines.join("\n") };
}

function periodTier(score: number): ConfidenceTier {
    if (score >= 3) return "high";
    if (score >= 1) return "medium";
    return "low";
}

function genreTier(score: number): ConfidenceTier {
    if (score >= 4) return "high";
    if (score >= 2) return "medium";
    if (score >= 1) return "low";
    return "very_low";
}

function wholeWord(word: string, flags: string): RegExp {
    return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(word)}(?![\\p{L}\\p{N}])`, flags);
}

function wordAlternation(words: readonly string[], flags: string): RegExp {
    return new RegExp(`(?<![\\p{L}\\p{N}])(?:${words.map(escapeRegExp).join("|")})(?![\\p{L}\\p{N}])`, flags);
}
