/**
 * @fileoverview Classification vocabulary
 *
 * Periods, genres, confidence tiers and the signal records a
 * classification decision is explained by.
 *
 * @module latin-curator/domain/classification/types
 */

export const kPERIODS = ["classical", "post_classical"] as const;
export type Period = (typeof kPERIODS)[number];

/** Genre labels, in tie-break order */
export const kGENRES = ["poetry", "prose", "mixed"] as const;
export type Genre = (typeof kGENRES)[number];

const kCONFIDENCE_TIERS = ["very_low", "low", "medium", "high"] as const;
export type ConfidenceTier = (typeof kCONFIDENCE_TIERS)[number];

/** Equal period scores resolve to classical */
export const PERIOD_TIE_DEFAULT: Period = "classical";

/** Genre when no evidence at all was found */
export const GENRE_EMPTY_DEFAULT: Genre = "prose";

export type SignalSource =
    | "metadata"
    | "category"
    | "author"
    | "vocabulary"
    | "title"
    | "content-shape"
    | "title-fallback"
    | "author-fallback"
    | "default";

/**
 * One piece of evidence that moved a score.
 */
export interface Signal<TLabel extends string = string> {
    readonly source: SignalSource;
    readonly label: TLabel;
    readonly weight: number;
    readonly evidence: string;
}

export interface ClassificationResult {
    readonly period: Period;
    readonly genre: Genre;

    /** Lower of the two axis confidences */
    readonly confidence: ConfidenceTier;
    readonly periodConfidence: ConfidenceTier;
    readonly genreConfidence: ConfidenceTier;

    /** Signal source that contributed most to each decision */
    readonly periodSource: SignalSource;
    readonly genreSource: SignalSource;
}

/**
 * Full explanation of one classification, as stored in the ledger.
 */
export interface ClassificationReport extends ClassificationResult {
    readonly documentId: string;
    readonly title: string;
    readonly periodSignals: readonly Signal<Period>[];
    readonly genreSignals: readonly Signal<Genre>[];
}

export function isGenre(value: unknown): value is Genre {
    return kGENRES.some(genre => genre === value);
}

/**
 * The less certain of two tiers.
 */
export function lowerTier(a: ConfidenceTier, b: ConfidenceTier): ConfidenceTier {
    return kCONFIDENCE_TIERS.indexOf(a) <= kCONFIDENCE_TIERS.indexOf(b) ? a : b;
}
