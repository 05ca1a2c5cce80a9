/**
 * @fileoverview Gender context around a praenomen candidate
 *
 * "M." before a name is Marcus in a man's biography and something else
 * entirely in a woman's epitaph. The scorer looks at the words around the
 * abbreviation and says which way the context leans.
 *
 * @module latin-curator/domain/normalization/GenderContext
 */

import { escapeRegExp } from "@scriptorium/engine";
import type { GenderLexicon } from "../../config/loadRules.js";

export type GenderContext = "masculine" | "feminine" | "indeterminate";

/**
 * Scores the context around `position` in `text`.
 */
export type GenderContextScorer = (text: string, position: number) => GenderContext;

/**
 * Scorer counting masculine and feminine words from the lexicon within
 * `windowChars` characters either side of the candidate.
 */
export function createLexiconGenderScorer(lexicon: GenderLexicon): GenderContextScorer {
    const masculine = wordCounter(lexicon.masculine);
    const feminine = wordCounter(lexicon.feminine);

    return (text, position) => {
        const window = text
            .slice(Math.max(0, position - lexicon.windowChars), position + lexicon.windowChars)
            .toLowerCase();

        const masculineHits = window.match(masculine)?.length ?? 0;
        const feminineHits = window.match(feminine)?.length ?? 0;

        if (masculineHits > feminineHits) return "masculine";
        if (feminineHits > masculineHits) return "feminine";
        return "indeterminate";
    };
}

function wordCounter(words: readonly string[]): RegExp {
    if (words.length === 0) {
        // Matches nothing
        return /(?!)/g;
    }
    return new RegExp(`(?<![\\p{L}\\p{N}])(?:${words.map(escapeRegExp).join("|")})(?![\\p{L}\\p{N}])`, "gu");
}
