/**
 * @fileoverview Orthography Standardizer
 *
 * Last pipeline stage. Folds every accepted text onto one spelling
 * system: standard spellings for period variants, no diacritics,
 * ligatures spelled out, u for v and i for j, lowercase, and a small
 * ASCII punctuation set.
 *
 * Standardizing standardized text changes nothing. A variant can hide
 * behind a macron, a long s or a stray digit until the later passes
 * strip them, so the variant table runs a second time at the end, keyed
 * on its folded spellings.
 *
 * @module latin-curator/domain/orthography/OrthographyStandardizer
 */

import {
    continueWith,
    createTextPass,
    escapeRegExp,
    runPasses,
    withContent,
    type CurationStage,
    type PassObserver,
    type StageContext,
    type StageOutcome,
    type TextPass,
} from "@scriptorium/engine";
import type { OrthographyTable } from "../../config/loadRules.js";
import type { CorpusDocument } from "../entities/CorpusDocument.js";

export const kORTHOGRAPHY_PASSES = [
    "variants",
    "diacritics",
    "ligatures",
    "letters",
    "punctuation",
    "folded-variants",
] as const;

/** Anything outside this set is dropped in the final pass */
const kDISALLOWED = /[^a-ik-uw-z\s.,;:!?'"()\-]/g;

export class OrthographyStandardizer implements CurationStage<CorpusDocument> {
    readonly id = "orthography-standardizer";
    readonly name = "Orthography Standardizer";
    readonly description = "Folds spelling variants, diacritics, ligatures and letter forms";

    readonly passes: readonly TextPass[];

    constructor(table: OrthographyTable) {
        const diacritics = glyphMap(table.diacritics);
        const ligatures = glyphMap(table.ligatures);
        const letters = glyphMap(table.letters);
        const punctuation = glyphMap(table.punctuation);

        const variants = table.variants.map(rule => ({
            pattern: new RegExp(`\\b${escapeRegExp(rule.from)}\\b`, "gi"),
            to     : rule.to,
        }));
        const foldedVariants = table.variants.map(rule => ({
            pattern: new RegExp(`\\b${escapeRegExp(letters(rule.from).toLowerCase())}\\b`, "g"),
            to     : letters(rule.to).toLowerCase(),
        }));

        this.passes = Object.freeze([
            createTextPass("variants", text => replaceVariants(variants, text)),
            createTextPass("diacritics", text =>
                diacritics(text).normalize("NFD").replace(/\p{Mn}/gu, "")
            ),
            createTextPass("ligatures", ligatures),
            createTextPass("letters", text => letters(text).toLowerCase()),
            createTextPass("punctuation", text => tidyPunctuation(punctuation(text))),
            createTextPass("folded-variants", text => replaceVariants(foldedVariants, text)),
        ]);
    }

    apply(document: CorpusDocument, context: StageContext): StageOutcome<CorpusDocument> {
        const standardized = this.standardize(document.content);

        context.logger.debug("Orthography standardized", {
            documentId: document.id,
            before    : document.content.length,
            after     : standardized.length,
        });

        return continueWith(withContent(document, standardized));
    }

    standardize(text: string, observe?: PassObserver): string {
        return runPasses(this.passes, text, observe);
    }
}

interface VariantRule {
    readonly pattern: RegExp;
    readonly to: string;
}

function replaceVariants(rules: readonly VariantRule[], text: string): string {
    return rules.reduce((current, rule) => current.replace(rule.pattern, rule.to), text);
}

/**
 * Replacer for a glyph table. Longer keys win over their prefixes.
 */
function glyphMap(table: Readonly<Record<string, string>>): (text: string) => string {
    const keys = Object.keys(table).sort((a, b) => b.length - a.length);
    if (keys.length === 0) {
        return text => text;
    }

    const pattern = new RegExp(keys.map(escapeRegExp).join("|"), "gu");
    return text => text.replace(pattern, glyph => table[glyph] ?? glyph);
}

function tidyPunctuation(text: string): string {
    return text
        .replace(kDISALLOWED, "")
        .replace(/[^\S\n]+/g, " ")
        .replace(/ +([.,;:!?])/g, "$1")
        .replace(/([.,;:!?])(?=[a-z])/g, "$1 ")
        .split("\n")
        .map(line => line.trim())
        .join("\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}
