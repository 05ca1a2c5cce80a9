/**
 * @fileoverview Content normalizer passes
 *
 * Each pass is a pure string → string function over the whole document.
 * Passes run in the order `createNormalizationPasses()` returns them.
 *
 * @module latin-curator/domain/normalization/passes
 */

import { createTextPass, type TextPass } from "@scriptorium/engine";
import { isRomanHeading, type PatternLibrary } from "../patterns/PatternLibrary.js";
import { splitHeader } from "../patterns/header.js";
import type { AbbreviationExpander } from "./AbbreviationExpander.js";

export const kNORMALIZATION_PASSES = [
    "provenance",
    "metadata-blocks",
    "structure",
    "annotation",
    "punctuation",
    "abbreviations",
    "short-lines",
    "whitespace",
] as const;

export type NormalizationPassName = (typeof kNORMALIZATION_PASSES)[number];

export function createNormalizationPasses(
    patterns: PatternLibrary,
    abbreviations: AbbreviationExpander
): readonly TextPass[] {
    return Object.freeze([
        createTextPass("provenance", text => stripProvenance(patterns, text)),
        createTextPass("metadata-blocks", text => stripMetadataBlocks(patterns, text)),
        createTextPass("structure", text => stripStructure(patterns, text)),
        createTextPass("annotation", text => stripAnnotations(patterns, text)),
        createTextPass("punctuation", normalizePunctuation),
        createTextPass("abbreviations", text => abbreviations.expand(text)),
        createTextPass("short-lines", text => dropShortLines(patterns, text)),
        createTextPass("whitespace", normalizeWhitespace),
    ]);
}

/**
 * Drop the declared header, everything from a colophon onwards, and
 * export-banner lines.
 */
export function stripProvenance(patterns: PatternLibrary, text: string): string {
    const { lines, bodyStart } = splitHeader(text);
    const kept: string[] = [];

    for (const line of lines.slice(bodyStart)) {
        const trimmed = line.trim();
        if (patterns.colophonMarkers.some(marker => trimmed.startsWith(marker))) {
            break;
        }
        if (patterns.exportLine.test(line)) {
            continue;
        }
        kept.push(line);
    }

    return kept.join("\n");
}

/**
 * Drop commentary sections, category and field lines, URLs, editorial
 * notes and digital-artifact lines.
 */
export function stripMetadataBlocks(patterns: PatternLibrary, text: string): string {
    let current = text
        .replace(patterns.commentaryBlock, "")
        .replace(patterns.categoryLine, "")
        .replace(patterns.fieldLine, "")
        .replace(patterns.url, "");

    for (const note of patterns.editorNotes) {
        current = current.replace(note, "");
    }

    return current
        .split("\n")
        .filter(line => !patterns.artifactLine.test(line))
        .join("\n");
}

/**
 * Drop wiki markup, headings, attributions, separators, page numbers and
 * editorial brackets.
 */
export function stripStructure(patterns: PatternLibrary, text: string): string {
    let current = text.replace(patterns.tocMarker, "").replace(patterns.wikiHeading, "");
    for (const rule of patterns.wikiMarkup) {
        current = current.replace(rule.pattern, rule.replacement);
    }

    const kept: string[] = [];
    for (const line of current.split("\n")) {
        if (line.trim() === "") {
            kept.push("");
            continue;
        }

        const cleaned = line
            .trim()
            .replace(patterns.editorialBrackets, "")
            .replace(patterns.leadingSectionNumber, "")
            .replace(patterns.trailingPageNumber, "")
            .trim();

        if (cleaned === "" || isStructuralLine(patterns, cleaned)) {
            continue;
        }
        kept.push(cleaned);
    }

    return kept.join("\n");
}

function isStructuralLine(patterns: PatternLibrary, line: string): boolean {
    return (
        isRomanHeading(patterns, line) ||
        patterns.chapterHeading.test(line) ||
        patterns.attributions.some(attribution => attribution.test(line)) ||
        (line.length < 100 && patterns.allCaps.test(line)) ||
        patterns.separatorLine.test(line) ||
        patterns.pageNumberLine.test(line) ||
        patterns.standalonePunctuation.test(line)
    );
}

/**
 * Drop lines led by a markup prefix or naming a modern-language or
 * bibliographic marker.
 */
export function stripAnnotations(patterns: PatternLibrary, text: string): string {
    return text
        .split("\n")
        .filter(line => {
            const trimmed = line.trim();
            return (
                !patterns.linePrefixes.some(prefix => trimmed.startsWith(prefix)) &&
                !patterns.denylistLine.test(trimmed)
            );
        })
        .join("\n");
}

const kDOUBLE_QUOTES = /[“”„‟«»]/g;
const kSINGLE_QUOTES = /[‘’‚‛‹›]/g;
const kDASHES = /[–—]/g;
const kDISALLOWED = /[^\p{L}\p{M}\p{N}\s.,:;!?'"\-()[\]&⁊]/gu;

/**
 * Straighten quotes and dashes, drop symbols outside the Latin text
 * alphabet, and tidy spacing around sentence punctuation.
 */
export function normalizePunctuation(text: string): string {
    return text
        .replace(kDOUBLE_QUOTES, "\"")
        .replace(kSINGLE_QUOTES, "'")
        .replace(kDASHES, "-")
        .replace(kDISALLOWED, "")
        .replace(/[ \t]+([.,;:!?])/g, "$1")
        .replace(/([.,;:!?])\1+/g, "$1")
        .replace(/([.,;:!?])(?=\p{L})/gu, "$1 ");
}

/**
 * Drop lines of two characters or fewer that are not a short Latin word.
 * Blank lines stay.
 */
export function dropShortLines(patterns: PatternLibrary, text: string): string {
    return text
        .split("\n")
        .filter(line => {
            const trimmed = line.trim();
            return trimmed === "" || trimmed.length > 2 || patterns.shortWords.has(trimmed.toLowerCase());
        })
        .join("\n");
}

/**
 * Unix newlines, single spaces, trimmed lines, at most one blank line
 * between paragraphs.
 */
export function normalizeWhitespace(text: string): string {
    return text
        .replace(/\r\n?/g, "\n")
        .replace(/\t/g, " ")
        .replace(/ {2,}/g, " ")
        .split("\n")
        .map(line => line.trim())
        .join("\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}
