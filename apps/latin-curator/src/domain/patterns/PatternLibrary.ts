/**
 * @fileoverview Pattern Library
 *
 * Every regular expression the gate and the normalizer use, compiled once
 * from patterns.yml plus the fixed structural patterns. The library is
 * frozen and shared read-only by all workers.
 *
 * Patterns used with `.test()` carry no `g` flag (a global regex keeps
 * `lastIndex` between calls). Patterns marked "replace" are global and
 * only ever passed to `String.prototype.replace`.
 *
 * @module latin-curator/domain/patterns/PatternLibrary
 */

import { compilePattern, escapeRegExp } from "@scriptorium/engine";
import type { PatternTable } from "../../config/loadRules.js";
import { isRomanNumeral } from "./romanNumerals.js";
import { kHEADER_FIELD, kHEADER_SEPARATOR } from "./header.js";

/** One markup rewrite (replace) */
export interface MarkupRule {
    readonly pattern: RegExp;
    readonly replacement: string;
}

export interface PatternLibrary {
    // Header
    readonly headerSeparator: RegExp;
    readonly headerField: RegExp;

    // Gate line shapes
    readonly chapterReference: RegExp;
    readonly numberedEntry: RegExp;
    readonly bullet: RegExp;
    readonly pageReference: RegExp;
    readonly letterRun: RegExp;
    readonly functionWord: RegExp;
    readonly sentenceFinal: RegExp;

    // Provenance
    readonly colophonMarkers: readonly string[];
    readonly exportLine: RegExp;

    // Metadata blocks (replace)
    readonly commentaryBlock: RegExp;
    readonly categoryLine: RegExp;
    readonly fieldLine: RegExp;
    readonly url: RegExp;
    readonly editorNotes: readonly RegExp[];
    readonly artifactLine: RegExp;

    // Structure
    readonly tocMarker: RegExp;
    readonly wikiHeading: RegExp;
    readonly wikiMarkup: readonly MarkupRule[];
    readonly chapterHeading: RegExp;
    readonly romanLead: RegExp;
    readonly headingIndicator: RegExp;
    readonly praenomenLead: RegExp;
    readonly attributions: readonly RegExp[];
    readonly allCaps: RegExp;
    readonly separatorLine: RegExp;
    readonly pageNumberLine: RegExp;
    readonly leadingSectionNumber: RegExp;
    readonly trailingPageNumber: RegExp;
    readonly editorialBrackets: RegExp;
    readonly standalonePunctuation: RegExp;

    // Annotation
    readonly linePrefixes: readonly string[];
    readonly denylistLine: RegExp;

    // Cleanup
    readonly shortWords: ReadonlySet<string>;
}

/**
 * Compile the library from the pattern table.
 *
 * @throws RuleTableError if a regex source in the table does not compile
 */
export function createPatternLibrary(table: PatternTable): PatternLibrary {
    const functionWords = table.gate.functionWords.map(escapeRegExp).join("|");
    const chapterKeywords = table.headings.chapterKeywords.map(escapeRegExp).join("|");
    const headingIndicators = table.headings.headingIndicators.map(escapeRegExp).join("|");
    const praenomenInitials = table.headings.praenomenInitials.map(escapeRegExp).join("|");
    const fieldPrefixes = table.provenance.fieldPrefixes.map(escapeRegExp).join("|");
    const bracketedNotes = table.editorial.bracketedNotes.map(escapeRegExp).join("|");

    const editorMarkers = table.editorial.editorMarkers
        .map((source, index) => {
            compilePattern(source, "i", "patterns", `editorial.editorMarkers[${index}]`);
            return `\\b${source}`;
        })
        .join("|");

    return Object.freeze({
        headerSeparator: kHEADER_SEPARATOR,
        headerField    : kHEADER_FIELD,

        chapterReference: compilePattern(table.gate.chapterReference, "i", "patterns", "gate.chapterReference"),
        numberedEntry   : /^([0-9]+|[ivxlcdm]+)[.\s-]/i,
        bullet          : /^\*/,
        pageReference   : /^\s*\d+\s*$|^\s*p\.\s*\d+/i,
        letterRun       : /\p{L}{4,}/u,
        functionWord    : new RegExp(`\\b(?:${functionWords})\\b`, "i"),
        sentenceFinal   : /[.!?]$/,

        colophonMarkers: Object.freeze([...table.provenance.colophonMarkers]),
        exportLine     : wholePhrasePattern(table.provenance.exportMarkers, "iu"),

        commentaryBlock: /==\s*Commentarium\s*==[\s\S]*$/i,
        categoryLine   : /^[ \t]*Categor(?:ia|y):.*$/gim,
        fieldLine      : new RegExp(`^[ \\t]*(?:${fieldPrefixes}).*$`, "gim"),
        url            : /https?:\/\/\S+/g,
        editorNotes    : Object.freeze([
            new RegExp(`\\[[^\\[\\]\\n]*?(?:${editorMarkers})[^\\[\\]\\n]*?\\]`, "gi"),
            new RegExp(`\\([^()\\n]*?(?:${editorMarkers})[^()\\n]*?\\)`, "gi"),
        ]),
        artifactLine: wholePhrasePattern(table.provenance.artifactPhrases, "iu"),

        tocMarker  : /__TOC__/g,
        wikiHeading: /==+.*?==+/g,
        wikiMarkup : Object.freeze([
            { pattern: /\[\[[^\]|\n]*:[^\]\n]*\]\]/g, replacement: "" },
            { pattern: /\[\[(?:[^\]|\n]*\|)?([^\]\n]*)\]\]/g, replacement: "$1" },
            { pattern: /\{\{[^{}]*\}\}/g, replacement: "" },
            { pattern: /'''(.+?)'''/g, replacement: "$1" },
            { pattern: /''(.+?)''/g, replacement: "$1" },
        ]),
        chapterHeading  : new RegExp(`^(?:${chapterKeywords})(?:\\.\\s*|\\s+)[ivxlcdm\\d]+\\s*[.\\-–—]?$`, "i"),
        romanLead       : /^([IVXLCDM]+)(?:[.\-–—]+\s*|\s+)(.*)$/,
        headingIndicator: new RegExp(`\\b(?:${headingIndicators})\\b`, "i"),
        praenomenLead   : new RegExp(`^(?:${praenomenInitials})\\.\\s+(\\p{Lu}\\p{Ll}+)`, "u"),
        attributions    : Object.freeze(
            table.headings.attributions.map((source, index) =>
                compilePattern(source, "", "patterns", `headings.attributions[${index}]`)
            )
        ),
        allCaps              : /^(?=.*[A-Z])[A-Z\s]+$/,
        separatorLine        : /^[\s\-–—.=*#]+$/,
        pageNumberLine       : /^\d+\s*\.?$/,
        leadingSectionNumber : /^(?:\d+\.\s*)+/,
        trailingPageNumber   : /(?:\s+\d+)+$/,
        editorialBrackets    : new RegExp(
            `\\[(?:${bracketedNotes}|\\.{3,}|…|[^\\[\\]\\n]{0,3}\\?|\\d+)\\]|\\(\\d+\\)`,
            "giu"
        ),
        standalonePunctuation: /^[.,:;!?\-–—"'()[\]{}]+$/,

        linePrefixes: Object.freeze([...table.annotation.linePrefixes]),
        denylistLine: wholePhrasePattern(table.annotation.denylist, "iu"),

        shortWords: new Set(table.cleanup.shortWords.map(word => word.toLowerCase())),
    });
}

/**
 * Matches any phrase as a whole word: a phrase that starts (or ends) with
 * a letter or digit may not touch another letter or digit on that side.
 */
export function wholePhrasePattern(phrases: readonly string[], flags: string): RegExp {
    const alternatives = phrases.map(phrase => {
        const leading = /^[\p{L}\p{N}]/u.test(phrase) ? "(?<![\\p{L}\\p{N}])" : "";
        const trailing = /[\p{L}\p{N}]$/u.test(phrase) ? "(?![\\p{L}\\p{N}])" : "";
        return `${leading}${escapeRegExp(phrase)}${trailing}`;
    });
    return new RegExp(`(?:${alternatives.join("|")})`, flags);
}

/**
 * A line that is only a numbered heading ("IV.", "XII", "I. De bello").
 *
 * A numeral alone must keep the line short; a numeral followed by text
 * counts when the rest is short and unpunctuated, or names a division.
 * "C. Iulius Caesar" is a praenomen and a name, never a bare heading.
 */
export function isRomanHeading(patterns: PatternLibrary, line: string): boolean {
    const bare = line.replace(/[.\s\-–—]/g, "");
    if (bare !== "" && line.length < 20 && isRomanNumeral(bare, { ignoreCase: false })) {
        return true;
    }

    const match = patterns.romanLead.exec(line);
    if (!match || !isRomanNumeral(match[1], { ignoreCase: false })) {
        return false;
    }

    const rest = match[2];
    const praenomen = patterns.praenomenLead.exec(line);
    if (praenomen && !patterns.functionWord.test(praenomen[1])) {
        return patterns.headingIndicator.test(rest);
    }

    return (rest.length < 30 && !patterns.sentenceFinal.test(rest)) || patterns.headingIndicator.test(rest);
}
