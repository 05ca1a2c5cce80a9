/**
 * @fileoverview Latin rule tables
 *
 * Reads patterns.yml, abbreviations.yml, lexicons.yml and orthography.yml
 * from the rules directory and checks their shape. Any bad entry stops
 * startup with a RuleTableError naming the table and entry path.
 *
 * Regex sources are kept as strings here; the components that use them
 * compile them with `compilePattern()` so a bad source is still reported
 * against its table.
 *
 * @module latin-curator/config/loadRules
 */

import {
    RuleTableLoader,
    RuleTableError,
    expectRecord,
    expectArray,
    expectString,
    expectStringList,
    expectStringMap,
    expectNumber,
    optionalBoolean,
    field,
    type EngineLogger,
} from "@scriptorium/engine";
import type { Genre, Period } from "../domain/classification/types.js";

// ============================================================================
// Table shapes
// ============================================================================

export interface PatternTable {
    readonly gate: {
        readonly chapterReference: string;
        readonly functionWords: readonly string[];
    };
    readonly headings: {
        readonly chapterKeywords: readonly string[];
        readonly headingIndicators: readonly string[];
        readonly praenomenInitials: readonly string[];
        readonly attributions: readonly string[];
    };
    readonly provenance: {
        readonly colophonMarkers: readonly string[];
        readonly exportMarkers: readonly string[];
        readonly fieldPrefixes: readonly string[];
        readonly artifactPhrases: readonly string[];
    };
    readonly annotation: {
        readonly linePrefixes: readonly string[];
        readonly denylist: readonly string[];
    };
    readonly editorial: {
        readonly bracketedNotes: readonly string[];
        readonly editorMarkers: readonly string[];
    };
    readonly cleanup: {
        readonly shortWords: readonly string[];
    };
}

export interface FixedAbbreviationRule {
    readonly pattern: string;
    readonly expansion: string;
    readonly caseSensitive: boolean;
}

export interface PraenomenRule {
    readonly abbreviation: string;
    readonly expansion: string;
    readonly common: boolean;
}

export interface GenderLexicon {
    readonly windowChars: number;
    readonly masculine: readonly string[];
    readonly feminine: readonly string[];
}

export interface AbbreviationTable {
    readonly fixed: readonly FixedAbbreviationRule[];
    readonly praenomina: readonly PraenomenRule[];
    readonly genderContext: GenderLexicon;
}

export type PeriodLists = Readonly<Record<Period, readonly string[]>>;
export type GenreLists = Readonly<Record<Genre, readonly string[]>>;

/** Fallback lists only ever point at poetry or prose */
export type FallbackLists = Readonly<Record<"poetry" | "prose", readonly string[]>>;

export interface LexiconTable {
    readonly period: {
        readonly categoryIndicators: PeriodLists;
        readonly authors: PeriodLists;
        readonly vocabulary: PeriodLists;
        readonly titleKeywords: PeriodLists;
        readonly fallbackHints: PeriodLists;
    };
    readonly genre: {
        readonly titleIndicators: GenreLists;
        readonly authorHints: GenreLists;
        readonly proseConnectives: readonly string[];
        readonly verseMarkers: readonly string[];
        readonly proseMarkers: readonly string[];
        readonly fallbackTitleKeywords: FallbackLists;
        readonly fallbackAuthors: FallbackLists;
    };
}

export interface VariantRule {
    readonly from: string;
    readonly to: string;
}

export interface OrthographyTable {
    /** Whole-word spelling folds, in table order */
    readonly variants: readonly VariantRule[];
    readonly diacritics: Readonly<Record<string, string>>;
    readonly ligatures: Readonly<Record<string, string>>;
    readonly letters: Readonly<Record<string, string>>;
    readonly punctuation: Readonly<Record<string, string>>;
}

export interface LatinRules {
    readonly patterns: PatternTable;
    readonly abbreviations: AbbreviationTable;
    readonly lexicons: LexiconTable;
    readonly orthography: OrthographyTable;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load and validate every Latin rule table.
 *
 * @param directory - Directory holding the four `.yml` tables
 * @param logger - Optional logger for table loading
 * @throws RuleTableError on a missing, unparseable or malformed table
 */
export function loadRules(directory: string, logger?: EngineLogger): LatinRules {
    const loader = new RuleTableLoader({ directory, logger });

    return Object.freeze({
        patterns     : readPatternTable(loader.load("patterns")),
        abbreviations: readAbbreviationTable(loader.load("abbreviations")),
        lexicons     : readLexiconTable(loader.load("lexicons")),
        orthography  : readOrthographyTable(loader.load("orthography")),
    });
}

export function readPatternTable(raw: Record<string, unknown>): PatternTable {
    const table = "patterns";
    const gate = expectRecord(field(raw, "gate"), table, "gate");
    const headings = expectRecord(field(raw, "headings"), table, "headings");
    const provenance = expectRecord(field(raw, "provenance"), table, "provenance");
    const annotation = expectRecord(field(raw, "annotation"), table, "annotation");
    const editorial = expectRecord(field(raw, "editorial"), table, "editorial");
    const cleanup = expectRecord(field(raw, "cleanup"), table, "cleanup");

    return Object.freeze({
        gate: Object.freeze({
            chapterReference: expectString(field(gate, "chapterReference"), table, "gate.chapterReference"),
            functionWords   : expectStringList(field(gate, "functionWords"), table, "gate.functionWords"),
        }),
        headings: Object.freeze({
            chapterKeywords  : expectStringList(field(headings, "chapterKeywords"), table, "headings.chapterKeywords"),
            headingIndicators: expectStringList(field(headings, "headingIndicators"), table, "headings.headingIndicators"),
            praenomenInitials: expectStringList(field(headings, "praenomenInitials"), table, "headings.praenomenInitials"),
            attributions     : expectStringList(field(headings, "attributions"), table, "headings.attributions"),
        }),
        provenance: Object.freeze({
            colophonMarkers: expectStringList(field(provenance, "colophonMarkers"), table, "provenance.colophonMarkers"),
            exportMarkers  : expectStringList(field(provenance, "exportMarkers"), table, "provenance.exportMarkers"),
            fieldPrefixes  : expectStringList(field(provenance, "fieldPrefixes"), table, "provenance.fieldPrefixes"),
            artifactPhrases: expectStringList(field(provenance, "artifactPhrases"), table, "provenance.artifactPhrases"),
        }),
        annotation: Object.freeze({
            linePrefixes: expectStringList(field(annotation, "linePrefixes"), table, "annotation.linePrefixes"),
            denylist    : expectStringList(field(annotation, "denylist"), table, "annotation.denylist"),
        }),
        editorial: Object.freeze({
            bracketedNotes: expectStringList(field(editorial, "bracketedNotes"), table, "editorial.bracketedNotes"),
            editorMarkers : expectStringList(field(editorial, "editorMarkers"), table, "editorial.editorMarkers"),
        }),
        cleanup: Object.freeze({
            shortWords: expectStringList(field(cleanup, "shortWords"), table, "cleanup.shortWords"),
        }),
    });
}

export function readAbbreviationTable(raw: Record<string, unknown>): AbbreviationTable {
    const table = "abbreviations";

    const fixed = expectArray(field(raw, "fixed"), table, "fixed").map((entry, index) => {
        const path = `fixed[${index}]`;
        const rule = expectRecord(entry, table, path);
        return Object.freeze({
            pattern      : expectString(field(rule, "pattern"), table, `${path}.pattern`),
            expansion    : expectString(field(rule, "expansion"), table, `${path}.expansion`),
            caseSensitive: optionalBoolean(field(rule, "caseSensitive"), false, table, `${path}.caseSensitive`),
        });
    });

    const praenomina = expectArray(field(raw, "praenomina"), table, "praenomina").map((entry, index) => {
        const path = `praenomina[${index}]`;
        const rule = expectRecord(entry, table, path);
        return Object.freeze({
            abbreviation: expectString(field(rule, "abbreviation"), table, `${path}.abbreviation`),
            expansion   : expectString(field(rule, "expansion"), table, `${path}.expansion`),
            common      : optionalBoolean(field(rule, "common"), false, table, `${path}.common`),
        });
    });

    const gender = expectRecord(field(raw, "genderContext"), table, "genderContext");
    const windowChars = expectNumber(field(gender, "windowChars"), table, "genderContext.windowChars");
    if (!Number.isInteger(windowChars) || windowChars <= 0) {
        throw RuleTableError.invalid(table, "genderContext.windowChars", "a positive integer");
    }

    return Object.freeze({
        fixed     : Object.freeze(fixed),
        praenomina: Object.freeze(praenomina),
        genderContext: Object.freeze({
            windowChars,
            masculine: lowercased(expectStringList(field(gender, "masculine"), table, "genderContext.masculine")),
            feminine : lowercased(expectStringList(field(gender, "feminine"), table, "genderContext.feminine")),
        }),
    });
}

export function readLexiconTable(raw: Record<string, unknown>): LexiconTable {
    const table = "lexicons";
    const period = expectRecord(field(raw, "period"), table, "period");
    const genre = expectRecord(field(raw, "genre"), table, "genre");

    return Object.freeze({
        period: Object.freeze({
            categoryIndicators: periodLists(field(period, "categoryIndicators"), table, "period.categoryIndicators"),
            authors           : periodLists(field(period, "authors"), table, "period.authors"),
            vocabulary        : periodLists(field(period, "vocabulary"), table, "period.vocabulary"),
            titleKeywords     : periodLists(field(period, "titleKeywords"), table, "period.titleKeywords"),
            fallbackHints     : periodLists(field(period, "fallbackHints"), table, "period.fallbackHints"),
        }),
        genre: Object.freeze({
            titleIndicators      : genreLists(field(genre, "titleIndicators"), table, "genre.titleIndicators"),
            authorHints          : genreLists(field(genre, "authorHints"), table, "genre.authorHints"),
            proseConnectives     : lowercased(expectStringList(field(genre, "proseConnectives"), table, "genre.proseConnectives")),
            verseMarkers         : lowercased(expectStringList(field(genre, "verseMarkers"), table, "genre.verseMarkers")),
            proseMarkers         : lowercased(expectStringList(field(genre, "proseMarkers"), table, "genre.proseMarkers")),
            fallbackTitleKeywords: fallbackLists(field(genre, "fallbackTitleKeywords"), table, "genre.fallbackTitleKeywords"),
            fallbackAuthors      : fallbackLists(field(genre, "fallbackAuthors"), table, "genre.fallbackAuthors"),
        }),
    });
}

export function readOrthographyTable(raw: Record<string, unknown>): OrthographyTable {
    const table = "orthography";
    const variants = Object.entries(expectStringMap(field(raw, "variants"), table, "variants"))
        .map(([from, to]) => Object.freeze({ from, to }));

    return Object.freeze({
        variants   : Object.freeze(variants),
        diacritics : expectStringMap(field(raw, "diacritics"), table, "diacritics"),
        ligatures  : expectStringMap(field(raw, "ligatures"), table, "ligatures"),
        letters    : expectStringMap(field(raw, "letters"), table, "letters"),
        punctuation: expectStringMap(field(raw, "punctuation"), table, "punctuation"),
    });
}

// ============================================================================
// Helpers
// ============================================================================

function lowercased(list: readonly string[]): readonly string[] {
    return Object.freeze(list.map(entry => entry.toLowerCase()));
}

function periodLists(value: unknown, table: string, path: string): PeriodLists {
    const record = expectRecord(value, table, path);
    return Object.freeze({
        classical     : lowercased(expectStringList(field(record, "classical"), table, `${path}.classical`)),
        post_classical: lowercased(expectStringList(field(record, "post_classical"), table, `${path}.post_classical`)),
    });
}

function genreLists(value: unknown, table: string, path: string): GenreLists {
    const record = expectRecord(value, table, path);
    return Object.freeze({
        poetry: lowercased(expectStringList(field(record, "poetry"), table, `${path}.poetry`)),
        prose : lowercased(expectStringList(field(record, "prose"), table, `${path}.prose`)),
        mixed : lowercased(expectStringList(field(record, "mixed"), table, `${path}.mixed`)),
    });
}

function fallbackLists(value: unknown, table: string, path: string): FallbackLists {
    const record = expectRecord(value, table, path);
    return Object.freeze({
        poetry: lowercased(expectStringList(field(record, "poetry"), table, `${path}.poetry`)),
        prose : lowercased(expectStringList(field(record, "prose"), table, `${path}.prose`)),
    });
}
