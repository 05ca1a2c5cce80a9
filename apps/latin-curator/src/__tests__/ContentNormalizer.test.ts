/**
 * @fileoverview Unit tests for ContentNormalizer and its passes
 *
 * Tests cover:
 * - Provenance, metadata, structure and annotation stripping
 * - Punctuation, short-line and whitespace normalization
 * - Idempotence of every pass
 * - Full normalization of a headed document
 * - Rejection when too little text survives
 *
 * @module latin-curator/__tests__/ContentNormalizer
 */

import { describe, it, expect, vi } from "vitest";
import { ContentNormalizer } from "../domain/normalization/ContentNormalizer.js";
import { AbbreviationExpander } from "../domain/normalization/AbbreviationExpander.js";
import {
    kNORMALIZATION_PASSES,
    normalizePunctuation,
    dropShortLines,
    normalizeWhitespace,
    stripAnnotations,
    stripMetadataBlocks,
    stripProvenance,
    stripStructure,
} from "../domain/normalization/passes.js";
import { createPatternLibrary } from "../domain/patterns/PatternLibrary.js";
import { corpusDocument, latinRules, testContext } from "./fixtures.js";

const patterns = createPatternLibrary(latinRules().patterns);

describe("normalization passes", () => {
    describe("stripProvenance", () => {
        it("should drop the header, export banners and everything after a colophon", () => {
            const text = [
                "Title: Aeneis",
                "----",
                "Arma virumque cano",
                "Exported from Wikisource on 1 May",
                "Troiae qui primus",
                "About this digital edition",
                "License text",
            ].join("\n");

            expect(stripProvenance(patterns, text)).toBe("Arma virumque cano\nTroiae qui primus");
        });
    });

    describe("stripMetadataBlocks", () => {
        it("should drop commentary, category lines, URLs and editor notes", () => {
            const text = [
                "Gallia est omnis divisa.",
                "Categoria: Historia",
                "See https://example.org/x now",
                "Caesar [ed. note] dixit (source: wiki).",
                "==Commentarium==",
                "Notes here",
            ].join("\n");

            expect(stripMetadataBlocks(patterns, text))
                .toBe("Gallia est omnis divisa.\n\nSee  now\nCaesar  dixit .\n");
        });

        // Scenario: "ocr" inside Socrates is not a digital artifact
        it("should drop artifact lines by whole phrase", () => {
            const text = "Digitized by volunteers\nSocrates dixit multa.\nThis edition is free";

            expect(stripMetadataBlocks(patterns, text)).toBe("Socrates dixit multa.");
        });
    });

    describe("stripStructure", () => {
        it("should drop wiki markup, headings, page numbers and editorial brackets", () => {
            const text = [
                "__TOC__",
                "== Liber Primus ==",
                "'''Arma''' virumque [[Troia|Troiae]] cano{{ref}}",
                "IV.",
                "Cap. XII",
                "12",
                "-----",
                "3. Italiam fato profugus [sic] Laviniaque venit 17",
                "AENEIDOS LIBER",
                "[[Categoria:Carmina]]",
            ].join("\n");

            expect(stripStructure(patterns, text))
                .toBe("\n\nArma virumque Troiae cano\nItaliam fato profugus  Laviniaque venit\n");
        });

        it("should keep a sentence that opens with a praenomen", () => {
            const line = "M. Tullius Cicero filio suo Marco salutem dicit.";

            expect(stripStructure(patterns, line)).toBe(line);
        });
    });

    describe("stripAnnotations", () => {
        it("should drop markup-led lines and modern-language notes", () => {
            const text = "# nota\nArma virumque cano\nEnglish: Arms and the man\n[[link]]";

            expect(stripAnnotations(patterns, text)).toBe("Arma virumque cano");
        });
    });

    describe("normalizePunctuation", () => {
        it("should straighten quotes and dashes and tidy spacing", () => {
            expect(normalizePunctuation("“Quo usque,” inquit — tandem ?? abutere,,, Catilina!Patientia"))
                .toBe("\"Quo usque,\" inquit - tandem? abutere, Catilina! Patientia");
        });

        it("should drop symbols outside the text alphabet but keep the ampersand", () => {
            expect(normalizePunctuation("Arma § virumque ¶ cano")).toBe("Arma  virumque  cano");
            expect(normalizePunctuation("Senatus & populus")).toBe("Senatus & populus");
        });

        // Scenario: Spaced-out dots
        it("should collapse spaced punctuation in one run", () => {
            const once = normalizePunctuation("Gallia . . est");

            expect(once).toBe("Gallia. est");
            expect(normalizePunctuation(once)).toBe(once);
        });
    });

    describe("dropShortLines", () => {
        it("should drop stray fragments but keep short Latin words and blank lines", () => {
            expect(dropShortLines(patterns, "Arma virumque cano\nx\n\nEt\n3.\n ut \nab")).toBe("Arma virumque cano\n\nEt\n ut \nab");
        });
    });

    describe("normalizeWhitespace", () => {
        it("should collapse spaces and blank lines and trim", () => {
            expect(normalizeWhitespace("  Arma\tvirumque   cano  \r\n\r\n\r\n\r\nTroiae  \n"))
                .toBe("Arma virumque cano\n\nTroiae");
        });
    });
});

describe("ContentNormalizer", () => {
    const normalizer = new ContentNormalizer({
        patterns,
        abbreviations   : new AbbreviationExpander(latinRules().abbreviations),
        minResidualChars: 50,
    });

    const DE_OFFICIIS = [
        "Title: De Officiis",
        "Category: Latinitas_Romana",
        "----",
        "LIBER PRIMUS",
        "M. Tullius Cicero filio suo Marco salutem dicit, quod filius Athenis philosophiae studet.",
        "Quamquam te, Marce fili, annum iam audientem Cratippum idque Athenis abundare oportet praeceptis.",
        "Exported from Wikisource",
    ].join("\n");

    const EXPECTED = [
        "Marcus Tullius Cicero filio suo Marco salutem dicit, quod filius Athenis philosophiae studet.",
        "Quamquam te, Marce fili, annum iam audientem Cratippum idque Athenis abundare oportet praeceptis.",
    ].join("\n");

    it("should run the passes in order", () => {
        expect(normalizer.passes.map(pass => pass.name)).toEqual([...kNORMALIZATION_PASSES]);
    });

    it("should reduce a headed document to its text", () => {
        expect(normalizer.normalize(DE_OFFICIIS)).toBe(EXPECTED);
    });

    // Scenario: A praenomen wrapped onto its own short line
    it("should expand a praenomen that opens a wrapped line", () => {
        const text = "Hic consul et filius patris erat.\nC. Iulius Caesar imperator,\nGalliam totam subegit.";

        expect(normalizer.normalize(text))
            .toBe("Hic consul et filius patris erat.\nGaius Iulius Caesar imperator,\nGalliam totam subegit.");
    });

    it("should leave the output of every pass unchanged on a second application", () => {
        const text = [
            "Title: De Bello Gallico",
            "----",
            "== Liber I ==",
            "I.",
            "'''Gallia''' est omnis divisa in partes tres , , quarum unam incolunt Belgae [sic] 12",
            "M. Tullius Cicero et C. Iulius Caesar consules erant . . . “nunc” — inquit",
            "Categoria: Historia",
            "# nota",
            "x",
            "et",
            "About this digital edition",
            "License",
        ].join("\n");
        const outputs = new Map<string, string>();

        const normalized = normalizer.normalize(text, (name, _before, after) => {
            outputs.set(name, after);
        });

        expect(normalized).toBe([
            "Gallia est omnis divisa in partes tres, quarum unam incolunt Belgae",
            "Marcus Tullius Cicero et Gaius Iulius Caesar consules erant. \"nunc\" - inquit",
            "",
            "et",
        ].join("\n"));
        for (const pass of normalizer.passes) {
            const once = outputs.get(pass.name) ?? "";
            expect(pass.apply(once)).toBe(once);
        }
    });

    it("should report each pass to the observer", () => {
        const observe = vi.fn();

        normalizer.normalize(DE_OFFICIIS, observe);

        expect(observe).toHaveBeenCalledTimes(kNORMALIZATION_PASSES.length);
        expect(observe.mock.calls[0][0]).toBe("provenance");
        expect(observe.mock.calls[0][1]).toBe(DE_OFFICIIS);
    });

    describe("apply", () => {
        it("should continue with the normalized content", () => {
            const outcome = normalizer.apply(corpusDocument("off.txt", DE_OFFICIIS), testContext);

            expect(outcome.kind).toBe("continue");
            if (outcome.kind !== "continue") return;
            expect(outcome.document.content).toBe(EXPECTED);
            expect(outcome.document.id).toBe("off.txt");
        });

        // Scenario: Only headings and page numbers
        it("should reject a document with too little text left", () => {
            const outcome = normalizer.apply(corpusDocument("empty.txt", "Title: X\n----\nIV.\n12\n"), testContext);

            expect(outcome).toMatchObject({
                kind  : "reject",
                reason: "empty_after_normalization",
                detail: "0 characters remain after normalization; minimum is 50",
            });
        });
    });
});
