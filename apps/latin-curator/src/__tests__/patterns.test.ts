/**
 * @fileoverview Unit tests for the pattern library
 *
 * Tests cover:
 * - Roman numeral recognition
 * - Declared header parsing
 * - Compiled gate and heading patterns
 * - Numbered heading detection
 *
 * @module latin-curator/__tests__/patterns
 */

import { describe, it, expect } from "vitest";
import { isRomanNumeral } from "../domain/patterns/romanNumerals.js";
import { bodyLines, parseHeader, splitHeader, titleOf } from "../domain/patterns/header.js";
import { createPatternLibrary, isRomanHeading, wholePhrasePattern } from "../domain/patterns/PatternLibrary.js";
import { latinRules } from "./fixtures.js";

describe("isRomanNumeral", () => {
    it("should accept well-formed numerals in either case", () => {
        expect(isRomanNumeral("XIV")).toBe(true);
        expect(isRomanNumeral("xiv")).toBe(true);
        expect(isRomanNumeral("MMXXIV")).toBe(true);
    });

    it("should reject lowercase numerals when case matters", () => {
        expect(isRomanNumeral("xiv", { ignoreCase: false })).toBe(false);
        expect(isRomanNumeral("XIV", { ignoreCase: false })).toBe(true);
    });

    // Scenario: Malformed sequences and words made of numeral letters
    it("should reject malformed numerals and ordinary words", () => {
        expect(isRomanNumeral("IIII")).toBe(false);
        expect(isRomanNumeral("VX")).toBe(false);
        expect(isRomanNumeral("")).toBe(false);
        expect(isRomanNumeral("Caesar")).toBe(false);
    });
});

describe("header", () => {
    const declared = [
        "Title: De Bello Gallico",
        "Category: Latinitas_Romana",
        "Text Type: prose",
        "----",
        "Gallia est omnis divisa in partes tres.",
    ].join("\n");

    it("should parse the known fields and keep every field as written", () => {
        const split = splitHeader(declared);

        expect(split.bodyStart).toBe(4);
        expect(split.header).toEqual({
            title   : "De Bello Gallico",
            source  : undefined,
            category: "Latinitas_Romana",
            textType: "prose",
            fields  : {
                "Title"    : "De Bello Gallico",
                "Category" : "Latinitas_Romana",
                "Text Type": "prose",
            },
        });
    });

    it("should return the lines after the separator as the body", () => {
        expect(bodyLines(declared)).toEqual(["Gallia est omnis divisa in partes tres."]);
    });

    // Scenario: Prose before a dashed rule is not a header
    it("should not treat a non-field line before the separator as a header", () => {
        const text = "Gallia est omnis divisa in partes tres\n----\nQuarum unam incolunt Belgae.";

        const split = splitHeader(text);

        expect(split.header).toBeUndefined();
        expect(split.bodyStart).toBe(0);
    });

    it("should require at least one field before the separator", () => {
        expect(splitHeader("----\nArma virumque cano").header).toBeUndefined();
    });

    it("should only look for the separator in the first 20 lines", () => {
        const fields = Array.from({ length: 21 }, (_, index) => `Field${index}: value`);
        const text = [...fields, "----", "Arma virumque cano"].join("\n");

        expect(splitHeader(text).header).toBeUndefined();
    });

    it("should give an empty header when none is declared", () => {
        expect(parseHeader("Arma virumque cano")).toEqual({ fields: {} });
    });

    it("should fall back to the file name for the title", () => {
        expect(titleOf({ fields: {} }, "aeneis.txt")).toBe("aeneis");
        expect(titleOf({ title: "Aeneis", fields: { Title: "Aeneis" } }, "a.txt")).toBe("Aeneis");
    });
});

describe("createPatternLibrary", () => {
    const patterns = createPatternLibrary(latinRules().patterns);

    it("should match chapter references case-insensitively", () => {
        expect(patterns.chapterReference.test("Capitulum XII: De moribus")).toBe(true);
        expect(patterns.chapterReference.test("Liber primus")).toBe(false);
    });

    it("should match chapter headings only as a whole line", () => {
        expect(patterns.chapterHeading.test("Cap. XII")).toBe(true);
        expect(patterns.chapterHeading.test("Liber 3.")).toBe(true);
        expect(patterns.chapterHeading.test("Liber primus")).toBe(false);
        expect(patterns.chapterHeading.test("liberi 3")).toBe(false);
    });

    it("should compile every attribution from the table", () => {
        expect(patterns.attributions).toHaveLength(latinRules().patterns.headings.attributions.length);
        expect(patterns.attributions.some(pattern => pattern.test("FINIS"))).toBe(true);
    });
});

describe("wholePhrasePattern", () => {
    // Scenario: "ocr" inside Socrates is not the artifact marker
    it("should not match a phrase inside a longer word", () => {
        const pattern = wholePhrasePattern(["ocr"], "iu");

        expect(pattern.test("Socrates dixit")).toBe(false);
        expect(pattern.test("mediocris")).toBe(false);
        expect(pattern.test("OCR output")).toBe(true);
    });

    it("should match a phrase that starts with a symbol anywhere", () => {
        expect(wholePhrasePattern(["©"], "iu").test("Text ©2020")).toBe(true);
    });
});

describe("isRomanHeading", () => {
    const patterns = createPatternLibrary(latinRules().patterns);

    it("should recognise a bare uppercase numeral", () => {
        expect(isRomanHeading(patterns, "IV.")).toBe(true);
        expect(isRomanHeading(patterns, "XII")).toBe(true);
    });

    it("should recognise a numeral followed by a short title", () => {
        expect(isRomanHeading(patterns, "I. De bello Gallico")).toBe(true);
    });

    it("should recognise a long heading that names a division", () => {
        expect(isRomanHeading(patterns, "XII. Liber de moribus et institutis Romanorum antiquis")).toBe(true);
    });

    // Scenario: "M." is a praenomen at the start of a sentence
    it("should not treat a sentence led by a praenomen as a heading", () => {
        expect(isRomanHeading(patterns, "M. Tullius Cicero consulatum suum laudabat.")).toBe(false);
    });

    // Scenario: An OCR line break right after a sentence
    it("should not treat a short line led by a praenomen and a name as a heading", () => {
        expect(isRomanHeading(patterns, "C. Iulius Caesar imperator,")).toBe(false);
        expect(isRomanHeading(patterns, "L. Sergius Catilina")).toBe(false);
    });

    it("should still treat a praenomen initial before a division name or a function word as a heading", () => {
        expect(isRomanHeading(patterns, "L. Liber de moribus")).toBe(true);
        expect(isRomanHeading(patterns, "C. De amicitia")).toBe(true);
    });

    it("should not treat words starting with numeral letters as headings", () => {
        expect(isRomanHeading(patterns, "Dixit Caesar")).toBe(false);
        expect(isRomanHeading(patterns, "iv.")).toBe(false);
    });
});
