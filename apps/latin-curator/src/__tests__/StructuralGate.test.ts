/**
 * @fileoverview Unit tests for StructuralGate
 *
 * Tests cover:
 * - Size threshold
 * - Chapter-reference, bullet and non-prose index rules
 * - Retaining running prose
 * - Stage outcomes
 *
 * @module latin-curator/__tests__/StructuralGate
 */

import { describe, it, expect } from "vitest";
import { StructuralGate, contentLines } from "../domain/gate/StructuralGate.js";
import { createPatternLibrary } from "../domain/patterns/PatternLibrary.js";
import { corpusDocument, latinRules, testContext } from "./fixtures.js";

const PROSE = [
    "Gallia est omnis divisa in partes tres, quarum unam incolunt Belgae, aliam Aquitani.",
    "Hi omnes lingua, institutis, legibus inter se differunt.",
    "Gallos ab Aquitanis Garumna flumen, a Belgis Matrona et Sequana dividit.",
    "Horum omnium fortissimi sunt Belgae, propterea quod a cultu atque humanitate provinciae longissime absunt.",
].join("\n");

describe("StructuralGate", () => {
    const gate = new StructuralGate(createPatternLibrary(latinRules().patterns), { minDocumentBytes: 200 });

    describe("evaluate", () => {
        // Scenario: A 19-byte file is too small to be a text
        it("should reject documents under the byte threshold", () => {
            const verdict = gate.evaluate({ content: "Arma virumque cano.", byteSize: 19 });

            expect(verdict).toEqual({
                verdict : "reject",
                reason  : "too_small",
                detail  : "Document is 19 bytes; minimum is 200",
                evidence: ["19 bytes"],
            });
        });

        // Scenario: Twenty "Capitulum N" lines form a table of contents
        it("should reject a file of chapter references as an index", () => {
            const content = Array.from({ length: 20 }, (_, index) => `Capitulum ${index + 1}: De rebus gestis`).join("\n");

            const verdict = gate.evaluate({ content, byteSize: 600 });

            expect(verdict.verdict).toBe("reject");
            if (verdict.verdict !== "reject") return;
            expect(verdict.reason).toBe("index");
            expect(verdict.detail).toBe("20 of 20 sampled lines are chapter references");
            expect(verdict.evidence).toHaveLength(10);
            expect(verdict.evidence[0]).toBe("Chapter reference: Capitulum 1: De rebus gestis");
        });

        it("should reject a short bulleted list", () => {
            const content = Array.from({ length: 12 }, () => "* Aeneis").join("\n");

            const verdict = gate.evaluate({ content, byteSize: 500 });

            expect(verdict).toMatchObject({
                verdict: "reject",
                reason : "index",
                detail : "12 bullet lines in a 12-line document",
            });
        });

        // Scenario: Short wordless lines such as "Aen 1" are not prose
        it("should reject a short file whose lines are not prose", () => {
            const content = Array.from({ length: 10 }, (_, index) => `Aen ${index + 1}`).join("\n");

            const verdict = gate.evaluate({ content, byteSize: 500 });

            expect(verdict.verdict).toBe("reject");
            if (verdict.verdict !== "reject") return;
            expect(verdict.detail).toBe("10 of the first 10 lines are not prose");
            expect(verdict.evidence[0]).toBe("Non-prose: Aen 1");
        });

        it("should retain running prose", () => {
            expect(gate.evaluate({ content: PROSE, byteSize: Buffer.byteLength(PROSE) })).toEqual({ verdict: "retain" });
        });

        it("should retain a large document with no content lines", () => {
            expect(gate.evaluate({ content: "\n\n\n", byteSize: 300 })).toEqual({ verdict: "retain" });
        });
    });

    describe("countShapes", () => {
        it("should count each line toward one shape only", () => {
            const counts = gate.countShapes(["Liber 1", "IV. De moribus", "* nota", "p. 12", "Arma virumque cano"]);

            expect(counts).toMatchObject({
                total     : 5,
                sampled   : 5,
                references: 1,
                numbered  : 1,
                bullets   : 1,
                pages     : 1,
            });
        });
    });

    describe("apply", () => {
        it("should continue with the same document when retained", () => {
            const document = corpusDocument("bg.txt", PROSE);

            const outcome = gate.apply(document, testContext);

            expect(outcome).toEqual({ kind: "continue", document });
        });

        it("should reject with the verdict reason and evidence", () => {
            const outcome = gate.apply(corpusDocument("tiny.txt", "Vale."), testContext);

            expect(outcome).toEqual({
                kind    : "reject",
                reason  : "too_small",
                detail  : "Document is 5 bytes; minimum is 200",
                evidence: ["5 bytes"],
            });
        });
    });
});

describe("contentLines", () => {
    it("should skip the header and blank lines and trim the rest", () => {
        expect(contentLines("Title: Aeneis\n----\n\n  Arma virumque cano  \n")).toEqual(["Arma virumque cano"]);
    });
});
