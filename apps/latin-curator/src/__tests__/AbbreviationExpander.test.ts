/**
 * @fileoverview Unit tests for AbbreviationExpander and the gender scorer
 *
 * Tests cover:
 * - Fixed abbreviations
 * - Praenomen expansion in masculine and feminine contexts
 * - Roman numerals next to a praenomen
 * - Custom gender scorers
 *
 * @module latin-curator/__tests__/AbbreviationExpander
 */

import { describe, it, expect, vi } from "vitest";
import { AbbreviationExpander } from "../domain/normalization/AbbreviationExpander.js";
import { createLexiconGenderScorer, type GenderContextScorer } from "../domain/normalization/GenderContext.js";
import { latinRules } from "./fixtures.js";

describe("AbbreviationExpander", () => {
    const expander = new AbbreviationExpander(latinRules().abbreviations);

    describe("fixed rules", () => {
        it("should expand scholarly abbreviations", () => {
            expect(expander.expandFixed("i. e. verum")).toBe("id est verum");
        });

        it("should expand titles case-sensitively", () => {
            expect(expander.expand("Imp. Caes. Aug.")).toBe("Imperator Caesar Augustus");
        });
    });

    describe("praenomina", () => {
        // Scenario: M. Tullius in a man's biography
        it("should expand a praenomen in a masculine context", () => {
            expect(expander.expand("M. Tullius Cicero, filius Marci, consul fuit."))
                .toBe("Marcus Tullius Cicero, filius Marci, consul fuit.");
        });

        // Scenario: M. before a woman's name stays as written
        it("should leave a praenomen alone in a feminine context", () => {
            const text = "M. Tullia, filia Marci et uxor Pisonis, pia fuit.";

            expect(expander.expand(text)).toBe(text);
        });

        it("should not expand after a Roman numeral", () => {
            const text = "anno XII C. Marius consul fuit.";

            expect(expander.expand(text)).toBe(text);
        });

        it("should not expand before a Roman numeral", () => {
            const text = "anno M. CCC urbs condita est.";

            expect(expander.expand(text)).toBe(text);
        });

        it("should only expand before a capitalised word", () => {
            expect(expander.expand("M. et alii")).toBe("M. et alii");
        });

        it("should leave uncommon praenomina alone", () => {
            expect(expander.expand("Cn. Pompeius Magnus")).toBe("Cn. Pompeius Magnus");
        });

        it("should ask a custom scorer about the candidate position", () => {
            const scorer = vi.fn<GenderContextScorer>().mockReturnValue("feminine");
            const custom = new AbbreviationExpander(latinRules().abbreviations, { genderScorer: scorer });

            expect(custom.expand("Vidi L. Tullium.")).toBe("Vidi L. Tullium.");
            expect(scorer).toHaveBeenCalledWith("Vidi L. Tullium.", 5);
        });
    });
});

describe("createLexiconGenderScorer", () => {
    const scorer = createLexiconGenderScorer({ windowChars: 10, masculine: ["filius"], feminine: ["filia"] });

    it("should lean toward the side with more words", () => {
        expect(scorer("filius est", 0)).toBe("masculine");
        expect(scorer("filia", 0)).toBe("feminine");
        expect(scorer("nihil", 0)).toBe("indeterminate");
    });

    it("should match whole words only", () => {
        expect(scorer("filiarum", 0)).toBe("indeterminate");
    });

    it("should ignore words outside the window", () => {
        const text = `filia${" ".repeat(30)}M. Tullius`;

        expect(scorer(text, 35)).toBe("indeterminate");
    });
});
