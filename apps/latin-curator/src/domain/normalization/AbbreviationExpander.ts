/**
 * @fileoverview Abbreviation expansion
 *
 * Two rule families from abbreviations.yml:
 *
 * - fixed: regex → expansion, applied in table order
 * - praenomina: personal-name abbreviations ("M." → "Marcus"), expanded
 *   only before a capitalised word and only when it is safe to do so
 *
 * A praenomen candidate is left alone when:
 * - the abbreviation is not marked common
 * - it is itself a multi-letter Roman numeral
 * - the token before it is a number or an uppercase numeral ("XII C. ...")
 * - the token after it is an uppercase numeral ("M. CCC")
 * - the surrounding context reads feminine
 *
 * @module latin-curator/domain/normalization/AbbreviationExpander
 */

import { compilePattern, escapeRegExp } from "@scriptorium/engine";
import type { AbbreviationTable, PraenomenRule } from "../../config/loadRules.js";
import { isRomanNumeral } from "../patterns/romanNumerals.js";
import { createLexiconGenderScorer, type GenderContextScorer } from "./GenderContext.js";

export interface AbbreviationExpanderOptions {
    /** Replaces the lexicon-based gender scorer */
    readonly genderScorer?: GenderContextScorer;
}

/** Characters scanned for the neighbouring tokens */
const kTOKEN_SCAN = 64;

interface CompiledFixedRule {
    readonly pattern: RegExp;
    readonly expansion: string;
}

interface CompiledPraenomen {
    readonly rule: PraenomenRule;
    readonly pattern: RegExp;
    readonly isNumeral: boolean;
}

export class AbbreviationExpander {
    private readonly fixed: readonly CompiledFixedRule[];
    private readonly praenomina: readonly CompiledPraenomen[];
    private readonly genderScorer: GenderContextScorer;

    /**
     * @throws RuleTableError if a fixed pattern does not compile
     */
    constructor(table: AbbreviationTable, options: AbbreviationExpanderOptions = {}) {
        this.fixed = table.fixed.map((rule, index) => ({
            pattern  : compilePattern(rule.pattern, rule.caseSensitive ? "g" : "gi", "abbreviations", `fixed[${index}].pattern`),
            expansion: rule.expansion,
        }));

        this.praenomina = table.praenomina
            .filter(rule => rule.common)
            .map(rule => {
                const body = rule.abbreviation.replace(/[.']/g, "");
                return {
                    rule,
                    pattern  : new RegExp(`(?<![\\p{L}\\p{N}'])${escapeRegExp(rule.abbreviation)}(?=\\s\\p{Lu})`, "gu"),
                    isNumeral: body.length > 1 && isRomanNumeral(body, { ignoreCase: false }),
                };
            });

        this.genderScorer = options.genderScorer ?? createLexiconGenderScorer(table.genderContext);
    }

    /**
     * Fixed rules, then praenomina.
     */
    expand(text: string): string {
        return this.expandPraenomina(this.expandFixed(text));
    }

    expandFixed(text: string): string {
        let current = text;
        for (const rule of this.fixed) {
            current = current.replace(rule.pattern, rule.expansion);
        }
        return current;
    }

    expandPraenomina(text: string): string {
        let current = text;
        for (const praenomen of this.praenomina) {
            if (praenomen.isNumeral) {
                continue;
            }
            current = current.replace(praenomen.pattern, (matched: string, offset: number, source: string) =>
                this.shouldExpand(source, offset, matched.length) ? praenomen.rule.expansion : matched
            );
        }
        return current;
    }

    private shouldExpand(text: string, offset: number, length: number): boolean {
        const previous = /(\S+)\s*$/.exec(text.slice(Math.max(0, offset - kTOKEN_SCAN), offset));
        if (previous && isNumberToken(stripPunctuation(previous[1]))) {
            return false;
        }

        const next = /^\s+(\S+)/.exec(text.slice(offset + length, offset + length + kTOKEN_SCAN));
        if (next && isRomanNumeral(stripPunctuation(next[1]), { ignoreCase: false })) {
            return false;
        }

        return this.genderScorer(text, offset) !== "feminine";
    }
}

function stripPunctuation(token: string): string {
    return token.replace(/[^\p{L}\p{N}]/gu, "");
}

function isNumberToken(token: string): boolean {
    return /^\d+$/.test(token) || isRomanNumeral(token, { ignoreCase: false });
}
