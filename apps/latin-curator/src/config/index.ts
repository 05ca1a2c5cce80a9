/**
 * @fileoverview Configuration barrel exports
 *
 * @module latin-curator/config
 */

export { loadConfig, DEFAULT_RULES_DIR, type CuratorConfig } from "./loadConfig.js";
export {
    loadRules,
    readPatternTable,
    readAbbreviationTable,
    readLexiconTable,
    readOrthographyTable,
    type LatinRules,
    type PatternTable,
    type AbbreviationTable,
    type FixedAbbreviationRule,
    type PraenomenRule,
    type GenderLexicon,
    type LexiconTable,
    type OrthographyTable,
    type VariantRule,
} from "./loadRules.js";
