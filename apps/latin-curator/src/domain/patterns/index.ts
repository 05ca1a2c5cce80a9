export { isRomanNumeral, type RomanNumeralOptions } from "./romanNumerals.js";
export {
    splitHeader,
    parseHeader,
    bodyLines,
    titleOf,
    kHEADER_SEPARATOR,
    kHEADER_FIELD,
    kHEADER_SCAN_LINES,
    type HeaderMetadata,
    type HeaderSplit,
} from "./header.js";
export {
    createPatternLibrary,
    isRomanHeading,
    wholePhrasePattern,
    type PatternLibrary,
    type MarkupRule,
} from "./PatternLibrary.js";
