export {
    createLexiconGenderScorer,
    type GenderContext,
    type GenderContextScorer,
} from "./GenderContext.js";
export { AbbreviationExpander, type AbbreviationExpanderOptions } from "./AbbreviationExpander.js";
export {
    createNormalizationPasses,
    kNORMALIZATION_PASSES,
    type NormalizationPassName,
} from "./passes.js";
export { ContentNormalizer, type ContentNormalizerOptions } from "./ContentNormalizer.js";
