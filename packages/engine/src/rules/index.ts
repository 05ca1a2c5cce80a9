/**
 * @fileoverview Rule table barrel exports
 *
 * @module @scriptorium/engine/rules
 */

export {
    RuleTableLoader,
    type RuleTableLoaderConfig,
    isRecord,
    expectRecord,
    expectArray,
    expectString,
    expectStringAllowEmpty,
    expectStringList,
    expectStringMap,
    expectNumber,
    optionalBoolean,
    field,
    compilePattern,
    escapeRegExp,
} from "./RuleTableLoader.js";
