/**
 * @fileoverview Domain barrel exports
 *
 * All domain-specific implementations for the Latin curator.
 *
 * @module latin-curator/domain
 */

export * from "./entities/index.js";
export * from "./patterns/index.js";
export * from "./gate/index.js";
export * from "./classification/index.js";
export * from "./normalization/index.js";
export * from "./orthography/index.js";
export * from "./pipeline/index.js";
export * from "./providers/index.js";
export * from "./sinks/index.js";
export * from "./utils/index.js";
