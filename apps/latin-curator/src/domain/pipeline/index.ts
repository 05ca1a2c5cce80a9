export { createLatinPipeline, kLATIN_STAGE_IDS, type LatinPipelineOptions } from "./createLatinPipeline.js";
