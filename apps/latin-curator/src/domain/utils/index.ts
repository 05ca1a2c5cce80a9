export { formatSummary, type SummaryFormatOptions } from "./formatSummary.js";
