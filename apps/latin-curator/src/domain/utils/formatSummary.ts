/**
 * @fileoverview Batch summary report
 *
 * @module latin-curator/domain/utils/formatSummary
 */

import type { BatchSummary } from "@scriptorium/engine";

export interface SummaryFormatOptions {
    /** Evidence strings shown per rejection */
    readonly evidencePerRejection?: number;
}

/**
 * Plain-text report of a batch run: counts, then every rejection with its
 * reason and first evidence strings, then every error.
 */
export function formatSummary(summary: BatchSummary, options: SummaryFormatOptions = {}): string {
    const evidencePerRejection = options.evidencePerRejection ?? 2;
    const lines = [
        `Corpus ${summary.corpusId}: ${summary.total} documents in ${summary.durationMs}ms`,
        `  accepted: ${summary.accepted}`,
        `  rejected: ${summary.rejected}`,
        `  errored:  ${summary.errored}`,
    ];

    if (summary.rejections.length > 0) {
        lines.push("", "Rejected:");
        for (const rejection of summary.rejections) {
            lines.push(`  ${rejection.documentId} [${rejection.stageId}] ${rejection.reason}: ${rejection.detail}`);
            for (const evidence of rejection.evidence.slice(0, evidencePerRejection)) {
                lines.push(`    - ${evidence}`);
            }
        }
    }

    if (summary.errors.length > 0) {
        lines.push("", "Errors:");
        for (const error of summary.errors) {
            lines.push(`  ${error.documentId}: ${error.message}`);
        }
    }

    return lines.join("\n");
}
