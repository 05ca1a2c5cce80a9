/**
 * @fileoverview Classification Ledger Sink
 *
 * Records every outcome in the classification ledger: the report of an
 * accepted document, the stage, reason and evidence of a rejected one.
 *
 * @module latin-curator/domain/sinks/ClassificationLedgerSink
 */

import {
    errorMessage,
    type DocumentSink,
    type OutcomeKind,
    type SinkBinding,
    type SinkContext,
    type SinkResult,
} from "@scriptorium/engine";
import type { ClassificationLedger } from "../../adapters/ledger/classification-ledger.js";
import type { CorpusDocument } from "../entities/CorpusDocument.js";

export class ClassificationLedgerSink implements DocumentSink<CorpusDocument> {
    readonly id          = "classification-ledger";
    readonly name        = "Classification Ledger";
    readonly description = "Records classification reports and rejections";
    readonly bindings: Partial<Record<OutcomeKind, SinkBinding>> = { accepted: {}, rejected: {} };

    private readonly ledger: ClassificationLedger;

    constructor(ledger: ClassificationLedger) {
        this.ledger = ledger;
    }

    async handle(context: SinkContext<CorpusDocument>): Promise<SinkResult> {
        const { source, result, logger } = context;

        try {
            if (result.status === "rejected") {
                this.ledger.recordRejection({
                    documentId: source.id,
                    stageId   : result.stageId,
                    reason    : result.reason,
                    detail    : result.detail,
                    evidence  : result.evidence,
                });

                return { sinkId: this.id, success: true, data: { recorded: "rejection" } };
            }

            const report = result.document.metadata.report;
            if (!report) {
                logger.warn("Accepted document has no classification report", { documentId: source.id });

                return {
                    sinkId : this.id,
                    success: false,
                    error  : "No classification report in document metadata",
                };
            }

            this.ledger.recordReport(report);
            return { sinkId: this.id, success: true, data: { recorded: "report" } };
        }
        catch (error) {
            logger.error("Failed to record outcome", {
                documentId: source.id,
                error     : errorMessage(error),
            });

            return {
                sinkId : this.id,
                success: false,
                error  : errorMessage(error),
            };
        }
    }
}
