export {
    ClassificationLedger,
    type ReportRow,
    type RejectionRow,
    type LedgerCounts,
} from "./classification-ledger.js";
