/**
 * Classification Ledger
 *
 * SQLite record of every curation outcome: the classification report of
 * each accepted document and the rejection of each rejected one. A
 * document has at most one row across both tables; recording a new
 * outcome replaces the old one, so re-running a corpus keeps the ledger
 * current.
 */

import Database from "better-sqlite3";
import { CurationError, ErrorCode, type RejectionRecord } from "@scriptorium/engine";
import type { ClassificationReport } from "../../domain/classification/types.js";

/**
 * Raw report row
 */
export interface ReportRow {
    document_id: string;
    title: string;
    period: string;
    genre: string;
    confidence: string;
    period_confidence: string;
    genre_confidence: string;
    period_source: string;
    genre_source: string;
    signals: string;
    recorded_at: string;
}

/**
 * Raw rejection row
 */
export interface RejectionRow {
    document_id: string;
    stage_id: string;
    reason: string;
    detail: string;
    evidence: string;
    recorded_at: string;
}

export interface LedgerCounts {
    readonly reports: number;
    readonly rejections: number;
}

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS classification_reports (
        document_id       TEXT PRIMARY KEY,
        title             TEXT NOT NULL,
        period            TEXT NOT NULL,
        genre             TEXT NOT NULL,
        confidence        TEXT NOT NULL,
        period_confidence TEXT NOT NULL,
        genre_confidence  TEXT NOT NULL,
        period_source     TEXT NOT NULL,
        genre_source      TEXT NOT NULL,
        signals           TEXT NOT NULL,
        recorded_at       TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS rejections (
        document_id TEXT PRIMARY KEY,
        stage_id    TEXT NOT NULL,
        reason      TEXT NOT NULL,
        detail      TEXT NOT NULL,
        evidence    TEXT NOT NULL,
        recorded_at TEXT NOT NULL
    );
`;

/**
 * Classification ledger over better-sqlite3
 *
 * @example
 * ```typescript
 * const ledger = new ClassificationLedger("./ledger.db");
 * ledger.open();
 * ledger.recordReport(report);
 * ledger.close();
 * ```
 */
export class ClassificationLedger {
    private db: Database.Database | null = null;
    private dbPath: string;

    /**
     * @param dbPath - Database file, or ":memory:"
     */
    constructor(dbPath: string = ":memory:") {
        this.dbPath = dbPath;
    }

    /**
     * Open the database and create the tables if needed
     */
    open(): void {
        if (this.db) {
            return;
        }

        this.db = new Database(this.dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.exec(SCHEMA);
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    get isOpen(): boolean {
        return this.db !== null;
    }

    /**
     * Store the report of an accepted document, replacing any earlier
     * outcome for it.
     */
    recordReport(report: ClassificationReport, recordedAt: Date = new Date()): void {
        const db = this.connection();

        const write = db.transaction(() => {
            db.prepare("DELETE FROM rejections WHERE document_id = ?").run(report.documentId);
            db.prepare(`
                INSERT INTO classification_reports
                    (document_id, title, period, genre, confidence, period_confidence, genre_confidence,
                     period_source, genre_source, signals, recorded_at)
                VALUES
                    (@documentId, @title, @period, @genre, @confidence, @periodConfidence, @genreConfidence,
                     @periodSource, @genreSource, @signals, @recordedAt)
                ON CONFLICT(document_id) DO UPDATE SET
                    title             = excluded.title,
                    period            = excluded.period,
                    genre             = excluded.genre,
                    confidence        = excluded.confidence,
                    period_confidence = excluded.period_confidence,
                    genre_confidence  = excluded.genre_confidence,
                    period_source     = excluded.period_source,
                    genre_source      = excluded.genre_source,
                    signals           = excluded.signals,
                    recorded_at       = excluded.recorded_at
            `).run({
                documentId      : report.documentId,
                title           : report.title,
                period          : report.period,
                genre           : report.genre,
                confidence      : report.confidence,
                periodConfidence: report.periodConfidence,
                genreConfidence : report.genreConfidence,
                periodSource    : report.periodSource,
                genreSource     : report.genreSource,
                signals         : JSON.stringify({ period: report.periodSignals, genre: report.genreSignals }),
                recordedAt      : recordedAt.toISOString(),
            });
        });

        write();
    }

    /**
     * Store a rejection, replacing any earlier outcome for the document.
     */
    recordRejection(rejection: RejectionRecord, recordedAt: Date = new Date()): void {
        const db = this.connection();

        const write = db.transaction(() => {
            db.prepare("DELETE FROM classification_reports WHERE document_id = ?").run(rejection.documentId);
            db.prepare(`
                INSERT INTO rejections (document_id, stage_id, reason, detail, evidence, recorded_at)
                VALUES (@documentId, @stageId, @reason, @detail, @evidence, @recordedAt)
                ON CONFLICT(document_id) DO UPDATE SET
                    stage_id    = excluded.stage_id,
                    reason      = excluded.reason,
                    detail      = excluded.detail,
                    evidence    = excluded.evidence,
                    recorded_at = excluded.recorded_at
            `).run({
                documentId: rejection.documentId,
                stageId   : rejection.stageId,
                reason    : rejection.reason,
                detail    : rejection.detail,
                evidence  : JSON.stringify(rejection.evidence),
                recordedAt: recordedAt.toISOString(),
            });
        });

        write();
    }

    getReport(documentId: string): ReportRow | undefined {
        return this.connection()
            .prepare<[string], ReportRow>("SELECT * FROM classification_reports WHERE document_id = ?")
            .get(documentId);
    }

    getRejection(documentId: string): RejectionRow | undefined {
        return this.connection()
            .prepare<[string], RejectionRow>("SELECT * FROM rejections WHERE document_id = ?")
            .get(documentId);
    }

    /**
     * Accepted documents per "period/genre" label
     */
    labelCounts(): Record<string, number> {
        const rows = this.connection()
            .prepare<[], { label: string; count: number }>(`
                SELECT period || '/' || genre AS label, COUNT(*) AS count
                FROM classification_reports
                GROUP BY label
                ORDER BY label
            `)
            .all();

        const counts: Record<string, number> = {};
        for (const row of rows) {
            counts[row.label] = row.count;
        }
        return counts;
    }

    counts(): LedgerCounts {
        const db = this.connection();
        const reports = db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM classification_reports").get();
        const rejections = db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM rejections").get();
        return { reports: reports?.count ?? 0, rejections: rejections?.count ?? 0 };
    }

    /**
     * Ensure database is open
     */
    private connection(): Database.Database {
        if (!this.db) {
            throw new CurationError(
                "Classification ledger is not open. Call open() first.",
                ErrorCode.INTERNAL,
                { operation: "ledger", filePath: this.dbPath }
            );
        }
        return this.db;
    }
}
