/**
 * @fileoverview End-to-end tests for the Latin corpus registration
 *
 * Tests cover:
 * - A batch run over a directory with accepted, rejected and unreadable files
 * - Curated output layout
 * - Ledger records
 * - Dry run
 *
 * @module latin-curator/__tests__/createLatinCorpus
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync, mkdirSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { CurationEngine, silentLogger, type EventPayload } from "@scriptorium/engine";
import { ClassificationLedger } from "../adapters/ledger/classification-ledger.js";
import { createLatinCorpus, LATIN_CORPUS_ID } from "../createLatinCorpus.js";
import { latinRules } from "./fixtures.js";

const VITA_MARTINI = [
    "Title: Vita Sancti Martini",
    "Category: Latinitas_Mediaevalis",
    "Text Type: prose",
    "----",
    "Igitur Martinus Sabariae Pannoniarum oppido oriundus fuit, sed intra Italiam Ticini altus est.",
    "Parentibus secundum saeculi dignitatem non infimis, gentilibus tamen.",
    "Pater eius miles primum, post tribunus militum fuit.",
].join("\n");

describe("createLatinCorpus", () => {
    let root: string;
    let inputDir: string;
    let outputDir: string;

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), "latin-"));
        inputDir = join(root, "raw");
        outputDir = join(root, "curated");
        mkdirSync(inputDir);

        writeFileSync(join(inputDir, "martinus.txt"), VITA_MARTINI, "utf-8");
        writeFileSync(join(inputDir, "tiny.txt"), "Vale.", "utf-8");
        writeFileSync(join(inputDir, "bad.txt"), Buffer.from([0x41, 0xe9, 0x42]));
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    function settings(dryRun = false) {
        return {
            inputDir,
            outputDir,
            minDocumentBytes: 200,
            minResidualChars: 50,
            batchSize       : 2,
            dryRun,
        };
    }

    it("should register the provider, the pipeline and the writer", () => {
        const corpus = createLatinCorpus(settings(), latinRules());

        expect(corpus.id).toBe(LATIN_CORPUS_ID);
        expect(corpus.pipeline.stageIds).toHaveLength(4);
        expect(corpus.sinks.map(sink => sink.id)).toEqual(["corpus-writer"]);
        expect(corpus.config).toEqual({ dryRun: false });
    });

    // Scenario: One good text, one tiny file, one file that is not UTF-8
    it("should curate a directory end to end", async () => {
        const ledger = new ClassificationLedger(":memory:");
        ledger.open();

        const engine = new CurationEngine({ batchSize: 2, concurrency: 2, logger: silentLogger });
        const accepted: EventPayload[] = [];
        engine.eventBus.subscribe("document:accepted", (event) => {
            accepted.push(event);
        });
        engine.registerCorpus(createLatinCorpus(settings(), latinRules(), ledger));

        const summary = await engine.run(LATIN_CORPUS_ID);

        expect(summary).toMatchObject({
            corpusId   : "latin",
            total      : 3,
            accepted   : 1,
            rejected   : 1,
            errored    : 1,
            acceptedIds: ["martinus.txt"],
        });
        expect(summary.rejections).toEqual([
            {
                documentId: "tiny.txt",
                stageId   : "structural-gate",
                reason    : "too_small",
                detail    : "Document is 5 bytes; minimum is 200",
                evidence  : ["5 bytes"],
            },
        ]);
        expect(summary.errors.map(error => error.documentId)).toEqual(["bad.txt"]);

        expect(accepted).toHaveLength(1);
        expect(accepted[0].data).toMatchObject({ documentId: "martinus.txt", label: "post_classical/prose" });

        const curated = readFileSync(join(outputDir, "post_classical", "prose", "martinus.txt"), "utf-8");
        expect(curated.split("\n")[0]).toBe(
            "igitur martinus sabariae pannoniarum oppido oriundus fuit, sed intra italiam ticini altus est."
        );

        expect(ledger.counts()).toEqual({ reports: 1, rejections: 1 });
        expect(ledger.labelCounts()).toEqual({ "post_classical/prose": 1 });
        expect(ledger.getRejection("tiny.txt")?.stage_id).toBe("structural-gate");

        ledger.close();
    });

    it("should write nothing in dry run mode", async () => {
        const engine = new CurationEngine({ batchSize: 2, concurrency: 1, logger: silentLogger });
        engine.registerCorpus(createLatinCorpus(settings(true), latinRules()));

        const summary = await engine.run(LATIN_CORPUS_ID);

        expect(summary.accepted).toBe(1);
        expect(existsSync(outputDir)).toBe(false);
    });
});
