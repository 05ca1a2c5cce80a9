/**
 * @fileoverview Latin Curator - Main Entry Point
 *
 * Curates a directory of digitized Latin texts in one batch run:
 * index and contents files are rejected, every other text is classified
 * by period and genre, stripped of non-text material, standardized and
 * written under `<outputDir>/<period>/<genre>/`.
 *
 * Usage:
 *   npm run curate -- [--dry-run] [--input <dir>] [--output <dir>]
 *
 * Exit codes: 0 after a completed batch (even with rejected or errored
 * documents), 1 on invalid configuration, a malformed rule table or an
 * aborted batch.
 *
 * @module latin-curator
 */

// Load .env before anything reads the environment
import "dotenv/config";

import {
    CurationEngine,
    CurationError,
    createConsoleLogger,
    type EventPayload,
} from "@scriptorium/engine";
import { loadConfig, loadRules } from "./config/index.js";
import { ClassificationLedger } from "./adapters/ledger/index.js";
import { formatSummary } from "./domain/index.js";
import { createLatinCorpus, LATIN_CORPUS_ID } from "./createLatinCorpus.js";

/**
 * Main entry point
 *
 * @returns Process exit code
 */
async function main(): Promise<number> {
    console.log("=".repeat(60));
    console.log("Latin Curator");
    console.log("=".repeat(60));

    const config = loadConfig(process.env, process.argv.slice(2));
    const logger = createConsoleLogger("[Curator]", config.logLevel);

    if (config.dryRun) {
        console.log("\nDRY RUN MODE - no curated files will be written\n");
    }

    const rules = loadRules(config.rulesDir, createConsoleLogger("[Rules]", config.logLevel));
    logger.info("Rule tables loaded", { rulesDir: config.rulesDir });

    const ledger = config.ledgerPath ? new ClassificationLedger(config.ledgerPath) : undefined;
    ledger?.open();

    try {
        const engine = new CurationEngine({
            batchSize  : config.batchSize,
            concurrency: config.concurrency,
            logger     : createConsoleLogger("[Engine]", config.logLevel),
        });

        engine.eventBus.subscribe("document:rejected", (event) => {
            const documentId = stringField(event, "documentId");
            const reason = stringField(event, "reason");
            console.log(`[REJECTED] ${documentId}: ${reason}`);
        });

        engine.eventBus.subscribe("document:accepted", (event) => {
            console.log(`[ACCEPTED] ${stringField(event, "documentId")} -> ${stringField(event, "label")}`);
        });

        engine.eventBus.subscribe("document:error", (event) => {
            console.error(`[ERROR] ${stringField(event, "documentId")}: ${stringField(event, "message")}`);
        });

        engine.registerCorpus(createLatinCorpus(config, rules, ledger));

        const summary = await engine.run(LATIN_CORPUS_ID);

        console.log("");
        console.log(formatSummary(summary));

        if (ledger) {
            logger.info("Ledger updated", { ledgerPath: config.ledgerPath, ...ledger.counts() });
        }

        return 0;
    }
    finally {
        ledger?.close();
    }
}

function stringField(event: EventPayload, key: string): string {
    const value = event.data?.[key];
    return typeof value === "string" ? value : "?";
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error("[FATAL]", error instanceof CurationError ? error.toLogMessage() : error);
        process.exitCode = 1;
    });
