/**
 * @fileoverview Unit tests for configuration and rule-table loading
 *
 * Tests cover:
 * - Defaults, environment variables and command-line flags
 * - Invalid numbers, log levels and flags
 * - Loading the shipped rule tables
 * - Malformed and missing tables
 *
 * @module latin-curator/__tests__/config
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigError, ErrorCode, RuleTableError } from "@scriptorium/engine";
import { DEFAULT_RULES_DIR, loadConfig } from "../config/loadConfig.js";
import { loadRules, readAbbreviationTable } from "../config/loadRules.js";
import { RULES_DIR, latinRules } from "./fixtures.js";

/**
 * Run a throwing function and return what it threw.
 */
function captureError(fn: () => unknown): unknown {
    try {
        fn();
    }
    catch (error) {
        return error;
    }
    throw new Error("expected function to throw");
}

describe("loadConfig", () => {
    it("should apply defaults for an empty environment", () => {
        expect(loadConfig({}, [])).toEqual({
            inputDir        : "./corpus/raw",
            outputDir       : "./corpus/curated",
            rulesDir        : DEFAULT_RULES_DIR,
            minDocumentBytes: 200,
            minResidualChars: 50,
            concurrency     : 4,
            batchSize       : 100,
            ledgerPath      : undefined,
            logLevel        : "info",
            dryRun          : false,
        });
    });

    it("should point the default rules directory at the shipped tables", () => {
        expect(DEFAULT_RULES_DIR).toBe(RULES_DIR);
    });

    it("should read CURATOR_* variables", () => {
        const config = loadConfig({
            CURATOR_INPUT_DIR         : "/data/raw",
            CURATOR_OUTPUT_DIR        : "/data/out",
            CURATOR_MIN_DOCUMENT_BYTES: "0",
            CURATOR_CONCURRENCY       : "8",
            CURATOR_LEDGER_PATH       : "/data/ledger.db",
            CURATOR_LOG_LEVEL         : "debug",
            CURATOR_DRY_RUN           : "true",
        });

        expect(config).toMatchObject({
            inputDir        : "/data/raw",
            outputDir       : "/data/out",
            minDocumentBytes: 0,
            concurrency     : 8,
            ledgerPath      : "/data/ledger.db",
            logLevel        : "debug",
            dryRun          : true,
        });
    });

    // Scenario: Flags override the environment
    it("should let flags win over the environment", () => {
        const config = loadConfig(
            { CURATOR_INPUT_DIR: "/data/raw", CURATOR_DRY_RUN: "false" },
            ["--dry-run", "--input", "./texts", "--output", "./out"]
        );

        expect(config.inputDir).toBe("./texts");
        expect(config.outputDir).toBe("./out");
        expect(config.dryRun).toBe(true);
    });

    it("should reject a non-numeric size", () => {
        const error = captureError(() => loadConfig({ CURATOR_MIN_RESIDUAL_CHARS: "fifty" }));

        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toMatchObject({
            field  : "CURATOR_MIN_RESIDUAL_CHARS",
            code   : ErrorCode.CONFIG_INVALID,
            message: "Invalid configuration CURATOR_MIN_RESIDUAL_CHARS: expected an integer >= 0, got \"fifty\"",
        });
    });

    it("should reject a concurrency of zero", () => {
        const error = captureError(() => loadConfig({ CURATOR_CONCURRENCY: "0" }));

        expect(error).toMatchObject({ field: "CURATOR_CONCURRENCY" });
    });

    it("should reject an unknown log level", () => {
        const error = captureError(() => loadConfig({ CURATOR_LOG_LEVEL: "verbose" }));

        expect(error).toMatchObject({ field: "CURATOR_LOG_LEVEL" });
    });

    it("should reject a directory flag without its value", () => {
        const error = captureError(() => loadConfig({}, ["--input", "--dry-run"]));

        expect(error).toMatchObject({
            field  : "--input",
            message: "Invalid configuration --input: expected a directory, got \"--dry-run\"",
        });
        expect(captureError(() => loadConfig({}, ["--output"]))).toMatchObject({
            message: "Invalid configuration --output: expected a directory, got null",
        });
    });
});

describe("loadRules", () => {
    let emptyDir: string | undefined;

    afterEach(() => {
        if (emptyDir) {
            rmSync(emptyDir, { recursive: true, force: true });
            emptyDir = undefined;
        }
    });

    it("should load the shipped tables", () => {
        const rules = latinRules();

        expect(rules.orthography.variants[0]).toEqual({ from: "michi", to: "mihi" });
        expect(rules.orthography.letters).toEqual({ v: "u", V: "u", j: "i", J: "i" });
        expect(rules.abbreviations.genderContext.windowChars).toBe(100);
        expect(rules.lexicons.genre.titleIndicators.prose).toContain("de ");
        expect(rules.patterns.gate.functionWords).toEqual(["et", "in", "de", "ad", "cum", "ex", "pro", "per", "ab"]);
    });

    it("should mark praenomina common only where the table says so", () => {
        const common = latinRules().abbreviations.praenomina
            .filter(rule => rule.common)
            .map(rule => rule.abbreviation);

        expect(common).toEqual(["M.", "L.", "C.", "P.", "Q."]);
    });

    // Scenario: A u/v pair that the letters pass folds back
    it("should ship no variant that folds onto its own standard form", () => {
        const fold = (word: string) => word.toLowerCase().replace(/v/g, "u").replace(/j/g, "i");

        const noOps = latinRules().orthography.variants.filter(rule => fold(rule.from) === fold(rule.to));

        expect(noOps).toEqual([]);
    });

    it("should load the short-word allowlist and the praenomen initials", () => {
        const { cleanup, headings } = latinRules().patterns;

        expect(cleanup.shortWords).toContain("et");
        expect(cleanup.shortWords).not.toContain("of");
        expect(headings.praenomenInitials).toEqual(["C", "D", "L", "M"]);
    });

    it("should fail on a missing table", () => {
        emptyDir = mkdtempSync(join(tmpdir(), "rules-"));

        const error = captureError(() => loadRules(emptyDir ?? ""));

        expect(error).toBeInstanceOf(RuleTableError);
        expect(error).toMatchObject({ table: "patterns", code: ErrorCode.RULE_TABLE_MISSING });
    });

    // Scenario: A zero-width gender window
    it("should reject a window that is not a positive integer", () => {
        const error = captureError(() => readAbbreviationTable({
            fixed        : [],
            praenomina   : [],
            genderContext: { windowChars: 0, masculine: [], feminine: [] },
        }));

        expect(error).toBeInstanceOf(RuleTableError);
        expect(error).toMatchObject({
            code   : ErrorCode.RULE_TABLE_INVALID,
            message: "Invalid rule table abbreviations at genderContext.windowChars: expected a positive integer",
        });
    });
});
