/**
 * @fileoverview Curator configuration
 *
 * Reads CURATOR_* environment variables (the CLI loads `.env` first) and
 * the command-line flags `--dry-run`, `--input <dir>` and
 * `--output <dir>`. Flags win over the environment.
 *
 * @module latin-curator/config/loadConfig
 */

import { fileURLToPath } from "url";
import { ConfigError, isLogLevel, type LogLevel } from "@scriptorium/engine";

export interface CuratorConfig {
    readonly inputDir: string;
    readonly outputDir: string;
    readonly rulesDir: string;
    readonly minDocumentBytes: number;
    readonly minResidualChars: number;
    readonly concurrency: number;
    readonly batchSize: number;

    /** SQLite ledger file; no ledger when unset */
    readonly ledgerPath?: string;
    readonly logLevel: LogLevel;
    readonly dryRun: boolean;
}

export const DEFAULT_RULES_DIR = fileURLToPath(new URL("../../rules", import.meta.url));

const DEFAULTS = {
    inputDir        : "./corpus/raw",
    outputDir       : "./corpus/curated",
    minDocumentBytes: 200,
    minResidualChars: 50,
    concurrency     : 4,
    batchSize       : 100,
    logLevel        : "info",
} as const;

/**
 * Build the configuration.
 *
 * @param env - Environment (defaults to process.env)
 * @param argv - Command-line arguments after the script name
 * @throws ConfigError on a non-numeric size, an unknown log level or a flag without its value
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    argv: readonly string[] = []
): CuratorConfig {
    const flags = parseFlags(argv);
    const logLevel = env.CURATOR_LOG_LEVEL ?? DEFAULTS.logLevel;

    if (!isLogLevel(logLevel)) {
        throw new ConfigError("CURATOR_LOG_LEVEL", "one of debug, info, warn, error, silent", logLevel);
    }

    return Object.freeze({
        inputDir        : flags.input ?? nonEmpty(env.CURATOR_INPUT_DIR) ?? DEFAULTS.inputDir,
        outputDir       : flags.output ?? nonEmpty(env.CURATOR_OUTPUT_DIR) ?? DEFAULTS.outputDir,
        rulesDir        : nonEmpty(env.CURATOR_RULES_DIR) ?? DEFAULT_RULES_DIR,
        minDocumentBytes: readInteger(env, "CURATOR_MIN_DOCUMENT_BYTES", DEFAULTS.minDocumentBytes, 0),
        minResidualChars: readInteger(env, "CURATOR_MIN_RESIDUAL_CHARS", DEFAULTS.minResidualChars, 0),
        concurrency     : readInteger(env, "CURATOR_CONCURRENCY", DEFAULTS.concurrency, 1),
        batchSize       : readInteger(env, "CURATOR_BATCH_SIZE", DEFAULTS.batchSize, 1),
        ledgerPath      : nonEmpty(env.CURATOR_LEDGER_PATH),
        logLevel,
        dryRun          : flags.dryRun || env.CURATOR_DRY_RUN === "true",
    });
}

interface CliFlags {
    dryRun: boolean;
    input?: string;
    output?: string;
}

function parseFlags(argv: readonly string[]): CliFlags {
    const flags: CliFlags = { dryRun: false };

    for (let index = 0; index < argv.length; index++) {
        const arg = argv[index];

        switch (arg) {
            case "--dry-run":
                flags.dryRun = true;
                break;
            case "--input":
            case "--output": {
                const value = argv[index + 1];
                if (value === undefined || value.startsWith("--")) {
                    throw new ConfigError(arg, "a directory", value ?? null);
                }
                if (arg === "--input") {
                    flags.input = value;
                }
                else {
                    flags.output = value;
                }
                index += 1;
                break;
            }
        }
    }

    return flags;
}

function nonEmpty(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === "" ? undefined : value;
}

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, minimum: number): number {
    const raw = nonEmpty(env[name]);
    if (raw === undefined) {
        return fallback;
    }

    if (!/^\d+$/.test(raw.trim())) {
        throw new ConfigError(name, `an integer >= ${minimum}`, raw);
    }

    const value = parseInt(raw, 10);
    if (value < minimum) {
        throw new ConfigError(name, `an integer >= ${minimum}`, raw);
    }
    return value;
}
