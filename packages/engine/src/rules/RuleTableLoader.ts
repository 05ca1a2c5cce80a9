/**
 * @fileoverview Rule Table Loader
 *
 * Loads static rule tables (YAML) from a rules directory and provides the
 * shape checks domains use to turn parsed YAML into typed, frozen tables.
 *
 * A malformed entry is fatal: the loader throws a RuleTableError naming
 * the table and the path of the bad entry.
 *
 * @module @scriptorium/engine/rules/RuleTableLoader
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import { RuleTableError } from "../errors/CurationError.js";
import { createConsoleLogger, type EngineLogger } from "../logging/ConsoleLogger.js";

/**
 * Rule loader configuration.
 */
export interface RuleTableLoaderConfig {
    /** Directory holding `<table>.yml` files */
    readonly directory: string;

    /** Logger for table loading */
    readonly logger?: EngineLogger;
}

/**
 * Loads named YAML rule tables from one directory.
 *
 * @example
 * ```typescript
 * const loader = new RuleTableLoader({ directory: "./rules" });
 * const raw = loader.load("abbreviations");
 * const fixed = expectArray(field(raw, "fixed"), "abbreviations", "fixed");
 * ```
 */
export class RuleTableLoader {
    private readonly directory: string;
    private readonly logger: EngineLogger;

    constructor(config: RuleTableLoaderConfig) {
        this.directory = config.directory;
        this.logger = config.logger ?? createConsoleLogger("[RuleLoader]");
    }

    /**
     * Path of a table file.
     */
    pathOf(table: string): string {
        return join(this.directory, `${table}.yml`);
    }

    /**
     * Read and parse one table.
     *
     * @param table - Table name, e.g. "abbreviations" for abbreviations.yml
     * @returns The parsed YAML document (a mapping)
     * @throws RuleTableError if the file is missing, unparseable or not a mapping
     */
    load(table: string): Record<string, unknown> {
        const filePath = this.pathOf(table);

        if (!existsSync(filePath)) {
            throw RuleTableError.missing(table, filePath);
        }

        let parsed: unknown;
        try {
            parsed = parseYaml(readFileSync(filePath, "utf-8"));
        }
        catch (error) {
            throw RuleTableError.unparseable(table, filePath, error);
        }

        const record = expectRecord(parsed, table, "$");
        this.logger.debug("Rule table loaded", { table, filePath, keys: Object.keys(record) });
        return record;
    }
}

/**
 * Check that a value is a plain mapping.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * @throws RuleTableError unless value is a mapping
 */
export function expectRecord(value: unknown, table: string, path: string): Record<string, unknown> {
    if (!isRecord(value)) {
        throw RuleTableError.invalid(table, path, "a mapping");
    }
    return value;
}

/**
 * @throws RuleTableError unless value is a list
 */
export function expectArray(value: unknown, table: string, path: string): readonly unknown[] {
    if (!Array.isArray(value)) {
        throw RuleTableError.invalid(table, path, "a list");
    }
    return value;
}

/**
 * @throws RuleTableError unless value is a non-empty string
 */
export function expectString(value: unknown, table: string, path: string): string {
    if (typeof value !== "string" || value.length === 0) {
        throw RuleTableError.invalid(table, path, "a non-empty string");
    }
    return value;
}

/**
 * Strings may legitimately be empty (e.g. a glyph that maps to nothing).
 *
 * @throws RuleTableError unless value is a string
 */
export function expectStringAllowEmpty(value: unknown, table: string, path: string): string {
    if (typeof value !== "string") {
        throw RuleTableError.invalid(table, path, "a string");
    }
    return value;
}

/**
 * @throws RuleTableError unless value is a list of non-empty strings
 */
export function expectStringList(value: unknown, table: string, path: string): readonly string[] {
    return Object.freeze(
        expectArray(value, table, path).map((item, index) => expectString(item, table, `${path}[${index}]`))
    );
}

/**
 * @throws RuleTableError unless value is a finite number
 */
export function expectNumber(value: unknown, table: string, path: string): number {
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw RuleTableError.invalid(table, path, "a number");
    }
    return value;
}

/**
 * Optional boolean with a default.
 *
 * @throws RuleTableError if present and not a boolean
 */
export function optionalBoolean(value: unknown, fallback: boolean, table: string, path: string): boolean {
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "boolean") {
        throw RuleTableError.invalid(table, path, "a boolean");
    }
    return value;
}

/**
 * Read an own key from a mapping (inherited keys read as undefined).
 */
export function field(record: Record<string, unknown>, key: string): unknown {
    return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

/**
 * A mapping of string → string (e.g. glyph replacement tables).
 *
 * @throws RuleTableError unless every value is a string
 */
export function expectStringMap(
    value: unknown,
    table: string,
    path: string
): Readonly<Record<string, string>> {
    const record = expectRecord(value, table, path);
    const result: Record<string, string> = {};

    for (const [key, entry] of Object.entries(record)) {
        result[key] = expectStringAllowEmpty(entry, table, `${path}.${key}`);
    }

    return Object.freeze(result);
}

/**
 * Compile a regex source from a rule table.
 *
 * @throws RuleTableError if the source does not compile
 */
export function compilePattern(source: string, flags: string, table: string, path: string): RegExp {
    try {
        return new RegExp(source, flags);
    }
    catch (error) {
        throw RuleTableError.badPattern(table, path, source, error);
    }
}

/**
 * Escape a literal string for use inside a RegExp.
 */
export function escapeRegExp(literal: string): string {
    return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
