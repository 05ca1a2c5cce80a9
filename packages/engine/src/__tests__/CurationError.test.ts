/**
 * @fileoverview Unit tests for curation errors and loggers
 *
 * @module @scriptorium/engine/__tests__/CurationError
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
    CurationError,
    ConfigError,
    DocumentReadError,
    ErrorCode,
    RuleTableError,
    errorMessage,
    wrapError,
} from "../errors/CurationError.js";
import { createConsoleLogger, createScopedLogger, isLogLevel } from "../logging/ConsoleLogger.js";

describe("CurationError", () => {
    // Scenario: Context defaults the operation
    it("should default the operation to unknown", () => {
        const error = new CurationError("boom");

        expect(error.code).toBe(ErrorCode.UNKNOWN);
        expect(error.context.operation).toBe("unknown");
        expect(error.context.timestamp).toBe(error.timestamp);
    });

    // Scenario: Log messages include document and cause
    it("should format a single-line log message", () => {
        const error = DocumentReadError.unreadable("ovid.txt", "/raw/ovid.txt", new Error("EACCES"));

        expect(error.toLogMessage()).toBe(
            "[DocumentReadError] | Code: 1001 | Op: readDocument | Cannot read ovid.txt: EACCES | " +
            "Doc: ovid.txt | File: /raw/ovid.txt | Cause: EACCES"
        );
    });

    // Scenario: Serialized errors keep the cause message
    it("should serialize to JSON", () => {
        const error = RuleTableError.unparseable("lexicons", "/rules/lexicons.yml", new Error("bad indent"));
        const json = error.toJSON();

        expect(json.name).toBe("RuleTableError");
        expect(json.code).toBe(ErrorCode.RULE_TABLE_PARSE_FAILED);
        expect(json.cause).toBe("bad indent");
        expect(json.context).toMatchObject({ operation: "loadRules", table: "lexicons" });
    });

    // Scenario: Config errors name the field and value
    it("should describe invalid configuration", () => {
        const error = new ConfigError("CURATOR_CONCURRENCY", "a positive integer", "zero");

        expect(error.message).toBe('Invalid configuration CURATOR_CONCURRENCY: expected a positive integer, got "zero"');
        expect(error.field).toBe("CURATOR_CONCURRENCY");
        expect(error).toBeInstanceOf(CurationError);
    });

    // Scenario: Wrapping keeps CurationErrors and wraps everything else
    it("should wrap unknown errors", () => {
        const original = new ConfigError("x", "y", 1);
        expect(wrapError(original)).toBe(original);

        const wrapped = wrapError("plain", ErrorCode.INTERNAL, { operation: "test" });
        expect(wrapped.message).toBe("plain");
        expect(wrapped.code).toBe(ErrorCode.INTERNAL);
        expect(wrapped.cause).toBe("plain");
    });

    // Scenario: Messages from any thrown value
    it("should extract messages", () => {
        expect(errorMessage(new Error("a"))).toBe("a");
        expect(errorMessage(42)).toBe("42");
    });
});

describe("loggers", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // Scenario: Messages below the minimum level are dropped
    it("should respect the minimum level", () => {
        const info = vi.spyOn(console, "info").mockImplementation(() => {});
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const logger = createConsoleLogger("[Test]", "warn");

        logger.info("hidden");
        logger.warn("shown", { count: 1 });

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith("[Test] [WARN] shown", { count: 1 });
    });

    // Scenario: Scoped loggers tag messages and attach the trace id
    it("should scope messages and add the trace id", () => {
        const inner = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const scoped = createScopedLogger(inner, "latin:structural-gate", "tr_1_x");

        scoped.info("rejected", { reason: "index" });

        expect(inner.info).toHaveBeenCalledWith("[latin:structural-gate] rejected", { reason: "index", traceId: "tr_1_x" });
    });

    // Scenario: Level names from the environment
    it("should validate level names", () => {
        expect(isLogLevel("debug")).toBe(true);
        expect(isLogLevel("silent")).toBe(true);
        expect(isLogLevel("verbose")).toBe(false);
        expect(isLogLevel("toString")).toBe(false);
    });
});
