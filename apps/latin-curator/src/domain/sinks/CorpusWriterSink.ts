/**
 * @fileoverview Corpus Writer Sink
 *
 * Writes each accepted, standardized text to
 * `<outputDir>/<period>/<genre>/<documentId>`.
 *
 * @module latin-curator/domain/sinks/CorpusWriterSink
 */

import { mkdir, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import {
    errorMessage,
    type DocumentSink,
    type OutcomeKind,
    type SinkBinding,
    type SinkContext,
    type SinkResult,
} from "@scriptorium/engine";
import { routeLabel, type CorpusDocument } from "../entities/CorpusDocument.js";

/**
 * Configuration for CorpusWriterSink
 */
export interface CorpusWriterSinkConfig {
    /** Root of the curated corpus */
    readonly outputDir: string;

    /** Only write documents routed to these labels ("classical/prose"); all when absent */
    readonly labels?: readonly string[];

    /**
     * If true, log the target path without writing.
     * Defaults to false.
     */
    readonly dryRun?: boolean;
}

/**
 * Corpus Writer Sink
 *
 * @example
 * ```typescript
 * const writer = new CorpusWriterSink({ outputDir: "./corpus", dryRun: true });
 * // Engine calls handle() for every accepted document
 * ```
 */
export class CorpusWriterSink implements DocumentSink<CorpusDocument> {
    readonly id          = "corpus-writer";
    readonly name        = "Corpus Writer";
    readonly description = "Writes accepted texts under <period>/<genre>/";
    readonly bindings: Partial<Record<OutcomeKind, SinkBinding>>;

    private readonly outputDir: string;
    private readonly dryRun: boolean;

    constructor(config: CorpusWriterSinkConfig) {
        this.outputDir = config.outputDir;
        this.dryRun    = config.dryRun ?? false;
        this.bindings  = { accepted: config.labels ? { labels: config.labels } : {} };
    }

    /**
     * Target file for an accepted document.
     */
    outputPathFor(document: CorpusDocument): string {
        return join(this.outputDir, routeLabel(document), basename(document.id));
    }

    async handle(context: SinkContext<CorpusDocument>): Promise<SinkResult> {
        const { result, logger } = context;

        if (result.status !== "accepted") {
            return {
                sinkId : this.id,
                success: false,
                error  : "Corpus writer only handles accepted documents",
            };
        }

        const document = result.document;
        const path = this.outputPathFor(document);

        if (this.dryRun) {
            logger.info("DRY RUN: Would write curated text", { documentId: document.id, path });

            return {
                sinkId : this.id,
                success: true,
                data   : {
                    dryRun: true,
                    path,
                },
            };
        }

        try {
            await mkdir(dirname(path), { recursive: true });
            await writeFile(path, `${document.content}\n`, "utf-8");

            logger.debug("Curated text written", { documentId: document.id, path });

            return {
                sinkId : this.id,
                success: true,
                data   : {
                    path,
                    characters: document.content.length,
                },
            };
        }
        catch (error) {
            logger.error("Failed to write curated text", {
                documentId: document.id,
                path,
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
