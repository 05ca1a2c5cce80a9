/**
 * @fileoverview Directory Document Provider
 *
 * Implements the DocumentProvider contract over a directory of UTF-8
 * `.txt` files. Files are served in file-name order; the cursor is the
 * index of the next file.
 *
 * A file that cannot be read or is not valid UTF-8 becomes a read
 * failure for that document only.
 *
 * @module latin-curator/domain/providers/DirectoryDocumentProvider
 */

import { existsSync } from "fs";
import { readdir, readFile } from "fs/promises";
import { join } from "path";
import {
    ConfigError,
    DocumentReadError,
    type DocumentProvider,
    type FetchOptions,
    type FetchResult,
    type ReadFailure,
} from "@scriptorium/engine";
import { createCorpusDocument, type CorpusDocument } from "../entities/CorpusDocument.js";

/**
 * Configuration for the directory provider
 */
export interface DirectoryProviderConfig {
    /** Directory holding the source texts */
    readonly directory: string;

    /** File extension to pick up (defaults to ".txt") */
    readonly extension?: string;

    /** Page size when the caller passes no limit */
    readonly defaultLimit?: number;
}

/**
 * Directory Document Provider
 *
 * @example
 * ```typescript
 * const provider = new DirectoryDocumentProvider({ directory: "./texts" });
 * await provider.initialize();
 *
 * let page = await provider.getDocuments({ limit: 100 });
 * while (page.hasMore) {
 *     page = await provider.getDocuments({ limit: 100, cursor: page.cursor });
 * }
 * ```
 */
export class DirectoryDocumentProvider implements DocumentProvider<CorpusDocument> {
    readonly id = "directory-provider";
    readonly name = "Directory Provider";
    readonly description = "Provides UTF-8 text files from a local directory";

    private readonly config: {
        directory: string;
        extension: string;
        defaultLimit: number;
    };
    private files: string[] = [];
    private initialized: boolean = false;

    constructor(config: DirectoryProviderConfig) {
        this.config = {
            directory   : config.directory,
            extension   : config.extension ?? ".txt",
            defaultLimit: config.defaultLimit ?? 100,
        };
    }

    /**
     * List the directory. The listing is fixed for the rest of the run.
     *
     * @throws ConfigError if the directory does not exist
     */
    async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }

        if (!existsSync(this.config.directory)) {
            throw new ConfigError("inputDir", "an existing directory", this.config.directory);
        }

        const entries = await readdir(this.config.directory, { withFileTypes: true });
        this.files = entries
            .filter(entry => entry.isFile() && entry.name.endsWith(this.config.extension))
            .map(entry => entry.name)
            .sort();
        this.initialized = true;
    }

    /**
     * Read the next page of documents.
     *
     * @param options - limit and cursor (index of the first file to read)
     */
    async getDocuments(options: FetchOptions = {}): Promise<FetchResult<CorpusDocument>> {
        if (!this.initialized) {
            throw new Error("Provider not initialized. Call initialize() first.");
        }

        const limit = options.limit ?? this.config.defaultLimit;
        const start = options.cursor ? parseInt(options.cursor, 10) || 0 : 0;
        const page = this.files.slice(start, start + limit);

        const documents: CorpusDocument[] = [];
        const failures: ReadFailure[] = [];

        for (const fileName of page) {
            const filePath = join(this.config.directory, fileName);
            try {
                documents.push(await readDocument(fileName, filePath));
            }
            catch (error) {
                failures.push({
                    documentId: fileName,
                    error     : error instanceof DocumentReadError
                        ? error
                        : DocumentReadError.unreadable(fileName, filePath, error),
                });
            }
        }

        const next = start + page.length;
        return {
            documents,
            failures,
            cursor : next.toString(),
            hasMore: next < this.files.length,
        };
    }

    async shutdown(): Promise<void> {
        this.files = [];
        this.initialized = false;
    }

    /**
     * Number of files found by initialize().
     */
    get fileCount(): number {
        return this.files.length;
    }
}

async function readDocument(fileName: string, filePath: string): Promise<CorpusDocument> {
    const buffer = await readFile(filePath);

    let content: string;
    try {
        content = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
    }
    catch {
        throw DocumentReadError.undecodable(fileName, filePath, "utf-8");
    }

    return createCorpusDocument({
        id        : fileName,
        content,
        byteSize  : buffer.byteLength,
        sourcePath: filePath,
    });
}
