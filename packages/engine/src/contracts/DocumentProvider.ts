/**
 * DocumentProvider Contract
 *
 * Document providers are passive data sources. The engine pulls
 * documents from providers page by page during a batch run.
 *
 * Design principles:
 * - Passive: Providers don't push; engine pulls
 * - Stateless fetch: Each call to getDocuments() is independent
 * - Cursor based: The engine hands back the cursor of the previous page
 */

import type { TextDocument } from "./Document.js";

/**
 * Options for fetching documents.
 */
export interface FetchOptions {
    /** Maximum number of documents to fetch */
    readonly limit?: number;

    /** Cursor returned by the previous page */
    readonly cursor?: string;

    /** Additional provider-specific options */
    readonly [key: string]: unknown;
}

/**
 * A document the provider could not read or decode.
 * Reported to the engine instead of thrown, so the batch continues.
 */
export interface ReadFailure {
    /** Identifier of the unreadable document (e.g. its filename) */
    readonly documentId: string;

    /** The read or decode error */
    readonly error: Error;
}

/**
 * Result of fetching documents.
 */
export interface FetchResult<T extends TextDocument<object> = TextDocument> {
    /** Documents fetched */
    readonly documents: readonly T[];

    /** Documents on this page that could not be read */
    readonly failures?: readonly ReadFailure[];

    /** Cursor for next fetch (provider-specific) */
    readonly cursor?: string;

    /** Whether there are more documents available */
    readonly hasMore: boolean;
}

/**
 * DocumentProvider interface.
 *
 * Providers are responsible for:
 * - Connecting to data sources (directory, archive, database, etc.)
 * - Converting raw data to the TextDocument shape
 * - Reporting unreadable items as failures instead of throwing
 *
 * @example
 * ```typescript
 * class ArrayProvider implements DocumentProvider {
 *     readonly id = "array-provider";
 *     readonly name = "Array Provider";
 *
 *     constructor(private readonly items: TextDocument[]) {}
 *
 *     async getDocuments(options?: FetchOptions) {
 *         const start = Number(options?.cursor ?? 0);
 *         const end = start + (options?.limit ?? 10);
 *         return {
 *             documents: this.items.slice(start, end),
 *             cursor   : String(end),
 *             hasMore  : end < this.items.length,
 *         };
 *     }
 * }
 * ```
 */
export interface DocumentProvider<T extends TextDocument<object> = TextDocument> {
    /** Unique identifier for this provider */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Optional description */
    readonly description?: string;

    /**
     * Initialize the provider.
     * Called once at the start of every batch run.
     */
    initialize?(): Promise<void>;

    /**
     * Fetch one page of documents from the data source.
     *
     * @param options - Fetch options (limit, cursor, etc.)
     * @returns Fetch result with documents, failures and cursor
     */
    getDocuments(options?: FetchOptions): Promise<FetchResult<T>>;

    /**
     * Shutdown the provider.
     * Called once at the end of every batch run, even when it failed.
     */
    shutdown?(): Promise<void>;
}
