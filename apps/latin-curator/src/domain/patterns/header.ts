/**
 * @fileoverview Declared document header
 *
 * A source file may open with `Key: value` lines closed by a line of four
 * or more dashes:
 *
 * ```text
 * Title: De Bello Gallico
 * Category: Latinitas_Romana
 * Text Type: prose
 * ----
 * Gallia est omnis divisa in partes tres...
 * ```
 *
 * The separator must appear within the first 20 lines, every non-blank
 * line before it must be a field, and there must be at least one field.
 * Anything else means the document has no header.
 *
 * @module latin-curator/domain/patterns/header
 */

export const kHEADER_SEPARATOR = /^\s*-{4,}\s*$/;
export const kHEADER_FIELD = /^([\p{L}][\p{L} ]{0,30}):\s*(.*)$/u;
export const kHEADER_SCAN_LINES = 20;

export interface HeaderMetadata {
    readonly title?: string;
    readonly source?: string;
    readonly category?: string;
    readonly textType?: string;

    /** Every declared field, keyed as written */
    readonly fields: Readonly<Record<string, string>>;
}

export interface HeaderSplit {
    /** Parsed header, absent when the document declares none */
    readonly header?: HeaderMetadata;

    /** All lines of the document */
    readonly lines: readonly string[];

    /** Index of the first body line (0 without a header) */
    readonly bodyStart: number;
}

const kEMPTY_HEADER: HeaderMetadata = Object.freeze({ fields: Object.freeze({}) });

/**
 * Locate and parse the header.
 */
export function splitHeader(text: string): HeaderSplit {
    const lines = text.split(/\r?\n/);
    const limit = Math.min(lines.length, kHEADER_SCAN_LINES);
    const fields: Record<string, string> = {};
    let fieldCount = 0;

    for (let index = 0; index < limit; index++) {
        const line = lines[index];

        if (kHEADER_SEPARATOR.test(line)) {
            if (fieldCount === 0) {
                break;
            }
            return { header: buildHeader(fields), lines, bodyStart: index + 1 };
        }

        if (line.trim() === "") {
            continue;
        }

        const match = kHEADER_FIELD.exec(line.trim());
        if (!match) {
            break;
        }

        fields[match[1].trim()] = match[2].trim();
        fieldCount += 1;
    }

    return { lines, bodyStart: 0 };
}

/**
 * Parsed header, or an empty header (no fields) when none is declared.
 */
export function parseHeader(text: string): HeaderMetadata {
    return splitHeader(text).header ?? kEMPTY_HEADER;
}

/**
 * Body lines after the header (all lines without one).
 */
export function bodyLines(text: string): readonly string[] {
    const { lines, bodyStart } = splitHeader(text);
    return lines.slice(bodyStart);
}

/**
 * Document title: the declared one, else the file name without extension.
 */
export function titleOf(header: HeaderMetadata, documentId: string): string {
    return header.title ?? documentId.replace(/\.[^./\\]+$/, "");
}

function buildHeader(fields: Record<string, string>): HeaderMetadata {
    let title: string | undefined;
    let source: string | undefined;
    let category: string | undefined;
    let textType: string | undefined;

    for (const [key, value] of Object.entries(fields)) {
        if (value === "") {
            continue;
        }
        switch (key.toLowerCase()) {
            case "title":
                title = value;
                break;
            case "source":
                source = value;
                break;
            case "category":
                category = value;
                break;
            case "text type":
                textType = value;
                break;
        }
    }

    return Object.freeze({ title, source, category, textType, fields: Object.freeze({ ...fields }) });
}
