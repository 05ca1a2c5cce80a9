/**
 * @fileoverview Text Pass Contract
 *
 * A text pass is one `text → text` rewrite inside a stage. Stages that
 * rewrite text are an ordered list of passes; the order is part of the
 * stage's behavior and is exposed for inspection.
 *
 * @module @scriptorium/engine/contracts/TextPass
 */

/**
 * A single named text rewrite.
 *
 * Passes hold no state beyond the static tables they close over, and must
 * be idempotent on their own output.
 */
export interface TextPass {
    /** Stable pass name, used in traces */
    readonly name: string;

    /** Rewrite the text */
    apply(text: string): string;
}

/**
 * Observer called after each pass, e.g. for debug logging.
 */
export type PassObserver = (name: string, before: string, after: string) => void;

/**
 * Create a frozen text pass.
 */
export function createTextPass(name: string, apply: (text: string) => string): TextPass {
    return Object.freeze({ name, apply });
}

/**
 * Run passes in order, feeding each pass the previous pass's output.
 *
 * @param passes - Ordered passes
 * @param text - Input text
 * @param observe - Optional observer called after every pass
 * @returns The output of the last pass
 */
export function runPasses(
    passes: readonly TextPass[],
    text: string,
    observe?: PassObserver
): string {
    let current = text;

    for (const pass of passes) {
        const next = pass.apply(current);
        observe?.(pass.name, current, next);
        current = next;
    }

    return current;
}
