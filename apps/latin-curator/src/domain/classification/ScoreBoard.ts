/**
 * @fileoverview Score board for one classification axis
 *
 * Holds exactly one score per label and the signals that produced them.
 *
 * @module latin-curator/domain/classification/ScoreBoard
 */

import type { Signal, SignalSource } from "./types.js";

export class ScoreBoard<TLabel extends string> {
    private readonly scores: Record<TLabel, number>;
    private readonly order: readonly TLabel[];
    private readonly recorded: Signal<TLabel>[] = [];

    /**
     * @param initial - Every label at zero
     * @param order - Tie-break order, first wins
     */
    constructor(initial: Record<TLabel, number>, order: readonly TLabel[]) {
        this.scores = { ...initial };
        this.order = order;
    }

    add(source: SignalSource, label: TLabel, weight: number, evidence: string): void {
        this.scores[label] += weight;
        this.recorded.push(Object.freeze({ source, label, weight, evidence }));
    }

    score(label: TLabel): number {
        return this.scores[label];
    }

    isEmpty(): boolean {
        return this.order.every(label => this.scores[label] === 0);
    }

    /**
     * Highest-scoring label; ties go to the earliest label in `order`.
     */
    leader(): TLabel {
        let best = this.order[0];
        for (const label of this.order) {
            if (this.scores[label] > this.scores[best]) {
                best = label;
            }
        }
        return best;
    }

    get signals(): readonly Signal<TLabel>[] {
        return Object.freeze([...this.recorded]);
    }

    /**
     * Source with the largest summed weight toward a label.
     */
    decisiveSource(label: TLabel): SignalSource | undefined {
        const totals = new Map<SignalSource, number>();
        for (const signal of this.recorded) {
            if (signal.label === label) {
                totals.set(signal.source, (totals.get(signal.source) ?? 0) + signal.weight);
            }
        }

        let best: SignalSource | undefined;
        let bestWeight = 0;
        for (const [source, weight] of totals) {
            if (weight > bestWeight) {
                best = source;
                bestWeight = weight;
            }
        }
        return best;
    }
}
