/**
 * Trajectory: one time-ordered sequence of (x, y) samples.
 *
 * Timestamps are fenceposts around the samples, so there is exactly one more
 * timestamp than samples; event i spans [t[i], t[i + 1]).
 */

import { cellKey, UNDEFINED_MEASURE } from '../grid-types.js';
import type { Cell, CellTotal, GridEvent, State } from '../grid-types.js';
import { ValidationError } from './errors.js';
import { parseQuantizationConfig, Quantizer } from './quantizer.js';
import type { AxisValue, QuantizationConfig } from './types.js';

export interface TrajectoryInput {
    /** Caller-supplied identifier. Batch code takes ids from an explicit IdGenerator. */
    id: string;
    x: readonly AxisValue[];
    y: readonly AxisValue[];
    /** Timestamps, one more than samples. */
    t: readonly number[];
    /** Quantization this trajectory expects; members of one Grid must agree on it. */
    quantization?: QuantizationConfig;
}

/**
 * Coalesces consecutive states in the same cell. Applied to events (as
 * one-event states) this yields the dwell-runs; applied to an already merged
 * sequence it returns an equal sequence.
 */
export function mergeRuns(states: readonly State[]): State[] {
    const merged: State[] = [];
    for (const state of states) {
        const last = merged[merged.length - 1];
        if (last && last.cell.x === state.cell.x && last.cell.y === state.cell.y) {
            merged[merged.length - 1] = {
                cell: last.cell,
                start: last.start,
                end: state.end,
                duration: last.duration + state.duration,
                eventCount: last.eventCount + state.eventCount,
            };
        } else {
            merged.push({ ...state, cell: { ...state.cell } });
        }
    }
    return merged;
}

export class Trajectory {
    readonly id: string;
    readonly events: readonly GridEvent[];
    readonly quantization: QuantizationConfig | undefined;

    private readonly xValues: readonly AxisValue[];
    private readonly yValues: readonly AxisValue[];
    private readonly timestamps: readonly number[];
    private ownQuantizer: Quantizer | null = null;
    private readonly statesByQuantizer = new WeakMap<Quantizer, readonly State[]>();

    constructor(input: TrajectoryInput) {
        validateInput(input);

        this.id = input.id;
        this.xValues = [...input.x];
        this.yValues = [...input.y];
        this.timestamps = [...input.t];
        this.quantization = input.quantization !== undefined
            ? parseQuantizationConfig(input.quantization)
            : undefined;

        const events: GridEvent[] = [];
        for (let i = 0; i < this.xValues.length; i++) {
            const start = this.timestamps[i];
            const end = this.timestamps[i + 1];
            events.push({ x: this.xValues[i], y: this.yValues[i], start, end, duration: end - start });
        }
        this.events = events;
    }

    get x(): readonly AxisValue[] {
        return this.xValues;
    }

    get y(): readonly AxisValue[] {
        return this.yValues;
    }

    get t(): readonly number[] {
        return this.timestamps;
    }

    get eventCount(): number {
        return this.events.length;
    }

    /** Total duration: last timestamp minus first. */
    get duration(): number {
        return this.timestamps[this.timestamps.length - 1] - this.timestamps[0];
    }

    /**
     * Quantizer used when none is passed explicitly: inferred from this
     * trajectory's own samples on first use, or the one set by
     * {@link useQuantizer}.
     */
    get quantizer(): Quantizer {
        if (!this.ownQuantizer) {
            this.ownQuantizer = Quantizer.fromSamples(this.xValues, this.yValues, this.quantization);
        }
        return this.ownQuantizer;
    }

    /** Overrides the lazily inferred quantizer. */
    useQuantizer(quantizer: Quantizer): void {
        this.ownQuantizer = quantizer;
    }

    /** Cell of every event, in order. */
    cells(quantizer: Quantizer = this.quantizer): Cell[] {
        return this.events.map((event) => quantizer.cellOf(event.x, event.y));
    }

    /**
     * Dwell-runs: consecutive events in the same cell merged into one state.
     * Results are cached per quantizer and frozen, states and cells included.
     */
    mergeStates(quantizer: Quantizer = this.quantizer): readonly State[] {
        const cached = this.statesByQuantizer.get(quantizer);
        if (cached) return cached;

        const single = this.events.map((event): State => ({
            cell: quantizer.cellOf(event.x, event.y),
            start: event.start,
            end: event.end,
            duration: event.duration,
            eventCount: 1,
        }));
        const states = Object.freeze(
            mergeRuns(single).map((state) => Object.freeze({ ...state, cell: Object.freeze(state.cell) }))
        );
        this.statesByQuantizer.set(quantizer, states);
        return states;
    }

    numVisits(quantizer: Quantizer = this.quantizer): number {
        return this.mergeStates(quantizer).length;
    }

    /** Distinct cells visited; a revisited cell counts once. */
    cellRange(quantizer: Quantizer = this.quantizer): number {
        return this.cellTotals(quantizer).size;
    }

    /** Cumulative duration and visit count per visited cell, keyed by `"x,y"`. */
    cellTotals(quantizer: Quantizer = this.quantizer): Map<string, CellTotal> {
        const totals = new Map<string, CellTotal>();
        for (const state of this.mergeStates(quantizer)) {
            const key = cellKey(state.cell);
            const existing = totals.get(key);
            if (existing) {
                existing.duration += state.duration;
                existing.visits += 1;
            } else {
                totals.set(key, { cell: { ...state.cell }, duration: state.duration, visits: 1 });
            }
        }
        return totals;
    }

    cellDurations(quantizer: Quantizer = this.quantizer): Map<string, number> {
        const durations = new Map<string, number>();
        for (const [key, total] of this.cellTotals(quantizer)) durations.set(key, total.duration);
        return durations;
    }

    /**
     * How evenly the duration spreads over the grid:
     * `1 - (n * sum((d_i / D)^2) - 1) / (n - 1)` with n the grid's cell count.
     * D is the sum of the cell durations; the result is clamped to [0, 1].
     * Returns `NaN` when n = 1 or the trajectory has zero duration.
     */
    dispersion(totalCells?: number, quantizer: Quantizer = this.quantizer): number {
        const n = totalCells ?? quantizer.totalCells;
        const durations = Array.from(this.cellDurations(quantizer).values());
        const total = durations.reduce((sum, d) => sum + d, 0);
        if (n <= 1 || total <= 0) return UNDEFINED_MEASURE;

        let sumSquares = 0;
        for (const d of durations) {
            const share = d / total;
            sumSquares += share * share;
        }
        return Math.min(1, Math.max(0, 1 - ((n * sumSquares - 1) / (n - 1))));
    }
}

function validateInput(input: TrajectoryInput): void {
    const { id, x, y, t } = input;
    if (typeof id !== 'string' || id.length === 0) {
        throw new ValidationError('Trajectory id must be a non-empty string');
    }
    if (x.length !== y.length || t.length !== x.length + 1) {
        throw new ValidationError(
            `Trajectory ${id}: expected ${x.length + 1} timestamps for ${x.length} x and ${y.length} y values; got ${t.length}`
        );
    }
    for (let i = 0; i < t.length; i++) {
        if (typeof t[i] !== 'number' || !Number.isFinite(t[i])) {
            throw new ValidationError(`Trajectory ${id}: timestamp ${i} is not a finite number`);
        }
        if (i > 0 && t[i] < t[i - 1]) {
            throw new ValidationError(`Trajectory ${id}: timestamps must not decrease (index ${i})`);
        }
    }
    for (const [axis, values] of [['x', x], ['y', y]] as const) {
        values.forEach((value, i) => {
            const valid = typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
            if (!valid) {
                throw new ValidationError(`Trajectory ${id}: ${axis}[${i}] must be a finite number or a string`);
            }
        });
    }
}
