/**
 * Quantizer: maps raw (x, y) values to discrete grid cells.
 *
 * Each axis is resolved independently from an optional {@link AxisConfig}
 * and the values observed across every trajectory quantized together.
 * A resolved quantizer is immutable; a Grid keeps one for its lifetime.
 */

import type { AxisQuantization, Cell, Quantization } from '../grid-types.js';
import { AxisOrdering } from './axis.js';
import { ConfigError } from './errors.js';
import { describeIssues, quantizationConfigSchema } from './schemas.js';
import type { AxisConfig, AxisName, AxisValue, QuantizationConfig } from './types.js';

const DEFAULT_CELL_SIZE = 1;
/** Relative slack for offsets that land on a cell boundary up to rounding error. */
const BOUNDARY_EPSILON = 1e-9;

/**
 * Validates a caller-supplied configuration object.
 * @throws ConfigError when the object does not describe a quantization.
 */
export function parseQuantizationConfig(config: unknown): QuantizationConfig {
    const parsed = quantizationConfigSchema.safeParse(config ?? {});
    if (!parsed.success) {
        throw new ConfigError(`Invalid quantization config: ${describeIssues(parsed.error)}`, parsed.error);
    }
    return parsed.data;
}

export class Quantizer {
    readonly quantization: Quantization;
    private readonly orderings: Record<AxisName, AxisOrdering>;

    private constructor(quantization: Quantization, orderings: Record<AxisName, AxisOrdering>) {
        this.quantization = Object.freeze(quantization);
        this.orderings = orderings;
    }

    /**
     * Resolves a quantizer from the raw values of every trajectory that will
     * share it. Unset bounds default to the observed extrema.
     */
    static fromSamples(
        xValues: Iterable<AxisValue>,
        yValues: Iterable<AxisValue>,
        config?: QuantizationConfig
    ): Quantizer {
        const parsed = parseQuantizationConfig(config);
        const x = resolveAxis('x', Array.from(xValues), parsed.x ?? {}, false);
        const y = resolveAxis('y', Array.from(yValues), parsed.y ?? {}, false);
        return new Quantizer({ x: x.quantization, y: y.quantization }, { x: x.ordering, y: y.ordering });
    }

    /**
     * Builds a quantizer from configuration alone. Numeric axes need both
     * `min` and `max`; ordered axes need an `order`.
     */
    static fromConfig(config: QuantizationConfig): Quantizer {
        const parsed = parseQuantizationConfig(config);
        const x = resolveAxis('x', [], parsed.x ?? {}, true);
        const y = resolveAxis('y', [], parsed.y ?? {}, true);
        return new Quantizer({ x: x.quantization, y: y.quantization }, { x: x.ordering, y: y.ordering });
    }

    /** Number of realizable cells on the grid. */
    get totalCells(): number {
        return this.quantization.x.cellCount * this.quantization.y.cellCount;
    }

    /**
     * Cell index of a raw value on one axis.
     * @throws ConfigError for values outside the order or the configured range.
     */
    indexOf(axis: AxisName, value: AxisValue): number {
        const q = this.quantization[axis];
        const rank = this.orderings[axis].rankOf(value);
        if (rank < q.min || rank > q.max) {
            throw new ConfigError(
                `Value ${JSON.stringify(value)} on axis ${axis} is outside the quantized range [${q.min}, ${q.max}]`
            );
        }
        return binIndex(rank - q.min, q.cellSize);
    }

    cellOf(x: AxisValue, y: AxisValue): Cell {
        return { x: this.indexOf('x', x), y: this.indexOf('y', y) };
    }

    /** Raw values that fall into an axis cell, for ordered axes; `null` on numeric axes. */
    labelsOf(axis: AxisName, index: number): AxisValue[] | null {
        const q = this.quantization[axis];
        if (!q.order) return null;
        const first = q.min + index * q.cellSize;
        return q.order.filter((_, rank) => rank >= first && rank < first + q.cellSize && rank <= q.max);
    }
}

export function sameQuantization(a: Quantization, b: Quantization): boolean {
    return sameAxis(a.x, b.x) && sameAxis(a.y, b.y);
}

function sameAxis(a: AxisQuantization, b: AxisQuantization): boolean {
    if (a.kind !== b.kind || a.min !== b.min || a.max !== b.max || a.cellSize !== b.cellSize) return false;
    if (a.order === null || b.order === null) return a.order === b.order;
    return a.order.length === b.order.length && a.order.every((value, i) => value === b.order?.[i]);
}

function resolveAxis(
    axis: AxisName,
    values: AxisValue[],
    config: AxisConfig,
    requireBounds: boolean
): { ordering: AxisOrdering; quantization: AxisQuantization } {
    const ordering = AxisOrdering.resolve(axis, values, config.order);
    const cellSize = config.cellSize ?? DEFAULT_CELL_SIZE;

    let min: number;
    let max: number;
    if (ordering.order) {
        // The order itself spans the axis unless min/max narrow it.
        min = config.min !== undefined ? ordering.rankOf(config.min) : 0;
        max = config.max !== undefined ? ordering.rankOf(config.max) : ordering.order.length - 1;
    } else {
        if (requireBounds && (config.min === undefined || config.max === undefined)) {
            throw new ConfigError(`Numeric axis ${axis} needs both min and max when no samples are given`);
        }
        const ranks = values.map((value) => ordering.rankOf(value));
        min = config.min !== undefined ? numericBound(axis, 'min', config.min) : extremum(ranks, Math.min);
        max = config.max !== undefined ? numericBound(axis, 'max', config.max) : extremum(ranks, Math.max);
    }

    if (min > max) {
        throw new ConfigError(`Axis ${axis} has min ${min} greater than max ${max}`);
    }
    for (const value of values) {
        const rank = ordering.rankOf(value);
        if (rank < min || rank > max) {
            throw new ConfigError(`Value ${JSON.stringify(value)} on axis ${axis} is outside the quantized range [${min}, ${max}]`);
        }
    }

    const quantization: AxisQuantization = {
        kind: ordering.kind,
        order: ordering.order,
        min,
        max,
        cellSize,
        cellCount: binIndex(max - min, cellSize) + 1,
    };
    return { ordering, quantization };
}

/** `floor(offset / cellSize)`, snapping ratios within rounding error of an integer onto it. */
function binIndex(offset: number, cellSize: number): number {
    const ratio = offset / cellSize;
    const nearest = Math.round(ratio);
    if (Math.abs(ratio - nearest) <= BOUNDARY_EPSILON * Math.max(1, Math.abs(ratio))) return nearest;
    return Math.floor(ratio);
}

function numericBound(axis: AxisName, name: 'min' | 'max', value: AxisValue): number {
    if (typeof value !== 'number') {
        throw new ConfigError(`Numeric axis ${axis} needs a numeric ${name}; got ${JSON.stringify(value)}`);
    }
    return value;
}

/** Observed extremum; an axis without samples collapses to a single cell at 0. */
function extremum(ranks: number[], pick: (...values: number[]) => number): number {
    if (ranks.length === 0) return 0;
    return ranks.reduce((acc, rank) => pick(acc, rank));
}
