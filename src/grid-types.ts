/**
 * Core data types shared by the quantizer, trajectories, grids and measures.
 *
 * Everything here is plain data: safe to clone, freeze, or hand to another
 * worker.
 */
import type { AxisValue } from './grid/types.js';

// ============================================================================
// Quantization
// ============================================================================

/**
 * Resolved quantization of one axis.
 *
 * `min`, `max` and `cellSize` are expressed in rank units: the raw value
 * itself on numeric axes, the position in `order` on ordered axes.
 */
export interface AxisQuantization {
    kind: 'numeric' | 'ordered';
    /** Explicit order on ordered axes, `null` on numeric axes. */
    order: readonly AxisValue[] | null;
    min: number;
    max: number;
    cellSize: number;
    /** Number of cells on this axis: `floor((max - min) / cellSize) + 1`. */
    cellCount: number;
}

export interface Quantization {
    x: AxisQuantization;
    y: AxisQuantization;
}

// ============================================================================
// Trajectory data
// ============================================================================

/** Discrete (x, y) bin on the shared grid. */
export interface Cell {
    x: number;
    y: number;
}

/** A single raw sample with the timestep it covers. */
export interface GridEvent {
    x: AxisValue;
    y: AxisValue;
    start: number;
    end: number;
    duration: number;
}

/**
 * A maximal run of consecutive events in one cell. Each state is one visit.
 */
export interface State {
    cell: Cell;
    start: number;
    end: number;
    duration: number;
    eventCount: number;
}

export interface CellTotal {
    cell: Cell;
    duration: number;
    visits: number;
}

// ============================================================================
// Measures
// ============================================================================

/**
 * Base values of one trajectory under a given quantization. This is the unit
 * of independent (parallelizable) work; reduction folds these into
 * {@link GridMeasures}.
 */
export interface TrajectorySummary {
    id: string;
    duration: number;
    eventCount: number;
    visitCount: number;
    cellRange: number;
    /** `NaN` when undefined (single-cell grid or zero duration). */
    dispersion: number;
    /** Visit count per cell key (`"x,y"`). */
    cellVisits: Record<string, number>;
}

/**
 * Statistics for one or more trajectories evaluated together.
 * Numeric fields use `NaN` for measures that are undefined for the input.
 */
export interface GridMeasures {
    readonly trajectoryIds: readonly string[];
    readonly meanDuration: number;
    readonly meanNumberOfEvents: number;
    readonly meanNumberOfVisits: number;
    readonly meanCellRange: number;
    readonly overallCellRange: number;
    readonly meanDurationPerEvent: number;
    readonly meanDurationPerVisit: number;
    readonly meanDurationPerCell: number;
    readonly dispersion: number;
    readonly visitedEntropy: number;
    /** Trajectories whose dispersion was undefined and left out of `dispersion`. */
    readonly dispersionExcludedIds: readonly string[];
}

export const UNDEFINED_MEASURE = Number.NaN;

export function isUndefinedMeasure(value: number): boolean {
    return Number.isNaN(value);
}

export function cellKey(cell: Cell): string {
    return `${cell.x},${cell.y}`;
}
