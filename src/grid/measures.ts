/**
 * Measure Engine.
 *
 * Measures for one or more trajectories evaluated together under one shared
 * quantization:
 *
 * - mean duration, number of events, number of visits and cell range
 * - overall cell range: distinct cells across all trajectories (a union, not a sum)
 * - mean duration per event / visit / cell: each ratio taken per trajectory, then averaged
 * - dispersion: mean of the per-trajectory dispersions that are defined
 * - visited entropy: Shannon entropy (natural log) of the combined visit distribution
 */

import type { GridMeasures } from '../grid-types.js';
import { Grid } from './aggregator.js';
import { ComputeError } from './errors.js';
import type { Trajectory } from './trajectory.js';
import type { GridOptions } from './types.js';

/**
 * @throws ComputeError when called without trajectories.
 */
export function getMeasures(...trajectories: Trajectory[]): GridMeasures {
    return measureTrajectories(trajectories);
}

/** {@link getMeasures} with grid options (explicit quantization, logger). */
export function measureTrajectories(trajectories: readonly Trajectory[], options: GridOptions = {}): GridMeasures {
    if (trajectories.length === 0) {
        throw new ComputeError('At least one trajectory is required to compute measures');
    }
    return new Grid(trajectories, options).getMeasures();
}

export function getMeanDuration(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).meanDuration;
}

export function getMeanNumberOfEvents(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).meanNumberOfEvents;
}

export function getMeanNumberOfVisits(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).meanNumberOfVisits;
}

export function getMeanCellRange(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).meanCellRange;
}

export function getOverallCellRange(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).overallCellRange;
}

export function getMeanDurationPerEvent(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).meanDurationPerEvent;
}

export function getMeanDurationPerVisit(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).meanDurationPerVisit;
}

export function getMeanDurationPerCell(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).meanDurationPerCell;
}

export function getMeanDispersion(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).dispersion;
}

export function getVisitedEntropy(...trajectories: Trajectory[]): number {
    return getMeasures(...trajectories).visitedEntropy;
}
