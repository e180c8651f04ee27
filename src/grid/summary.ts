/**
 * Two-stage measure computation.
 *
 * `summarizeTrajectory` is pure and independent per trajectory, so callers
 * may fan it out across workers. `reduceSummaries` is the sequential fold
 * that must run once every summary is available.
 */

import { cellKey, UNDEFINED_MEASURE } from '../grid-types.js';
import type { GridMeasures, TrajectorySummary } from '../grid-types.js';
import { ComputeError } from './errors.js';
import type { Quantizer } from './quantizer.js';
import type { Trajectory } from './trajectory.js';
import type { GridLogger } from './types.js';

export function summarizeTrajectory(trajectory: Trajectory, quantizer: Quantizer): TrajectorySummary {
    const totals = trajectory.cellTotals(quantizer);
    const cellVisits: Record<string, number> = {};
    for (const total of totals.values()) {
        cellVisits[cellKey(total.cell)] = total.visits;
    }
    return {
        id: trajectory.id,
        duration: trajectory.duration,
        eventCount: trajectory.eventCount,
        visitCount: trajectory.numVisits(quantizer),
        cellRange: totals.size,
        dispersion: trajectory.dispersion(quantizer.totalCells, quantizer),
        cellVisits,
    };
}

/**
 * Folds per-trajectory summaries into one {@link GridMeasures} record.
 *
 * Means skip undefined (`NaN`) per-trajectory values; a mean with nothing
 * left to average is itself `NaN`.
 * @throws ComputeError when no summaries are given.
 */
export function reduceSummaries(
    summaries: readonly TrajectorySummary[],
    logger?: GridLogger | null
): GridMeasures {
    if (summaries.length === 0) {
        throw new ComputeError('At least one trajectory is required to compute measures');
    }

    const combinedVisits = new Map<string, number>();
    for (const summary of summaries) {
        for (const [key, visits] of Object.entries(summary.cellVisits)) {
            combinedVisits.set(key, (combinedVisits.get(key) ?? 0) + visits);
        }
    }

    const dispersionExcludedIds = summaries
        .filter((s) => Number.isNaN(s.dispersion))
        .map((s) => s.id);
    if (dispersionExcludedIds.length > 0) {
        logger?.warn?.(
            `[measures] dispersion undefined for ${dispersionExcludedIds.length} trajectories, excluded from mean: ${dispersionExcludedIds.join(', ')}`
        );
    }

    return Object.freeze({
        trajectoryIds: Object.freeze(summaries.map((s) => s.id)),
        meanDuration: mean(summaries.map((s) => s.duration)),
        meanNumberOfEvents: mean(summaries.map((s) => s.eventCount)),
        meanNumberOfVisits: mean(summaries.map((s) => s.visitCount)),
        meanCellRange: mean(summaries.map((s) => s.cellRange)),
        overallCellRange: combinedVisits.size,
        meanDurationPerEvent: mean(summaries.map((s) => ratio(s.duration, s.eventCount))),
        meanDurationPerVisit: mean(summaries.map((s) => ratio(s.duration, s.visitCount))),
        meanDurationPerCell: mean(summaries.map((s) => ratio(s.duration, s.cellRange))),
        dispersion: mean(summaries.map((s) => s.dispersion)),
        visitedEntropy: entropy(combinedVisits),
        dispersionExcludedIds: Object.freeze(dispersionExcludedIds),
    });
}

/**
 * Running mean (Welford update) over the defined values. Averaging k copies
 * of one value returns that value exactly.
 */
export function mean(values: readonly number[]): number {
    let m = 0;
    let n = 0;
    for (const value of values) {
        if (Number.isNaN(value)) continue;
        n++;
        m += (value - m) / n;
    }
    return n > 0 ? m : UNDEFINED_MEASURE;
}

function ratio(numerator: number, denominator: number): number {
    return denominator === 0 ? UNDEFINED_MEASURE : numerator / denominator;
}

/**
 * Shannon entropy (natural log) of the combined visit distribution.
 * Cells are summed in key order so the result does not depend on input order.
 */
export function entropy(visits: ReadonlyMap<string, number>): number {
    let total = 0;
    for (const v of visits.values()) total += v;
    if (total <= 0) return UNDEFINED_MEASURE;

    let h = 0;
    for (const key of [...visits.keys()].sort()) {
        const v = visits.get(key) ?? 0;
        if (v <= 0) continue;
        const p = v / total;
        h -= p * Math.log(p);
    }
    return h;
}
