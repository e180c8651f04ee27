/**
 * Batch pipeline for many trajectories.
 *
 * Stage 1 summarizes every trajectory independently through a
 * {@link SummaryExecutor} (in-process by default; a worker pool can be
 * plugged in). Stage 2 starts only after every summary has settled and folds
 * each group sequentially.
 */

import type { GridMeasures, TrajectorySummary } from '../grid-types.js';
import { Grid } from './aggregator.js';
import type { Quantizer } from './quantizer.js';
import { reduceSummaries, summarizeTrajectory } from './summary.js';
import { Trajectory } from './trajectory.js';
import type { TrajectoryInput } from './trajectory.js';
import type { GridLogger, QuantizationConfig } from './types.js';

export interface IdGenerator {
    next(): string;
}

/** Hands out `${prefix}1`, `${prefix}2`, ... Each instance counts on its own. */
export class SequentialIdGenerator implements IdGenerator {
    private counter: number;

    constructor(private readonly prefix: string = 'trajectory-', start: number = 1) {
        this.counter = start;
    }

    next(): string {
        return `${this.prefix}${this.counter++}`;
    }
}

/** Trajectory input whose id may be assigned by an {@link IdGenerator}. */
export type BatchTrajectoryInput = Omit<TrajectoryInput, 'id'> & { id?: string };

export interface BatchGroup {
    id?: string;
    trajectories: readonly BatchTrajectoryInput[];
}

export type SummaryExecutor = (
    trajectory: Trajectory,
    quantizer: Quantizer
) => TrajectorySummary | Promise<TrajectorySummary>;

export interface BatchOptions {
    /** Source of ids for inputs without one. Default: a fresh SequentialIdGenerator. */
    idGenerator?: IdGenerator;
    /** Explicit quantization applied to every group. */
    quantization?: QuantizationConfig;
    executor?: SummaryExecutor;
    /** Also report one measures row per trajectory. Default: false. */
    perTrajectory?: boolean;
    logger?: GridLogger | null;
}

export interface BatchGroupResult {
    groupId: string;
    combined: GridMeasures;
    /**
     * Per-trajectory rows, measured under the group's shared quantization.
     * Empty unless `perTrajectory` is set.
     */
    perTrajectory: GridMeasures[];
}

export function createTrajectories(
    inputs: readonly BatchTrajectoryInput[],
    idGenerator: IdGenerator
): Trajectory[] {
    return inputs.map((input) => new Trajectory({ ...input, id: input.id ?? idGenerator.next() }));
}

export async function measureBatch(
    groups: readonly BatchGroup[],
    options: BatchOptions = {}
): Promise<BatchGroupResult[]> {
    const idGenerator = options.idGenerator ?? new SequentialIdGenerator();
    const executor = options.executor ?? summarizeTrajectory;
    const logger = options.logger ?? null;

    const grids = groups.map((group) => new Grid(
        createTrajectories(group.trajectories, idGenerator),
        { quantization: options.quantization, logger }
    ));

    const summaries = await Promise.all(grids.map((grid) => {
        const quantizer = grid.quantizer;
        return Promise.all(grid.trajectories.map(async (trajectory) => executor(trajectory, quantizer)));
    }));

    const results = grids.map((grid, i): BatchGroupResult => ({
        groupId: groups[i].id ?? `group-${i + 1}`,
        combined: reduceSummaries(summaries[i], logger),
        perTrajectory: options.perTrajectory ? summaries[i].map((s) => reduceSummaries([s], logger)) : [],
    }));
    logger?.info?.(`[batch] measured ${results.length} groups, ${grids.reduce((n, g) => n + g.size, 0)} trajectories`);
    return results;
}
