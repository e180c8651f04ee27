/**
 * Grid: trajectories sharing one quantization.
 *
 * The quantization is resolved lazily from the union of every member's raw
 * values (plus the explicit config, if any) and is fixed from then on: later
 * members must fit it. Per-cell totals are accumulated in one pass and cached
 * until membership changes.
 */

import type { CellTotal, GridMeasures, State, TrajectorySummary } from '../grid-types.js';
import { ConfigError, ValidationError } from './errors.js';
import { parseQuantizationConfig, Quantizer } from './quantizer.js';
import { reduceSummaries, summarizeTrajectory } from './summary.js';
import type { Trajectory } from './trajectory.js';
import type { GridLogger, GridOptions, QuantizationConfig } from './types.js';

export class Grid {
    private readonly members = new Map<string, Trajectory>();
    private readonly logger: GridLogger | null;
    private readonly explicitConfig: QuantizationConfig | undefined;
    private memberConfig: QuantizationConfig | undefined;
    private resolved: Quantizer | null = null;
    private totals: Map<string, CellTotal> | null = null;

    constructor(trajectories: Iterable<Trajectory> = [], options: GridOptions = {}) {
        this.logger = options.logger ?? null;
        this.explicitConfig = options.quantization !== undefined
            ? parseQuantizationConfig(options.quantization)
            : undefined;
        this.addTrajectories(...trajectories);
    }

    /**
     * Adds members. Once the quantization is resolved, new members must fit
     * it; a Grid never re-quantizes. Nothing is admitted, and no member
     * config is adopted, unless the whole batch passes.
     * @throws ValidationError on duplicate ids
     * @throws ConfigError on mismatched quantization configs or values outside the resolved grid
     */
    addTrajectories(...trajectories: Trajectory[]): void {
        const incoming = new Set<string>();
        let adopted = this.memberConfig;
        for (const trajectory of trajectories) {
            if (this.members.has(trajectory.id) || incoming.has(trajectory.id)) {
                throw new ValidationError(`Duplicate trajectory id in grid: ${trajectory.id}`);
            }
            incoming.add(trajectory.id);
            adopted = this.checkConfig(trajectory, adopted);
            if (this.resolved) {
                const quantizer = this.resolved;
                trajectory.events.forEach((event) => quantizer.cellOf(event.x, event.y));
            }
        }
        for (const trajectory of trajectories) {
            this.members.set(trajectory.id, trajectory);
        }
        this.memberConfig = adopted;
        if (trajectories.length > 0) this.totals = null;
    }

    get trajectories(): Trajectory[] {
        return Array.from(this.members.values());
    }

    get size(): number {
        return this.members.size;
    }

    get quantizer(): Quantizer {
        if (!this.resolved) {
            const members = this.trajectories;
            const config = this.explicitConfig ?? this.memberConfig;
            this.resolved = Quantizer.fromSamples(
                members.flatMap((m) => m.x),
                members.flatMap((m) => m.y),
                config
            );
            const { x, y } = this.resolved.quantization;
            this.logger?.info?.(
                `[grid] quantization resolved from ${members.length} trajectories: ` +
                `x ${x.kind} [${x.min}, ${x.max}] step ${x.cellSize}, y ${y.kind} [${y.min}, ${y.max}] step ${y.cellSize}`
            );
        }
        return this.resolved;
    }

    get totalCells(): number {
        return this.quantizer.totalCells;
    }

    /** Merged states of one member under the shared quantization. */
    states(id: string): readonly State[] {
        const trajectory = this.members.get(id);
        if (!trajectory) {
            throw new ValidationError(`Unknown trajectory id: ${id}`);
        }
        return trajectory.mergeStates(this.quantizer);
    }

    /** Duration and visit totals per cell across every member, keyed by `"x,y"`. */
    cellTotals(): ReadonlyMap<string, CellTotal> {
        if (!this.totals) {
            const quantizer = this.quantizer;
            const totals = new Map<string, CellTotal>();
            for (const trajectory of this.members.values()) {
                for (const [key, total] of trajectory.cellTotals(quantizer)) {
                    const existing = totals.get(key);
                    if (existing) {
                        existing.duration += total.duration;
                        existing.visits += total.visits;
                    } else {
                        totals.set(key, { ...total, cell: { ...total.cell } });
                    }
                }
            }
            this.totals = totals;
        }
        return this.totals;
    }

    summaries(): TrajectorySummary[] {
        const quantizer = this.quantizer;
        return this.trajectories.map((trajectory) => summarizeTrajectory(trajectory, quantizer));
    }

    getMeasures(): GridMeasures {
        return reduceSummaries(this.summaries(), this.logger);
    }

    /** Returns the member config in force once `trajectory` is admitted. */
    private checkConfig(
        trajectory: Trajectory,
        adopted: QuantizationConfig | undefined
    ): QuantizationConfig | undefined {
        if (trajectory.quantization === undefined) return adopted;
        const config = parseQuantizationConfig(trajectory.quantization);
        const expected = this.explicitConfig ?? adopted;
        if (expected === undefined) {
            if (this.resolved) {
                throw new ConfigError(
                    `Trajectory ${trajectory.id} carries a quantization config but the grid was resolved without one`
                );
            }
            return config;
        }
        if (JSON.stringify(expected) !== JSON.stringify(config)) {
            throw new ConfigError(
                `Trajectory ${trajectory.id} carries a quantization config that differs from the rest of the grid`
            );
        }
        return adopted;
    }
}
