/**
 * statespace-grid Public API
 *
 * @module statespace-grid
 */

import { Grid } from './grid/aggregator.js';
import { getMeasures, measureTrajectories } from './grid/measures.js';
import { Quantizer } from './grid/quantizer.js';
import { parseMeasures, serializeMeasures } from './grid/table.js';
import { Trajectory } from './grid/trajectory.js';
import { measureBatch } from './grid/batch.js';

export type {
    AxisQuantization, Quantization, Cell, GridEvent, State, CellTotal, TrajectorySummary, GridMeasures,
} from './grid-types.js';
export { UNDEFINED_MEASURE, isUndefinedMeasure, cellKey } from './grid-types.js';
export type { AxisValue, AxisName, AxisConfig, QuantizationConfig, GridOptions, GridLogger } from './grid/types.js';
export { GridError, ValidationError, ConfigError, ComputeError } from './grid/errors.js';
export { AxisOrdering } from './grid/axis.js';
export { Quantizer, sameQuantization, parseQuantizationConfig } from './grid/quantizer.js';
export { Trajectory, mergeRuns } from './grid/trajectory.js';
export type { TrajectoryInput } from './grid/trajectory.js';
export { Grid } from './grid/aggregator.js';
export { summarizeTrajectory, reduceSummaries } from './grid/summary.js';
export {
    getMeasures,
    measureTrajectories,
    getMeanDuration,
    getMeanNumberOfEvents,
    getMeanNumberOfVisits,
    getMeanCellRange,
    getOverallCellRange,
    getMeanDurationPerEvent,
    getMeanDurationPerVisit,
    getMeanDurationPerCell,
    getMeanDispersion,
    getVisitedEntropy,
} from './grid/measures.js';
export { MEASURE_COLUMNS, toRow, fromRow, formatMeasure, serializeMeasures, parseMeasures } from './grid/table.js';
export type { TableOptions } from './grid/table.js';
export { SequentialIdGenerator, createTrajectories, measureBatch } from './grid/batch.js';
export type {
    IdGenerator, BatchTrajectoryInput, BatchGroup, SummaryExecutor, BatchOptions, BatchGroupResult,
} from './grid/batch.js';

// The StateSpaceGrid namespace object
export const StateSpaceGrid = {
    /**
     * Measures for one or more trajectories under one shared quantization.
     */
    measure: getMeasures,

    /**
     * Same as `measure`, with grid options (explicit quantization, logger).
     */
    measureWith: measureTrajectories,

    /**
     * Two-stage batch measurement of many trajectory groups.
     */
    measureBatch,

    /**
     * Flat table export of measures records, and its parser.
     */
    serialize: serializeMeasures,
    parse: parseMeasures,

    Trajectory,
    Grid,
    Quantizer,
};

export default StateSpaceGrid;
