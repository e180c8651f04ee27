import { ConfigError, ValidationError } from '../src/grid/errors.js';
import { Quantizer } from '../src/grid/quantizer.js';
import { mergeRuns, Trajectory } from '../src/grid/trajectory.js';
import type { QuantizationConfig } from '../src/grid/types.js';
import { affectConfig, makeTrajectory, unitTrajectory } from './helpers/grid-fixtures.js';

describe('Trajectory', () => {

    describe('construction', () => {
        it('builds one event per sample from fencepost timestamps', () => {
            const traj = new Trajectory({ id: 'a', x: [1, 1, 3], y: [2, 2, 3], t: [0, 1, 2.5, 3] });

            expect(traj.eventCount).toBe(3);
            expect(traj.duration).toBe(3);
            expect(traj.events[1]).toEqual({ x: 1, y: 2, start: 1, end: 2.5, duration: 1.5 });
        });

        it('rejects a timestamp list that is not one longer than the samples', () => {
            expect(() => new Trajectory({ id: 'a', x: [1, 2], y: [1, 2], t: [0, 1] })).toThrow(ValidationError);
            expect(() => new Trajectory({ id: 'a', x: [], y: [], t: [] })).toThrow(ValidationError);
        });

        it('rejects x and y lists of different lengths', () => {
            expect(() => new Trajectory({ id: 'a', x: [1, 2], y: [1], t: [0, 1, 2] })).toThrow(ValidationError);
        });

        it('rejects decreasing or non-finite timestamps', () => {
            expect(() => new Trajectory({ id: 'a', x: [1, 2], y: [1, 2], t: [0, 2, 1] })).toThrow(/must not decrease/);
            expect(() => new Trajectory({ id: 'a', x: [1], y: [1], t: [0, Number.NaN] })).toThrow(/finite/);
        });

        it('rejects non-finite axis values', () => {
            expect(() => new Trajectory({ id: 'a', x: [Number.POSITIVE_INFINITY], y: [1], t: [0, 1] })).toThrow(ValidationError);
        });

        it('requires an id', () => {
            expect(() => new Trajectory({ id: '', x: [1], y: [1], t: [0, 1] })).toThrow(/id/);
        });

        it('copies its inputs', () => {
            const x = [1, 2];
            const traj = new Trajectory({ id: 'a', x, y: [1, 2], t: [0, 1, 2] });
            x[0] = 9;
            expect(traj.x).toEqual([1, 2]);
        });

        it('keeps its own copy of the quantization config', () => {
            const config: QuantizationConfig = { x: { cellSize: 2 } };
            const traj = new Trajectory({ id: 'a', x: [0, 1, 2], y: [0, 0, 0], t: [0, 1, 2, 3], quantization: config });
            config.x = { cellSize: 5 };

            expect(traj.quantization).toEqual({ x: { cellSize: 2 } });
            expect(traj.quantizer.quantization.x.cellSize).toBe(2);
        });

        it('rejects an invalid quantization config', () => {
            expect(() => new Trajectory({ id: 'a', x: [1], y: [1], t: [0, 1], quantization: { x: { cellSize: 0 } } }))
                .toThrow(ConfigError);
        });
    });

    describe('mergeStates()', () => {
        it('merges consecutive same-cell events into dwell states', () => {
            const traj = new Trajectory({ id: 'a', x: [1, 1, 3], y: [2, 2, 3], t: [0, 1, 2, 3] });

            expect(traj.mergeStates()).toEqual([
                { cell: { x: 0, y: 0 }, start: 0, end: 2, duration: 2, eventCount: 2 },
                { cell: { x: 2, y: 1 }, start: 2, end: 3, duration: 1, eventCount: 1 },
            ]);
            expect(traj.numVisits()).toBe(2);
            expect(traj.cellRange()).toBe(2);
            expect(traj.duration).toBe(3);
        });

        it('counts a return to a cell as a new visit but not a new cell', () => {
            const traj = unitTrajectory('r', [[1, 1], [2, 2], [1, 1]]);

            expect(traj.numVisits()).toBe(3);
            expect(traj.cellRange()).toBe(2);
            expect(traj.cellDurations()).toEqual(new Map([['0,0', 2], ['1,1', 1]]));
        });

        it('is idempotent on an already merged sequence', () => {
            const traj = unitTrajectory('i', [[0, 0], [0, 0], [1, 0], [1, 0], [0, 0]]);
            const states = traj.mergeStates();

            expect(states).toHaveLength(3);
            expect(mergeRuns(states)).toEqual(states);
        });

        it('hands out frozen states that cannot alter later measures', () => {
            const traj = unitTrajectory('f', [[0, 0], [1, 1]]);
            const states = traj.mergeStates();

            expect(Object.isFrozen(states[0])).toBe(true);
            expect(Object.isFrozen(states[0].cell)).toBe(true);
            expect(() => { states[0].cell.x = 1; }).toThrow(TypeError);
            expect(() => { states[0].cell = { x: 1, y: 1 }; }).toThrow(TypeError);
            expect(traj.cellRange()).toBe(2);
            expect(traj.mergeStates()[0].cell).toEqual({ x: 0, y: 0 });
        });

        it('merges events that share a cell under a coarser quantizer', () => {
            const traj = unitTrajectory('c', [[0, 0], [1, 0], [2, 0]]);
            const coarse = Quantizer.fromSamples(traj.x, traj.y, { x: { cellSize: 2 } });

            expect(traj.numVisits()).toBe(3);
            expect(traj.numVisits(coarse)).toBe(2);
            expect(traj.cells(coarse)).toEqual([{ x: 0, y: 0 }, { x: 0, y: 0 }, { x: 1, y: 0 }]);
        });

        it('keeps visits between cell range and event count', () => {
            const samples: Array<Array<[number, number]>> = [
                [[0, 0], [1, 1], [2, 2]],
                [[0, 0], [0, 0], [0, 0]],
                [[0, 0], [1, 1], [0, 0], [1, 1]],
            ];
            for (const [i, states] of samples.entries()) {
                const traj = unitTrajectory(`p${i}`, states);
                expect(traj.cellRange()).toBeLessThanOrEqual(traj.numVisits());
                expect(traj.numVisits()).toBeLessThanOrEqual(traj.eventCount);
            }
            expect(unitTrajectory('distinct', samples[0]).numVisits()).toBe(3);
        });

        it('uses a quantizer supplied later instead of the inferred one', () => {
            const traj = unitTrajectory('q', [[1, 1], [2, 2]]);
            expect(traj.quantizer.totalCells).toBe(4);

            traj.useQuantizer(Quantizer.fromConfig({ x: { min: 0, max: 9 }, y: { min: 0, max: 9 } }));

            expect(traj.quantizer.totalCells).toBe(100);
            expect(traj.mergeStates()[0].cell).toEqual({ x: 1, y: 1 });
        });

        it('quantizes categorical values through its own config', () => {
            const traj = makeTrajectory('cat', [['ok', 'good'], ['bad', 'bad']], [0, 1, 2], affectConfig);
            expect(traj.cells()).toEqual([{ x: 1, y: 2 }, { x: 0, y: 0 }]);
        });
    });

    describe('dispersion()', () => {
        it('is 1 when duration is split evenly over every cell', () => {
            const traj = unitTrajectory('even', [[0, 0], [0, 1], [1, 0], [1, 1]]);
            expect(traj.quantizer.totalCells).toBe(4);
            expect(traj.dispersion()).toBe(1);
        });

        it('is 0 when all time is spent in one cell', () => {
            const traj = makeTrajectory('one', [[3.7, 0]], [0, 3.7]);
            expect(traj.dispersion(5)).toBe(0);
        });

        it('matches the closed form for uneven splits', () => {
            // shares 1/3 and 2/3 on a 99-cell grid
            const traj = makeTrajectory('two', [[1, 1], [5, 5]], [0, 1, 3]);
            expect(traj.dispersion(99)).toBeCloseTo(0.44897959, 6);
        });

        it('depends only on durations when every sample is a distinct cell', () => {
            const traj = new Trajectory({
                id: 'distinct',
                x: [0, 1, 2, 3, 4, 5, 6, 7, 8],
                y: [0, 0, 0, 0, 0, 0, 0, 0, 0],
                t: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9],
            });
            expect(traj.dispersion(100)).toBeCloseTo(0.897867, 5);
        });

        it('stays within [0, 1]', () => {
            const traj = makeTrajectory('mix', [[0, 0], [1, 2], [0, 0], [2, 1]], [0, 0.5, 2, 2.25, 4]);
            const value = traj.dispersion(9);
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(1);
        });

        it('is exactly 0 for one cell with decimal timestamps', () => {
            // event durations here sum to 2.8000000000000003 while t[last] - t[0] is 2.8
            const traj = makeTrajectory('dec', [[4, 4], [4, 4], [4, 4]], [0.1, 0.2, 0.3, 2.9]);
            expect(traj.dispersion(9)).toBe(0);
        });

        it('is undefined on a single-cell grid', () => {
            const traj = unitTrajectory('single', [[1, 1], [1, 1]]);
            expect(traj.quantizer.totalCells).toBe(1);
            expect(traj.dispersion()).toBeNaN();
            expect(() => traj.dispersion(1)).not.toThrow();
        });

        it('is undefined for a zero-duration trajectory', () => {
            const traj = makeTrajectory('zero', [[0, 0]], [2, 2]);
            expect(traj.dispersion(4)).toBeNaN();
        });
    });
});
