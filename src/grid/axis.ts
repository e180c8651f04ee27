import { ConfigError } from './errors.js';
import type { AxisName, AxisValue } from './types.js';

/**
 * Total order over the values one axis can take.
 *
 * Numeric axes rank a value as itself. Ordered axes rank a value by its
 * position in the caller-supplied order; there is no inferred order for
 * non-numeric data.
 */
export class AxisOrdering {
    private constructor(
        readonly axis: AxisName,
        readonly order: readonly AxisValue[] | null,
        private readonly ranks: ReadonlyMap<AxisValue, number> | null
    ) { }

    static numeric(axis: AxisName): AxisOrdering {
        return new AxisOrdering(axis, null, null);
    }

    static explicit(axis: AxisName, order: readonly AxisValue[]): AxisOrdering {
        const ranks = new Map<AxisValue, number>();
        order.forEach((value, rank) => ranks.set(value, rank));
        return new AxisOrdering(axis, [...order], ranks);
    }

    /**
     * Picks the ordering for the observed values: the explicit order when one
     * is given, natural numeric order when every value is a number.
     */
    static resolve(axis: AxisName, values: readonly AxisValue[], order?: readonly AxisValue[]): AxisOrdering {
        if (order) {
            const ordering = AxisOrdering.explicit(axis, order);
            for (const value of values) ordering.rankOf(value);
            return ordering;
        }
        const categorical = values.find((value) => typeof value !== 'number');
        if (categorical !== undefined) {
            throw new ConfigError(
                `Axis ${axis} has non-numeric value ${JSON.stringify(categorical)} but no explicit order; supply quantization.${axis}.order`
            );
        }
        return AxisOrdering.numeric(axis);
    }

    get kind(): 'numeric' | 'ordered' {
        return this.ranks ? 'ordered' : 'numeric';
    }

    /** Number of ranked values on ordered axes, `null` on numeric axes. */
    get size(): number | null {
        return this.order ? this.order.length : null;
    }

    rankOf(value: AxisValue): number {
        if (this.ranks) {
            const rank = this.ranks.get(value);
            if (rank === undefined) {
                throw new ConfigError(`Value ${JSON.stringify(value)} is not in the order of axis ${this.axis}`);
            }
            return rank;
        }
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new ConfigError(`Axis ${this.axis} is numeric; got ${JSON.stringify(value)}`);
        }
        return value;
    }
}
