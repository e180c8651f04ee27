export type GridLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/** A raw sample on one axis: numeric scales use numbers, categorical scales strings. */
export type AxisValue = number | string;

export type AxisName = 'x' | 'y';

/**
 * Per-axis quantization settings. Every field is optional; unset fields are
 * inferred from the observed values.
 */
export type AxisConfig = {
    /** Explicit total order for categorical (or irregular numeric) scales. */
    order?: readonly AxisValue[];
    /** Lower bound. On ordered axes, a member of `order`. */
    min?: AxisValue;
    /** Upper bound. On ordered axes, a member of `order`. */
    max?: AxisValue;
    /** Width of one cell in rank units. Default: 1. */
    cellSize?: number;
};

export type QuantizationConfig = {
    x?: AxisConfig;
    y?: AxisConfig;
};

export type GridOptions = {
    /** Explicit quantization shared by every member. Inferred from the members when omitted. */
    quantization?: QuantizationConfig;
    /** Optional logger hook; `src/` never writes to the console. */
    logger?: GridLogger | null;
};
