/**
 * Runtime schemas for caller-supplied configuration and parsed tables.
 */

import { z } from 'zod';

export const axisValueSchema = z.union([z.number().finite(), z.string()]);

export const axisConfigSchema = z
    .object({
        order: z.array(axisValueSchema).nonempty().optional(),
        min: axisValueSchema.optional(),
        max: axisValueSchema.optional(),
        cellSize: z.number().finite().positive().optional(),
    })
    .strict()
    .superRefine((axis, ctx) => {
        if (axis.order && new Set(axis.order).size !== axis.order.length) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'order must not contain duplicate values',
                path: ['order'],
            });
        }
    });

export const quantizationConfigSchema = z
    .object({
        x: axisConfigSchema.optional(),
        y: axisConfigSchema.optional(),
    })
    .strict();

/** Numbers as written by the measures table: finite decimals or `NaN`. */
export const measureNumberSchema = z
    .string()
    .regex(/^(NaN|-?Infinity|-?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?)$/, 'expected a number or NaN')
    .transform(Number);

export const idListSchema = z.array(z.string());

export function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
