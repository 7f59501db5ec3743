/**
 * Common OpenADR 3 model schemas
 * Interval periods, value maps (targets, attributes), points and request filters.
 */

import { z } from 'zod';

// ISO 8601 duration, e.g. PT1H, P1DT30M, PT0S
const ISO_DURATION = /^-?P(?!$)(\d+(?:\.\d+)?Y)?(\d+(?:\.\d+)?M)?(\d+(?:\.\d+)?W)?(\d+(?:\.\d+)?D)?(T(?=\d)(\d+(?:\.\d+)?H)?(\d+(?:\.\d+)?M)?(\d+(?:\.\d+)?S)?)?$/;

export const DateTimeSchema = z.string().datetime({ offset: true });

export const DurationSchema = z
  .string()
  .regex(ISO_DURATION, { message: 'Invalid ISO 8601 duration' });

/**
 * Temporal aspects of intervals. A duration of PT0S means instantaneous or infinite,
 * depending on the payload type.
 */
export const IntervalPeriodSchema = z.object({
  start: DateTimeSchema,
  duration: DurationSchema,
  randomizeStart: DurationSchema.optional(),
});

export const PointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const PayloadValueSchema = z.union([z.number(), z.string(), z.boolean(), PointSchema]);

export const ValueMapSchema = z.object({
  type: z.string().min(1).max(128),
  values: z.array(PayloadValueSchema),
});

export const TargetSchema = ValueMapSchema;
export const AttributeSchema = ValueMapSchema;

export type IntervalPeriod = z.infer<typeof IntervalPeriodSchema>;
export type Point = z.infer<typeof PointSchema>;
export type PayloadValue = z.infer<typeof PayloadValueSchema>;
export type ValueMap = z.infer<typeof ValueMapSchema>;
export type Target = ValueMap;
export type Attribute = ValueMap;

/**
 * Filter on targets. Targets filtered on are ANDed by the VTN.
 */
export interface TargetFilter {
  targetType: string;
  targetValues: string[];
}

export interface PaginationFilter {
  /** Records to skip */
  skip: number;
  /** Maximum records returned */
  limit: number;
}

/**
 * Object metadata assigned by the VTN
 */
export const ExistingObjectSchema = z.object({
  id: z.string().min(1).max(128),
  createdDateTime: DateTimeSchema,
  modificationDateTime: DateTimeSchema,
});

/**
 * Builds an interval schema around a payload schema. Intervals carry at least one payload.
 */
export function intervalSchema<P extends z.ZodTypeAny>(payload: P) {
  return z.object({
    id: z.number().int(),
    intervalPeriod: IntervalPeriodSchema.optional(),
    payloads: z.array(payload).min(1, { message: 'Interval must contain at least one payload' }),
  });
}
