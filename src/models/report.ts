/**
 * Report models
 * Reports carry readings a VEN sends back for an event, grouped per resource.
 */

import { z } from 'zod';
import { ExistingObjectSchema, IntervalPeriodSchema, PayloadValueSchema, intervalSchema } from './common.js';
import { parseWithSchema } from './validation.js';
import { runPluginValidators } from './plugin.js';

export const REPORT_READING_TYPES = [
  'DIRECT_READ',
  'ESTIMATED',
  'SUMMED',
  'MEAN',
  'PEAK',
  'FORECAST',
  'AVERAGE',
] as const;

export const REPORT_PAYLOAD_TYPES = [
  'READING',
  'USAGE',
  'DEMAND',
  'SETPOINT',
  'DELTA_USAGE',
  'BASELINE',
  'OPERATING_STATE',
  'UP_REGULATION_AVAILABLE',
  'DOWN_REGULATION_AVAILABLE',
  'REGULATION_SETPOINT',
  'STORAGE_USABLE_CAPACITY',
  'STORAGE_CHARGE_LEVEL',
  'STORAGE_MAX_DISCHARGE_POWER',
  'STORAGE_MAX_CHARGE_POWER',
  'SIMPLE_LEVEL',
  'USAGE_FORECAST',
  'STORAGE_DISPATCH_FORECAST',
  'LOAD_SHED_DELTA_AVAILABLE',
  'GENERATION_DELTA_AVAILABLE',
  'DATA_QUALITY',
  'IMPORT_RESERVATION_CAPACITY',
  'IMPORT_RESERVATION_FEE',
  'EXPORT_RESERVATION_CAPACITY',
  'EXPORT_RESERVATION_FEE',
] as const;

export const ReportReadingTypeSchema = z.enum(REPORT_READING_TYPES);
export const ReportPayloadTypeSchema = z.enum(REPORT_PAYLOAD_TYPES);

export const ReportPayloadDescriptorSchema = z.object({
  objectType: z.literal('REPORT_PAYLOAD_DESCRIPTOR').optional(),
  payloadType: ReportPayloadTypeSchema,
  readingType: ReportReadingTypeSchema.optional(),
  units: z.string().optional(),
  accuracy: z.number().optional(),
  confidence: z.number().int().min(0).max(100).optional(),
});

export const ReportPayloadSchema = z.object({
  type: ReportPayloadTypeSchema,
  values: z.array(PayloadValueSchema).min(1, { message: 'Report payload must contain at least one value' }),
});

export const ReportIntervalSchema = intervalSchema(ReportPayloadSchema);

export const ReportResourceSchema = z.object({
  resourceName: z.string().min(1).max(128),
  intervalPeriod: IntervalPeriodSchema.optional(),
  intervals: z.array(ReportIntervalSchema).min(1, { message: 'Report resource must contain at least one interval' }),
});

const reportFields = {
  programID: z.string().min(1).max(128),
  eventID: z.string().min(1).max(128),
  clientName: z.string().min(1).max(128),
  reportName: z.string().nullable().optional(),
  payloadDescriptors: z.array(ReportPayloadDescriptorSchema).nullable().optional(),
  resources: z.array(ReportResourceSchema).min(1, { message: 'Report must contain at least one resource' }),
};

export const NewReportSchema = z.object(reportFields);

export const ExistingReportSchema = ExistingObjectSchema.extend({
  ...reportFields,
  objectType: z.literal('REPORT').optional(),
});

export type ReportReadingType = z.infer<typeof ReportReadingTypeSchema>;
export type ReportPayloadType = z.infer<typeof ReportPayloadTypeSchema>;
export type ReportPayloadDescriptor = z.infer<typeof ReportPayloadDescriptorSchema>;
export type ReportPayload = z.infer<typeof ReportPayloadSchema>;
export type ReportInterval = z.infer<typeof ReportIntervalSchema>;
export type ReportResource = z.infer<typeof ReportResourceSchema>;
export type NewReport = z.infer<typeof NewReportSchema>;
export type ExistingReport = z.infer<typeof ExistingReportSchema>;
export type Report = NewReport | ExistingReport;

export function parseNewReport(input: unknown): NewReport {
  const report = parseWithSchema('NewReport', NewReportSchema, input);
  runPluginValidators('report', 'NewReport', report);
  return report;
}

export function parseExistingReport(input: unknown): ExistingReport {
  const report = parseWithSchema('ExistingReport', ExistingReportSchema, input);
  runPluginValidators('report', 'ExistingReport', report);
  return report;
}
