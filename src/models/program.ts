/**
 * Program models
 */

import { z } from 'zod';
import { ExistingObjectSchema, IntervalPeriodSchema, TargetSchema } from './common.js';
import { EventPayloadDescriptorSchema } from './event.js';
import { parseWithSchema } from './validation.js';
import { runPluginValidators } from './plugin.js';

export const ProgramDescriptionSchema = z.object({
  URL: z.string().url(),
});

const programFields = {
  programName: z.string().min(1).max(128),
  programLongName: z.string().nullable().optional(),
  retailerName: z.string().nullable().optional(),
  retailerLongName: z.string().nullable().optional(),
  programType: z.string().nullable().optional(),
  // ISO 3166-1 alpha-2
  country: z
    .string()
    .regex(/^[A-Z]{2}$/, { message: 'Country must be an ISO 3166-1 alpha-2 code' })
    .nullable()
    .optional(),
  principalSubdivision: z.string().nullable().optional(),
  intervalPeriod: IntervalPeriodSchema.nullable().optional(),
  programDescriptions: z.array(ProgramDescriptionSchema).nullable().optional(),
  bindingEvents: z.boolean().nullable().optional(),
  localPrice: z.boolean().nullable().optional(),
  payloadDescriptors: z.array(EventPayloadDescriptorSchema).nullable().optional(),
  targets: z.array(TargetSchema).nullable().optional(),
};

export const NewProgramSchema = z.object(programFields);

export const ExistingProgramSchema = ExistingObjectSchema.extend({
  ...programFields,
  objectType: z.literal('PROGRAM').optional(),
});

export type ProgramDescription = z.infer<typeof ProgramDescriptionSchema>;
export type NewProgram = z.infer<typeof NewProgramSchema>;
export type ExistingProgram = z.infer<typeof ExistingProgramSchema>;
export type Program = NewProgram | ExistingProgram;

export function parseNewProgram(input: unknown): NewProgram {
  const program = parseWithSchema('NewProgram', NewProgramSchema, input);
  runPluginValidators('program', 'NewProgram', program);
  return program;
}

export function parseExistingProgram(input: unknown): ExistingProgram {
  const program = parseWithSchema('ExistingProgram', ExistingProgramSchema, input);
  runPluginValidators('program', 'ExistingProgram', program);
  return program;
}
