/**
 * VEN and resource models
 */

import { z } from 'zod';
import { AttributeSchema, ExistingObjectSchema, TargetSchema } from './common.js';
import { parseWithSchema } from './validation.js';
import { runPluginValidators } from './plugin.js';

const resourceFields = {
  resourceName: z.string().min(1).max(128),
  venID: z.string().min(1).max(128),
  attributes: z.array(AttributeSchema).nullable().optional(),
  targets: z.array(TargetSchema).nullable().optional(),
};

export const NewResourceSchema = z.object(resourceFields);

export const ExistingResourceSchema = ExistingObjectSchema.extend({
  ...resourceFields,
  objectType: z.literal('RESOURCE').optional(),
});

const venFields = {
  venName: z.string().min(1).max(128),
  attributes: z.array(AttributeSchema).nullable().optional(),
  targets: z.array(TargetSchema).nullable().optional(),
};

export const NewVenSchema = z.object({
  ...venFields,
  resources: z.array(NewResourceSchema.omit({ venID: true })).nullable().optional(),
});

export const ExistingVenSchema = ExistingObjectSchema.extend({
  ...venFields,
  objectType: z.literal('VEN').optional(),
  resources: z.array(ExistingResourceSchema).nullable().optional(),
});

export type NewResource = z.infer<typeof NewResourceSchema>;
export type ExistingResource = z.infer<typeof ExistingResourceSchema>;
export type Resource = NewResource | ExistingResource;
export type NewVen = z.infer<typeof NewVenSchema>;
export type ExistingVen = z.infer<typeof ExistingVenSchema>;
export type Ven = NewVen | ExistingVen;

export function parseNewVen(input: unknown): NewVen {
  const ven = parseWithSchema('NewVen', NewVenSchema, input);
  runPluginValidators('ven', 'NewVen', ven);
  return ven;
}

export function parseExistingVen(input: unknown): ExistingVen {
  const ven = parseWithSchema('ExistingVen', ExistingVenSchema, input);
  runPluginValidators('ven', 'ExistingVen', ven);
  return ven;
}

export function parseNewResource(input: unknown): NewResource {
  const resource = parseWithSchema('NewResource', NewResourceSchema, input);
  runPluginValidators('resource', 'NewResource', resource);
  return resource;
}

export function parseExistingResource(input: unknown): ExistingResource {
  const resource = parseWithSchema('ExistingResource', ExistingResourceSchema, input);
  runPluginValidators('resource', 'ExistingResource', resource);
  return resource;
}
