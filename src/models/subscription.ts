/**
 * Subscription models
 * A subscription asks the VTN to call back when objects of the given kinds change.
 */

import { z } from 'zod';
import { ExistingObjectSchema, TargetSchema } from './common.js';
import { parseWithSchema } from './validation.js';
import { runPluginValidators } from './plugin.js';

export const SUBSCRIPTION_OBJECTS = ['PROGRAM', 'EVENT', 'REPORT', 'SUBSCRIPTION', 'VEN', 'RESOURCE'] as const;
export const SUBSCRIPTION_OPERATIONS = ['GET', 'POST', 'PUT', 'DELETE'] as const;

export const SubscriptionObjectSchema = z.enum(SUBSCRIPTION_OBJECTS);
export const SubscriptionOperationSchema = z.enum(SUBSCRIPTION_OPERATIONS);

export const ObjectOperationSchema = z.object({
  objects: z.array(SubscriptionObjectSchema).min(1, { message: 'Object operation must name at least one object' }),
  operations: z
    .array(SubscriptionOperationSchema)
    .min(1, { message: 'Object operation must name at least one operation' }),
  callbackUrl: z.string().url(),
  bearerToken: z.string().nullable().optional(),
});

const subscriptionFields = {
  clientName: z.string().min(1).max(128),
  programID: z.string().min(1).max(128),
  objectOperations: z
    .array(ObjectOperationSchema)
    .min(1, { message: 'Subscription must contain at least one object operation' }),
  targets: z.array(TargetSchema).nullable().optional(),
};

export const NewSubscriptionSchema = z.object(subscriptionFields);

export const ExistingSubscriptionSchema = ExistingObjectSchema.extend({
  ...subscriptionFields,
  objectType: z.literal('SUBSCRIPTION').optional(),
});

export type SubscriptionObject = z.infer<typeof SubscriptionObjectSchema>;
export type SubscriptionOperation = z.infer<typeof SubscriptionOperationSchema>;
export type ObjectOperation = z.infer<typeof ObjectOperationSchema>;
export type NewSubscription = z.infer<typeof NewSubscriptionSchema>;
export type ExistingSubscription = z.infer<typeof ExistingSubscriptionSchema>;
export type Subscription = NewSubscription | ExistingSubscription;

export function parseNewSubscription(input: unknown): NewSubscription {
  const subscription = parseWithSchema('NewSubscription', NewSubscriptionSchema, input);
  runPluginValidators('subscription', 'NewSubscription', subscription);
  return subscription;
}

export function parseExistingSubscription(input: unknown): ExistingSubscription {
  const subscription = parseWithSchema('ExistingSubscription', ExistingSubscriptionSchema, input);
  runPluginValidators('subscription', 'ExistingSubscription', subscription);
  return subscription;
}
