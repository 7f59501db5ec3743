/**
 * Event models
 * Events carry the time-series of payloads a VTN sends to VENs within a program.
 */

import { z } from 'zod';
import {
  ExistingObjectSchema,
  IntervalPeriodSchema,
  PayloadValueSchema,
  TargetSchema,
  intervalSchema,
} from './common.js';
import { parseWithSchema } from './validation.js';
import { runPluginValidators } from './plugin.js';

export const EVENT_PAYLOAD_TYPES = [
  'SIMPLE',
  'PRICE',
  'CHARGE_STATE_SETPOINT',
  'DISPATCH_SETPOINT',
  'DISPATCH_SETPOINT_RELATIVE',
  'CONTROL_SETPOINT',
  'EXPORT_PRICE',
  'GHG',
  'CURVE',
  'OLS',
  'IMPORT_CAPACITY_SUBSCRIPTION',
  'IMPORT_CAPACITY_RESERVATION',
  'IMPORT_CAPACITY_RESERVATION_FEE',
  'IMPORT_CAPACITY_AVAILABLE',
  'IMPORT_CAPACITY_AVAILABLE_PRICE',
  'EXPORT_CAPACITY_SUBSCRIPTION',
  'EXPORT_CAPACITY_RESERVATION',
  'EXPORT_CAPACITY_RESERVATION_FEE',
  'EXPORT_CAPACITY_AVAILABLE',
  'EXPORT_CAPACITY_AVAILABLE_PRICE',
  'IMPORT_CAPACITY_LIMIT',
  'EXPORT_CAPACITY_LIMIT',
  'ALERT_GRID_EMERGENCY',
  'ALERT_BLACK_START',
  'ALERT_POSSIBLE_OUTAGE',
  'ALERT_FLEX_ALERT',
  'ALERT_FIRE',
  'ALERT_FREEZING',
  'ALERT_WIND',
  'ALERT_TSUNAMI',
  'ALERT_AIR_QUALITY',
  'ALERT_OTHER',
  'CTA2045_REBOOT',
  'CTA2045_SET_OVERRIDE_STATUS',
] as const;

export const EventPayloadTypeSchema = z.enum(EVENT_PAYLOAD_TYPES);

export const EventPayloadDescriptorSchema = z.object({
  objectType: z.literal('EVENT_PAYLOAD_DESCRIPTOR').optional(),
  payloadType: EventPayloadTypeSchema,
  units: z.string().optional(),
  currency: z.string().optional(),
});

export const EventPayloadSchema = z.object({
  type: EventPayloadTypeSchema,
  values: z.array(PayloadValueSchema).min(1, { message: 'Event payload must contain at least one value' }),
});

export const EventIntervalSchema = intervalSchema(EventPayloadSchema);

const eventFields = {
  programID: z.string().min(1).max(128),
  eventName: z.string().nullable().optional(),
  priority: z.number().int().nonnegative().nullable().optional(),
  targets: z.array(TargetSchema).optional(),
  payloadDescriptors: z.array(EventPayloadDescriptorSchema).optional(),
  intervalPeriod: IntervalPeriodSchema.optional(),
};

export const NewEventSchema = z.object({
  ...eventFields,
  intervals: z.array(EventIntervalSchema).min(1, { message: 'Event must contain at least one interval' }),
});

export const ExistingEventSchema = ExistingObjectSchema.extend({
  ...eventFields,
  objectType: z.literal('EVENT').optional(),
  intervals: z.array(EventIntervalSchema),
});

export type EventPayloadType = z.infer<typeof EventPayloadTypeSchema>;
export type EventPayloadDescriptor = z.infer<typeof EventPayloadDescriptorSchema>;
export type EventPayload = z.infer<typeof EventPayloadSchema>;
export type EventInterval = z.infer<typeof EventIntervalSchema>;
export type NewEvent = z.infer<typeof NewEventSchema>;
export type ExistingEvent = z.infer<typeof ExistingEventSchema>;
export type Event = NewEvent | ExistingEvent;

export function isEventPayloadType(value: string): value is EventPayloadType {
  return EventPayloadTypeSchema.safeParse(value).success;
}

export function parseNewEvent(input: unknown): NewEvent {
  const event = parseWithSchema('NewEvent', NewEventSchema, input);
  runPluginValidators('event', 'NewEvent', event);
  return event;
}

export function parseExistingEvent(input: unknown): ExistingEvent {
  const event = parseWithSchema('ExistingEvent', ExistingEventSchema, input);
  runPluginValidators('event', 'ExistingEvent', event);
  return event;
}
