/**
 * Test fixtures
 * Each call returns a fresh object, so creation guard state never leaks between tests.
 */

import type { ExistingEvent, NewEvent } from '../../src/models/event.js';
import type { ExistingProgram, NewProgram } from '../../src/models/program.js';
import type { ExistingReport, NewReport } from '../../src/models/report.js';
import type { ExistingResource, ExistingVen, NewResource, NewVen } from '../../src/models/ven.js';
import type { ExistingSubscription, NewSubscription } from '../../src/models/subscription.js';

const CREATED = '2025-03-01T08:00:00Z';
const MODIFIED = '2025-03-01T09:30:00Z';

export function newEvent(): NewEvent {
  return {
    programID: 'program-1',
    eventName: 'evening-peak',
    priority: 1,
    targets: [{ type: 'GROUP', values: ['north'] }],
    payloadDescriptors: [{ payloadType: 'PRICE', units: 'KWH', currency: 'EUR' }],
    intervalPeriod: { start: '2025-03-02T17:00:00Z', duration: 'PT1H' },
    intervals: [
      { id: 0, payloads: [{ type: 'PRICE', values: [0.31] }] },
      {
        id: 1,
        intervalPeriod: { start: '2025-03-02T18:00:00Z', duration: 'PT1H' },
        payloads: [{ type: 'PRICE', values: [0.27] }],
      },
    ],
  };
}

export function existingEvent(): ExistingEvent {
  return {
    id: 'event-1',
    createdDateTime: CREATED,
    modificationDateTime: MODIFIED,
    objectType: 'EVENT',
    ...newEvent(),
  };
}

export function newProgram(): NewProgram {
  return {
    programName: 'dynamic-pricing',
    programLongName: 'Dynamic pricing pilot',
    retailerName: 'retailer-1',
    programType: 'PRICING_TARIFF',
    country: 'NL',
    principalSubdivision: 'NH',
    programDescriptions: [{ URL: 'https://programs.example.com/dynamic-pricing' }],
    bindingEvents: false,
    localPrice: true,
  };
}

export function existingProgram(): ExistingProgram {
  return {
    id: 'program-1',
    createdDateTime: CREATED,
    modificationDateTime: MODIFIED,
    objectType: 'PROGRAM',
    ...newProgram(),
  };
}

export function newReport(): NewReport {
  return {
    programID: 'program-1',
    eventID: 'event-1',
    clientName: 'ven-client-1',
    reportName: 'usage-report',
    payloadDescriptors: [{ payloadType: 'USAGE', readingType: 'DIRECT_READ', units: 'KWH' }],
    resources: [
      {
        resourceName: 'battery-1',
        intervalPeriod: { start: '2025-03-02T17:00:00Z', duration: 'PT1H' },
        intervals: [{ id: 0, payloads: [{ type: 'USAGE', values: [4.2] }] }],
      },
    ],
  };
}

export function existingReport(): ExistingReport {
  return {
    id: 'report-1',
    createdDateTime: CREATED,
    modificationDateTime: MODIFIED,
    objectType: 'REPORT',
    ...newReport(),
  };
}

export function newVen(): NewVen {
  return {
    venName: 'ven-1',
    attributes: [{ type: 'LOCATION', values: ['52.37', '4.90'] }],
    targets: [{ type: 'GROUP', values: ['north'] }],
  };
}

export function existingVen(): ExistingVen {
  return {
    id: 'ven-id-1',
    createdDateTime: CREATED,
    modificationDateTime: MODIFIED,
    objectType: 'VEN',
    ...newVen(),
  };
}

export function newResource(): NewResource {
  return {
    resourceName: 'battery-1',
    venID: 'ven-id-1',
    attributes: [{ type: 'MAX_POWER_CONSUMPTION', values: [11] }],
  };
}

export function existingResource(): ExistingResource {
  return {
    id: 'resource-1',
    createdDateTime: CREATED,
    modificationDateTime: MODIFIED,
    objectType: 'RESOURCE',
    ...newResource(),
  };
}

export function newSubscription(): NewSubscription {
  return {
    clientName: 'bl-client-1',
    programID: 'program-1',
    objectOperations: [
      {
        objects: ['EVENT'],
        operations: ['POST', 'PUT'],
        callbackUrl: 'https://callbacks.example.com/events',
        bearerToken: 'test-callback-token',
      },
    ],
  };
}

export function existingSubscription(): ExistingSubscription {
  return {
    id: 'subscription-1',
    createdDateTime: CREATED,
    modificationDateTime: MODIFIED,
    objectType: 'SUBSCRIPTION',
    ...newSubscription(),
  };
}
