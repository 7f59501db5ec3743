/**
 * Read-only and read-write contracts of the VTN resource interfaces.
 * The facades expose each resource through one of these, depending on the client role.
 */

import type { PaginationFilter, TargetFilter } from '../../models/common.js';
import type { ExistingEvent, NewEvent } from '../../models/event.js';
import type { ExistingProgram, NewProgram } from '../../models/program.js';
import type { ExistingReport, NewReport } from '../../models/report.js';
import type { ExistingResource, ExistingVen, NewResource, NewVen } from '../../models/ven.js';
import type { ExistingSubscription, NewSubscription, SubscriptionObject } from '../../models/subscription.js';
import type { AuthServerInfo } from '../../models/auth-server.js';

export interface EventFilter {
  target?: TargetFilter;
  pagination?: PaginationFilter;
  programId?: string;
}

export interface ProgramFilter {
  target?: TargetFilter;
  pagination?: PaginationFilter;
}

export interface ReportFilter {
  pagination?: PaginationFilter;
  programId?: string;
  eventId?: string;
  clientName?: string;
}

export interface VenFilter {
  venName?: string;
  target?: TargetFilter;
  pagination?: PaginationFilter;
}

export interface ResourceFilter {
  resourceName?: string;
  target?: TargetFilter;
  pagination?: PaginationFilter;
}

export interface SubscriptionFilter {
  pagination?: PaginationFilter;
  target?: TargetFilter;
  programId?: string;
  clientName?: string;
  objects?: SubscriptionObject[];
}

export interface ReadOnlyAuthInterface {
  getAuthServer(): Promise<AuthServerInfo>;
}

export interface ReadOnlyEventsInterface {
  getEvents(filter?: EventFilter): Promise<ExistingEvent[]>;
  getEventById(eventId: string): Promise<ExistingEvent>;
}

export interface ReadWriteEventsInterface extends ReadOnlyEventsInterface {
  createEvent(newEvent: NewEvent): Promise<ExistingEvent>;
  updateEventById(eventId: string, event: ExistingEvent): Promise<ExistingEvent>;
  deleteEventById(eventId: string): Promise<ExistingEvent>;
}

export interface ReadOnlyProgramsInterface {
  getPrograms(filter?: ProgramFilter): Promise<ExistingProgram[]>;
  getProgramById(programId: string): Promise<ExistingProgram>;
}

export interface ReadWriteProgramsInterface extends ReadOnlyProgramsInterface {
  createProgram(newProgram: NewProgram): Promise<ExistingProgram>;
  updateProgramById(programId: string, program: ExistingProgram): Promise<ExistingProgram>;
  deleteProgramById(programId: string): Promise<ExistingProgram>;
}

export interface ReadOnlyReportsInterface {
  getReports(filter?: ReportFilter): Promise<ExistingReport[]>;
  getReportById(reportId: string): Promise<ExistingReport>;
}

export interface ReadWriteReportsInterface extends ReadOnlyReportsInterface {
  createReport(newReport: NewReport): Promise<ExistingReport>;
  updateReportById(reportId: string, report: ExistingReport): Promise<ExistingReport>;
  deleteReportById(reportId: string): Promise<ExistingReport>;
}

export interface ReadOnlyVensInterface {
  getVens(filter?: VenFilter): Promise<ExistingVen[]>;
  getVenById(venId: string): Promise<ExistingVen>;
  getVenResources(venId: string, filter?: ResourceFilter): Promise<ExistingResource[]>;
  getVenResourceById(venId: string, resourceId: string): Promise<ExistingResource>;
}

export interface ReadWriteVensInterface extends ReadOnlyVensInterface {
  createVen(newVen: NewVen): Promise<ExistingVen>;
  updateVenById(venId: string, ven: ExistingVen): Promise<ExistingVen>;
  deleteVenById(venId: string): Promise<ExistingVen>;
  createVenResource(venId: string, newResource: NewResource): Promise<ExistingResource>;
  updateVenResourceById(venId: string, resourceId: string, resource: ExistingResource): Promise<ExistingResource>;
  deleteVenResourceById(venId: string, resourceId: string): Promise<ExistingResource>;
}

export interface ReadOnlySubscriptionsInterface {
  getSubscriptions(filter?: SubscriptionFilter): Promise<ExistingSubscription[]>;
  getSubscriptionById(subscriptionId: string): Promise<ExistingSubscription>;
}

export interface ReadWriteSubscriptionsInterface extends ReadOnlySubscriptionsInterface {
  createSubscription(newSubscription: NewSubscription): Promise<ExistingSubscription>;
  updateSubscriptionById(subscriptionId: string, subscription: ExistingSubscription): Promise<ExistingSubscription>;
  deleteSubscriptionById(subscriptionId: string): Promise<ExistingSubscription>;
}
