/**
 * Events HTTP interface (`/events`)
 */

import { parseExistingEvent, parseNewEvent, type ExistingEvent, type NewEvent } from '../../models/event.js';
import { withCreationGuard } from '../../models/validation.js';
import {
  HttpInterface,
  assertMatchingId,
  paginationQuery,
  parseList,
  targetQuery,
} from './http-interface.js';
import type { EventFilter, ReadOnlyEventsInterface, ReadWriteEventsInterface } from './interfaces.js';

export class EventsReadOnlyHttpInterface extends HttpInterface implements ReadOnlyEventsInterface {
  /**
   * List events, optionally filtered by program, target and page
   */
  async getEvents(filter: EventFilter = {}): Promise<ExistingEvent[]> {
    return this.request('GET', '/events', {
      query: {
        ...targetQuery(filter.target),
        ...paginationQuery(filter.pagination),
        programID: filter.programId,
      },
      parse: parseList(parseExistingEvent),
    });
  }

  async getEventById(eventId: string): Promise<ExistingEvent> {
    return this.request('GET', `/events/${encodeURIComponent(eventId)}`, { parse: parseExistingEvent });
  }
}

export class EventsHttpInterface extends EventsReadOnlyHttpInterface implements ReadWriteEventsInterface {
  async createEvent(newEvent: NewEvent): Promise<ExistingEvent> {
    return withCreationGuard('Event', newEvent, async () =>
      this.request('POST', '/events', { body: parseNewEvent(newEvent), parse: parseExistingEvent })
    );
  }

  async updateEventById(eventId: string, event: ExistingEvent): Promise<ExistingEvent> {
    assertMatchingId('ExistingEvent', 'id', eventId, event.id);
    const body = parseExistingEvent(event);
    return this.request('PUT', `/events/${encodeURIComponent(eventId)}`, { body, parse: parseExistingEvent });
  }

  async deleteEventById(eventId: string): Promise<ExistingEvent> {
    return this.request('DELETE', `/events/${encodeURIComponent(eventId)}`, { parse: parseExistingEvent });
  }
}
