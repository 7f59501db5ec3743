/**
 * VENs HTTP interface (`/vens` and `/vens/{venID}/resources`)
 */

import {
  parseExistingResource,
  parseExistingVen,
  parseNewResource,
  parseNewVen,
  type ExistingResource,
  type ExistingVen,
  type NewResource,
  type NewVen,
} from '../../models/ven.js';
import { withCreationGuard } from '../../models/validation.js';
import {
  HttpInterface,
  assertMatchingId,
  paginationQuery,
  parseList,
  targetQuery,
} from './http-interface.js';
import type { ReadOnlyVensInterface, ReadWriteVensInterface, ResourceFilter, VenFilter } from './interfaces.js';

function venPath(venId: string): string {
  return `/vens/${encodeURIComponent(venId)}`;
}

function resourcePath(venId: string, resourceId: string): string {
  return `${venPath(venId)}/resources/${encodeURIComponent(resourceId)}`;
}

export class VensReadOnlyHttpInterface extends HttpInterface implements ReadOnlyVensInterface {
  async getVens(filter: VenFilter = {}): Promise<ExistingVen[]> {
    return this.request('GET', '/vens', {
      query: {
        ...targetQuery(filter.target),
        ...paginationQuery(filter.pagination),
        venName: filter.venName,
      },
      parse: parseList(parseExistingVen),
    });
  }

  async getVenById(venId: string): Promise<ExistingVen> {
    return this.request('GET', venPath(venId), { parse: parseExistingVen });
  }

  async getVenResources(venId: string, filter: ResourceFilter = {}): Promise<ExistingResource[]> {
    return this.request('GET', `${venPath(venId)}/resources`, {
      query: {
        ...targetQuery(filter.target),
        ...paginationQuery(filter.pagination),
        resourceName: filter.resourceName,
      },
      parse: parseList(parseExistingResource),
    });
  }

  async getVenResourceById(venId: string, resourceId: string): Promise<ExistingResource> {
    return this.request('GET', resourcePath(venId, resourceId), { parse: parseExistingResource });
  }
}

export class VensHttpInterface extends VensReadOnlyHttpInterface implements ReadWriteVensInterface {
  async createVen(newVen: NewVen): Promise<ExistingVen> {
    return withCreationGuard('Ven', newVen, async () =>
      this.request('POST', '/vens', { body: parseNewVen(newVen), parse: parseExistingVen })
    );
  }

  async updateVenById(venId: string, ven: ExistingVen): Promise<ExistingVen> {
    assertMatchingId('ExistingVen', 'id', venId, ven.id);
    const body = parseExistingVen(ven);
    return this.request('PUT', venPath(venId), { body, parse: parseExistingVen });
  }

  async deleteVenById(venId: string): Promise<ExistingVen> {
    return this.request('DELETE', venPath(venId), { parse: parseExistingVen });
  }

  async createVenResource(venId: string, newResource: NewResource): Promise<ExistingResource> {
    assertMatchingId('NewResource', 'venID', venId, newResource.venID);
    return withCreationGuard('Resource', newResource, async () =>
      this.request('POST', `${venPath(venId)}/resources`, {
        body: parseNewResource(newResource),
        parse: parseExistingResource,
      })
    );
  }

  async updateVenResourceById(
    venId: string,
    resourceId: string,
    resource: ExistingResource
  ): Promise<ExistingResource> {
    assertMatchingId('ExistingResource', 'venID', venId, resource.venID);
    assertMatchingId('ExistingResource', 'id', resourceId, resource.id);
    const body = parseExistingResource(resource);
    return this.request('PUT', resourcePath(venId, resourceId), { body, parse: parseExistingResource });
  }

  async deleteVenResourceById(venId: string, resourceId: string): Promise<ExistingResource> {
    return this.request('DELETE', resourcePath(venId, resourceId), { parse: parseExistingResource });
  }
}
