/**
 * Subscriptions HTTP interface (`/subscriptions`)
 */

import {
  parseExistingSubscription,
  parseNewSubscription,
  type ExistingSubscription,
  type NewSubscription,
} from '../../models/subscription.js';
import { withCreationGuard } from '../../models/validation.js';
import {
  HttpInterface,
  assertMatchingId,
  paginationQuery,
  parseList,
  targetQuery,
} from './http-interface.js';
import type {
  ReadOnlySubscriptionsInterface,
  ReadWriteSubscriptionsInterface,
  SubscriptionFilter,
} from './interfaces.js';

export class SubscriptionsReadOnlyHttpInterface extends HttpInterface implements ReadOnlySubscriptionsInterface {
  async getSubscriptions(filter: SubscriptionFilter = {}): Promise<ExistingSubscription[]> {
    return this.request('GET', '/subscriptions', {
      query: {
        ...targetQuery(filter.target),
        ...paginationQuery(filter.pagination),
        programID: filter.programId,
        clientName: filter.clientName,
        objects: filter.objects,
      },
      parse: parseList(parseExistingSubscription),
    });
  }

  async getSubscriptionById(subscriptionId: string): Promise<ExistingSubscription> {
    return this.request('GET', `/subscriptions/${encodeURIComponent(subscriptionId)}`, {
      parse: parseExistingSubscription,
    });
  }
}

export class SubscriptionsHttpInterface
  extends SubscriptionsReadOnlyHttpInterface
  implements ReadWriteSubscriptionsInterface
{
  async createSubscription(newSubscription: NewSubscription): Promise<ExistingSubscription> {
    return withCreationGuard('Subscription', newSubscription, async () =>
      this.request('POST', '/subscriptions', {
        body: parseNewSubscription(newSubscription),
        parse: parseExistingSubscription,
      })
    );
  }

  async updateSubscriptionById(
    subscriptionId: string,
    subscription: ExistingSubscription
  ): Promise<ExistingSubscription> {
    assertMatchingId('ExistingSubscription', 'id', subscriptionId, subscription.id);
    const body = parseExistingSubscription(subscription);
    return this.request('PUT', `/subscriptions/${encodeURIComponent(subscriptionId)}`, {
      body,
      parse: parseExistingSubscription,
    });
  }

  async deleteSubscriptionById(subscriptionId: string): Promise<ExistingSubscription> {
    return this.request('DELETE', `/subscriptions/${encodeURIComponent(subscriptionId)}`, {
      parse: parseExistingSubscription,
    });
  }
}
