import { SubscriberId, Subscriber } from '../types'
import { SubscriptionStore } from './store'
import { canonicalizeAddress } from '../utils/address'

export type { SubscriptionStore } from './store'
export { JsonSubscriptionStore } from './store'

/**
 * Read-through view of the store for the monitoring core. Nothing is cached
 * between calls: subscriptions change out-of-band through the front end.
 */
export class SubscriptionIndex {
  constructor(private store: SubscriptionStore) {}

  async allWatchedAddresses(): Promise<Set<string>> {
    const all = await this.store.allAddressesWithSubscribers()
    return new Set([...all].filter(([, ids]) => ids.length > 0).map(([address]) => address))
  }

  /** Subscribers currently stored for the address, each with their own label; [] when orphaned. */
  async subscribersOf(address: string): Promise<Subscriber[]> {
    const canonical = canonicalizeAddress(address)
    const ids: SubscriberId[] = (await this.store.allAddressesWithSubscribers()).get(canonical) ?? []
    const out: Subscriber[] = []
    for (const subscriberId of new Set(ids)) {
      const label = await this.store.labelFor(subscriberId, canonical)
      if (label !== undefined) out.push({ subscriberId, label })
    }
    return out
  }
}
