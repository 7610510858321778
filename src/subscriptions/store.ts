import * as fs from 'fs';
import * as path from 'path';
import { AddResult, RemoveResult, SubscriberId, Subscription } from '../types';
import { canonicalizeAddress, isValidAddress } from '../utils/address';

/**
 * Storage boundary for address → subscriber mappings. Addresses crossing it
 * are canonical; (address, subscriberId) is unique.
 */
export interface SubscriptionStore {
  addSubscription(subscriberId: SubscriberId, address: string, label: string): Promise<AddResult>;
  removeSubscription(subscriberId: SubscriberId, address: string): Promise<RemoveResult>;
  subscriptionsOf(subscriberId: SubscriberId): Promise<Subscription[]>;
  allAddressesWithSubscribers(): Promise<Map<string, SubscriberId[]>>;
  labelFor(subscriberId: SubscriberId, address: string): Promise<string | undefined>;
}

interface PersistedSubscriptions {
  version: number;
  subscriptions: Subscription[];
}

const isSubscription = (v: unknown): v is Subscription =>
  typeof v === 'object' && v !== null &&
  typeof Reflect.get(v, 'subscriberId') === 'number' &&
  typeof Reflect.get(v, 'address') === 'string' &&
  isValidAddress(Reflect.get(v, 'address')) &&
  typeof Reflect.get(v, 'label') === 'string';

/**
 * File-backed store under `<dataDir>/subscriptions.json`. Writes are debounced;
 * call forceSave() on shutdown.
 */
export class JsonSubscriptionStore implements SubscriptionStore {
  private filePath: string;
  private subscriptions: Subscription[];
  private saveDebounceTimer: NodeJS.Timeout | null = null;
  private readonly saveDebounceMs: number;

  constructor(dataDir: string = '.data', saveDebounceMs: number = 1000) {
    const dir = path.resolve(process.cwd(), dataDir);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    this.filePath = path.join(dir, 'subscriptions.json');
    this.saveDebounceMs = saveDebounceMs;
    this.subscriptions = this.load();
  }

  private load(): Subscription[] {
    if (!fs.existsSync(this.filePath)) return [];
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const list: unknown = typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'subscriptions') : undefined;
      if (!Array.isArray(list)) throw new Error('missing "subscriptions" array');
      const valid = list.filter(isSubscription);
      if (valid.length !== list.length) {
        console.warn(`[Store] Ignored ${list.length - valid.length} malformed subscription(s)`);
      }
      // first entry wins for each (subscriber, address) pair
      const unique = new Map<string, Subscription>();
      for (const s of valid) {
        const address = canonicalizeAddress(s.address);
        const key = `${s.subscriberId}:${address}`;
        if (!unique.has(key)) {
          unique.set(key, { ...s, address, createdAt: typeof s.createdAt === 'number' ? s.createdAt : 0 });
        }
      }
      if (unique.size !== valid.length) {
        console.warn(`[Store] Merged ${valid.length - unique.size} duplicate subscription(s)`);
      }
      return [...unique.values()];
    } catch (error) {
      // an unreadable store is fatal; it is never overwritten with an empty one
      throw new Error(`Failed to load subscriptions from ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private saveImmediate(): void {
    const state: PersistedSubscriptions = { version: 1, subscriptions: this.subscriptions };
    try {
      const tmp = `${this.filePath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(state, null, 2));
      fs.renameSync(tmp, this.filePath);
    } catch (error) {
      console.error('[Store] Failed to save subscriptions:', error);
    }
  }

  save(): void {
    if (this.saveDebounceTimer) {
      clearTimeout(this.saveDebounceTimer);
    }
    this.saveDebounceTimer = setTimeout(() => {
      this.saveImmediate();
      this.saveDebounceTimer = null;
    }, this.saveDebounceMs);
  }

  forceSave(): void {
    if (this.saveDebounceTimer) {
      clearTimeout(this.saveDebounceTimer);
      this.saveDebounceTimer = null;
    }
    this.saveImmediate();
  }

  private find(subscriberId: SubscriberId, address: string): Subscription | undefined {
    return this.subscriptions.find(s => s.subscriberId === subscriberId && s.address === address);
  }

  async addSubscription(subscriberId: SubscriberId, address: string, label: string): Promise<AddResult> {
    const canonical = canonicalizeAddress(address);
    if (this.find(subscriberId, canonical)) return 'exists';
    this.subscriptions.push({ subscriberId, address: canonical, label, createdAt: Date.now() });
    this.save();
    return 'added';
  }

  async removeSubscription(subscriberId: SubscriberId, address: string): Promise<RemoveResult> {
    const canonical = canonicalizeAddress(address);
    const before = this.subscriptions.length;
    this.subscriptions = this.subscriptions.filter(s => !(s.subscriberId === subscriberId && s.address === canonical));
    if (this.subscriptions.length === before) return 'not_found';
    this.save();
    return 'removed';
  }

  async subscriptionsOf(subscriberId: SubscriberId): Promise<Subscription[]> {
    return this.subscriptions.filter(s => s.subscriberId === subscriberId).map(s => ({ ...s }));
  }

  async allAddressesWithSubscribers(): Promise<Map<string, SubscriberId[]>> {
    const map = new Map<string, SubscriberId[]>();
    for (const s of this.subscriptions) {
      const ids = map.get(s.address);
      if (ids) ids.push(s.subscriberId);
      else map.set(s.address, [s.subscriberId]);
    }
    return map;
  }

  async labelFor(subscriberId: SubscriberId, address: string): Promise<string | undefined> {
    return this.find(subscriberId, canonicalizeAddress(address))?.label;
  }

  cleanup(): void {
    if (this.saveDebounceTimer) {
      clearTimeout(this.saveDebounceTimer);
      this.saveDebounceTimer = null;
    }
  }
}
