import axios, { AxiosInstance } from 'axios';
import { TokenRegistry } from '../portfolio/registry';
import { RateLimiter, createPriceLimiter } from '../utils/rate-limiter';
import { errorMessage } from '../utils/errors';

export const DEFAULT_PRICE_API_URL = 'https://api.coingecko.com/api/v3';
const MAX_TIMEOUT_MS = 10000;

/** What the resolver needs to know about a holding. */
export interface ValuationInput {
  contract: string;
  symbol: string;
  balance: number;
}

export interface ValueResolver {
  valueInNative(holding: ValuationInput): Promise<number>;
}

export interface ResolverOptions {
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  limiter?: RateLimiter;
}

/**
 * Converts a token balance into its native-unit (ETH) equivalent. A miss of
 * any kind values the holding at zero; nothing is thrown to the caller.
 */
export class TokenValueResolver implements ValueResolver {
  private registry: TokenRegistry;
  private http: AxiosInstance;
  private limiter: RateLimiter;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(registry: TokenRegistry, options: ResolverOptions = {}) {
    this.registry = registry;
    this.limiter = options.limiter ?? createPriceLimiter();
    this.http = options.http ?? axios.create();
    this.baseUrl = options.baseUrl ?? DEFAULT_PRICE_API_URL;
    this.timeoutMs = Math.min(options.timeoutMs ?? MAX_TIMEOUT_MS, MAX_TIMEOUT_MS);
  }

  async valueInNative(holding: ValuationInput): Promise<number> {
    if (this.registry.isWrappedNative(holding.contract)) {
      return holding.balance;
    }

    const priceId = this.registry.priceIdOf(holding.contract);
    if (!priceId) {
      console.debug(`[Resolver] No price id for ${holding.symbol} (${holding.contract})`);
      return 0;
    }

    const price = await this.fetchNativePrice(priceId, holding.symbol);
    return holding.balance * price;
  }

  private async fetchNativePrice(priceId: string, symbol: string): Promise<number> {
    try {
      await this.limiter.acquire();
      const response = await this.http.get<unknown>('/simple/price', {
        baseURL: this.baseUrl,
        timeout: this.timeoutMs,
        params: { ids: priceId, vs_currencies: 'eth' },
        // status is checked by hand so a non-200 never throws
        validateStatus: () => true
      });

      if (response.status !== 200) {
        console.warn(`[Resolver] Failed to fetch price for ${symbol}: HTTP ${response.status}`);
        return 0;
      }

      return readEthPrice(response.data, priceId) ?? 0;
    } catch (error) {
      console.error(`[Resolver] Error getting ETH value for ${symbol}: ${errorMessage(error)}`);
      return 0;
    }
  }
}

/** `{ "<id>": { "eth": <number> } }` → the number, or undefined when the shape is off. */
export function readEthPrice(payload: unknown, priceId: string): number | undefined {
  if (typeof payload !== 'object' || payload === null) return undefined;
  const entry: unknown = Reflect.get(payload, priceId);
  if (typeof entry !== 'object' || entry === null) return undefined;
  const eth: unknown = Reflect.get(entry, 'eth');
  return typeof eth === 'number' && Number.isFinite(eth) && eth >= 0 ? eth : undefined;
}
