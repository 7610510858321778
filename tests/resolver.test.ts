import axios, { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { TokenRegistry } from '../src/portfolio/registry';
import { TokenValueResolver, readEthPrice } from '../src/pricing/resolver';
import { RateLimiter } from '../src/utils/rate-limiter';

const USDT = '0xdAC17F958D2ee523a2206206994597C13D831ec7';
const WETH = '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2';
const UNLISTED = '0x8E870D67F660D95d5be530380D0eC0bd388289E1';

const registry = new TokenRegistry({
  wrappedNative: [WETH],
  priceIds: { [USDT]: 'tether' },
  curated: []
});

type FakeReply = { status: number; data: unknown } | Error;

function fakePriceApi(reply: FakeReply): { resolver: TokenValueResolver; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    if (reply instanceof Error) throw reply;
    return { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config };
  };
  const resolver = new TokenValueResolver(registry, {
    baseUrl: 'https://prices.test/api',
    timeoutMs: 30000,
    http: axios.create({ adapter }),
    limiter: new RateLimiter(100, 100)
  });
  return { resolver, requests };
}

describe('TokenValueResolver', () => {
  it('should value a wrapped-native holding at its balance without a request', async () => {
    const { resolver, requests } = fakePriceApi({ status: 200, data: {} });
    await expect(resolver.valueInNative({ contract: WETH.toLowerCase(), symbol: 'WETH', balance: 2.5 })).resolves.toBe(2.5);
    expect(requests).toHaveLength(0);
  });

  it('should return 0 without a request for a contract with no price id', async () => {
    const { resolver, requests } = fakePriceApi({ status: 200, data: {} });
    await expect(resolver.valueInNative({ contract: UNLISTED, symbol: 'USDP', balance: 100 })).resolves.toBe(0);
    expect(requests).toHaveLength(0);
  });

  it('should multiply the balance by the quoted native price', async () => {
    const { resolver, requests } = fakePriceApi({ status: 200, data: { tether: { eth: 0.0005 } } });
    await expect(resolver.valueInNative({ contract: USDT, symbol: 'USDT', balance: 200 })).resolves.toBeCloseTo(0.1, 12);
    expect(requests).toHaveLength(1);
    expect(requests[0].baseURL).toBe('https://prices.test/api');
    expect(requests[0].url).toBe('/simple/price');
    expect(requests[0].params).toEqual({ ids: 'tether', vs_currencies: 'eth' });
  });

  it('should cap the request timeout at ten seconds', async () => {
    const { resolver, requests } = fakePriceApi({ status: 200, data: { tether: { eth: 1 } } });
    await resolver.valueInNative({ contract: USDT, symbol: 'USDT', balance: 1 });
    expect(requests[0].timeout).toBe(10000);
  });

  it('should return 0 on a non-success status', async () => {
    const { resolver } = fakePriceApi({ status: 429, data: { status: { error_code: 429 } } });
    await expect(resolver.valueInNative({ contract: USDT, symbol: 'USDT', balance: 200 })).resolves.toBe(0);
  });

  it('should return 0 when the identifier is missing from the response', async () => {
    const { resolver } = fakePriceApi({ status: 200, data: {} });
    await expect(resolver.valueInNative({ contract: USDT, symbol: 'USDT', balance: 200 })).resolves.toBe(0);
  });

  it('should return 0 when the request fails', async () => {
    const { resolver } = fakePriceApi(new Error('connect ECONNREFUSED'));
    await expect(resolver.valueInNative({ contract: USDT, symbol: 'USDT', balance: 200 })).resolves.toBe(0);
  });
});

describe('readEthPrice', () => {
  it('should read the eth quote for the id', () => {
    expect(readEthPrice({ dai: { eth: 0.0004 } }, 'dai')).toBe(0.0004);
  });

  it('should reject shapes that are not a finite non-negative number', () => {
    expect(readEthPrice(null, 'dai')).toBeUndefined();
    expect(readEthPrice({ dai: { usd: 1 } }, 'dai')).toBeUndefined();
    expect(readEthPrice({ dai: { eth: '0.1' } }, 'dai')).toBeUndefined();
    expect(readEthPrice({ dai: { eth: -1 } }, 'dai')).toBeUndefined();
  });
});
