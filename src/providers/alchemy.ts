import { Alchemy, Network, TokenBalanceType } from 'alchemy-sdk'
import { TokenBalance } from './types'
import { TokenDiscovery } from '../portfolio/discovery'
import { DiscoveryError, errorMessage } from '../utils/errors'
import { withTimeout } from '../utils/retry'

const NETWORKS: Record<string, Network> = { mainnet: Network.ETH_MAINNET, sepolia: Network.ETH_SEPOLIA, polygon: Network.MATIC_MAINNET, arbitrum: Network.ARB_MAINNET, optimism: Network.OPT_MAINNET, base: Network.BASE_MAINNET }
export const MAX_PAGES = 5

/** The two Alchemy calls discovery makes; `alchemyBalanceSource` adapts the SDK to it. */
export interface TokenBalanceSource {
  getTokenBalances(owner: string, pageKey?: string): Promise<{ tokenBalances: Array<{ contractAddress: string, tokenBalance: string|null }>, pageKey?: string }>
  getTokenMetadata(contract: string): Promise<{ symbol: string|null, decimals: number|null, name: string|null }>
}

export type AlchemyDiscoveryOptions = { apiKey:string, network:string, timeoutMs:number, source?:TokenBalanceSource }

export function alchemyBalanceSource(alchemy: Alchemy): TokenBalanceSource {
  return {
    getTokenBalances: (owner, pageKey) => alchemy.core.getTokenBalances(owner, { type: TokenBalanceType.ERC20, pageKey }),
    getTokenMetadata: contract => alchemy.core.getTokenMetadata(contract)
  }
}

/** Pulls the key out of an `https://<net>.g.alchemy.com/v2/<key>` endpoint URL. */
export function alchemyKeyFromUrl(url: string): string|undefined {
  if (!url.includes('alchemy.com') || !url.includes('/v2/')) return undefined
  const key = url.split('/v2/').pop()?.split(/[/?#]/)[0]
  return key || undefined
}

/**
 * Provider-assisted discovery: one bulk balance query (paged) instead of a
 * probe per contract, then metadata per nonzero contract.
 */
export class AlchemyTokenDiscovery implements TokenDiscovery {
  readonly name = 'alchemy'
  private source: TokenBalanceSource
  private timeoutMs: number

  constructor(opts: AlchemyDiscoveryOptions) {
    this.source = opts.source ?? alchemyBalanceSource(new Alchemy({ apiKey: opts.apiKey, network: NETWORKS[opts.network] || Network.ETH_MAINNET }))
    this.timeoutMs = opts.timeoutMs
  }

  async discover(address: string): Promise<TokenBalance[]> {
    const nonzero: Array<{ contract:string, rawBalance:bigint }> = []
    try {
      let pageKey: string|undefined
      let pages = 0
      do {
        const res = await withTimeout(this.source.getTokenBalances(address, pageKey), this.timeoutMs, 'alchemy getTokenBalances')
        for (const b of res.tokenBalances) {
          if (!b.tokenBalance) continue
          let raw: bigint
          try { raw = BigInt(b.tokenBalance) } catch { console.debug(`[Discovery] Bad balance for ${b.contractAddress}: ${b.tokenBalance}`); continue }
          if (raw > 0n) nonzero.push({ contract: b.contractAddress, rawBalance: raw })
        }
        pageKey = res.pageKey
        pages++
      } while (pageKey && pages < MAX_PAGES)
      if (pageKey) console.warn(`[Discovery] Stopped after ${MAX_PAGES} pages for ${address}; remaining balances not fetched`)
    } catch (e) {
      throw new DiscoveryError(`Alchemy discovery failed: ${errorMessage(e)}`, { cause: e })
    }
    console.log(`[Discovery] Alchemy found ${nonzero.length} nonzero token contract(s) for ${address}`)

    const results = await Promise.allSettled(nonzero.map(async t => {
      const m = await withTimeout(this.source.getTokenMetadata(t.contract), this.timeoutMs, `alchemy metadata(${t.contract})`)
      const token: TokenBalance = { contract: t.contract, rawBalance: t.rawBalance, symbol: m.symbol || 'UNKNOWN', decimals: m.decimals ?? 18, name: m.name || undefined }
      return token
    }))
    const found: TokenBalance[] = []
    results.forEach((r, i) => {
      if (r.status === 'fulfilled') found.push(r.value)
      else console.debug(`[Discovery] Metadata failed for ${nonzero[i].contract}: ${errorMessage(r.reason)}`)
    })
    return found
  }
}
