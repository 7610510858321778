import { formatEther, formatUnits } from 'ethers'
import { LedgerClient, TokenBalance } from '../providers/types'
import { DiscoverySource, PortfolioSnapshot, SnapshotMode, TokenHolding } from '../types'
import { ValueResolver } from '../pricing/resolver'
import { TokenDiscovery } from './discovery'
import { canonicalizeAddress } from '../utils/address'
import { DiscoveryError, MonitorError, errorMessage } from '../utils/errors'

export type AggregatorOptions = { ledger: LedgerClient; resolver: ValueResolver; fallback: TokenDiscovery; primary?: TokenDiscovery }

/** Sum in contract-address order so the float total does not depend on discovery order. */
export function canonicalTotal(holdings: readonly TokenHolding[]): number {
  return [...holdings]
    .sort((a, b) => a.contract.toLowerCase() < b.contract.toLowerCase() ? -1 : a.contract.toLowerCase() > b.contract.toLowerCase() ? 1 : 0)
    .reduce((sum, h) => sum + h.nativeValue, 0)
}

/** Descending by native value; Array#sort is stable, so ties keep discovery order. */
export const rankHoldings = (holdings: readonly TokenHolding[]): TokenHolding[] => [...holdings].sort((a, b) => b.nativeValue - a.nativeValue)

/**
 * Builds portfolio snapshots on demand: native balance plus token holdings,
 * each valued in the native unit. Independent of the scan loop.
 */
export class BalanceAggregator {
  private ledger: LedgerClient
  private resolver: ValueResolver
  private primary?: TokenDiscovery
  private fallback: TokenDiscovery

  constructor(opts: AggregatorOptions) {
    this.ledger = opts.ledger
    this.resolver = opts.resolver
    this.primary = opts.primary
    this.fallback = opts.fallback
  }

  async snapshot(address: string, mode: SnapshotMode): Promise<PortfolioSnapshot> {
    const owner = canonicalizeAddress(address)
    const nativeBalance = await this.ledger.getBalance(owner)
    const nativeBalanceEth = Number(formatEther(nativeBalance))

    const { tokens, discovery } = await this.collect(owner, mode)
    const holdings = await this.value(dedupe(tokens))
    const tokenValueTotal = canonicalTotal(holdings)
    const snapshot: PortfolioSnapshot = { address: owner, nativeBalance, nativeBalanceEth, holdings: rankHoldings(holdings), tokenValueTotal, total: nativeBalanceEth + tokenValueTotal, discovery }
    console.log(`[Aggregator] ${owner}: ${nativeBalanceEth.toFixed(6)} ETH + ${tokenValueTotal.toFixed(6)} ETH in ${holdings.length} token(s) = ${snapshot.total.toFixed(6)} ETH`)
    return snapshot
  }

  private async collect(owner: string, mode: SnapshotMode): Promise<{ tokens: TokenBalance[]; discovery: DiscoverySource }> {
    switch (mode.kind) {
      case 'native':
        return { tokens: [], discovery: 'none' }
      case 'single':
        try {
          return { tokens: [await this.ledger.getTokenBalance(owner, canonicalizeAddress(mode.contract))], discovery: 'single' }
        } catch (e) {
          if (!(e instanceof MonitorError)) throw e
          console.error(`[Aggregator] Token balance failed for ${mode.contract}: ${errorMessage(e)}`)
          return { tokens: [], discovery: 'single' }
        }
      case 'full':
        if (this.primary) {
          try { return { tokens: await this.primary.discover(owner), discovery: 'primary' } }
          catch (e) {
            if (!(e instanceof DiscoveryError)) throw e
            console.warn(`[Aggregator] ${e.message}; falling back to ${this.fallback.name}`)
          }
        }
        return { tokens: await this.fallback.discover(owner), discovery: 'fallback' }
    }
  }

  private async value(tokens: TokenBalance[]): Promise<TokenHolding[]> {
    return Promise.all(tokens.map(async t => {
      const balance = Number(formatUnits(t.rawBalance, t.decimals))
      const nativeValue = await this.resolver.valueInNative({ contract: t.contract, symbol: t.symbol, balance })
      const holding: TokenHolding = { contract: t.contract, symbol: t.symbol, rawBalance: t.rawBalance, decimals: t.decimals, balance, nativeValue }
      return holding
    }))
  }
}

/** First occurrence per contract wins; zero balances are dropped. */
function dedupe(tokens: TokenBalance[]): TokenBalance[] {
  const seen = new Set<string>()
  const out: TokenBalance[] = []
  for (const t of tokens) {
    const key = t.contract.toLowerCase()
    if (t.rawBalance <= 0n || seen.has(key)) continue
    seen.add(key)
    out.push({ ...t, contract: canonicalizeAddress(t.contract) })
  }
  return out
}
