import { LedgerClient, TokenBalance } from '../providers/types'
import { TokenRegistry } from './registry'
import { NotFoundError, errorMessage } from '../utils/errors'

/**
 * Finds every nonzero token balance of an address. Implementations that can
 * fail as a whole reject with DiscoveryError so the caller can fall back.
 */
export interface TokenDiscovery {
  readonly name: string
  discover(address: string): Promise<TokenBalance[]>
}

/** Probes each curated contract individually; one contract failing does not affect the others. */
export class CuratedListDiscovery implements TokenDiscovery {
  readonly name = 'curated'

  constructor(private ledger: LedgerClient, private registry: TokenRegistry) {}

  async discover(address: string): Promise<TokenBalance[]> {
    const entries = this.registry.curated()
    console.log(`[Discovery] Probing ${entries.length} curated tokens for ${address}`)
    const results = await Promise.allSettled(entries.map(t => this.ledger.getTokenBalance(address, t.address)))
    const found: TokenBalance[] = []
    results.forEach((r, i) => {
      const entry = entries[i]
      if (r.status === 'rejected') {
        if (!(r.reason instanceof NotFoundError)) console.debug(`[Discovery] ${entry.symbol} probe failed: ${errorMessage(r.reason)}`)
        return
      }
      if (r.value.rawBalance > 0n) found.push({ ...r.value, contract: entry.address, symbol: r.value.symbol === 'UNKNOWN' ? entry.symbol : r.value.symbol })
    })
    return found
  }
}
