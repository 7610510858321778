import * as fs from 'fs'
import { canonicalizeAddress, isValidAddress } from '../utils/address'

export type CuratedToken = { address: string; symbol: string }
export type TokenListFile = { wrappedNative: string[]; priceIds: Record<string, string>; curated: CuratedToken[] }

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v)

function requireAddress(value: unknown, where: string): string {
  if (typeof value !== 'string' || !isValidAddress(value.toLowerCase())) throw new Error(`Token list: invalid address at ${where}`)
  return canonicalizeAddress(value)
}

/** Validates the parsed token list file; throws with the offending location. */
export function parseTokenList(raw: unknown): TokenListFile {
  if (!isRecord(raw)) throw new Error('Token list must be a JSON object')
  const { wrappedNative = [], priceIds = {}, curated = [] } = raw
  if (!Array.isArray(wrappedNative)) throw new Error('Token list: "wrappedNative" must be an array')
  if (!isRecord(priceIds)) throw new Error('Token list: "priceIds" must be an object')
  if (!Array.isArray(curated)) throw new Error('Token list: "curated" must be an array')
  const ids: Record<string, string> = {}
  for (const [addr, id] of Object.entries(priceIds)) {
    if (typeof id !== 'string' || !id) throw new Error(`Token list: empty price id for ${addr}`)
    ids[requireAddress(addr, `priceIds.${addr}`)] = id
  }
  return {
    wrappedNative: wrappedNative.map((a, i) => requireAddress(a, `wrappedNative[${i}]`)),
    priceIds: ids,
    curated: curated.map((t, i) => {
      if (!isRecord(t) || typeof t.symbol !== 'string' || !t.symbol) throw new Error(`Token list: curated[${i}] needs "address" and "symbol"`)
      return { address: requireAddress(t.address, `curated[${i}]`), symbol: t.symbol }
    })
  }
}

/**
 * Static token table, loaded once at startup. Addresses are canonical. The
 * curated list is de-duplicated by contract address only: one symbol listed
 * under two addresses stays two entries.
 */
export class TokenRegistry {
  private wrapped: Set<string>
  private priceIds: Map<string, string>
  private curatedTokens: CuratedToken[] = []

  constructor(list: TokenListFile) {
    this.wrapped = new Set(list.wrappedNative.map(canonicalizeAddress))
    this.priceIds = new Map(Object.entries(list.priceIds).map(([a, id]) => [canonicalizeAddress(a), id]))
    const seen = new Set<string>()
    for (const t of list.curated) {
      const address = canonicalizeAddress(t.address)
      if (seen.has(address)) continue
      seen.add(address)
      this.curatedTokens.push({ address, symbol: t.symbol })
    }
  }

  static load(filePath: string): TokenRegistry {
    if (!fs.existsSync(filePath)) throw new Error(`Token list not found: ${filePath}`)
    return new TokenRegistry(parseTokenList(JSON.parse(fs.readFileSync(filePath, 'utf-8'))))
  }

  isWrappedNative(contract: string): boolean { return this.wrapped.has(canonicalizeAddress(contract)) }
  priceIdOf(contract: string): string | undefined { return this.priceIds.get(canonicalizeAddress(contract)) }
  curated(): readonly CuratedToken[] { return this.curatedTokens }
  get priceIdCount(): number { return this.priceIds.size }
}
