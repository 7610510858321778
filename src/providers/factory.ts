import { FailoverStrategy } from './types'
import { RpcLedgerClient, redactUrl } from './base'
import { ProviderManager } from './manager'
import { AlchemyTokenDiscovery, alchemyKeyFromUrl } from './alchemy'

export type LedgerConfig = { urls:string[], network:string, timeoutMs:number, strategy?:FailoverStrategy, healthIntervalMs?:number }

/** Splits a comma-separated endpoint list, dropping blanks and duplicates. */
export function parseEndpointList(v:string|undefined): string[] {
  if (!v) return []
  return [...new Set(v.split(',').map(s => s.trim()).filter(Boolean))]
}

export function createLedgerClient(url:string, network:string, timeoutMs:number, index?:number): RpcLedgerClient {
  return new RpcLedgerClient({ url, network, timeoutMs, name: index === undefined ? undefined : `${redactUrl(url)}#${index + 1}` })
}

/** One RpcLedgerClient per endpoint, behind a failover manager; the first URL has priority. */
export function createLedger(cfg:LedgerConfig): ProviderManager {
  if (!cfg.urls.length) throw new Error('No RPC endpoints configured')
  const clients = cfg.urls.map((u, i) => cfg.urls.length > 1 ? createLedgerClient(u, cfg.network, cfg.timeoutMs, i) : createLedgerClient(u, cfg.network, cfg.timeoutMs))
  return new ProviderManager(clients, { strategy: cfg.strategy, healthIntervalMs: cfg.healthIntervalMs })
}

/** Alchemy token discovery from an explicit key, or from the first Alchemy endpoint URL. */
export function createTokenDiscovery(cfg:{ apiKey?:string, urls:string[], network:string, timeoutMs:number }): AlchemyTokenDiscovery|undefined {
  const apiKey = cfg.apiKey || cfg.urls.map(alchemyKeyFromUrl).find((k): k is string => !!k)
  return apiKey ? new AlchemyTokenDiscovery({ apiKey, network: cfg.network, timeoutMs: cfg.timeoutMs }) : undefined
}
