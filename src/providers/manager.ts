import { LedgerClient, LedgerBlock, Log, LogFilter, ProviderHealth, TokenBalance, TokenMetadata, FailoverStrategy } from './types'
import { errorMessage, isTransient } from '../utils/errors'
import { withRetry } from '../utils/retry'

const HEALTH_INTERVAL = 30000, MAX_FAILURES = 3

type ManagedClient = { client:LedgerClient, health:ProviderHealth, priority:number }
export type ProviderManagerOptions = { strategy?:FailoverStrategy, healthIntervalMs?:number, startupAttempts?:number, startupDelayMs?:number }

/**
 * LedgerClient over several endpoints. Calls go to the current endpoint and
 * fail over on transport errors; a NotFoundError is an answer and is returned
 * to the caller as-is. Safe to share between the scan loop and query handlers.
 */
export class ProviderManager implements LedgerClient {
  readonly name = 'manager'
  private clients: ManagedClient[] = []
  private currentIdx = 0
  private strategy: FailoverStrategy
  private healthIntervalMs: number
  private healthInterval?: NodeJS.Timeout
  private initialized = false
  private startupAttempts: number
  private startupDelayMs: number

  constructor(clients: LedgerClient[] = [], opts: ProviderManagerOptions = {}) {
    this.strategy = opts.strategy || 'priority'
    this.healthIntervalMs = opts.healthIntervalMs ?? HEALTH_INTERVAL
    this.startupAttempts = Math.max(1, opts.startupAttempts ?? 3)
    this.startupDelayMs = opts.startupDelayMs ?? 2000
    clients.forEach(c => this.addClient(c))
  }

  addClient(client: LedgerClient): void {
    const priority = this.clients.length
    this.clients.push({ client, priority, health: { name: client.name, healthy: false, consecutiveFailures: 0 } })
  }

  /** Probes every endpoint; rejects when none answers, which is fatal at startup. */
  async initialize(): Promise<void> {
    if (this.initialized) return
    if (!this.clients.length) throw new Error('No RPC endpoints configured')
    const idx = await withRetry(async () => {
      await this.performHealthChecks()
      const i = this.clients.findIndex(m => m.health.healthy)
      if (i < 0) throw new Error(`No reachable RPC endpoint (${this.clients.map(m => m.client.name).join(', ')})`)
      return i
    }, { maxAttempts: this.startupAttempts, baseDelayMs: this.startupDelayMs, onRetry: (n, e) => console.warn(`[Providers] Startup attempt ${n} failed: ${e.message}`) })
    this.currentIdx = idx
    if (this.healthIntervalMs > 0) {
      this.healthInterval = setInterval(() => { void this.performHealthChecks() }, this.healthIntervalMs)
      this.healthInterval.unref()
    }
    this.initialized = true
    const info = this.getCurrentProviderInfo()
    console.log(`[Providers] Using ${info.name} (${info.index + 1}/${info.total})`)
  }

  async shutdown(): Promise<void> {
    if (this.healthInterval) { clearInterval(this.healthInterval); this.healthInterval = undefined }
    await Promise.all(this.clients.map(m => m.client.destroy?.()))
    this.initialized = false
  }

  getHealthStatus(): ProviderHealth[] { return this.clients.map(m => ({ ...m.health })) }
  getCurrentProviderInfo(): { name:string, index:number, total:number } { return { name: this.clients[this.currentIdx]?.client.name ?? 'none', index: this.currentIdx, total: this.clients.length } }

  private findHealthy(): boolean {
    if (this.strategy === 'round-robin') {
      for (let i = 1; i < this.clients.length; i++) { const idx = (this.currentIdx + i) % this.clients.length; if (this.clients[idx].health.healthy) { this.currentIdx = idx; return true } }
    } else {
      const idx = this.clients.findIndex(m => m.health.healthy)
      if (idx >= 0 && idx !== this.currentIdx) { this.currentIdx = idx; return true }
    }
    return false
  }

  async healthCheck(): Promise<ProviderHealth[]> { await this.performHealthChecks(); return this.getHealthStatus() }

  private async performHealthChecks(): Promise<void> {
    await Promise.all(this.clients.map(async m => {
      const start = Date.now()
      let blockNumber: number|undefined
      try { blockNumber = await m.client.getBlockNumber() } catch (e) { m.health.lastError = errorMessage(e) }
      if (blockNumber !== undefined) m.health = { name: m.client.name, healthy: true, latencyMs: Date.now() - start, blockNumber, consecutiveFailures: 0 }
      else { m.health.healthy = false; m.health.consecutiveFailures++ }
    }))
    const cur = this.clients[this.currentIdx]
    // prefer the highest-priority endpoint once it recovers
    const best = this.clients.findIndex(m => m.health.healthy)
    if (best >= 0 && (!cur?.health.healthy || (this.strategy === 'priority' && best < this.currentIdx))) this.currentIdx = best
  }

  async executeWithFailover<T>(fn:(c:LedgerClient)=>Promise<T>): Promise<T> {
    if (!this.clients.length) throw new Error('No RPC endpoints configured')
    let lastErr: unknown
    const tried = new Set<number>()
    while (tried.size < this.clients.length) {
      while (tried.has(this.currentIdx)) this.currentIdx = (this.currentIdx + 1) % this.clients.length
      const m = this.clients[this.currentIdx]
      tried.add(this.currentIdx)
      try { const r = await fn(m.client); m.health.consecutiveFailures = 0; m.health.healthy = true; return r }
      catch (e) {
        if (!isTransient(e)) throw e
        lastErr = e
        m.health.consecutiveFailures++; m.health.lastError = errorMessage(e)
        if (m.health.consecutiveFailures >= MAX_FAILURES) m.health.healthy = false
        if (this.clients.length > 1) console.warn(`[Providers] ${m.client.name} failed (${m.health.lastError}), trying next endpoint`)
        this.findHealthy()
      }
    }
    throw lastErr
  }

  getBlockNumber(): Promise<number> { return this.executeWithFailover(c => c.getBlockNumber()) }
  getBalance(address: string): Promise<bigint> { return this.executeWithFailover(c => c.getBalance(address)) }
  getTokenBalance(address: string, contract: string): Promise<TokenBalance> { return this.executeWithFailover(c => c.getTokenBalance(address, contract)) }
  getTokenMetadata(contract: string): Promise<TokenMetadata> { return this.executeWithFailover(c => c.getTokenMetadata(contract)) }
  getBlock(height: number): Promise<LedgerBlock> { return this.executeWithFailover(c => c.getBlock(height)) }
  getLogs(filter: LogFilter): Promise<Log[]> { return this.executeWithFailover(c => c.getLogs(filter)) }

  async isReachable(): Promise<boolean> {
    const results = await Promise.all(this.clients.map(m => m.client.isReachable()))
    return results.some(Boolean)
  }
}
