import { LedgerBlock, LedgerClient } from '../providers/types'
import { TransferEvent } from '../types'
import { SubscriptionIndex } from '../subscriptions'
import { TransferExtractor, toWatched } from './extractors'
import { sleep } from '../utils/retry'
import { errorMessage } from '../utils/errors'

export interface EventSink { dispatch(events: readonly TransferEvent[]): Promise<unknown> }

export type ScannerState = 'idle' | 'scanning'
export type TickResult = { fromBlock: number; toBlock: number; events: TransferEvent[]; skipped: number[] }
export type ScannerStatus = { state: ScannerState; watermark: number | null; lastTick?: { fromBlock: number; toBlock: number; at: number }; skipped: number[]; eventsEmitted: number; ticks: number }
type ScannerOpts = { ledger: LedgerClient; index: SubscriptionIndex; sink: EventSink; extractors: TransferExtractor[]; lookbackBlocks?: number; intervalMs?: number }

const MAX_SKIPPED_REPORTED = 20

/**
 * Poll loop over the chain head. The watermark is the highest height whose
 * batch has been fully processed; it is written only here, and only at the
 * end of a tick.
 */
export class BlockScanner {
  private ledger: LedgerClient
  private index: SubscriptionIndex
  private sink: EventSink
  private extractors: TransferExtractor[]
  private lookback: number
  private intervalMs: number
  private watermark: number | null = null
  private state: ScannerState = 'idle'
  private lastTick?: { fromBlock: number; toBlock: number; at: number }
  private skipped: number[] = []
  private eventsEmitted = 0
  private ticks = 0

  constructor(opts: ScannerOpts) {
    this.ledger = opts.ledger
    this.index = opts.index
    this.sink = opts.sink
    this.extractors = opts.extractors
    this.lookback = Math.max(0, opts.lookbackBlocks ?? 100)
    this.intervalMs = Math.max(0, opts.intervalMs ?? 10_000)
  }

  async initialize(): Promise<number> {
    const height = await this.ledger.getBlockNumber()
    this.watermark = Math.max(0, height - this.lookback)
    console.log(`[Scanner] Starting at block ${this.watermark} (head ${height}, lookback ${this.lookback})`)
    return this.watermark
  }

  getWatermark(): number | null { return this.watermark }

  getStatus(): ScannerStatus {
    return { state: this.state, watermark: this.watermark, lastTick: this.lastTick, skipped: [...this.skipped], eventsEmitted: this.eventsEmitted, ticks: this.ticks }
  }

  /** One scan cycle. Returns null when there was nothing to do. */
  async tick(): Promise<TickResult | null> {
    if (this.state === 'scanning') return null
    if (this.watermark === null) await this.initialize()
    this.state = 'scanning'
    try { return await this.scan() }
    finally { this.state = 'idle' }
  }

  private async scan(): Promise<TickResult | null> {
    const start = this.watermark ?? 0
    const height = await this.ledger.getBlockNumber()
    if (height <= start) return null
    this.ticks++

    const watched = toWatched(await this.index.allWatchedAddresses())
    const range = { fromBlock: start + 1, toBlock: height }
    if (!watched.size) {
      this.finish(range, height)
      return { ...range, events: [], skipped: [] }
    }

    const events: TransferEvent[] = [], skipped: number[] = []
    for (let h = range.fromBlock; h <= height; h++) {
      let block: LedgerBlock
      try { block = await this.ledger.getBlock(h) }
      catch (e) { console.error(`[Scanner] Skipping block ${h}: ${errorMessage(e)}`); skipped.push(h); continue }
      for (const x of this.extractors) {
        try { events.push(...await x.extract(block, watched)) }
        catch (e) { console.error(`[Scanner] ${x.name} extractor failed on block ${h}: ${errorMessage(e)}`) }
      }
    }

    this.finish(range, height, skipped)
    if (events.length) console.log(`[Scanner] Blocks ${range.fromBlock}-${height}: ${events.length} event(s)${skipped.length ? `, ${skipped.length} skipped` : ''}`)
    this.eventsEmitted += events.length
    if (events.length) await this.sink.dispatch(events)
    return { ...range, events, skipped }
  }

  private finish(range: { fromBlock: number; toBlock: number }, height: number, skipped: number[] = []): void {
    this.watermark = height
    this.lastTick = { ...range, at: Date.now() }
    if (skipped.length) this.skipped = [...this.skipped, ...skipped].slice(-MAX_SKIPPED_REPORTED)
  }

  /** Ticks until `signal` aborts; the signal is checked only between ticks. */
  async run(signal: AbortSignal): Promise<void> {
    console.log(`[Scanner] Polling every ${this.intervalMs / 1000}s`)
    while (!signal.aborted) {
      try { await this.tick() }
      catch (e) { console.error(`[Scanner] Tick failed: ${errorMessage(e)}`) }
      if (signal.aborted) break
      await sleep(this.intervalMs, signal)
    }
    console.log(`[Scanner] Stopped at block ${this.watermark ?? 'n/a'}`)
  }
}
