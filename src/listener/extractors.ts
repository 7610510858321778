import { LedgerBlock, LedgerClient, Log, TokenMetadata } from '../providers/types'
import { ERC20_TRANSFER_TOPIC, NativeTransferEvent, TokenTransferEvent, TransferEvent } from '../types'
import { decodeTransferLog } from '../decoder/transfer'
import { toTopicAddress } from '../utils/address'
import { MonitorError, errorMessage } from '../utils/errors'

/** Lower-cased address → canonical address, for the addresses watched this tick. */
export type WatchedAddresses = ReadonlyMap<string, string>

/**
 * Turns one fetched block into transfer events for watched addresses. A new
 * asset kind is a new extractor; the scanner's watermark handling stays as is.
 */
export interface TransferExtractor {
  readonly name: string
  extract(block: LedgerBlock, watched: WatchedAddresses): Promise<TransferEvent[]>
}

export const toWatched = (addresses: Iterable<string>): WatchedAddresses => new Map([...addresses].map(a => [a.toLowerCase(), a]))

/** Value transfers read straight from the block's transactions. */
export class NativeTransferExtractor implements TransferExtractor {
  readonly name = 'native'

  async extract(block: LedgerBlock, watched: WatchedAddresses): Promise<TransferEvent[]> {
    const events: TransferEvent[] = []
    for (const tx of block.transactions) {
      const sender = watched.get(tx.from.toLowerCase())
      const recipient = tx.to ? watched.get(tx.to.toLowerCase()) : undefined
      if (!sender && !recipient) continue
      const base = { from: tx.from, to: tx.to, amount: tx.value, blockNumber: block.number, timestamp: block.timestamp, transactionHash: tx.hash, fee: { gasLimit: tx.gasLimit, gasPrice: tx.gasPrice, maxFeePerGas: tx.maxFeePerGas, maxPriorityFeePerGas: tx.maxPriorityFeePerGas } }
      if (sender) { const ev: NativeTransferEvent = { ...base, assetKind: 'native', address: sender, direction: 'outgoing' }; events.push(ev) }
      if (recipient) { const ev: NativeTransferEvent = { ...base, assetKind: 'native', address: recipient, direction: 'incoming' }; events.push(ev) }
    }
    return events
  }
}

/**
 * ERC-20 transfers read from `Transfer` logs of the block, queried once with
 * watched senders and once with watched recipients.
 */
export class TokenTransferExtractor implements TransferExtractor {
  readonly name = 'token'
  private ledger: LedgerClient

  constructor(ledger: LedgerClient) { this.ledger = ledger }

  async extract(block: LedgerBlock, watched: WatchedAddresses): Promise<TransferEvent[]> {
    if (!watched.size) return []
    const padded = [...watched.keys()].map(toTopicAddress)
    const range = { fromBlock: block.number, toBlock: block.number }
    let logs: Log[]
    try {
      const [sent, received] = await Promise.all([
        this.ledger.getLogs({ ...range, topics: [ERC20_TRANSFER_TOPIC, padded] }),
        this.ledger.getLogs({ ...range, topics: [ERC20_TRANSFER_TOPIC, null, padded] })
      ])
      logs = uniqueLogs([...sent, ...received])
    } catch (e) {
      if (!(e instanceof MonitorError)) throw e
      console.error(`[Scanner] Token logs failed for block ${block.number}: ${errorMessage(e)}`)
      return []
    }

    const events: TransferEvent[] = []
    for (const log of logs) {
      const t = decodeTransferLog(log)
      if (!t) continue
      const sender = watched.get(t.from.toLowerCase()), recipient = watched.get(t.to.toLowerCase())
      if (!sender && !recipient) continue
      const meta = await this.metadata(t.token)
      const base = { from: t.from, to: t.to, amount: t.value, blockNumber: block.number, timestamp: block.timestamp, transactionHash: t.transactionHash, tokenAddress: t.token, tokenSymbol: meta.symbol, tokenDecimals: meta.decimals, logIndex: t.logIndex }
      if (sender) { const ev: TokenTransferEvent = { ...base, assetKind: 'token', address: sender, direction: 'outgoing' }; events.push(ev) }
      if (recipient) { const ev: TokenTransferEvent = { ...base, assetKind: 'token', address: recipient, direction: 'incoming' }; events.push(ev) }
    }
    return events
  }

  private async metadata(token: string): Promise<TokenMetadata> {
    try { return await this.ledger.getTokenMetadata(token) }
    catch (e) { console.debug(`[Scanner] Metadata failed for ${token}: ${errorMessage(e)}`); return { symbol: 'UNKNOWN', decimals: 18 } }
  }
}

function uniqueLogs(logs: Log[]): Log[] {
  const seen = new Set<string>()
  return logs
    .filter(l => { const k = `${l.transactionHash}:${l.logIndex}`; if (seen.has(k)) return false; seen.add(k); return true })
    .sort((a, b) => a.logIndex - b.logIndex)
}
