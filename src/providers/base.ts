import { Contract, FetchRequest, JsonRpcApiProvider, JsonRpcProvider, Network, WebSocketProvider, isError } from 'ethers'
import { LedgerClient, LedgerBlock, LedgerTransaction, Log, LogFilter, TokenBalance, TokenMetadata } from './types'
import { MonitorError, NotFoundError, TransportError, errorMessage } from '../utils/errors'
import { withTimeout } from '../utils/retry'

const ERC20_ABI = ['function balanceOf(address) view returns (uint256)', 'function symbol() view returns (string)', 'function decimals() view returns (uint8)', 'function name() view returns (string)']
const DEFAULT_META: TokenMetadata = { symbol: 'UNKNOWN', decimals: 18 }

export type RpcClientOptions = { url:string, network?:string, timeoutMs:number, name?:string }

/** The ERC-20 reads the client makes against one token contract. */
export interface Erc20Reader {
  balanceOf(owner: string): Promise<unknown>
  symbol(): Promise<unknown>
  decimals(): Promise<unknown>
  name(): Promise<unknown>
}

type Answer<T> = { value: T, answered: boolean }

const asBigInt = (v: unknown): bigint => typeof v === 'bigint' ? v : BigInt(String(v ?? 0))

// a non-contract address answers eth_call with empty data
const isMissingContract = (e: unknown): boolean => isError(e, 'CALL_EXCEPTION') || isError(e, 'BAD_DATA')

// only a contract that cannot answer gets the default; any other failure propagates
async function readOr<T>(read: () => Promise<unknown>, parse: (v: unknown) => T | undefined, fallback: T): Promise<Answer<T>> {
  try {
    const value = parse(await read())
    return value === undefined ? { value: fallback, answered: false } : { value, answered: true }
  } catch (e) {
    if (isMissingContract(e)) return { value: fallback, answered: false }
    throw e
  }
}

const nonEmptyString = (v: unknown): string|undefined => typeof v === 'string' && v ? v : undefined
function parseDecimals(v: unknown): number|undefined {
  const n = typeof v === 'bigint' || typeof v === 'number' ? Number(v) : NaN
  return Number.isInteger(n) && n >= 0 && n <= 255 ? n : undefined
}

function resolveNetwork(name?: string): Network|undefined {
  if (!name) return undefined
  try { return Network.from(name) } catch { return undefined }
}

export function redactUrl(url: string): string {
  try { const u = new URL(url); return `${u.protocol}//${u.host}` } catch { return 'rpc' }
}

/** LedgerClient over a single JSON-RPC endpoint (https or wss). */
export class RpcLedgerClient implements LedgerClient {
  readonly name: string
  protected provider: JsonRpcApiProvider
  protected timeoutMs: number
  protected tokenCache: Map<string, TokenMetadata> = new Map()

  constructor(opts: RpcClientOptions) {
    this.name = opts.name || redactUrl(opts.url)
    this.timeoutMs = opts.timeoutMs
    const network = resolveNetwork(opts.network)
    const staticNetwork = network ? { staticNetwork: network } : {}
    if (opts.url.startsWith('wss://') || opts.url.startsWith('ws://')) this.provider = new WebSocketProvider(opts.url, network, staticNetwork)
    else { const req = new FetchRequest(opts.url); req.timeout = opts.timeoutMs; this.provider = new JsonRpcProvider(req, network, staticNetwork) }
  }

  protected async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try { return await withTimeout(fn(), this.timeoutMs, `${this.name} ${label}`) }
    catch (e) {
      if (e instanceof MonitorError) throw e
      throw new TransportError(`${this.name} ${label} failed: ${errorMessage(e)}`, { cause: e })
    }
  }

  getBlockNumber(): Promise<number> { return this.call('getBlockNumber', () => this.provider.getBlockNumber()) }

  getBalance(address: string): Promise<bigint> { return this.call('getBalance', () => this.provider.getBalance(address)) }

  async getBlock(height: number): Promise<LedgerBlock> {
    const block = await this.call(`getBlock(${height})`, () => this.provider.getBlock(height, true))
    if (!block) throw new NotFoundError(`Block ${height} not found`)
    const transactions: LedgerTransaction[] = block.prefetchedTransactions.map(tx => ({
      hash: tx.hash, from: tx.from, to: tx.to, value: tx.value, gasLimit: tx.gasLimit,
      gasPrice: tx.gasPrice ?? undefined, maxFeePerGas: tx.maxFeePerGas ?? undefined, maxPriorityFeePerGas: tx.maxPriorityFeePerGas ?? undefined
    }))
    return { number: block.number, hash: block.hash ?? '', timestamp: block.timestamp, transactions }
  }

  async getLogs(filter: LogFilter): Promise<Log[]> {
    const logs = await this.call('getLogs', () => this.provider.getLogs({ fromBlock: filter.fromBlock, toBlock: filter.toBlock, address: filter.address, topics: filter.topics }))
    return logs.map(l => ({ address: l.address, topics: [...l.topics], data: l.data, blockNumber: l.blockNumber, transactionHash: l.transactionHash, logIndex: l.index }))
  }

  protected erc20(contract: string): Erc20Reader {
    const c = new Contract(contract, ERC20_ABI, this.provider)
    return {
      balanceOf: owner => c.getFunction('balanceOf')(owner),
      symbol: () => c.getFunction('symbol')(),
      decimals: () => c.getFunction('decimals')(),
      name: () => c.getFunction('name')()
    }
  }

  /** Cached only once symbol and decimals both came from the contract itself. */
  async getTokenMetadata(contract: string): Promise<TokenMetadata> {
    const key = contract.toLowerCase()
    const cached = this.tokenCache.get(key)
    if (cached) return cached
    const c = this.erc20(contract)
    const [symbol, decimals, name] = await this.call(`metadata(${contract})`, () => Promise.all([
      readOr(() => c.symbol(), nonEmptyString, DEFAULT_META.symbol),
      readOr(() => c.decimals(), parseDecimals, DEFAULT_META.decimals),
      readOr<string|undefined>(() => c.name(), nonEmptyString, undefined)
    ]))
    const meta: TokenMetadata = { symbol: symbol.value, decimals: decimals.value, name: name.value }
    if (symbol.answered && decimals.answered) this.tokenCache.set(key, meta)
    else console.debug(`[Ledger] Default metadata for ${contract} (symbol ${symbol.answered ? 'ok' : 'missing'}, decimals ${decimals.answered ? 'ok' : 'missing'})`)
    return meta
  }

  async getTokenBalance(address: string, contract: string): Promise<TokenBalance> {
    let raw: unknown
    try { raw = await withTimeout(this.erc20(contract).balanceOf(address), this.timeoutMs, `${this.name} balanceOf(${contract})`) }
    catch (e) {
      if (isMissingContract(e)) throw new NotFoundError(`No token contract at ${contract}`, { cause: e })
      if (e instanceof MonitorError) throw e
      throw new TransportError(`${this.name} balanceOf(${contract}) failed: ${errorMessage(e)}`, { cause: e })
    }
    const rawBalance = asBigInt(raw)
    // metadata for nonzero holdings only
    const meta = rawBalance > 0n ? await this.getTokenMetadata(contract) : DEFAULT_META
    return { contract, rawBalance, symbol: meta.symbol, decimals: meta.decimals, name: meta.name }
  }

  async isReachable(): Promise<boolean> {
    try { await this.getBlockNumber(); return true } catch { return false }
  }

  async destroy(): Promise<void> { this.provider.destroy() }
}
