export type LedgerTransaction = { hash:string, from:string, to:string|null, value:bigint, gasLimit:bigint, gasPrice?:bigint, maxFeePerGas?:bigint, maxPriorityFeePerGas?:bigint }
export type LedgerBlock = { number:number, hash:string, timestamp:number, transactions:LedgerTransaction[] }
export type LogFilter = { fromBlock:number, toBlock:number, address?:string|string[], topics?:(string|string[]|null)[] }
export type Log = { address:string, topics:string[], data:string, blockNumber:number, transactionHash:string, logIndex:number }
export type TokenMetadata = { symbol:string, decimals:number, name?:string }
export type TokenBalance = TokenMetadata & { contract:string, rawBalance:bigint }
export type ProviderHealth = { name:string, healthy:boolean, latencyMs?:number, lastError?:string, blockNumber?:number, consecutiveFailures:number }
export type FailoverStrategy = 'priority' | 'round-robin'

/**
 * Consumer contract over a remote chain endpoint. Every call is bounded by a
 * timeout and rejects with `TransportError` (network, timeout, server error)
 * or `NotFoundError` (unknown block or non-contract address).
 */
export interface LedgerClient {
  readonly name: string
  getBlockNumber(): Promise<number>
  getBalance(address:string): Promise<bigint>
  getTokenBalance(address:string, contract:string): Promise<TokenBalance>
  getTokenMetadata(contract:string): Promise<TokenMetadata>
  getBlock(height:number): Promise<LedgerBlock>
  getLogs(filter:LogFilter): Promise<Log[]>
  /** Connectivity probe for health reporting; never rejects. */
  isReachable(): Promise<boolean>
  /** Releases sockets and timers, where the client holds any. */
  destroy?(): Promise<void>
}
