export type { LedgerClient, LedgerBlock, LedgerTransaction, Log, LogFilter, TokenBalance, TokenMetadata, ProviderHealth, FailoverStrategy } from '../providers/types'

export type SubscriberId = number
export type TransferDirection = 'incoming' | 'outgoing'
export type AssetKind = 'native' | 'token'

export type Subscription = { subscriberId: SubscriberId; address: string; label: string; createdAt: number }
export type Subscriber = { subscriberId: SubscriberId; label: string }
export type AddResult = 'added' | 'exists'
export type RemoveResult = 'removed' | 'not_found'

export type FeeData = { gasLimit: bigint; gasPrice?: bigint; maxFeePerGas?: bigint; maxPriorityFeePerGas?: bigint }
type TransferBase = { address: string; direction: TransferDirection; from: string; to: string | null; amount: bigint; blockNumber: number; timestamp: number; transactionHash: string }
export type NativeTransferEvent = Readonly<TransferBase & { assetKind: 'native'; fee: FeeData }>
export type TokenTransferEvent = Readonly<TransferBase & { assetKind: 'token'; tokenAddress: string; tokenSymbol: string; tokenDecimals: number; logIndex: number }>
/** One watched side of one transfer; a self-transfer yields one event per direction. */
export type TransferEvent = NativeTransferEvent | TokenTransferEvent

export type TokenHolding = Readonly<{ contract: string; symbol: string; rawBalance: bigint; decimals: number; balance: number; nativeValue: number }>
export type SnapshotMode = { kind: 'single'; contract: string } | { kind: 'full' } | { kind: 'native' }
export type DiscoverySource = 'single' | 'primary' | 'fallback' | 'none'
export type PortfolioSnapshot = Readonly<{ address: string; nativeBalance: bigint; nativeBalanceEth: number; holdings: readonly TokenHolding[]; tokenValueTotal: number; total: number; discovery: DiscoverySource }>

export type DeliveryMode = 'html' | 'plain'
export interface NotificationTransport { send(subscriberId: SubscriberId, text: string, mode: DeliveryMode): Promise<void> }

export const ERC20_TRANSFER_TOPIC = '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef'
