export * from './types'
export { RpcLedgerClient, redactUrl } from './base'
export type { RpcClientOptions } from './base'
export { ProviderManager } from './manager'
export type { ProviderManagerOptions } from './manager'
export { AlchemyTokenDiscovery, alchemyKeyFromUrl } from './alchemy'
export { createLedger, createLedgerClient, createTokenDiscovery, parseEndpointList } from './factory'
export type { LedgerConfig } from './factory'
