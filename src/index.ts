import TelegramBot from 'node-telegram-bot-api'
import { ENV, validateConfiguration, loadTokenRegistry } from './config'
import { createLedger, createTokenDiscovery } from './providers'
import { JsonSubscriptionStore, SubscriptionIndex } from './subscriptions'
import { TokenValueResolver } from './pricing/resolver'
import { BalanceAggregator } from './portfolio/aggregator'
import { CuratedListDiscovery } from './portfolio/discovery'
import { BlockScanner } from './listener/scanner'
import { NativeTransferExtractor, TokenTransferExtractor, TransferExtractor } from './listener/extractors'
import { NotificationDispatcher, TelegramNotifier, getExplorerBase } from './notifications'
import { CommandHandler, registerCommands } from './bot/commands'
import { errorMessage } from './utils/errors'

async function main(): Promise<void> {
  console.log('========================================\n       Wallet Watch Starting...\n========================================\n')
  const { errors, warnings } = validateConfiguration()
  warnings.forEach(w => console.warn(`[Config] ${w}`))
  if (errors.length) { errors.forEach(e => console.error(`[Config] ${e}`)); process.exit(1) }

  const network = ENV.NETWORK, timeoutMs = ENV.REQUEST_TIMEOUT_MS, urls = ENV.RPC_URLS
  const registry = loadTokenRegistry()
  const store = new JsonSubscriptionStore(ENV.DATA_DIR)
  const index = new SubscriptionIndex(store)

  const ledger = createLedger({ urls, network, timeoutMs })
  await ledger.initialize()

  const primary = createTokenDiscovery({ apiKey: ENV.ALCHEMY_API_KEY, urls, network, timeoutMs })
  console.log(`[Main] Token discovery: ${primary ? 'alchemy, then curated list' : 'curated list'}`)
  const aggregator = new BalanceAggregator({ ledger, resolver: new TokenValueResolver(registry, { baseUrl: ENV.PRICE_API_URL, timeoutMs }), primary, fallback: new CuratedListDiscovery(ledger, registry) })

  const bot = new TelegramBot(ENV.TELEGRAM_BOT_TOKEN, { polling: true })
  const transport = new TelegramNotifier(bot)
  const dispatcher = new NotificationDispatcher(index, transport, { explorerBase: getExplorerBase(network) })

  const extractors: TransferExtractor[] = [new NativeTransferExtractor()]
  if (ENV.TRACK_TOKEN_TRANSFERS) extractors.push(new TokenTransferExtractor(ledger))
  const scanner = new BlockScanner({ ledger, index, sink: dispatcher, extractors, lookbackBlocks: ENV.LOOKBACK_BLOCKS, intervalMs: ENV.SCAN_INTERVAL_MS })
  await scanner.initialize()

  registerCommands(bot, new CommandHandler({ store, portfolio: aggregator, scannerStatus: () => scanner.getStatus(), providerHealth: () => ledger.getHealthStatus(), network }), transport)
  console.log(`[Main] ${(await index.allWatchedAddresses()).size} watched address(es), extractors: ${extractors.map(x => x.name).join(', ')}`)

  const abort = new AbortController()
  const loop = scanner.run(abort.signal)
  let stopping = false
  const shutdown = async (sig: string): Promise<void> => {
    if (stopping) return
    stopping = true
    console.log(`\n[Main] ${sig}, shutting down...`)
    abort.abort()
    await bot.stopPolling()
    await loop
    await ledger.shutdown()
    store.forceSave(); store.cleanup()
    console.log('[Main] Shutdown complete')
    process.exit(0)
  }
  process.on('SIGINT', () => { void shutdown('SIGINT') })
  process.on('SIGTERM', () => { void shutdown('SIGTERM') })
  process.on('uncaughtException', (e) => { console.error('[Main] Uncaught:', e); store.forceSave() })
  process.on('unhandledRejection', (r) => console.error('[Main] Unhandled rejection:', r))
  console.log('\n[Main] Running. Ctrl+C to stop.\n')
}

main().catch(e => { console.error(`[Main] Fatal: ${errorMessage(e)}`); process.exit(1) })
