import { ENV, validateConfiguration, loadTokenRegistry } from './config'
import { createLedger, createTokenDiscovery, redactUrl } from './providers'
import { JsonSubscriptionStore } from './subscriptions'
import { getExplorerBase } from './notifications/format'
import { errorMessage } from './utils/errors'

async function main(): Promise<void> {
  console.log('========================================\n         Wallet Watch Healthcheck\n========================================\n')
  const report = validateConfiguration()
  let errors = report.errors.length, warnings = report.warnings.length
  report.errors.forEach(e => console.error(`[ERROR] ${e}`))
  report.warnings.forEach(w => console.warn(`[WARN] ${w}`))

  console.log('\n--- Environment ---')
  console.log(`Network: ${ENV.NETWORK}\nExplorer: ${getExplorerBase(ENV.NETWORK)}\nScan: every ${ENV.SCAN_INTERVAL_MS / 1000}s, lookback ${ENV.LOOKBACK_BLOCKS}\nToken transfers: ${ENV.TRACK_TOKEN_TRANSFERS ? 'on' : 'off'}\nTimeout: ${ENV.REQUEST_TIMEOUT_MS}ms`)

  console.log('\n--- Token list ---')
  try { loadTokenRegistry(); console.log('[OK] Token list loaded') } catch (e) { console.error(`[ERROR] ${errorMessage(e)}`); errors++ }

  console.log('\n--- Providers ---')
  const urls = ENV.RPC_URLS
  if (urls.length) {
    const ledger = createLedger({ urls, network: ENV.NETWORK, timeoutMs: ENV.REQUEST_TIMEOUT_MS, healthIntervalMs: 0 })
    const hs = await ledger.healthCheck()
    console.log(`Total: ${hs.length}`)
    for (const s of hs) { const icon = s.healthy ? '[OK]' : '[WARN]', lat = s.latencyMs !== undefined ? `${s.latencyMs}ms` : 'N/A', blk = s.blockNumber ? `block ${s.blockNumber}` : ''; console.log(`  ${icon} ${s.name}: ${lat} ${blk}`); if (!s.healthy) { console.log(`      Error: ${s.lastError || 'Unknown'}`); warnings++ } }
    if (!hs.some(s => s.healthy)) { console.error('[ERROR] No RPC endpoint reachable'); errors++ }
    await ledger.shutdown()
  } else console.log('  None configured')
  const discovery = createTokenDiscovery({ apiKey: ENV.ALCHEMY_API_KEY, urls, network: ENV.NETWORK, timeoutMs: ENV.REQUEST_TIMEOUT_MS })
  console.log(`  Token discovery: ${discovery ? 'alchemy + curated fallback' : 'curated list only'}`)
  console.log(`  Price API: ${redactUrl(ENV.PRICE_API_URL)}`)

  console.log('\n--- Subscriptions ---')
  try {
    const store = new JsonSubscriptionStore(ENV.DATA_DIR)
    const all = await store.allAddressesWithSubscribers()
    const subs = [...all.values()].reduce((n, ids) => n + ids.length, 0)
    console.log(`[OK] ${all.size} address(es), ${subs} subscription(s)`)
    store.cleanup()
  } catch (e) { console.error(`[ERROR] ${errorMessage(e)}`); errors++ }

  console.log('\n========================================')
  if (errors > 0) { console.log(`FAILED: ${errors} error(s), ${warnings} warning(s)`); process.exit(1) }
  else if (warnings > 0) console.log(`PASSED with ${warnings} warning(s)`)
  else console.log('PASSED: All checks OK')
}

main().catch(e => { console.error('[FATAL]', e); process.exit(1) })
