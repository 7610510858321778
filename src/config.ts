import * as path from 'path'
import { config as loadEnv } from 'dotenv'
import { TokenRegistry } from './portfolio/registry'
import { DEFAULT_PRICE_API_URL } from './pricing/resolver'
import { parseEndpointList } from './providers/factory'
import { redactUrl } from './providers/base'

loadEnv()

type Env = Record<string, string | undefined>

export const MAX_REQUEST_TIMEOUT_MS = 10000
const DEFAULT_SCAN_INTERVAL_SECONDS = 10
const PLACEHOLDERS = ['your_api_key', 'your_endpoint', 'your-api-key']
const BOT_TOKEN_RE = /^\d+:[A-Za-z0-9_-]+$/

export function getEnvVar(name: string, required = true): string { const v = process.env[name]; if (!v && required) throw new Error(`Env "${name}" required`); return v || '' }
function getEnvNumber(name: string, fallback: number): number { const r = getEnvVar(name, false); if (!r) return fallback; const p = parseInt(r, 10); return Number.isFinite(p) ? p : fallback }
function getEnvBool(name: string, fallback: boolean): boolean { const r = getEnvVar(name, false).trim().toLowerCase(); return r ? ['1', 'true', 'yes', 'on'].includes(r) : fallback }

export const ENV = {
  get TELEGRAM_BOT_TOKEN(): string { return getEnvVar('TELEGRAM_BOT_TOKEN') },
  get WEB3_PROVIDER_URL(): string { return getEnvVar('WEB3_PROVIDER_URL') },
  /** Primary endpoint first, then the fallbacks. */
  get RPC_URLS(): string[] { return parseEndpointList([getEnvVar('WEB3_PROVIDER_URL', false), getEnvVar('WEB3_FALLBACK_URLS', false)].filter(Boolean).join(',')) },
  get ALCHEMY_API_KEY(): string | undefined { return getEnvVar('ALCHEMY_API_KEY', false) || undefined },
  get NETWORK(): string { return (getEnvVar('NETWORK', false) || 'mainnet').toLowerCase() },
  get SCAN_INTERVAL_MS(): number { const s = getEnvNumber('SCAN_INTERVAL_SECONDS', DEFAULT_SCAN_INTERVAL_SECONDS); return (s > 0 ? s : DEFAULT_SCAN_INTERVAL_SECONDS) * 1000 },
  get LOOKBACK_BLOCKS(): number { return Math.max(0, getEnvNumber('LOOKBACK_BLOCKS', 100)) },
  get TRACK_TOKEN_TRANSFERS(): boolean { return getEnvBool('TRACK_TOKEN_TRANSFERS', false) },
  get PRICE_API_URL(): string { return getEnvVar('PRICE_API_URL', false) || DEFAULT_PRICE_API_URL },
  get REQUEST_TIMEOUT_MS(): number { const v = getEnvNumber('REQUEST_TIMEOUT_MS', MAX_REQUEST_TIMEOUT_MS); return Math.min(MAX_REQUEST_TIMEOUT_MS, Math.max(1000, v)) },
  get DATA_DIR(): string { return getEnvVar('DATA_DIR', false) || '.data' },
  get TOKEN_LIST_PATH(): string { return path.resolve(getEnvVar('TOKEN_LIST_PATH', false) || path.join(process.cwd(), 'data', 'tokens.json')) }
}

export type ConfigReport = { errors: string[]; warnings: string[] }

/** Checks the variables the service cannot start without. Never throws. */
export function validateConfiguration(env: Env = process.env): ConfigReport {
  const errors: string[] = [], warnings: string[] = []

  const token = env.TELEGRAM_BOT_TOKEN
  if (!token) errors.push('TELEGRAM_BOT_TOKEN is required. Get one from @BotFather on Telegram.')
  else if (!BOT_TOKEN_RE.test(token)) warnings.push('TELEGRAM_BOT_TOKEN format looks wrong; expected <digits>:<secret>.')

  const url = env.WEB3_PROVIDER_URL
  if (!url) errors.push('WEB3_PROVIDER_URL is required (an https:// or wss:// Ethereum RPC endpoint).')
  else if (PLACEHOLDERS.some(p => url.toLowerCase().includes(p))) errors.push('WEB3_PROVIDER_URL contains placeholder text. Set a real endpoint URL.')
  else if (!/^(https|wss):\/\//.test(url)) warnings.push('WEB3_PROVIDER_URL should start with https:// or wss://')

  for (const u of parseEndpointList(env.WEB3_FALLBACK_URLS)) if (!/^(https|wss):\/\//.test(u)) warnings.push(`Fallback endpoint ${redactUrl(u)} should start with https:// or wss://`)

  const timeout = env.REQUEST_TIMEOUT_MS
  if (timeout && Number(timeout) > MAX_REQUEST_TIMEOUT_MS) warnings.push(`REQUEST_TIMEOUT_MS is capped at ${MAX_REQUEST_TIMEOUT_MS}`)
  const interval = env.SCAN_INTERVAL_SECONDS
  if (interval && !(parseInt(interval, 10) > 0)) warnings.push(`SCAN_INTERVAL_SECONDS must be a positive number; using ${DEFAULT_SCAN_INTERVAL_SECONDS}`)

  return { errors, warnings }
}

/** Loads the curated token table once; a missing or malformed file is fatal. */
export function loadTokenRegistry(filePath: string = ENV.TOKEN_LIST_PATH): TokenRegistry {
  const registry = TokenRegistry.load(filePath)
  console.log(`[Config] Token list: ${registry.curated().length} curated, ${registry.priceIdCount} priced (${filePath})`)
  return registry
}
