import { ENV, validateConfiguration } from '../src/config';

const VALID = { TELEGRAM_BOT_TOKEN: '123:test-secret', WEB3_PROVIDER_URL: 'https://rpc.example.test/v2/test-key' };

describe('validateConfiguration', () => {
  it('should accept a complete configuration', () => {
    expect(validateConfiguration(VALID)).toEqual({ errors: [], warnings: [] });
  });

  it('should require the bot token and the endpoint', () => {
    const { errors } = validateConfiguration({});
    expect(errors).toEqual([
      'TELEGRAM_BOT_TOKEN is required. Get one from @BotFather on Telegram.',
      'WEB3_PROVIDER_URL is required (an https:// or wss:// Ethereum RPC endpoint).'
    ]);
  });

  it('should reject placeholder endpoints', () => {
    const { errors } = validateConfiguration({ ...VALID, WEB3_PROVIDER_URL: 'https://eth-mainnet.g.alchemy.com/v2/YOUR_API_KEY' });
    expect(errors).toEqual(['WEB3_PROVIDER_URL contains placeholder text. Set a real endpoint URL.']);
  });

  it('should warn without failing on suspicious values', () => {
    const report = validateConfiguration({
      TELEGRAM_BOT_TOKEN: 'test-secret',
      WEB3_PROVIDER_URL: 'http://localhost:8545',
      WEB3_FALLBACK_URLS: 'https://backup.test, http://plain.test/secret',
      REQUEST_TIMEOUT_MS: '30000',
      SCAN_INTERVAL_SECONDS: '0'
    });

    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual([
      'TELEGRAM_BOT_TOKEN format looks wrong; expected <digits>:<secret>.',
      'WEB3_PROVIDER_URL should start with https:// or wss://',
      'Fallback endpoint http://plain.test should start with https:// or wss://',
      'REQUEST_TIMEOUT_MS is capped at 10000',
      'SCAN_INTERVAL_SECONDS must be a positive number; using 10'
    ]);
  });
});

describe('ENV', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should put the primary endpoint ahead of the fallbacks', () => {
    process.env.WEB3_PROVIDER_URL = 'https://a.test';
    process.env.WEB3_FALLBACK_URLS = 'https://b.test,https://a.test';
    expect(ENV.RPC_URLS).toEqual(['https://a.test', 'https://b.test']);
  });

  it('should clamp the request timeout', () => {
    process.env.REQUEST_TIMEOUT_MS = '50';
    expect(ENV.REQUEST_TIMEOUT_MS).toBe(1000);
    process.env.REQUEST_TIMEOUT_MS = '60000';
    expect(ENV.REQUEST_TIMEOUT_MS).toBe(10000);
  });

  it('should read numeric and boolean settings with defaults', () => {
    delete process.env.SCAN_INTERVAL_SECONDS;
    delete process.env.LOOKBACK_BLOCKS;
    process.env.TRACK_TOKEN_TRANSFERS = 'Yes';
    process.env.NETWORK = 'Sepolia';

    expect(ENV.SCAN_INTERVAL_MS).toBe(10000);
    expect(ENV.LOOKBACK_BLOCKS).toBe(100);
    expect(ENV.TRACK_TOKEN_TRANSFERS).toBe(true);
    expect(ENV.NETWORK).toBe('sepolia');
  });

  it('should use the default interval for a value the validator warns about', () => {
    for (const value of ['0', '-5', 'soon']) {
      process.env.SCAN_INTERVAL_SECONDS = value;
      expect(validateConfiguration({ ...VALID, SCAN_INTERVAL_SECONDS: value }).warnings).toEqual(['SCAN_INTERVAL_SECONDS must be a positive number; using 10']);
      expect(ENV.SCAN_INTERVAL_MS).toBe(10000);
    }
    process.env.SCAN_INTERVAL_SECONDS = '3';
    expect(ENV.SCAN_INTERVAL_MS).toBe(3000);
  });

  it('should fail fast on a missing required variable', () => {
    delete process.env.TELEGRAM_BOT_TOKEN;
    expect(() => ENV.TELEGRAM_BOT_TOKEN).toThrow('Env "TELEGRAM_BOT_TOKEN" required');
  });
});
