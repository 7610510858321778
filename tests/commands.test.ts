import { parseEther } from 'ethers';
import { CommandHandler, Reply, parseCommand } from '../src/bot/commands';
import { ScannerStatus } from '../src/listener/scanner';
import { PortfolioSnapshot, SnapshotMode } from '../src/types';
import { MemoryStore, addr } from './fakes';

const CHECKSUMMED = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed';
const TOKEN = addr('4');

class FakePortfolio {
  requests: Array<{ address: string; mode: SnapshotMode }> = [];
  async snapshot(address: string, mode: SnapshotMode): Promise<PortfolioSnapshot> {
    this.requests.push({ address, mode });
    return { address, nativeBalance: parseEther('2'), nativeBalanceEth: 2, holdings: [], tokenValueTotal: 0, total: 2, discovery: mode.kind === 'single' ? 'single' : 'fallback' };
  }
}

function setup(status: Partial<ScannerStatus> = {}) {
  const store = new MemoryStore();
  const portfolio = new FakePortfolio();
  const handler = new CommandHandler({
    store,
    portfolio,
    scannerStatus: () => ({ state: 'idle', watermark: 103, skipped: [], eventsEmitted: 4, ticks: 2, ...status }),
    providerHealth: () => [{ name: 'https://rpc.test', healthy: true, latencyMs: 12, consecutiveFailures: 0 }],
    network: 'mainnet'
  });
  const replies: Reply[] = [];
  const run = (text: string, chat = 1): Promise<boolean> => handler.handle(chat, text, async r => { replies.push(r); });
  return { store, portfolio, replies, run };
}

describe('parseCommand', () => {
  it('should split the command and its arguments', () => {
    expect(parseCommand('/add_wallet  0xabc   My Wallet ')).toEqual({ command: 'add_wallet', args: ['0xabc', 'My', 'Wallet'] });
  });

  it('should drop a bot-name suffix and ignore case', () => {
    expect(parseCommand('/Status@wallet_watch_bot')).toEqual({ command: 'status', args: [] });
  });

  it('should ignore ordinary messages', () => {
    expect(parseCommand('hello')).toBeNull();
    expect(parseCommand('/')).toBeNull();
  });
});

describe('CommandHandler', () => {
  it('should add a wallet under its canonical address', async () => {
    const { store, replies, run } = setup();

    await expect(run(`/add_wallet ${CHECKSUMMED.toLowerCase()} My Main Wallet`)).resolves.toBe(true);

    expect(await store.labelFor(1, CHECKSUMMED)).toBe('My Main Wallet');
    expect(replies[0].text).toContain(`<b>Address:</b> <code>${CHECKSUMMED}</code>`);
    expect(replies[0].text).toContain('<b>Name:</b> My Main Wallet');
  });

  it('should report a wallet that is already tracked', async () => {
    const { replies, run } = setup();
    await run(`/add_wallet ${CHECKSUMMED} Main`);
    await run(`/add_wallet ${CHECKSUMMED.toLowerCase()} Again`);
    expect(replies[1].text).toBe('❌ Wallet already exists in your list!');
  });

  it('should reject bad arguments before touching the store', async () => {
    const { store, replies, run } = setup();
    await run('/add_wallet 0x1234 Main');
    await run(`/add_wallet ${CHECKSUMMED}`);
    await run('/add_wallet 0x5aaeb6053F3E94C9b9A09f33669435E7Ef1BeAed Main');

    expect(replies.map(r => r.text)).toEqual([
      '❌ Invalid Ethereum address format!',
      '❌ Usage: <code>/add_wallet &lt;address&gt; &lt;name&gt;</code>',
      '❌ Invalid Ethereum address format!'
    ]);
    expect(store.subscriptions).toHaveLength(0);
  });

  it('should escape wallet names', async () => {
    const { replies, run } = setup();
    await run(`/add_wallet ${CHECKSUMMED} <b>Trading</b>`);
    expect(replies[0].text).toContain('<b>Name:</b> &lt;b&gt;Trading&lt;/b&gt;');
  });

  it('should remove only the caller\'s wallet', async () => {
    const { store, replies, run } = setup();
    await run(`/add_wallet ${CHECKSUMMED} Main`, 1);
    await run(`/add_wallet ${CHECKSUMMED} Shared`, 2);

    await run(`/remove_wallet ${CHECKSUMMED.toLowerCase()}`, 1);
    await run(`/remove_wallet ${CHECKSUMMED}`, 1);

    expect(replies[2].text).toContain('✅ Wallet removed successfully!');
    expect(replies[3].text).toBe('❌ Wallet not found in your list!');
    expect(await store.labelFor(2, CHECKSUMMED)).toBe('Shared');
  });

  it('should list the caller\'s wallets', async () => {
    const { replies, run } = setup();
    await run('/list_wallets');
    await run(`/add_wallet ${CHECKSUMMED} Main`);
    await run('/list_wallets');

    expect(replies[0].text).toContain('You don\'t have any wallets added yet!');
    expect(replies[2].text.split('\n')).toEqual([
      '📋 <b>Your Tracked Wallets:</b>',
      '',
      '1. <b>Main</b>',
      `   <code>${CHECKSUMMED}</code>`
    ]);
  });

  it('should fetch a full snapshot for one address', async () => {
    const { portfolio, replies, run } = setup();
    await run(`/get_balance ${CHECKSUMMED.toLowerCase()}`);

    expect(portfolio.requests).toEqual([{ address: CHECKSUMMED, mode: { kind: 'full' } }]);
    expect(replies[0]).toEqual({ text: '⏳ Fetching balance data...', mode: 'plain' });
    expect(replies[1].text).toContain('<b>ETH Balance:</b> 2.000000 ETH');
    expect(replies[1].text).toContain('<b>Note:</b> No tokens detected');
  });

  it('should fetch a single token when a contract is given', async () => {
    const { portfolio, run } = setup();
    await run(`/get_balance ${CHECKSUMMED} ${TOKEN}`);
    expect(portfolio.requests[0].mode).toEqual({ kind: 'single', contract: TOKEN });
  });

  it('should validate get_balance arguments', async () => {
    const { portfolio, replies, run } = setup();
    await run('/get_balance');
    await run(`/get_balance ${CHECKSUMMED} 0xnope`);

    expect(replies.map(r => r.text)).toEqual([
      '❌ Usage: <code>/get_balance &lt;address&gt; [token_contract]</code>',
      '❌ Invalid token contract address format!'
    ]);
    expect(portfolio.requests).toHaveLength(0);
  });

  it('should report a failed balance lookup to the user', async () => {
    const { replies, run } = setup();
    const failing = new CommandHandler({
      store: new MemoryStore(),
      portfolio: { snapshot: async () => { throw new Error('rpc <down>'); } },
      scannerStatus: () => ({ state: 'idle', watermark: null, skipped: [], eventsEmitted: 0, ticks: 0 }),
      network: 'mainnet'
    });
    await failing.handle(1, `/get_balance ${CHECKSUMMED}`, async r => { replies.push(r); });
    await run('/help');

    expect(replies[1]).toEqual({ text: '❌ Error: rpc &lt;down&gt;', mode: 'html' });
  });

  it('should describe the scanner and endpoints', async () => {
    const { replies, run } = setup({ skipped: [102], lastTick: { fromBlock: 101, toBlock: 103, at: 0 } });
    await run('/status');

    expect(replies[0].text.split('\n')).toEqual([
      '🔌 <b>Monitor Status</b>',
      '',
      '<b>Network:</b> mainnet',
      '<b>Scanner:</b> idle',
      '<b>Last scanned block:</b> 103',
      '<b>Last tick:</b> blocks 101-103 at 1970-01-01 00:00:00 UTC',
      '<b>Events emitted:</b> 4',
      '<b>Skipped blocks:</b> 102',
      '',
      '<b>Endpoints:</b>',
      '✅ https://rpc.test 12ms'
    ]);
  });

  it('should answer help and ignore unknown commands', async () => {
    const { replies, run } = setup();
    await expect(run('/start')).resolves.toBe(true);
    await expect(run('/unknown')).resolves.toBe(false);
    await expect(run('just chatting')).resolves.toBe(false);
    expect(replies).toHaveLength(1);
    expect(replies[0].text).toContain('/add_wallet &lt;address&gt; &lt;name&gt;');
  });
});
