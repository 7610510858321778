import { decodeTransferLog } from '../src/decoder/transfer';
import { TokenTransferExtractor, toWatched } from '../src/listener/extractors';
import { Log } from '../src/providers/types';
import { ERC20_TRANSFER_TOPIC } from '../src/types';
import { toTopicAddress } from '../src/utils/address';
import { FakeLedger, addr, block, txHash } from './fakes';

const X = addr('1');
const Y = addr('2');
const Z = addr('3');
const TOKEN = addr('4');

const uint = (value: bigint): string => '0x' + value.toString(16).padStart(64, '0');

function transferLog(from: string, to: string, value: bigint, logIndex: number, blockNumber = 200): Log {
  return {
    address: TOKEN,
    topics: [ERC20_TRANSFER_TOPIC, toTopicAddress(from), toTopicAddress(to)],
    data: uint(value),
    blockNumber,
    transactionHash: txHash(logIndex + 1),
    logIndex
  };
}

describe('decodeTransferLog', () => {
  it('should decode an ERC-20 transfer', () => {
    expect(decodeTransferLog(transferLog(X, Y, 1234n, 7))).toEqual({
      token: TOKEN,
      from: X,
      to: Y,
      value: 1234n,
      transactionHash: txHash(8),
      logIndex: 7,
      blockNumber: 200
    });
  });

  it('should skip ERC-721 transfers, which index a token id', () => {
    const log = transferLog(X, Y, 0n, 1);
    expect(decodeTransferLog({ ...log, topics: [...log.topics, uint(42n)], data: '0x' })).toBeNull();
  });

  it('should skip other events and undecodable data', () => {
    const log = transferLog(X, Y, 1n, 1);
    expect(decodeTransferLog({ ...log, topics: [txHash(99), log.topics[1], log.topics[2]] })).toBeNull();
    expect(decodeTransferLog({ ...log, data: '0x' })).toBeNull();
  });
});

describe('TokenTransferExtractor', () => {
  function setup(): { ledger: FakeLedger; extractor: TokenTransferExtractor } {
    const ledger = new FakeLedger();
    ledger.metadata.set(TOKEN, { symbol: 'TKN', decimals: 6 });
    return { ledger, extractor: new TokenTransferExtractor(ledger) };
  }

  it('should emit token events for watched senders and recipients', async () => {
    const { ledger, extractor } = setup();
    ledger.logs = [transferLog(X, Y, 2500000n, 3), transferLog(Y, Z, 1n, 4), transferLog(Z, X, 10n, 5)];

    const events = await extractor.extract(block(200), toWatched([X]));

    expect(events).toHaveLength(2);
    expect(events[0]).toMatchObject({ assetKind: 'token', address: X, direction: 'outgoing', amount: 2500000n, tokenAddress: TOKEN, tokenSymbol: 'TKN', tokenDecimals: 6, logIndex: 3 });
    expect(events[1]).toMatchObject({ address: X, direction: 'incoming', amount: 10n, logIndex: 5 });
  });

  it('should report a log matching both queries once per watched side', async () => {
    const { ledger, extractor } = setup();
    ledger.logs = [transferLog(X, Z, 9n, 0)];

    const events = await extractor.extract(block(200), toWatched([X, Z]));

    expect(events.map(e => [e.address, e.direction])).toEqual([[X, 'outgoing'], [Z, 'incoming']]);
  });

  it('should fall back to UNKNOWN/18 when metadata is unavailable', async () => {
    const { ledger, extractor } = setup();
    ledger.metadata.clear();
    ledger.logs = [transferLog(X, Y, 1n, 0)];

    const [event] = await extractor.extract(block(200), toWatched([X]));

    expect(event).toMatchObject({ tokenSymbol: 'UNKNOWN', tokenDecimals: 18 });
  });

  it('should return no events when the log query fails', async () => {
    const { ledger, extractor } = setup();
    ledger.logs = [transferLog(X, Y, 1n, 0)];
    ledger.down = true;

    await expect(extractor.extract(block(200), toWatched([X]))).resolves.toEqual([]);
  });

  it('should not query logs when nothing is watched', async () => {
    const { ledger, extractor } = setup();
    await expect(extractor.extract(block(200), toWatched([]))).resolves.toEqual([]);
    expect(ledger.calls).toEqual([]);
  });
});
