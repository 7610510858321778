import { Interface, LogDescription } from 'ethers';
import { Log } from '../providers/types';
import { ERC20_TRANSFER_TOPIC } from '../types';

const ERC20_EVENTS = new Interface([
  'event Transfer(address indexed from, address indexed to, uint256 value)'
]);

export interface DecodedTransferLog {
  token: string;
  from: string;
  to: string;
  value: bigint;
  transactionHash: string;
  logIndex: number;
  blockNumber: number;
}

/**
 * Decodes an ERC-20 `Transfer` log. ERC-721 transfers share the topic but
 * index the token id as a fourth topic; those return null.
 */
export function decodeTransferLog(log: Log): DecodedTransferLog | null {
  if (log.topics.length !== 3 || log.topics[0]?.toLowerCase() !== ERC20_TRANSFER_TOPIC) {
    return null;
  }

  let parsed: LogDescription | null;
  try {
    parsed = ERC20_EVENTS.parseLog({ topics: log.topics, data: log.data });
  } catch (error) {
    return null;
  }

  if (!parsed) {
    return null;
  }

  const from: unknown = parsed.args.getValue('from');
  const to: unknown = parsed.args.getValue('to');
  const value: unknown = parsed.args.getValue('value');
  if (typeof from !== 'string' || typeof to !== 'string' || typeof value !== 'bigint') {
    return null;
  }

  return {
    token: log.address,
    from,
    to,
    value,
    transactionHash: log.transactionHash,
    logIndex: log.logIndex,
    blockNumber: log.blockNumber
  };
}
