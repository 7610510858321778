import { NotificationTransport, Subscriber, TransferEvent } from '../types';
import { SubscriptionIndex } from '../subscriptions';
import { errorMessage } from '../utils/errors';
import { shortAddress } from '../utils/address';
import { formatTransferMessage } from './format';

export { TelegramNotifier } from './telegram';
export * from './format';

export interface DispatchResult {
  delivered: number;
  failed: number;
  orphaned: number;
}

export interface DispatcherOptions {
  explorerBase: string;
}

/**
 * Fans a batch of transfer events out to the subscribers of each event's
 * address. Each (event, subscriber) pair is one delivery attempt; a failed
 * delivery is logged and dropped.
 */
export class NotificationDispatcher {
  private index: SubscriptionIndex;
  private transport: NotificationTransport;
  private explorerBase: string;

  constructor(index: SubscriptionIndex, transport: NotificationTransport, options: DispatcherOptions) {
    this.index = index;
    this.transport = transport;
    this.explorerBase = options.explorerBase;
  }

  async dispatch(events: readonly TransferEvent[]): Promise<DispatchResult> {
    const result: DispatchResult = { delivered: 0, failed: 0, orphaned: 0 };
    const subscribers = new Map<string, Subscriber[]>();

    for (const event of events) {
      let recipients = subscribers.get(event.address);
      if (!recipients) {
        try {
          recipients = await this.index.subscribersOf(event.address);
        } catch (error) {
          console.error(`[Dispatcher] Could not resolve subscribers of ${shortAddress(event.address)}: ${errorMessage(error)}`);
          recipients = [];
        }
        subscribers.set(event.address, recipients);
      }

      if (recipients.length === 0) {
        result.orphaned++;
        continue;
      }

      for (const { subscriberId, label } of recipients) {
        const text = formatTransferMessage(event, label, this.explorerBase);
        try {
          await this.transport.send(subscriberId, text, 'html');
          result.delivered++;
        } catch (error) {
          result.failed++;
          console.error(`[Dispatcher] Delivery to ${subscriberId} failed for ${shortAddress(event.transactionHash)}: ${errorMessage(error)}`);
        }
      }
    }

    if (events.length > 0) {
      console.log(`[Dispatcher] ${events.length} event(s): ${result.delivered} delivered, ${result.failed} failed, ${result.orphaned} orphaned`);
    }
    return result;
  }
}
