import TelegramBot from 'node-telegram-bot-api';
import { DeliveryMode, NotificationTransport, PortfolioSnapshot, ProviderHealth, SnapshotMode, SubscriberId } from '../types';
import { SubscriptionStore } from '../subscriptions';
import { ScannerStatus } from '../listener/scanner';
import { canonicalizeAddress, isValidAddress, shortAddress } from '../utils/address';
import { ValidationError, errorMessage } from '../utils/errors';
import { escapeHtml, formatPortfolioMessage, formatUtc, formatWalletList } from '../notifications/format';

export interface Reply {
  text: string;
  mode: DeliveryMode;
}

export type ReplyFn = (reply: Reply) => Promise<void>;

export interface CommandDeps {
  store: SubscriptionStore;
  portfolio: { snapshot(address: string, mode: SnapshotMode): Promise<PortfolioSnapshot> };
  scannerStatus: () => ScannerStatus;
  providerHealth?: () => ProviderHealth[];
  network: string;
}

export interface ParsedCommand {
  command: string;
  args: string[];
}

const MAX_LABEL_LENGTH = 64;

const HELP_TEXT = [
  '🤖 <b>Ethereum Wallet Monitor</b>',
  '',
  'I watch your Ethereum wallets and message you about every transaction.',
  '',
  '<b>Commands:</b>',
  '• <code>/add_wallet &lt;address&gt; &lt;name&gt;</code> - add a wallet to monitor',
  '• <code>/remove_wallet &lt;address&gt;</code> - stop monitoring a wallet',
  '• <code>/list_wallets</code> - show your tracked wallets',
  '• <code>/get_balance &lt;address&gt;</code> - ETH plus token holdings valued in ETH',
  '• <code>/get_balance &lt;address&gt; &lt;token_contract&gt;</code> - one token only',
  '• <code>/status</code> - scanner and endpoint status',
  '',
  'Get started by adding your first wallet! 🚀'
].join('\n');

const USAGE = {
  add_wallet: '❌ Usage: <code>/add_wallet &lt;address&gt; &lt;name&gt;</code>',
  remove_wallet: '❌ Usage: <code>/remove_wallet &lt;address&gt;</code>',
  get_balance: '❌ Usage: <code>/get_balance &lt;address&gt; [token_contract]</code>'
};

/** Splits "/cmd@bot a b" into its command and whitespace-separated arguments. */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) return null;
  const [head, ...args] = trimmed.split(/\s+/);
  const command = head.slice(1).split('@')[0].toLowerCase();
  return command ? { command, args } : null;
}

function requireAddress(value: string, what: string): string {
  if (!isValidAddress(value)) {
    throw new ValidationError(`❌ Invalid ${what} format!`);
  }
  return canonicalizeAddress(value);
}

/**
 * Front end for subscription management and on-demand balance queries.
 * Argument checks happen here; the store and the aggregator only ever see
 * canonical addresses.
 */
export class CommandHandler {
  private deps: CommandDeps;

  constructor(deps: CommandDeps) {
    this.deps = deps;
  }

  async handle(subscriberId: SubscriberId, text: string, reply: ReplyFn): Promise<boolean> {
    const parsed = parseCommand(text);
    if (!parsed) return false;

    try {
      switch (parsed.command) {
        case 'start':
        case 'help':
          await reply({ text: HELP_TEXT, mode: 'html' });
          return true;
        case 'add_wallet':
          await this.addWallet(subscriberId, parsed.args, reply);
          return true;
        case 'remove_wallet':
          await this.removeWallet(subscriberId, parsed.args, reply);
          return true;
        case 'list_wallets':
          await reply({ text: formatWalletList(await this.deps.store.subscriptionsOf(subscriberId)), mode: 'html' });
          return true;
        case 'get_balance':
          await this.getBalance(parsed.args, reply);
          return true;
        case 'status':
          await reply({ text: this.statusText(), mode: 'html' });
          return true;
        default:
          return false;
      }
    } catch (error) {
      if (error instanceof ValidationError) {
        await reply({ text: error.message, mode: 'html' });
        return true;
      }
      console.error(`[Commands] /${parsed.command} failed for ${subscriberId}: ${errorMessage(error)}`);
      await reply({ text: `❌ Error: ${escapeHtml(errorMessage(error))}`, mode: 'html' });
      return true;
    }
  }

  private async addWallet(subscriberId: SubscriberId, args: string[], reply: ReplyFn): Promise<void> {
    if (args.length < 2) throw new ValidationError(USAGE.add_wallet);
    const address = requireAddress(args[0], 'Ethereum address');
    const label = args.slice(1).join(' ');
    if (label.length > MAX_LABEL_LENGTH) {
      throw new ValidationError(`❌ Wallet name is too long (max ${MAX_LABEL_LENGTH} characters).`);
    }

    const result = await this.deps.store.addSubscription(subscriberId, address, label);
    if (result === 'exists') {
      await reply({ text: '❌ Wallet already exists in your list!', mode: 'html' });
      return;
    }
    console.log(`[Commands] ${subscriberId} now tracks ${shortAddress(address)}`);
    await reply({
      text: `✅ Wallet added successfully!\n\n<b>Name:</b> ${escapeHtml(label)}\n<b>Address:</b> <code>${address}</code>\n\nI'll notify you of all transactions on this wallet! 📱`,
      mode: 'html'
    });
  }

  private async removeWallet(subscriberId: SubscriberId, args: string[], reply: ReplyFn): Promise<void> {
    if (args.length !== 1) throw new ValidationError(USAGE.remove_wallet);
    const address = requireAddress(args[0], 'Ethereum address');

    const result = await this.deps.store.removeSubscription(subscriberId, address);
    if (result === 'not_found') {
      await reply({ text: '❌ Wallet not found in your list!', mode: 'html' });
      return;
    }
    console.log(`[Commands] ${subscriberId} stopped tracking ${shortAddress(address)}`);
    await reply({
      text: `✅ Wallet removed successfully!\n\n<b>Address:</b> <code>${address}</code>\n\nI'll no longer monitor this wallet for you.`,
      mode: 'html'
    });
  }

  private async getBalance(args: string[], reply: ReplyFn): Promise<void> {
    if (args.length < 1 || args.length > 2) throw new ValidationError(USAGE.get_balance);
    const address = requireAddress(args[0], 'wallet address');
    const contract = args.length === 2 ? requireAddress(args[1], 'token contract address') : undefined;

    await reply({ text: '⏳ Fetching balance data...', mode: 'plain' });
    const mode: SnapshotMode = contract ? { kind: 'single', contract } : { kind: 'full' };
    const snapshot = await this.deps.portfolio.snapshot(address, mode);
    await reply({ text: formatPortfolioMessage(snapshot), mode: 'html' });
  }

  private statusText(): string {
    const s = this.deps.scannerStatus();
    const lines = [
      '🔌 <b>Monitor Status</b>',
      '',
      `<b>Network:</b> ${escapeHtml(this.deps.network)}`,
      `<b>Scanner:</b> ${s.state}`,
      `<b>Last scanned block:</b> ${s.watermark ?? 'not started'}`
    ];
    if (s.lastTick) {
      lines.push(`<b>Last tick:</b> blocks ${s.lastTick.fromBlock}-${s.lastTick.toBlock} at ${formatUtc(Math.floor(s.lastTick.at / 1000))}`);
    }
    lines.push(`<b>Events emitted:</b> ${s.eventsEmitted}`);
    if (s.skipped.length) {
      lines.push(`<b>Skipped blocks:</b> ${s.skipped.join(', ')}`);
    }

    const health = this.deps.providerHealth?.() ?? [];
    if (health.length) {
      lines.push('', '<b>Endpoints:</b>');
      for (const h of health) {
        const latency = h.latencyMs !== undefined ? ` ${h.latencyMs}ms` : '';
        lines.push(`${h.healthy ? '✅' : '❌'} ${escapeHtml(h.name)}${latency}`);
      }
    }
    return lines.join('\n');
  }
}

/** Routes incoming Telegram messages to the handler; replies go back to the originating chat. */
export function registerCommands(bot: TelegramBot, handler: CommandHandler, transport: NotificationTransport): void {
  bot.on('message', (msg: TelegramBot.Message) => {
    const text = msg.text;
    if (!text) return;
    const chatId = msg.chat.id;
    const reply: ReplyFn = ({ text: body, mode }) => transport.send(chatId, body, mode);
    handler.handle(chatId, text, reply).catch(error => {
      console.error(`[Commands] Reply to ${chatId} failed: ${errorMessage(error)}`);
    });
  });
  bot.on('polling_error', (error: Error) => {
    console.error(`[Commands] Polling error: ${error.message}`);
  });
}
