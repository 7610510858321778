import { formatEther, formatUnits } from 'ethers';
import { PortfolioSnapshot, Subscription, TransferEvent } from '../types';

const EXPLORERS: Record<string, string> = {
  mainnet: 'https://etherscan.io',
  sepolia: 'https://sepolia.etherscan.io',
  polygon: 'https://polygonscan.com',
  arbitrum: 'https://arbiscan.io',
  optimism: 'https://optimistic.etherscan.io',
  base: 'https://basescan.org'
};

const TOP_HOLDINGS = 5;

export function getExplorerBase(network: string): string {
  return EXPLORERS[network.toLowerCase()] ?? EXPLORERS.mainnet;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Strips tags and entities so a message can go out without a parse mode. */
export function toPlainText(html: string): string {
  return html
    .replace(/<[^>]+>/g, '')
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

export function formatUtc(timestampSeconds: number): string {
  return `${new Date(timestampSeconds * 1000).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/** 2 decimals from 1 up, 4 from 0.01, 8 below. */
export function formatTokenBalance(balance: number): string {
  if (balance >= 1) return balance.toFixed(2);
  if (balance >= 0.01) return balance.toFixed(4);
  return balance.toFixed(8);
}

export function formatEth(value: number): string {
  return value.toFixed(6);
}

export function formatTransferMessage(event: TransferEvent, label: string, explorerBase: string): string {
  const outgoing = event.direction === 'outgoing';
  const asset = event.assetKind === 'native' ? 'ETH' : escapeHtml(event.tokenSymbol);
  const amount = event.assetKind === 'native'
    ? formatEther(event.amount)
    : formatUnits(event.amount, event.tokenDecimals);
  const to = event.to ? `<code>${event.to}</code>` : '<i>(contract creation)</i>';

  const lines = [
    `${outgoing ? '📤' : '📥'} <b>${event.assetKind === 'native' ? 'ETH' : 'Token'} Transaction - ${escapeHtml(label)}</b>`,
    '',
    `<b>Type:</b> ${outgoing ? 'Sent' : 'Received'} ${asset}`,
    `<b>Amount:</b> ${amount} ${asset}`
  ];
  if (event.assetKind === 'token') {
    lines.push(`<b>Token:</b> <a href="${explorerBase}/token/${event.tokenAddress}">${event.tokenAddress}</a>`);
  }
  lines.push(
    `<b>From:</b> <code>${event.from}</code>`,
    `<b>To:</b> ${to}`,
    `<b>Time:</b> ${formatUtc(event.timestamp)}`,
    `<b>Hash:</b> <code>${event.transactionHash}</code>`,
    `<b>Block:</b> ${event.blockNumber}`,
    '',
    `<a href="${explorerBase}/tx/${event.transactionHash}">View on Explorer</a>`
  );
  return lines.join('\n');
}

export function formatPortfolioMessage(snapshot: PortfolioSnapshot): string {
  const { holdings } = snapshot;
  const lines = [
    `💰 <b>Balance for</b> <code>${snapshot.address}</code>`,
    '',
    `<b>ETH Balance:</b> ${formatEth(snapshot.nativeBalanceEth)} ETH`,
    ''
  ];

  if (holdings.length) {
    const many = holdings.length >= TOP_HOLDINGS;
    lines.push(
      `<b>Tokens Found:</b> ${holdings.length}`,
      `<b>Total Token Value:</b> ${formatEth(snapshot.tokenValueTotal)} ETH`,
      '',
      many ? `<b>Top ${TOP_HOLDINGS} Most Valuable Tokens:</b>` : '<b>Token Balances:</b>'
    );
    holdings.slice(0, TOP_HOLDINGS).forEach((h, i) => {
      const bullet = many ? `${i + 1}.` : '•';
      lines.push(`${bullet} <b>${escapeHtml(h.symbol)}:</b> ${formatTokenBalance(h.balance)} (~${formatEth(h.nativeValue)} ETH)`);
    });
    if (holdings.length > TOP_HOLDINGS) {
      const rest = holdings.slice(TOP_HOLDINGS);
      const restValue = rest.reduce((sum, h) => sum + h.nativeValue, 0);
      lines.push('', `<i>+${rest.length} more tokens (~${formatEth(restValue)} ETH)</i>`);
    }
  } else {
    lines.push(
      '<b>Tokens Found:</b> 0',
      snapshot.discovery === 'single'
        ? '<b>Note:</b> Specified token has zero balance'
        : '<b>Note:</b> No tokens detected'
    );
  }

  lines.push(
    '',
    '<b>Portfolio Summary:</b>',
    `• ETH Balance: ${formatEth(snapshot.nativeBalanceEth)} ETH`,
    `• Token Value: ${formatEth(snapshot.tokenValueTotal)} ETH`,
    `• <b>Total Portfolio: ${formatEth(snapshot.total)} ETH</b>`,
    `• Token Types: ${holdings.length}`
  );
  return lines.join('\n');
}

export function formatWalletList(subscriptions: readonly Subscription[]): string {
  if (!subscriptions.length) {
    return '📭 You don\'t have any wallets added yet!\n\nUse <code>/add_wallet &lt;address&gt; &lt;name&gt;</code> to add your first wallet.';
  }
  const lines = ['📋 <b>Your Tracked Wallets:</b>', ''];
  subscriptions.forEach((s, i) => {
    lines.push(`${i + 1}. <b>${escapeHtml(s.label)}</b>`, `   <code>${s.address}</code>`);
  });
  return lines.join('\n');
}
