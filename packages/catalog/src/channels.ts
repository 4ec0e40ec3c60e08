/**
 * Centralized channel definitions for channel reconciliation.
 *
 * A channel is an external sales or fulfilment platform that produces its own
 * report formats and its own SKU identifier space.
 */

export const CHANNELS = ['amazon', 'walmart', 'tiktok', 'shopify', 'flexport'] as const;
export type Channel = (typeof CHANNELS)[number];

/**
 * Display labels for channels (user-facing, also the filename prefix)
 */
export const CHANNEL_LABELS: Record<Channel, string> = {
  amazon: 'Amazon',
  walmart: 'Walmart',
  tiktok: 'TikTok',
  shopify: 'Shopify',
  flexport: 'Flexport',
};

/**
 * Get display label for a channel
 */
export function getChannelLabel(channel: string): string {
  return isChannel(channel) ? CHANNEL_LABELS[channel] : channel;
}

/**
 * Check if a value is a valid channel
 */
export function isChannel(value: string): value is Channel {
  return (CHANNELS as readonly string[]).includes(value);
}

/**
 * Resolve a filename prefix such as "Amazon" or "TIKTOK" to its channel
 */
export function channelFromPrefix(prefix: string): Channel | null {
  const normalized = prefix.trim().toLowerCase();
  return isChannel(normalized) ? normalized : null;
}
