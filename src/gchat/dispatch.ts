import type { WebhookUrls } from '../config.js';
import type { Logger } from '../logger.js';
import type { OutboundPayload } from '../types.js';
import { RelayError, ErrorCode, toRelayError } from '../utils/errors.js';

export type DispatchResult = 'delivered' | 'skipped';

export interface DispatchOptions {
  webhooks: WebhookUrls;
  timeoutMs: number;
  logger: Logger;
  fetch?: typeof fetch;
}

export function selectWebhookUrl(channelName: string, webhooks: WebhookUrls): string | null {
  switch (channelName) {
    case 'general':
      return webhooks.general;
    case 'announcements':
      return webhooks.announcements;
    default:
      return null;
  }
}

/**
 * POST the payload to the webhook mapped to `channelName`.
 * Channels without a mapping are skipped; a failed POST is not retried.
 */
export async function dispatchToWebhook(
  channelName: string,
  payload: OutboundPayload,
  options: DispatchOptions,
): Promise<DispatchResult> {
  const url = selectWebhookUrl(channelName, options.webhooks);
  if (!url) {
    options.logger.debug({ channel: channelName }, 'Channel has no webhook mapping, skipping');
    return 'skipped';
  }

  const doFetch = options.fetch ?? fetch;
  let res: Response;
  try {
    res = await doFetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json; charset=UTF-8' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error: unknown) {
    throw toRelayError(ErrorCode.DELIVERY_FAILED, `Webhook POST for #${channelName} failed`, error);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new RelayError(
      ErrorCode.DELIVERY_FAILED,
      `Google Chat webhook ${res.status}: ${text || res.statusText}`,
      { channel: channelName, status: res.status },
    );
  }

  options.logger.info({ channel: channelName, status: res.status }, 'Message forwarded to Google Chat');
  return 'delivered';
}
