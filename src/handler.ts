import type { WebClient } from '@slack/web-api';
import type { RelayConfig } from './config.js';
import type { Logger } from './logger.js';
import type { EventCallback, HandlerResponse, InboundEvent, RawSlackRequest, SlackMessageEvent } from './types.js';
import { verifySlackSignature } from './slack/signature.js';
import { resolveChannelName } from './slack/channels.js';
import { resolveUserDisplayName } from './slack/users.js';
import { formatMessage } from './gchat/format.js';
import { dispatchToWebhook } from './gchat/dispatch.js';
import { RelayError, errorMessage } from './utils/errors.js';

export interface HandlerDeps {
  config: RelayConfig;
  slack: WebClient;
  logger: Logger;
  fetch?: typeof fetch;
  /** Clock in milliseconds, for signature freshness. */
  now?: () => number;
}

type ForwardableMessage = SlackMessageEvent & { channel: string; user: string; text: string };

const ACK: HandlerResponse = { status: 200, body: '', contentType: 'text/plain; charset=utf-8' };
const UNAUTHORIZED: HandlerResponse = {
  status: 401,
  body: 'Invalid signature',
  contentType: 'text/plain; charset=utf-8',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseMessageEvent(value: unknown): SlackMessageEvent | undefined {
  if (!isRecord(value) || typeof value.type !== 'string') return undefined;
  return {
    type: value.type,
    channel: optionalString(value.channel),
    user: optionalString(value.user),
    text: optionalString(value.text),
    subtype: optionalString(value.subtype),
    ts: optionalString(value.ts),
  };
}

function parseInboundEvent(rawBody: string): InboundEvent | null {
  let value: unknown;
  try {
    value = JSON.parse(rawBody);
  } catch {
    return null;
  }
  if (!isRecord(value)) return null;

  if (value.type === 'url_verification') {
    return { type: 'url_verification', challenge: optionalString(value.challenge) };
  }
  if (value.type === 'event_callback') {
    return { type: 'event_callback', event: parseMessageEvent(value.event) };
  }
  return null;
}

/** A plain user-authored message; subtypes cover bot posts, edits, joins and the like. */
function asForwardableMessage(payload: EventCallback): ForwardableMessage | null {
  const event = payload.event;
  if (!event || event.type !== 'message' || event.subtype !== undefined) return null;
  const { channel, user, text } = event;
  if (!channel || !user || !text || text.trim() === '') return null;
  return { ...event, channel, user, text };
}

async function forwardMessage(message: ForwardableMessage, deps: HandlerDeps): Promise<void> {
  const { config, slack, logger } = deps;
  const log = logger.child({ channel: message.channel, user: message.user, ts: message.ts });

  // Both lookups are independent; the user lookup never rejects.
  const [channel, displayName] = await Promise.all([
    resolveChannelName(message.channel, slack).then(
      (name) => ({ ok: true as const, name }),
      (error: unknown) => ({ ok: false as const, error }),
    ),
    resolveUserDisplayName(message.user, slack, log),
  ]);

  if (!channel.ok) {
    log.error({ err: errorMessage(channel.error) }, 'Channel lookup failed, message not forwarded');
    return;
  }

  const payload = formatMessage(displayName, message.text, config.card);
  try {
    await dispatchToWebhook(channel.name, payload, {
      webhooks: config.webhooks,
      timeoutMs: config.outboundTimeoutMs,
      logger: log,
      fetch: deps.fetch,
    });
  } catch (error: unknown) {
    const details = error instanceof RelayError ? error.details : undefined;
    log.error({ err: errorMessage(error), ...details }, 'Failed to forward message to Google Chat');
  }
}

/**
 * Handle one Slack Events API request.
 * Anything that passes signature verification is acknowledged with 200 so
 * Slack keeps the subscription enabled; forwarding failures are only logged.
 */
export async function handleSlackRequest(request: RawSlackRequest, deps: HandlerDeps): Promise<HandlerResponse> {
  const { logger } = deps;

  try {
    verifySlackSignature({
      signingSecret: deps.config.slackSigningSecret,
      rawBody: request.rawBody,
      timestamp: request.headers.timestamp,
      signature: request.headers.signature,
      now: deps.now?.(),
    });
  } catch (error: unknown) {
    const reason = error instanceof RelayError ? error.details?.['reason'] : undefined;
    logger.warn({ reason, err: errorMessage(error) }, 'Rejected Slack request');
    return UNAUTHORIZED;
  }

  const payload = parseInboundEvent(request.rawBody);
  if (!payload) {
    logger.warn('Ignoring unrecognized Slack payload');
    return ACK;
  }

  if (payload.type === 'url_verification') {
    logger.info('Answering Slack URL verification challenge');
    return { status: 200, body: payload.challenge ?? '', contentType: 'text/plain; charset=utf-8' };
  }

  const message = asForwardableMessage(payload);
  if (!message) {
    logger.debug({ type: payload.event?.type, subtype: payload.event?.subtype }, 'Acknowledged event without forwarding');
    return ACK;
  }

  await forwardMessage(message, deps);
  return ACK;
}
