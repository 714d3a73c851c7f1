import { WebClient } from '@slack/web-api';
import type { RelayConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { createSlackLogger } from './logger.js';

/**
 * Build the bot-token client used for channel and user lookups.
 * Calls are bounded by the outbound timeout and never retried.
 */
export function createSlackClient(config: RelayConfig, logger: Logger): WebClient {
  return new WebClient(config.slackBotToken, {
    timeout: config.outboundTimeoutMs,
    retryConfig: { retries: 0 },
    rejectRateLimitedCalls: true,
    logger: createSlackLogger(logger.child({ component: 'slack-client' })),
  });
}
