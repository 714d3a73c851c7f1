import type { WebClient } from '@slack/web-api';
import type { Logger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';

function firstNonBlank(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

/**
 * Resolve the name shown next to a forwarded message.
 * Never rejects; falls back to the raw user id.
 */
export async function resolveUserDisplayName(userId: string, client: WebClient, logger: Logger): Promise<string> {
  try {
    const result = await client.users.info({ user: userId });
    const user = result.user;
    return firstNonBlank(user?.profile?.display_name, user?.profile?.real_name, user?.real_name) ?? userId;
  } catch (error: unknown) {
    logger.warn({ user: userId, err: errorMessage(error) }, 'User lookup failed, using raw user id');
    return userId;
  }
}
