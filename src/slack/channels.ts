import type { WebClient } from '@slack/web-api';
import { RelayError, ErrorCode, toRelayError } from '../utils/errors.js';

/**
 * Look up a channel's name with `conversations.info`.
 * Any failure is a RESOLUTION_FAILED error: forwarding under a guessed name
 * could route a message to the wrong space.
 */
export async function resolveChannelName(channelId: string, client: WebClient): Promise<string> {
  let name: string | undefined;
  try {
    const result = await client.conversations.info({ channel: channelId });
    name = result.channel?.name;
  } catch (error: unknown) {
    throw toRelayError(ErrorCode.RESOLUTION_FAILED, `Failed to look up channel ${channelId}`, error);
  }

  if (!name) {
    throw new RelayError(
      ErrorCode.RESOLUTION_FAILED,
      `Channel ${channelId} has no name in the conversations.info response`,
      { channel: channelId },
    );
  }
  return name;
}
