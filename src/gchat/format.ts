import type { CardConfig } from '../config.js';
import type { GoogleChatCard, OutboundPayload } from '../types.js';

export const INVITE_CARD_ID = 'slack-invite';

export function buildInviteCard(card: CardConfig): GoogleChatCard {
  return {
    header: {
      title: card.title,
      subtitle: card.subtitle,
      ...(card.imageUrl ? { imageUrl: card.imageUrl, imageType: 'SQUARE' as const } : {}),
    },
    ...(card.inviteUrl
      ? {
          sections: [
            {
              widgets: [
                {
                  buttonList: {
                    buttons: [{ text: card.buttonText, onClick: { openLink: { url: card.inviteUrl } } }],
                  },
                },
              ],
            },
          ],
        }
      : {}),
  };
}

/** Compose the Google Chat message for one forwarded Slack message. */
export function formatMessage(displayName: string, text: string, card: CardConfig): OutboundPayload {
  return {
    text: `${displayName}: ${text}`,
    cardsV2: [{ cardId: INVITE_CARD_ID, card: buildInviteCard(card) }],
  };
}
