import { describe, it, expect } from 'vitest';
import { formatMessage, buildInviteCard } from './format.js';
import type { CardConfig } from '../config.js';

const card: CardConfig = {
  title: 'Join us on Slack',
  subtitle: 'Bridged from Slack.',
  buttonText: 'Accept your Slack invite',
  inviteUrl: 'https://join.example.test/invite',
  imageUrl: 'https://img.example.test/slack.png',
};

describe('formatMessage', () => {
  it('prefixes the text with the display name', () => {
    expect(formatMessage('Alice', 'hello', card).text).toBe('Alice: hello');
  });

  it('keeps the message text verbatim', () => {
    const text = 'line one\n*bold* <https://example.test|link> :wave:';
    expect(formatMessage('U123', text, card).text).toBe(`U123: ${text}`);
  });

  it('appends the invite card', () => {
    const payload = formatMessage('Alice', 'hello', card);

    expect(payload.cardsV2).toEqual([
      {
        cardId: 'slack-invite',
        card: {
          header: {
            title: 'Join us on Slack',
            subtitle: 'Bridged from Slack.',
            imageUrl: 'https://img.example.test/slack.png',
            imageType: 'SQUARE',
          },
          sections: [
            {
              widgets: [
                {
                  buttonList: {
                    buttons: [
                      {
                        text: 'Accept your Slack invite',
                        onClick: { openLink: { url: 'https://join.example.test/invite' } },
                      },
                    ],
                  },
                },
              ],
            },
          ],
        },
      },
    ]);
  });

  it('builds the same card regardless of the message', () => {
    expect(formatMessage('Bob', 'first', card).cardsV2).toEqual(formatMessage('Carol', 'second', card).cardsV2);
  });
});

describe('buildInviteCard', () => {
  it('omits the image and button when they are not configured', () => {
    const result = buildInviteCard({ title: 'Title', subtitle: 'Sub', buttonText: 'Join' });

    expect(result).toEqual({ header: { title: 'Title', subtitle: 'Sub' } });
  });
});
