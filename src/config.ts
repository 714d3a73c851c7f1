import { z } from 'zod';
import { RelayError, ErrorCode } from './utils/errors.js';

const envSchema = z.object({
  // Slack
  SLACK_BOT_TOKEN: z.string().min(1, 'SLACK_BOT_TOKEN is required'),
  SLACK_SIGNING_SECRET: z.string().min(1, 'SLACK_SIGNING_SECRET is required'),

  // Google Chat destinations
  GOOGLE_CHAT_GENERAL_WEBHOOK_URL: z.string().url(),
  GOOGLE_CHAT_ANNOUNCEMENTS_WEBHOOK_URL: z.string().url(),

  // Server
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  EVENTS_PATH: z.string().startsWith('/').default('/slack/events'),
  OUTBOUND_TIMEOUT_MS: z.coerce.number().int().min(1000).max(10_000).default(4000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Static card appended to every forwarded message
  CARD_TITLE: z.string().default('Join us on Slack to join the conversation!'),
  CARD_SUBTITLE: z.string().default('This message was bridged from Slack.'),
  CARD_IMAGE_URL: z.string().url().optional(),
  CARD_INVITE_URL: z.string().url().optional(),
  CARD_BUTTON_TEXT: z.string().default('Accept your Slack invite'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface WebhookUrls {
  general: string;
  announcements: string;
}

export interface CardConfig {
  title: string;
  subtitle: string;
  imageUrl?: string;
  inviteUrl?: string;
  buttonText: string;
}

export interface RelayConfig {
  slackBotToken: string;
  slackSigningSecret: string;
  webhooks: WebhookUrls;
  host: string;
  port: number;
  eventsPath: string;
  outboundTimeoutMs: number;
  logLevel: LogLevel;
  card: CardConfig;
}

/** Build the relay configuration once from the process environment. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  // Treat blank values from .env files as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new RelayError(ErrorCode.CONFIG_MISSING, 'Invalid environment variables', { issues });
  }

  const data = parsed.data;
  return {
    slackBotToken: data.SLACK_BOT_TOKEN,
    slackSigningSecret: data.SLACK_SIGNING_SECRET,
    webhooks: {
      general: data.GOOGLE_CHAT_GENERAL_WEBHOOK_URL,
      announcements: data.GOOGLE_CHAT_ANNOUNCEMENTS_WEBHOOK_URL,
    },
    host: data.HOST,
    port: data.PORT,
    eventsPath: data.EVENTS_PATH,
    outboundTimeoutMs: data.OUTBOUND_TIMEOUT_MS,
    logLevel: data.LOG_LEVEL,
    card: {
      title: data.CARD_TITLE,
      subtitle: data.CARD_SUBTITLE,
      imageUrl: data.CARD_IMAGE_URL,
      inviteUrl: data.CARD_INVITE_URL,
      buttonText: data.CARD_BUTTON_TEXT,
    },
  };
}
