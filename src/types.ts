export interface SlackMessageEvent {
  type: string;
  channel?: string;
  user?: string;
  text?: string;
  subtype?: string;
  ts?: string;
}

export interface UrlVerificationEvent {
  type: 'url_verification';
  challenge?: string;
}

export interface EventCallback {
  type: 'event_callback';
  event?: SlackMessageEvent;
}

export type InboundEvent = UrlVerificationEvent | EventCallback;

export interface GoogleChatButton {
  text: string;
  onClick: { openLink: { url: string } };
}

export interface GoogleChatWidget {
  buttonList: { buttons: GoogleChatButton[] };
}

export interface GoogleChatCard {
  header: {
    title: string;
    subtitle?: string;
    imageUrl?: string;
    imageType?: 'SQUARE' | 'CIRCLE';
  };
  sections?: Array<{ widgets: GoogleChatWidget[] }>;
}

export interface OutboundPayload {
  text: string;
  cardsV2?: Array<{ cardId: string; card: GoogleChatCard }>;
}

export interface RawSlackRequest {
  rawBody: string;
  headers: {
    timestamp?: string | null;
    signature?: string | null;
  };
}

export interface HandlerResponse {
  status: 200 | 401;
  body: string;
  contentType: string;
}
