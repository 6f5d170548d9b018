/** Raw WhatsApp Cloud API webhook payload; only the fields we read are typed */
export interface WhatsAppWebhookPayload {
  object?: string;
  entry?: Array<{
    id?: string;
    changes?: Array<{
      field?: string;
      value?: {
        messaging_product?: string;
        contacts?: Array<{ wa_id?: string; profile?: { name?: string } }>;
        messages?: WhatsAppMessage[];
        statuses?: unknown[];
      };
    }>;
  }>;
}

export interface WhatsAppMessage {
  id?: string;
  from?: string;
  timestamp?: string;
  type?: string;
  text?: { body?: string };
  location?: { latitude?: number; longitude?: number; name?: string; address?: string };
  [key: string]: unknown;
}

export type InboundContent =
  | { kind: 'text'; text: string }
  | { kind: 'location'; latitude: number; longitude: number }
  | { kind: 'unsupported'; messageType: string };

/** One inbound turn, normalized away from the transport's wire format */
export interface InboundTurn {
  /** Conversation identity (the sender's phone number) */
  identity: string;
  messageId: string;
  /** WhatsApp profile name; seeds the customer name when the profile has none */
  contactName?: string;
  content: InboundContent;
  receivedAt: number;
}

/** Outbound channel adapter interface */
export interface ChannelOutbound {
  sendMessage(identity: string, text: string): Promise<void>;
  markRead(messageId: string): Promise<void>;
}

/** Webhook parse result */
export type WebhookParseResult =
  | { ok: true; turns: InboundTurn[] }
  | { ok: false; reason: string };
