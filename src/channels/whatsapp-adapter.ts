import { ChannelOutbound, InboundContent, InboundTurn, WhatsAppMessage, WhatsAppWebhookPayload, WebhookParseResult } from './types';
import { env } from '../config/env';
import { logger, maskIdentity } from '../observability/logger';

function parseContent(message: WhatsAppMessage): InboundContent {
  const type = message.type ?? 'unknown';

  if (type === 'text' && typeof message.text?.body === 'string') {
    return { kind: 'text', text: message.text.body };
  }

  const location = message.location;
  if (type === 'location' && typeof location?.latitude === 'number' && typeof location.longitude === 'number') {
    return { kind: 'location', latitude: location.latitude, longitude: location.longitude };
  }

  return { kind: 'unsupported', messageType: type };
}

/**
 * Flatten a WhatsApp webhook delivery into inbound turns. Status callbacks
 * (delivered/read receipts) carry no messages and yield an empty list.
 */
export function parseWhatsAppWebhook(payload: WhatsAppWebhookPayload, receivedAt: number = Date.now()): WebhookParseResult {
  if (!payload || !Array.isArray(payload.entry)) {
    return { ok: false, reason: 'Missing entry array in webhook payload' };
  }

  const turns: InboundTurn[] = [];
  for (const entry of payload.entry) {
    for (const change of entry.changes ?? []) {
      const value = change.value;
      if (!value?.messages) continue;

      for (const message of value.messages) {
        if (!message.from || !message.id) {
          logger.warn({ messageId: message.id }, 'Skipping WhatsApp message without sender or id');
          continue;
        }
        const contact = value.contacts?.find((c) => c.wa_id === message.from);
        turns.push({
          identity: message.from,
          messageId: message.id,
          contactName: contact?.profile?.name,
          content: parseContent(message),
          receivedAt,
        });
      }
    }
  }

  return { ok: true, turns };
}

export interface WhatsAppOutboundConfig {
  apiUrl: string;
  phoneNumberId: string;
  accessToken: string;
}

/**
 * WhatsApp Cloud API outbound adapter: text replies and read receipts.
 */
export class WhatsAppOutboundAdapter implements ChannelOutbound {
  private readonly messagesUrl: string;
  private readonly accessToken: string;

  constructor(config: WhatsAppOutboundConfig = env.whatsapp) {
    this.messagesUrl = `${config.apiUrl}/${config.phoneNumberId}/messages`;
    this.accessToken = config.accessToken;
  }

  private async apiCall(body: Record<string, unknown>, label: string): Promise<void> {
    const log = logger.child({ adapter: 'whatsapp', call: label });

    try {
      const res = await fetch(this.messagesUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
      });

      if (!res.ok) {
        const errBody = await res.text();
        log.error({ status: res.status, errBody }, 'WhatsApp API error');
        throw new Error(`WhatsApp API ${res.status}: ${errBody}`);
      }
    } catch (err) {
      log.error({ err }, 'WhatsApp API call failed');
      throw err;
    }
  }

  async sendMessage(identity: string, text: string): Promise<void> {
    await this.apiCall({
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: identity,
      type: 'text',
      text: { preview_url: false, body: text },
    }, 'send');
    logger.info({ identity: maskIdentity(identity) }, 'WhatsApp message sent');
  }

  async markRead(messageId: string): Promise<void> {
    await this.apiCall({
      messaging_product: 'whatsapp',
      status: 'read',
      message_id: messageId,
    }, 'mark-read');
  }
}
