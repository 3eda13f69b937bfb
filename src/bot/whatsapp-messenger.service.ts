import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AppConfig } from '../config/configuration';
import { describeError, SendFailureError } from '../quiz/quiz.errors';
import { Messenger, ReplyOption } from './messenger';

const GRAPH_API_BASE = 'https://graph.facebook.com';

/** Sends messages through the WhatsApp Cloud API. Failures are not retried. */
@Injectable()
export class WhatsappMessenger implements Messenger, OnModuleInit {
  private readonly logger = new Logger(WhatsappMessenger.name);

  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  onModuleInit() {
    if (!this.config.get('WHATSAPP_TOKEN', { infer: true })) {
      this.logger.warn('⚠️ WHATSAPP_TOKEN not set; outbound messages will fail');
    }
    if (!this.config.get('WHATSAPP_PHONE_NUMBER_ID', { infer: true })) {
      this.logger.warn('⚠️ WHATSAPP_PHONE_NUMBER_ID not set; outbound messages will fail');
    }
  }

  sendText(to: string, body: string): Promise<void> {
    return this.post(to, { type: 'text', text: { body } });
  }

  sendButtons(to: string, body: string, buttons: ReplyOption[]): Promise<void> {
    return this.post(to, {
      type: 'interactive',
      interactive: {
        type: 'button',
        body: { text: body },
        action: {
          buttons: buttons.map(({ id, title }) => ({ type: 'reply', reply: { id, title } })),
        },
      },
    });
  }

  sendList(
    to: string,
    body: string,
    buttonLabel: string,
    sectionTitle: string,
    rows: ReplyOption[],
  ): Promise<void> {
    return this.post(to, {
      type: 'interactive',
      interactive: {
        type: 'list',
        body: { text: body },
        action: {
          button: buttonLabel,
          sections: [{ title: sectionTitle, rows: rows.map(({ id, title }) => ({ id, title })) }],
        },
      },
    });
  }

  private async post(to: string, message: Record<string, unknown>): Promise<void> {
    const token = this.config.get('WHATSAPP_TOKEN', { infer: true });
    const phoneNumberId = this.config.get('WHATSAPP_PHONE_NUMBER_ID', { infer: true });
    if (!token || !phoneNumberId) {
      throw new SendFailureError('WhatsApp credentials are not configured');
    }

    const version = this.config.get('GRAPH_API_VERSION', { infer: true });
    const url = `${GRAPH_API_BASE}/${version}/${phoneNumberId}/messages`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ messaging_product: 'whatsapp', to, ...message }),
        signal: AbortSignal.timeout(this.config.get('SEND_TIMEOUT_MS', { infer: true })),
      });
    } catch (error) {
      throw new SendFailureError(`WhatsApp request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new SendFailureError(`WhatsApp responded ${response.status}: ${await response.text()}`);
    }
    this.logger.debug(`📤 ${String(message.type)} message sent to ${to}`);
  }
}
