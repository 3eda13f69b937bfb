import { Body, Controller, ForbiddenException, Get, HttpCode, Logger, Post, Query } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AppConfig } from '../config/configuration';
import { ConversationService } from './conversation.service';
import { parseWebhookEvent } from './webhook-event';

@Controller()
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    private readonly conversation: ConversationService,
    private readonly config: ConfigService<AppConfig, true>,
  ) {}

  @Get()
  health(): string {
    return '✅ Quiz bot is running!';
  }

  /** Subscription handshake: echo the challenge back when the token matches. */
  @Get('webhook')
  verify(
    @Query('hub.mode') mode?: string,
    @Query('hub.verify_token') token?: string,
    @Query('hub.challenge') challenge?: string,
  ): string {
    const expected = this.config.get('VERIFY_TOKEN', { infer: true });
    if (mode === 'subscribe' && expected !== undefined && token === expected) {
      this.logger.log('✅ Webhook verified');
      return challenge ?? '';
    }
    this.logger.warn('❌ Webhook verification failed');
    throw new ForbiddenException('Verification failed');
  }

  /** Always acknowledged, so the provider does not redeliver. */
  @Post('webhook')
  @HttpCode(200)
  async receive(@Body() payload: unknown): Promise<{ status: 'ok' }> {
    await this.conversation.handle(parseWebhookEvent(payload));
    return { status: 'ok' };
  }
}
