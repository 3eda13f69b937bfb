import { Module } from '@nestjs/common';
import { ConversationService } from './conversation.service';
import { MESSENGER } from './messenger';
import { WebhookController } from './webhook.controller';
import { WhatsappMessenger } from './whatsapp-messenger.service';
import { QuestionBankService } from '../quiz/question-bank.service';
import { SessionStoreService } from '../quiz/session-store.service';

@Module({
  controllers: [WebhookController],
  providers: [
    ConversationService,
    QuestionBankService,
    SessionStoreService,
    { provide: MESSENGER, useClass: WhatsappMessenger },
  ],
})
export class BotModule {}
