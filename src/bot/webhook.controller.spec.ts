import { ForbiddenException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';

import { AppConfig } from '../config/configuration';
import { QuestionBankService } from '../quiz/question-bank.service';
import { SessionStoreService } from '../quiz/session-store.service';
import { createConfig, RecordingMessenger, removeQuizFiles, textEvent, twoOptionRow, writeQuizFile } from '../test-utils';
import { ConversationService } from './conversation.service';
import { MESSENGER } from './messenger';
import { ParsedEvent } from './webhook-event';
import { WebhookController } from './webhook.controller';

describe('WebhookController', () => {
  let controller: WebhookController;
  let handled: ParsedEvent[];

  async function build(overrides: Partial<AppConfig> = {}) {
    handled = [];
    const conversation = {
      handle: jest.fn(async (event: ParsedEvent) => {
        handled.push(event);
      }),
    };
    const moduleRef = await Test.createTestingModule({
      controllers: [WebhookController],
      providers: [
        { provide: ConversationService, useValue: conversation },
        { provide: ConfigService, useValue: createConfig(overrides) },
      ],
    }).compile();
    controller = moduleRef.get(WebhookController);
  }

  beforeEach(async () => {
    await build();
  });

  it('reports that it is running', () => {
    expect(controller.health()).toBe('✅ Quiz bot is running!');
  });

  it('echoes the challenge for a matching token', () => {
    expect(controller.verify('subscribe', 'test-verify-token', 'challenge-42')).toBe('challenge-42');
  });

  it('rejects a wrong token', () => {
    expect(() => controller.verify('subscribe', 'wrong', 'challenge-42')).toThrow(ForbiddenException);
  });

  it('rejects a mode other than subscribe', () => {
    expect(() => controller.verify('unsubscribe', 'test-verify-token', 'challenge-42')).toThrow(ForbiddenException);
  });

  it('rejects every handshake when no token is configured', async () => {
    await build({ VERIFY_TOKEN: undefined });
    expect(() => controller.verify('subscribe', undefined, 'challenge-42')).toThrow(ForbiddenException);
  });

  it('parses and forwards incoming events', async () => {
    await expect(controller.receive(textEvent('15550001', 'hi'))).resolves.toEqual({ status: 'ok' });
    expect(handled).toEqual([{ kind: 'text', from: '15550001', body: 'hi' }]);
  });

  it('acknowledges malformed events too', async () => {
    await expect(controller.receive({ unexpected: true })).resolves.toEqual({ status: 'ok' });
    expect(handled).toEqual([{ kind: 'unrecognized', reason: 'no entry/changes in payload' }]);
  });

  describe('with the real conversation', () => {
    afterAll(() => {
      removeQuizFiles();
    });

    it('acknowledges even while the provider never answers', async () => {
      const messenger = new RecordingMessenger();
      messenger.hold();
      const moduleRef = await Test.createTestingModule({
        controllers: [WebhookController],
        providers: [
          ConversationService,
          QuestionBankService,
          SessionStoreService,
          { provide: ConfigService, useValue: createConfig({ QUIZ_FILE: writeQuizFile([twoOptionRow]) }) },
          { provide: MESSENGER, useValue: messenger },
        ],
      }).compile();
      const realController = moduleRef.get(WebhookController);

      await expect(realController.receive(textEvent('15550001', 'hi'))).resolves.toEqual({ status: 'ok' });
      expect(moduleRef.get(SessionStoreService).peek('15550001')?.state).toBe('AWAITING_START');
      expect(messenger.sent).toEqual([]);
    });
  });
});
