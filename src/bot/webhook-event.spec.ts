import { buttonReplyEvent, listReplyEvent, textEvent } from '../test-utils';
import { parseWebhookEvent } from './webhook-event';

describe('parseWebhookEvent', () => {
  it('parses a text message', () => {
    expect(parseWebhookEvent(textEvent('15550001', '  hi  '))).toEqual({
      kind: 'text',
      from: '15550001',
      body: 'hi',
    });
  });

  it('parses a button reply', () => {
    expect(parseWebhookEvent(buttonReplyEvent('15550001', 'start_quiz'))).toEqual({
      kind: 'reply',
      from: '15550001',
      replyId: 'start_quiz',
      control: 'button',
    });
  });

  it('parses a list reply', () => {
    expect(parseWebhookEvent(listReplyEvent('15550001', '4'))).toEqual({
      kind: 'reply',
      from: '15550001',
      replyId: '4',
      control: 'list',
    });
  });

  it('treats a status callback without messages as unrecognized', () => {
    const payload = { entry: [{ changes: [{ value: { statuses: [{ status: 'delivered' }] } }] }] };
    expect(parseWebhookEvent(payload)).toEqual({ kind: 'unrecognized', reason: 'no messages in payload' });
  });

  it('treats an empty payload as unrecognized', () => {
    expect(parseWebhookEvent({})).toEqual({ kind: 'unrecognized', reason: 'no entry/changes in payload' });
    expect(parseWebhookEvent(null)).toEqual({ kind: 'unrecognized', reason: 'no entry/changes in payload' });
  });

  it('rejects a message without a sender', () => {
    const payload = { entry: [{ changes: [{ value: { messages: [{ type: 'text', text: { body: 'hi' } }] } }] }] };
    expect(parseWebhookEvent(payload)).toEqual({ kind: 'unrecognized', reason: 'malformed message: from Required' });
  });

  it('rejects an unknown interactive sub-type', () => {
    const payload = {
      entry: [
        {
          changes: [
            { value: { messages: [{ from: '1', type: 'interactive', interactive: { type: 'nfm_reply' } }] } },
          ],
        },
      ],
    };
    expect(parseWebhookEvent(payload)).toEqual({
      kind: 'unrecognized',
      reason: 'unknown interactive type: nfm_reply',
    });
  });

  it('rejects unsupported message types', () => {
    const payload = { entry: [{ changes: [{ value: { messages: [{ from: '1', type: 'image' }] } }] }] };
    expect(parseWebhookEvent(payload)).toEqual({ kind: 'unrecognized', reason: 'unsupported message type: image' });
  });
});
