import { z } from 'zod';

export type ParsedEvent =
  | { kind: 'text'; from: string; body: string }
  | { kind: 'reply'; from: string; replyId: string; control: 'button' | 'list' }
  | { kind: 'unrecognized'; reason: string };

const envelopeSchema = z.object({
  entry: z
    .array(
      z.object({
        changes: z
          .array(z.object({ value: z.object({ messages: z.array(z.unknown()).optional() }) }))
          .min(1),
      }),
    )
    .min(1),
});

const replySchema = z.object({ id: z.string().min(1), title: z.string().optional() });

const messageSchema = z.object({
  from: z.string().min(1),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
  interactive: z
    .object({
      type: z.string(),
      button_reply: replySchema.optional(),
      list_reply: replySchema.optional(),
    })
    .optional(),
});

function unrecognized(reason: string): ParsedEvent {
  return { kind: 'unrecognized', reason };
}

/**
 * Reduces a WhatsApp webhook delivery to the one message the bot acts on.
 * Status callbacks and anything off-shape come back as `unrecognized`.
 */
export function parseWebhookEvent(payload: unknown): ParsedEvent {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) return unrecognized('no entry/changes in payload');

  const messages = envelope.data.entry[0].changes[0].value.messages;
  if (!messages || messages.length === 0) return unrecognized('no messages in payload');

  const parsed = messageSchema.safeParse(messages[0]);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return unrecognized(`malformed message: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
  }
  const message = parsed.data;

  if (message.type === 'text') {
    return { kind: 'text', from: message.from, body: message.text?.body.trim() ?? '' };
  }

  if (message.type === 'interactive') {
    const interactive = message.interactive;
    if (interactive?.type === 'button_reply' && interactive.button_reply) {
      return { kind: 'reply', from: message.from, replyId: interactive.button_reply.id, control: 'button' };
    }
    if (interactive?.type === 'list_reply' && interactive.list_reply) {
      return { kind: 'reply', from: message.from, replyId: interactive.list_reply.id, control: 'list' };
    }
    return unrecognized(`unknown interactive type: ${interactive?.type ?? 'missing'}`);
  }

  return unrecognized(`unsupported message type: ${message.type}`);
}
