export interface ReplyOption {
  id: string;
  title: string;
}

export type RenderedMessage =
  | { kind: 'text'; body: string }
  | { kind: 'buttons'; body: string; buttons: ReplyOption[] }
  | { kind: 'list'; body: string; buttonLabel: string; sectionTitle: string; rows: ReplyOption[] };

/** Outbound side of the messaging provider. Implementations throw on failure. */
export interface Messenger {
  sendText(to: string, body: string): Promise<void>;
  sendButtons(to: string, body: string, buttons: ReplyOption[]): Promise<void>;
  sendList(
    to: string,
    body: string,
    buttonLabel: string,
    sectionTitle: string,
    rows: ReplyOption[],
  ): Promise<void>;
}

export const MESSENGER = Symbol('MESSENGER');

export function sendRendered(messenger: Messenger, to: string, message: RenderedMessage): Promise<void> {
  switch (message.kind) {
    case 'text':
      return messenger.sendText(to, message.body);
    case 'buttons':
      return messenger.sendButtons(to, message.body, message.buttons);
    case 'list':
      return messenger.sendList(to, message.body, message.buttonLabel, message.sectionTitle, message.rows);
  }
}
