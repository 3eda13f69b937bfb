import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Messenger, ReplyOption } from './bot/messenger';
import { AppConfig } from './config/configuration';
import { QuestionRow } from './quiz/question';

export function createConfig(overrides: Partial<AppConfig> = {}): ConfigService<AppConfig, true> {
  const values: AppConfig = {
    PORT: 3000,
    QUIZ_FILE: 'quiz.json',
    VERIFY_TOKEN: 'test-verify-token',
    WHATSAPP_TOKEN: 'test-token',
    WHATSAPP_PHONE_NUMBER_ID: '1234567890',
    GRAPH_API_VERSION: 'v17.0',
    SESSION_TTL_MINUTES: 30,
    SEND_TIMEOUT_MS: 10_000,
    ...overrides,
  };
  return new ConfigService<AppConfig, true>(values);
}

const quizDirs: string[] = [];

/** Writes rows to a fresh temp file and returns its absolute path. */
export function writeQuizFile(rows: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quiz-bot-'));
  quizDirs.push(dir);
  const file = path.join(dir, 'quiz.json');
  fs.writeFileSync(file, JSON.stringify(rows));
  return file;
}

/** Deletes every directory `writeQuizFile` created; call from `afterAll`. */
export function removeQuizFiles(): void {
  for (const dir of quizDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export const twoOptionRow: QuestionRow = {
  Question: 'Is water wet?',
  'Option 1': 'Yes',
  'Option 2': 'No',
  'Correct Option': 1,
  'Explanation 1': 'It is.',
  'Explanation 2': 'It is wet.',
};

export type SentMessage =
  | { type: 'text'; to: string; body: string }
  | { type: 'buttons'; to: string; body: string; buttons: ReplyOption[] }
  | { type: 'list'; to: string; body: string; buttonLabel: string; sectionTitle: string; rows: ReplyOption[] };

/** Records every outbound message instead of sending it. */
export class RecordingMessenger implements Messenger {
  readonly sent: SentMessage[] = [];
  failNext = 0;
  private gate: Promise<void> = Promise.resolve();

  /** Holds every send until the returned function is called. */
  hold(): () => void {
    let open: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    return open;
  }

  async sendText(to: string, body: string): Promise<void> {
    await this.record({ type: 'text', to, body });
  }

  async sendButtons(to: string, body: string, buttons: ReplyOption[]): Promise<void> {
    await this.record({ type: 'buttons', to, body, buttons });
  }

  async sendList(
    to: string,
    body: string,
    buttonLabel: string,
    sectionTitle: string,
    rows: ReplyOption[],
  ): Promise<void> {
    await this.record({ type: 'list', to, body, buttonLabel, sectionTitle, rows });
  }

  private async record(message: SentMessage) {
    await this.gate;
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error('provider unavailable');
    }
    this.sent.push(message);
  }
}

export function textEvent(from: string, body: string) {
  return {
    entry: [{ changes: [{ value: { messages: [{ from, type: 'text', text: { body } }] } }] }],
  };
}

export function buttonReplyEvent(from: string, id: string) {
  return {
    entry: [
      {
        changes: [
          {
            value: {
              messages: [{ from, type: 'interactive', interactive: { type: 'button_reply', button_reply: { id, title: id } } }],
            },
          },
        ],
      },
    ],
  };
}

export function listReplyEvent(from: string, id: string) {
  return {
    entry: [
      {
        changes: [
          {
            value: {
              messages: [{ from, type: 'interactive', interactive: { type: 'list_reply', list_reply: { id, title: id } } }],
            },
          },
        ],
      },
    ],
  };
}
